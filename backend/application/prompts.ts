import type { AnalysisLanguage } from "@/backend/domain/analysis";
import type { ChatMessage } from "@/backend/domain/chat-history";
import type { ModelChatMessage } from "@/backend/ports/model-client";
import type { SocialPost } from "@/backend/ports/social-search-client";

export const ASSISTANT_NAME = "TruthFinder";

const ANALYSIS_SYSTEM_PROMPT = [
  "You are an expert news verification agent. Your role is to:",
  "1. Analyze news content for accuracy and credibility.",
  "2. Check claims against what reliable sources report.",
  "3. Evaluate the credibility of any cited source.",
  "4. Consider how the public is reacting to the story.",
  "5. Detect propaganda and misinformation patterns.",
  "6. Give a detailed, evidence-based explanation.",
  "Be thorough and objective, and give clear reasoning for every conclusion.",
].join("\n");

const URDU_HINDI_STYLE = "Respond in Roman Urdu/Hindi, in a friendly tone.";

const ANALYSIS_RESPONSE_FORMAT = [
  "Response format:",
  "- A detailed analysis with the evidence you relied on",
  "- The risk factors you identified",
  "- Recommendations for the reader",
  "End with exactly these two lines:",
  "Verdict: <REAL | FAKE | PROPAGANDA | SUSPICIOUS>",
  "Confidence: <integer from 0 to 100>",
].join("\n");

export function buildAnalysisSystemPrompt(language: AnalysisLanguage): string {
  if (language === "urdu_hindi") {
    return `${ANALYSIS_SYSTEM_PROMPT}\n${URDU_HINDI_STYLE}`;
  }

  return ANALYSIS_SYSTEM_PROMPT;
}

export function buildAnalysisPrompt(content: string, language: AnalysisLanguage): string {
  const instruction =
    language === "urdu_hindi"
      ? `Is news ka comprehensive analysis karo: "${content}"`
      : `Please perform a comprehensive analysis of this news: "${content}"`;

  return [
    instruction,
    "",
    "Required steps:",
    "1. Summarize the news content.",
    "2. Fact-check it against reliable sources.",
    "3. Evaluate source credibility.",
    "4. Detect propaganda or misinformation patterns.",
    "5. Give a final verdict with a confidence level.",
    "",
    ANALYSIS_RESPONSE_FORMAT,
  ].join("\n");
}

export const CHAT_SYSTEM_PROMPT = [
  `You are ${ASSISTANT_NAME}, a friendly and helpful AI assistant.`,
  "You specialize in news analysis, fact-checking and misinformation detection,",
  "and you also handle general conversation.",
  "The earlier turns of this conversation are provided; use them when the user refers to",
  "something they told you before. Never claim you cannot see information that is in the conversation.",
].join(" ");

export const GREETING_RESPONSE =
  `Hello! I'm ${ASSISTANT_NAME}, your AI assistant. I can help with news analysis, ` +
  "fact-checking, general questions, or just a chat. What's on your mind today?";

export const IDENTITY_RESPONSE =
  `I'm ${ASSISTANT_NAME}, your AI assistant. I specialize in news analysis, fact-checking ` +
  "and misinformation detection, and I'm happy to have general conversations too. " +
  "I remember what you share with me during our chat, so you can build on earlier questions.";

export function buildNewsEventPrompt(message: string, posts: SocialPost[]): string {
  const postContext =
    posts.length > 0
      ? posts
          .map((post) => `Post by @${post.authorUsername ?? "unknown"}: ${post.text}`)
          .join("\n\n")
      : "No relevant posts found.";

  return [
    "Below is a question about a recent event, followed by recent social media posts about the topic.",
    "Use both to give a comprehensive, up-to-date answer, and say which claims the posts do not support.",
    "",
    `Question: ${message}`,
    "",
    "Recent posts:",
    postContext,
  ].join("\n");
}

export function buildSummaryPrompt(text: string): string {
  return [
    "Summarize the following article or news text into a short, clear summary of 3-5 sentences.",
    "",
    "Text:",
    `'''${text}'''`,
  ].join("\n");
}

export function buildFactCheckPrompt(claim: string): string {
  return [
    "Fact-check the following claim. Say whether it is real, fake, biased or misleading,",
    "and give short reasoning for your conclusion.",
    "",
    "Claim:",
    `'''${claim}'''`,
    "",
    "End with exactly these two lines:",
    "Verdict: <REAL | FAKE | PROPAGANDA | SUSPICIOUS>",
    "Confidence: <integer from 0 to 100>",
  ].join("\n");
}

export function buildToneAnalysisPrompt(text: string): string {
  return [
    "Analyze the tone, sentiment and any political bias of the following text.",
    "Point out emotionally loaded wording and say who the text seems to favour, if anyone.",
    "",
    "Text:",
    `'''${text}'''`,
  ].join("\n");
}

export function buildContentSentimentPrompt(text: string): string {
  return [
    "Analyze the sentiment of the following text. Consider emotional language, tone and overall message.",
    "Return only one word: POSITIVE, NEGATIVE, or NEUTRAL.",
    "",
    "Text:",
    `'''${text}'''`,
  ].join("\n");
}

export function buildKeywordPrompt(text: string): string {
  return [
    "Extract the key terms and named entities (people, organisations, places, dates) from the following text.",
    "Return them as a short bulleted list, most important first.",
    "",
    "Text:",
    `'''${text}'''`,
  ].join("\n");
}

export function buildStatisticCheckPrompt(text: string): string {
  return [
    "Check the statistics and numbers in the following text.",
    "For each figure, say whether it is plausible, what a reliable source would report,",
    "and whether it is presented in a misleading way.",
    "",
    "Text:",
    `'''${text}'''`,
  ].join("\n");
}

export interface ReportSections {
  summary: string;
  factCheck: string;
  keywords: string;
}

export function buildReportPrompt(text: string, sections: ReportSections): string {
  return [
    "Write a final verification report for the text below, using the prepared findings.",
    "Use the headings Summary, Verdict, Key terms and Recommendation.",
    "",
    "Text:",
    `'''${text}'''`,
    "",
    "Summary findings:",
    sections.summary,
    "",
    "Fact-check findings:",
    sections.factCheck,
    "",
    "Key terms:",
    sections.keywords,
  ].join("\n");
}

export const SOCIAL_SEARCH_UNAVAILABLE_RESPONSE =
  "Social media search is not configured, so I can't look up recent posts right now.";

export const NO_SOCIAL_POSTS_RESPONSE = "I couldn't find any recent posts about that.";

export function formatSocialPostsResponse(posts: SocialPost[]): string {
  return [
    "Here is what people are posting about it:",
    "",
    ...posts.map((post) => `@${post.authorUsername ?? "unknown"}: ${post.text}`),
  ].join("\n");
}

export function buildPersonalPrompt(message: string): string {
  return [
    "The user is sharing or asking about personal information.",
    "If they share something new, acknowledge it warmly.",
    "If they ask about something they told you earlier, answer from the conversation.",
    "",
    message,
  ].join("\n");
}

export function buildPublicSentimentPrompt(posts: SocialPost[]): string {
  return [
    "Analyze the overall sentiment of the following social media posts.",
    "Consider emotional language, tone and overall message.",
    "Return only one word: POSITIVE, NEGATIVE, or NEUTRAL.",
    "",
    ...posts.map((post, index) => `${index + 1}. ${post.text}`),
  ].join("\n");
}

export function toModelHistory(history: ChatMessage[]): ModelChatMessage[] {
  return history.map((message) => ({
    role: message.role,
    content: message.content,
  }));
}
