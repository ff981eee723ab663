export const CHAT_INTENTS = [
  "identity",
  "greeting",
  "news_event",
  "summarize",
  "fact_check",
  "sentiment",
  "keywords",
  "statistic",
  "report",
  "social_media",
  "personal",
  "general",
] as const;

export type ChatIntent = (typeof CHAT_INTENTS)[number];

// Longer messages that open with "hi" are real questions, not greetings.
const MAX_GREETING_WORDS = 5;

const IDENTITY_PHRASES = ["who are you", "about you", "yourself", "what are you"];

const GREETING_PHRASES = ["hello", "hi", "hey", "salaam", "assalam", "greetings"];

const NEWS_EVENT_PHRASES = [
  "news",
  "breaking",
  "happened",
  "event",
  "incident",
  "attack",
  "war",
  "earthquake",
  "election",
  "trending",
  "protest",
  "riot",
  "conflict",
  "explosion",
  "disaster",
  "crisis",
  "shooting",
  "flood",
  "storm",
  "fire",
  "accident",
  "strike",
  "emergency",
];

const SUMMARIZE_PHRASES = ["summarize", "summarise", "summary", "short version", "tl;dr"];

const FACT_CHECK_PHRASES = ["fact check", "fact-check", "is it true", "verify", "real or fake"];

const SENTIMENT_PHRASES = ["bias", "political bias", "tone", "sentiment"];

const KEYWORD_PHRASES = ["keywords", "keyword", "extract", "entities"];

const STATISTIC_PHRASES = ["statistic", "statistics", "stats", "number", "numbers"];

const REPORT_PHRASES = ["report", "generate report", "final report"];

const SOCIAL_MEDIA_PHRASES = ["twitter", "tweet", "tweets", "social media"];

const PERSONAL_PHRASES = [
  "my name",
  "i am",
  "i'm",
  "my age",
  "my birthday",
  "my location",
  "i live",
  "i work",
  "my job",
  "my hobby",
  "my favorite",
  "i like",
  "i love",
  "remember",
  "what did i tell you",
  "what's my",
  "what is my",
  "do you remember",
  "recall",
  "my information",
];

const INTENT_PHRASES: ReadonlyArray<readonly [Exclude<ChatIntent, "greeting" | "general">, readonly string[]]> = [
  ["news_event", NEWS_EVENT_PHRASES],
  ["summarize", SUMMARIZE_PHRASES],
  ["fact_check", FACT_CHECK_PHRASES],
  ["sentiment", SENTIMENT_PHRASES],
  ["keywords", KEYWORD_PHRASES],
  ["statistic", STATISTIC_PHRASES],
  ["report", REPORT_PHRASES],
  ["social_media", SOCIAL_MEDIA_PHRASES],
  ["personal", PERSONAL_PHRASES],
];

export function detectChatIntent(message: string): ChatIntent {
  const normalized = message.toLowerCase().replace(/\s+/g, " ").trim();

  if (containsAnyPhrase(normalized, IDENTITY_PHRASES)) {
    return "identity";
  }

  const wordCount = normalized.split(" ").filter((word) => word.length > 0).length;
  if (wordCount <= MAX_GREETING_WORDS && containsAnyPhrase(normalized, GREETING_PHRASES)) {
    return "greeting";
  }

  for (const [intent, phrases] of INTENT_PHRASES) {
    if (containsAnyPhrase(normalized, phrases)) {
      return intent;
    }
  }

  return "general";
}

function containsAnyPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => phrasePattern(phrase).test(text));
}

const phrasePatterns = new Map<string, RegExp>();

function phrasePattern(phrase: string): RegExp {
  const cached = phrasePatterns.get(phrase);
  if (cached) {
    return cached;
  }

  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`);
  phrasePatterns.set(phrase, pattern);
  return pattern;
}
