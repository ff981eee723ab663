import { AnalysisUnavailableError, ValidationError } from "@/backend/application/errors";
import { detectChatIntent, type ChatIntent } from "@/backend/application/intents";
import {
  buildFactCheckPrompt,
  buildKeywordPrompt,
  buildNewsEventPrompt,
  buildPersonalPrompt,
  buildReportPrompt,
  buildStatisticCheckPrompt,
  buildSummaryPrompt,
  buildToneAnalysisPrompt,
  CHAT_SYSTEM_PROMPT,
  formatSocialPostsResponse,
  GREETING_RESPONSE,
  IDENTITY_RESPONSE,
  NO_SOCIAL_POSTS_RESPONSE,
  SOCIAL_SEARCH_UNAVAILABLE_RESPONSE,
  toModelHistory,
} from "@/backend/application/prompts";
import type { AppendChatTurnUseCase } from "@/backend/application/use-cases/append-chat-turn";
import type { GetChatHistoryUseCase } from "@/backend/application/use-cases/get-chat-history";
import type { ChatMessage } from "@/backend/domain/chat-history";
import type { Logger } from "@/backend/ports/logger";
import {
  ModelConfigurationError,
  ModelRequestError,
  type ModelClient,
} from "@/backend/ports/model-client";
import {
  SocialSearchRequestError,
  type SocialPost,
  type SocialSearchClient,
} from "@/backend/ports/social-search-client";

export const MAX_CHAT_MESSAGE_LENGTH = 2000;
const SOCIAL_POST_LIMIT = 10;

export interface ChatWithAgentInput {
  message: string;
  sessionId?: string | null;
  userId?: string | null;
}

export interface ChatWithAgentResult {
  response: string;
  intent: ChatIntent;
  sessionId: string;
  userId: string;
  history: ChatMessage[];
}

export function sanitizeChatMessage(raw: string): string {
  return raw.replace(/[<>"]/g, "").trim().slice(0, MAX_CHAT_MESSAGE_LENGTH);
}

export class ChatWithAgentUseCase {
  constructor(
    private readonly appendChatTurn: AppendChatTurnUseCase,
    private readonly getChatHistory: GetChatHistoryUseCase,
    private readonly modelClient: ModelClient,
    private readonly socialSearch: SocialSearchClient,
    private readonly logger: Logger,
    private readonly options: { historyContextLimit: number; createId?: () => string },
  ) {}

  async execute(input: ChatWithAgentInput): Promise<ChatWithAgentResult> {
    const message = sanitizeChatMessage(input.message);
    if (message.length === 0) {
      throw new ValidationError("Message cannot be empty");
    }

    const sessionId = input.sessionId?.trim() || this.createId();
    const userId = input.userId?.trim() || sessionId;

    const priorHistory = await this.getChatHistory.execute(userId, {
      limit: this.options.historyContextLimit,
    });

    await this.appendChatTurn.execute({ userId, role: "user", content: message });

    const intent = detectChatIntent(message);
    this.logger.debug("Chat intent detected", { userId, intent });

    const response = await this.reply(intent, message, priorHistory);

    await this.appendChatTurn.execute({ userId, role: "assistant", content: response });

    const history = await this.getChatHistory.execute(userId);

    return {
      response,
      intent,
      sessionId,
      userId,
      history,
    };
  }

  private async reply(intent: ChatIntent, message: string, priorHistory: ChatMessage[]): Promise<string> {
    switch (intent) {
      case "identity":
        return IDENTITY_RESPONSE;
      case "greeting":
        return GREETING_RESPONSE;
      case "news_event": {
        const posts = await this.findRecentPosts(message);
        return this.generate(priorHistory, buildNewsEventPrompt(message, posts));
      }
      case "summarize":
        return this.generate(priorHistory, buildSummaryPrompt(message));
      case "fact_check":
        return this.generate(priorHistory, buildFactCheckPrompt(message));
      case "sentiment":
        return this.generate(priorHistory, buildToneAnalysisPrompt(message));
      case "keywords":
        return this.generate(priorHistory, buildKeywordPrompt(message));
      case "statistic":
        return this.generate(priorHistory, buildStatisticCheckPrompt(message));
      case "report":
        return this.writeReport(message, priorHistory);
      case "social_media":
        return this.describeSocialPosts(message);
      case "personal":
        return this.generate(priorHistory, buildPersonalPrompt(message));
      case "general":
        return this.generate(priorHistory, message);
    }
  }

  // The findings are drafted without history so earlier turns cannot leak into them.
  private async writeReport(message: string, priorHistory: ChatMessage[]): Promise<string> {
    const summary = await this.generate([], buildSummaryPrompt(message));
    const factCheck = await this.generate([], buildFactCheckPrompt(message));
    const keywords = await this.generate([], buildKeywordPrompt(message));

    return this.generate(priorHistory, buildReportPrompt(message, { summary, factCheck, keywords }));
  }

  private async describeSocialPosts(message: string): Promise<string> {
    if (!this.socialSearch.isConfigured()) {
      return SOCIAL_SEARCH_UNAVAILABLE_RESPONSE;
    }

    const posts = await this.findRecentPosts(message);
    return posts.length > 0 ? formatSocialPostsResponse(posts) : NO_SOCIAL_POSTS_RESPONSE;
  }

  private async generate(priorHistory: ChatMessage[], prompt: string): Promise<string> {
    try {
      const generation = await this.modelClient.generateText({
        messages: [
          { role: "system", content: CHAT_SYSTEM_PROMPT },
          ...toModelHistory(priorHistory),
          { role: "user", content: prompt },
        ],
      });

      return generation.text;
    } catch (error) {
      if (error instanceof ModelConfigurationError) {
        this.logger.warn("Chat reply skipped: model is not configured", { reason: error.message });
        throw new AnalysisUnavailableError("Chat is unavailable: the language model is not configured");
      }

      if (error instanceof ModelRequestError) {
        this.logger.warn("Chat reply failed: model request error", { reason: error.message });
        throw new AnalysisUnavailableError();
      }

      throw error;
    }
  }

  private async findRecentPosts(message: string): Promise<SocialPost[]> {
    if (!this.socialSearch.isConfigured()) {
      return [];
    }

    try {
      return await this.socialSearch.searchRecent(message, SOCIAL_POST_LIMIT);
    } catch (error) {
      if (error instanceof SocialSearchRequestError) {
        this.logger.warn("Social search failed; answering without posts", { reason: error.message });
        return [];
      }

      throw error;
    }
  }

  private createId(): string {
    return this.options.createId?.() ?? crypto.randomUUID();
  }
}
