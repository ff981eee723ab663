import { withChatHistoryStore } from "@/backend/application/chat-history-store";
import { ValidationError } from "@/backend/application/errors";
import type { ChatMessage } from "@/backend/domain/chat-history";
import type { ChatHistoryRepository } from "@/backend/ports/chat-history-repository";

export interface GetChatHistoryOptions {
  /** Keep only the newest turns; the result stays oldest-first. */
  limit?: number;
}

export class GetChatHistoryUseCase {
  constructor(private readonly chatHistory: ChatHistoryRepository) {}

  async execute(userId: string, options: GetChatHistoryOptions = {}): Promise<ChatMessage[]> {
    if (userId.trim().length === 0) {
      throw new ValidationError("User id must not be empty");
    }

    const { limit } = options;
    if (limit === undefined) {
      return withChatHistoryStore(() => this.chatHistory.listForUser(userId));
    }

    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("History limit must be a positive integer");
    }

    return withChatHistoryStore(() => this.chatHistory.listRecentForUser(userId, limit));
  }
}
