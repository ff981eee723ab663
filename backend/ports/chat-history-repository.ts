import type { ChatMessage, ChatRole } from "@/backend/domain/chat-history";

export interface AppendChatMessageInput {
  userId: string;
  role: ChatRole;
  content: string;
}

export interface ChatHistoryRepository {
  append(input: AppendChatMessageInput): Promise<ChatMessage>;
  listForUser(userId: string): Promise<ChatMessage[]>;
  listRecentForUser(userId: string, limit: number): Promise<ChatMessage[]>;
}

export class ChatHistoryStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChatHistoryStoreError";
  }
}
