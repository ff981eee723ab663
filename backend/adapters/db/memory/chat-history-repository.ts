import { compareChatMessages, type ChatMessage } from "@/backend/domain/chat-history";
import type {
  AppendChatMessageInput,
  ChatHistoryRepository,
} from "@/backend/ports/chat-history-repository";

interface InMemoryChatHistoryStore {
  nextId: number;
  messagesByUserId: Map<string, ChatMessage[]>;
}

export class InMemoryChatHistoryRepository implements ChatHistoryRepository {
  private readonly store: InMemoryChatHistoryStore = {
    nextId: 1,
    messagesByUserId: new Map(),
  };

  constructor(private readonly now: () => Date = () => new Date()) {}

  async append(input: AppendChatMessageInput): Promise<ChatMessage> {
    const message: ChatMessage = {
      id: this.store.nextId,
      userId: input.userId,
      role: input.role,
      content: input.content,
      createdAt: this.now().toISOString(),
    };
    this.store.nextId += 1;

    const messages = this.store.messagesByUserId.get(input.userId) ?? [];
    messages.push(message);
    messages.sort(compareChatMessages);
    this.store.messagesByUserId.set(input.userId, messages);

    return { ...message };
  }

  async listForUser(userId: string): Promise<ChatMessage[]> {
    const messages = this.store.messagesByUserId.get(userId) ?? [];
    return messages.map((message) => ({ ...message }));
  }

  async listRecentForUser(userId: string, limit: number): Promise<ChatMessage[]> {
    const messages = this.store.messagesByUserId.get(userId) ?? [];
    const count = Math.max(1, Math.floor(limit));
    return messages.slice(-count).map((message) => ({ ...message }));
  }
}
