import { StoreUnavailableError } from "@/backend/application/errors";
import { ChatHistoryStoreError } from "@/backend/ports/chat-history-repository";

export async function withChatHistoryStore<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof ChatHistoryStoreError) {
      throw new StoreUnavailableError();
    }

    throw error;
  }
}
