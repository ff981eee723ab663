import { isChatRole, type ChatRole } from "@/backend/domain/chat-history";
import { ChatHistoryStoreError } from "@/backend/ports/chat-history-repository";

export function toIsoString(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === "string") {
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw new ChatHistoryStoreError(`Invalid date string from database: ${value}`);
    }
    return parsed.toISOString();
  }

  throw new ChatHistoryStoreError("Expected database date value to be a Date or string");
}

// BIGSERIAL columns arrive as strings from pg and as numbers from PostgREST.
export function toMessageId(value: unknown): number {
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ChatHistoryStoreError(`Invalid chat message id from database: ${String(value)}`);
  }

  return parsed;
}

export function toChatRole(value: unknown): ChatRole {
  if (typeof value !== "string" || !isChatRole(value)) {
    throw new ChatHistoryStoreError(`Unexpected chat role from database: ${String(value)}`);
  }

  return value;
}
