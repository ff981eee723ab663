import { z } from "zod";

import type { ChatMessage } from "@/backend/domain/chat-history";
import {
  ChatHistoryStoreError,
  type AppendChatMessageInput,
  type ChatHistoryRepository,
} from "@/backend/ports/chat-history-repository";

import { toChatRole, toIsoString, toMessageId } from "@/backend/adapters/db/mappers";

const REQUEST_TIMEOUT_MS = 10_000;
const CHAT_HISTORY_SELECT = "id,user_id,role,content,created_at";

const chatHistoryRowSchema = z.object({
  id: z.union([z.number(), z.string()]),
  user_id: z.string(),
  role: z.string(),
  content: z.string(),
  created_at: z.string(),
});

const chatHistoryRowsSchema = z.array(chatHistoryRowSchema);

type ChatHistoryRow = z.infer<typeof chatHistoryRowSchema>;

export interface SupabaseChatHistoryRepositoryOptions {
  url: string;
  key: string;
  fetch?: typeof fetch;
}

/**
 * Reads and writes `chat_history` through the Supabase REST (PostgREST) endpoint,
 * for deployments that only hold the project URL and API key.
 */
export class SupabaseChatHistoryRepository implements ChatHistoryRepository {
  private readonly endpoint: string;
  private readonly key: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SupabaseChatHistoryRepositoryOptions) {
    this.endpoint = `${options.url.replace(/\/+$/, "")}/rest/v1/chat_history`;
    this.key = options.key;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async append(input: AppendChatMessageInput): Promise<ChatMessage> {
    const rows = await this.request(this.endpoint, {
      method: "POST",
      headers: {
        ...this.headers(),
        "content-type": "application/json",
        prefer: "return=representation",
      },
      body: JSON.stringify({
        user_id: input.userId,
        role: input.role,
        content: input.content,
      }),
    });

    const row = rows[0];
    if (!row) {
      throw new ChatHistoryStoreError("Inserted chat message was not returned");
    }

    return mapMessage(row);
  }

  async listForUser(userId: string): Promise<ChatMessage[]> {
    const params = new URLSearchParams({
      select: CHAT_HISTORY_SELECT,
      user_id: `eq.${userId}`,
      order: "created_at.asc,id.asc",
    });

    const rows = await this.request(`${this.endpoint}?${params.toString()}`, {
      method: "GET",
      headers: this.headers(),
    });

    return rows.map(mapMessage);
  }

  async listRecentForUser(userId: string, limit: number): Promise<ChatMessage[]> {
    const params = new URLSearchParams({
      select: CHAT_HISTORY_SELECT,
      user_id: `eq.${userId}`,
      order: "created_at.desc,id.desc",
      limit: String(Math.max(1, Math.floor(limit))),
    });

    const rows = await this.request(`${this.endpoint}?${params.toString()}`, {
      method: "GET",
      headers: this.headers(),
    });

    return rows.map(mapMessage).reverse();
  }

  private headers(): Record<string, string> {
    return {
      apikey: this.key,
      authorization: `Bearer ${this.key}`,
    };
  }

  private async request(url: string, init: RequestInit): Promise<ChatHistoryRow[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new ChatHistoryStoreError(`Supabase request failed: ${reason}`, { cause: error });
    }

    const payload = await safeJson(response);
    if (!response.ok) {
      throw new ChatHistoryStoreError(
        extractErrorMessage(payload) ?? `Supabase request failed (${response.status})`,
      );
    }

    const parsed = chatHistoryRowsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ChatHistoryStoreError("Supabase returned an unexpected chat_history payload");
    }

    return parsed.data;
  }
}

function mapMessage(row: ChatHistoryRow): ChatMessage {
  return {
    id: toMessageId(row.id),
    userId: row.user_id,
    role: toChatRole(row.role),
    content: row.content,
    createdAt: toIsoString(row.created_at),
  };
}

const errorPayloadSchema = z.object({ message: z.string() });

function extractErrorMessage(payload: unknown): string | null {
  const parsed = errorPayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data.message : null;
}

async function safeJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}
