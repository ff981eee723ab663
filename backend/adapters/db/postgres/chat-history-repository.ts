import type { QueryResultRow } from "pg";

import type { ChatMessage } from "@/backend/domain/chat-history";
import {
  ChatHistoryStoreError,
  type AppendChatMessageInput,
  type ChatHistoryRepository,
} from "@/backend/ports/chat-history-repository";

import { toChatRole, toIsoString, toMessageId } from "@/backend/adapters/db/mappers";
import type { PgQueryable } from "@/backend/adapters/db/postgres/client";

interface ChatHistoryRow extends QueryResultRow {
  id: string | number;
  user_id: string;
  role: string;
  content: string;
  created_at: Date | string;
}

const CHAT_HISTORY_COLUMNS = "id, user_id, role, content, created_at";

export class PostgresChatHistoryRepository implements ChatHistoryRepository {
  constructor(private readonly db: PgQueryable) {}

  async append(input: AppendChatMessageInput): Promise<ChatMessage> {
    const rows = await this.query(
      `
      INSERT INTO chat_history (user_id, role, content)
      VALUES ($1, $2, $3)
      RETURNING ${CHAT_HISTORY_COLUMNS}
      `,
      [input.userId, input.role, input.content],
    );

    const row = rows[0];
    if (!row) {
      throw new ChatHistoryStoreError("Inserted chat message was not returned");
    }

    return this.mapMessage(row);
  }

  async listForUser(userId: string): Promise<ChatMessage[]> {
    const rows = await this.query(
      `
      SELECT ${CHAT_HISTORY_COLUMNS}
      FROM chat_history
      WHERE user_id = $1
      ORDER BY created_at ASC, id ASC
      `,
      [userId],
    );

    return rows.map((row) => this.mapMessage(row));
  }

  async listRecentForUser(userId: string, limit: number): Promise<ChatMessage[]> {
    const rows = await this.query(
      `
      SELECT ${CHAT_HISTORY_COLUMNS}
      FROM (
        SELECT ${CHAT_HISTORY_COLUMNS}
        FROM chat_history
        WHERE user_id = $1
        ORDER BY created_at DESC, id DESC
        LIMIT $2
      ) recent
      ORDER BY created_at ASC, id ASC
      `,
      [userId, normalizeLimit(limit)],
    );

    return rows.map((row) => this.mapMessage(row));
  }

  private async query(text: string, params: readonly unknown[]): Promise<ChatHistoryRow[]> {
    try {
      const result = await this.db.query<ChatHistoryRow>(text, params);
      return result.rows;
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new ChatHistoryStoreError(`Postgres query failed: ${reason}`, { cause: error });
    }
  }

  private mapMessage(row: ChatHistoryRow): ChatMessage {
    return {
      id: toMessageId(row.id),
      userId: row.user_id,
      role: toChatRole(row.role),
      content: row.content,
      createdAt: toIsoString(row.created_at),
    };
  }
}

export function normalizeLimit(rawLimit: number): number {
  if (!Number.isFinite(rawLimit)) {
    return 50;
  }

  return Math.max(1, Math.min(500, Math.floor(rawLimit)));
}
