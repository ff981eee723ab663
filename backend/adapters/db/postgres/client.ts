import { Pool, type QueryResult, type QueryResultRow } from "pg";

import type { Logger } from "@/backend/ports/logger";

/** The slice of `Pool` the repositories use; tests hand in a fake. */
export interface PgQueryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: readonly unknown[],
  ): Promise<QueryResult<R>>;
}

const pools = new Map<string, Pool>();

export function getPostgresPool(databaseUrl: string, logger?: Logger): Pool {
  const existing = pools.get(databaseUrl);
  if (existing) {
    return existing;
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    max: 20,
  });

  // Idle clients can fail between requests; the next query reports it.
  pool.on("error", (error) => {
    logger?.error("Idle Postgres client failed", { error: error.message });
  });

  pools.set(databaseUrl, pool);
  return pool;
}

export async function closePostgresPool(databaseUrl: string): Promise<void> {
  const pool = pools.get(databaseUrl);
  if (!pool) {
    return;
  }

  pools.delete(databaseUrl);
  await pool.end();
}
