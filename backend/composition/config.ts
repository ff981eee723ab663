import { z } from "zod";

export const DB_ADAPTERS = ["postgres", "supabase", "memory"] as const;

export type DbAdapter = (typeof DB_ADAPTERS)[number];

const envSchema = z.object({
  BACKEND_DB_ADAPTER: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.enum(DB_ADAPTERS).optional(),
  ),
  DATABASE_URL: z.string().optional(),
  SUPABASE_URL: z.string().optional(),
  SUPABASE_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().optional(),
  TWITTER_BEARER_TOKEN: z.string().optional(),
  HISTORY_CONTEXT_LIMIT: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),
  DEBUG: z.string().optional(),
});

const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
const DEFAULT_CORS_ORIGINS = ["http://localhost:3000"];

export interface BackendConfig {
  db: {
    adapter: DbAdapter;
    databaseUrl?: string;
    supabase?: {
      url: string;
      key: string;
    };
  };
  ai: {
    apiKey?: string;
    model: string;
    historyContextLimit: number;
  };
  social: {
    twitterBearerToken?: string;
  };
  http: {
    corsOrigins: string[];
  };
  debug: boolean;
}

export function loadBackendConfig(source: Record<string, string | undefined> = process.env): BackendConfig {
  const env = envSchema.parse(source);

  const databaseUrl = nonEmpty(env.DATABASE_URL);
  const supabaseUrl = nonEmpty(env.SUPABASE_URL);
  const supabaseKey = nonEmpty(env.SUPABASE_KEY);
  const dbAdapter = env.BACKEND_DB_ADAPTER ?? inferDbAdapter(databaseUrl, supabaseUrl);

  if (dbAdapter === "postgres" && !databaseUrl) {
    throw new Error(
      "DATABASE_URL is required when BACKEND_DB_ADAPTER is 'postgres'. Set BACKEND_DB_ADAPTER='memory' to run without a database.",
    );
  }

  let supabase: BackendConfig["db"]["supabase"];
  if (dbAdapter === "supabase") {
    if (!supabaseUrl || !supabaseKey) {
      throw new Error("SUPABASE_URL and SUPABASE_KEY are required when BACKEND_DB_ADAPTER is 'supabase'");
    }

    supabase = {
      url: parseSupabaseUrl(supabaseUrl),
      key: supabaseKey,
    };
  }

  return {
    db: {
      adapter: dbAdapter,
      databaseUrl: dbAdapter === "postgres" ? databaseUrl : undefined,
      supabase,
    },
    ai: {
      apiKey: nonEmpty(env.GOOGLE_API_KEY) ?? nonEmpty(env.GEMINI_API_KEY),
      model: nonEmpty(env.GEMINI_MODEL) ?? DEFAULT_GEMINI_MODEL,
      historyContextLimit: parseHistoryContextLimit(env.HISTORY_CONTEXT_LIMIT),
    },
    social: {
      twitterBearerToken: nonEmpty(env.TWITTER_BEARER_TOKEN),
    },
    http: {
      corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    },
    debug: parseBooleanFlag(env.DEBUG, false),
  };
}

/**
 * Reads only `CORS_ORIGINS`, so routes that never build the container (health, preflight)
 * keep answering when another setting is invalid.
 */
export function loadCorsOrigins(source: Record<string, string | undefined> = process.env): string[] {
  return parseCorsOrigins(source.CORS_ORIGINS);
}

function inferDbAdapter(databaseUrl: string | undefined, supabaseUrl: string | undefined): DbAdapter {
  if (databaseUrl) {
    return "postgres";
  }

  if (supabaseUrl) {
    return "supabase";
  }

  return "memory";
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

export function parseBooleanFlag(raw: string | undefined, fallback: boolean): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }

  if (value === "true" || value === "1") {
    return true;
  }

  if (value === "false" || value === "0") {
    return false;
  }

  throw new Error("Boolean flags must use true/false/1/0");
}

function parseHistoryContextLimit(raw: string | undefined): number {
  const value = raw?.trim();
  if (!value) {
    return 50;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 500) {
    throw new Error("HISTORY_CONTEXT_LIMIT must be an integer between 1 and 500");
  }

  return parsed;
}

function parseCorsOrigins(raw: string | undefined): string[] {
  const value = raw?.trim();
  if (!value) {
    return [...DEFAULT_CORS_ORIGINS];
  }

  return value
    .split(",")
    .map((origin) => origin.trim().replace(/\/+$/, ""))
    .filter((origin) => origin.length > 0);
}

function parseSupabaseUrl(raw: string): string {
  const parsed = z.string().url().safeParse(raw);
  if (!parsed.success) {
    throw new Error("SUPABASE_URL must be a valid URL");
  }

  return parsed.data.replace(/\/+$/, "");
}
