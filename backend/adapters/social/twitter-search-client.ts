import { z } from "zod";

import {
  SocialSearchRequestError,
  type SocialPost,
  type SocialSearchClient,
} from "@/backend/ports/social-search-client";

const REQUEST_TIMEOUT_MS = 10_000;
const RECENT_SEARCH_URL = "https://api.twitter.com/2/tweets/search/recent";
// Recent search rejects queries longer than 512 characters.
const MAX_TOPIC_LENGTH = 400;

const recentSearchResponseSchema = z.object({
  data: z
    .array(
      z.object({
        id: z.string(),
        text: z.string(),
        author_id: z.string().optional(),
      }),
    )
    .optional(),
  includes: z
    .object({
      users: z.array(z.object({ id: z.string(), username: z.string() })).optional(),
    })
    .optional(),
  title: z.string().optional(),
  detail: z.string().optional(),
});

export interface TwitterSearchClientOptions {
  bearerToken?: string;
  fetch?: typeof fetch;
}

export class TwitterSearchClient implements SocialSearchClient {
  private readonly bearerToken: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TwitterSearchClientOptions) {
    this.bearerToken = options.bearerToken?.trim() || undefined;
    this.fetchImpl = options.fetch ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.bearerToken);
  }

  async searchRecent(query: string, maxResults: number): Promise<SocialPost[]> {
    if (!this.bearerToken) {
      return [];
    }

    const topic = query.replace(/\s+/g, " ").trim().slice(0, MAX_TOPIC_LENGTH);
    if (!topic) {
      return [];
    }

    const params = new URLSearchParams({
      query: `${topic} -is:retweet lang:en`,
      max_results: String(clampMaxResults(maxResults)),
      "tweet.fields": "created_at,author_id",
      expansions: "author_id",
      "user.fields": "username",
    });

    let response: Response;
    try {
      response = await this.fetchImpl(`${RECENT_SEARCH_URL}?${params.toString()}`, {
        method: "GET",
        headers: {
          authorization: `Bearer ${this.bearerToken}`,
        },
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new SocialSearchRequestError(`Twitter search failed: ${reason}`);
    }

    let body: unknown = null;
    try {
      body = await response.json();
    } catch {
      body = null;
    }

    const parsed = recentSearchResponseSchema.safeParse(body);
    if (!response.ok) {
      const detail = parsed.success ? parsed.data.detail ?? parsed.data.title : undefined;
      throw new SocialSearchRequestError(detail ?? `Twitter search failed (${response.status})`);
    }

    if (!parsed.success) {
      throw new SocialSearchRequestError("Twitter returned an unexpected search payload");
    }

    const usernames = new Map(
      (parsed.data.includes?.users ?? []).map((user) => [user.id, user.username] as const),
    );

    return (parsed.data.data ?? []).map((tweet) => ({
      id: tweet.id,
      authorUsername: tweet.author_id ? usernames.get(tweet.author_id) ?? null : null,
      text: tweet.text,
    }));
  }
}

function clampMaxResults(value: number): number {
  if (!Number.isFinite(value)) {
    return 10;
  }

  return Math.max(10, Math.min(100, Math.floor(value)));
}
