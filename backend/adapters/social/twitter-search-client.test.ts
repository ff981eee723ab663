import { describe, expect, it, vi } from "vitest";

import { TwitterSearchClient } from "@/backend/adapters/social/twitter-search-client";
import { SocialSearchRequestError } from "@/backend/ports/social-search-client";

function createClient(bearerToken: string | undefined = "test-token") {
  const fetchMock = vi.fn<typeof fetch>();
  return { fetchMock, client: new TwitterSearchClient({ bearerToken, fetch: fetchMock }) };
}

describe("TwitterSearchClient", () => {
  it("builds the recent search query and resolves usernames", async () => {
    const { client, fetchMock } = createClient();
    fetchMock.mockResolvedValueOnce(
      Response.json({
        data: [
          { id: "100", text: "Water is rising", author_id: "u-1" },
          { id: "101", text: "Stay indoors" },
        ],
        includes: { users: [{ id: "u-1", username: "citywatch" }] },
      }),
    );

    const posts = await client.searchRecent("  flood\n warning ", 5);

    expect(posts).toEqual([
      { id: "100", authorUsername: "citywatch", text: "Water is rising" },
      { id: "101", authorUsername: null, text: "Stay indoors" },
    ]);

    const [url, init] = fetchMock.mock.calls[0];
    const params = new URL(String(url)).searchParams;
    expect(params.get("query")).toBe("flood warning -is:retweet lang:en");
    expect(params.get("max_results")).toBe("10");
    expect(params.get("expansions")).toBe("author_id");
    expect(init?.headers).toEqual({ authorization: "Bearer test-token" });
  });

  it("returns no posts without a token or a topic", async () => {
    const unconfigured = createClient(undefined);
    expect(unconfigured.client.isConfigured()).toBe(false);
    expect(await unconfigured.client.searchRecent("flood", 10)).toEqual([]);
    expect(unconfigured.fetchMock).not.toHaveBeenCalled();

    const configured = createClient();
    expect(await configured.client.searchRecent("   ", 10)).toEqual([]);
    expect(configured.fetchMock).not.toHaveBeenCalled();
  });

  it("returns an empty list when nothing matches", async () => {
    const { client, fetchMock } = createClient();
    fetchMock.mockResolvedValueOnce(Response.json({ meta: { result_count: 0 } }));

    expect(await client.searchRecent("obscure topic", 10)).toEqual([]);
  });

  it("reports API errors with their detail", async () => {
    const { client, fetchMock } = createClient();
    fetchMock.mockResolvedValueOnce(
      Response.json({ title: "Unauthorized", detail: "Unauthorized" }, { status: 401 }),
    );

    await expect(client.searchRecent("flood", 10)).rejects.toThrowError(
      new SocialSearchRequestError("Unauthorized"),
    );
  });

  it("falls back to the status when the error body is empty", async () => {
    const { client, fetchMock } = createClient();
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 429 }));

    await expect(client.searchRecent("flood", 10)).rejects.toThrow("Twitter search failed (429)");
  });
});
