import { describe, expect, it, vi } from "vitest";

import { SupabaseChatHistoryRepository } from "@/backend/adapters/db/supabase/chat-history-repository";
import { ChatHistoryStoreError } from "@/backend/ports/chat-history-repository";

function createRepository() {
  const fetchMock = vi.fn<typeof fetch>();
  const repository = new SupabaseChatHistoryRepository({
    url: "https://project.supabase.test/",
    key: "test-secret",
    fetch: fetchMock,
  });

  return { fetchMock, repository };
}

describe("SupabaseChatHistoryRepository", () => {
  it("posts new turns and returns the stored representation", async () => {
    const { fetchMock, repository } = createRepository();
    fetchMock.mockResolvedValueOnce(
      Response.json(
        [{ id: 3, user_id: "u1", role: "assistant", content: "No.", created_at: "2025-01-01T00:00:00+00:00" }],
        { status: 201 },
      ),
    );

    const message = await repository.append({ userId: "u1", role: "assistant", content: "No." });

    expect(message).toEqual({
      id: 3,
      userId: "u1",
      role: "assistant",
      content: "No.",
      createdAt: "2025-01-01T00:00:00.000Z",
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://project.supabase.test/rest/v1/chat_history");
    expect(init).toMatchObject({
      method: "POST",
      headers: {
        apikey: "test-secret",
        authorization: "Bearer test-secret",
        "content-type": "application/json",
        prefer: "return=representation",
      },
      body: JSON.stringify({ user_id: "u1", role: "assistant", content: "No." }),
    });
  });

  it("reads the newest turns and returns them oldest first", async () => {
    const { fetchMock, repository } = createRepository();
    fetchMock.mockResolvedValueOnce(
      Response.json([
        { id: 5, user_id: "u1", role: "assistant", content: "second", created_at: "2025-01-01T00:00:02Z" },
        { id: 4, user_id: "u1", role: "user", content: "first", created_at: "2025-01-01T00:00:01Z" },
      ]),
    );

    const history = await repository.listRecentForUser("u1", 2);

    expect(history.map((message) => message.id)).toEqual([4, 5]);
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://project.supabase.test/rest/v1/chat_history?select=id%2Cuser_id%2Crole%2Ccontent%2Ccreated_at&user_id=eq.u1&order=created_at.desc%2Cid.desc&limit=2",
    );
  });

  it("surfaces PostgREST error messages", async () => {
    const { fetchMock, repository } = createRepository();
    fetchMock.mockResolvedValueOnce(
      Response.json({ message: "permission denied for table chat_history" }, { status: 401 }),
    );

    await expect(repository.listForUser("u1")).rejects.toThrowError(
      new ChatHistoryStoreError("permission denied for table chat_history"),
    );
  });

  it("wraps network failures", async () => {
    const { fetchMock, repository } = createRepository();
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(repository.listForUser("u1")).rejects.toThrow("Supabase request failed: fetch failed");
  });

  it("rejects unexpected payloads", async () => {
    const { fetchMock, repository } = createRepository();
    fetchMock.mockResolvedValueOnce(Response.json({ rows: [] }));

    await expect(repository.listForUser("u1")).rejects.toThrow(
      "Supabase returned an unexpected chat_history payload",
    );
  });
});
