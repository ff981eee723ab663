import { beforeEach, describe, expect, it, vi } from "vitest";

import { geminiReply, stubMemoryBackendEnv } from "@/backend/testing/env";

const fetchMock = vi.fn<typeof fetch>();

function analyzeRequest(body: string, headers: Record<string, string> = {}): Request {
  return new Request("http://localhost/agent/analyze", {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body,
  });
}

async function loadRoutes() {
  const analyze = await import("@/app/agent/analyze/route");
  const sessions = await import("@/app/api/v1/sessions/[sessionId]/route");
  return { analyze, sessions };
}

describe("POST /agent/analyze", () => {
  beforeEach(() => {
    vi.resetModules();
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    stubMemoryBackendEnv();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("analyzes content and records the exchange", async () => {
    fetchMock.mockResolvedValueOnce(geminiReply("Nothing supports this.\nVerdict: FAKE\nConfidence: 95"));
    const { analyze, sessions } = await loadRoutes();

    const response = await analyze.POST(
      analyzeRequest(JSON.stringify({ content: "The moon is made of cheese", user_id: "u1" }), {
        origin: "https://app.example.test",
        "x-request-id": "req-1",
      }),
    );

    expect(response.status).toBe(200);
    expect(response.headers.get("x-request-id")).toBe("req-1");
    expect(response.headers.get("access-control-allow-origin")).toBe("https://app.example.test");
    expect(await response.json()).toMatchObject({
      verdict: "FAKE",
      confidence: 95,
      details: "Nothing supports this.\nVerdict: FAKE\nConfidence: 95",
      language: "english",
      agentVersion: "2.0",
      sessionId: "u1",
    });
    expect(String(fetchMock.mock.calls[0][0])).toContain("gemini-2.5-flash:generateContent?key=test-secret");

    const historyResponse = await sessions.GET(new Request("http://localhost/api/v1/sessions/u1"), {
      params: Promise.resolve({ sessionId: "u1" }),
    });
    const history = await historyResponse.json();
    expect(history.sessionId).toBe("u1");
    expect(history.count).toBe(2);
    expect(history.history[0]).toMatchObject({ role: "user", content: "The moon is made of cheese" });
  });

  it("accepts long content and falls back to english for unknown language tags", async () => {
    fetchMock.mockResolvedValueOnce(geminiReply("Verdict: SUSPICIOUS\nConfidence: 40"));
    const { analyze } = await loadRoutes();
    const content = "a".repeat(8001);

    const response = await analyze.POST(
      analyzeRequest(JSON.stringify({ content, language: "x".repeat(41), user_id: "u3" })),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ verdict: "SUSPICIOUS", confidence: 40, language: "english" });
    const geminiBody = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(geminiBody.contents[0].parts[0].text).toContain(content);
  });

  it("rejects empty content with the error envelope", async () => {
    const { analyze } = await loadRoutes();

    const response = await analyze.POST(analyzeRequest(JSON.stringify({ content: "   " })));

    expect(response.status).toBe(400);
    const body = await response.json();
    expect(body).toEqual({
      error: { code: "validation_error", message: "Content must not be empty" },
      requestId: response.headers.get("x-request-id"),
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects malformed and incomplete bodies", async () => {
    const { analyze } = await loadRoutes();

    const malformed = await analyze.POST(analyzeRequest("not json"));
    expect(malformed.status).toBe(400);
    expect((await malformed.json()).error.code).toBe("invalid_json");

    const incomplete = await analyze.POST(analyzeRequest(JSON.stringify({ language: "english" })));
    expect(incomplete.status).toBe(400);
    const body = await incomplete.json();
    expect(body.error.code).toBe("invalid_request");
    expect(body.error.details[0].path).toEqual(["content"]);
  });

  it("returns 503 when the model call fails", async () => {
    fetchMock.mockResolvedValueOnce(Response.json({ error: { message: "Quota exceeded" } }, { status: 429 }));
    const { analyze, sessions } = await loadRoutes();

    const response = await analyze.POST(analyzeRequest(JSON.stringify({ content: "claim", user_id: "u2" })));

    expect(response.status).toBe(503);
    expect((await response.json()).error).toEqual({
      code: "analysis_unavailable",
      message: "Analysis is temporarily unavailable. Please try again later.",
    });

    const history = await sessions.GET(new Request("http://localhost/api/v1/sessions/u2"), {
      params: Promise.resolve({ sessionId: "u2" }),
    });
    expect((await history.json()).count).toBe(1);
  });

  it("reports configuration errors as internal errors", async () => {
    stubMemoryBackendEnv({ BACKEND_DB_ADAPTER: "postgres" });
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { analyze } = await loadRoutes();

    const response = await analyze.POST(
      analyzeRequest(JSON.stringify({ content: "claim" }), { origin: "https://app.example.test" }),
    );

    expect(response.status).toBe(500);
    expect((await response.json()).error).toEqual({
      code: "internal_error",
      message: "Internal server error. Please try again.",
    });
    expect(response.headers.get("access-control-allow-origin")).toBe("https://app.example.test");
    expect(consoleError).toHaveBeenCalledWith("[http] Request failed", expect.objectContaining({ code: "internal_error" }));
  });

  it("answers preflight requests", async () => {
    const { analyze } = await loadRoutes();

    const response = await analyze.OPTIONS(
      new Request("http://localhost/agent/analyze", {
        method: "OPTIONS",
        headers: { origin: "https://app.example.test" },
      }),
    );

    expect(response.status).toBe(204);
    expect(response.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
    expect(response.headers.get("access-control-allow-credentials")).toBe("true");
  });

  it("answers preflight requests even when the configuration is invalid", async () => {
    stubMemoryBackendEnv({ BACKEND_DB_ADAPTER: "postgres" });
    const { analyze } = await loadRoutes();

    const response = await analyze.OPTIONS(
      new Request("http://localhost/agent/analyze", {
        method: "OPTIONS",
        headers: { origin: "https://app.example.test" },
      }),
    );

    expect(response.status).toBe(204);
    expect(response.headers.get("access-control-allow-origin")).toBe("https://app.example.test");
  });
});
