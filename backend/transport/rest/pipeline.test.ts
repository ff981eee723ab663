import { describe, expect, it } from "vitest";

import { getOrCreateRequestId, resolveAllowedOrigin } from "@/backend/transport/rest/pipeline";

function requestWith(headers: Record<string, string>): Request {
  return new Request("http://localhost/agent/status", { headers });
}

describe("resolveAllowedOrigin", () => {
  it("allows listed origins only", () => {
    const origins = ["https://app.example.test"];

    expect(resolveAllowedOrigin(requestWith({ origin: "https://app.example.test" }), origins)).toBe(
      "https://app.example.test",
    );
    expect(resolveAllowedOrigin(requestWith({ origin: "https://evil.example.test" }), origins)).toBeNull();
    expect(resolveAllowedOrigin(requestWith({}), origins)).toBeNull();
  });

  it("answers any origin with a wildcard", () => {
    expect(resolveAllowedOrigin(requestWith({ origin: "https://other.example.test" }), ["*"])).toBe("*");
  });
});

describe("getOrCreateRequestId", () => {
  it("echoes the caller's id or generates one", () => {
    expect(getOrCreateRequestId(requestWith({ "x-request-id": " abc " }))).toBe("abc");
    expect(getOrCreateRequestId(requestWith({}))).toMatch(/^[0-9a-f-]{36}$/);
  });
});
