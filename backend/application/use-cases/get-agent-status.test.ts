import { describe, expect, it } from "vitest";

import { GetAgentStatusUseCase } from "@/backend/application/use-cases/get-agent-status";
import { ScriptedModelClient, StaticSocialSearchClient } from "@/backend/testing/fakes";

describe("GetAgentStatusUseCase", () => {
  it("lists every capability when both services are configured", () => {
    const status = new GetAgentStatusUseCase(
      new ScriptedModelClient(),
      new StaticSocialSearchClient(),
    ).execute();

    expect(status).toEqual({
      status: "active",
      agents: ["news_analysis", "chat"],
      version: "2.0",
      capabilities: ["news_analysis", "fact_checking", "sentiment_analysis", "twitter_sentiment"],
    });
  });

  it("drops twitter sentiment without a bearer token", () => {
    const status = new GetAgentStatusUseCase(
      new ScriptedModelClient(),
      new StaticSocialSearchClient([], false),
    ).execute();

    expect(status.capabilities).toEqual(["news_analysis", "fact_checking", "sentiment_analysis"]);
  });

  it("reports degraded without a model key", () => {
    const status = new GetAgentStatusUseCase(
      new ScriptedModelClient([], false),
      new StaticSocialSearchClient(),
    ).execute();

    expect(status.status).toBe("degraded");
    expect(status.capabilities).toEqual([]);
  });
});
