import type { ModelClient } from "@/backend/ports/model-client";
import type { SocialSearchClient } from "@/backend/ports/social-search-client";

import { AGENT_VERSION } from "@/backend/application/use-cases/analyze-content";

export type AgentCapability =
  | "fact_checking"
  | "news_analysis"
  | "sentiment_analysis"
  | "twitter_sentiment";

export interface AgentStatus {
  status: "active" | "degraded";
  agents: string[];
  version: string;
  capabilities: AgentCapability[];
}

export class GetAgentStatusUseCase {
  constructor(
    private readonly modelClient: ModelClient,
    private readonly socialSearch: SocialSearchClient,
  ) {}

  execute(): AgentStatus {
    const modelReady = this.modelClient.isConfigured();
    const capabilities: AgentCapability[] = modelReady
      ? ["news_analysis", "fact_checking", "sentiment_analysis"]
      : [];

    if (modelReady && this.socialSearch.isConfigured()) {
      capabilities.push("twitter_sentiment");
    }

    return {
      status: modelReady ? "active" : "degraded",
      agents: ["news_analysis", "chat"],
      version: AGENT_VERSION,
      capabilities,
    };
  }
}
