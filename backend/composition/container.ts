import { AnalyzeContentUseCase } from "@/backend/application/use-cases/analyze-content";
import { AnalyzeSentimentUseCase } from "@/backend/application/use-cases/analyze-sentiment";
import { AnalyzeWithAgentsUseCase } from "@/backend/application/use-cases/analyze-with-agents";
import { AppendChatTurnUseCase } from "@/backend/application/use-cases/append-chat-turn";
import { ChatWithAgentUseCase } from "@/backend/application/use-cases/chat-with-agent";
import { FactCheckClaimUseCase } from "@/backend/application/use-cases/fact-check-claim";
import { GetAgentStatusUseCase } from "@/backend/application/use-cases/get-agent-status";
import { GetChatHistoryUseCase } from "@/backend/application/use-cases/get-chat-history";
import { GaugePublicSentimentUseCase } from "@/backend/application/use-cases/gauge-public-sentiment";
import { GeminiModelClient } from "@/backend/adapters/ai/gemini-model-client";
import { InMemoryChatHistoryRepository } from "@/backend/adapters/db/memory/chat-history-repository";
import { closePostgresPool, getPostgresPool } from "@/backend/adapters/db/postgres/client";
import { PostgresChatHistoryRepository } from "@/backend/adapters/db/postgres/chat-history-repository";
import { SupabaseChatHistoryRepository } from "@/backend/adapters/db/supabase/chat-history-repository";
import { ConsoleLogger, describeError } from "@/backend/adapters/logging/console-logger";
import { TwitterSearchClient } from "@/backend/adapters/social/twitter-search-client";
import type { ChatHistoryRepository } from "@/backend/ports/chat-history-repository";
import type { Logger } from "@/backend/ports/logger";
import type { ModelClient } from "@/backend/ports/model-client";
import type { SocialSearchClient } from "@/backend/ports/social-search-client";

import { loadBackendConfig, type BackendConfig } from "@/backend/composition/config";

interface ContainerState {
  fingerprint: string;
  container: ApplicationContainer;
  dispose?: () => Promise<void>;
}

let devContainerState: ContainerState | undefined;

export interface ApplicationContainer {
  config: BackendConfig;
  logger: Logger;
  modelClient: ModelClient;
  socialSearch: SocialSearchClient;
  chatHistory: ChatHistoryRepository;
  useCases: {
    appendChatTurn: AppendChatTurnUseCase;
    getChatHistory: GetChatHistoryUseCase;
    analyzeContent: AnalyzeContentUseCase;
    analyzeWithAgents: AnalyzeWithAgentsUseCase;
    factCheckClaim: FactCheckClaimUseCase;
    analyzeSentiment: AnalyzeSentimentUseCase;
    chatWithAgent: ChatWithAgentUseCase;
    gaugePublicSentiment: GaugePublicSentimentUseCase;
    getAgentStatus: GetAgentStatusUseCase;
  };
}

export type ContainerOverrides = Partial<
  Pick<ApplicationContainer, "logger" | "modelClient" | "socialSearch" | "chatHistory">
>;

declare global {
  var __truthfinderBackendContainerState: ContainerState | undefined;
}

export function getApplicationContainer(): ApplicationContainer {
  const config = loadBackendConfig();
  const fingerprint = JSON.stringify(config);

  const currentState = getCurrentContainerState();
  if (currentState && currentState.fingerprint === fingerprint) {
    return currentState.container;
  }

  const nextState = createApplicationContainerState(config, fingerprint);
  setCurrentContainerState(nextState);

  if (currentState?.dispose) {
    const previousLogger = currentState.container.logger;
    void currentState.dispose().catch((error: unknown) => {
      previousLogger.warn("Disposing the previous data adapter failed", { error: describeError(error) });
    });
  }

  return nextState.container;
}

export function createApplicationContainer(
  config: BackendConfig,
  overrides: ContainerOverrides = {},
): ApplicationContainer {
  return createApplicationContainerState(config, JSON.stringify(config), overrides).container;
}

function createApplicationContainerState(
  config: BackendConfig,
  fingerprint: string,
  overrides: ContainerOverrides = {},
): ContainerState {
  const logger = overrides.logger ?? new ConsoleLogger({ debug: config.debug });
  const adapter: DataAdapterRuntime = overrides.chatHistory
    ? { chatHistory: overrides.chatHistory }
    : createDataAdapter(config, logger.child("db"));

  const modelClient =
    overrides.modelClient ??
    new GeminiModelClient({
      apiKey: config.ai.apiKey,
      defaultModel: config.ai.model,
    });
  const socialSearch =
    overrides.socialSearch ??
    new TwitterSearchClient({
      bearerToken: config.social.twitterBearerToken,
    });

  if (!modelClient.isConfigured()) {
    logger.warn("GOOGLE_API_KEY / GEMINI_API_KEY is not set; analysis requests will be unavailable");
  }

  const appendChatTurn = new AppendChatTurnUseCase(adapter.chatHistory);
  const getChatHistory = new GetChatHistoryUseCase(adapter.chatHistory);
  const analyzeContent = new AnalyzeContentUseCase(
    appendChatTurn,
    getChatHistory,
    modelClient,
    logger.child("analysis"),
    { historyContextLimit: config.ai.historyContextLimit },
  );
  const gaugePublicSentiment = new GaugePublicSentimentUseCase(
    socialSearch,
    modelClient,
    logger.child("public-sentiment"),
  );

  const factCheckClaim = new FactCheckClaimUseCase(modelClient, logger.child("fact-check"));
  const analyzeSentiment = new AnalyzeSentimentUseCase(modelClient, logger.child("sentiment"));

  const useCases = {
    appendChatTurn,
    getChatHistory,
    analyzeContent,
    factCheckClaim,
    analyzeSentiment,
    gaugePublicSentiment,
    analyzeWithAgents: new AnalyzeWithAgentsUseCase(
      { analyzeContent, factCheckClaim, analyzeSentiment, gaugePublicSentiment },
      logger.child("multi-agent"),
    ),
    chatWithAgent: new ChatWithAgentUseCase(
      appendChatTurn,
      getChatHistory,
      modelClient,
      socialSearch,
      logger.child("chat-agent"),
      { historyContextLimit: config.ai.historyContextLimit },
    ),
    getAgentStatus: new GetAgentStatusUseCase(modelClient, socialSearch),
  };

  return {
    fingerprint,
    container: {
      config,
      logger,
      modelClient,
      socialSearch,
      chatHistory: adapter.chatHistory,
      useCases,
    },
    dispose: adapter.dispose,
  };
}

function getCurrentContainerState(): ContainerState | undefined {
  if (process.env.NODE_ENV === "production") {
    return globalThis.__truthfinderBackendContainerState;
  }

  return devContainerState;
}

function setCurrentContainerState(nextState: ContainerState): void {
  if (process.env.NODE_ENV === "production") {
    globalThis.__truthfinderBackendContainerState = nextState;
    return;
  }

  devContainerState = nextState;
}

interface DataAdapterRuntime {
  chatHistory: ChatHistoryRepository;
  dispose?: () => Promise<void>;
}

function createDataAdapter(config: BackendConfig, logger: Logger): DataAdapterRuntime {
  const { databaseUrl, supabase } = config.db;

  if (config.db.adapter === "postgres" && databaseUrl) {
    const pool = getPostgresPool(databaseUrl, logger);

    return {
      chatHistory: new PostgresChatHistoryRepository(pool),
      dispose: () => closePostgresPool(databaseUrl),
    };
  }

  if (config.db.adapter === "supabase" && supabase) {
    return {
      chatHistory: new SupabaseChatHistoryRepository({
        url: supabase.url,
        key: supabase.key,
      }),
    };
  }

  logger.info("Using the in-memory chat history store; turns are lost on restart");
  return {
    chatHistory: new InMemoryChatHistoryRepository(),
  };
}
