import { ApplicationError, ValidationError } from "@/backend/application/errors";
import type {
  AnalyzeContentInput,
  AnalyzeContentUseCase,
} from "@/backend/application/use-cases/analyze-content";
import type { AnalyzeSentimentUseCase } from "@/backend/application/use-cases/analyze-sentiment";
import type { FactCheckClaimUseCase } from "@/backend/application/use-cases/fact-check-claim";
import type { GaugePublicSentimentUseCase } from "@/backend/application/use-cases/gauge-public-sentiment";
import {
  resolveAnalysisLanguage,
  type AnalysisLanguage,
  type AnalysisResult,
  type ContentSentiment,
  type FactCheckResult,
  type PublicSentiment,
} from "@/backend/domain/analysis";
import type { Logger } from "@/backend/ports/logger";

export interface AgentFailure {
  error: string;
}

export type AgentOutcome<T> = T | AgentFailure;

export interface MultiAgentAnalysis {
  timestamp: string;
  content: string;
  language: AnalysisLanguage;
  newsAnalysis: AnalysisResult;
  factChecking: AgentOutcome<FactCheckResult>;
  sentimentAnalysis: AgentOutcome<ContentSentiment>;
  publicSentiment: PublicSentiment | null;
}

export interface AnalyzeWithAgentsDependencies {
  analyzeContent: AnalyzeContentUseCase;
  factCheckClaim: FactCheckClaimUseCase;
  analyzeSentiment: AnalyzeSentimentUseCase;
  gaugePublicSentiment: GaugePublicSentimentUseCase;
}

/**
 * Runs every agent concurrently. The news analysis decides the outcome of the request;
 * the fact check and sentiment agents report their own failure in place.
 */
export class AnalyzeWithAgentsUseCase {
  constructor(
    private readonly agents: AnalyzeWithAgentsDependencies,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async execute(input: AnalyzeContentInput): Promise<MultiAgentAnalysis> {
    const content = input.content.trim();
    if (content.length === 0) {
      throw new ValidationError("Content must not be empty");
    }

    const timestamp = this.now().toISOString();
    const [newsAnalysis, factChecking, sentimentAnalysis, publicSentiment] = await Promise.all([
      this.agents.analyzeContent.execute({ ...input, content }),
      this.settle("fact_checking", () => this.agents.factCheckClaim.execute(content)),
      this.settle("sentiment_analysis", () => this.agents.analyzeSentiment.execute(content)),
      this.agents.gaugePublicSentiment.execute(content),
    ]);

    return {
      timestamp,
      content,
      language: resolveAnalysisLanguage(input.language),
      newsAnalysis,
      factChecking,
      sentimentAnalysis,
      publicSentiment,
    };
  }

  private async settle<T>(agent: string, run: () => Promise<T>): Promise<AgentOutcome<T>> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof ApplicationError) {
        this.logger.warn("Agent failed", { agent, reason: error.message });
        return { error: error.message };
      }

      throw error;
    }
  }
}
