import { AnalysisUnavailableError, ValidationError } from "@/backend/application/errors";
import { buildFactCheckPrompt } from "@/backend/application/prompts";
import { extractConfidence, extractVerdict, type FactCheckResult } from "@/backend/domain/analysis";
import type { Logger } from "@/backend/ports/logger";
import {
  ModelConfigurationError,
  ModelRequestError,
  type ModelClient,
} from "@/backend/ports/model-client";

export class FactCheckClaimUseCase {
  constructor(
    private readonly modelClient: ModelClient,
    private readonly logger: Logger,
  ) {}

  async execute(rawClaim: string): Promise<FactCheckResult> {
    const claim = rawClaim.trim();
    if (claim.length === 0) {
      throw new ValidationError("Claim must not be empty");
    }

    let analysis: string;
    try {
      const generation = await this.modelClient.generateText({
        messages: [{ role: "user", content: buildFactCheckPrompt(claim) }],
      });
      analysis = generation.text;
    } catch (error) {
      if (error instanceof ModelConfigurationError) {
        throw new AnalysisUnavailableError("Fact check is unavailable: the language model is not configured");
      }

      if (error instanceof ModelRequestError) {
        this.logger.warn("Fact check failed: model request error", { reason: error.message });
        throw new AnalysisUnavailableError();
      }

      throw error;
    }

    return {
      claim,
      verdict: extractVerdict(analysis),
      confidence: extractConfidence(analysis),
      analysis,
    };
  }
}
