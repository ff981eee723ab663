import { AnalysisUnavailableError, ValidationError } from "@/backend/application/errors";
import { buildContentSentimentPrompt } from "@/backend/application/prompts";
import { extractSentiment, type ContentSentiment } from "@/backend/domain/analysis";
import type { Logger } from "@/backend/ports/logger";
import {
  ModelConfigurationError,
  ModelRequestError,
  type ModelClient,
} from "@/backend/ports/model-client";

/** Tone of the submitted text itself, as opposed to the social-media reaction to it. */
export class AnalyzeSentimentUseCase {
  constructor(
    private readonly modelClient: ModelClient,
    private readonly logger: Logger,
  ) {}

  async execute(rawText: string): Promise<ContentSentiment> {
    const text = rawText.trim();
    if (text.length === 0) {
      throw new ValidationError("Text must not be empty");
    }

    try {
      const generation = await this.modelClient.generateText({
        messages: [{ role: "user", content: buildContentSentimentPrompt(text) }],
      });

      return { sentiment: extractSentiment(generation.text) };
    } catch (error) {
      if (error instanceof ModelConfigurationError) {
        throw new AnalysisUnavailableError("Sentiment analysis is unavailable: the language model is not configured");
      }

      if (error instanceof ModelRequestError) {
        this.logger.warn("Sentiment analysis failed: model request error", { reason: error.message });
        throw new AnalysisUnavailableError();
      }

      throw error;
    }
  }
}
