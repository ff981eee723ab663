import { AnalysisUnavailableError, ValidationError } from "@/backend/application/errors";
import {
  buildAnalysisPrompt,
  buildAnalysisSystemPrompt,
  toModelHistory,
} from "@/backend/application/prompts";
import type { AppendChatTurnUseCase } from "@/backend/application/use-cases/append-chat-turn";
import type { GetChatHistoryUseCase } from "@/backend/application/use-cases/get-chat-history";
import {
  extractConfidence,
  extractVerdict,
  resolveAnalysisLanguage,
  type AnalysisResult,
} from "@/backend/domain/analysis";
import type { Logger } from "@/backend/ports/logger";
import {
  ModelConfigurationError,
  ModelRequestError,
  type ModelClient,
} from "@/backend/ports/model-client";

export const AGENT_VERSION = "2.0";

export interface AnalyzeContentInput {
  content: string;
  language?: string | null;
  userId?: string | null;
}

export interface AnalyzeContentOptions {
  historyContextLimit: number;
  now?: () => Date;
  createId?: () => string;
}

/**
 * Single-request fact check. The user turn is stored before the model is called
 * so it survives a failed analysis.
 */
export class AnalyzeContentUseCase {
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(
    private readonly appendChatTurn: AppendChatTurnUseCase,
    private readonly getChatHistory: GetChatHistoryUseCase,
    private readonly modelClient: ModelClient,
    private readonly logger: Logger,
    private readonly options: AnalyzeContentOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => crypto.randomUUID());
  }

  async execute(input: AnalyzeContentInput): Promise<AnalysisResult> {
    const content = input.content.trim();
    if (content.length === 0) {
      throw new ValidationError("Content must not be empty");
    }

    const language = resolveAnalysisLanguage(input.language);
    const sessionId = input.userId?.trim() || this.createId();

    const priorHistory = await this.getChatHistory.execute(sessionId, {
      limit: this.options.historyContextLimit,
    });

    await this.appendChatTurn.execute({
      userId: sessionId,
      role: "user",
      content,
    });

    let details: string;
    try {
      const generation = await this.modelClient.generateText({
        messages: [
          { role: "system", content: buildAnalysisSystemPrompt(language) },
          ...toModelHistory(priorHistory),
          { role: "user", content: buildAnalysisPrompt(content, language) },
        ],
      });

      details = generation.text;
    } catch (error) {
      if (error instanceof ModelConfigurationError) {
        this.logger.warn("Analysis skipped: model is not configured", { sessionId, reason: error.message });
        throw new AnalysisUnavailableError("Analysis is unavailable: the language model is not configured");
      }

      if (error instanceof ModelRequestError) {
        this.logger.warn("Analysis failed: model request error", { sessionId, reason: error.message });
        throw new AnalysisUnavailableError();
      }

      throw error;
    }

    await this.appendChatTurn.execute({
      userId: sessionId,
      role: "assistant",
      content: details,
    });

    const result: AnalysisResult = {
      verdict: extractVerdict(details),
      confidence: extractConfidence(details),
      details,
      language,
      timestamp: this.now().toISOString(),
      agentVersion: AGENT_VERSION,
      sessionId,
    };

    this.logger.debug("Analysis completed", {
      sessionId,
      verdict: result.verdict,
      confidence: result.confidence,
    });

    return result;
  }
}
