import { describe, expect, it } from "vitest";

import { AnalysisUnavailableError } from "@/backend/application/errors";
import { buildContentSentimentPrompt } from "@/backend/application/prompts";
import { AnalyzeSentimentUseCase } from "@/backend/application/use-cases/analyze-sentiment";
import { ModelRequestError } from "@/backend/ports/model-client";
import { ScriptedModelClient, SilentLogger } from "@/backend/testing/fakes";

describe("AnalyzeSentimentUseCase", () => {
  it("classifies the text itself", async () => {
    const model = new ScriptedModelClient(["Negative."]);

    const result = await new AnalyzeSentimentUseCase(model, new SilentLogger()).execute("A shameful decision");

    expect(result).toEqual({ sentiment: "NEGATIVE" });
    expect(model.calls[0].messages).toEqual([
      { role: "user", content: buildContentSentimentPrompt("A shameful decision") },
    ]);
  });

  it("falls back to NEUTRAL on unrecognised output", async () => {
    const useCase = new AnalyzeSentimentUseCase(new ScriptedModelClient(["Hard to say"]), new SilentLogger());

    expect(await useCase.execute("text")).toEqual({ sentiment: "NEUTRAL" });
  });

  it("logs and reports model failures", async () => {
    const logger = new SilentLogger();
    const useCase = new AnalyzeSentimentUseCase(
      new ScriptedModelClient([new ModelRequestError("Gemini returned an empty response")]),
      logger,
    );

    await expect(useCase.execute("text")).rejects.toBeInstanceOf(AnalysisUnavailableError);
    expect(logger.warn).toHaveBeenCalledWith("Sentiment analysis failed: model request error", {
      reason: "Gemini returned an empty response",
    });
  });
});
