import { z } from "zod";

import {
  ModelConfigurationError,
  ModelRequestError,
  type GenerateTextInput,
  type GenerateTextResult,
  type ModelChatMessage,
  type ModelClient,
} from "@/backend/ports/model-client";

const REQUEST_TIMEOUT_MS = 45_000;
const GEMINI_API_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/models";

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
      }),
    )
    .optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
  error: z
    .object({
      message: z.string().optional(),
    })
    .optional(),
});

type GeminiResponse = z.infer<typeof geminiResponseSchema>;

export interface GeminiModelClientOptions {
  apiKey?: string;
  defaultModel: string;
  fetch?: typeof fetch;
}

export class GeminiModelClient implements ModelClient {
  private readonly apiKey: string | undefined;
  private readonly defaultModel: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GeminiModelClientOptions) {
    this.apiKey = options.apiKey?.trim() || undefined;
    this.defaultModel = options.defaultModel;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generateText(input: GenerateTextInput): Promise<GenerateTextResult> {
    const messages = normalizeMessages(input.messages);
    if (messages.length === 0) {
      throw new ModelConfigurationError("At least one chat message is required");
    }

    if (!this.apiKey) {
      throw new ModelConfigurationError("Gemini API key is not configured");
    }

    const model = input.model?.trim() || this.defaultModel;
    const text = await this.requestGeminiResponse(this.apiKey, model, messages);

    return {
      text,
      model,
    };
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  private async requestGeminiResponse(
    apiKey: string,
    model: string,
    messages: ModelChatMessage[],
  ): Promise<string> {
    const systemText = messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .join("\n\n");

    const conversationMessages = messages
      .filter((message) => message.role !== "system")
      .map((message) => ({
        role: message.role === "assistant" ? "model" : "user",
        parts: [{ text: message.content }],
      }));

    if (conversationMessages.length === 0) {
      throw new ModelConfigurationError("At least one user or assistant message is required");
    }

    let response: Response;
    try {
      response = await this.fetchImpl(
        `${GEMINI_API_BASE_URL}/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`,
        {
          method: "POST",
          headers: {
            "content-type": "application/json",
          },
          body: JSON.stringify({
            ...(systemText
              ? {
                  systemInstruction: {
                    parts: [{ text: systemText }],
                  },
                }
              : {}),
            contents: conversationMessages,
          }),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        },
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new ModelRequestError(`Gemini request failed: ${reason}`);
    }

    const payload = await parseGeminiResponse(response);
    if (!response.ok) {
      const fallbackMessage = `Gemini request failed (${response.status})`;
      throw new ModelRequestError(payload?.error?.message ?? fallbackMessage);
    }

    const text = payload?.candidates?.[0]?.content?.parts
      ?.map((part) => part.text?.trim() ?? "")
      .filter((value) => value.length > 0)
      .join("\n\n");

    if (!text) {
      const blockReason = payload?.promptFeedback?.blockReason;
      throw new ModelRequestError(
        blockReason ? `Gemini blocked the prompt (${blockReason})` : "Gemini returned an empty response",
      );
    }

    return text;
  }
}

function normalizeMessages(messages: ModelChatMessage[]): ModelChatMessage[] {
  return messages
    .map((message) => ({
      ...message,
      content: message.content.trim(),
    }))
    .filter((message) => message.content.length > 0);
}

async function parseGeminiResponse(response: Response): Promise<GeminiResponse | null> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    return null;
  }

  const parsed = geminiResponseSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}
