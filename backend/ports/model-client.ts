export type ModelMessageRole = "system" | "user" | "assistant";

export interface ModelChatMessage {
  role: ModelMessageRole;
  content: string;
}

export interface GenerateTextInput {
  model?: string;
  messages: ModelChatMessage[];
}

export interface GenerateTextResult {
  text: string;
  model: string;
}

export interface ModelClient {
  generateText(input: GenerateTextInput): Promise<GenerateTextResult>;
  isConfigured(): boolean;
}

export class ModelConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelConfigurationError";
  }
}

export class ModelRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelRequestError";
  }
}
