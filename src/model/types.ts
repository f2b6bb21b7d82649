// pattern: Functional Core

/**
 * Shared types for model providers.
 * These types define the port interface that all model adapters normalize to.
 */

export type TextBlock = {
  type: "text";
  text: string;
};

export type Message = {
  role: "user" | "assistant";
  content: string;
};

export type ModelRequest = {
  messages: ReadonlyArray<Message>;
  system?: string;
  model: string;
  max_tokens: number;
  temperature?: number;
};

export type StopReason = "end_turn" | "max_tokens" | "stop_sequence";

export type UsageStats = {
  input_tokens: number;
  output_tokens: number;
};

export type ModelResponse = {
  content: Array<TextBlock>;
  stop_reason: StopReason;
  usage: UsageStats;
};

export type ModelErrorCode = "auth" | "permission_denied" | "rate_limit" | "timeout" | "api_error";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    message: string = ""
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export function isPermissionDenied(error: unknown): boolean {
  return error instanceof ModelError && (error.code === "auth" || error.code === "permission_denied");
}

export interface ModelProvider {
  readonly name: string;
  complete(request: ModelRequest): Promise<ModelResponse>;
}

/**
 * The single operation the research pipeline needs from a language model.
 */
export interface CompletionCapability {
  complete(messages: ReadonlyArray<Message>, system: string): Promise<string>;
}
