// pattern: Imperative Shell

import Anthropic, { type ClientOptions } from "@anthropic-ai/sdk";
import type { ModelConfig } from "../config/schema.ts";
import type {
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  TextBlock,
} from "./types.ts";
import { ModelError } from "./types.ts";

export type AnthropicAdapterOptions = Pick<ClientOptions, "fetch" | "timeout">;

function normalizeStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "max_tokens":
      return "max_tokens";
    case "stop_sequence":
      return "stop_sequence";
    default:
      return "end_turn";
  }
}

function normalizeMessage(msg: Message): Anthropic.Messages.MessageParam {
  return msg.role === "user"
    ? { role: "user", content: msg.content }
    : { role: "assistant", content: msg.content };
}

export function normalizeAnthropicError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", error.message || "authentication failed");
  }
  if (error instanceof Anthropic.PermissionDeniedError) {
    return new ModelError("permission_denied", error.message || "permission denied");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", error.message || "request timed out");
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", error.message || "api error");
  }
  return error;
}

export function createAnthropicAdapter(
  config: ModelConfig,
  options: AnthropicAdapterOptions = {},
): ModelProvider {
  const apiKey = config.api_key || process.env["ANTHROPIC_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "anthropic adapter requires api_key in config or ANTHROPIC_API_KEY environment variable"
    );
  }

  // SDK-level retries stay off: one complete() is one request
  const client = new Anthropic({
    apiKey,
    maxRetries: 0,
    ...options,
  });

  return {
    name: "anthropic",

    async complete(request: ModelRequest): Promise<ModelResponse> {
      let response: Anthropic.Messages.Message;
      try {
        response = await client.messages.create({
          model: request.model,
          max_tokens: request.max_tokens,
          system: request.system,
          temperature: request.temperature,
          messages: request.messages.map(normalizeMessage),
        });
      } catch (error) {
        throw normalizeAnthropicError(error);
      }

      const content: Array<TextBlock> = [];
      for (const block of response.content) {
        if (block.type === "text") {
          content.push({ type: "text", text: block.text });
        }
      }

      return {
        content,
        stop_reason: normalizeStopReason(response.stop_reason),
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    },
  };
}
