// pattern: Imperative Shell

import OpenAI, { type ClientOptions } from "openai";
import type { ModelConfig } from "../config/schema.ts";
import type {
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
} from "./types.ts";
import { ModelError } from "./types.ts";

export type OpenAICompatAdapterOptions = Pick<ClientOptions, "fetch" | "timeout">;

function normalizeStopReason(finishReason: string | null): StopReason {
  if (finishReason === "length") {
    return "max_tokens";
  }
  if (finishReason === "stop" || finishReason === null) {
    return "end_turn";
  }
  return "stop_sequence";
}

export function normalizeMessage(msg: Message): OpenAI.Chat.ChatCompletionMessageParam {
  return msg.role === "user"
    ? { role: "user", content: msg.content }
    : { role: "assistant", content: msg.content };
}

export function normalizeOpenAIError(error: unknown): unknown {
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", error.message || "authentication failed");
  }
  if (error instanceof OpenAI.PermissionDeniedError) {
    return new ModelError("permission_denied", error.message || "permission denied");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", error.message || "api error");
  }
  return error;
}

export function createOpenAICompatAdapter(
  config: ModelConfig,
  options: OpenAICompatAdapterOptions = {},
): ModelProvider {
  const apiKey = config.api_key || process.env["OPENAI_COMPAT_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "OpenAI-compatible adapter requires api_key in config or OPENAI_COMPAT_API_KEY environment variable"
    );
  }

  // SDK-level retries stay off: one complete() is one request
  const client = new OpenAI({
    apiKey,
    baseURL: config.base_url,
    maxRetries: 0,
    ...options,
  });

  return {
    name: "openai-compat",

    async complete(request: ModelRequest): Promise<ModelResponse> {
      const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];

      if (request.system) {
        messages.push({
          role: "system",
          content: request.system,
        });
      }

      messages.push(...request.messages.map(normalizeMessage));

      let response: OpenAI.Chat.ChatCompletion;
      try {
        response = await client.chat.completions.create({
          model: request.model,
          max_tokens: request.max_tokens,
          temperature: request.temperature,
          messages,
        });
      } catch (error) {
        throw normalizeOpenAIError(error);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", "no choices in response");
      }

      const usage = response.usage ?? { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
      const text = choice.message.content;

      return {
        content: text ? [{ type: "text", text }] : [],
        stop_reason: normalizeStopReason(choice.finish_reason),
        usage: {
          input_tokens: usage.prompt_tokens,
          output_tokens: usage.completion_tokens,
        },
      };
    },
  };
}
