// pattern: Imperative Shell

import type { CompletionCapability, Message, ModelProvider } from "./types.ts";

export type CompletionCapabilityOptions = {
  readonly model: string;
  readonly maxTokens: number;
  readonly temperature?: number;
};

/**
 * Narrows a provider to complete(messages, system) -> text. Each call is one
 * provider request; errors pass through unchanged.
 */
export function createCompletionCapability(
  provider: ModelProvider,
  options: CompletionCapabilityOptions,
): CompletionCapability {
  return {
    async complete(messages: ReadonlyArray<Message>, system: string): Promise<string> {
      const response = await provider.complete({
        messages,
        system,
        model: options.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      });

      return response.content
        .map((block) => block.text)
        .join("")
        .trim();
    },
  };
}
