// pattern: Functional Core

export type {
  TextBlock,
  Message,
  ModelRequest,
  StopReason,
  UsageStats,
  ModelResponse,
  ModelErrorCode,
} from "./types.ts";

export { ModelError, isPermissionDenied, type ModelProvider, type CompletionCapability } from "./types.ts";
export { createAnthropicAdapter } from "./anthropic.ts";
export { createOpenAICompatAdapter } from "./openai-compat.ts";
export { createModelProvider } from "./factory.ts";
export { createCompletionCapability } from "./capability.ts";
