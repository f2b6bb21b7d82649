// pattern: Functional Core

export type { RetryPolicy } from "./retry.ts";
export { backoffDelay, callWithRetry } from "./retry.ts";
