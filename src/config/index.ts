// pattern: Functional Core

export type {
  AppConfig,
  ModelConfig,
  ResearchConfig,
  SearchConfig,
  FetchConfig,
  QueryConfig,
} from "./schema.ts";
export { AppConfigSchema, DEFAULT_SEARCH_ENDPOINT } from "./schema.ts";
export { loadConfig, applyEnvOverrides } from "./config.ts";
