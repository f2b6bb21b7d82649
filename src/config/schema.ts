// pattern: Functional Core
import { z } from "zod";

export const DEFAULT_SEARCH_ENDPOINT = "https://html.duckduckgo.com/html/";

const ModelConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai-compat"]),
  name: z.string(),
  research_name: z.string().optional(),
  api_key: z.string().optional(),
  base_url: z.string().url().optional(),
  max_tokens: z.coerce.number().int().positive().default(4096),
});

const ResearchConfigSchema = z.object({
  default_sources: z.coerce.number().int().min(1).default(5),
  snippet_chars: z.coerce.number().int().min(100).default(1200),
  cache_ttl: z.coerce.number().int().min(0).default(180),
  cache_capacity: z.coerce.number().int().positive().default(256),
  max_answer_chars: z.coerce.number().int().positive().default(4000),
});

const SearchConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_SEARCH_ENDPOINT),
  timeout: z.number().int().positive().default(10000),
  max_retries: z.number().int().positive().default(3),
  base_delay: z.number().int().nonnegative().default(1000),
});

const FetchConfigSchema = z.object({
  timeout: z.number().int().positive().default(10000),
  max_retries: z.number().int().positive().default(2),
  base_delay: z.number().int().nonnegative().default(500),
  max_bytes: z.number().int().positive().default(512 * 1024),
});

const QueryConfigSchema = z.object({
  and_min_query_length: z.number().int().nonnegative().default(40),
  and_min_part_length: z.number().int().nonnegative().default(10),
  max_search_query_length: z.number().int().positive().default(80),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema,
  research: ResearchConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  fetch: FetchConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;

export { AppConfigSchema, ModelConfigSchema, ResearchConfigSchema, SearchConfigSchema, FetchConfigSchema, QueryConfigSchema };
