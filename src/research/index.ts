// pattern: Functional Core

export { toSearchQuery, decompose, DEFAULT_QUERY_RULES, type QueryRules } from "./query.ts";
export {
  RESEARCH_MODES,
  resolveMode,
  isResearchModeName,
  type ResearchMode,
  type ResearchModeName,
  type ModeOverrides,
} from "./modes.ts";
export {
  assembleSources,
  buildSourcePrompt,
  buildSummarizationMessages,
  domainOf,
  SUMMARIZE_SYSTEM_PROMPT,
  NO_TEXT_PLACEHOLDER,
  FETCH_FAILED_PLACEHOLDER,
  type Source,
  type FetchOutcome,
} from "./prompt.ts";
export {
  createResearcher,
  mergeResults,
  truncateAnswer,
  NO_RESULTS_MESSAGE,
  PERMISSION_DENIED_MESSAGE,
  SUMMARIZE_FAILED_MESSAGE,
  TRUNCATION_MARKER,
  DEFAULT_MAX_ANSWER_CHARS,
  type Researcher,
  type ResearcherDeps,
  type ResearchOptions,
} from "./orchestrator.ts";
export { parseResearchCommand, type ResearchCommand } from "./command.ts";
