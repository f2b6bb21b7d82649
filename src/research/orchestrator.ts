// pattern: Imperative Shell

import { isPermissionDenied } from "../model/types.ts";
import type { CompletionCapability } from "../model/types.ts";
import type { PageFetcher, PageText, SearchClient, SearchResult } from "../web/types.ts";
import { resolveMode, type ResearchModeName } from "./modes.ts";
import { assembleSources, buildSummarizationMessages, SUMMARIZE_SYSTEM_PROMPT, type FetchOutcome } from "./prompt.ts";
import { truncateText } from "../text/index.ts";
import { DEFAULT_QUERY_RULES, decompose, toSearchQuery, type QueryRules } from "./query.ts";

export const NO_RESULTS_MESSAGE =
  "I couldn't find any search results for that query. Please try rephrasing or try again later.";

export const PERMISSION_DENIED_MESSAGE =
  "I don't have access to that resource (403). Please check permissions / sharing settings.";

export const SUMMARIZE_FAILED_MESSAGE =
  "The AI provider failed to summarise the results. Please try again in a moment.";

export const TRUNCATION_MARKER = "\n\n(response truncated)";

export const DEFAULT_MAX_ANSWER_CHARS = 4000;

export type ResearchOptions = {
  readonly mode?: ResearchModeName | string;
  /** seconds a search result list stays cached */
  readonly cacheTtl: number;
  /** replaces the default mode's source count */
  readonly defaultSources?: number;
  /** replaces the default mode's per-page character budget */
  readonly defaultSnippetChars?: number;
};

export type ResearcherDeps = {
  readonly searchClient: SearchClient;
  readonly pageFetcher: PageFetcher;
  readonly now?: () => Date;
  readonly queryRules?: QueryRules;
  readonly maxAnswerChars?: number;
};

export interface Researcher {
  research(query: string, llm: CompletionCapability, options: ResearchOptions): Promise<string>;
}

/**
 * First occurrence of each URL wins; stops once `limit` unique results are
 * collected.
 */
export function mergeResults(
  resultLists: ReadonlyArray<ReadonlyArray<SearchResult>>,
  limit: number,
): Array<SearchResult> {
  const seen = new Set<string>();
  const merged: Array<SearchResult> = [];

  for (const results of resultLists) {
    for (const result of results) {
      if (merged.length >= limit) {
        return merged;
      }
      if (result.url && !seen.has(result.url)) {
        seen.add(result.url);
        merged.push(result);
      }
    }
  }

  return merged;
}

export function truncateAnswer(answer: string, maxChars: number): string {
  const cut = truncateText(answer, maxChars);
  return cut === answer ? answer : cut + TRUNCATION_MARKER;
}

function toOutcome(settled: PromiseSettledResult<PageText>): FetchOutcome {
  return settled.status === "fulfilled"
    ? { status: "fulfilled", value: settled.value }
    : { status: "rejected", reason: settled.reason };
}

export function createResearcher(deps: ResearcherDeps): Researcher {
  const { searchClient, pageFetcher } = deps;
  const now = deps.now ?? (() => new Date());
  const queryRules = deps.queryRules ?? DEFAULT_QUERY_RULES;
  const maxAnswerChars = deps.maxAnswerChars ?? DEFAULT_MAX_ANSWER_CHARS;

  async function research(
    query: string,
    llm: CompletionCapability,
    options: ResearchOptions,
  ): Promise<string> {
    const mode = resolveMode(options.mode ?? "default", {
      sourceCount: options.defaultSources,
      snippetChars: options.defaultSnippetChars,
    });

    const cleaned = toSearchQuery(query, now(), queryRules) || query.trim();
    const subQueries = decompose(cleaned, queryRules);
    console.log(`[research] mode=${mode.name} sub-queries: ${JSON.stringify(subQueries)}`);

    const resultLists = await Promise.all(
      subQueries.map((subQuery) => searchClient.search(subQuery, options.cacheTtl, mode.sourceCount)),
    );

    const results = mergeResults(resultLists, mode.sourceCount);
    if (results.length === 0) {
      console.warn(`[research] no search results for query: ${query}`);
      return NO_RESULTS_MESSAGE;
    }

    const settled = await Promise.allSettled(
      results.map((result) => pageFetcher.fetchPage(result.url, mode.snippetChars)),
    );
    const outcomes = settled.map(toOutcome);

    outcomes.forEach((outcome, i) => {
      if (outcome.status === "rejected") {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        console.warn(`[research] fetch failed for ${results[i]?.url ?? "unknown url"}: ${reason}`);
      }
    });

    const sources = assembleSources(results, outcomes);
    console.log(`[research] assembled ${sources.length} sources for summarisation`);

    let answer: string;
    try {
      answer = await llm.complete(
        buildSummarizationMessages(query, sources, mode.name),
        SUMMARIZE_SYSTEM_PROMPT,
      );
    } catch (error) {
      if (isPermissionDenied(error)) {
        console.warn("[research] model provider denied access");
        return PERMISSION_DENIED_MESSAGE;
      }
      console.error("[research] summarisation call failed:", error);
      return SUMMARIZE_FAILED_MESSAGE;
    }

    return truncateAnswer(answer, maxAnswerChars);
  }

  return { research };
}
