// pattern: Functional Core

/**
 * Source assembly and the single summarization request.
 */

import type { Message } from "../model/types.ts";
import type { PageText, SearchResult } from "../web/types.ts";
import type { ResearchModeName } from "./modes.ts";

export type Source = {
  readonly index: number;
  readonly title: string;
  readonly url: string;
  readonly text: string;
};

export type FetchOutcome =
  | { readonly status: "fulfilled"; readonly value: PageText }
  | { readonly status: "rejected"; readonly reason: unknown };

export const NO_TEXT_PLACEHOLDER = "(no text retrieved)";
export const FETCH_FAILED_PLACEHOLDER = "(text unavailable)";

export const SUMMARIZE_SYSTEM_PROMPT = `You are a research assistant. Synthesise a clear, cited answer from the web sources provided by the user.

Rules:
- Use ONLY the information in the provided sources. Do not add knowledge from your training data.
- If sources are insufficient or contradictory, say so explicitly.
- Cite claims with numbered references like [1], [2].
- End with a 'References' section listing each source as:
  [N] Title — domain — URL
- Keep the answer concise (3–6 short paragraphs) unless the mode is 'deep'.
- Use plain text. Do not use Markdown symbols like **, __, or #.`;

export const ANSWER_DIRECTIVE =
  "Write a concise, cited answer using only the sources above. Follow the rules in the system prompt.";

export function domainOf(url: string): string {
  try {
    return new URL(url).host || url;
  } catch {
    return url;
  }
}

/**
 * One source per search result, in discovery order. Every source ends up with
 * non-empty text: fetched text, else the snippet, else a placeholder.
 */
export function assembleSources(
  results: ReadonlyArray<SearchResult>,
  outcomes: ReadonlyArray<FetchOutcome>,
): Array<Source> {
  return results.map((result, i): Source => {
    const outcome = outcomes[i];
    let title: string;
    let text: string;

    if (!outcome || outcome.status === "rejected") {
      title = result.title;
      text = result.snippet || FETCH_FAILED_PLACEHOLDER;
    } else {
      const pageText = outcome.value.text.trim();
      const pageTitle = outcome.value.title.trim();
      text = pageText || result.snippet;
      title = pageTitle || result.title;
    }

    return {
      index: i + 1,
      title: title || domainOf(result.url),
      url: result.url,
      text: text || NO_TEXT_PLACEHOLDER,
    };
  });
}

export function buildSourcePrompt(query: string, sources: ReadonlyArray<Source>): string {
  const lines = [`Query: ${query}\n`];
  for (const source of sources) {
    lines.push(`[${source.index}] ${source.title}\nURL: ${source.url}\n${source.text}\n`);
  }
  lines.push(`\n${ANSWER_DIRECTIVE}`);
  return lines.join("\n");
}

export function buildSummarizationMessages(
  query: string,
  sources: ReadonlyArray<Source>,
  mode: ResearchModeName,
): Array<Message> {
  const prompt = buildSourcePrompt(query, sources);
  return [
    {
      role: "user",
      content: mode === "deep" ? `${prompt}\nMode: deep` : prompt,
    },
  ];
}
