// pattern: Functional Core

/**
 * State machine over HTML events for the DuckDuckGo HTML results page.
 *
 * idle       -> in_title   on an element with class "result__a"
 * idle       -> in_snippet on an element with class "result__snippet"
 * in_*       -> idle       when the matched element's own close tag arrives
 *
 * Depth counts open elements inside the matched one, so nested or stray markup
 * cannot end the title or snippet early. A result is emitted when its snippet
 * closes, when the next title anchor starts, or when the document ends.
 */

import type { HtmlEvent, SearchResult } from "./types.ts";
import { classList, collapseWhitespace, createHtmlEventStream } from "./html-events.ts";

const TITLE_CLASS = "result__a";
const SNIPPET_CLASS = "result__snippet";
const REDIRECT_BASE = "https://duckduckgo.com";

export type SearchParserState =
  | { readonly kind: "idle" }
  | { readonly kind: "in_title"; readonly depth: number }
  | { readonly kind: "in_snippet"; readonly depth: number };

type PendingResult = {
  url: string;
  title: string;
  snippet: string;
};

/**
 * Resolves a result href to an absolute http(s) URL, unwrapping the
 * `/l/?uddg=<encoded>` redirect form. Returns null when that is not possible.
 */
export function extractResultUrl(href: string): string | null {
  if (!href) {
    return null;
  }

  let candidate = href;
  if (href.includes("/l/?") || href.includes("uddg=")) {
    try {
      const parsed = new URL(href, REDIRECT_BASE);
      const uddg = parsed.searchParams.get("uddg");
      if (!uddg) {
        return null;
      }
      candidate = uddg;
    } catch {
      return null;
    }
  }

  try {
    const url = new URL(candidate);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

export type SearchResultParser = {
  feed(chunk: string): void;
  finish(): ReadonlyArray<SearchResult>;
  readonly state: SearchParserState;
};

export function createSearchResultParser(): SearchResultParser {
  const events = createHtmlEventStream();
  const results: Array<SearchResult> = [];
  let state: SearchParserState = { kind: "idle" };
  let pending: PendingResult | null = null;

  const flush = (): void => {
    if (pending?.url) {
      const title = collapseWhitespace(pending.title);
      if (title) {
        results.push({
          url: pending.url,
          title,
          snippet: collapseWhitespace(pending.snippet),
        });
      }
    }
    pending = null;
  };

  const handle = (event: HtmlEvent): void => {
    switch (state.kind) {
      case "idle": {
        if (event.type !== "open") {
          return;
        }
        const classes = classList(event.attributes);
        if (classes.includes(TITLE_CLASS)) {
          // a title-only result still waiting for its snippet is complete now
          flush();
          pending = {
            url: extractResultUrl(event.attributes["href"] ?? "") ?? "",
            title: "",
            snippet: "",
          };
          state = { kind: "in_title", depth: 1 };
        } else if (classes.includes(SNIPPET_CLASS)) {
          if (pending) {
            pending.snippet = "";
          }
          state = { kind: "in_snippet", depth: 1 };
        }
        return;
      }

      case "in_title":
      case "in_snippet": {
        if (event.type === "open") {
          state = { kind: state.kind, depth: state.depth + 1 };
          return;
        }
        if (event.type === "close") {
          const depth = state.depth - 1;
          if (depth > 0) {
            state = { kind: state.kind, depth };
            return;
          }
          if (state.kind === "in_snippet") {
            flush();
          }
          state = { kind: "idle" };
          return;
        }
        if (pending) {
          if (state.kind === "in_title") {
            pending.title += event.text;
          } else {
            pending.snippet += event.text;
          }
        }
        return;
      }
    }
  };

  return {
    feed(chunk: string): void {
      for (const event of events.feed(chunk)) {
        handle(event);
      }
    },
    finish(): ReadonlyArray<SearchResult> {
      for (const event of events.end()) {
        handle(event);
      }
      flush();
      return results;
    },
    get state(): SearchParserState {
      return state;
    },
  };
}

export function parseSearchResults(html: string): ReadonlyArray<SearchResult> {
  const parser = createSearchResultParser();
  parser.feed(html);
  return parser.finish();
}
