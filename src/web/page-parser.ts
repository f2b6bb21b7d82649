// pattern: Functional Core

/**
 * Visible-text extractor for arbitrary pages.
 *
 * idle        text is kept
 * suppressed  inside a noise element; depth counts nested noise elements
 * in_title    inside <title>; text goes to the title, not the body
 */

import type { HtmlEvent } from "./types.ts";
import { collapseWhitespace, createHtmlEventStream } from "./html-events.ts";
import { truncateText } from "../text/index.ts";

export const NOISE_TAGS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "noscript",
  "template",
  "nav",
  "header",
  "footer",
  "aside",
  "form",
  "select",
  "button",
  "iframe",
  "svg",
]);

export type PageParserState =
  | { readonly kind: "idle" }
  | { readonly kind: "suppressed"; readonly depth: number }
  | { readonly kind: "in_title" };

export type ExtractedPage = {
  readonly title: string;
  readonly text: string;
};

export type PageTextExtractor = {
  feed(chunk: string): void;
  finish(maxChars: number): ExtractedPage;
  readonly state: PageParserState;
};

export function createPageTextExtractor(): PageTextExtractor {
  const events = createHtmlEventStream();
  const chunks: Array<string> = [];
  let title = "";
  let state: PageParserState = { kind: "idle" };

  const handle = (event: HtmlEvent): void => {
    switch (state.kind) {
      case "idle":
        if (event.type === "open") {
          if (NOISE_TAGS.has(event.name)) {
            state = { kind: "suppressed", depth: 1 };
          } else if (event.name === "title") {
            state = { kind: "in_title" };
          }
        } else if (event.type === "text") {
          const text = collapseWhitespace(event.text);
          if (text) {
            chunks.push(text);
          }
        }
        return;

      case "suppressed":
        if (event.type === "open" && NOISE_TAGS.has(event.name)) {
          state = { kind: "suppressed", depth: state.depth + 1 };
        } else if (event.type === "close" && NOISE_TAGS.has(event.name)) {
          const depth = state.depth - 1;
          state = depth > 0 ? { kind: "suppressed", depth } : { kind: "idle" };
        }
        return;

      case "in_title":
        if (event.type === "text") {
          title += event.text;
        } else if (event.type === "close" && event.name === "title") {
          state = { kind: "idle" };
        }
        return;
    }
  };

  return {
    feed(chunk: string): void {
      for (const event of events.feed(chunk)) {
        handle(event);
      }
    },
    finish(maxChars: number): ExtractedPage {
      for (const event of events.end()) {
        handle(event);
      }
      return {
        title: collapseWhitespace(title),
        text: truncateText(chunks.join(" "), maxChars),
      };
    },
    get state(): PageParserState {
      return state;
    },
  };
}

export function extractPageText(html: string, maxChars: number): ExtractedPage {
  const extractor = createPageTextExtractor();
  extractor.feed(html);
  return extractor.finish(maxChars);
}
