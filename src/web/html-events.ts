// pattern: Functional Core

/**
 * Chunk-fed HTML tokenizer: write a chunk, receive the tag and text events it
 * completed. Adjacent text events are merged, including across chunks, so
 * entity and chunk boundaries do not split words. Void and implied elements
 * always get a matching close event.
 */

import { Parser } from "htmlparser2";
import type { HtmlEvent } from "./types.ts";

export type HtmlEventStream = {
  feed(chunk: string): ReadonlyArray<HtmlEvent>;
  end(): ReadonlyArray<HtmlEvent>;
};

export function createHtmlEventStream(): HtmlEventStream {
  let pending: Array<HtmlEvent> = [];

  const push = (event: HtmlEvent): void => {
    const last = pending[pending.length - 1];
    if (event.type === "text" && last?.type === "text") {
      pending[pending.length - 1] = { type: "text", text: last.text + event.text };
      return;
    }
    pending.push(event);
  };

  const parser = new Parser(
    {
      onopentag(name, attributes) {
        push({ type: "open", name, attributes });
      },
      onclosetag(name) {
        push({ type: "close", name });
      },
      ontext(text) {
        push({ type: "text", text });
      },
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true },
  );

  // trailing text is held back: the next chunk may continue it
  const drain = (final: boolean): ReadonlyArray<HtmlEvent> => {
    const events = pending;
    const last = events[events.length - 1];
    if (!final && last?.type === "text") {
      pending = [last];
      return events.slice(0, -1);
    }
    pending = [];
    return events;
  };

  return {
    feed(chunk: string): ReadonlyArray<HtmlEvent> {
      parser.write(chunk);
      return drain(false);
    },
    end(): ReadonlyArray<HtmlEvent> {
      parser.end();
      return drain(true);
    },
  };
}

export function* htmlEvents(html: string): Generator<HtmlEvent> {
  const stream = createHtmlEventStream();
  yield* stream.feed(html);
  yield* stream.end();
}

export function classList(attributes: Readonly<Record<string, string>>): ReadonlyArray<string> {
  return (attributes["class"] ?? "").split(/\s+/).filter((name) => name.length > 0);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
