// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  createResearcher,
  mergeResults,
  truncateAnswer,
  NO_RESULTS_MESSAGE,
  PERMISSION_DENIED_MESSAGE,
  SUMMARIZE_FAILED_MESSAGE,
  TRUNCATION_MARKER,
} from "./orchestrator.ts";
import { SUMMARIZE_SYSTEM_PROMPT } from "./prompt.ts";
import { ModelError } from "../model/types.ts";
import type { CompletionCapability, Message } from "../model/types.ts";
import type { PageFetcher, PageText, SearchClient, SearchResult } from "../web/types.ts";

const NOW = (): Date => new Date(2026, 2, 1);

function result(n: number, host = `site${n}.example`): SearchResult {
  return { url: `https://${host}/${n}`, title: `Title ${n}`, snippet: `snippet ${n}` };
}

type SearchCall = { query: string; ttl: number; maxResults: number };

function fakeSearch(byQuery: Record<string, ReadonlyArray<SearchResult>>): SearchClient & { calls: Array<SearchCall> } {
  const calls: Array<SearchCall> = [];
  return {
    calls,
    async search(query: string, ttl: number, maxResults: number) {
      calls.push({ query, ttl, maxResults });
      return (byQuery[query] ?? []).slice(0, maxResults);
    },
  };
}

type FetchCall = { url: string; maxChars: number };

function fakeFetcher(failing: ReadonlySet<string> = new Set()): PageFetcher & { calls: Array<FetchCall> } {
  const calls: Array<FetchCall> = [];
  return {
    calls,
    async fetchPage(url: string, maxChars: number): Promise<PageText> {
      calls.push({ url, maxChars });
      if (failing.has(url)) {
        throw new Error("connection reset");
      }
      return { url, title: `Page at ${url}`, text: `text of ${url}` };
    },
  };
}

type LlmCall = { messages: ReadonlyArray<Message>; system: string };

function fakeLlm(respond: () => string): CompletionCapability & { calls: Array<LlmCall> } {
  const calls: Array<LlmCall> = [];
  return {
    calls,
    async complete(messages: ReadonlyArray<Message>, system: string) {
      calls.push({ messages, system });
      return respond();
    },
  };
}

describe("createResearcher", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("searches each sub-query, dedupes URLs and makes one model call", async () => {
    const shared = result(9, "shared.example");
    const searchClient = fakeSearch({
      React: [result(1), shared],
      Vue: [shared, result(4)],
    });
    const pageFetcher = fakeFetcher();
    const llm = fakeLlm(() => "React and Vue differ [1][2].");
    const researcher = createResearcher({ searchClient, pageFetcher, now: NOW });

    const answer = await researcher.research("React vs Vue", llm, { cacheTtl: 180 });

    expect(answer).toBe("React and Vue differ [1][2].");
    expect(searchClient.calls).toEqual([
      { query: "React", ttl: 180, maxResults: 5 },
      { query: "Vue", ttl: 180, maxResults: 5 },
    ]);
    expect(pageFetcher.calls).toEqual([
      { url: "https://site1.example/1", maxChars: 1200 },
      { url: "https://shared.example/9", maxChars: 1200 },
      { url: "https://site4.example/4", maxChars: 1200 },
    ]);
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0]?.system).toBe(SUMMARIZE_SYSTEM_PROMPT);
    expect(llm.calls[0]?.messages).toHaveLength(1);
    expect(llm.calls[0]?.messages[0]?.content.startsWith("Query: React vs Vue\n")).toBe(true);
  });

  it("caps the merged results at the mode's source count", async () => {
    const searchClient = fakeSearch({
      "solar panels": [result(1), result(2), result(3), result(4), result(5)],
    });
    const pageFetcher = fakeFetcher();
    const researcher = createResearcher({ searchClient, pageFetcher, now: NOW });

    await researcher.research("solar panels", fakeLlm(() => "ok"), { mode: "quick", cacheTtl: 60 });

    expect(searchClient.calls).toEqual([{ query: "solar panels", ttl: 60, maxResults: 3 }]);
    expect(pageFetcher.calls.map((call) => call.url)).toEqual([
      "https://site1.example/1",
      "https://site2.example/2",
      "https://site3.example/3",
    ]);
    expect(pageFetcher.calls.every((call) => call.maxChars === 800)).toBe(true);
  });

  it("threads configured defaults into the default mode", async () => {
    const searchClient = fakeSearch({ tides: [result(1), result(2), result(3)] });
    const pageFetcher = fakeFetcher();
    const researcher = createResearcher({ searchClient, pageFetcher, now: NOW });

    await researcher.research("tides", fakeLlm(() => "ok"), {
      cacheTtl: 30,
      defaultSources: 2,
      defaultSnippetChars: 300,
    });

    expect(searchClient.calls).toEqual([{ query: "tides", ttl: 30, maxResults: 2 }]);
    expect(pageFetcher.calls).toEqual([
      { url: "https://site1.example/1", maxChars: 300 },
      { url: "https://site2.example/2", maxChars: 300 },
    ]);
  });

  it("returns the no-results message without fetching or calling the model", async () => {
    const pageFetcher = fakeFetcher();
    const llm = fakeLlm(() => "unused");
    const researcher = createResearcher({ searchClient: fakeSearch({}), pageFetcher, now: NOW });

    const answer = await researcher.research("nothing here", llm, { cacheTtl: 180 });

    expect(answer).toBe(NO_RESULTS_MESSAGE);
    expect(pageFetcher.calls).toEqual([]);
    expect(llm.calls).toEqual([]);
  });

  it("falls back to the search snippet when a fetch fails", async () => {
    const searchClient = fakeSearch({ glaciers: [result(1), result(2)] });
    const pageFetcher = fakeFetcher(new Set(["https://site1.example/1"]));
    const llm = fakeLlm(() => "ok");
    const researcher = createResearcher({ searchClient, pageFetcher, now: NOW });

    await researcher.research("glaciers", llm, { cacheTtl: 180 });

    const content = llm.calls[0]?.messages[0]?.content ?? "";
    expect(content).toContain("[1] Title 1\nURL: https://site1.example/1\nsnippet 1\n");
    expect(content).toContain(
      "[2] Page at https://site2.example/2\nURL: https://site2.example/2\ntext of https://site2.example/2\n"
    );
  });

  it("marks deep mode in the prompt", async () => {
    const llm = fakeLlm(() => "ok");
    const researcher = createResearcher({
      searchClient: fakeSearch({ volcanoes: [result(1)] }),
      pageFetcher: fakeFetcher(),
      now: NOW,
    });

    await researcher.research("volcanoes", llm, { mode: "deep", cacheTtl: 180 });

    expect(llm.calls[0]?.messages[0]?.content.endsWith("\nMode: deep")).toBe(true);
  });

  it("maps a permission-denied model error to its fixed message", async () => {
    for (const code of ["permission_denied", "auth"] as const) {
      const llm: CompletionCapability & { count: number } = {
        count: 0,
        async complete() {
          this.count++;
          throw new ModelError(code, "denied");
        },
      };
      const researcher = createResearcher({
        searchClient: fakeSearch({ coral: [result(1)] }),
        pageFetcher: fakeFetcher(),
        now: NOW,
      });

      const answer = await researcher.research("coral", llm, { cacheTtl: 180 });

      expect(answer).toBe(PERMISSION_DENIED_MESSAGE);
      expect(llm.count).toBe(1);
    }
  });

  it("maps any other model error to the failure message without retrying", async () => {
    let count = 0;
    const llm: CompletionCapability = {
      async complete() {
        count++;
        throw new ModelError("rate_limit", "slow down");
      },
    };
    const researcher = createResearcher({
      searchClient: fakeSearch({ coral: [result(1)] }),
      pageFetcher: fakeFetcher(),
      now: NOW,
    });

    const answer = await researcher.research("coral", llm, { cacheTtl: 180 });

    expect(answer).toBe(SUMMARIZE_FAILED_MESSAGE);
    expect(count).toBe(1);
  });

  it("truncates an oversized answer", async () => {
    const researcher = createResearcher({
      searchClient: fakeSearch({ coral: [result(1)] }),
      pageFetcher: fakeFetcher(),
      now: NOW,
      maxAnswerChars: 10,
    });

    const answer = await researcher.research("coral", fakeLlm(() => "x".repeat(11)), { cacheTtl: 180 });

    expect(answer).toBe("x".repeat(10) + TRUNCATION_MARKER);
  });
});

describe("mergeResults", () => {
  it("keeps the first occurrence of each URL in discovery order", () => {
    const merged = mergeResults([[result(1), result(2)], [result(2), result(3)]], 10);
    expect(merged.map((r) => r.url)).toEqual([
      "https://site1.example/1",
      "https://site2.example/2",
      "https://site3.example/3",
    ]);
  });

  it("stops at the limit across lists", () => {
    const merged = mergeResults([[result(1)], [result(2), result(3)]], 2);
    expect(merged.map((r) => r.url)).toEqual(["https://site1.example/1", "https://site2.example/2"]);
  });

  it("skips results without a URL", () => {
    const merged = mergeResults([[{ url: "", title: "t", snippet: "s" }, result(1)]], 5);
    expect(merged).toEqual([result(1)]);
  });
});

describe("truncateAnswer", () => {
  it("leaves an answer at the limit untouched", () => {
    expect(truncateAnswer("abcd", 4)).toBe("abcd");
  });

  it("cuts and marks a longer answer", () => {
    expect(truncateAnswer("abcde", 4)).toBe(`abcd${TRUNCATION_MARKER}`);
  });

  it("counts an emoji as one character", () => {
    expect(truncateAnswer("a".repeat(9) + "😀", 10)).toBe("a".repeat(9) + "😀");
    expect(truncateAnswer("a".repeat(9) + "😀b", 10)).toBe("a".repeat(9) + "😀" + TRUNCATION_MARKER);
  });
});
