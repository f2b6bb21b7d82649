// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { buildSearchUrl, createDuckDuckGoClient } from "./search.ts";
import { createSearchCache } from "./cache.ts";
import type { RetryPolicy } from "../retry/index.ts";

const NO_DELAY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, factor: 2 };

const MOCK_DDG_HTML = `
<html><body>
<div id="links">
  <div class="result">
    <a class="result__a" href="https://example.com/page1">Example Page 1</a>
    <a class="result__snippet">This is the first result snippet.</a>
  </div>
  <div class="result">
    <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fpage2">Example Page 2</a>
    <a class="result__snippet">This is the second result snippet.</a>
  </div>
  <div class="result">
    <a class="result__a" href="https://example.com/page3">Example Page 3</a>
    <a class="result__snippet">This is the third result snippet.</a>
  </div>
</div>
</body></html>`;

type Call = { url: string; init: RequestInit | undefined };

function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

describe("DuckDuckGo search client", () => {
  let originalFetch: typeof fetch;
  let calls: Array<Call>;

  function setMockFetch(respond: (call: Call, index: number) => Response | Promise<Response>): void {
    globalThis.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
      const call = { url: input.toString(), init };
      calls.push(call);
      return respond(call, calls.length - 1);
    }) as typeof fetch;
  }

  beforeEach(() => {
    originalFetch = globalThis.fetch;
    calls = [];
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("parses the results page into title, url and snippet", async () => {
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const results = await client.search("test query", 180, 10);

    expect(results).toEqual([
      { url: "https://example.com/page1", title: "Example Page 1", snippet: "This is the first result snippet." },
      { url: "https://example.com/page2", title: "Example Page 2", snippet: "This is the second result snippet." },
      { url: "https://example.com/page3", title: "Example Page 3", snippet: "This is the third result snippet." },
    ]);
  });

  it("sends one GET with the query string and browser-like headers", async () => {
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    await client.search("rust tokio", 180, 10);

    expect(calls).toHaveLength(1);
    expect(calls[0]!.url).toBe("https://html.duckduckgo.com/html/?q=rust+tokio&kl=us-en");
    expect(calls[0]!.init?.method).toBe("GET");
    const headers = calls[0]!.init?.headers as Record<string, string>;
    expect(headers["User-Agent"]).toContain("Mozilla/5.0");
    expect(headers["Accept-Encoding"]).toBe("gzip, deflate");
  });

  it("truncates to maxResults", async () => {
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const results = await client.search("test query", 180, 2);

    expect(results.map((r) => r.title)).toEqual(["Example Page 1", "Example Page 2"]);
  });

  it("serves a wider search from the list cached by a narrower one", async () => {
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const narrow = await client.search("test query", 180, 2);
    const wide = await client.search("test query", 180, 10);

    expect(calls).toHaveLength(1);
    expect(narrow).toHaveLength(2);
    expect(wide.map((r) => r.title)).toEqual(["Example Page 1", "Example Page 2", "Example Page 3"]);
  });

  it("serves a repeated query from the cache until the ttl elapses", async () => {
    let now = 5_000_000;
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({
      cache: createSearchCache({ capacity: 8, now: () => now }),
      retry: NO_DELAY,
    });

    const first = await client.search("Rust tokio", 180, 10);
    const second = await client.search("  rust TOKIO ", 180, 10);

    expect(calls).toHaveLength(1);
    expect(second).toBe(first);

    now += 180_000;
    await client.search("rust tokio", 180, 10);

    expect(calls).toHaveLength(2);
  });

  it("issues one request for concurrent searches of the same query", async () => {
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const [a, b] = await Promise.all([client.search("same", 180, 10), client.search("same", 180, 10)]);

    expect(calls).toHaveLength(1);
    expect(a).toEqual(b);
  });

  it("returns an empty list on a 4xx without retrying", async () => {
    setMockFetch(() => htmlResponse("blocked", 403));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const results = await client.search("test query", 180, 10);

    expect(results).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it("retries 5xx responses up to the attempt bound, then returns an empty list", async () => {
    setMockFetch(() => htmlResponse("unavailable", 503));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const results = await client.search("test query", 180, 10);

    expect(results).toEqual([]);
    expect(calls).toHaveLength(3);
  });

  it("recovers when a retry succeeds after a network error", async () => {
    setMockFetch((_call, index) => {
      if (index === 0) {
        throw new TypeError("fetch failed");
      }
      return htmlResponse(MOCK_DDG_HTML);
    });
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    const results = await client.search("test query", 180, 10);

    expect(calls).toHaveLength(2);
    expect(results).toHaveLength(3);
  });

  it("returns an empty list when the page has no result markup", async () => {
    setMockFetch(() => htmlResponse(`<html><body><div id="links"></div></body></html>`));
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    expect(await client.search("test query", 180, 10)).toEqual([]);
  });

  it("does not reject when fetch throws something unexpected", async () => {
    setMockFetch(() => {
      throw new Error("socket exploded");
    });
    const client = createDuckDuckGoClient({ cache: createSearchCache({ capacity: 8 }), retry: NO_DELAY });

    expect(await client.search("test query", 180, 10)).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it("uses a configured endpoint", async () => {
    setMockFetch(() => htmlResponse(MOCK_DDG_HTML));
    const client = createDuckDuckGoClient({
      cache: createSearchCache({ capacity: 8 }),
      endpoint: "https://search.test/html/",
      retry: NO_DELAY,
    });

    await client.search("abc", 180, 10);

    expect(calls[0]!.url).toBe("https://search.test/html/?q=abc&kl=us-en");
  });
});

describe("buildSearchUrl", () => {
  it("encodes the query", () => {
    expect(buildSearchUrl("https://html.duckduckgo.com/html/", "c++ & rust")).toBe(
      "https://html.duckduckgo.com/html/?q=c%2B%2B+%26+rust&kl=us-en",
    );
  });
});
