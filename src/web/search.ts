// pattern: Imperative Shell

import type { SearchClient, SearchResult } from "./types.ts";
import type { SearchCache } from "./cache.ts";
import { cacheKey } from "./cache.ts";
import { createSearchResultParser } from "./search-parser.ts";
import { DEFAULT_HEADERS, HttpStatusError, describeError, isTransientError, readBodyText } from "./http.ts";
import { callWithRetry, type RetryPolicy } from "../retry/index.ts";
import { DEFAULT_SEARCH_ENDPOINT } from "../config/schema.ts";

const MAX_RESPONSE_BYTES = 2 * 1024 * 1024;

export type SearchClientOptions = {
  readonly cache: SearchCache;
  readonly endpoint?: string;
  readonly timeoutMs?: number;
  readonly retry?: RetryPolicy;
};

export const DEFAULT_SEARCH_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  factor: 2,
};

function capResults(results: ReadonlyArray<SearchResult>, maxResults: number): ReadonlyArray<SearchResult> {
  return results.length > maxResults ? results.slice(0, maxResults) : results;
}

export function buildSearchUrl(endpoint: string, query: string): string {
  const url = new URL(endpoint);
  url.searchParams.set("q", query);
  url.searchParams.set("kl", "us-en");
  return url.toString();
}

export function createDuckDuckGoClient(options: SearchClientOptions): SearchClient {
  const endpoint = options.endpoint ?? DEFAULT_SEARCH_ENDPOINT;
  const timeoutMs = options.timeoutMs ?? 10000;
  const retry = options.retry ?? DEFAULT_SEARCH_RETRY;

  async function requestResults(query: string): Promise<ReadonlyArray<SearchResult>> {
    const url = buildSearchUrl(endpoint, query);

    const html = await callWithRetry(
      async () => {
        const response = await fetch(url, {
          method: "GET",
          headers: { ...DEFAULT_HEADERS },
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (!response.ok) {
          throw new HttpStatusError(response.status, url, response.statusText);
        }

        return readBodyText(response, MAX_RESPONSE_BYTES);
      },
      retry,
      isTransientError,
      (error, attempt) => {
        if (isTransientError(error)) {
          console.warn(`[search] attempt ${attempt + 1}/${retry.maxAttempts} failed: ${describeError(error)}`);
        }
      },
    );

    const parser = createSearchResultParser();
    parser.feed(html);
    const results = parser.finish();

    if (results.length === 0) {
      console.warn(`[search] 0 parsed results for "${query}" (results page markup may have changed)`);
    }
    return results;
  }

  async function searchUncached(query: string): Promise<ReadonlyArray<SearchResult>> {
    try {
      return await requestResults(query);
    } catch (error) {
      if (error instanceof HttpStatusError && error.status < 500) {
        console.error(`[search] HTTP ${error.status} for "${query}", not retrying`);
      } else {
        console.error(`[search] giving up on "${query}": ${describeError(error)}`);
      }
      return [];
    }
  }

  return {
    async search(query: string, ttl: number, maxResults: number): Promise<ReadonlyArray<SearchResult>> {
      const key = cacheKey(query);
      const cached = options.cache.get(key);
      if (cached) {
        return capResults(cached, maxResults);
      }

      // the full parsed list is cached so a later, wider search can reuse it
      const results = await options.cache.getOrLoad(key, ttl, () => searchUncached(query));
      return capResults(results, maxResults);
    },
  };
}
