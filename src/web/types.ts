// pattern: Functional Core

/**
 * Shared types for the retrieval layer (search and page fetch).
 * Both clients absorb their own failures, so none of these operations reject.
 */

export type SearchResult = {
  readonly url: string;
  readonly title: string;
  readonly snippet: string;
};

export type PageText = {
  readonly url: string;
  readonly title: string;
  readonly text: string;
};

export interface SearchClient {
  /** ttl is in seconds. Resolves to an empty list on any failure. */
  search(query: string, ttl: number, maxResults: number): Promise<ReadonlyArray<SearchResult>>;
}

export interface PageFetcher {
  /** Resolves to a PageText with empty title and text on any failure. */
  fetchPage(url: string, maxChars: number): Promise<PageText>;
}

export type CacheEntry = {
  readonly results: ReadonlyArray<SearchResult>;
  readonly expiresAt: number;
};

export type HtmlEvent =
  | { readonly type: "open"; readonly name: string; readonly attributes: Readonly<Record<string, string>> }
  | { readonly type: "close"; readonly name: string }
  | { readonly type: "text"; readonly text: string };
