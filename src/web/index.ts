// pattern: Functional Core

export type { SearchResult, PageText, CacheEntry, HtmlEvent } from "./types.ts";
export { type SearchClient, type PageFetcher } from "./types.ts";
export { createSearchCache, cacheKey, normaliseQuery, type SearchCache } from "./cache.ts";
export { createDuckDuckGoClient, buildSearchUrl, DEFAULT_SEARCH_RETRY } from "./search.ts";
export { createPageFetcher, DEFAULT_FETCH_RETRY, DEFAULT_MAX_FETCH_BYTES } from "./fetch.ts";
export { createSearchResultParser, parseSearchResults, extractResultUrl } from "./search-parser.ts";
export { createPageTextExtractor, extractPageText, NOISE_TAGS } from "./page-parser.ts";
export { createHtmlEventStream, htmlEvents } from "./html-events.ts";
export { DEFAULT_HEADERS, HttpStatusError, isTransientError } from "./http.ts";
