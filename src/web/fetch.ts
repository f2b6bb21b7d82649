// pattern: Imperative Shell

import type { PageFetcher, PageText } from "./types.ts";
import { createPageTextExtractor } from "./page-parser.ts";
import { collapseWhitespace } from "./html-events.ts";
import { DEFAULT_HEADERS, HttpStatusError, describeError, isTransientError, readBodyText } from "./http.ts";
import { callWithRetry, type RetryPolicy } from "../retry/index.ts";
import { truncateText } from "../text/index.ts";

export type PageFetcherOptions = {
  readonly timeoutMs?: number;
  readonly maxBytes?: number;
  readonly retry?: RetryPolicy;
};

export const DEFAULT_FETCH_RETRY: RetryPolicy = {
  maxAttempts: 2,
  baseDelayMs: 500,
  factor: 2,
};

export const DEFAULT_MAX_FETCH_BYTES = 512 * 1024;

class UnsupportedContentError extends Error {
  constructor(public readonly contentType: string) {
    super(`unsupported content type: ${contentType}`);
    this.name = "UnsupportedContentError";
  }
}

type FetchedBody = {
  readonly body: string;
  readonly html: boolean;
};

function emptyPage(url: string): PageText {
  return { url, title: "", text: "" };
}

export function createPageFetcher(options: PageFetcherOptions = {}): PageFetcher {
  const timeoutMs = options.timeoutMs ?? 10000;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_FETCH_BYTES;
  const retry = options.retry ?? DEFAULT_FETCH_RETRY;

  async function download(url: string): Promise<FetchedBody> {
    return callWithRetry(
      async () => {
        const response = await fetch(url, {
          method: "GET",
          headers: { ...DEFAULT_HEADERS },
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (!response.ok) {
          throw new HttpStatusError(response.status, url, response.statusText);
        }

        const contentType = (response.headers.get("content-type") ?? "").toLowerCase();
        const html = contentType.includes("text/html") || contentType.includes("application/xhtml+xml");
        if (!html && !contentType.includes("text/plain")) {
          throw new UnsupportedContentError(contentType || "not specified");
        }

        return { body: await readBodyText(response, maxBytes), html };
      },
      retry,
      isTransientError,
      (error, attempt) => {
        if (isTransientError(error)) {
          console.warn(`[fetch] ${url} attempt ${attempt + 1}/${retry.maxAttempts} failed: ${describeError(error)}`);
        }
      },
    );
  }

  return {
    async fetchPage(url: string, maxChars: number): Promise<PageText> {
      let fetched: FetchedBody;
      try {
        fetched = await download(url);
      } catch (error) {
        if (error instanceof UnsupportedContentError) {
          console.log(`[fetch] skipping ${url} (${error.contentType})`);
        } else if (error instanceof HttpStatusError && error.permissionDenied) {
          console.warn(`[fetch] ${url} denied access (HTTP ${error.status}), skipping`);
        } else if (error instanceof HttpStatusError && error.status < 500) {
          console.log(`[fetch] HTTP ${error.status} for ${url}, skipping`);
        } else {
          console.warn(`[fetch] giving up on ${url}: ${describeError(error)}`);
        }
        return emptyPage(url);
      }

      if (!fetched.html) {
        return { url, title: "", text: truncateText(collapseWhitespace(fetched.body), maxChars) };
      }

      try {
        const extractor = createPageTextExtractor();
        extractor.feed(fetched.body);
        const page = extractor.finish(maxChars);
        return { url, title: page.title, text: page.text };
      } catch (error) {
        console.warn(`[fetch] could not extract text from ${url}: ${describeError(error)}`);
        return emptyPage(url);
      }
    },
  };
}
