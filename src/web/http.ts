// pattern: Imperative Shell

/**
 * Request headers and response helpers shared by every outbound HTTP call.
 */

import { gunzipSync, constants as zlibConstants } from "node:zlib";

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": "Mozilla/5.0 (X11; Linux x86_64; rv:122.0) Gecko/20100101 Firefox/122.0",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  "Accept-Encoding": "gzip, deflate",
  DNT: "1",
};

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    statusText: string = "",
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "HttpStatusError";
  }

  get permissionDenied(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/**
 * Network failures, timeouts and 5xx responses are worth another attempt.
 * Any other HTTP status is permanent.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status >= 500;
  }
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return true;
    }
    // undici reports connection failures as TypeError("fetch failed")
    if (error instanceof TypeError && error.message.includes("fetch failed")) {
      return true;
    }
    const message = error.message.toLowerCase();
    return message.includes("econnreset") || message.includes("econnrefused") || message.includes("timeout");
  }
  return false;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;

/**
 * Reads at most maxBytes of the body and cancels the rest of the stream.
 */
export async function readLimitedBody(response: Response, maxBytes: number): Promise<Uint8Array> {
  if (!response.body) {
    const buffer = new Uint8Array(await response.arrayBuffer());
    return buffer.subarray(0, maxBytes);
  }

  const reader = response.body.getReader();
  const chunks: Array<Uint8Array> = [];
  let total = 0;

  try {
    while (total < maxBytes) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      const chunk: Uint8Array = value;
      const remaining = maxBytes - total;
      const kept = chunk.byteLength > remaining ? chunk.subarray(0, remaining) : chunk;
      chunks.push(kept);
      total += kept.byteLength;
    }
  } finally {
    if (total >= maxBytes) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }

  const body = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

/**
 * fetch() normally decodes gzip itself; this covers a body that still carries
 * the gzip header. A truncated stream yields whatever inflated cleanly.
 */
export function decodeBody(body: Uint8Array, contentEncoding: string | null): string {
  let bytes = body;
  const declaredGzip = (contentEncoding ?? "").toLowerCase().includes("gzip");
  if (declaredGzip && bytes.length >= 2 && bytes[0] === GZIP_MAGIC_0 && bytes[1] === GZIP_MAGIC_1) {
    bytes = gunzipSync(bytes, { finishFlush: zlibConstants.Z_SYNC_FLUSH });
  }
  return new TextDecoder("utf-8").decode(bytes);
}

export async function readBodyText(response: Response, maxBytes: number): Promise<string> {
  const body = await readLimitedBody(response, maxBytes);
  return decodeBody(body, response.headers.get("content-encoding"));
}
