// pattern: Imperative Shell

/**
 * Process-wide TTL cache for search results, keyed by a hash of the
 * normalised query. Expired entries are only purged when an insert finds the
 * cache at capacity; there is no background sweep.
 *
 * Lookups and inserts are synchronous, so no two callers interleave inside
 * them. Concurrent loads of the same key share one in-flight promise.
 */

import { createHash } from "node:crypto";
import type { CacheEntry, SearchResult } from "./types.ts";

export type Clock = () => number;

export type SearchCacheOptions = {
  readonly capacity: number;
  readonly now?: Clock;
};

export type SearchCache = {
  get(key: string): ReadonlyArray<SearchResult> | null;
  set(key: string, results: ReadonlyArray<SearchResult>, ttlSeconds: number): void;
  getOrLoad(
    key: string,
    ttlSeconds: number,
    load: () => Promise<ReadonlyArray<SearchResult>>,
  ): Promise<ReadonlyArray<SearchResult>>;
  purgeExpired(): number;
  readonly size: number;
};

export function normaliseQuery(query: string): string {
  return query.trim().toLowerCase();
}

export function cacheKey(query: string): string {
  return createHash("sha256").update(normaliseQuery(query)).digest("hex");
}

export function createSearchCache(options: SearchCacheOptions): SearchCache {
  const capacity = Math.max(1, options.capacity);
  const now = options.now ?? Date.now;
  const entries = new Map<string, CacheEntry>();
  const inFlight = new Map<string, Promise<ReadonlyArray<SearchResult>>>();

  const get = (key: string): ReadonlyArray<SearchResult> | null => {
    const entry = entries.get(key);
    if (entry && now() < entry.expiresAt) {
      return entry.results;
    }
    return null;
  };

  const purgeExpired = (): number => {
    const current = now();
    let removed = 0;
    for (const [key, entry] of entries) {
      if (current >= entry.expiresAt) {
        entries.delete(key);
        removed++;
      }
    }
    return removed;
  };

  const set = (key: string, results: ReadonlyArray<SearchResult>, ttlSeconds: number): void => {
    // replacing an existing key never grows the cache
    if (!entries.has(key) && entries.size >= capacity) {
      purgeExpired();
      while (entries.size >= capacity) {
        const oldest = entries.keys().next();
        if (oldest.done) {
          break;
        }
        entries.delete(oldest.value);
      }
    }
    entries.delete(key);
    entries.set(key, { results, expiresAt: now() + ttlSeconds * 1000 });
  };

  return {
    get,
    set,
    purgeExpired,

    async getOrLoad(key, ttlSeconds, load) {
      const cached = get(key);
      if (cached) {
        return cached;
      }

      const running = inFlight.get(key);
      if (running) {
        return running;
      }

      const task = Promise.resolve()
        .then(load)
        .then((results) => {
          set(key, results, ttlSeconds);
          return results;
        })
        .finally(() => {
          inFlight.delete(key);
        });
      inFlight.set(key, task);
      return task;
    },

    get size(): number {
      return entries.size;
    },
  };
}
