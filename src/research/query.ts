// pattern: Functional Core

/**
 * Rule-based query cleanup and decomposition. No model call is involved.
 */

import { truncateText } from "../text/index.ts";

export type QueryRules = {
  /** " and " splitting only applies to queries longer than this. */
  readonly andMinQueryLength: number;
  /** ...and only when both halves are longer than this. */
  readonly andMinPartLength: number;
  readonly maxSearchQueryLength: number;
};

export const DEFAULT_QUERY_RULES: QueryRules = {
  andMinQueryLength: 40,
  andMinPartLength: 10,
  maxSearchQueryLength: 80,
};

const CONVERSATIONAL_PREFIX =
  /^(?:give\s+me|tell\s+me|show\s+me|find\s+me|can\s+you|please\s+|i\s+want\s+to\s+know|what(?:'s|\s+is|\s+are)|\w+\s+me\s+)\s*/i;

const LEADING_FILLER_WORD = /^(?:about|the)\s+/i;

const FILLER_PHRASE =
  /\b(?:a\s+summary\s+of|an?\s+overview\s+of|some\s+info(?:rmation)?\s+(?:about|on)|info(?:rmation)?\s+(?:about|on))\b/gi;

const TEMPORAL_REFERENCES: ReadonlyArray<RegExp> = [
  /\bthis\s+week\b/gi,
  /\bthis\s+month\b/gi,
  /\bthis\s+year\b/gi,
  /\btoday\b/gi,
  /\bright\s+now\b/gi,
];

const MAX_PREFIX_PASSES = 3;

const VERSUS_SEPARATORS = [" vs ", " versus "] as const;
const AND_SEPARATOR = " and ";

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function stripConversationalPrefix(text: string): string {
  let q = text;
  // nested forms such as "can you tell me ..."
  for (let pass = 0; pass < MAX_PREFIX_PASSES; pass++) {
    const cleaned = q.replace(CONVERSATIONAL_PREFIX, "").trim();
    if (cleaned === q) {
      break;
    }
    q = cleaned;
  }
  return q;
}

/**
 * Turns a conversational question into a terse keyword query, e.g.
 * "tell me about Rust tokio" becomes "Rust tokio". Vague time words
 * become the current year so the engine favours recent pages.
 */
export function toSearchQuery(
  text: string,
  now: Date = new Date(),
  rules: QueryRules = DEFAULT_QUERY_RULES,
): string {
  let q = stripConversationalPrefix(text.trim());
  q = q.replace(LEADING_FILLER_WORD, "").trim();
  q = collapse(q.replace(FILLER_PHRASE, ""));
  q = q.replace(LEADING_FILLER_WORD, "").trim();

  const year = String(now.getFullYear());
  for (const pattern of TEMPORAL_REFERENCES) {
    q = q.replace(pattern, year);
  }

  return truncateText(q, rules.maxSearchQueryLength).trim();
}

function dedupe(queries: ReadonlyArray<string>): Array<string> {
  return Array.from(new Set(queries));
}

/**
 * Splits a query into one to three sub-queries. "X vs Y" becomes [X, Y] and
 * wins over " and " splitting, which yields [whole, left, right].
 */
export function decompose(query: string, rules: QueryRules = DEFAULT_QUERY_RULES): Array<string> {
  const q = query.trim();
  const lower = q.toLowerCase();

  for (const separator of VERSUS_SEPARATORS) {
    const index = lower.indexOf(separator);
    if (index !== -1) {
      const left = q.slice(0, index).trim();
      const right = q.slice(index + separator.length).trim();
      if (left && right) {
        return dedupe([left, right]);
      }
    }
  }

  const andIndex = lower.indexOf(AND_SEPARATOR);
  if (andIndex !== -1 && q.length > rules.andMinQueryLength) {
    const left = q.slice(0, andIndex).trim();
    const right = q.slice(andIndex + AND_SEPARATOR.length).trim();
    if (left.length > rules.andMinPartLength && right.length > rules.andMinPartLength) {
      return dedupe([q, left, right]);
    }
  }

  return [q];
}
