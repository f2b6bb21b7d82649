// pattern: Functional Core

import type { ResearchModeName } from "./modes.ts";

export type ResearchCommand = {
  readonly mode: ResearchModeName;
  readonly query: string;
};

const MODE_FLAGS: Readonly<Record<string, ResearchModeName>> = {
  "--quick": "quick",
  "--deep": "deep",
};

/**
 * `--quick` / `--deep` may appear anywhere among the words; the last flag
 * wins. Returns null when no query words remain.
 */
export function parseResearchCommand(args: ReadonlyArray<string> | string): ResearchCommand | null {
  const words = typeof args === "string" ? args.split(/\s+/) : args.flatMap((arg) => arg.split(/\s+/));

  let mode: ResearchModeName = "default";
  const queryWords: Array<string> = [];

  for (const word of words) {
    if (!word) {
      continue;
    }
    const flagMode = MODE_FLAGS[word.toLowerCase()];
    if (flagMode) {
      mode = flagMode;
    } else {
      queryWords.push(word);
    }
  }

  const query = queryWords.join(" ").trim();
  return query ? { mode, query } : null;
}
