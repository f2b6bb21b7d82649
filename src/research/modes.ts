// pattern: Functional Core

export type ResearchModeName = "quick" | "default" | "deep";

export type ResearchMode = {
  readonly name: ResearchModeName;
  /** unique URLs to fetch */
  readonly sourceCount: number;
  /** characters extracted per page */
  readonly snippetChars: number;
};

export const RESEARCH_MODES: Readonly<Record<ResearchModeName, ResearchMode>> = {
  quick: { name: "quick", sourceCount: 3, snippetChars: 800 },
  default: { name: "default", sourceCount: 5, snippetChars: 1200 },
  deep: { name: "deep", sourceCount: 8, snippetChars: 1500 },
};

export type ModeOverrides = {
  readonly sourceCount?: number;
  readonly snippetChars?: number;
};

export function isResearchModeName(value: string): value is ResearchModeName {
  return value === "quick" || value === "default" || value === "deep";
}

/**
 * Overrides only apply to the default mode; they carry externally configured
 * defaults. Unknown names fall back to the default preset.
 */
export function resolveMode(name: string, overrides: ModeOverrides = {}): ResearchMode {
  if (!isResearchModeName(name)) {
    return RESEARCH_MODES.default;
  }
  const preset = RESEARCH_MODES[name];
  if (name !== "default") {
    return preset;
  }
  return {
    name,
    sourceCount: overrides.sourceCount ?? preset.sourceCount,
    snippetChars: overrides.snippetChars ?? preset.snippetChars,
  };
}
