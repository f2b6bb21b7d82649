// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.ts";

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = parsed[name];
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

export function applyEnvOverrides(
  parsed: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const envOverrides: Record<string, unknown> = {};

  // Environment variable overrides for secrets; only the configured provider's key applies
  const provider = section(parsed, "model")["provider"];
  const keyVariable = provider === "openai-compat" ? "OPENAI_COMPAT_API_KEY" : "ANTHROPIC_API_KEY";
  const apiKey = env[keyVariable]?.trim();
  const researchModel = env["RESEARCH_MODEL"]?.trim();
  if (apiKey || researchModel) {
    const modelObj = section(parsed, "model");
    if (apiKey) {
      modelObj["api_key"] = apiKey;
    }
    if (researchModel) {
      modelObj["research_name"] = researchModel;
    }
    envOverrides["model"] = modelObj;
  }

  const researchEnv: Array<[string, string]> = [
    ["RESEARCH_RESULTS", "default_sources"],
    ["RESEARCH_SNIPPET_CHARS", "snippet_chars"],
    ["SEARCH_CACHE_TTL", "cache_ttl"],
  ];
  const researchObj = section(parsed, "research");
  let researchTouched = false;
  for (const [name, key] of researchEnv) {
    const raw = env[name]?.trim();
    if (raw) {
      researchObj[key] = raw;
      researchTouched = true;
    }
  }
  if (researchTouched) {
    envOverrides["research"] = researchObj;
  }

  return { ...parsed, ...envOverrides };
}

export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const raw = readFileSync(resolvedPath, "utf-8");
  const parsed = TOML.parse(raw);

  return AppConfigSchema.parse(applyEnvOverrides(parsed));
}
