// pattern: Imperative Shell

/**
 * Command-line entry point.
 * Composition root that wires configuration, the model provider and the
 * retrieval clients, then answers one query or runs an interactive loop.
 */

import * as readline from 'node:readline';
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { loadConfig } from '@/config/config';
import { createModelProvider } from '@/model/factory';
import { createCompletionCapability } from '@/model/capability';
import { createSearchCache } from '@/web/cache';
import { createDuckDuckGoClient } from '@/web/search';
import { createPageFetcher } from '@/web/fetch';
import { createResearcher } from '@/research/orchestrator';
import { parseResearchCommand } from '@/research/command';
import type { AppConfig, ResearchConfig } from '@/config/schema';
import type { CompletionCapability, ModelProvider } from '@/model/types';
import type { Researcher } from '@/research/orchestrator';

export const USAGE = 'usage: <query> [--quick | --deep]   (type "exit" to quit)';

export type CliArgs = {
  readonly configPath: string | undefined;
  readonly words: ReadonlyArray<string>;
};

export type ResearchPipeline = {
  readonly researcher: Researcher;
  readonly llm: CompletionCapability;
};

type InteractionDeps = ResearchPipeline & {
  readonly research: ResearchConfig;
};

/**
 * Mode flags are handed back as words so the same command parser serves the
 * command line and the interactive loop.
 */
export function parseCliArgs(argv: ReadonlyArray<string>): CliArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string', short: 'c' },
      quick: { type: 'boolean', default: false },
      deep: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const flags: Array<string> = [];
  if (values.quick) flags.push('--quick');
  if (values.deep) flags.push('--deep');

  return {
    configPath: values.config,
    words: [...flags, ...positionals],
  };
}

/**
 * One cache is shared by every research invocation in the process.
 */
export function createResearchPipeline(
  config: AppConfig,
  provider: ModelProvider = createModelProvider(config.model),
): ResearchPipeline {
  const cache = createSearchCache({ capacity: config.research.cache_capacity });

  const searchClient = createDuckDuckGoClient({
    cache,
    endpoint: config.search.endpoint,
    timeoutMs: config.search.timeout,
    retry: { maxAttempts: config.search.max_retries, baseDelayMs: config.search.base_delay, factor: 2 },
  });

  const pageFetcher = createPageFetcher({
    timeoutMs: config.fetch.timeout,
    maxBytes: config.fetch.max_bytes,
    retry: { maxAttempts: config.fetch.max_retries, baseDelayMs: config.fetch.base_delay, factor: 2 },
  });

  const researcher = createResearcher({
    searchClient,
    pageFetcher,
    maxAnswerChars: config.research.max_answer_chars,
    queryRules: {
      andMinQueryLength: config.query.and_min_query_length,
      andMinPartLength: config.query.and_min_part_length,
      maxSearchQueryLength: config.query.max_search_query_length,
    },
  });

  const llm = createCompletionCapability(provider, {
    model: config.model.research_name ?? config.model.name,
    maxTokens: config.model.max_tokens,
  });

  return { researcher, llm };
}

/**
 * Turns one line of user input into an answer, or the usage text when the
 * line holds no query.
 */
export function createInteractionHandler(deps: InteractionDeps): (input: string) => Promise<string> {
  return async (input: string): Promise<string> => {
    const command = parseResearchCommand(input);
    if (!command) {
      return USAGE;
    }

    return deps.researcher.research(command.query, deps.llm, {
      mode: command.mode,
      cacheTtl: deps.research.cache_ttl,
      defaultSources: deps.research.default_sources,
      defaultSnippetChars: deps.research.snippet_chars,
    });
  };
}

export function isExitCommand(line: string): boolean {
  const word = line.trim().toLowerCase();
  return word === 'exit' || word === 'quit';
}

async function runInteractive(handler: (input: string) => Promise<string>): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  process.on('SIGINT', () => {
    console.log('\nShutting down...');
    rl.close();
  });

  console.log(`${USAGE}\n`);
  rl.setPrompt('> ');
  rl.prompt();

  for await (const line of rl) {
    const trimmed = line.trim();
    if (isExitCommand(trimmed)) {
      break;
    }
    if (trimmed) {
      try {
        const answer = await handler(trimmed);
        process.stdout.write(`\n${answer}\n\n`);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        console.error(`error: ${errorMsg}`);
      }
    }
    rl.prompt();
  }

  rl.close();
}

export async function main(argv: ReadonlyArray<string> = process.argv.slice(2)): Promise<void> {
  const args = parseCliArgs(argv);
  const config = loadConfig(args.configPath);

  const modelName = config.model.research_name ?? config.model.name;
  console.log(`research model: ${config.model.provider}/${modelName}`);

  const pipeline = createResearchPipeline(config);
  const handler = createInteractionHandler({ ...pipeline, research: config.research });

  if (args.words.length > 0) {
    const answer = await handler(args.words.join(' '));
    process.stdout.write(`${answer}\n`);
    return;
  }

  await runInteractive(handler);
}

// Run main entry point only when file is executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
