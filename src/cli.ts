/**
 * Command-line interface
 *
 *   trial-watch --config <file> --db <file> sync [--topics a,b] [--max-pages n]
 *   trial-watch --config <file> --db <file> digest --out <file> [--days n]
 *   trial-watch --config <file> --db <file> literature [--max-trials n]
 *
 * Exit codes: 0 success, 1 runtime or configuration error, 2 usage error.
 *
 * @module cli
 */

import { parseArgs } from 'util';
import { ENV, loadConfig } from './config/index.js';
import { generateDigest, linkLiterature, syncRegistry } from './services/pipeline/index.js';
import { ValidationError, parsePositiveInt } from './utils/validation.js';

export const USAGE = `Usage: trial-watch --config <file> --db <file> <command> [options]

Commands:
  sync        Pull trials from the registry, score and store them
                --topics a,b      only these configured topics
                --max-pages n     page cap per topic
  digest      Write a markdown digest (and CSV) of actionable trials
                --out <file>      markdown output path (required)
                --days n          readout window override
  literature  Link stored trials to literature citations
                --max-trials n    trials to check this run

Environment: ${ENV.CONFIG}, ${ENV.DB}, ${ENV.LITERATURE_EMAIL}, ${ENV.LITERATURE_API_KEY}`;

export const COMMANDS = ['sync', 'digest', 'literature'] as const;
export type Command = (typeof COMMANDS)[number];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliInvocation {
  command: Command;
  configPath: string;
  dbPath: string;
  topics?: string[];
  maxPages?: number;
  out?: string;
  days?: number;
  maxTrials?: number;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function optionalInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  try {
    return parsePositiveInt(name, value);
  } catch (error) {
    if (error instanceof ValidationError) throw new UsageError(error.message);
    throw error;
  }
}

const OPTIONS = {
  config: { type: 'string' },
  db: { type: 'string' },
  topics: { type: 'string', multiple: true },
  'max-pages': { type: 'string' },
  out: { type: 'string' },
  days: { type: 'string' },
  'max-trials': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse argv (without the node and script entries)
 * @throws UsageError on unknown options, a missing command or bad values
 */
export function parseCliArgs(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliInvocation | 'help' {
  const { values, positionals } = readArgs(argv);
  if (values.help) return 'help';

  if (positionals.length !== 1) {
    throw new UsageError(
      positionals.length === 0 ? 'A command is required' : `Unexpected arguments: ${positionals.slice(1).join(' ')}`
    );
  }
  const command = positionals[0];
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const configPath = values.config ?? env[ENV.CONFIG];
  if (!configPath) throw new UsageError(`--config (or ${ENV.CONFIG}) is required`);
  const dbPath = values.db ?? env[ENV.DB];
  if (!dbPath) throw new UsageError(`--db (or ${ENV.DB}) is required`);

  const invocation: CliInvocation = { command, configPath, dbPath };
  switch (command) {
    case 'sync': {
      const topics = (values.topics ?? []).flatMap((t) => t.split(',')).map((t) => t.trim()).filter((t) => t);
      if (topics.length > 0) invocation.topics = topics;
      invocation.maxPages = optionalInt('--max-pages', values['max-pages']);
      break;
    }
    case 'digest':
      if (!values.out) throw new UsageError('digest requires --out <file>');
      invocation.out = values.out;
      invocation.days = optionalInt('--days', values.days);
      break;
    case 'literature':
      invocation.maxTrials = optionalInt('--max-trials', values['max-trials']);
      break;
  }
  return invocation;
}

/**
 * Run one CLI invocation
 * @returns Process exit code
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let invocation: CliInvocation | 'help';
  try {
    invocation = parseCliArgs(argv, env);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (invocation === 'help') {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadConfig(invocation.configPath, env);
    switch (invocation.command) {
      case 'sync':
        await syncRegistry(config, invocation.dbPath, {
          topicNames: invocation.topics,
          maxPages: invocation.maxPages,
        });
        break;
      case 'digest':
        await generateDigest(config, invocation.dbPath, invocation.out ?? '', { days: invocation.days });
        break;
      case 'literature':
        await linkLiterature(config, invocation.dbPath, { maxTrials: invocation.maxTrials });
        break;
    }
    return 0;
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
