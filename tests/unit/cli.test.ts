/**
 * CLI argument parsing and exit code tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'path';
import { UsageError, main, parseCliArgs } from '../../src/cli.js';
import { createTestDir, cleanupTestDir } from '../helpers.js';

const BASE_ARGS = ['--config', 'config.json', '--db', 'trials.db'];

function usageMessage(argv: string[], env: NodeJS.ProcessEnv = {}): string {
  try {
    parseCliArgs(argv, env);
  } catch (error) {
    if (error instanceof UsageError) return error.message;
    throw error;
  }
  throw new Error('expected a UsageError');
}

describe('parseCliArgs', () => {
  it('parses sync with topics and a page cap', () => {
    expect(parseCliArgs([...BASE_ARGS, 'sync', '--topics', 'asthma, copd', '--topics', 'ild', '--max-pages', '3'], {})).toEqual({
      command: 'sync',
      configPath: 'config.json',
      dbPath: 'trials.db',
      topics: ['asthma', 'copd', 'ild'],
      maxPages: 3,
    });
  });

  it('parses digest and literature options', () => {
    expect(parseCliArgs([...BASE_ARGS, 'digest', '--out', 'out/digest.md', '--days', '90'], {})).toEqual({
      command: 'digest',
      configPath: 'config.json',
      dbPath: 'trials.db',
      out: 'out/digest.md',
      days: 90,
    });
    expect(parseCliArgs([...BASE_ARGS, 'literature', '--max-trials', '5'], {})).toEqual({
      command: 'literature',
      configPath: 'config.json',
      dbPath: 'trials.db',
      maxTrials: 5,
    });
  });

  it('falls back to environment variables for file locations', () => {
    expect(parseCliArgs(['literature'], { TRIAL_WATCH_CONFIG: 'env.json', TRIAL_WATCH_DB: 'env.db' })).toEqual({
      command: 'literature',
      configPath: 'env.json',
      dbPath: 'env.db',
      maxTrials: undefined,
    });
  });

  it('recognises help', () => {
    expect(parseCliArgs(['-h'], {})).toBe('help');
    expect(parseCliArgs(['--help', 'sync'], {})).toBe('help');
  });

  it('rejects bad invocations', () => {
    expect(usageMessage(BASE_ARGS)).toBe('A command is required');
    expect(usageMessage([...BASE_ARGS, 'sync', 'extra'])).toBe('Unexpected arguments: extra');
    expect(usageMessage([...BASE_ARGS, 'export'])).toBe('Unknown command: export');
    expect(usageMessage(['--db', 'x.db', 'sync'])).toBe('--config (or TRIAL_WATCH_CONFIG) is required');
    expect(usageMessage(['--config', 'c.json', 'sync'])).toBe('--db (or TRIAL_WATCH_DB) is required');
    expect(usageMessage([...BASE_ARGS, 'digest'])).toBe('digest requires --out <file>');
    expect(usageMessage([...BASE_ARGS, 'sync', '--max-pages', '0'])).toBe('--max-pages must be >= 1');
    expect(usageMessage([...BASE_ARGS, 'digest', '--out', 'd.md', '--days', 'soon'])).toBe('--days must be a number');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs([...BASE_ARGS, 'sync', '--verbose'], {})).toThrow(UsageError);
  });
});

describe('main', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('cli');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  it('returns 2 for usage errors', async () => {
    expect(await main(['sync'], {})).toBe(2);
  });

  it('returns 0 for help', async () => {
    expect(await main(['--help'], {})).toBe(0);
  });

  it('returns 1 when the configuration cannot be loaded', async () => {
    const argv = ['--config', join(testDir, 'missing.json'), '--db', join(testDir, 'trials.db'), 'digest', '--out', join(testDir, 'd.md')];
    expect(await main(argv, {})).toBe(1);
  });
});
