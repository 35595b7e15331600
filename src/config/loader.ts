/**
 * Configuration loading
 *
 * Reads and validates the JSON configuration before any network or database
 * work starts. Environment variables (optionally from a `.env` file) supply
 * the file locations and literature credentials.
 *
 * @module config/loader
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { ValidationError, validateInput } from '../utils/validation.js';
import { TrialWatchConfigSchema, type TrialWatchConfig } from './schema.js';

/** Environment variable names read by the loader and the CLI */
export const ENV = {
  CONFIG: 'TRIAL_WATCH_CONFIG',
  DB: 'TRIAL_WATCH_DB',
  LITERATURE_EMAIL: 'LITERATURE_EMAIL',
  LITERATURE_API_KEY: 'LITERATURE_API_KEY',
  ENV_FILE: 'TRIAL_WATCH_ENV_FILE',
} as const;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load a `.env` file into process.env without overriding set variables.
 * Candidates: TRIAL_WATCH_ENV_FILE, then ./.env. First found wins.
 *
 * @returns Path loaded, or null
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): string | null {
  const candidates = [env[ENV.ENV_FILE], path.resolve(process.cwd(), '.env')].filter(
    (p): p is string => typeof p === 'string' && p.length > 0
  );

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    const parsed = dotenv.parse(fs.readFileSync(envPath));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) env[key] = value;
    }
    return envPath;
  }
  return null;
}

/**
 * Validate a parsed configuration object and apply environment overrides
 * @throws ConfigError listing every schema issue
 */
export function parseConfig(
  input: unknown,
  env: NodeJS.ProcessEnv = process.env,
  configPath?: string
): TrialWatchConfig {
  let config: TrialWatchConfig;
  try {
    config = validateInput(TrialWatchConfigSchema, input);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigError(
        `Invalid configuration${configPath ? ` in ${configPath}` : ''}: ${error.message}`,
        configPath,
        error
      );
    }
    throw error;
  }

  const email = env[ENV.LITERATURE_EMAIL];
  const apiKey = env[ENV.LITERATURE_API_KEY];
  return {
    ...config,
    literature: {
      ...config.literature,
      ...(email ? { email } : {}),
      ...(apiKey ? { apiKey } : {}),
    },
  };
}

/**
 * Read, parse and validate a configuration file
 * @throws ConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): TrialWatchConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
      error
    );
  }

  const config = parseConfig(raw, env, configPath);
  console.error(`[CONFIG] Loaded ${configPath} (${String(config.topics.length)} topics)`);
  return config;
}
