#!/usr/bin/env node
/**
 * trial-watch - CLI Entry Point
 *
 * Usage:
 *   trial-watch --config config.json --db data/trials.db sync
 *   node dist/bin.js ...
 *
 * @module bin
 */

import { loadEnvironment } from './config/index.js';
import { main } from './cli.js';

loadEnvironment();

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[FATAL]', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
