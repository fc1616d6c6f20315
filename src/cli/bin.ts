#!/usr/bin/env node
/**
 * voice-cache CLI
 *
 * Entry point for the `voice-cache` command. Logs go to stderr so --json
 * output on stdout stays machine-readable.
 *
 * @module cli/bin
 */

import chalk from 'chalk';
import { getConfig } from '../config.js';
import { createEmbeddingCache } from '../factory.js';
import { isEmbeddingCacheError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { createProgram } from './commands.js';

async function main(): Promise<void> {
  const config = getConfig();
  const logger = createLogger({ level: config.logLevel, destination: 2 });

  const program = createProgram({
    // Re-promotion is pointless for a one-shot command
    openCache: () =>
      createEmbeddingCache(
        { ...config, cache: { ...config.cache, reprobeIntervalMs: 0 } },
        logger
      ),
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));
  if (isEmbeddingCacheError(error) && error.suggestion) {
    console.error(chalk.dim(error.suggestion));
  }
  process.exitCode = 1;
});
