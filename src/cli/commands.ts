/**
 * voice-cache command definitions
 *
 * Maintenance commands for the speaker embedding cache. The cache is opened
 * per command through the injected factory and always closed afterwards.
 *
 * @module cli/commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { TieredEmbeddingCache } from '../infrastructure/cache/TieredEmbeddingCache.js';
import type { CacheInfo } from '../infrastructure/cache/types.js';

// =============================================================================
// Types
// =============================================================================

export interface CliDependencies {
  /** Build and initialize a cache from configuration */
  openCache(): Promise<TieredEmbeddingCache>;
  /** Output sink (default: console.log) */
  write?(line: string): void;
}

type GlobalOptions = {
  json?: boolean;
  color?: boolean;
};

// =============================================================================
// Color Control Helper
// =============================================================================

function shouldUseColor(): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['TERM'] === 'dumb') return false;
  return process.stdout.isTTY === true;
}

// =============================================================================
// Formatting
// =============================================================================

function formatInfo(info: CacheInfo): string[] {
  const statusColor = info.status === 'connected' ? chalk.green : chalk.yellow;
  const lines = [
    chalk.bold('Speaker embedding cache'),
    `Configured backend: ${info.configuredBackend}`,
    `Active backend:     ${info.activeBackend} (${info.activeTier})`,
    `Status:             ${statusColor(info.status)}`,
    `Volatile entries:   ${info.volatileEntries}`,
  ];
  for (const backend of info.backends) {
    const health = backend.healthy ? chalk.green('healthy') : chalk.red('unreachable');
    const marker = backend.active ? ' *' : '';
    lines.push(`  ${backend.tier.padEnd(9)} ${backend.label.padEnd(7)} ${health}${marker}`);
  }
  return lines;
}

// =============================================================================
// Program
// =============================================================================

/**
 * Create the voice-cache program
 */
export function createProgram(deps: CliDependencies): Command {
  const write = deps.write ?? ((line: string) => console.log(line));

  const program = new Command('voice-cache')
    .description('Inspect and maintain the speaker embedding cache')
    .version('1.0.0')
    .option('--json', 'Output as JSON')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals<GlobalOptions>();
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ voice-cache info
  $ voice-cache status <user-key>
  $ voice-cache clear <user-key>
  $ voice-cache cleanup --json

Environment:
  CACHE_BACKEND  Primary backend: redis or sqlite (default: redis)
  REDIS_URL      Redis connection URL
  SQLITE_PATH    SQLite database file
`
    );

  /**
   * Open the cache, run the action, and close the cache whatever happens
   */
  async function withCache(action: (cache: TieredEmbeddingCache) => Promise<void>): Promise<void> {
    const cache = await deps.openCache();
    try {
      await action(cache);
    } finally {
      await cache.close();
    }
  }

  function isJson(): boolean {
    return program.opts<GlobalOptions>().json === true;
  }

  program
    .command('info')
    .description('Show configured and active backends')
    .action(async () => {
      await withCache(async (cache) => {
        const info = cache.getCacheInfo();
        if (isJson()) {
          write(JSON.stringify(info));
          return;
        }
        for (const line of formatInfo(info)) write(line);
      });
    });

  program
    .command('status')
    .description('Check whether a user has a cached embedding')
    .argument('<userKey>', 'User key')
    .action(async (userKey: string) => {
      await withCache(async (cache) => {
        const exists = await cache.existsEmbedding(userKey);
        const activeBackend = cache.getActiveBackendLabel();
        if (isJson()) {
          write(JSON.stringify({ userKey, exists, activeBackend }));
          return;
        }
        write(
          exists
            ? `${chalk.green('cached')}     ${userKey} (${activeBackend})`
            : `${chalk.dim('not cached')} ${userKey} (${activeBackend})`
        );
      });
    });

  program
    .command('clear')
    .description("Delete a user's cached embedding")
    .argument('<userKey>', 'User key')
    .action(async (userKey: string) => {
      await withCache(async (cache) => {
        const deleted = await cache.deleteEmbedding(userKey);
        if (isJson()) {
          write(JSON.stringify({ userKey, deleted }));
          return;
        }
        write(
          deleted
            ? chalk.green(`Cleared cached embedding for ${userKey}`)
            : chalk.yellow(`No cached embedding for ${userKey}`)
        );
      });
    });

  program
    .command('cleanup')
    .description('Remove expired embeddings')
    .action(async () => {
      await withCache(async (cache) => {
        const removedCount = await cache.cleanupExpired();
        if (isJson()) {
          write(JSON.stringify({ removedCount }));
          return;
        }
        write(`Removed ${removedCount} expired cache entries`);
      });
    });

  return program;
}
