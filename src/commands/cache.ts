/**
 * Cache Command
 *
 * Inspect and prune the local proto cache under protos/remote/.
 */

import { Command } from 'commander';
import type { ComponentName } from '../core/container.js';
import { formatFingerprint } from '../core/actr-uri.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatFileSize, formatPercent, getTreeConnector, pluralize } from '../utils/formatters.js';
import { dim, runWithContainer } from './shared.js';

const CACHE_COMPONENTS: readonly ComponentName[] = ['cacheManager'];

export function setupCacheCommand(program: Command): void {
  const cache = program.command('cache').description('Manage the local proto cache');

  cache
    .command('stats')
    .description('Show cache size and hit rate')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await runWithContainer(command, CACHE_COMPONENTS, async ({ container }) => {
        const stats = await container.get('cacheManager').getCacheStats();
        console.log(`Entries: ${stats.totalEntries}`);
        console.log(`Size: ${formatFileSize(stats.totalSizeBytes)}`);
        console.log(`Hit rate: ${formatPercent(stats.hitRate)} | Miss rate: ${formatPercent(stats.missRate)}`);
      });
    }));

  cache
    .command('show')
    .argument('<service>', 'cached service name')
    .description('List the cached proto files of a service')
    .action(withErrorHandling(async (service: string, _options: Record<string, never>, command: Command) => {
      await runWithContainer(command, CACHE_COMPONENTS, async ({ container }) => {
        const cached = await container.get('cacheManager').getCachedProto(service);
        if (!cached) {
          console.log(`No cached protos for '${service}'.`);
          return;
        }
        console.log(`${service} ${dim(formatFingerprint(cached.fingerprint))}`);
        cached.files.forEach((file, index) => {
          console.log(`${getTreeConnector(index === cached.files.length - 1)}${file.path}`);
        });
        console.log(dim(`Cached ${cached.cachedAt.toISOString()}`));
      });
    }));

  cache
    .command('invalidate')
    .argument('<service>', 'cached service name')
    .description('Remove one service from the cache')
    .action(withErrorHandling(async (service: string, _options: Record<string, never>, command: Command) => {
      await runWithContainer(command, CACHE_COMPONENTS, async ({ container }) => {
        await container.get('cacheManager').invalidateCache(service);
        console.log(`✓ Invalidated cache for ${service}`);
      });
    }));

  cache
    .command('clear')
    .description('Remove every cached proto file')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await runWithContainer(command, CACHE_COMPONENTS, async ({ container }) => {
        const cacheManager = container.get('cacheManager');
        const { totalEntries } = await cacheManager.getCacheStats();
        await cacheManager.clearCache();
        console.log(`✓ Cleared ${pluralize(totalEntries, 'cache entry', 'cache entries')}`);
      });
    }));
}
