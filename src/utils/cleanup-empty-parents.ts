import path from 'path';
import { promises as fs } from 'fs';

import { exists, removePath } from './fs.js';
import { logger } from './logger.js';

/**
 * Remove `startDir` and its parents while they are empty, stopping at
 * `rootDir` (never removed).
 */
export async function cleanupEmptyParents(rootDir: string, startDir: string): Promise<void> {
  let current = path.resolve(startDir);
  const root = path.resolve(rootDir);

  while (current !== root && current.startsWith(root + path.sep)) {
    if (await exists(current)) {
      const entries = await fs.readdir(current);
      if (entries.length > 0) return;
      await removePath(current);
      logger.debug('Removed empty directory', { dir: path.relative(root, current) });
    }
    current = path.dirname(current);
  }
}
