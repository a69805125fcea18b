import type { ConfigManager } from '../components/types.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Run `operation` with the manifest backed up. The backup is removed when the
 * operation succeeds and restored when it throws, so a failed attempt leaves
 * the manifest byte-identical.
 */
export async function withConfigBackup<T>(configManager: ConfigManager, operation: () => Promise<T>): Promise<T> {
  const backup = await configManager.backupConfig();

  let result: T;
  try {
    result = await operation();
  } catch (error) {
    try {
      await configManager.restoreBackup(backup);
    } catch (restoreError) {
      logger.error('Failed to restore manifest backup', { backupPath: backup.backupPath, error: restoreError });
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(
        `${message}; restoring ${backup.originalPath} also failed, the backup is kept at ${backup.backupPath}`
      );
    }
    logger.debug('Manifest restored after a failed operation', { backupPath: backup.backupPath });
    throw error;
  }

  await configManager.removeBackup(backup);
  return result;
}
