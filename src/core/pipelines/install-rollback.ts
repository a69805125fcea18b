/**
 * Undo log for the write phase of an install.
 *
 * Each cache entry and the lock file are snapshotted right before their first
 * write; `restore()` puts every snapshot back, removing what did not exist.
 */

import type { ProtoFile } from '../../types/index.js';
import type { CacheManager } from '../components/types.js';
import { exists, readTextFile, removePath, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

interface LockSnapshot {
  /** Undefined when there was no lock file */
  text: string | undefined;
}

export class InstallRollback {
  private readonly services = new Map<string, ProtoFile[]>();
  private lockSnapshot: LockSnapshot | undefined;

  constructor(
    private readonly cacheManager: CacheManager,
    private readonly lockFilePath: string
  ) {}

  async rememberService(serviceName: string): Promise<void> {
    if (this.services.has(serviceName)) return;
    this.services.set(serviceName, await this.cacheManager.snapshotProto(serviceName));
  }

  async rememberLockFile(): Promise<void> {
    if (this.lockSnapshot) return;
    const text = (await exists(this.lockFilePath)) ? await readTextFile(this.lockFilePath) : undefined;
    this.lockSnapshot = { text };
  }

  /** Restore every snapshot; returns one line per step that failed */
  async restore(): Promise<string[]> {
    const failures: string[] = [];

    if (this.lockSnapshot) {
      try {
        if (this.lockSnapshot.text === undefined) {
          await removePath(this.lockFilePath);
        } else {
          await writeTextFile(this.lockFilePath, this.lockSnapshot.text);
        }
      } catch (error) {
        failures.push(`${this.lockFilePath}: ${describe(error)}`);
      }
    }

    for (const [serviceName, files] of this.services) {
      try {
        await this.cacheManager.invalidateCache(serviceName);
        if (files.length > 0) {
          await this.cacheManager.cacheProto(serviceName, files);
        }
      } catch (error) {
        failures.push(`cache entry '${serviceName}': ${describe(error)}`);
      }
    }

    logger.debug('Install rolled back', { services: this.services.size, failures: failures.length });
    return failures;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
