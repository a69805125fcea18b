/**
 * Project-local proto cache
 *
 * Layout:
 *   <project>/protos/remote/<service-name>/<package>.proto
 *
 * The cache lives inside the project so an installed project builds without
 * network access. Fingerprints of cached entries are recomputed from the
 * files on disk.
 */

import { promises as fs } from 'fs';
import { basename, join } from 'path';
import type { CachedProto, CacheStats, Fingerprint, ProtoFile } from '../../types/index.js';
import type { CacheManager } from '../components/types.js';
import { createProtoFile, normalizeProtoFileName } from '../proto/proto-files.js';
import { fingerprintProtoFiles } from '../fingerprint/fingerprint-validator.js';
import { ensureDir, exists, removePath, writeTextFile } from '../../utils/fs.js';
import { cleanupEmptyParents } from '../../utils/cleanup-empty-parents.js';
import { DependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const PROTOS_DIR = 'protos';
export const REMOTE_PROTOS_DIR = join(PROTOS_DIR, 'remote');

/** File name a proto is cached under: flattened, always ending in `.proto` */
export function cachedProtoFileName(file: ProtoFile): string {
  return normalizeProtoFileName(basename(file.name));
}

/** Fingerprint of `files` as they read back from the cache */
export function cachedProtoFingerprint(files: ProtoFile[]): Fingerprint {
  return fingerprintProtoFiles(
    files.map(file => createProtoFile(cachedProtoFileName(file).slice(0, -'.proto'.length), file.content))
  );
}

/** Project-relative, `/`-separated path of a cached proto */
export function cachedProtoPath(serviceName: string, file: ProtoFile): string {
  return `${PROTOS_DIR}/remote/${serviceName}/${cachedProtoFileName(file)}`;
}

export class ProjectCacheManager implements CacheManager {
  private hits = 0;
  private misses = 0;

  constructor(private readonly projectRoot: string) {}

  get remoteRoot(): string {
    return join(this.projectRoot, REMOTE_PROTOS_DIR);
  }

  serviceDir(serviceName: string): string {
    if (!serviceName || serviceName !== basename(serviceName) || serviceName === '.' || serviceName === '..') {
      throw new DependencyError(`Invalid service name for the proto cache: '${serviceName}'`);
    }
    return join(this.remoteRoot, serviceName);
  }

  /** Replaces the whole entry; files from an earlier set do not linger */
  async cacheProto(serviceName: string, files: ProtoFile[]): Promise<void> {
    const dir = this.serviceDir(serviceName);
    await removePath(dir);
    await ensureDir(dir);
    for (const file of files) {
      await writeTextFile(join(dir, cachedProtoFileName(file)), file.content);
    }
    logger.debug('Cached proto files', { service: serviceName, files: files.length });
  }

  async getCachedProto(serviceName: string): Promise<CachedProto | undefined> {
    const entry = await this.readEntry(serviceName);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry;
  }

  /** Current files of one entry, without counting a lookup */
  async snapshotProto(serviceName: string): Promise<ProtoFile[]> {
    return (await this.readEntry(serviceName))?.files ?? [];
  }

  /** Removes the entry, then `protos/remote/` and `protos/` if that left them empty */
  async invalidateCache(serviceName: string): Promise<void> {
    await removePath(this.serviceDir(serviceName));
    await cleanupEmptyParents(this.projectRoot, this.remoteRoot);
    logger.debug('Invalidated proto cache entry', { service: serviceName });
  }

  async clearCache(): Promise<void> {
    await removePath(join(this.projectRoot, PROTOS_DIR));
    logger.debug('Cleared proto cache', { projectRoot: this.projectRoot });
  }

  async getCacheStats(): Promise<CacheStats> {
    let totalEntries = 0;
    let totalSizeBytes = 0;

    for (const service of await listEntries(this.remoteRoot)) {
      const dir = join(this.remoteRoot, service);
      const fileNames = await listProtoFiles(dir);
      if (fileNames.length === 0) continue;
      totalEntries++;
      for (const fileName of fileNames) {
        totalSizeBytes += (await fs.stat(join(dir, fileName))).size;
      }
    }

    const lookups = this.hits + this.misses;
    return {
      totalEntries,
      totalSizeBytes,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      missRate: lookups === 0 ? 0 : this.misses / lookups
    };
  }

  private async readEntry(serviceName: string): Promise<CachedProto | undefined> {
    const dir = this.serviceDir(serviceName);
    const fileNames = await listProtoFiles(dir);
    if (fileNames.length === 0) return undefined;

    const files: ProtoFile[] = [];
    let newest = 0;
    for (const fileName of fileNames) {
      const fullPath = join(dir, fileName);
      const [content, stat] = await Promise.all([fs.readFile(fullPath, 'utf-8'), fs.stat(fullPath)]);
      newest = Math.max(newest, stat.mtimeMs);
      files.push(createProtoFile(fileName.slice(0, -'.proto'.length), content));
    }
    return {
      files,
      fingerprint: fingerprintProtoFiles(files),
      cachedAt: new Date(newest)
    };
  }
}

async function listEntries(dir: string): Promise<string[]> {
  if (!(await exists(dir))) return [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter(entry => entry.isDirectory()).map(entry => entry.name).sort();
}

async function listProtoFiles(dir: string): Promise<string[]> {
  if (!(await exists(dir))) return [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.endsWith('.proto'))
    .map(entry => entry.name)
    .sort();
}
