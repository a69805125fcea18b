import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { ProjectCacheManager, cachedProtoFingerprint, cachedProtoPath } from '../../../src/core/cache/cache-manager.js';
import { fingerprintProtoFiles } from '../../../src/core/fingerprint/fingerprint-validator.js';
import { createProtoFile } from '../../../src/core/proto/proto-files.js';
import { DependencyError } from '../../../src/utils/errors.js';
import { ECHO_PROTO, makeTempDir, removeTempDir } from '../../helpers/fakes.js';

describe('ProjectCacheManager', () => {
  let dir: string;
  let cache: ProjectCacheManager;
  const files = [createProtoFile('echo.v1', ECHO_PROTO), createProtoFile('types.proto', 'syntax = "proto3";\n')];

  beforeEach(async () => {
    dir = await makeTempDir('cache');
    cache = new ProjectCacheManager(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function listServiceDir(service: string): Promise<string[]> {
    return (await fs.readdir(join(dir, 'protos', 'remote', service))).sort();
  }

  it('writes files under protos/remote/<service>', async () => {
    await cache.cacheProto('echo', files);

    expect(await listServiceDir('echo')).toEqual(['echo.v1.proto', 'types.proto']);
    expect(await fs.readFile(join(dir, 'protos', 'remote', 'echo', 'echo.v1.proto'), 'utf-8')).toBe(ECHO_PROTO);
  });

  it('overwrites instead of duplicating', async () => {
    await cache.cacheProto('echo', files);
    await cache.cacheProto('echo', files);

    expect(await listServiceDir('echo')).toEqual(['echo.v1.proto', 'types.proto']);
  });

  it('replaces the files of an entry', async () => {
    await cache.cacheProto('echo', files);
    await cache.cacheProto('echo', [createProtoFile('echo.v2', ECHO_PROTO)]);

    expect(await listServiceDir('echo')).toEqual(['echo.v2.proto']);
  });

  it('fingerprints files the way they read back', async () => {
    const nested = [createProtoFile('api/echo.v1', ECHO_PROTO)];
    await cache.cacheProto('echo', nested);

    expect(cachedProtoFingerprint(nested)).toEqual((await cache.getCachedProto('echo'))?.fingerprint);
    expect(cachedProtoFingerprint(nested)).not.toEqual(fingerprintProtoFiles(nested));
  });

  it('reads cached files back with a recomputed fingerprint', async () => {
    await cache.cacheProto('echo', files);

    const cached = await cache.getCachedProto('echo');

    expect(cached?.files.map(file => file.path)).toEqual(['echo.v1.proto', 'types.proto']);
    expect(cached?.files[0]?.services.map(service => service.name)).toEqual(['EchoService']);
    expect(cached?.fingerprint).toEqual(fingerprintProtoFiles(files));
    expect(cached?.cachedAt).toBeInstanceOf(Date);
  });

  it('returns undefined for a missing or empty entry', async () => {
    expect(await cache.getCachedProto('missing')).toBeUndefined();
    await fs.mkdir(join(dir, 'protos', 'remote', 'empty'), { recursive: true });
    expect(await cache.getCachedProto('empty')).toBeUndefined();
  });

  it('invalidates one service and clears everything', async () => {
    await cache.cacheProto('echo', files);
    await cache.cacheProto('chat', files);

    await cache.invalidateCache('echo');
    expect(await cache.getCachedProto('echo')).toBeUndefined();
    expect(await cache.getCachedProto('chat')).toBeDefined();

    await cache.clearCache();
    await expect(fs.access(join(dir, 'protos'))).rejects.toThrow();
  });

  it('counts entries, bytes and lookups', async () => {
    await cache.cacheProto('echo', files);
    await cache.getCachedProto('echo');
    await cache.getCachedProto('missing');
    await cache.getCachedProto('missing');
    await cache.getCachedProto('echo');

    const stats = await cache.getCacheStats();
    expect(stats.totalEntries).toBe(1);
    expect(stats.totalSizeBytes).toBe(Buffer.byteLength(ECHO_PROTO) + Buffer.byteLength('syntax = "proto3";\n'));
    expect(stats.hitRate).toBe(0.5);
    expect(stats.missRate).toBe(0.5);
  });

  it('snapshots an entry without counting a lookup', async () => {
    await cache.cacheProto('echo', files);

    expect((await cache.snapshotProto('echo')).map(file => file.path)).toEqual(['echo.v1.proto', 'types.proto']);
    expect(await cache.snapshotProto('missing')).toEqual([]);
    expect(await cache.getCacheStats()).toMatchObject({ hitRate: 0, missRate: 0 });
  });

  it('removes protos/ once the last entry is invalidated', async () => {
    await fs.mkdir(join(dir, 'protos', 'local'), { recursive: true });
    await cache.cacheProto('echo', files);

    await cache.invalidateCache('echo');
    expect(await fs.readdir(join(dir, 'protos'))).toEqual(['local']);

    await fs.rmdir(join(dir, 'protos', 'local'));
    await cache.cacheProto('echo', files);
    await cache.invalidateCache('echo');
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('reports zero rates before any lookup', async () => {
    expect(await cache.getCacheStats()).toEqual({ totalEntries: 0, totalSizeBytes: 0, hitRate: 0, missRate: 0 });
  });

  it('rejects service names that would escape the cache', async () => {
    await expect(cache.cacheProto('../escape', files)).rejects.toThrow(DependencyError);
    await expect(cache.invalidateCache('..')).rejects.toThrow("Invalid service name for the proto cache: '..'");
  });

  it('builds lock file paths with forward slashes', () => {
    expect(cachedProtoPath('echo', createProtoFile('echo.v1', ECHO_PROTO))).toBe('protos/remote/echo/echo.v1.proto');
  });
});
