import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import {
  mergeLockEntries,
  readLockFile,
  serializeLockFile,
  writeLockFile
} from '../../../src/core/pipelines/lock-file.js';
import type { LockEntry, LockFile } from '../../../src/types/index.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../helpers/fakes.js';

function entry(alias: string, fingerprint = 'sha256:1'): LockEntry {
  return { alias, name: alias, actrType: `acme+${alias}`, fingerprint, files: [`protos/remote/${alias}/${alias}.proto`] };
}

describe('lock file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('lock');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('merges by alias and sorts', () => {
    const merged = mergeLockEntries([entry('b'), entry('a')], [entry('b', 'sha256:2'), entry('c')]);
    expect(merged.map(item => `${item.alias}=${item.fingerprint}`)).toEqual(['a=sha256:1', 'b=sha256:2', 'c=sha256:1']);
  });

  it('writes a header and reads back what it wrote', async () => {
    const path = join(dir, 'Actr.lock.toml');
    const lock: LockFile = {
      version: 1,
      fingerprint: 'sha256:abc',
      generatedAt: '2024-05-01T12:00:00.000Z',
      dependencies: [entry('chat'), entry('echo')]
    };

    await writeLockFile(path, lock);

    const text = await fs.readFile(path, 'utf-8');
    expect(text.startsWith('# Generated by actr-deps install. Do not edit by hand.\n\n')).toBe(true);
    expect(text).toContain('[[dependency]]');
    expect(await readLockFile(path)).toEqual(lock);
  });

  it('keeps the proto fingerprint only where an entry has one', async () => {
    const path = join(dir, 'Actr.lock.toml');
    const lock: LockFile = {
      version: 1,
      fingerprint: 'sha256:abc',
      generatedAt: '2024-05-01T12:00:00.000Z',
      dependencies: [{ ...entry('chat'), files: [] }, { ...entry('echo'), protoFingerprint: 'sha256:feed' }]
    };

    await writeLockFile(path, lock);

    const text = await fs.readFile(path, 'utf-8');
    expect(text.match(/proto_fingerprint = /g)).toHaveLength(1);
    expect(text).toContain('proto_fingerprint = "sha256:feed"');
    expect(await readLockFile(path)).toEqual(lock);
  });

  it('serializes an empty set', () => {
    expect(serializeLockFile({ version: 1, fingerprint: '', generatedAt: '', dependencies: [] }).endsWith('\n')).toBe(true);
  });

  it('returns undefined when there is no lock file', async () => {
    expect(await readLockFile(join(dir, 'missing.toml'))).toBeUndefined();
  });

  it('rejects a corrupt lock file', async () => {
    const path = join(dir, 'Actr.lock.toml');
    await fs.writeFile(path, '[[dependency');
    await expect(readLockFile(path)).rejects.toThrow(ConfigError);
  });
});
