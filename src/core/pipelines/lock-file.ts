/**
 * Actr.lock.toml: the installed dependency set, one entry per alias.
 */

import { stringify } from 'smol-toml';
import type { LockEntry, LockFile } from '../../types/index.js';
import { isTomlTable, parseToml, type TomlTable } from '../config/manifest.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';

export const LOCK_FILE_VERSION = 1;
const LOCK_FILE_HEADER = '# Generated by actr-deps install. Do not edit by hand.\n\n';

export async function readLockFile(path: string): Promise<LockFile | undefined> {
  if (!(await exists(path))) return undefined;
  const doc = parseToml(await readTextFile(path), path);
  const { version, fingerprint, generated_at: generatedAt, dependency } = doc;
  return {
    version: typeof version === 'number' ? version : LOCK_FILE_VERSION,
    fingerprint: typeof fingerprint === 'string' ? fingerprint : '',
    generatedAt: typeof generatedAt === 'string' ? generatedAt : '',
    dependencies: Array.isArray(dependency) ? dependency.filter(isTomlTable).map(toLockEntry) : []
  };
}

function toLockEntry(raw: TomlTable): LockEntry {
  const text = (key: string): string => {
    const value = raw[key];
    return typeof value === 'string' ? value : '';
  };
  const files = raw['files'];
  const entry: LockEntry = {
    alias: text('alias'),
    name: text('name'),
    actrType: text('actr_type'),
    fingerprint: text('fingerprint'),
    files: Array.isArray(files) ? files.filter((file): file is string => typeof file === 'string') : []
  };
  const protoFingerprint = text('proto_fingerprint');
  if (protoFingerprint) entry.protoFingerprint = protoFingerprint;
  return entry;
}

/** Entries in `updates` replace existing ones with the same alias; result sorted by alias */
export function mergeLockEntries(existing: LockEntry[], updates: LockEntry[]): LockEntry[] {
  const byAlias = new Map<string, LockEntry>();
  for (const entry of existing) byAlias.set(entry.alias, entry);
  for (const entry of updates) byAlias.set(entry.alias, entry);
  return [...byAlias.values()].sort((a, b) => (a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0));
}

export function serializeLockFile(lock: LockFile): string {
  const body = stringify({
    version: lock.version,
    fingerprint: lock.fingerprint,
    generated_at: lock.generatedAt,
    dependency: lock.dependencies.map(entry => ({
      alias: entry.alias,
      name: entry.name,
      actr_type: entry.actrType,
      fingerprint: entry.fingerprint,
      files: entry.files,
      ...(entry.protoFingerprint ? { proto_fingerprint: entry.protoFingerprint } : {})
    }))
  });
  return `${LOCK_FILE_HEADER}${body.endsWith('\n') ? body : `${body}\n`}`;
}

export async function writeLockFile(path: string, lock: LockFile): Promise<void> {
  await writeTextFile(path, serializeLockFile(lock));
}
