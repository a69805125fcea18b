/**
 * Lock file verification
 *
 * Compares Actr.lock.toml with the manifest dependencies and with the protos
 * cached on disk. Nothing is fetched from signaling; a missing lock file reads
 * as an empty one.
 */

import type { DependencySpec, LockEntry } from '../../types/index.js';
import type { CacheManager } from '../components/types.js';
import { formatFingerprint, normalizeFingerprint } from '../actr-uri.js';
import { fingerprintProtoFiles } from '../fingerprint/fingerprint-validator.js';
import { readLockFile } from './lock-file.js';
import { logger } from '../../utils/logger.js';

export type LockIssueKind =
  | 'NotLocked'
  | 'NotInManifest'
  | 'ServiceMismatch'
  | 'PinMismatch'
  | 'CacheMissing'
  | 'CacheModified';

export interface LockIssue {
  /** Alias in the manifest or the lock file */
  dependency: string;
  kind: LockIssueKind;
  description: string;
}

export interface LockVerification {
  lockFound: boolean;
  /** Aliases present in both the manifest and the lock file without issues */
  verified: string[];
  issues: LockIssue[];
}

export interface VerifyLockFileOptions {
  lockFilePath: string;
  dependencies: DependencySpec[];
  cacheManager: CacheManager;
}

export async function verifyLockFile(options: VerifyLockFileOptions): Promise<LockVerification> {
  const { lockFilePath, dependencies, cacheManager } = options;
  const lock = await readLockFile(lockFilePath);
  const entries = new Map<string, LockEntry>((lock?.dependencies ?? []).map(entry => [entry.alias, entry]));

  const result: LockVerification = { lockFound: lock !== undefined, verified: [], issues: [] };

  for (const spec of dependencies) {
    const entry = entries.get(spec.alias);
    if (!entry) {
      result.issues.push({
        dependency: spec.alias,
        kind: 'NotLocked',
        description: `'${spec.alias}' is not in the lock file; run install`
      });
      continue;
    }

    const issues = await checkEntry(spec, entry, cacheManager);
    if (issues.length === 0) {
      result.verified.push(spec.alias);
    }
    result.issues.push(...issues);
  }

  const aliases = new Set(dependencies.map(spec => spec.alias));
  for (const entry of entries.values()) {
    if (!aliases.has(entry.alias)) {
      result.issues.push({
        dependency: entry.alias,
        kind: 'NotInManifest',
        description: `'${entry.alias}' is locked but no longer in the manifest`
      });
    }
  }

  logger.debug('Verified lock file', {
    path: lockFilePath,
    verified: result.verified.length,
    issues: result.issues.length
  });
  return result;
}

async function checkEntry(spec: DependencySpec, entry: LockEntry, cacheManager: CacheManager): Promise<LockIssue[]> {
  const alias = spec.alias;
  const issues: LockIssue[] = [];

  if (entry.name !== spec.name) {
    issues.push({
      dependency: alias,
      kind: 'ServiceMismatch',
      description: `'${alias}' names service '${spec.name}' but the lock file has '${entry.name}'`
    });
    return issues;
  }

  const pinned = normalizeFingerprint(spec.fingerprint);
  const locked = normalizeFingerprint(entry.fingerprint);
  if (pinned && pinned !== locked) {
    issues.push({
      dependency: alias,
      kind: 'PinMismatch',
      description: `'${alias}' is pinned to ${pinned} but locked at ${locked ?? '(none)'}`
    });
  }

  if (entry.files.length === 0 && !entry.protoFingerprint) {
    return issues;
  }

  const cached = await cacheManager.snapshotProto(entry.name);
  if (cached.length === 0) {
    issues.push({
      dependency: alias,
      kind: 'CacheMissing',
      description: `'${alias}' has no cached protos; run install`
    });
    return issues;
  }

  const expected = normalizeFingerprint(entry.protoFingerprint);
  const actual = formatFingerprint(fingerprintProtoFiles(cached));
  if (expected && expected !== actual) {
    issues.push({
      dependency: alias,
      kind: 'CacheModified',
      description: `cached protos of '${alias}' changed since install (locked ${expected}, found ${actual})`
    });
  }
  return issues;
}

export function formatLockVerification(verification: LockVerification): string {
  if (verification.issues.length === 0) {
    const count = verification.verified.length;
    return `Lock file: ✓ ${count} ${count === 1 ? 'dependency matches' : 'dependencies match'}`;
  }

  const lines = [verification.lockFound ? 'Lock file: ❌ out of date' : 'Lock file: ❌ not found'];
  for (const issue of verification.issues) {
    lines.push(`  ❌ ${issue.kind}: ${issue.description}`);
  }
  return lines.join('\n');
}
