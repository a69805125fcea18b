/**
 * Fingerprint computation and comparison.
 *
 * Equality is exact on both algorithm and value. All digests are sha256, hex
 * encoded.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { join } from 'path';
import fg from 'fast-glob';
import type { Fingerprint, ProtoFile, ResolvedDependency, ServiceInfo } from '../../types/index.js';
import type { FingerprintValidator } from '../components/types.js';
import { DEFAULT_FINGERPRINT_ALGORITHM, parseFingerprint } from '../actr-uri.js';
import { logger } from '../../utils/logger.js';

const PROJECT_SCAN_IGNORES = ['**/node_modules/**', '**/.git/**', '**/dist/**'];

function sha256(): ReturnType<typeof createHash> {
  return createHash(DEFAULT_FINGERPRINT_ALGORITHM);
}

/**
 * Digest of a set of proto files, independent of their order: each file
 * contributes its path and content, sorted by path.
 */
export function fingerprintProtoFiles(files: ProtoFile[]): Fingerprint {
  const hasher = sha256();
  const sorted = [...files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const file of sorted) {
    hasher.update(file.path);
    hasher.update('\0');
    hasher.update(file.content);
    hasher.update('\0');
  }
  return { algorithm: DEFAULT_FINGERPRINT_ALGORITHM, value: hasher.digest('hex') };
}

export class Sha256FingerprintValidator implements FingerprintValidator {
  /** The fingerprint a service advertises, as a structured value */
  computeServiceFingerprint(service: ServiceInfo): Fingerprint {
    return parseFingerprint(service.fingerprint);
  }

  verifyFingerprint(expected: Fingerprint, actual: Fingerprint): boolean {
    return expected.algorithm === actual.algorithm && expected.value === actual.value;
  }

  async computeProjectFingerprint(projectRoot: string): Promise<Fingerprint> {
    const protoFiles = await fg('**/*.proto', {
      cwd: projectRoot,
      onlyFiles: true,
      ignore: PROJECT_SCAN_IGNORES
    });
    protoFiles.sort();

    const hasher = sha256();
    for (const relativePath of protoFiles) {
      const content = await fs.readFile(join(projectRoot, relativePath));
      hasher.update(sha256().update(content).digest());
    }

    logger.debug('Computed project fingerprint', { projectRoot, files: protoFiles.length });
    return { algorithm: DEFAULT_FINGERPRINT_ALGORITHM, value: hasher.digest('hex') };
  }

  generateLockFingerprint(resolved: ResolvedDependency[]): Fingerprint {
    const hasher = sha256();
    const sorted = [...resolved].sort((a, b) =>
      a.spec.name < b.spec.name ? -1 : a.spec.name > b.spec.name ? 1 : 0
    );
    for (const dependency of sorted) {
      hasher.update(dependency.spec.name);
      hasher.update(dependency.fingerprint);
    }
    return { algorithm: DEFAULT_FINGERPRINT_ALGORITHM, value: hasher.digest('hex') };
  }
}
