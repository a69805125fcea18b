/**
 * Check-first install
 *
 *   validate ─┬─ any failure → ValidationFailedError (nothing written)
 *             └─ all passed  → cache protos → Actr.lock.toml → Actr.toml
 *
 * Writes start only after a fully successful report. If a write fails, the
 * cached protos and the lock file are put back as they were before the
 * install; the manifest is restored by the caller's backup (see flows/).
 */

import type { DependencySpec, InstallResult, LockEntry, ResolvedDependency } from '../../types/index.js';
import type { CacheManager } from '../components/types.js';
import { formatActrType, formatActrUri, formatFingerprint, parseActrType, parseActrUri } from '../actr-uri.js';
import { cachedProtoFingerprint, cachedProtoPath } from '../cache/cache-manager.js';
import { ValidationPipeline } from './validation-pipeline.js';
import { collectFailureDetails, isValidationSuccess } from './validation-report.js';
import { LOCK_FILE_VERSION, mergeLockEntries, readLockFile, writeLockFile } from './lock-file.js';
import { InstallRollback } from './install-rollback.js';
import { InstallFailedError, ValidationFailedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface InstallPipelineOptions {
  lockFilePath: string;
}

export interface InstallOptions {
  /** Manifest dependencies to check for conflicts with the new specs */
  existing?: DependencySpec[];
}

export class InstallPipeline {
  constructor(
    private readonly validation: ValidationPipeline,
    private readonly cacheManager: CacheManager,
    private readonly options: InstallPipelineOptions
  ) {}

  get validationPipeline(): ValidationPipeline {
    return this.validation;
  }

  async installDependencies(specs: DependencySpec[], options: InstallOptions = {}): Promise<InstallResult> {
    const report = await this.validation.validateDependencies(specs, { existing: options.existing });
    if (!isValidationSuccess(report)) {
      throw new ValidationFailedError(collectFailureDetails(report), report);
    }

    const result: InstallResult = {
      installedDependencies: [],
      cacheUpdates: 0,
      updatedConfig: false,
      updatedLockFile: false,
      warnings: []
    };
    if (report.resolved.length === 0) {
      return result;
    }

    const rollback = new InstallRollback(this.cacheManager, this.options.lockFilePath);
    try {
      for (const dependency of report.resolved) {
        if (dependency.protoFiles.length === 0) {
          result.warnings.push(`${dependency.spec.alias}: the service published no proto files`);
        } else {
          await rollback.rememberService(dependency.spec.name);
          await this.cacheManager.cacheProto(dependency.spec.name, dependency.protoFiles);
          result.cacheUpdates++;
        }
        result.installedDependencies.push(dependency);
      }

      await rollback.rememberLockFile();
      await this.updateLockFile(result.installedDependencies);
      result.updatedLockFile = true;

      for (const dependency of result.installedDependencies) {
        await this.validation.configManager.updateDependency(pinnedSpec(dependency));
      }
      result.updatedConfig = true;
    } catch (error) {
      logger.error('Install step failed after validation', { error });
      const reason = error instanceof Error ? error.message : String(error);
      const failures = await rollback.restore();
      if (failures.length > 0) {
        logger.error('Install rollback incomplete', { failures });
        throw new InstallFailedError(`${reason}; rolling back also failed: ${failures.join('; ')}`, { cause: error });
      }
      throw new InstallFailedError(reason, { cause: error });
    }

    logger.info('Installed dependencies', {
      count: result.installedDependencies.length,
      cacheUpdates: result.cacheUpdates
    });
    return result;
  }

  private async updateLockFile(installed: ResolvedDependency[]): Promise<void> {
    const existing = await readLockFile(this.options.lockFilePath);
    const dependencies = mergeLockEntries(existing?.dependencies ?? [], installed.map(toLockEntry));
    const fingerprint = this.validation.fingerprintValidator.generateLockFingerprint(
      dependencies.map(entry => ({
        spec: { name: entry.name, alias: entry.alias, uri: formatActrUri({ name: entry.actrType }) },
        fingerprint: entry.fingerprint,
        protoFiles: []
      }))
    );

    await writeLockFile(this.options.lockFilePath, {
      version: LOCK_FILE_VERSION,
      fingerprint: formatFingerprint(fingerprint),
      generatedAt: new Date().toISOString(),
      dependencies
    });
  }
}

function actrTypeString(dependency: ResolvedDependency): string {
  const actrType = dependency.actrType ?? parseActrType(parseActrUri(dependency.spec.uri).name);
  return formatActrType(actrType);
}

function toLockEntry(dependency: ResolvedDependency): LockEntry {
  const entry: LockEntry = {
    alias: dependency.spec.alias,
    name: dependency.spec.name,
    actrType: actrTypeString(dependency),
    fingerprint: dependency.fingerprint,
    files: dependency.protoFiles.map(file => cachedProtoPath(dependency.spec.name, file))
  };
  if (dependency.protoFiles.length > 0) {
    entry.protoFingerprint = formatFingerprint(cachedProtoFingerprint(dependency.protoFiles));
  }
  return entry;
}

/** The spec as written to the manifest: qualified actor type, verified fingerprint */
export function pinnedSpec(dependency: ResolvedDependency): DependencySpec {
  const fingerprint = dependency.fingerprint || undefined;
  return {
    ...dependency.spec,
    uri: formatActrUri({ name: actrTypeString(dependency), fingerprint }),
    fingerprint
  };
}
