/**
 * Discovery "add dependency" flow
 *
 *   alias/type checks → validate → backup → update Actr.toml → [install] → remove backup
 *
 * Validation runs before the backup is taken, so a service that fails it
 * never touches the manifest. Anything failing after the backup restores it.
 */

import type { DependencySpec, InstallResult, ServiceInfo, ValidationReport } from '../../types/index.js';
import type { ServiceContainer } from '../container.js';
import { formatActrType, formatActrUri } from '../actr-uri.js';
import { pinnedSpec } from '../pipelines/install-pipeline.js';
import { collectFailureDetails, isValidationSuccess } from '../pipelines/validation-report.js';
import { withConfigBackup } from './with-config-backup.js';
import { DependencyError, ValidationFailedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface AddDependencyOptions {
  service: ServiceInfo;
  alias?: string;
  /** Also cache protos and update the lock file */
  install?: boolean;
}

export interface AddDependencyResult {
  spec: DependencySpec;
  report: ValidationReport;
  installResult?: InstallResult;
}

export function specFromService(service: ServiceInfo, alias?: string): DependencySpec {
  const name = service.actrType.name || service.name;
  const fingerprint = service.fingerprint || undefined;
  return {
    name,
    alias: alias ?? name,
    uri: formatActrUri({ name: formatActrType(service.actrType), fingerprint }),
    fingerprint
  };
}

export async function runAddDependencyFlow(
  container: ServiceContainer,
  options: AddDependencyOptions
): Promise<AddDependencyResult> {
  const configManager = container.get('configManager');
  const manifest = await configManager.loadConfig();
  const spec = specFromService(options.service, options.alias);
  const typeString = formatActrType(options.service.actrType);

  if (manifest.dependencies.some(dependency => dependency.alias === spec.alias)) {
    throw new DependencyError(`Alias '${spec.alias}' is already used in ${configManager.manifestPath}`);
  }
  const sameType = manifest.dependencies.find(
    dependency => dependency.actrType && formatActrType(dependency.actrType) === typeString
  );
  if (sameType) {
    throw new DependencyError(`'${typeString}' is already a dependency (alias '${sameType.alias}')`);
  }

  const existing = await configManager.extractDependencySpecs();
  const report = await container.getValidationPipeline().validateDependencies([spec], { existing });
  if (!isValidationSuccess(report)) {
    throw new ValidationFailedError(collectFailureDetails(report), report);
  }
  const [resolved] = report.resolved;
  const pinned = resolved ? pinnedSpec(resolved) : spec;

  return withConfigBackup(configManager, async () => {
    await configManager.updateDependency(pinned);
    logger.debug('Added dependency to manifest', { alias: pinned.alias });

    if (!options.install) {
      return { spec: pinned, report };
    }
    const installResult = await container.getInstallPipeline().installDependencies([pinned], { existing });
    return { spec: pinned, report, installResult };
  });
}
