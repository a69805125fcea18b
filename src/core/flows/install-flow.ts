/**
 * `install` flow: manifest backup around the check-first install pipeline.
 */

import type { DependencySpec, InstallResult } from '../../types/index.js';
import type { ServiceContainer } from '../container.js';
import { withConfigBackup } from './with-config-backup.js';

export interface InstallFlowResult {
  /** Specs taken from the manifest rather than the command line */
  fromManifest: boolean;
  specs: DependencySpec[];
  result: InstallResult;
}

/**
 * Install `specs`, or every manifest dependency when none are given.
 */
export async function runInstallFlow(container: ServiceContainer, specs: DependencySpec[]): Promise<InstallFlowResult> {
  const configManager = container.get('configManager');
  const pipeline = container.getInstallPipeline();
  const manifestSpecs = await configManager.extractDependencySpecs();

  const fromManifest = specs.length === 0;
  const targets = fromManifest ? manifestSpecs : specs;
  const existing = fromManifest ? [] : manifestSpecs;

  const result = await withConfigBackup(configManager, () =>
    pipeline.installDependencies(targets, { existing })
  );
  return { fromManifest, specs: targets, result };
}
