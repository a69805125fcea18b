/**
 * Install Command
 *
 * Check-first install: every dependency is validated before anything is
 * written, and the manifest is restored if a later step fails.
 */

import { Command } from 'commander';
import type { DependencySpec, InstallResult } from '../types/index.js';
import { parseSpec } from '../core/dependency-resolver/index.js';
import { INSTALL_COMPONENTS } from '../core/container.js';
import { runInstallFlow } from '../core/flows/install-flow.js';
import { DependencyError, withErrorHandling } from '../utils/errors.js';
import { getTreeConnector, pluralize } from '../utils/formatters.js';
import { dim, runWithContainer } from './shared.js';

interface InstallOptions {
  alias?: string;
  fingerprint?: string;
}

export function parsePackageArguments(packages: string[], options: InstallOptions): DependencySpec[] {
  if ((options.alias || options.fingerprint) && packages.length !== 1) {
    throw new DependencyError('--alias and --fingerprint apply to exactly one package');
  }
  return packages.map(raw => parseSpec(raw, { alias: options.alias, fingerprint: options.fingerprint }));
}

function printInstallResult(result: InstallResult, fromManifest: boolean): void {
  const installed = result.installedDependencies;
  if (installed.length === 0) {
    console.log(fromManifest ? 'No dependencies declared in Actr.toml.' : 'Nothing to install.');
    return;
  }

  console.log(`✓ Installed ${pluralize(installed.length, 'dependency', 'dependencies')}`);
  installed.forEach((dependency, index) => {
    const connector = getTreeConnector(index === installed.length - 1);
    const files = pluralize(dependency.protoFiles.length, 'proto file');
    console.log(`${connector}${dependency.spec.alias} ${dim(`${dependency.fingerprint} (${files})`)}`);
  });

  for (const warning of result.warnings) {
    console.log(`⚠️  ${warning}`);
  }
  if (result.updatedLockFile) {
    console.log(dim('Updated Actr.lock.toml'));
  }
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .argument('[packages...]', 'actr:// URIs, manufacturer+name[@version] or service names')
    .description('Validate and install dependencies (all manifest dependencies when none are given)')
    .option('--alias <alias>', 'alias to record the package under')
    .option('--fingerprint <fingerprint>', 'fingerprint to pin (algorithm:value)')
    .action(withErrorHandling(async (packages: string[], options: InstallOptions, command: Command) => {
      const specs = parsePackageArguments(packages, options);
      await runWithContainer(command, INSTALL_COMPONENTS, async ({ container }) => {
        const { fromManifest, result } = await runInstallFlow(container, specs);
        printInstallResult(result, fromManifest);
      });
    }));
}
