/**
 * Check Command
 *
 * Runs the validation pipeline without writing anything and prints the report.
 * With --lock it also compares Actr.lock.toml with the manifest and the
 * cached protos.
 */

import { Command } from 'commander';
import { INSTALL_COMPONENTS, VALIDATION_COMPONENTS } from '../core/container.js';
import { formatFingerprint } from '../core/actr-uri.js';
import { formatValidationReport, isValidationSuccess } from '../core/pipelines/validation-report.js';
import { formatLockVerification, verifyLockFile } from '../core/pipelines/lock-verification.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parsePackageArguments } from './install.js';
import { dim, runWithContainer } from './shared.js';

interface CheckOptions {
  lock?: boolean;
}

export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .argument('[packages...]', 'packages to check instead of the manifest dependencies')
    .description('Validate the manifest and its dependencies without changing anything')
    .option('--lock', 'also verify Actr.lock.toml against the manifest and the cached protos')
    .action(withErrorHandling(async (packages: string[], options: CheckOptions, command: Command) => {
      const specs = parsePackageArguments(packages, {});
      const required = options.lock ? INSTALL_COMPONENTS : VALIDATION_COMPONENTS;
      await runWithContainer(command, required, async ({ context, container }) => {
        const pipeline = container.getValidationPipeline();
        const configManager = container.get('configManager');
        const report =
          specs.length === 0
            ? await pipeline.validateProject()
            : await pipeline.validateDependencies(specs, {
                existing: await configManager.extractDependencySpecs()
              });

        console.log(formatValidationReport(report));
        let passed = isValidationSuccess(report);

        if (options.lock) {
          const verification = await verifyLockFile({
            lockFilePath: context.lockFilePath,
            dependencies: await configManager.extractDependencySpecs(),
            cacheManager: container.get('cacheManager')
          });
          console.log();
          console.log(formatLockVerification(verification));
          passed = passed && verification.issues.length === 0;
        }

        const fingerprint = await container.get('fingerprintValidator').computeProjectFingerprint(context.projectRoot);
        console.log();
        console.log(dim(`Project proto fingerprint: ${formatFingerprint(fingerprint)}`));

        if (!passed) {
          logger.debug('Check found problems', { dependencies: report.dependencyValidation.length });
          process.exitCode = 1;
        }
      });
    }));
}
