#!/usr/bin/env node

/**
 * actr-deps CLI entry point.
 */

import { readFileSync } from 'fs';
import { Command } from 'commander';
import { setupInstallCommand } from './commands/install.js';
import { setupDiscoveryCommand } from './commands/discovery.js';
import { setupCheckCommand } from './commands/check.js';
import { setupCacheCommand } from './commands/cache.js';
import { parsePositiveInt } from './commands/shared.js';
import { formatError } from './utils/errors.js';
import { logger } from './utils/logger.js';

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error });
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('actr-deps')
  .description('Check-first dependency manager for Actor-RTC services')
  .version(readVersion())
  .option('--cwd <dir>', 'project directory')
  .option('-c, --config <path>', 'manifest path, relative to the project directory')
  .option('--signaling <url>', 'signaling WebSocket URL')
  .option('--timeout <ms>', 'network timeout in milliseconds', parsePositiveInt);

setupInstallCommand(program);
setupDiscoveryCommand(program);
setupCheckCommand(program);
setupCacheCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = 1;
});
