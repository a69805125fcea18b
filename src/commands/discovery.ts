/**
 * Discovery Command
 *
 * Lists services registered with signaling and, with --add, records one of
 * them as a dependency after it passes validation.
 */

import { Command } from 'commander';
import type { ServiceFilter, ServiceInfo } from '../types/index.js';
import { formatActrType } from '../core/actr-uri.js';
import { VALIDATION_COMPONENTS, INSTALL_COMPONENTS } from '../core/container.js';
import { runAddDependencyFlow } from '../core/flows/add-dependency-flow.js';
import { DependencyError, withErrorHandling } from '../utils/errors.js';
import { pluralize } from '../utils/formatters.js';
import { dim, parsePositiveInt, runWithContainer } from './shared.js';

interface DiscoveryOptions {
  filter?: string;
  tag?: string[];
  serviceVersion?: string;
  manufacturer?: string;
  limit?: number;
  add?: string;
  alias?: string;
  install?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function toServiceFilter(options: DiscoveryOptions): ServiceFilter {
  return {
    namePattern: options.filter,
    tags: options.tag && options.tag.length > 0 ? options.tag : undefined,
    versionRange: options.serviceVersion,
    manufacturer: options.manufacturer,
    limit: options.limit
  };
}

/** Match `--add` against the service name, `mfr+name` or `mfr:name` */
export function findService(services: ServiceInfo[], wanted: string): ServiceInfo | undefined {
  return services.find(service => {
    const { manufacturer, name } = service.actrType;
    return (
      service.name === wanted ||
      formatActrType(service.actrType) === wanted ||
      `${manufacturer}:${name}` === wanted
    );
  });
}

function printServices(services: ServiceInfo[]): void {
  if (services.length === 0) {
    console.log('No services found.');
    return;
  }

  console.log(`Found ${pluralize(services.length, 'service')}:`);
  console.log();
  for (const service of services) {
    console.log(`📦 ${formatActrType(service.actrType)} ${dim(service.version)}`);
    if (service.description) {
      console.log(`   ${service.description}`);
    }
    if (service.tags.length > 0) {
      console.log(`   tags: ${service.tags.join(', ')}`);
    }
    console.log(dim(`   ${service.fingerprint || 'no fingerprint'}`));
  }
  console.log();
  console.log(dim("Tip: Use --add <name> to add a service as a dependency"));
}

export function setupDiscoveryCommand(program: Command): void {
  program
    .command('discovery')
    .description('Discover services registered with signaling')
    .option('-f, --filter <pattern>', 'service name pattern (glob)')
    .option('-t, --tag <tag>', 'require a tag (repeatable)', collect)
    .option('--service-version <version>', 'require an exact version tag')
    .option('-m, --manufacturer <manufacturer>', 'only services from this manufacturer')
    .option('-l, --limit <n>', 'maximum number of services', parsePositiveInt)
    .option('--add <name>', 'add the named service to Actr.toml')
    .option('--alias <alias>', 'alias for the added dependency')
    .option('--install', 'also cache protos and update the lock file when adding')
    .action(withErrorHandling(async (options: DiscoveryOptions, command: Command) => {
      const required = options.install ? INSTALL_COMPONENTS : VALIDATION_COMPONENTS;
      await runWithContainer(command, required, async ({ container }) => {
        const services = await container.get('serviceDiscovery').discoverServices(toServiceFilter(options));

        if (!options.add) {
          printServices(services);
          return;
        }

        const service = findService(services, options.add);
        if (!service) {
          throw new DependencyError(`Service not found: ${options.add}`);
        }
        const { spec, installResult } = await runAddDependencyFlow(container, {
          service,
          alias: options.alias,
          install: options.install
        });

        console.log(`✓ Added ${spec.alias} → ${formatActrType(service.actrType)}`);
        console.log(dim(`  ${spec.fingerprint ?? 'no fingerprint pinned'}`));
        if (installResult) {
          console.log(`✓ Cached ${pluralize(installResult.cacheUpdates, 'service')}`);
          installResult.warnings.forEach(warning => console.log(`⚠️  ${warning}`));
        } else {
          console.log(dim("Run 'actr-deps install' to cache its proto files"));
        }
      });
    }));
}
