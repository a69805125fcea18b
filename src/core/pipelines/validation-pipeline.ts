/**
 * Validation pipeline
 *
 * config → resolve → availability → network → fingerprint → conflicts → report
 *
 * Every stage records its failures per dependency and moves on; the pipeline
 * always produces a report. Callers decide what a failed report means.
 */

import type {
  ConfigValidation,
  DependencySpec,
  DependencyValidation,
  FingerprintValidation,
  NetworkCheckResult,
  NetworkValidation,
  ResolvedDependency,
  ValidationReport
} from '../../types/index.js';
import type {
  ConfigManager,
  DependencyResolver,
  FingerprintValidator,
  NetworkValidator,
  ServiceDiscovery
} from '../components/types.js';
import { formatFingerprint, parseActrUri, parseFingerprint } from '../actr-uri.js';
import { logger } from '../../utils/logger.js';

export interface ValidationComponents {
  configManager: ConfigManager;
  dependencyResolver: DependencyResolver;
  serviceDiscovery: ServiceDiscovery;
  networkValidator: NetworkValidator;
  fingerprintValidator: FingerprintValidator;
}

export interface ValidateDependenciesOptions {
  /**
   * Dependencies already in the manifest, checked for conflicts against the
   * new ones. An entry with the same alias and name as a new spec is being
   * replaced and is left out.
   */
  existing?: DependencySpec[];
}

export class ValidationPipeline {
  constructor(private readonly components: ValidationComponents) {}

  get configManager(): ConfigManager {
    return this.components.configManager;
  }

  get serviceDiscovery(): ServiceDiscovery {
    return this.components.serviceDiscovery;
  }

  get fingerprintValidator(): FingerprintValidator {
    return this.components.fingerprintValidator;
  }

  /** Validate the manifest and every dependency it declares */
  async validateProject(): Promise<ValidationReport> {
    const configValidation = await this.components.configManager.validateConfig();
    if (!configValidation.isValid) {
      return emptyReport(configValidation);
    }
    const specs = await this.components.configManager.extractDependencySpecs();
    return this.runChecks(configValidation, specs, []);
  }

  async validateDependencies(
    specs: DependencySpec[],
    options: ValidateDependenciesOptions = {}
  ): Promise<ValidationReport> {
    const configValidation = await this.components.configManager.validateConfig();
    const existing = (options.existing ?? []).filter(
      current => !specs.some(spec => spec.alias === current.alias && spec.name === current.name)
    );
    return this.runChecks(configValidation, specs, existing);
  }

  private async runChecks(
    configValidation: ConfigValidation,
    specs: DependencySpec[],
    existing: DependencySpec[]
  ): Promise<ValidationReport> {
    const { dependencyResolver, serviceDiscovery, networkValidator } = this.components;
    const report = emptyReport(configValidation);
    if (specs.length === 0) {
      return report;
    }

    const resolved = await dependencyResolver.resolveDependencies(specs);
    report.resolved = resolved;

    const address = serviceDiscovery.endpointAddress;
    const [networkResult] = await networkValidator.batchCheck([address]);

    for (const dependency of resolved) {
      const alias = dependency.spec.alias;
      logger.debug('Validating dependency', { alias, uri: dependency.spec.uri });

      let target: string;
      try {
        target = parseActrUri(dependency.spec.uri).name;
      } catch (error) {
        report.dependencyValidation.push({ dependency: alias, isAvailable: false, error: describe(error) });
        continue;
      }

      const availability = await this.checkAvailability(alias, target, dependency.spec.uri);
      report.dependencyValidation.push(availability);

      report.networkValidation.push(toNetworkValidation(alias, address, networkResult));

      if (availability.isAvailable) {
        report.fingerprintValidation.push(await this.checkFingerprint(dependency, target));
      }
    }

    const existingResolved = await dependencyResolver.resolveDependencies(existing);
    report.conflicts = dependencyResolver.checkConflicts([...existingResolved, ...resolved]);
    return report;
  }

  private async checkAvailability(alias: string, target: string, uri: string): Promise<DependencyValidation> {
    try {
      const status = await this.components.serviceDiscovery.checkServiceAvailability(target);
      return status.isAvailable
        ? { dependency: alias, isAvailable: true, resolvedUri: uri }
        : { dependency: alias, isAvailable: false, error: `Service '${target}' is not registered with signaling` };
    } catch (error) {
      return { dependency: alias, isAvailable: false, error: describe(error) };
    }
  }

  /**
   * Compare the pinned fingerprint with the advertised one. Fills in the
   * resolved dependency's actor type and proto files, and its fingerprint
   * when none was pinned; a pin is kept so conflicts are judged on it.
   */
  private async checkFingerprint(dependency: ResolvedDependency, target: string): Promise<FingerprintValidation> {
    const { serviceDiscovery, fingerprintValidator } = this.components;
    const alias = dependency.spec.alias;
    const expected = dependency.spec.fingerprint ? parseFingerprint(dependency.spec.fingerprint) : undefined;

    try {
      const details = await serviceDiscovery.getServiceDetails(target);
      if (!details.info.fingerprint) {
        return { dependency: alias, expected, isValid: false, error: `Service '${target}' advertises no fingerprint` };
      }

      const actual = fingerprintValidator.computeServiceFingerprint(details.info);
      const isValid = expected ? fingerprintValidator.verifyFingerprint(expected, actual) : true;

      if (dependency.fingerprint === '') {
        dependency.fingerprint = formatFingerprint(actual);
      }
      dependency.protoFiles = details.protoFiles;
      dependency.actrType = details.info.actrType;

      return { dependency: alias, expected, actual, isValid };
    } catch (error) {
      return { dependency: alias, expected, isValid: false, error: describe(error) };
    }
  }
}

function emptyReport(configValidation: ConfigValidation): ValidationReport {
  return {
    configValidation,
    dependencyValidation: [],
    networkValidation: [],
    fingerprintValidation: [],
    conflicts: [],
    resolved: []
  };
}

function toNetworkValidation(
  dependency: string,
  address: string,
  result: NetworkCheckResult | undefined
): NetworkValidation {
  if (!result) {
    return { dependency, address, isReachable: false, error: 'No network check result' };
  }
  return {
    dependency,
    address,
    isReachable: result.connectivity.isReachable,
    latencyMs: result.latency?.avgMs ?? result.connectivity.responseTimeMs,
    error: result.connectivity.error
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
