/**
 * Component contracts
 *
 * One interface per capability. Pipelines depend on these, never on the
 * concrete classes, so tests can swap any of them for a fake.
 */

import type {
  AvailabilityStatus,
  CachedProto,
  CacheStats,
  ConfigBackup,
  ConfigValidation,
  ConflictReport,
  ConnectivityOptions,
  ConnectivityStatus,
  DependencyGraph,
  DependencySpec,
  Fingerprint,
  HealthStatus,
  LatencyInfo,
  NetworkCheckResult,
  ProjectManifest,
  ProtoFile,
  ResolvedDependency,
  ServiceDetails,
  ServiceFilter,
  ServiceInfo
} from '../../types/index.js';

export interface ConfigManager {
  readonly manifestPath: string;
  readonly projectRoot: string;
  loadConfig(): Promise<ProjectManifest>;
  updateDependency(spec: DependencySpec): Promise<void>;
  backupConfig(): Promise<ConfigBackup>;
  restoreBackup(backup: ConfigBackup): Promise<void>;
  removeBackup(backup: ConfigBackup): Promise<void>;
  validateConfig(): Promise<ConfigValidation>;
  extractDependencySpecs(): Promise<DependencySpec[]>;
}

export interface CacheManager {
  cacheProto(serviceName: string, files: ProtoFile[]): Promise<void>;
  getCachedProto(serviceName: string): Promise<CachedProto | undefined>;
  /** Files currently cached for a service ([] when none); not counted as a lookup */
  snapshotProto(serviceName: string): Promise<ProtoFile[]>;
  invalidateCache(serviceName: string): Promise<void>;
  clearCache(): Promise<void>;
  getCacheStats(): Promise<CacheStats>;
}

export interface NetworkValidator {
  checkConnectivity(address: string, options?: ConnectivityOptions): Promise<ConnectivityStatus>;
  verifyServiceHealth(address: string): Promise<HealthStatus>;
  testLatency(address: string): Promise<LatencyInfo>;
  batchCheck(addresses: string[]): Promise<NetworkCheckResult[]>;
}

export interface FingerprintValidator {
  computeServiceFingerprint(service: ServiceInfo): Fingerprint;
  verifyFingerprint(expected: Fingerprint, actual: Fingerprint): boolean;
  computeProjectFingerprint(projectRoot: string): Promise<Fingerprint>;
  generateLockFingerprint(resolved: ResolvedDependency[]): Fingerprint;
}

export interface ServiceDiscovery {
  /** host:port the discovery client connects through */
  readonly endpointAddress: string;
  discoverServices(filter?: ServiceFilter): Promise<ServiceInfo[]>;
  getServiceDetails(name: string): Promise<ServiceDetails>;
  checkServiceAvailability(name: string): Promise<AvailabilityStatus>;
  getServiceProto(name: string): Promise<ProtoFile[]>;
  close(): void;
}

export interface DependencyResolver {
  resolveDependencies(specs: DependencySpec[]): Promise<ResolvedDependency[]>;
  checkConflicts(resolved: ResolvedDependency[]): ConflictReport[];
  buildDependencyGraph(resolved: ResolvedDependency[]): DependencyGraph;
}
