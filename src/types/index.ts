/**
 * Core value types shared by components, pipelines and commands.
 */

export interface Fingerprint {
  algorithm: string;
  value: string;
}

export interface ActrType {
  manufacturer: string;
  name: string;
}

export interface MethodDefinition {
  name: string;
  inputType: string;
  outputType: string;
}

export interface ServiceDefinition {
  name: string;
  methods: MethodDefinition[];
}

export interface ProtoFile {
  /** Package name or file name (e.g. `echo.v1` or `echo.v1.proto`) */
  name: string;
  /** Relative path the file is (or would be) stored under */
  path: string;
  content: string;
  /** Service definitions, parsed from `content` on first read */
  readonly services: ServiceDefinition[];
}

export interface ServiceInfo {
  name: string;
  version: string;
  description?: string;
  uri: string;
  fingerprint: string;
  methods: MethodDefinition[];
  actrType: ActrType;
  tags: string[];
  /** Unix seconds */
  publishedAt?: number;
}

export interface ServiceDetails {
  info: ServiceInfo;
  protoFiles: ProtoFile[];
  dependencies: string[];
}

export interface DependencySpec {
  /** Service name (the type name, without manufacturer) */
  name: string;
  /** Local name under `dependencies.<alias>` in the manifest */
  alias: string;
  uri: string;
  version?: string;
  /** `algorithm:value` string form */
  fingerprint?: string;
}

export interface ResolvedDependency {
  spec: DependencySpec;
  /** Empty until fingerprint validation fills it in */
  fingerprint: string;
  protoFiles: ProtoFile[];
  /** Actor type reported by discovery */
  actrType?: ActrType;
}

export type ConflictType = 'VersionConflict' | 'FingerprintMismatch';

export interface ConflictReport {
  dependencyA: string;
  dependencyB: string;
  conflictType: ConflictType;
  description: string;
}

export interface DependencyGraph {
  nodes: string[];
  edges: Array<[string, string]>;
  hasCycles: boolean;
}

export interface ServiceFilter {
  namePattern?: string;
  versionRange?: string;
  tags?: string[];
  /** Forwarded to the signaling server */
  manufacturer?: string;
  /** Forwarded to the signaling server */
  limit?: number;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unknown';

export interface AvailabilityStatus {
  isAvailable: boolean;
  lastSeen?: Date;
  health: HealthStatus;
}

export interface ConnectivityOptions {
  timeoutMs?: number;
}

export interface ConnectivityStatus {
  isReachable: boolean;
  responseTimeMs?: number;
  error?: string;
}

export interface LatencyInfo {
  minMs: number;
  maxMs: number;
  avgMs: number;
  samples: number;
}

export interface NetworkCheckResult {
  address: string;
  connectivity: ConnectivityStatus;
  health: HealthStatus;
  latency?: LatencyInfo;
}

// ---------------------------------------------------------------------------
// Validation report
// ---------------------------------------------------------------------------

export interface ConfigValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface DependencyValidation {
  dependency: string;
  isAvailable: boolean;
  resolvedUri?: string;
  error?: string;
}

export interface NetworkValidation {
  dependency: string;
  address: string;
  isReachable: boolean;
  latencyMs?: number;
  error?: string;
}

export interface FingerprintValidation {
  dependency: string;
  /** Absent when the dependency spec pinned no fingerprint */
  expected?: Fingerprint;
  actual?: Fingerprint;
  isValid: boolean;
  error?: string;
}

export interface ValidationReport {
  configValidation: ConfigValidation;
  dependencyValidation: DependencyValidation[];
  networkValidation: NetworkValidation[];
  fingerprintValidation: FingerprintValidation[];
  conflicts: ConflictReport[];
  /** Dependencies with fingerprints and proto files gathered during validation */
  resolved: ResolvedDependency[];
}

// ---------------------------------------------------------------------------
// Install, cache, config
// ---------------------------------------------------------------------------

export interface InstallResult {
  installedDependencies: ResolvedDependency[];
  cacheUpdates: number;
  updatedConfig: boolean;
  updatedLockFile: boolean;
  warnings: string[];
}

export interface ConfigBackup {
  originalPath: string;
  backupPath: string;
  timestamp: Date;
}

export interface CachedProto {
  files: ProtoFile[];
  fingerprint: Fingerprint;
  cachedAt: Date;
  expiresAt?: Date;
}

export interface CacheStats {
  totalEntries: number;
  totalSizeBytes: number;
  hitRate: number;
  missRate: number;
}

export interface ManifestDependency {
  alias: string;
  /** Explicit `name` key, falls back to the actor type's name */
  name: string;
  actrType?: ActrType;
  fingerprint?: string;
}

export interface ProjectManifest {
  edition?: number;
  package: {
    name: string;
    description?: string;
    actrType: ActrType;
  };
  dependencies: ManifestDependency[];
  signalingUrl?: string;
  realm?: number;
}

export interface LockEntry {
  alias: string;
  name: string;
  actrType: string;
  fingerprint: string;
  files: string[];
  /** `algorithm:value` hash of the cached proto files; absent when none were cached */
  protoFingerprint?: string;
}

export interface LockFile {
  version: number;
  fingerprint: string;
  generatedAt: string;
  dependencies: LockEntry[];
}

export interface CommandResult<T = unknown> {
  success: boolean;
  error?: string;
  data?: T;
}
