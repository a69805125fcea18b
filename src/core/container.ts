/**
 * Component container
 *
 * A typed registry of the six components plus the two pipelines built from
 * them. Pipelines are built on first request, once every component they need
 * is registered, and reused afterwards. Registering a component again drops
 * the built pipelines so the next request picks up the replacement.
 */

import type {
  CacheManager,
  ConfigManager,
  DependencyResolver,
  FingerprintValidator,
  NetworkValidator,
  ServiceDiscovery
} from './components/types.js';
import type { ProjectContext } from './project-context.js';
import { TomlConfigManager } from './config/config-manager.js';
import { ProjectCacheManager } from './cache/cache-manager.js';
import { TcpNetworkValidator } from './network/network-validator.js';
import { Sha256FingerprintValidator } from './fingerprint/fingerprint-validator.js';
import { NetworkServiceDiscovery } from './discovery/service-discovery.js';
import { DefaultDependencyResolver } from './dependency-resolver/index.js';
import { ValidationPipeline } from './pipelines/validation-pipeline.js';
import { InstallPipeline } from './pipelines/install-pipeline.js';
import { ComponentNotRegisteredError } from '../utils/errors.js';

export interface ComponentRegistry {
  configManager: ConfigManager;
  cacheManager: CacheManager;
  networkValidator: NetworkValidator;
  fingerprintValidator: FingerprintValidator;
  serviceDiscovery: ServiceDiscovery;
  dependencyResolver: DependencyResolver;
}

export type ComponentName = keyof ComponentRegistry;

export const VALIDATION_COMPONENTS: readonly ComponentName[] = [
  'configManager',
  'dependencyResolver',
  'serviceDiscovery',
  'networkValidator',
  'fingerprintValidator'
];

export const INSTALL_COMPONENTS: readonly ComponentName[] = [...VALIDATION_COMPONENTS, 'cacheManager'];

export interface ServiceContainerOptions {
  lockFilePath: string;
}

export class ServiceContainer {
  private readonly components: Partial<ComponentRegistry> = {};
  private validationPipeline: ValidationPipeline | undefined;
  private installPipeline: InstallPipeline | undefined;

  constructor(private readonly options: ServiceContainerOptions) {}

  register<K extends ComponentName>(name: K, component: ComponentRegistry[K]): this {
    this.components[name] = component;
    this.validationPipeline = undefined;
    this.installPipeline = undefined;
    return this;
  }

  has(name: ComponentName): boolean {
    return this.components[name] !== undefined;
  }

  get<K extends ComponentName>(name: K): ComponentRegistry[K] {
    const component = this.components[name];
    if (component === undefined) {
      throw new ComponentNotRegisteredError(name);
    }
    return component;
  }

  /** Throws for the first required component that is missing */
  validate(required: readonly ComponentName[]): void {
    for (const name of required) {
      if (!this.has(name)) {
        throw new ComponentNotRegisteredError(name);
      }
    }
  }

  getValidationPipeline(): ValidationPipeline {
    if (!this.validationPipeline) {
      this.validate(VALIDATION_COMPONENTS);
      this.validationPipeline = new ValidationPipeline({
        configManager: this.get('configManager'),
        dependencyResolver: this.get('dependencyResolver'),
        serviceDiscovery: this.get('serviceDiscovery'),
        networkValidator: this.get('networkValidator'),
        fingerprintValidator: this.get('fingerprintValidator')
      });
    }
    return this.validationPipeline;
  }

  getInstallPipeline(): InstallPipeline {
    if (!this.installPipeline) {
      this.validate(INSTALL_COMPONENTS);
      this.installPipeline = new InstallPipeline(this.getValidationPipeline(), this.get('cacheManager'), {
        lockFilePath: this.options.lockFilePath
      });
    }
    return this.installPipeline;
  }

  /** Close the signaling connection, if one was opened */
  dispose(): void {
    this.components.serviceDiscovery?.close();
  }
}

export function createDefaultContainer(
  context: ProjectContext,
  overrides: Partial<ComponentRegistry> = {}
): ServiceContainer {
  const container = new ServiceContainer({ lockFilePath: context.lockFilePath });

  container
    .register('configManager', overrides.configManager ?? new TomlConfigManager(context.manifestPath))
    .register('cacheManager', overrides.cacheManager ?? new ProjectCacheManager(context.projectRoot))
    .register(
      'networkValidator',
      overrides.networkValidator ?? new TcpNetworkValidator({ timeoutMs: context.networkTimeoutMs })
    )
    .register('fingerprintValidator', overrides.fingerprintValidator ?? new Sha256FingerprintValidator())
    .register(
      'serviceDiscovery',
      overrides.serviceDiscovery ??
        new NetworkServiceDiscovery({
          signalingUrl: context.signalingUrl,
          actrType: context.actrType,
          realm: context.realm,
          requestTimeoutMs: context.requestTimeoutMs
        })
    )
    .register('dependencyResolver', overrides.dependencyResolver ?? new DefaultDependencyResolver());

  return container;
}
