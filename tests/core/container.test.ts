import { describe, it, expect, afterEach } from 'vitest';
import {
  INSTALL_COMPONENTS,
  ServiceContainer,
  VALIDATION_COMPONENTS,
  createDefaultContainer
} from '../../src/core/container.js';
import { TomlConfigManager } from '../../src/core/config/config-manager.js';
import { NetworkServiceDiscovery } from '../../src/core/discovery/service-discovery.js';
import { ComponentNotRegisteredError } from '../../src/utils/errors.js';
import { FakeServiceDiscovery, makeTempDir, removeTempDir } from '../helpers/fakes.js';
import { testContext } from '../helpers/project.js';

describe('ServiceContainer', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await removeTempDir(dir);
    dir = undefined;
  });

  async function defaultContainer() {
    dir = await makeTempDir('container');
    return createDefaultContainer(testContext(dir));
  }

  it('wires the default implementations', async () => {
    const container = await defaultContainer();

    container.validate(INSTALL_COMPONENTS);
    expect(container.get('configManager')).toBeInstanceOf(TomlConfigManager);
    expect(container.get('serviceDiscovery')).toBeInstanceOf(NetworkServiceDiscovery);
    expect(container.get('serviceDiscovery').endpointAddress).toBe('127.0.0.1:8080');
  });

  it('builds each pipeline once and shares the validation pipeline', async () => {
    const container = await defaultContainer();

    const validation = container.getValidationPipeline();
    expect(container.getValidationPipeline()).toBe(validation);
    expect(container.getInstallPipeline()).toBe(container.getInstallPipeline());
    expect(container.getInstallPipeline().validationPipeline).toBe(validation);
  });

  it('rebuilds pipelines after a component is replaced', async () => {
    const container = await defaultContainer();
    const before = container.getValidationPipeline();

    const discovery = new FakeServiceDiscovery();
    container.register('serviceDiscovery', discovery);

    const after = container.getValidationPipeline();
    expect(after).not.toBe(before);
    expect(after.serviceDiscovery).toBe(discovery);
  });

  it('names the first missing component', () => {
    const container = new ServiceContainer({ lockFilePath: 'Actr.lock.toml' });
    container.register('serviceDiscovery', new FakeServiceDiscovery());

    expect(() => container.validate(VALIDATION_COMPONENTS)).toThrow(ComponentNotRegisteredError);
    expect(() => container.validate(VALIDATION_COMPONENTS)).toThrow('Component not registered: configManager');
    expect(() => container.get('cacheManager')).toThrow('Component not registered: cacheManager');
    expect(() => container.getInstallPipeline()).toThrow(ComponentNotRegisteredError);
    expect(container.has('serviceDiscovery')).toBe(true);
    expect(container.has('cacheManager')).toBe(false);
  });

  it('closes discovery on dispose', () => {
    const discovery = new FakeServiceDiscovery();
    const container = new ServiceContainer({ lockFilePath: 'Actr.lock.toml' }).register('serviceDiscovery', discovery);

    container.dispose();

    expect(discovery.closed).toBe(true);
  });
});
