import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { basename, join } from 'path';
import { TomlConfigManager } from '../../../src/core/config/config-manager.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../helpers/fakes.js';

const MANIFEST = `# Echo client
[package]
name = "echo-client"

[dependencies]
echo = { actr_type = "acme+echo", fingerprint = "sha256:1" }  # keep me

[system.signaling]
url = "ws://127.0.0.1:8080"
`;

describe('TomlConfigManager', () => {
  let dir: string;
  let manifestPath: string;
  let config: TomlConfigManager;

  beforeEach(async () => {
    dir = await makeTempDir('config');
    manifestPath = join(dir, 'Actr.toml');
    await fs.writeFile(manifestPath, MANIFEST);
    config = new TomlConfigManager(manifestPath);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  const read = (): Promise<string> => fs.readFile(manifestPath, 'utf-8');

  it('loads the manifest', async () => {
    const manifest = await config.loadConfig();
    expect(manifest.package.name).toBe('echo-client');
    expect(manifest.dependencies.map(dependency => dependency.alias)).toEqual(['echo']);
    expect(config.projectRoot).toBe(dir);
  });

  it('extracts dependency specs', async () => {
    expect(await config.extractDependencySpecs()).toEqual([
      { name: 'echo', alias: 'echo', uri: 'actr://acme+echo/?fingerprint=sha256:1', fingerprint: 'sha256:1' }
    ]);
  });

  it('adds a dependency and leaves every other byte alone', async () => {
    await config.updateDependency({
      name: 'chat',
      alias: 'chat',
      uri: 'actr://globex+chat/',
      fingerprint: 'sha256:2'
    });

    expect(await read()).toBe(
      MANIFEST.replace(
        '# keep me\n',
        '# keep me\nchat = { actr_type = "globex+chat", fingerprint = "sha256:2" }\n'
      )
    );
  });

  it('writes name only when the alias differs', async () => {
    await config.updateDependency({ name: 'echo', alias: 'my-echo', uri: 'actr://acme+echo/' });
    expect(await read()).toContain('my-echo = { name = "echo", actr_type = "acme+echo" }\n');
  });

  it('overwrites an existing alias', async () => {
    await config.updateDependency({
      name: 'echo',
      alias: 'echo',
      uri: 'actr://acme+echo/?fingerprint=sha256:9'
    });
    expect(await read()).toBe(
      MANIFEST.replace(
        'echo = { actr_type = "acme+echo", fingerprint = "sha256:1" }  # keep me',
        'echo = { actr_type = "acme+echo", fingerprint = "sha256:9" }'
      )
    );
  });

  it('refuses an edit that does not re-parse and leaves the file untouched', async () => {
    const broken = 'dependencies = "not a table"\n';
    await fs.writeFile(manifestPath, broken);

    await expect(
      config.updateDependency({ name: 'echo', alias: 'echo', uri: 'actr://acme+echo/' })
    ).rejects.toThrow(ConfigError);
    expect(await read()).toBe(broken);
  });

  describe('backups', () => {
    it('copies the manifest to <file>.bak.<unix-seconds>', async () => {
      const before = Math.floor(Date.now() / 1000);
      const backup = await config.backupConfig();

      expect(backup.originalPath).toBe(manifestPath);
      expect(basename(backup.backupPath)).toMatch(/^Actr\.toml\.bak\.\d+$/);
      expect(Number(backup.backupPath.split('.bak.')[1])).toBeGreaterThanOrEqual(before);
      expect(await fs.readFile(backup.backupPath, 'utf-8')).toBe(MANIFEST);
    });

    it('fails when there is no manifest', async () => {
      await fs.rm(manifestPath);
      await expect(config.backupConfig()).rejects.toThrow(`Config file not found: ${manifestPath}`);
    });

    it('restores the original bytes and consumes the backup', async () => {
      const backup = await config.backupConfig();
      await fs.writeFile(manifestPath, 'changed');

      await config.restoreBackup(backup);

      expect(await read()).toBe(MANIFEST);
      await expect(fs.access(backup.backupPath)).rejects.toThrow();
      await expect(config.restoreBackup(backup)).rejects.toThrow('was already restored or removed');
    });

    it('removes a backup exactly once', async () => {
      const backup = await config.backupConfig();

      await config.removeBackup(backup);

      await expect(fs.access(backup.backupPath)).rejects.toThrow();
      await expect(config.removeBackup(backup)).rejects.toThrow(ConfigError);
      await expect(config.restoreBackup(backup)).rejects.toThrow(ConfigError);
    });
  });

  describe('validateConfig', () => {
    it('accepts a complete manifest', async () => {
      expect(await config.validateConfig()).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it('reports missing names and unpinned dependencies', async () => {
      await fs.writeFile(manifestPath, '[package]\nname = ""\n\n[dependencies]\nchat = { fingerprint = "sha256:1" }\necho = "acme+echo"\n');

      expect(await config.validateConfig()).toEqual({
        isValid: false,
        errors: ['package.name is required', "dependency 'chat' has no actr_type name"],
        warnings: ["dependency 'echo' has no pinned fingerprint"]
      });
    });

    it('reports syntax errors and missing files as invalid', async () => {
      await fs.writeFile(manifestPath, '[package');
      const syntax = await config.validateConfig();
      expect(syntax.isValid).toBe(false);
      expect(syntax.errors[0]).toMatch(/^Failed to parse Actr\.toml: /);

      await fs.rm(manifestPath);
      expect(await config.validateConfig()).toEqual({
        isValid: false,
        errors: [`Config file not found: ${manifestPath}`],
        warnings: []
      });
    });
  });
});
