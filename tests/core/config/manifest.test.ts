import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseManifest } from '../../../src/core/config/manifest.js';
import { ConfigError } from '../../../src/utils/errors.js';

const FIXTURE = readFileSync(fileURLToPath(new URL('../../fixtures/Actr.toml', import.meta.url)), 'utf-8');

describe('parseManifest', () => {
  it('reads package, dependencies and system settings', () => {
    const manifest = parseManifest(FIXTURE);

    expect(manifest.edition).toBe(1);
    expect(manifest.package).toEqual({
      name: 'echo-client',
      description: 'Calls echo',
      actrType: { manufacturer: 'acme', name: 'echo-client' }
    });
    expect(manifest.signalingUrl).toBe('ws://signal.example.test:8081');
    expect(manifest.realm).toBe(1001);
  });

  it('accepts string and table dependency forms', () => {
    expect(parseManifest(FIXTURE).dependencies).toEqual([
      { alias: 'echo', name: 'echo', actrType: { manufacturer: 'acme', name: 'echo' }, fingerprint: 'sha256:1' },
      { alias: 'chat', name: 'chat', actrType: { manufacturer: 'globex', name: 'chat' } },
      { alias: 'legacy', name: 'old-svc', actrType: { manufacturer: 'acme', name: 'svc' }, fingerprint: undefined }
    ]);
  });

  it('falls back to empty values for a sparse manifest', () => {
    const manifest = parseManifest('[dependencies]\nodd = 5\n');
    expect(manifest.package).toEqual({
      name: '',
      description: undefined,
      actrType: { manufacturer: '', name: '' }
    });
    expect(manifest.dependencies).toEqual([{ alias: 'odd', name: 'odd' }]);
    expect(manifest.signalingUrl).toBeUndefined();
    expect(manifest.realm).toBeUndefined();
  });

  it('accepts realm as an alias of realm_id', () => {
    expect(parseManifest('[system.deployment]\nrealm = 7\n').realm).toBe(7);
  });

  it('reports syntax errors with the file name', () => {
    expect(() => parseManifest('[package\nname = 1', 'Custom.toml')).toThrow(ConfigError);
    expect(() => parseManifest('[package\nname = 1', 'Custom.toml')).toThrow(/^Failed to parse Custom\.toml: /);
  });
});
