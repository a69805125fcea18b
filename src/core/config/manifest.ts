/**
 * Actr.toml parsing
 *
 * The manifest is read leniently: missing or mistyped fields come back empty
 * so validateConfig() can report them, while TOML syntax errors throw.
 *
 *   [package]
 *   name = "my-service"
 *   [package.actr_type]
 *   manufacturer = "acme"
 *   name = "my-service"
 *
 *   [dependencies]
 *   echo = { actr_type = "acme+echo", fingerprint = "sha256:…" }
 *
 *   [system.signaling]
 *   url = "ws://127.0.0.1:8080"
 *   [system.deployment]
 *   realm_id = 1001
 */

import { parse } from 'smol-toml';
import type { ActrType, ManifestDependency, ProjectManifest } from '../../types/index.js';
import { parseActrType } from '../actr-uri.js';
import { ConfigError } from '../../utils/errors.js';

export const MANIFEST_FILE_NAME = 'Actr.toml';
export const LOCK_FILE_NAME = 'Actr.lock.toml';

export type TomlTable = Record<string, unknown>;

export function isTomlTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Parse TOML text into a generic table; syntax errors become ConfigError */
export function parseToml(text: string, source: string): TomlTable {
  try {
    return parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${source}: ${detail}`);
  }
}

export function parseManifest(text: string, source = MANIFEST_FILE_NAME): ProjectManifest {
  const doc = parseToml(text, source);
  const pkg = table(doc, 'package');
  const system = table(doc, 'system');
  const signaling = system ? table(system, 'signaling') : undefined;
  const deployment = system ? table(system, 'deployment') : undefined;

  const packageName = pkg ? str(pkg, 'name') ?? '' : '';
  const edition = integer(doc, 'edition');

  return {
    edition,
    package: {
      name: packageName,
      description: pkg ? str(pkg, 'description') : undefined,
      actrType: (pkg ? actrTypeOf(pkg['actr_type']) : undefined) ?? { manufacturer: '', name: packageName }
    },
    dependencies: dependenciesOf(table(doc, 'dependencies')),
    signalingUrl: signaling ? str(signaling, 'url') : undefined,
    realm: deployment ? integer(deployment, 'realm_id') ?? integer(deployment, 'realm') : undefined
  };
}

function dependenciesOf(deps: TomlTable | undefined): ManifestDependency[] {
  if (!deps) return [];

  return Object.entries(deps).map(([alias, value]) => {
    if (typeof value === 'string') {
      const actrType = actrTypeOf(value);
      return { alias, name: actrType?.name || alias, actrType };
    }
    if (!isTomlTable(value)) {
      return { alias, name: alias };
    }
    const actrType = actrTypeOf(value['actr_type']);
    return {
      alias,
      name: str(value, 'name') ?? (actrType?.name || alias),
      actrType,
      fingerprint: str(value, 'fingerprint')
    };
  });
}

/** `"acme+echo"` or `{ manufacturer = "acme", name = "echo" }` */
function actrTypeOf(value: unknown): ActrType | undefined {
  if (typeof value === 'string') {
    return parseActrType(value);
  }
  if (isTomlTable(value)) {
    return { manufacturer: str(value, 'manufacturer') ?? '', name: str(value, 'name') ?? '' };
  }
  return undefined;
}

function table(parent: TomlTable, key: string): TomlTable | undefined {
  const value = parent[key];
  return isTomlTable(value) ? value : undefined;
}

function str(parent: TomlTable, key: string): string | undefined {
  const value = parent[key];
  return typeof value === 'string' ? value : undefined;
}

function integer(parent: TomlTable, key: string): number | undefined {
  const value = parent[key];
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  return undefined;
}
