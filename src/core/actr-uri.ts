/**
 * actr:// service identity URIs
 *
 *   actr://<service-name>/[?version=<v>][&fingerprint=<algo:hash>]
 *
 * `<service-name>` is either a bare type name (`echo-service`) or a qualified
 * actor type (`acme+echo-service`). A leading realm (`5:`) and a trailing
 * `@<version>` are accepted as well; the query `version` wins over `@`.
 */

import type { ActrType, Fingerprint } from '../types/index.js';
import { InvalidUriError } from '../utils/errors.js';

export const ACTR_SCHEME = 'actr://';
export const DEFAULT_FINGERPRINT_ALGORITHM = 'sha256';

export interface ParsedActrUri {
  /** Service segment as written, minus realm and @version */
  name: string;
  manufacturer?: string;
  typeName: string;
  realm?: number;
  version?: string;
  fingerprint?: string;
}

export function isActrUri(value: string): boolean {
  return value.startsWith(ACTR_SCHEME);
}

export function parseActrUri(uri: string): ParsedActrUri {
  if (!isActrUri(uri)) {
    throw new InvalidUriError(uri, `expected the ${ACTR_SCHEME} scheme`);
  }

  const rest = uri.slice(ACTR_SCHEME.length);
  const nameEnd = rest.search(/[/?]/);
  let segment = (nameEnd === -1 ? rest : rest.slice(0, nameEnd)).trim();

  let realm: number | undefined;
  const realmMatch = /^(\d+):(.*)$/.exec(segment);
  if (realmMatch) {
    realm = Number(realmMatch[1]);
    segment = realmMatch[2];
  }

  let atVersion: string | undefined;
  const at = segment.indexOf('@');
  if (at !== -1) {
    atVersion = segment.slice(at + 1) || undefined;
    segment = segment.slice(0, at);
  }

  if (!segment) {
    throw new InvalidUriError(uri, 'missing service name');
  }

  const actrType = parseActrType(segment);
  if (!actrType.name || (segment.includes('+') && !actrType.manufacturer)) {
    throw new InvalidUriError(uri, 'expected <manufacturer>+<name>');
  }

  const query = parseQuery(uri);

  return {
    name: segment,
    manufacturer: actrType.manufacturer || undefined,
    typeName: actrType.name,
    realm,
    version: query.get('version') ?? atVersion,
    fingerprint: query.get('fingerprint')
  };
}

function parseQuery(uri: string): Map<string, string> {
  const params = new Map<string, string>();
  const queryStart = uri.indexOf('?');
  if (queryStart === -1) return params;

  for (const pair of uri.slice(queryStart + 1).split('&')) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    const key = pair.slice(0, eq);
    const value = decodeQueryValue(uri, key, pair.slice(eq + 1));
    if (value && !params.has(key)) {
      params.set(key, value);
    }
  }
  return params;
}

function decodeQueryValue(uri: string, key: string, raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new InvalidUriError(uri, `malformed percent-encoding in '${key}'`);
  }
}

export function formatActrUri(options: { name: string; version?: string; fingerprint?: string }): string {
  const params: string[] = [];
  if (options.version) params.push(`version=${encodeURIComponent(options.version)}`);
  if (options.fingerprint) params.push(`fingerprint=${options.fingerprint}`);
  return `${ACTR_SCHEME}${options.name}/${params.length > 0 ? `?${params.join('&')}` : ''}`;
}

/** `acme+echo` → { manufacturer: 'acme', name: 'echo' }; a bare name has an empty manufacturer */
export function parseActrType(value: string): ActrType {
  const plus = value.indexOf('+');
  if (plus === -1) {
    return { manufacturer: '', name: value.trim() };
  }
  return {
    manufacturer: value.slice(0, plus).trim(),
    name: value.slice(plus + 1).trim()
  };
}

export function formatActrType(actrType: ActrType): string {
  return actrType.manufacturer ? `${actrType.manufacturer}+${actrType.name}` : actrType.name;
}

export function parseFingerprint(value: string): Fingerprint {
  const colon = value.indexOf(':');
  if (colon <= 0) {
    return { algorithm: DEFAULT_FINGERPRINT_ALGORITHM, value };
  }
  return { algorithm: value.slice(0, colon), value: value.slice(colon + 1) };
}

export function formatFingerprint(fingerprint: Fingerprint): string {
  return `${fingerprint.algorithm}:${fingerprint.value}`;
}

/** `aaa` → `sha256:aaa`; blank input stays undefined */
export function normalizeFingerprint(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? formatFingerprint(parseFingerprint(trimmed)) : undefined;
}
