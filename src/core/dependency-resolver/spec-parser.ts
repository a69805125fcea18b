import type { DependencySpec } from '../../types/index.js';
import { formatActrUri, isActrUri, normalizeFingerprint, parseActrType, parseActrUri } from '../actr-uri.js';
import { DependencyError } from '../../utils/errors.js';

export interface ParseSpecOptions {
  alias?: string;
  fingerprint?: string;
}

const SERVICE_NAME = /^[A-Za-z0-9_.-]+(\+[A-Za-z0-9_.-]+)?$/;

/**
 * Turn a package argument into a dependency spec.
 *
 * Accepted forms:
 *   actr://acme+echo/?version=1.0.0&fingerprint=sha256:…
 *   acme+echo@1.0.0
 *   echo
 *
 * The alias defaults to the type name (the part after `+`). A bare
 * fingerprint is read as sha256.
 */
export function parseSpec(raw: string, options: ParseSpecOptions = {}): DependencySpec {
  const input = raw.trim();

  if (isActrUri(input)) {
    const parsed = parseActrUri(input);
    const fingerprint = normalizeFingerprint(options.fingerprint ?? parsed.fingerprint);
    return {
      name: parsed.typeName,
      alias: options.alias ?? parsed.typeName,
      uri: options.fingerprint
        ? formatActrUri({ name: parsed.name, version: parsed.version, fingerprint })
        : input,
      version: parsed.version,
      fingerprint
    };
  }

  const at = input.lastIndexOf('@');
  const serviceName = at > 0 ? input.slice(0, at) : input;
  const version = at > 0 ? input.slice(at + 1) || undefined : undefined;

  if (!SERVICE_NAME.test(serviceName)) {
    throw new DependencyError(
      `Invalid package '${raw}': expected actr://<service>/, <service>@<version> or <service>`
    );
  }

  const actrType = parseActrType(serviceName);
  const fingerprint = normalizeFingerprint(options.fingerprint);
  return {
    name: actrType.name,
    alias: options.alias ?? actrType.name,
    uri: formatActrUri({ name: serviceName, version, fingerprint }),
    version,
    fingerprint
  };
}
