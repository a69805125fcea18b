/**
 * Proto file helpers: naming and service extraction.
 */

import protobuf from 'protobufjs';
import type { NamespaceBase } from 'protobufjs';
import type { ProtoFile, ServiceDefinition } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

const PROTO_EXTENSION = '.proto';

/** `echo.v1` → `echo.v1.proto`; names already ending in `.proto` are kept */
export function normalizeProtoFileName(name: string): string {
  return name.endsWith(PROTO_EXTENSION) ? name : `${name}${PROTO_EXTENSION}`;
}

/**
 * Extract service and rpc definitions from proto source.
 *
 * Imports are not resolved, so request and response types are reported as
 * written. Unparseable content yields no services.
 */
export function parseProtoServices(content: string): ServiceDefinition[] {
  let root: NamespaceBase;
  try {
    root = protobuf.parse(content, { keepCase: true }).root;
  } catch (error) {
    logger.debug('Proto source could not be parsed', { error });
    return [];
  }

  const services: ServiceDefinition[] = [];
  collectServices(root, services);
  return services;
}

function collectServices(namespace: NamespaceBase, out: ServiceDefinition[]): void {
  for (const child of namespace.nestedArray) {
    if (child instanceof protobuf.Service) {
      out.push({
        name: child.name,
        methods: child.methodsArray.map(method => ({
          name: method.name,
          inputType: method.requestType,
          outputType: method.responseType
        }))
      });
    } else if (child instanceof protobuf.Namespace) {
      collectServices(child, out);
    }
  }
}

/** Services are parsed on first read; writing and hashing never need them */
export function createProtoFile(name: string, content: string): ProtoFile {
  let services: ServiceDefinition[] | undefined;
  return {
    name,
    path: normalizeProtoFileName(name),
    content,
    get services(): ServiceDefinition[] {
      if (!services) services = parseProtoServices(content);
      return services;
    }
  };
}
