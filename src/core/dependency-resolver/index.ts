/**
 * Dependency resolution and conflict detection.
 *
 * Resolution is flat: one resolved entry per spec, no transitive lookup, and
 * the graph carries nodes only.
 */

import type {
  ConflictReport,
  DependencyGraph,
  DependencySpec,
  ResolvedDependency
} from '../../types/index.js';
import type { DependencyResolver } from '../components/types.js';
import { normalizeFingerprint } from '../actr-uri.js';
import { logger } from '../../utils/logger.js';

export { parseSpec, type ParseSpecOptions } from './spec-parser.js';

export class DefaultDependencyResolver implements DependencyResolver {
  /** Pinned fingerprints come out in `algorithm:value` form */
  async resolveDependencies(specs: DependencySpec[]): Promise<ResolvedDependency[]> {
    const resolved = specs.map(spec => ({
      spec: { ...spec },
      fingerprint: normalizeFingerprint(spec.fingerprint) ?? '',
      protoFiles: []
    }));
    logger.debug('Resolved dependencies', { count: resolved.length });
    return resolved;
  }

  /**
   * Pairwise scan; every conflicting pair is reported.
   *
   * Same alias with a different name or fingerprint is a version conflict.
   * Same name with two different, non-empty fingerprints is a fingerprint
   * mismatch.
   */
  checkConflicts(resolved: ResolvedDependency[]): ConflictReport[] {
    const conflicts: ConflictReport[] = [];

    for (let i = 0; i < resolved.length; i++) {
      for (let j = i + 1; j < resolved.length; j++) {
        const a = resolved[i];
        const b = resolved[j];

        if (a.spec.alias === b.spec.alias) {
          if (a.spec.name !== b.spec.name || a.fingerprint !== b.fingerprint) {
            conflicts.push({
              dependencyA: a.spec.alias,
              dependencyB: b.spec.alias,
              conflictType: 'VersionConflict',
              description:
                a.spec.name !== b.spec.name
                  ? `Alias '${a.spec.alias}' points at both '${a.spec.name}' and '${b.spec.name}'`
                  : `Alias '${a.spec.alias}' is pinned to two fingerprints: ${a.fingerprint || '(none)'} and ${b.fingerprint || '(none)'}`
            });
          }
          continue;
        }

        if (
          a.spec.name === b.spec.name &&
          a.fingerprint !== '' &&
          b.fingerprint !== '' &&
          a.fingerprint !== b.fingerprint
        ) {
          conflicts.push({
            dependencyA: a.spec.alias,
            dependencyB: b.spec.alias,
            conflictType: 'FingerprintMismatch',
            description: `Service '${a.spec.name}' is required with fingerprints ${a.fingerprint} ('${a.spec.alias}') and ${b.fingerprint} ('${b.spec.alias}')`
          });
        }
      }
    }

    return conflicts;
  }

  buildDependencyGraph(resolved: ResolvedDependency[]): DependencyGraph {
    const nodes: string[] = [];
    const seen = new Set<string>();
    for (const dependency of resolved) {
      if (!seen.has(dependency.spec.alias)) {
        seen.add(dependency.spec.alias);
        nodes.push(dependency.spec.alias);
      }
    }
    return { nodes, edges: [], hasCycles: false };
  }
}
