import { describe, it, expect } from 'vitest';
import { DefaultDependencyResolver } from '../../../src/core/dependency-resolver/index.js';
import type { DependencySpec, ResolvedDependency } from '../../../src/types/index.js';

function spec(alias: string, name: string, fingerprint?: string): DependencySpec {
  return { alias, name, uri: `actr://${name}/`, fingerprint };
}

function resolved(alias: string, name: string, fingerprint = ''): ResolvedDependency {
  return { spec: spec(alias, name), fingerprint, protoFiles: [] };
}

describe('DefaultDependencyResolver', () => {
  const resolver = new DefaultDependencyResolver();

  it('resolves one entry per spec and carries known fingerprints', async () => {
    const result = await resolver.resolveDependencies([spec('a', 'echo', 'sha256:1'), spec('b', 'chat')]);
    expect(result).toEqual([
      { spec: spec('a', 'echo', 'sha256:1'), fingerprint: 'sha256:1', protoFiles: [] },
      { spec: spec('b', 'chat'), fingerprint: '', protoFiles: [] }
    ]);
  });

  it('compares pins in algorithm:value form', async () => {
    const result = await resolver.resolveDependencies([spec('echo', 'echo', 'aaa'), spec('echo2', 'echo', 'sha256:aaa')]);
    expect(result.map(dependency => dependency.fingerprint)).toEqual(['sha256:aaa', 'sha256:aaa']);
    expect(resolver.checkConflicts(result)).toEqual([]);
  });

  it('copies specs instead of sharing them', async () => {
    const input = spec('a', 'echo');
    const [result] = await resolver.resolveDependencies([input]);
    expect(result?.spec).not.toBe(input);
  });

  it('reports one version conflict for an alias pointing at two services', () => {
    const conflicts = resolver.checkConflicts([resolved('svc', 'a'), resolved('svc', 'b')]);
    expect(conflicts).toEqual([
      {
        dependencyA: 'svc',
        dependencyB: 'svc',
        conflictType: 'VersionConflict',
        description: "Alias 'svc' points at both 'a' and 'b'"
      }
    ]);
  });

  it('reports a version conflict for an alias pinned twice', () => {
    const [conflict] = resolver.checkConflicts([resolved('svc', 'a', 'sha256:1'), resolved('svc', 'a')]);
    expect(conflict?.conflictType).toBe('VersionConflict');
    expect(conflict?.description).toBe("Alias 'svc' is pinned to two fingerprints: sha256:1 and (none)");
  });

  it('reports a fingerprint mismatch for one service under two aliases', () => {
    const conflicts = resolver.checkConflicts([resolved('x', 'echo', 'sha256:1'), resolved('y', 'echo', 'sha256:2')]);
    expect(conflicts).toEqual([
      {
        dependencyA: 'x',
        dependencyB: 'y',
        conflictType: 'FingerprintMismatch',
        description: "Service 'echo' is required with fingerprints sha256:1 ('x') and sha256:2 ('y')"
      }
    ]);
  });

  it('ignores unpinned or matching entries', () => {
    expect(resolver.checkConflicts([resolved('x', 'echo', 'sha256:1'), resolved('y', 'echo')])).toEqual([]);
    expect(resolver.checkConflicts([resolved('x', 'echo', 'sha256:1'), resolved('x', 'echo', 'sha256:1')])).toEqual([]);
    expect(resolver.checkConflicts([resolved('x', 'echo'), resolved('y', 'chat')])).toEqual([]);
  });

  it('reports every conflicting pair', () => {
    const conflicts = resolver.checkConflicts([resolved('svc', 'a'), resolved('svc', 'b'), resolved('svc', 'c')]);
    expect(conflicts).toHaveLength(3);
  });

  it('builds a flat graph of unique aliases', () => {
    expect(resolver.buildDependencyGraph([resolved('svc', 'a'), resolved('svc', 'b'), resolved('chat', 'c')])).toEqual({
      nodes: ['svc', 'chat'],
      edges: [],
      hasCycles: false
    });
  });
});
