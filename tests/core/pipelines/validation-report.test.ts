import { describe, it, expect } from 'vitest';
import {
  collectFailureDetails,
  formatValidationReport,
  isValidationSuccess
} from '../../../src/core/pipelines/validation-report.js';
import type { ValidationReport } from '../../../src/types/index.js';

function report(overrides: Partial<ValidationReport> = {}): ValidationReport {
  return {
    configValidation: { isValid: true, errors: [], warnings: [] },
    dependencyValidation: [],
    networkValidation: [],
    fingerprintValidation: [],
    conflicts: [],
    resolved: [],
    ...overrides
  };
}

const FAILING = report({
  configValidation: { isValid: false, errors: ['package.name is required'], warnings: ['dependency \'x\' has no pinned fingerprint'] },
  dependencyValidation: [
    { dependency: 'echo', isAvailable: true, resolvedUri: 'actr://acme+echo/' },
    { dependency: 'chat', isAvailable: false }
  ],
  networkValidation: [{ dependency: 'echo', address: 'signal.test:443', isReachable: false, error: 'timed out' }],
  fingerprintValidation: [
    {
      dependency: 'echo',
      expected: { algorithm: 'sha256', value: 'a' },
      actual: { algorithm: 'sha256', value: 'b' },
      isValid: false
    }
  ],
  conflicts: [{ dependencyA: 'svc', dependencyB: 'svc', conflictType: 'VersionConflict', description: 'Alias clash' }]
});

describe('validation report', () => {
  it('succeeds only when every section passes', () => {
    expect(isValidationSuccess(report())).toBe(true);
    expect(isValidationSuccess(FAILING)).toBe(false);
    expect(isValidationSuccess(report({ conflicts: FAILING.conflicts }))).toBe(false);
  });

  it('lists one detail per failed check', () => {
    expect(collectFailureDetails(FAILING)).toEqual([
      'config: package.name is required',
      'chat: service not available',
      'echo: signal.test:443 unreachable (timed out)',
      'echo: fingerprint mismatch (expected sha256:a, got sha256:b)',
      'VersionConflict: Alias clash'
    ]);
  });

  it('renders every section', () => {
    const lines = formatValidationReport(FAILING).split('\n');

    expect(lines[0]).toBe('❌ Validation failed');
    expect(lines).toContain('Config: ❌ invalid');
    expect(lines).toContain("  ⚠️  dependency 'x' has no pinned fingerprint");
    expect(lines).toContain('  ✓ echo');
    expect(lines).toContain('  ❌ chat: service not available');
    expect(lines).toContain('  ❌ echo → signal.test:443: timed out');
    expect(lines).toContain('  ❌ echo: expected sha256:a, got sha256:b');
    expect(lines).toContain('  ❌ VersionConflict (svc ↔ svc): Alias clash');
  });

  it('renders a passing report briefly', () => {
    expect(formatValidationReport(report())).toBe('✓ Validation passed\n\nConfig: ✓ valid');
  });
});
