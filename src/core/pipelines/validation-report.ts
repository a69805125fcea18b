/**
 * Validation report helpers: success check, failure details, terminal rendering.
 */

import type { Fingerprint, ValidationReport } from '../../types/index.js';

export function isValidationSuccess(report: ValidationReport): boolean {
  return (
    report.configValidation.isValid &&
    report.dependencyValidation.every(d => d.isAvailable) &&
    report.networkValidation.every(n => n.isReachable) &&
    report.fingerprintValidation.every(f => f.isValid) &&
    report.conflicts.length === 0
  );
}

function fingerprintText(fingerprint: Fingerprint | undefined): string {
  return fingerprint ? `${fingerprint.algorithm}:${fingerprint.value}` : '(none)';
}

/** One line per failed check, in report order */
export function collectFailureDetails(report: ValidationReport): string[] {
  const details: string[] = [];

  for (const error of report.configValidation.errors) {
    details.push(`config: ${error}`);
  }
  for (const d of report.dependencyValidation) {
    if (!d.isAvailable) {
      details.push(`${d.dependency}: ${d.error ?? 'service not available'}`);
    }
  }
  for (const n of report.networkValidation) {
    if (!n.isReachable) {
      details.push(`${n.dependency}: ${n.address} unreachable${n.error ? ` (${n.error})` : ''}`);
    }
  }
  for (const f of report.fingerprintValidation) {
    if (!f.isValid) {
      details.push(
        `${f.dependency}: ${f.error ?? `fingerprint mismatch (expected ${fingerprintText(f.expected)}, got ${fingerprintText(f.actual)})`}`
      );
    }
  }
  for (const c of report.conflicts) {
    details.push(`${c.conflictType}: ${c.description}`);
  }

  return details;
}

export function formatValidationReport(report: ValidationReport): string {
  const lines: string[] = [];
  const ok = isValidationSuccess(report);
  lines.push(ok ? '✓ Validation passed' : '❌ Validation failed');
  lines.push('');

  const config = report.configValidation;
  lines.push(`Config: ${config.isValid ? '✓ valid' : '❌ invalid'}`);
  config.errors.forEach(error => lines.push(`  ❌ ${error}`));
  config.warnings.forEach(warning => lines.push(`  ⚠️  ${warning}`));

  if (report.dependencyValidation.length > 0) {
    lines.push('');
    lines.push('Dependencies:');
    for (const d of report.dependencyValidation) {
      lines.push(d.isAvailable ? `  ✓ ${d.dependency}` : `  ❌ ${d.dependency}: ${d.error ?? 'service not available'}`);
    }
  }

  if (report.networkValidation.length > 0) {
    lines.push('');
    lines.push('Network:');
    for (const n of report.networkValidation) {
      if (n.isReachable) {
        const latency = n.latencyMs !== undefined ? ` (${n.latencyMs}ms)` : '';
        lines.push(`  ✓ ${n.dependency} → ${n.address}${latency}`);
      } else {
        lines.push(`  ❌ ${n.dependency} → ${n.address}: ${n.error ?? 'unreachable'}`);
      }
    }
  }

  if (report.fingerprintValidation.length > 0) {
    lines.push('');
    lines.push('Fingerprints:');
    for (const f of report.fingerprintValidation) {
      if (f.isValid) {
        lines.push(`  ✓ ${f.dependency} ${fingerprintText(f.actual)}`);
      } else if (f.error) {
        lines.push(`  ❌ ${f.dependency}: ${f.error}`);
      } else {
        lines.push(`  ❌ ${f.dependency}: expected ${fingerprintText(f.expected)}, got ${fingerprintText(f.actual)}`);
      }
    }
  }

  if (report.conflicts.length > 0) {
    lines.push('');
    lines.push('Conflicts:');
    for (const c of report.conflicts) {
      lines.push(`  ❌ ${c.conflictType} (${c.dependencyA} ↔ ${c.dependencyB}): ${c.description}`);
    }
  }

  return lines.join('\n');
}
