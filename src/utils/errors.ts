/**
 * Error taxonomy and command-level error handling.
 *
 * Every error raised on purpose by this package extends ActrError and carries
 * a `kind`, which selects the one-line hint and the suggested actions printed
 * by withErrorHandling().
 */

import type { ValidationReport } from '../types/index.js';
import { formatValidationReport } from '../core/pipelines/validation-report.js';
import { logger } from './logger.js';

export type ErrorKind =
  | 'config'
  | 'network'
  | 'dependency'
  | 'fingerprint-validation'
  | 'validation-failed'
  | 'install-failed'
  | 'component-not-registered';

export class ActrError extends Error {
  constructor(message: string, public readonly kind: ErrorKind) {
    super(message);
    this.name = 'ActrError';
  }
}

export class ConfigError extends ActrError {
  constructor(message: string) {
    super(message, 'config');
    this.name = 'ConfigError';
  }
}

export class NetworkError extends ActrError {
  constructor(message: string) {
    super(message, 'network');
    this.name = 'NetworkError';
  }
}

export class DependencyError extends ActrError {
  constructor(message: string) {
    super(message, 'dependency');
    this.name = 'DependencyError';
  }
}

/** Malformed `actr://` input */
export class InvalidUriError extends DependencyError {
  constructor(public readonly uri: string, detail?: string) {
    super(detail ? `Invalid actr:// URI '${uri}': ${detail}` : `Invalid actr:// URI '${uri}'`);
    this.name = 'InvalidUriError';
  }
}

export class FingerprintValidationError extends ActrError {
  constructor(message: string) {
    super(message, 'fingerprint-validation');
    this.name = 'FingerprintValidationError';
  }
}

export class ValidationFailedError extends ActrError {
  constructor(
    public readonly details: string[],
    public readonly report?: ValidationReport
  ) {
    super(`Validation failed: ${details.join('; ')}`, 'validation-failed');
    this.name = 'ValidationFailedError';
  }
}

export class InstallFailedError extends ActrError {
  constructor(public readonly reason: string, options?: { cause?: unknown }) {
    super(`Install failed: ${reason}`, 'install-failed');
    this.name = 'InstallFailedError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ComponentNotRegisteredError extends ActrError {
  constructor(public readonly component: string) {
    super(`Component not registered: ${component}`, 'component-not-registered');
    this.name = 'ComponentNotRegisteredError';
  }
}

const HINTS: Record<ErrorKind, string> = {
  config: 'Check Actr.toml syntax and content',
  network: 'Check the network connection and the signaling address',
  dependency: "Run 'actr-deps check' to inspect dependencies",
  'fingerprint-validation': 'The remote service changed; review it and re-pin the fingerprint',
  'validation-failed': 'Fix the issues above and try again',
  'install-failed': "Run 'actr-deps check' to validate the environment",
  'component-not-registered': 'This is a wiring bug; please report it'
};

const SUGGESTED_ACTIONS: Partial<Record<ErrorKind, string[]>> = {
  config: [
    'Check Actr.toml syntax',
    'Make sure [package] has a name and every dependency an actr_type'
  ],
  network: [
    'Verify the signaling URL ([system.signaling] url or --signaling)',
    'Check firewall settings',
    'Retry with LOG_LEVEL=debug for details'
  ],
  dependency: [
    "Run 'actr-deps discovery' to find available services",
    "Run 'actr-deps install' to install missing dependencies"
  ],
  'validation-failed': [
    'Check and fix the reported issues',
    'Ensure every dependency service is online'
  ],
  'install-failed': [
    'Check disk space and permissions',
    "Clear the proto cache with 'actr-deps cache clear' and retry"
  ]
};

export function getErrorHint(error: unknown): string | undefined {
  return error instanceof ActrError ? HINTS[error.kind] : undefined;
}

/**
 * Render an error for the terminal.
 *
 * Aggregate validation errors render the whole report; everything else is
 * `❌ <message>` followed by a hint and the suggested actions for its kind.
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationFailedError && error.report) {
    const lines = [formatValidationReport(error.report), ''];
    appendSuggestions(lines, error.kind);
    return lines.join('\n').trimEnd();
  }

  const message = error instanceof Error ? error.message : String(error);
  const lines = [`❌ ${message}`];
  const hint = getErrorHint(error);
  if (hint) {
    lines.push(`💡 ${hint}`);
  }
  if (error instanceof ActrError) {
    lines.push('');
    appendSuggestions(lines, error.kind);
  }
  return lines.join('\n').trimEnd();
}

function appendSuggestions(lines: string[], kind: ErrorKind): void {
  const actions = SUGGESTED_ACTIONS[kind];
  if (!actions || actions.length === 0) return;
  lines.push('🔧 Suggested actions:');
  actions.forEach((action, i) => lines.push(`   ${i + 1}. ${action}`));
}

/**
 * Wrap a commander action: print failures and set a non-zero exit code
 * instead of letting the rejection escape.
 */
export function withErrorHandling<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (error) {
      logger.error('Command failed', { error });
      console.error(formatError(error));
      process.exitCode = 1;
    }
  };
}
