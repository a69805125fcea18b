/**
 * Structured logger
 *
 * Thin facade over pino so call sites read `logger.debug('message', { meta })`.
 * Log lines go to stderr as JSON; command output on stdout is unaffected.
 *
 * LOG_LEVEL selects the level (trace, debug, info, warn, error, silent).
 */

import pino from 'pino';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVELS = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function resolveLevel(): string {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  return requested && LEVELS.has(requested) ? requested : 'warn';
}

function serializeMeta(meta?: LogMeta): LogMeta {
  if (!meta) return {};
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

const base = pino(
  { level: resolveLevel(), base: undefined },
  pino.destination({ dest: 2, sync: true })
);

export const logger: Logger = {
  debug(message, meta) {
    base.debug(serializeMeta(meta), message);
  },
  info(message, meta) {
    base.info(serializeMeta(meta), message);
  },
  warn(message, meta) {
    base.warn(serializeMeta(meta), message);
  },
  error(message, meta) {
    base.error(serializeMeta(meta), message);
  }
};
