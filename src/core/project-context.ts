/**
 * Per-invocation project context.
 *
 * Settings resolve in order: CLI flag, environment, Actr.toml, default.
 *
 *   ACTR_SIGNALING_URL        signaling endpoint
 *   ACTR_NETWORK_TIMEOUT_MS   TCP probe timeout
 *   ACTR_REQUEST_TIMEOUT_MS   signaling read timeout (defaults to the probe timeout)
 */

import { dirname, join, resolve } from 'path';
import type { ActrType, ProjectManifest } from '../types/index.js';
import { LOCK_FILE_NAME, MANIFEST_FILE_NAME, parseManifest } from './config/manifest.js';
import { DEFAULT_NETWORK_TIMEOUT_MS } from './network/network-validator.js';
import { exists, readTextFile } from '../utils/fs.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_SIGNALING_URL = 'ws://127.0.0.1:8080';
export const DEFAULT_REALM = 0;
const CLIENT_ACTR_TYPE: ActrType = { manufacturer: 'actr', name: 'actr-deps' };

export interface ProjectContext {
  projectRoot: string;
  manifestPath: string;
  lockFilePath: string;
  signalingUrl: string;
  realm: number;
  /** Actor type used when registering with signaling */
  actrType: ActrType;
  networkTimeoutMs: number;
  requestTimeoutMs: number;
}

export interface ProjectContextOptions {
  cwd?: string;
  /** Manifest path, relative to cwd */
  config?: string;
  signalingUrl?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export async function createProjectContext(options: ProjectContextOptions = {}): Promise<ProjectContext> {
  const env = options.env ?? process.env;
  const cwd = resolve(options.cwd ?? process.cwd());
  const manifestPath = resolve(cwd, options.config ?? MANIFEST_FILE_NAME);
  const projectRoot = dirname(manifestPath);
  const manifest = await readManifestQuietly(manifestPath);

  const networkTimeoutMs =
    options.timeoutMs ?? readPositiveInt(env, 'ACTR_NETWORK_TIMEOUT_MS') ?? DEFAULT_NETWORK_TIMEOUT_MS;

  const context: ProjectContext = {
    projectRoot,
    manifestPath,
    lockFilePath: join(projectRoot, LOCK_FILE_NAME),
    signalingUrl:
      options.signalingUrl ?? nonEmpty(env.ACTR_SIGNALING_URL) ?? manifest?.signalingUrl ?? DEFAULT_SIGNALING_URL,
    realm: manifest?.realm ?? DEFAULT_REALM,
    actrType: manifest && manifest.package.actrType.name ? manifest.package.actrType : CLIENT_ACTR_TYPE,
    networkTimeoutMs,
    requestTimeoutMs: readPositiveInt(env, 'ACTR_REQUEST_TIMEOUT_MS') ?? networkTimeoutMs
  };

  logger.debug('Project context', {
    projectRoot: context.projectRoot,
    signalingUrl: context.signalingUrl,
    realm: context.realm
  });
  return context;
}

/**
 * The manifest if it exists and parses. Errors here are logged only:
 * validation reports them properly later.
 */
async function readManifestQuietly(manifestPath: string): Promise<ProjectManifest | undefined> {
  if (!(await exists(manifestPath))) return undefined;
  try {
    return parseManifest(await readTextFile(manifestPath));
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    logger.warn('Ignoring unreadable manifest while resolving settings', { manifestPath, error });
    return undefined;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn('Ignoring invalid environment value', { name, value: raw });
    return undefined;
  }
  return value;
}
