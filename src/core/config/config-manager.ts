/**
 * Actr.toml access and transactional mutation.
 *
 * Writes go through line-level edits (see toml-edit.ts) and are re-parsed
 * before they reach the disk. Backups are single-use handles: each one is
 * consumed by exactly one restoreBackup() or removeBackup().
 */

import { promises as fs } from 'fs';
import { basename, dirname, join } from 'path';
import type {
  ConfigBackup,
  ConfigValidation,
  DependencySpec,
  ProjectManifest
} from '../../types/index.js';
import type { ConfigManager } from '../components/types.js';
import { formatActrType, formatActrUri, normalizeFingerprint, parseActrUri } from '../actr-uri.js';
import { isTomlTable, parseManifest, parseToml } from './manifest.js';
import { upsertTableEntry, type TomlEntry } from './toml-edit.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export class TomlConfigManager implements ConfigManager {
  private readonly consumedBackups = new Set<string>();

  constructor(public readonly manifestPath: string) {}

  get projectRoot(): string {
    return dirname(this.manifestPath);
  }

  async loadConfig(): Promise<ProjectManifest> {
    return parseManifest(await this.readManifest(), basename(this.manifestPath));
  }

  async updateDependency(spec: DependencySpec): Promise<void> {
    const text = await this.readManifest();
    const entries = dependencyEntries(spec);
    const updated = upsertTableEntry(text, ['dependencies'], spec.alias, entries);

    const reparsed = parseToml(updated, basename(this.manifestPath));
    const dependencies = reparsed['dependencies'];
    const written = isTomlTable(dependencies) ? dependencies[spec.alias] : undefined;
    if (!isTomlTable(written) || entries.some(([key, value]) => written[key] !== value)) {
      throw new ConfigError(
        `Could not write dependency '${spec.alias}' to ${basename(this.manifestPath)}; check the [dependencies] table`
      );
    }

    await this.writeManifest(updated);
    logger.debug('Updated manifest dependency', { alias: spec.alias, path: this.manifestPath });
  }

  async backupConfig(): Promise<ConfigBackup> {
    if (!(await exists(this.manifestPath))) {
      throw new ConfigError(`Config file not found: ${this.manifestPath}`);
    }

    const timestamp = new Date();
    const seconds = Math.floor(timestamp.getTime() / 1000);
    const backupPath = join(this.projectRoot, `${basename(this.manifestPath)}.bak.${seconds}`);
    try {
      await fs.copyFile(this.manifestPath, backupPath);
    } catch (error) {
      throw new ConfigError(`Failed to back up ${this.manifestPath}: ${describe(error)}`);
    }

    logger.debug('Backed up manifest', { backupPath });
    return { originalPath: this.manifestPath, backupPath, timestamp };
  }

  async restoreBackup(backup: ConfigBackup): Promise<void> {
    this.consume(backup);
    try {
      await fs.copyFile(backup.backupPath, backup.originalPath);
      await fs.rm(backup.backupPath, { force: true });
    } catch (error) {
      throw new ConfigError(`Failed to restore ${backup.originalPath} from ${backup.backupPath}: ${describe(error)}`);
    }
    logger.debug('Restored manifest from backup', { backupPath: backup.backupPath });
  }

  async removeBackup(backup: ConfigBackup): Promise<void> {
    this.consume(backup);
    try {
      await fs.rm(backup.backupPath, { force: true });
    } catch (error) {
      throw new ConfigError(`Failed to remove backup ${backup.backupPath}: ${describe(error)}`);
    }
  }

  async validateConfig(): Promise<ConfigValidation> {
    const errors: string[] = [];
    const warnings: string[] = [];

    let manifest: ProjectManifest;
    try {
      manifest = await this.loadConfig();
    } catch (error) {
      return { isValid: false, errors: [describe(error)], warnings };
    }

    if (manifest.package.name.trim() === '') {
      errors.push('package.name is required');
    }

    for (const dependency of manifest.dependencies) {
      if (dependency.alias.trim() === '') {
        errors.push('dependency alias is required');
        continue;
      }
      if (!dependency.actrType || dependency.actrType.name.trim() === '') {
        errors.push(`dependency '${dependency.alias}' has no actr_type name`);
      }
      if (!dependency.fingerprint) {
        warnings.push(`dependency '${dependency.alias}' has no pinned fingerprint`);
      }
    }

    return { isValid: errors.length === 0, errors, warnings };
  }

  async extractDependencySpecs(): Promise<DependencySpec[]> {
    const manifest = await this.loadConfig();
    return manifest.dependencies.map(dependency => {
      const serviceName = dependency.actrType ? formatActrType(dependency.actrType) : dependency.name;
      const fingerprint = normalizeFingerprint(dependency.fingerprint);
      return {
        name: dependency.name,
        alias: dependency.alias,
        uri: formatActrUri({ name: serviceName, fingerprint }),
        fingerprint
      };
    });
  }

  private consume(backup: ConfigBackup): void {
    if (this.consumedBackups.has(backup.backupPath)) {
      throw new ConfigError(`Backup ${backup.backupPath} was already restored or removed`);
    }
    this.consumedBackups.add(backup.backupPath);
  }

  private async readManifest(): Promise<string> {
    if (!(await exists(this.manifestPath))) {
      throw new ConfigError(`Config file not found: ${this.manifestPath}`);
    }
    try {
      return await readTextFile(this.manifestPath);
    } catch (error) {
      throw new ConfigError(`Failed to read ${this.manifestPath}: ${describe(error)}`);
    }
  }

  private async writeManifest(text: string): Promise<void> {
    try {
      await writeTextFile(this.manifestPath, text);
    } catch (error) {
      throw new ConfigError(`Failed to write ${this.manifestPath}: ${describe(error)}`);
    }
  }
}

/**
 * Manifest entry for a spec: `name` only when it differs from the alias,
 * `actr_type` from the URI, `fingerprint` when pinned.
 */
function dependencyEntries(spec: DependencySpec): TomlEntry[] {
  const parsed = parseActrUri(spec.uri);
  const entries: TomlEntry[] = [];
  if (spec.name !== spec.alias) {
    entries.push(['name', spec.name]);
  }
  entries.push(['actr_type', parsed.name]);
  const fingerprint = spec.fingerprint ?? parsed.fingerprint;
  if (fingerprint) {
    entries.push(['fingerprint', fingerprint]);
  }
  return entries;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
