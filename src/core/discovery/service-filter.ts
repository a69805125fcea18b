/**
 * Client-side filtering of discovered type entries.
 *
 * Name patterns use shell-glob `*` only; every other glob metacharacter is
 * matched literally.
 */

import { minimatch } from 'minimatch';
import type { ServiceFilter } from '../../types/index.js';

export interface FilterableEntry {
  name: string;
  manufacturer: string;
  tags: string[];
}

const GLOB_OPTIONS = {
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true
} as const;

function escapeLiteralGlobChars(pattern: string): string {
  return pattern.replace(/[?[\]\\]/g, '\\$&');
}

/**
 * Match a name against a `*` glob.
 *
 * `*` alone matches anything; without `*` the match is exact equality.
 */
export function matchesPattern(value: string, pattern: string): boolean {
  if (pattern === '*') return true;
  if (!pattern.includes('*')) return value === pattern;
  return minimatch(value, escapeLiteralGlobChars(pattern), GLOB_OPTIONS);
}

/** The tag reported as a service's version: `latest` when tagged, else the first tag */
export function selectVersion(tags: string[]): string {
  if (tags.includes('latest')) return 'latest';
  return tags[0] ?? 'unknown';
}

export function matchesFilter(entry: FilterableEntry, filter: ServiceFilter | undefined): boolean {
  if (!filter) return true;

  if (filter.namePattern) {
    const candidates = [entry.name];
    if (entry.manufacturer) {
      candidates.push(`${entry.manufacturer}:${entry.name}`, `${entry.manufacturer}+${entry.name}`);
    }
    const pattern = filter.namePattern;
    if (!candidates.some(candidate => matchesPattern(candidate, pattern))) {
      return false;
    }
  }

  if (filter.versionRange) {
    const version = selectVersion(entry.tags);
    if (filter.versionRange !== version && !entry.tags.includes(filter.versionRange)) {
      return false;
    }
  }

  if (filter.tags && filter.tags.length > 0) {
    return filter.tags.every(tag => entry.tags.includes(tag));
  }

  return true;
}
