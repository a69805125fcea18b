import { describe, it, expect } from 'vitest';
import { formatFileSize, formatPercent, getTreeConnector, pluralize } from '../../src/utils/formatters.js';

describe('formatters', () => {
  it('formats file sizes', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(3 * 1024 * 1024)).toBe('3.0 MB');
  });

  it('formats ratios as percentages', () => {
    expect(formatPercent(0)).toBe('0.0%');
    expect(formatPercent(0.25)).toBe('25.0%');
  });

  it('pluralizes counts', () => {
    expect(pluralize(1, 'service')).toBe('1 service');
    expect(pluralize(3, 'service')).toBe('3 services');
    expect(pluralize(2, 'cache entry', 'cache entries')).toBe('2 cache entries');
  });

  it('picks tree connectors', () => {
    expect(getTreeConnector(false)).toBe('├── ');
    expect(getTreeConnector(true)).toBe('└── ');
  });
});
