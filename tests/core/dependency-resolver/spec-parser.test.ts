import { describe, it, expect } from 'vitest';
import { parseSpec } from '../../../src/core/dependency-resolver/index.js';
import { DependencyError, InvalidUriError } from '../../../src/utils/errors.js';

describe('parseSpec', () => {
  it('parses a bare service name', () => {
    expect(parseSpec('echo')).toEqual({
      name: 'echo',
      alias: 'echo',
      uri: 'actr://echo/',
      version: undefined,
      fingerprint: undefined
    });
  });

  it('parses manufacturer+name@version', () => {
    expect(parseSpec('acme+echo@1.2.0')).toEqual({
      name: 'echo',
      alias: 'echo',
      uri: 'actr://acme+echo/?version=1.2.0',
      version: '1.2.0',
      fingerprint: undefined
    });
  });

  it('keeps an actr:// URI as written', () => {
    const uri = 'actr://acme+echo/?fingerprint=sha256:abc';
    expect(parseSpec(uri)).toEqual({
      name: 'echo',
      alias: 'echo',
      uri,
      version: undefined,
      fingerprint: 'sha256:abc'
    });
  });

  it('applies alias and fingerprint overrides', () => {
    const spec = parseSpec('actr://acme+echo/?version=2', { alias: 'my-echo', fingerprint: 'sha256:ff' });
    expect(spec.alias).toBe('my-echo');
    expect(spec.fingerprint).toBe('sha256:ff');
    expect(spec.uri).toBe('actr://acme+echo/?version=2&fingerprint=sha256:ff');
  });

  it('reads a bare fingerprint as sha256', () => {
    expect(parseSpec('acme+echo', { fingerprint: 'aaa' })).toEqual({
      name: 'echo',
      alias: 'echo',
      uri: 'actr://acme+echo/?fingerprint=sha256:aaa',
      version: undefined,
      fingerprint: 'sha256:aaa'
    });
    expect(parseSpec('actr://acme+echo/?fingerprint=aaa').fingerprint).toBe('sha256:aaa');
  });

  it('rejects names with unsupported characters', () => {
    expect(() => parseSpec('echo service')).toThrow(DependencyError);
    expect(() => parseSpec('a+b+c')).toThrow("Invalid package 'a+b+c'");
  });

  it('rejects malformed URIs', () => {
    expect(() => parseSpec('actr:///')).toThrow(InvalidUriError);
  });
});
