import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { join } from 'path';
import { Sha256FingerprintValidator, fingerprintProtoFiles } from '../../../src/core/fingerprint/fingerprint-validator.js';
import { createProtoFile } from '../../../src/core/proto/proto-files.js';
import type { ResolvedDependency } from '../../../src/types/index.js';
import { makeTempDir, removeTempDir, serviceDetails } from '../../helpers/fakes.js';

function sha256Hex(...parts: Array<string | Buffer>): string {
  const hash = createHash('sha256');
  parts.forEach(part => hash.update(part));
  return hash.digest('hex');
}

describe('Sha256FingerprintValidator', () => {
  const validator = new Sha256FingerprintValidator();

  it('reads the advertised service fingerprint', () => {
    const { info } = serviceDetails('acme+echo', 'sha256:abc');
    expect(validator.computeServiceFingerprint(info)).toEqual({ algorithm: 'sha256', value: 'abc' });
  });

  it('compares algorithm and value exactly', () => {
    expect(validator.verifyFingerprint({ algorithm: 'sha256', value: 'a' }, { algorithm: 'sha256', value: 'a' })).toBe(true);
    expect(validator.verifyFingerprint({ algorithm: 'sha256', value: 'a' }, { algorithm: 'sha256', value: 'b' })).toBe(false);
    expect(validator.verifyFingerprint({ algorithm: 'sha256', value: 'a' }, { algorithm: 'blake3', value: 'a' })).toBe(false);
  });

  it('hashes the lock set in name order', () => {
    const entry = (name: string, fingerprint: string): ResolvedDependency => ({
      spec: { name, alias: name, uri: `actr://${name}/` },
      fingerprint,
      protoFiles: []
    });
    const forward = validator.generateLockFingerprint([entry('a', 'sha256:1'), entry('b', 'sha256:2')]);
    const reverse = validator.generateLockFingerprint([entry('b', 'sha256:2'), entry('a', 'sha256:1')]);

    expect(forward).toEqual(reverse);
    expect(forward.value).toBe(sha256Hex('a', 'sha256:1', 'b', 'sha256:2'));
  });

  describe('computeProjectFingerprint', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir('fingerprint');
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('hashes the digests of every proto file in path order', async () => {
      await fs.mkdir(join(dir, 'protos', 'local'), { recursive: true });
      await fs.mkdir(join(dir, 'node_modules', 'x'), { recursive: true });
      await fs.writeFile(join(dir, 'protos', 'local', 'b.proto'), 'B');
      await fs.writeFile(join(dir, 'a.proto'), 'A');
      await fs.writeFile(join(dir, 'node_modules', 'x', 'ignored.proto'), 'X');
      await fs.writeFile(join(dir, 'notes.txt'), 'not a proto');

      const fingerprint = await validator.computeProjectFingerprint(dir);

      const digestA = createHash('sha256').update('A').digest();
      const digestB = createHash('sha256').update('B').digest();
      expect(fingerprint).toEqual({ algorithm: 'sha256', value: sha256Hex(digestA, digestB) });
    });

    it('hashes an empty project to the empty digest', async () => {
      expect((await validator.computeProjectFingerprint(dir)).value).toBe(sha256Hex());
    });
  });
});

describe('fingerprintProtoFiles', () => {
  it('does not depend on file order', () => {
    const a = createProtoFile('a.v1', 'syntax = "proto3";');
    const b = createProtoFile('b.v1', 'syntax = "proto3";');
    expect(fingerprintProtoFiles([a, b])).toEqual(fingerprintProtoFiles([b, a]));
  });

  it('changes with content', () => {
    const before = fingerprintProtoFiles([createProtoFile('a.v1', 'one')]);
    const after = fingerprintProtoFiles([createProtoFile('a.v1', 'two')]);
    expect(before.value).not.toBe(after.value);
    expect(before.value).toBe(sha256Hex('a.v1.proto', '\0', 'one', '\0'));
  });
});
