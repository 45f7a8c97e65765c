/**
 * Tests for SHA-256 hashing utilities
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { computeHash, hashFile, isValidHashFormat } from '../../../src/utils/hash.js';

const HELLO_HASH = 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

describe('computeHash', () => {
  it('returns the prefixed SHA-256 of a string', () => {
    expect(computeHash('hello')).toBe(HELLO_HASH);
  });

  it('hashes a Buffer like the equivalent string', () => {
    expect(computeHash(Buffer.from('hello', 'utf8'))).toBe(HELLO_HASH);
  });

  it('produces different hashes for different content', () => {
    expect(computeHash('hello')).not.toBe(computeHash('hello '));
  });
});

describe('isValidHashFormat', () => {
  it('accepts computed hashes', () => {
    expect(isValidHashFormat(computeHash('anything'))).toBe(true);
  });

  it.each([
    ['missing prefix', '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'],
    ['uppercase hex', 'sha256:2CF24DBA5FB0A30E26E83B2AC5B9E29E1B161E5C1FA7425E73043362938B9824'],
    ['short digest', 'sha256:2cf24dba'],
    ['empty', ''],
  ])('rejects %s', (_label, value) => {
    expect(isValidHashFormat(value)).toBe(false);
  });
});

describe('hashFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'test-hash-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('hashes file content', async () => {
    const filePath = join(dir, 'hello.txt');
    writeFileSync(filePath, 'hello');
    await expect(hashFile(filePath)).resolves.toBe(HELLO_HASH);
  });

  it('hashes a file larger than one stream chunk', async () => {
    const content = 'x'.repeat(200_000);
    const filePath = join(dir, 'large.bin');
    writeFileSync(filePath, content);
    await expect(hashFile(filePath)).resolves.toBe(computeHash(content));
  });

  it('rejects a relative path', async () => {
    await expect(hashFile('relative/file.pdf')).rejects.toThrow('Path must be absolute: relative/file.pdf');
  });

  it('rejects a missing file', async () => {
    const filePath = join(dir, 'missing.pdf');
    await expect(hashFile(filePath)).rejects.toThrow(`File not found: ${filePath}`);
  });

  it('rejects a directory', async () => {
    const subdir = join(dir, 'folder');
    mkdirSync(subdir);
    await expect(hashFile(subdir)).rejects.toThrow(`Path is not a file: ${subdir}`);
  });
});
