import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { atomicWrite, isErrnoException, readFileIfExists } from './io';

describe('io', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'histree-io-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('atomicWrite creates parent directories and replaces content', async () => {
    const target = path.join(tempDir, 'nested', 'cursor.json');
    await atomicWrite(target, 'first');
    await atomicWrite(target, 'second');

    expect(fs.readFileSync(target, 'utf8')).toBe('second');
    expect(fs.readdirSync(path.dirname(target))).toEqual(['cursor.json']);
  });

  it('readFileIfExists returns null for a missing file', async () => {
    await expect(readFileIfExists(path.join(tempDir, 'missing'))).resolves.toBeNull();
  });

  it('readFileIfExists rethrows other errors', async () => {
    await expect(readFileIfExists(tempDir)).rejects.toThrow();
  });

  it('isErrnoException recognises errors with a code', () => {
    const error = Object.assign(new Error('nope'), { code: 'ENOENT' });
    expect(isErrnoException(error)).toBe(true);
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});
