import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { RepositoryAccessError } from '@histree/shared';
import { findRepoRoot } from './root';

describe('findRepoRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'histree-root-')));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('finds the directory holding .git from a nested path', async () => {
    await fs.mkdir(path.join(tmpDir, '.git'));
    await fs.mkdir(path.join(tmpDir, 'src', 'deep'), { recursive: true });

    await expect(findRepoRoot(path.join(tmpDir, 'src', 'deep'))).resolves.toBe(tmpDir);
  });

  it('accepts a .git file as used by worktrees', async () => {
    await fs.writeFile(path.join(tmpDir, '.git'), 'gitdir: /elsewhere\n');
    await expect(findRepoRoot(tmpDir)).resolves.toBe(tmpDir);
  });

  it('rejects paths that do not exist', async () => {
    const missing = path.join(tmpDir, 'missing');
    await expect(findRepoRoot(missing)).rejects.toThrow(RepositoryAccessError);
    await expect(findRepoRoot(missing)).rejects.toThrow(`The path '${missing}' does not exist`);
  });
});
