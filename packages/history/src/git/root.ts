import { promises as fs } from 'fs';
import path from 'path';
import { RepositoryAccessError, isErrnoException } from '@histree/shared';

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Walks up from `start` to the directory containing `.git`.
 */
export async function findRepoRoot(start: string): Promise<string> {
  const resolved = path.resolve(start);
  if (!(await exists(resolved))) {
    throw new RepositoryAccessError(`The path '${start}' does not exist`);
  }

  let current = resolved;
  for (;;) {
    if (await exists(path.join(current, '.git'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new RepositoryAccessError(`'${start}' is not inside a Git repository`);
    }
    current = parent;
  }
}
