import { promises as fs } from 'fs';
import { hostname } from 'os';
import { z } from 'zod';
import { ConcurrentWriterError, ensureDir, isErrnoException, readFileIfExists } from '@histree/shared';

const LockInfoSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface WriterLockOptions {
  /** Liveness probe for a holder on this host */
  isAlive?: (pid: number) => boolean;
}

export function isProcessAlive(pid: number): boolean {
  try {
    // Signal 0 only probes for existence.
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

async function readLockInfo(lockPath: string): Promise<LockInfo | null> {
  const raw = await readFileIfExists(lockPath);
  if (raw === null) {
    return null;
  }
  try {
    const parsed = LockInfoSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    // Half-written lock file; treated like a dead holder.
    return null;
  }
}

/**
 * Exclusive cross-process lock over one cache directory, held as a file created with `wx`.
 */
export class WriterLock {
  private released = false;

  private constructor(
    readonly lockPath: string,
    readonly info: LockInfo,
  ) {}

  static async acquire(lockPath: string, options: WriterLockOptions = {}): Promise<WriterLock> {
    const isAlive = options.isAlive ?? isProcessAlive;
    await ensureDir(lockPath);

    for (let attempt = 0; attempt < 2; attempt++) {
      const info: LockInfo = {
        pid: process.pid,
        hostname: hostname(),
        acquiredAt: new Date().toISOString(),
      };
      try {
        await fs.writeFile(lockPath, JSON.stringify(info), { flag: 'wx' });
        return new WriterLock(lockPath, info);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }

      const holder = await readLockInfo(lockPath);
      const reclaimable =
        holder === null ||
        (holder.hostname === hostname() && holder.pid !== process.pid && !isAlive(holder.pid));
      if (!reclaimable || attempt > 0) {
        const owner = holder
          ? `process ${holder.pid} on ${holder.hostname} since ${holder.acquiredAt}`
          : 'another process';
        throw new ConcurrentWriterError(lockPath, `Cache is being written by ${owner}`, {
          details: holder ?? undefined,
        });
      }
      await fs.rm(lockPath, { force: true });
    }

    throw new ConcurrentWriterError(lockPath, 'Cache lock could not be acquired');
  }

  /** Removes the lock file if it is still ours. */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    const holder = await readLockInfo(this.lockPath);
    if (holder && holder.pid === this.info.pid && holder.acquiredAt === this.info.acquiredAt) {
      await fs.rm(this.lockPath, { force: true });
    }
  }
}
