import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { ProcessError } from '@histree/shared';
import { COMMIT_HEADER_FORMAT, CommitLogParser } from './parser';
import type { CommitQuery, GitDataSource, RawCommit } from './types';

export * from './types';
export * from './parser';
export * from './root';

export interface GitServiceOptions {
  repoRoot: string;
}

/**
 * {@link GitDataSource} backed by the `git` executable.
 */
export class GitService implements GitDataSource {
  private repoRoot: string;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
  }

  private async exec(args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn('git', args, { cwd: this.repoRoot });
      // Decoded once at exit so multi-byte characters can span chunks.
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr.push(data);
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(Buffer.concat(stdout).toString('utf8'));
        } else {
          const message = Buffer.concat(stderr).toString('utf8').trim();
          reject(
            new ProcessError(`Git command failed: git ${args.join(' ')}\n${message}`, {
              exitCode: code ?? undefined,
            }),
          );
        }
      });

      child.on('error', (err) => {
        reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err }));
      });
    });
  }

  /** Resolves HEAD, or null for a repository without commits. */
  async headId(): Promise<string | null> {
    try {
      const out = await this.exec(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}']);
      return out.trim() || null;
    } catch (error) {
      if (error instanceof ProcessError && error.exitCode === 1) {
        return null;
      }
      throw error;
    }
  }

  async hasCommit(commitId: string): Promise<boolean> {
    try {
      await this.exec(['cat-file', '-e', `${commitId}^{commit}`]);
      return true;
    } catch (error) {
      if (error instanceof ProcessError && error.exitCode !== undefined) {
        return false;
      }
      throw error;
    }
  }

  async listFiles(): Promise<string[]> {
    const out = await this.exec(['-c', 'core.quotePath=false', 'ls-files', '-z']);
    return out.split('\0').filter((p) => p.length > 0);
  }

  /**
   * Streams commits oldest first. Renames are reported as delete plus add so a
   * path-restricted log sees the same per-file counts as a full one.
   */
  async *commits(query: CommitQuery = {}): AsyncGenerator<RawCommit> {
    const args = [
      '-c',
      'core.quotePath=false',
      'log',
      '--reverse',
      '--topo-order',
      '--no-renames',
      '--numstat',
      `--format=${COMMIT_HEADER_FORMAT}`,
    ];
    if (query.paths && query.paths.length > 0) {
      args.push('--full-history');
    }
    const until = query.until ?? 'HEAD';
    args.push(query.since ? `${query.since}..${until}` : until);
    if (query.paths && query.paths.length > 0) {
      args.push('--', ...query.paths);
    }

    const child = spawn('git', args, { cwd: this.repoRoot });
    let stderr = '';
    child.stderr.on('data', (data) => {
      stderr += data.toString();
    });

    const exited = new Promise<number | null>((resolve, reject) => {
      child.on('error', (err) =>
        reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err })),
      );
      child.on('close', (code) => resolve(code));
    });

    const parser = new CommitLogParser();
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    let finished = false;
    try {
      for await (const line of lines) {
        const commit = parser.push(line);
        if (commit) {
          yield commit;
        }
      }

      const code = await exited;
      if (code !== 0) {
        throw new ProcessError(`git log failed: ${stderr.trim()}`, { exitCode: code ?? undefined });
      }
      finished = true;

      const last = parser.end();
      if (last) {
        yield last;
      }
    } finally {
      lines.close();
      if (!finished && child.exitCode === null) {
        child.kill();
      }
    }
  }
}
