import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { BatchFlushed } from '../types/events';

const flushed: BatchFlushed = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00Z',
  sessionId: 'session-1',
  type: 'BatchFlushed',
  payload: {
    scope: '',
    commits: 2,
    events: 5,
    processedCount: 2,
    lastProcessedCommitId: 'c2',
  },
};

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('logs events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'histree-logger-test-'));
    const logPath = join(tmpDir, 'session.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(flushed);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(flushed));
  });

  it('appends multiple events', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'histree-logger-test-'));
    const logPath = join(tmpDir, 'session.jsonl');
    const logger = new JsonlLogger(logPath);
    const second = { ...flushed, timestamp: '2023-01-01T00:00:01Z' };

    await logger.log(flushed);
    await logger.trace(second, 'ignored');

    const content = await fs.readFile(logPath, 'utf8');
    const lines = content.trim().split('\n');
    expect(lines.length).toBe(2);
    expect(JSON.parse(lines[0])).toEqual(flushed);
    expect(JSON.parse(lines[1])).toEqual(second);
  });

  it('prefixes messages for child loggers', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null');
    logger.child({ a: 1 }).debug('d');
    logger.child({ a: 1 }).child({ b: 'x' }).info('i');
    logger.child({}).warn('w');

    expect(debugSpy).toHaveBeenCalledWith('[a=1] d');
    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] i');
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'histree-logger-test-'));
    // A directory path makes appendFile fail with EISDIR.
    const logPath = tmpDir;
    const logger = new JsonlLogger(logPath);

    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(logger.log(flushed)).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to log file at ${logPath}`,
      expect.any(Error),
    );
  });
});
