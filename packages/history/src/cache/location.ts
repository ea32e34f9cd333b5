import { createHash } from 'crypto';
import path from 'path';
import type { CacheIdentity } from './types';

export interface CacheLocation {
  key: string;
  dir: string;
  logPath: string;
  cursorPath: string;
  lockPath: string;
}

export function cacheKey(identity: CacheIdentity): string {
  const canonical = JSON.stringify({
    repoRoot: identity.repoRoot,
    glob: identity.glob,
    scope: identity.scope,
  });
  return createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

/**
 * Files of the cache for `identity` under `cacheDir`.
 */
export function resolveCacheLocation(cacheDir: string, identity: CacheIdentity): CacheLocation {
  return locationForKey(cacheDir, cacheKey(identity));
}

export function locationForKey(cacheDir: string, key: string): CacheLocation {
  const dir = path.join(cacheDir, key);
  return {
    key,
    dir,
    logPath: path.join(dir, 'events.jsonl'),
    cursorPath: path.join(dir, 'cursor.json'),
    lockPath: path.join(dir, 'writer.lock'),
  };
}
