import { promises as fs } from 'fs';
import { CacheCorruptionError, isErrnoException } from '@histree/shared';
import { locationForKey, type CacheLocation } from './location';
import { CacheStore, type CacheSnapshot } from './store';

export interface CatalogEntry {
  location: CacheLocation;
  snapshot: CacheSnapshot | null;
  /** Why the cache could not be read */
  error?: string;
}

/**
 * Every cache under `cacheDir`, read without taking locks, ordered by key.
 */
export async function listCaches(cacheDir: string): Promise<CatalogEntry[]> {
  let names: string[];
  try {
    const entries = await fs.readdir(cacheDir, { withFileTypes: true });
    names = entries.filter((e) => e.isDirectory()).map((e) => e.name);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const catalog: CatalogEntry[] = [];
  for (const name of names.sort()) {
    const location = locationForKey(cacheDir, name);
    try {
      const snapshot = await CacheStore.inspect(location);
      if (snapshot) {
        catalog.push({ location, snapshot });
      }
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        throw error;
      }
      catalog.push({ location, snapshot: null, error: error.message });
    }
  }
  return catalog;
}
