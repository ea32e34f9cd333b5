import { z } from 'zod';

export const SORT_KEYS = ['commitCount', 'latestChange', 'totalChanges', 'authorCount'] as const;

export const SortKeySchema = z.enum(SORT_KEYS);
export type SortKey = z.infer<typeof SortKeySchema>;

export const DEFAULT_GLOB_PATTERN = '**/*';

export const ScanConfigSchema = z.object({
  /** Only files matching this pattern ever reach the cache */
  glob: z.string().min(1).default(DEFAULT_GLOB_PATTERN),
  /** Commits per durable flush; the cursor advances once per batch */
  batchSize: z.number().int().positive().default(50),
  /** Capacity of each queue between pipeline stages */
  queueCapacity: z.number().int().positive().default(256),
});

export const CacheConfigSchema = z.object({
  /** Cache root, relative to the repository root unless absolute */
  dir: z.string().default('.histree/cache'),
});

export const LazyConfigSchema = z.object({
  mode: z.enum(['auto', 'on', 'off']).default('auto'),
  /** In `auto` mode, repositories with more tracked files than this load lazily */
  fileThreshold: z.number().int().positive().default(10_000),
});

export const ViewConfigSchema = z.object({
  sortKey: SortKeySchema.default('commitCount'),
  depth: z.number().int().min(1).default(2),
  /** Children shown per directory */
  limit: z.number().int().positive().default(50),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scan: ScanConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  lazy: LazyConfigSchema.default({}),
  view: ViewConfigSchema.default({}),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type LazyConfig = z.infer<typeof LazyConfigSchema>;
export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/** Partial config accepted from YAML files and CLI flags. */
export type ConfigInput = z.input<typeof ConfigSchema>;
