import { z } from 'zod';

export const CACHE_SCHEMA_VERSION = 1;

export const HeaderRecordSchema = z.object({
  type: z.literal('header'),
  schemaVersion: z.number().int(),
  repoRoot: z.string(),
  glob: z.string(),
  scope: z.string(),
});

export const EventRecordSchema = z.object({
  type: z.literal('event'),
  path: z.string().min(1),
  commitId: z.string().min(1),
  author: z.string(),
  timestamp: z.number().int(),
  insertions: z.number().int().nonnegative(),
  deletions: z.number().int().nonnegative(),
});

export const SkipRecordSchema = z.object({
  type: z.literal('skip'),
  commitId: z.string().min(1),
  reason: z.string(),
});

const CursorFields = {
  lastProcessedCommitId: z.string().min(1),
  processedCount: z.number().int().nonnegative(),
  repoHeadAtScanStart: z.string().nullable(),
  writtenAt: z.string(),
};

export const CheckpointRecordSchema = z.object({
  type: z.literal('checkpoint'),
  ...CursorFields,
});

export const CacheRecordSchema = z.discriminatedUnion('type', [
  HeaderRecordSchema,
  EventRecordSchema,
  SkipRecordSchema,
  CheckpointRecordSchema,
]);

/** Contents of `cursor.json`, the fast-path copy of the latest checkpoint. */
export const CursorFileSchema = z.object(CursorFields);

export type HeaderRecord = z.infer<typeof HeaderRecordSchema>;
export type EventRecord = z.infer<typeof EventRecordSchema>;
export type SkipRecord = z.infer<typeof SkipRecordSchema>;
export type CheckpointRecord = z.infer<typeof CheckpointRecordSchema>;
export type CacheRecord = z.infer<typeof CacheRecordSchema>;
export type CursorFile = z.infer<typeof CursorFileSchema>;

/** What a cache is keyed on; caches with different identities never share files. */
export interface CacheIdentity {
  repoRoot: string;
  glob: string;
  /** Repository-relative subtree, empty for the whole repository */
  scope: string;
}

export interface SkippedCommit {
  commitId: string;
  reason: string;
}
