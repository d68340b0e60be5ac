/**
 * Candidate index pool.
 *
 * An external producer publishes each bucket as a complete, versioned
 * snapshot; the pool only ever reads the latest fully published version
 * and swaps its in-memory copy in one assignment. Entries are kept sorted
 * so `rangeTop` is a slice.
 */

import type { Redis } from 'ioredis';
import { z } from 'zod';
import { redis } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { BucketUnavailableError } from '../utils/errors.js';
import type { IndexEntry, IndexSnapshot } from '../types/index.js';

export interface IndexSnapshotSource {
  /** Latest published version of a bucket, or null if never published. */
  readVersion(bucket: string): Promise<number | null>;
  readSnapshot(bucket: string, version: number): Promise<IndexSnapshot | null>;
}

export interface IndexPoolOptions {
  /** How long a loaded snapshot is served before its version is re-checked. */
  refreshIntervalMs: number;
  /** Bucket name (or `prefix:*` pattern) to the bucket read in its place when missing. */
  fallbacks: Record<string, string>;
  now?: () => number;
}

interface LoadedSnapshot {
  version: number;
  entries: readonly IndexEntry[];
  checkedAt: number;
}

const indexEntrySchema = z.object({
  id: z.string().min(1),
  score: z.number().finite(),
  tags: z.array(z.string()).default([]),
  updatedAt: z.string(),
});

const indexSnapshotSchema = z.object({
  bucket: z.string(),
  version: z.number().int(),
  publishedAt: z.string(),
  entries: z.array(indexEntrySchema),
});

/** Descending score, then most recently updated, then id. */
export function compareEntries(a: IndexEntry, b: IndexEntry): number {
  if (b.score !== a.score) return b.score - a.score;
  const updated = Date.parse(b.updatedAt) - Date.parse(a.updatedAt);
  if (updated !== 0 && !Number.isNaN(updated)) return updated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Parse `trending=community,genre:*=trending` into a fallback map. */
export function parseBucketFallbacks(raw: string): Record<string, string> {
  const fallbacks: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const [from, to] = pair.split('=').map((part) => part.trim());
    if (from && to) fallbacks[from] = to;
  }
  return fallbacks;
}

export class IndexPool {
  private snapshots = new Map<string, LoadedSnapshot>();
  private inflight = new Map<string, Promise<LoadedSnapshot | null>>();
  private readonly now: () => number;

  constructor(
    private readonly source: IndexSnapshotSource,
    private readonly options: IndexPoolOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Whether a bucket has ever been published. */
  async exists(bucket: string): Promise<boolean> {
    return (await this.current(bucket)) !== null;
  }

  /**
   * Top `n` entries of the bucket's current snapshot. A never-published
   * bucket is served from its configured fallback, otherwise it fails with
   * BucketUnavailableError.
   */
  async rangeTop(bucket: string, n: number): Promise<IndexEntry[]> {
    const snapshot = await this.current(bucket);
    if (snapshot) return snapshot.entries.slice(0, Math.max(0, n));

    const fallback = this.fallbackFor(bucket);
    if (fallback && fallback !== bucket) {
      const fallbackSnapshot = await this.current(fallback);
      if (fallbackSnapshot) {
        logger.info({ bucket, fallback }, 'Index bucket missing, serving fallback');
        return fallbackSnapshot.entries.slice(0, Math.max(0, n));
      }
    }
    throw new BucketUnavailableError(bucket);
  }

  /** Version currently served for a bucket, if any. */
  versionOf(bucket: string): number | null {
    return this.snapshots.get(bucket)?.version ?? null;
  }

  private fallbackFor(bucket: string): string | undefined {
    const exact = this.options.fallbacks[bucket];
    if (exact) return exact;
    const separator = bucket.indexOf(':');
    if (separator === -1) return undefined;
    return this.options.fallbacks[`${bucket.slice(0, separator)}:*`];
  }

  private async current(bucket: string): Promise<LoadedSnapshot | null> {
    const cached = this.snapshots.get(bucket);
    if (cached && this.now() - cached.checkedAt < this.options.refreshIntervalMs) {
      return cached;
    }

    const pending = this.inflight.get(bucket);
    if (pending) return pending;

    const refresh = this.refresh(bucket, cached).finally(() => {
      this.inflight.delete(bucket);
    });
    this.inflight.set(bucket, refresh);
    return refresh;
  }

  private async refresh(bucket: string, cached: LoadedSnapshot | undefined): Promise<LoadedSnapshot | null> {
    let version: number | null = null;
    let snapshot: IndexSnapshot | null = null;

    try {
      version = await this.withRetry(() => this.source.readVersion(bucket));
      if (version === null) return cached ?? null;
      if (cached && cached.version === version) {
        const touched = { ...cached, checkedAt: this.now() };
        this.snapshots.set(bucket, touched);
        return touched;
      }
      const target = version;
      snapshot = await this.withRetry(() => this.source.readSnapshot(bucket, target));
    } catch (error) {
      if (cached) {
        logger.warn({ bucket, err: error }, 'Index refresh failed, serving previous snapshot');
        return cached;
      }
      throw new BucketUnavailableError(bucket, error);
    }

    if (!snapshot) {
      logger.warn({ bucket, version }, 'Index version pointer has no snapshot');
      return cached ?? null;
    }

    const loaded: LoadedSnapshot = {
      version: snapshot.version,
      entries: Object.freeze([...snapshot.entries].sort(compareEntries)),
      checkedAt: this.now(),
    };
    this.snapshots.set(bucket, loaded);
    logger.debug({ bucket, version: loaded.version, count: loaded.entries.length }, 'Index snapshot loaded');
    return loaded;
  }

  private async withRetry<T>(read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      logger.debug({ err: error }, 'Index read failed, retrying once');
      return read();
    }
  }
}

const versionKey = (bucket: string) => `feed:index:${bucket}:version`;
const snapshotKey = (bucket: string, version: number) => `feed:index:${bucket}:v${version}`;
const sequenceKey = (bucket: string) => `feed:index:${bucket}:seq`;

/** Reads snapshots written by {@link IndexPublisher}. */
export class RedisIndexSnapshotSource implements IndexSnapshotSource {
  constructor(private readonly client: Redis = redis) {}

  async readVersion(bucket: string): Promise<number | null> {
    const raw = await this.client.get(versionKey(bucket));
    if (raw === null) return null;
    const version = Number.parseInt(raw, 10);
    return Number.isNaN(version) ? null : version;
  }

  async readSnapshot(bucket: string, version: number): Promise<IndexSnapshot | null> {
    const raw = await this.client.get(snapshotKey(bucket, version));
    if (raw === null) return null;

    const parsed = indexSnapshotSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.error({ bucket, version, issues: parsed.error.issues.slice(0, 5) }, 'Malformed index snapshot');
      return null;
    }
    return parsed.data;
  }
}

/**
 * Producer side of the snapshot protocol: write the full snapshot under a
 * fresh version, then move the version pointer. Readers never see a
 * partially written bucket.
 */
export class IndexPublisher {
  constructor(
    private readonly client: Redis = redis,
    private readonly retentionSeconds = env.INDEX_SNAPSHOT_RETENTION_SECONDS,
  ) {}

  async publish(bucket: string, entries: IndexEntry[]): Promise<IndexSnapshot> {
    const version = await this.client.incr(sequenceKey(bucket));
    const snapshot: IndexSnapshot = {
      bucket,
      version,
      publishedAt: new Date().toISOString(),
      entries,
    };

    await this.client.set(snapshotKey(bucket, version), JSON.stringify(snapshot), 'EX', this.retentionSeconds);
    await this.client.set(versionKey(bucket), String(version));

    logger.info({ bucket, version, count: entries.length }, 'Index snapshot published');
    return snapshot;
  }
}
