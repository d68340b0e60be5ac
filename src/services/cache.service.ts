import { z } from 'zod';
import { redis } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { TimeoutError } from '../utils/errors.js';
import type { ContentMetadata, UserContext } from '../types/index.js';

const TTL = {
  CONTEXT: env.CONTEXT_CACHE_TTL_SECONDS,
  METADATA: env.METADATA_CACHE_TTL_SECONDS,
};

const REDIS_TIMEOUT = 2000;

const contextKey = (userId: string) => `feed:ctx:${userId}`;
const metadataKey = (id: string) => `feed:meta:${id}`;

const cachedContextSchema = z.object({
  userId: z.string(),
  genres: z.array(z.string()),
  friendIds: z.array(z.string()),
  seenIds: z.array(z.string()),
  savedIds: z.array(z.string()),
  loadedAt: z.string(),
});

const cachedMetadataSchema = z.object({
  id: z.string(),
  title: z.string(),
  overview: z.string().nullable(),
  posterPath: z.string().nullable(),
  youtubeKey: z.string().nullable(),
  imageUrl: z.string().nullable(),
  contentType: z.string(),
  genres: z.array(z.string()),
  releaseDate: z.string().nullable(),
  voteAverage: z.number().nullable(),
});

const cacheTimeout = () => new TimeoutError(REDIS_TIMEOUT, 'cache');

async function safeGet(key: string): Promise<string | null> {
  try {
    return await withTimeout(redis.get(key), REDIS_TIMEOUT, cacheTimeout);
  } catch {
    logger.warn({ key }, 'Cache get failed, skipping');
    return null;
  }
}

async function safeMget(keys: string[]): Promise<(string | null)[]> {
  if (keys.length === 0) return [];
  try {
    return await withTimeout(redis.mget(keys), REDIS_TIMEOUT, cacheTimeout);
  } catch {
    logger.warn({ count: keys.length }, 'Cache mget failed, skipping');
    return keys.map(() => null);
  }
}

async function safeSet(key: string, ttl: number, value: string): Promise<void> {
  try {
    await withTimeout(redis.setex(key, ttl, value), REDIS_TIMEOUT, cacheTimeout);
  } catch {
    logger.warn({ key }, 'Cache set failed, skipping');
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Short-lived read-through caches. Every failure degrades to a miss: these
 * entries are an optimisation, never the source of truth.
 */
export const cacheService = {
  async getContext(userId: string): Promise<UserContext | null> {
    const data = await safeGet(contextKey(userId));
    if (!data) return null;

    const parsed = cachedContextSchema.safeParse(parseJson(data));
    if (!parsed.success) return null;

    const cached = parsed.data;
    return Object.freeze({
      userId: cached.userId,
      genres: new Set(cached.genres),
      friendIds: new Set(cached.friendIds),
      seenIds: new Set(cached.seenIds),
      savedIds: new Set(cached.savedIds),
      loadedAt: cached.loadedAt,
      degradedSources: [],
    });
  },

  async setContext(context: UserContext): Promise<void> {
    if (TTL.CONTEXT === 0) return;
    const payload = {
      userId: context.userId,
      genres: [...context.genres],
      friendIds: [...context.friendIds],
      seenIds: [...context.seenIds],
      savedIds: [...context.savedIds],
      loadedAt: context.loadedAt,
    };
    await safeSet(contextKey(context.userId), TTL.CONTEXT, JSON.stringify(payload));
  },

  async getMetadataMany(ids: string[]): Promise<Map<string, ContentMetadata>> {
    const values = await safeMget(ids.map(metadataKey));
    const found = new Map<string, ContentMetadata>();

    values.forEach((raw, i) => {
      if (!raw) return;
      const parsed = cachedMetadataSchema.safeParse(parseJson(raw));
      if (parsed.success) found.set(ids[i], parsed.data);
    });
    return found;
  },

  async setMetadataMany(entries: ContentMetadata[]): Promise<void> {
    await Promise.all(
      entries.map((entry) => safeSet(metadataKey(entry.id), TTL.METADATA, JSON.stringify(entry))),
    );
  },
};

export type CacheService = typeof cacheService;
