/**
 * Wires the feed engine from its collaborators. `createFeedEngine` takes
 * every store and backend explicitly; `createDefaultEngine` binds them to
 * Redis and Supabase.
 */

import { env } from './config/env.js';
import { loadFeedConfig } from './config/feed.js';
import type { FeedConfig } from './config/feed.js';
import { redis } from './config/redis.js';
import {
  IndexPool,
  RedisIndexSnapshotSource,
  parseBucketFallbacks,
} from './services/index-pool.service.js';
import type { IndexSnapshotSource } from './services/index-pool.service.js';
import { ContextLoader, supabaseContextSources } from './services/context.service.js';
import type { ContextCache, ContextSources } from './services/context.service.js';
import { RedisDedupStore } from './services/dedup.service.js';
import type { DedupStore } from './services/dedup.service.js';
import { RedisPlanStore } from './services/plan-store.service.js';
import type { PlanStore } from './services/plan-store.service.js';
import { Paginator } from './services/pagination.service.js';
import { Hydrator, supabaseMetadataBackend } from './services/hydration.service.js';
import type { MetadataBackend, MetadataCache } from './services/hydration.service.js';
import { cacheService } from './services/cache.service.js';
import { analyticsService } from './services/analytics.service.js';
import type { AnalyticsEmitter } from './services/analytics.service.js';
import { FeedService } from './services/feed.service.js';
import type { FeedServiceOptions } from './services/feed.service.js';
import { ImageMixer, PlanGenerator, createPlanPipeline } from './pipeline/index.js';
import { RedisRateLimitStore } from './middleware/rateLimiter.js';
import type { RateLimitStore } from './middleware/rateLimiter.js';
import { withTimeout } from './utils/timeout.js';
import { logger } from './utils/logger.js';

export interface FeedEngineDeps {
  indexSource: IndexSnapshotSource;
  contextSources: ContextSources;
  contextCache?: ContextCache;
  dedup: DedupStore;
  plans: PlanStore;
  metadata: MetadataBackend;
  metadataCache: MetadataCache;
  analytics: AnalyticsEmitter;
  /** Reports whether the shared store is reachable. */
  ping: () => Promise<boolean>;
  config?: FeedConfig;
  cursorSecret?: string;
  indexRefreshIntervalMs?: number;
  indexFallbacks?: Record<string, string>;
  contextSourceTimeoutMs?: number;
  feedOptions?: Partial<FeedServiceOptions>;
  rateLimitStore: RateLimitStore;
  rateLimits?: Partial<RateLimits>;
}

/** Requests per user per minute. */
export interface RateLimits {
  feedPerMinute: number;
  eventsPerMinute: number;
}

export interface FeedEngine {
  index: IndexPool;
  contextLoader: ContextLoader;
  generator: PlanGenerator;
  paginator: Paginator;
  hydrator: Hydrator;
  feed: FeedService;
  ping: () => Promise<boolean>;
  rateLimitStore: RateLimitStore;
  rateLimits: RateLimits;
}

export function createFeedEngine(deps: FeedEngineDeps): FeedEngine {
  const config = deps.config ?? loadFeedConfig();

  const index = new IndexPool(deps.indexSource, {
    refreshIntervalMs: deps.indexRefreshIntervalMs ?? env.INDEX_REFRESH_INTERVAL_MS,
    fallbacks: deps.indexFallbacks ?? parseBucketFallbacks(env.INDEX_BUCKET_FALLBACKS),
  });
  const contextLoader = new ContextLoader(deps.contextSources, {
    sourceTimeoutMs: deps.contextSourceTimeoutMs ?? env.CONTEXT_SOURCE_TIMEOUT_MS,
    cache: deps.contextCache,
  });
  const pipeline = createPlanPipeline({ index, contextLoader, dedup: deps.dedup, config });
  const images = new ImageMixer(index, config);
  const generator = new PlanGenerator({ pipeline, images, plans: deps.plans, dedup: deps.dedup, config });
  const paginator = new Paginator(deps.plans, deps.cursorSecret ?? env.CURSOR_SECRET);
  const hydrator = new Hydrator(deps.metadata, deps.metadataCache);

  const feed = new FeedService({
    contextLoader,
    generator,
    paginator,
    hydrator,
    dedup: deps.dedup,
    analytics: deps.analytics,
    options: {
      defaultLimit: env.FEED_DEFAULT_LIMIT,
      maxLimit: env.FEED_MAX_LIMIT,
      deadlineMs: env.REQUEST_DEADLINE_MS,
      ...deps.feedOptions,
    },
  });

  return {
    index,
    contextLoader,
    generator,
    paginator,
    hydrator,
    feed,
    ping: deps.ping,
    rateLimitStore: deps.rateLimitStore,
    rateLimits: {
      feedPerMinute: env.RATE_LIMIT_FEED_PER_MINUTE,
      eventsPerMinute: env.RATE_LIMIT_EVENTS_PER_MINUTE,
      ...deps.rateLimits,
    },
  };
}

async function pingRedis(): Promise<boolean> {
  try {
    return (await withTimeout(redis.ping(), 500)) === 'PONG';
  } catch (err) {
    logger.warn({ err }, 'Redis ping failed');
    return false;
  }
}

export function createDefaultEngine(): FeedEngine {
  return createFeedEngine({
    indexSource: new RedisIndexSnapshotSource(redis),
    contextSources: supabaseContextSources,
    contextCache: cacheService,
    dedup: new RedisDedupStore(),
    plans: new RedisPlanStore(redis),
    metadata: supabaseMetadataBackend,
    metadataCache: cacheService,
    analytics: analyticsService,
    ping: pingRedis,
    rateLimitStore: new RedisRateLimitStore(redis),
  });
}
