import { env } from './env.js';
import type { BucketKind, BucketShares } from '../types/index.js';
import type { TieredShuffleConfig } from '../pipeline/shuffle.js';

export interface FeedConfig {
  shares: BucketShares;
  /** Multiplier applied to each bucket's request to leave room for exclusions. */
  oversample: number;
  /** A plan holds at least this many pages worth of items... */
  planPageMultiple: number;
  /** ...and never fewer than this many slots. */
  minPlanSize: number;
  shuffle: TieredShuffleConfig;
  /** Score multiplier for items the user has probably seen before. */
  seenPenalty: number;
  /** Genre buckets read for users without genre preferences. */
  defaultGenres: string[];
  /** A trending-only plan reads this many times its target size. */
  trendingOnlyBuffer: number;
  /** One image after every `imageEvery` planned items; 0 turns images off. */
  imageEvery: number;
  /** Kept shorter than the session seen-set TTL. */
  planTtlSeconds: number;
}

export function loadFeedConfig(): FeedConfig {
  return {
    shares: {
      trending: env.FEED_TRENDING_SHARE,
      personalized: env.FEED_PERSONALIZED_SHARE,
      friends: env.FEED_FRIENDS_SHARE,
    },
    oversample: env.FEED_OVERSAMPLE,
    planPageMultiple: env.FEED_PLAN_PAGE_MULTIPLE,
    minPlanSize: env.FEED_MIN_PLAN_SIZE,
    shuffle: {
      fixedHead: env.FEED_SHUFFLE_FIXED_HEAD,
      middleBand: env.FEED_SHUFFLE_MIDDLE_BAND,
      middleWindow: env.FEED_SHUFFLE_MIDDLE_WINDOW,
    },
    seenPenalty: env.FEED_SEEN_PENALTY,
    defaultGenres: env.FEED_DEFAULT_GENRES,
    trendingOnlyBuffer: env.FEED_TRENDING_ONLY_BUFFER,
    imageEvery: env.FEED_IMAGE_EVERY,
    planTtlSeconds: env.FEED_PLAN_TTL_SECONDS,
  };
}

export function planTargetSize(pageSize: number, config: FeedConfig): number {
  return Math.max(pageSize * config.planPageMultiple, config.minPlanSize);
}

const EPSILON = 1e-9;

/** Candidates requested from the index for one bucket, before oversampling. */
export function bucketRequestSize(bucket: BucketKind, targetSize: number, config: FeedConfig): number {
  return Math.ceil(config.shares[bucket] * targetSize - EPSILON);
}

/**
 * Split `total` slots across buckets by share using largest remainders,
 * so the quotas always sum to `total`.
 */
export function allocateQuotas(
  total: number,
  shares: BucketShares,
  order: readonly BucketKind[],
): Record<BucketKind, number> {
  const quotas = { trending: 0, personalized: 0, friends: 0 };
  const remainders: Array<{ bucket: BucketKind; fraction: number; rank: number }> = [];
  let assigned = 0;

  order.forEach((bucket, rank) => {
    const exact = shares[bucket] * total;
    const whole = Math.floor(exact + EPSILON);
    quotas[bucket] = whole;
    assigned += whole;
    remainders.push({ bucket, fraction: exact - whole, rank });
  });

  remainders.sort((a, b) => b.fraction - a.fraction || a.rank - b.rank);
  for (let i = 0; assigned < total && i < remainders.length; i++, assigned++) {
    quotas[remainders[i].bucket] += 1;
  }
  return quotas;
}
