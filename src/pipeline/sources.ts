/**
 * Candidate sources — one per plan bucket.
 *
 *   trending     -> the `trending` index bucket
 *   personalized -> the user's `genre:<g>` buckets, or the default genres
 *   friends      -> the user's `friends:<userId>` activity bucket, or `community`
 *
 * A trending-only plan runs TrendingSource alone with a deeper read.
 * Each source asks the index for its share of the plan times the
 * oversampling factor. Cold-start substitution only changes where a bucket
 * reads from; its quota is allocated later by the selector.
 */

import type { Source } from './interfaces.js';
import type { PlanCandidate, PlanQuery } from './types.js';
import type { IndexPool } from '../services/index-pool.service.js';
import { compareEntries } from '../services/index-pool.service.js';
import { bucketRequestSize } from '../config/feed.js';
import type { FeedConfig } from '../config/feed.js';
import { BucketUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { BucketKind, IndexEntry } from '../types/index.js';

export type CandidateIndex = Pick<IndexPool, 'rangeTop' | 'exists'>;

export const COMMUNITY_BUCKET = 'community';
export const TRENDING_BUCKET = 'trending';
export const IMAGE_BUCKET = 'images';

export const genreBucket = (genre: string) => `genre:${genre}`;
export const friendsBucket = (userId: string) => `friends:${userId}`;

function entryToCandidate(entry: IndexEntry, bucket: BucketKind, origin: string): PlanCandidate {
  return {
    id: entry.id,
    bucket,
    origin,
    score: entry.score,
    updatedAt: entry.updatedAt,
    tags: [...entry.tags],
    probablySeen: false,
    finalScore: entry.score,
    toppedUp: false,
  };
}

function requestSize(bucket: BucketKind, query: PlanQuery, config: FeedConfig): number {
  return bucketRequestSize(bucket, query.targetSize, config) * config.oversample;
}

/**
 * TrendingSource — globally popular content.
 * Also the pool the selector tops up from when a plan comes out short.
 */
export class TrendingSource implements Source<PlanQuery, PlanCandidate> {
  name = 'TrendingSource';

  constructor(
    private readonly index: CandidateIndex,
    private readonly config: FeedConfig,
  ) {}

  enable(): boolean {
    return true;
  }

  async getCandidates(query: PlanQuery): Promise<PlanCandidate[]> {
    const n =
      query.variant === 'trending'
        ? Math.ceil(query.targetSize * this.config.trendingOnlyBuffer)
        : requestSize('trending', query, this.config);
    const entries = await this.index.rangeTop(TRENDING_BUCKET, n);
    return entries.map((entry) => entryToCandidate(entry, 'trending', TRENDING_BUCKET));
  }
}

/**
 * PersonalizedSource — merges the top of every genre bucket the user follows.
 * Users without genre preferences read the configured default genres.
 */
export class PersonalizedSource implements Source<PlanQuery, PlanCandidate> {
  name = 'PersonalizedSource';

  constructor(
    private readonly index: CandidateIndex,
    private readonly config: FeedConfig,
  ) {}

  enable(query: PlanQuery): boolean {
    return query.variant === 'for_you';
  }

  genresFor(query: PlanQuery): string[] {
    const genres = query.context.genres.size > 0 ? [...query.context.genres] : this.config.defaultGenres;
    return [...genres].sort();
  }

  async getCandidates(query: PlanQuery): Promise<PlanCandidate[]> {
    const n = requestSize('personalized', query, this.config);
    const buckets = this.genresFor(query).map(genreBucket);
    if (buckets.length === 0) throw new BucketUnavailableError('personalized');

    const results = await Promise.allSettled(buckets.map((bucket) => this.index.rangeTop(bucket, n)));

    const merged = new Map<string, { entry: IndexEntry; origin: string }>();
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logger.warn({ requestId: query.requestId, bucket: buckets[i], err: result.reason }, 'Genre bucket skipped');
        return;
      }
      for (const entry of result.value) {
        const existing = merged.get(entry.id);
        if (!existing || compareEntries(entry, existing.entry) < 0) {
          merged.set(entry.id, { entry, origin: buckets[i] });
        }
      }
    });

    if (results.every((result) => result.status === 'rejected')) {
      throw new BucketUnavailableError('personalized');
    }

    return [...merged.values()]
      .sort((a, b) => compareEntries(a.entry, b.entry))
      .slice(0, n)
      .map(({ entry, origin }) => entryToCandidate(entry, 'personalized', origin));
  }
}

/**
 * FriendsSource — activity of followed accounts, precomputed per user by
 * the index producer. Users who follow nobody, or whose activity bucket was
 * never published, read the community bucket.
 */
export class FriendsSource implements Source<PlanQuery, PlanCandidate> {
  name = 'FriendsSource';

  constructor(
    private readonly index: CandidateIndex,
    private readonly config: FeedConfig,
  ) {}

  enable(query: PlanQuery): boolean {
    return query.variant === 'for_you';
  }

  async originFor(query: PlanQuery): Promise<string> {
    if (query.context.friendIds.size === 0) return COMMUNITY_BUCKET;
    const bucket = friendsBucket(query.userId);
    if (await this.index.exists(bucket)) return bucket;
    logger.debug({ requestId: query.requestId, bucket }, 'Friends activity bucket missing, using community');
    return COMMUNITY_BUCKET;
  }

  async getCandidates(query: PlanQuery): Promise<PlanCandidate[]> {
    const origin = await this.originFor(query);
    const entries = await this.index.rangeTop(origin, requestSize('friends', query, this.config));
    return entries.map((entry) => entryToCandidate(entry, 'friends', origin));
  }
}
