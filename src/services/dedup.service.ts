/**
 * Deduplication store.
 *
 * Session tier: an exact Redis set per session, refreshed to the session TTL
 * on every write. Account tier: a Bloom filter per user kept in a Redis
 * bitmap, reset once it has absorbed its sized capacity.
 *
 * Redis failures surface as DedupStoreUnavailableError; nothing falls back
 * to process memory.
 */

import type { Redis } from 'ioredis';
import { redis } from '../config/redis.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { DedupStoreUnavailableError, TimeoutError } from '../utils/errors.js';
import { bloomParameters, bloomPositions } from '../utils/bloom.js';
import type { BloomParameters } from '../utils/bloom.js';

export interface DedupStore {
  sessionSeen(sessionId: string): Promise<Set<string>>;
  sessionMark(sessionId: string, ids: readonly string[]): Promise<void>;
  /** Probabilistic: false positives are possible, false negatives are not. */
  accountProbablySeen(userId: string, id: string): Promise<boolean>;
  /** Batched form of {@link accountProbablySeen}; returns the ids that probably were seen. */
  accountProbablySeenMany(userId: string, ids: readonly string[]): Promise<Set<string>>;
  accountMark(userId: string, ids: readonly string[]): Promise<void>;
}

export interface RedisDedupStoreOptions {
  sessionTtlSeconds: number;
  timeoutMs: number;
  accountCapacity: number;
  accountFpRate: number;
  accountTtlSeconds: number;
}

const sessionKey = (sessionId: string) => `feed:session-seen:${sessionId}`;
const accountBitsKey = (userId: string) => `feed:account-seen:${userId}`;
const accountCountKey = (userId: string) => `feed:account-seen:${userId}:count`;

export function defaultDedupOptions(): RedisDedupStoreOptions {
  return {
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    timeoutMs: env.DEDUP_TIMEOUT_MS,
    accountCapacity: env.ACCOUNT_SEEN_CAPACITY,
    accountFpRate: env.ACCOUNT_SEEN_FP_RATE,
    accountTtlSeconds: env.ACCOUNT_SEEN_TTL_DAYS * 24 * 60 * 60,
  };
}

export class RedisDedupStore implements DedupStore {
  private readonly bloom: BloomParameters;

  constructor(
    private readonly options: RedisDedupStoreOptions = defaultDedupOptions(),
    private readonly client: Redis = redis,
  ) {
    this.bloom = bloomParameters(options.accountCapacity, options.accountFpRate);
  }

  async sessionSeen(sessionId: string): Promise<Set<string>> {
    const members = await this.guard('sessionSeen', () => this.client.smembers(sessionKey(sessionId)));
    return new Set(members);
  }

  async sessionMark(sessionId: string, ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    const key = sessionKey(sessionId);
    await this.guard('sessionMark', async () => {
      await this.client.sadd(key, ...ids);
      await this.client.expire(key, this.options.sessionTtlSeconds);
    });
  }

  async accountProbablySeen(userId: string, id: string): Promise<boolean> {
    const seen = await this.accountProbablySeenMany(userId, [id]);
    return seen.has(id);
  }

  async accountProbablySeenMany(userId: string, ids: readonly string[]): Promise<Set<string>> {
    if (ids.length === 0) return new Set();

    const positions = ids.map((id) => bloomPositions(id, this.bloom));
    const args = positions.flat().flatMap((offset) => ['GET', 'u1', String(offset)]);
    const bits = await this.guard('accountProbablySeen', () =>
      this.client.call('BITFIELD', accountBitsKey(userId), ...args),
    );

    if (!Array.isArray(bits)) {
      throw new DedupStoreUnavailableError('accountProbablySeen', new Error('Unexpected BITFIELD reply'));
    }

    const seen = new Set<string>();
    ids.forEach((id, i) => {
      const start = i * this.bloom.hashes;
      const all = bits.slice(start, start + this.bloom.hashes).every((bit: unknown) => Number(bit) === 1);
      if (all) seen.add(id);
    });
    return seen;
  }

  async accountMark(userId: string, ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    const bitsKey = accountBitsKey(userId);
    const countKey = accountCountKey(userId);

    await this.guard('accountMark', async () => {
      const count = await this.client.incrby(countKey, ids.length);
      if (count > this.options.accountCapacity) {
        // Capacity reached: start a fresh filter.
        await this.client.del(bitsKey);
        await this.client.set(countKey, String(ids.length));
        logger.info({ userId, count }, 'Account seen filter reset');
      }

      const args = ids
        .flatMap((id) => bloomPositions(id, this.bloom))
        .flatMap((offset) => ['SET', 'u1', String(offset), '1']);
      await this.client.call('BITFIELD', bitsKey, ...args);
      await this.client.expire(bitsKey, this.options.accountTtlSeconds);
      await this.client.expire(countKey, this.options.accountTtlSeconds);
    });
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        run(),
        this.options.timeoutMs,
        () => new TimeoutError(this.options.timeoutMs, `dedup ${operation}`),
      );
    } catch (error) {
      logger.error({ operation, err: error }, 'Dedup store unavailable');
      throw new DedupStoreUnavailableError(operation, error);
    }
  }
}
