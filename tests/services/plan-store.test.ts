import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/config/redis.js', async () => {
  const { MemoryRedis } = await import('../helpers/memory-redis.js');
  return { redis: new MemoryRedis() };
});

import { RedisPlanStore } from '../../src/services/plan-store.service.js';
import { redis } from '../../src/config/redis.js';
import { PlanStoreUnavailableError } from '../../src/utils/errors.js';
import type { FeedPlan } from '../../src/types/index.js';

function samplePlan(overrides: Partial<FeedPlan> = {}): FeedPlan {
  return {
    planId: 's1',
    userId: 'u1',
    variant: 'for_you',
    epoch: 1,
    items: [
      { id: 't1', bucket: 'trending' },
      { id: 'p1', bucket: 'personalized' },
      { id: 'c1', bucket: 'friends' },
    ],
    generatedAt: '2026-03-01T12:00:00.000Z',
    ttlSeconds: 600,
    mixSummary: {
      counts: { trending: 1, personalized: 1, friends: 1 },
      sources: { trending: ['trending'], personalized: ['genre:drama'], friends: ['community'] },
      coldStart: { genres: false, friends: true },
      toppedUp: 0,
      images: 0,
      degradedSources: [],
    },
    ...overrides,
  };
}

describe('RedisPlanStore', () => {
  let store: RedisPlanStore;

  beforeEach(async () => {
    vi.restoreAllMocks();
    await redis.flushall();
    store = new RedisPlanStore(redis);
  });

  it('should return null for a session without a plan', async () => {
    expect(await store.get('s1')).toBeNull();
  });

  it('should create a plan once and read it back unchanged', async () => {
    const plan = samplePlan();

    expect(await store.createIfAbsent(plan)).toBe(true);
    expect(await store.get('s1')).toEqual(plan);
  });

  it('should keep the variant and interleaved images of a plan', async () => {
    const plan = samplePlan({
      variant: 'trending',
      items: [
        { id: 't1', bucket: 'trending' },
        { id: 'img1', bucket: 'image' },
      ],
    });

    await store.createIfAbsent(plan);

    expect(await store.get('s1')).toEqual(plan);
  });

  it('should refuse to overwrite a live plan', async () => {
    await store.createIfAbsent(samplePlan());

    const created = await store.createIfAbsent(samplePlan({ epoch: 2, items: [] }));

    expect(created).toBe(false);
    expect((await store.get('s1'))?.epoch).toBe(1);
  });

  it('should store the plan with its TTL', async () => {
    await store.createIfAbsent(samplePlan({ ttlSeconds: 90 }));

    expect(await redis.ttl('feed:plan:s1')).toBe(90);
  });

  it('should treat a malformed stored plan as absent', async () => {
    await redis.set('feed:plan:s1', '{"planId":"s1"}');

    expect(await store.get('s1')).toBeNull();
  });

  it('should hand out increasing epochs per session', async () => {
    expect(await store.nextEpoch('s1')).toBe(1);
    expect(await store.nextEpoch('s1')).toBe(2);
    expect(await store.nextEpoch('s2')).toBe(1);
    expect(await redis.ttl('feed:plan-epoch:s1')).toBe(86_400);
  });

  it('should surface store errors as PlanStoreUnavailableError', async () => {
    vi.spyOn(redis, 'get').mockRejectedValueOnce(new Error('ECONNRESET'));

    await expect(store.get('s1')).rejects.toBeInstanceOf(PlanStoreUnavailableError);
  });
});
