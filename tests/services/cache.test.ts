import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/config/redis.js', async () => {
  const { MemoryRedis } = await import('../helpers/memory-redis.js');
  return { redis: new MemoryRedis() };
});

import { cacheService } from '../../src/services/cache.service.js';
import { redis } from '../../src/config/redis.js';
import { metadataFor } from '../helpers/fakes.js';
import type { UserContext } from '../../src/types/index.js';

const context: UserContext = {
  userId: 'u1',
  genres: new Set(['drama']),
  friendIds: new Set(['u2']),
  seenIds: new Set(['m1']),
  savedIds: new Set(['m2', 'm3']),
  loadedAt: '2026-03-01T12:00:00.000Z',
  degradedSources: [],
};

describe('Cache Service', () => {
  beforeEach(async () => {
    vi.restoreAllMocks();
    await redis.flushall();
  });

  describe('context', () => {
    it('should return null on a miss', async () => {
      expect(await cacheService.getContext('u1')).toBeNull();
    });

    it('should round-trip sets through the cache', async () => {
      await cacheService.setContext(context);

      const cached = await cacheService.getContext('u1');

      expect(cached?.savedIds).toEqual(new Set(['m2', 'm3']));
      expect(cached?.genres).toEqual(new Set(['drama']));
      expect(cached?.loadedAt).toBe('2026-03-01T12:00:00.000Z');
    });

    it('should use the feed:ctx:{userId} key with the context TTL', async () => {
      await cacheService.setContext(context);

      expect(await redis.ttl('feed:ctx:u1')).toBe(30);
    });

    it('should treat unparseable entries as a miss', async () => {
      await redis.set('feed:ctx:u1', 'not json');

      expect(await cacheService.getContext('u1')).toBeNull();
    });

    it('should degrade to a miss when Redis fails', async () => {
      vi.spyOn(redis, 'get').mockRejectedValueOnce(new Error('ECONNREFUSED'));

      expect(await cacheService.getContext('u1')).toBeNull();
    });

    it('should give up on a Redis call that never answers', async () => {
      vi.useFakeTimers();
      try {
        vi.spyOn(redis, 'get').mockImplementationOnce(() => new Promise<never>(() => undefined));

        const pending = cacheService.getContext('u1');
        await vi.advanceTimersByTimeAsync(2000);

        expect(await pending).toBeNull();
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe('metadata', () => {
    it('should return only the cached ids', async () => {
      await cacheService.setMetadataMany([metadataFor('a'), metadataFor('c')]);

      const found = await cacheService.getMetadataMany(['a', 'b', 'c']);

      expect([...found.keys()]).toEqual(['a', 'c']);
      expect(found.get('a')).toEqual(metadataFor('a'));
    });

    it('should expire metadata after the metadata TTL', async () => {
      await cacheService.setMetadataMany([metadataFor('a')]);

      expect(await redis.ttl('feed:meta:a')).toBe(300);
    });

    it('should ignore entries of the wrong shape', async () => {
      await redis.set('feed:meta:a', JSON.stringify({ id: 'a' }));

      expect((await cacheService.getMetadataMany(['a'])).size).toBe(0);
    });

    it('should degrade to all misses when Redis fails', async () => {
      vi.spyOn(redis, 'mget').mockRejectedValueOnce(new Error('ECONNREFUSED'));

      expect((await cacheService.getMetadataMany(['a', 'b'])).size).toBe(0);
    });
  });
});
