import { describe, it, expect, beforeEach } from 'vitest';
import { createHmac } from 'crypto';
import { Paginator } from '../../src/services/pagination.service.js';
import { ExpiredSessionError, InvalidCursorError } from '../../src/utils/errors.js';
import { InMemoryPlanStore } from '../helpers/fakes.js';
import type { FeedPlan } from '../../src/types/index.js';

function planOf(sessionId: string, ids: string[]): FeedPlan {
  return {
    planId: sessionId,
    userId: 'u1',
    variant: 'for_you',
    epoch: 1,
    items: ids.map((id) => ({ id, bucket: 'trending' })),
    generatedAt: '2026-03-01T12:00:00.000Z',
    ttlSeconds: 600,
    mixSummary: {
      counts: { trending: ids.length, personalized: 0, friends: 0 },
      sources: { trending: ['trending'], personalized: [], friends: [] },
      coldStart: { genres: false, friends: false },
      toppedUp: 0,
      images: 0,
      degradedSources: [],
    },
  };
}

function signedCursor(payload: object, secret = 'test-secret'): string {
  const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
  return `${body}.${createHmac('sha256', secret).update(body).digest('base64url')}`;
}

describe('Paginator', () => {
  let plans: InMemoryPlanStore;
  let paginator: Paginator;
  const plan = planOf('s1', ['a', 'b', 'c', 'd', 'e']);

  beforeEach(async () => {
    plans = new InMemoryPlanStore();
    await plans.createIfAbsent(plan);
    paginator = new Paginator(plans, 'test-secret');
  });

  describe('slice', () => {
    it('should start at offset 0 without a cursor', () => {
      const page = paginator.slice(null, plan, 2);

      expect(page.items.map((i) => i.id)).toEqual(['a', 'b']);
      expect(page.offset).toBe(0);
      expect(page.hasMore).toBe(true);
      expect(page.nextCursor).not.toBeNull();
    });

    it('should carry the next offset explicitly in the cursor', () => {
      const page = paginator.slice(null, plan, 2);

      expect(paginator.parse(page.nextCursor ?? '')).toEqual({ sessionId: 's1', offset: 2 });
    });

    it('should continue from the cursor without repeating items', () => {
      const first = paginator.slice(null, plan, 2);
      const second = paginator.slice(first.nextCursor, plan, 2);
      const third = paginator.slice(second.nextCursor, plan, 2);

      expect(second.items.map((i) => i.id)).toEqual(['c', 'd']);
      expect(third.items.map((i) => i.id)).toEqual(['e']);
      expect(third.hasMore).toBe(false);
      expect(third.nextCursor).toBeNull();
    });

    it('should report no more items when a page ends exactly at the plan end', () => {
      const page = paginator.slice(paginator.encode({ sessionId: 's1', offset: 3 }), plan, 2);

      expect(page.items.map((i) => i.id)).toEqual(['d', 'e']);
      expect(page.hasMore).toBe(false);
    });

    it('should return an empty last page for an offset past the end', () => {
      const page = paginator.slice(paginator.encode({ sessionId: 's1', offset: 9 }), plan, 2);

      expect(page.items).toEqual([]);
      expect(page.hasMore).toBe(false);
    });

    it('should reject a cursor that belongs to another session', () => {
      const foreign = paginator.encode({ sessionId: 's2', offset: 2 });

      expect(() => paginator.slice(foreign, plan, 2)).toThrow(InvalidCursorError);
    });

    it('should give identical pages to concurrent readers', () => {
      const cursor = paginator.encode({ sessionId: 's1', offset: 1 });

      expect(paginator.slice(cursor, plan, 3)).toEqual(paginator.slice(cursor, plan, 3));
    });
  });

  describe('parse', () => {
    it('should reject malformed cursors', () => {
      expect(() => paginator.parse('garbage')).toThrow(InvalidCursorError);
      expect(() => paginator.parse('a.b.c')).toThrow(InvalidCursorError);
      expect(() => paginator.parse('')).toThrow(InvalidCursorError);
    });

    it('should reject a cursor whose payload was edited', () => {
      const cursor = paginator.encode({ sessionId: 's1', offset: 2 });
      const [, signature] = cursor.split('.');
      const forged = `${Buffer.from(JSON.stringify({ s: 's1', o: 0 })).toString('base64url')}.${signature}`;

      expect(() => paginator.parse(forged)).toThrow(InvalidCursorError);
    });

    it('should reject a cursor signed with another secret', () => {
      const cursor = signedCursor({ s: 's1', o: 2 }, 'other-secret');

      expect(() => paginator.parse(cursor)).toThrow(InvalidCursorError);
    });

    it('should reject a correctly signed but invalid payload', () => {
      let error: unknown;
      try {
        paginator.parse(signedCursor({ s: 's1', o: -1 }));
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(InvalidCursorError);
      expect(error).toMatchObject({ code: 'INVALID_CURSOR', details: { reason: 'invalid payload' } });
    });
  });

  describe('decode', () => {
    it('should resolve the cursor to its session, offset and plan', async () => {
      const decoded = await paginator.decode(paginator.encode({ sessionId: 's1', offset: 4 }));

      expect(decoded.sessionId).toBe('s1');
      expect(decoded.offset).toBe(4);
      expect(decoded.plan).toBe(plan);
    });

    it('should fail with ExpiredSessionError once the plan is gone', async () => {
      const cursor = paginator.encode({ sessionId: 's1', offset: 2 });
      plans.expire('s1');

      await expect(paginator.decode(cursor)).rejects.toBeInstanceOf(ExpiredSessionError);
      await expect(paginator.decode(cursor)).rejects.toMatchObject({ code: 'EXPIRED_SESSION', statusCode: 410 });
    });

    it('should fail with InvalidCursorError before touching the store', async () => {
      await expect(paginator.decode('not-a-cursor')).rejects.toBeInstanceOf(InvalidCursorError);
    });
  });
});
