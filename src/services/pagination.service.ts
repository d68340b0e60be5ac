/**
 * Opaque cursors over persisted plans.
 *
 * A cursor is `base64url(json).base64url(hmac)`: it carries the session id
 * and offset explicitly, and the signature rejects hand-edited cursors.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { ExpiredSessionError, InvalidCursorError } from '../utils/errors.js';
import type { PlanStore } from './plan-store.service.js';
import type { Cursor, FeedPlan, PlannedItem } from '../types/index.js';

export interface PageSlice {
  items: PlannedItem[];
  offset: number;
  nextCursor: string | null;
  hasMore: boolean;
}

export interface DecodedCursor extends Cursor {
  plan: FeedPlan;
}

const cursorPayloadSchema = z.object({
  s: z.string().min(1),
  o: z.number().int().nonnegative(),
});

export class Paginator {
  constructor(
    private readonly plans: PlanStore,
    private readonly secret: string,
  ) {}

  encode(cursor: Cursor): string {
    const payload = Buffer.from(JSON.stringify({ s: cursor.sessionId, o: cursor.offset })).toString('base64url');
    return `${payload}.${this.sign(payload)}`;
  }

  /** Verify and unpack a cursor without touching the plan store. */
  parse(token: string): Cursor {
    const [payload, signature, ...extra] = token.split('.');
    if (!payload || !signature || extra.length > 0) {
      throw new InvalidCursorError('malformed');
    }

    const expected = Buffer.from(this.sign(payload));
    const actual = Buffer.from(signature);
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      throw new InvalidCursorError('signature mismatch');
    }

    let json: unknown;
    try {
      json = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
      throw new InvalidCursorError('undecodable payload');
    }

    const parsed = cursorPayloadSchema.safeParse(json);
    if (!parsed.success) throw new InvalidCursorError('invalid payload');
    return { sessionId: parsed.data.s, offset: parsed.data.o };
  }

  /** Parse a cursor and load the plan it points into. */
  async decode(token: string): Promise<DecodedCursor> {
    const cursor = this.parse(token);
    const plan = await this.plans.get(cursor.sessionId);
    if (!plan) throw new ExpiredSessionError(cursor.sessionId);
    return { ...cursor, plan };
  }

  /** Pure read over an immutable plan. A null cursor starts at offset 0. */
  slice(cursor: string | null, plan: FeedPlan, pageSize: number): PageSlice {
    let offset = 0;
    if (cursor !== null) {
      const parsed = this.parse(cursor);
      if (parsed.sessionId !== plan.planId) throw new InvalidCursorError('cursor does not match plan');
      offset = parsed.offset;
    }

    const end = Math.min(offset + pageSize, plan.items.length);
    const items = plan.items.slice(offset, end);
    const hasMore = end < plan.items.length;

    return {
      items,
      offset,
      nextCursor: hasMore ? this.encode({ sessionId: plan.planId, offset: end }) : null,
      hasMore,
    };
  }

  private sign(payload: string): string {
    return createHmac('sha256', this.secret).update(payload).digest('base64url');
  }
}
