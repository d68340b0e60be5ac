import type { Request, Response } from 'express';
import { z } from 'zod';
import { AppError } from '../middleware/errorHandler.js';
import { env } from '../config/env.js';
import type { FeedService } from '../services/feed.service.js';
import { PLAN_VARIANTS } from '../types/index.js';

export const feedQuerySchema = z.object({
  cursor: z.string().min(1).max(512).optional(),
  limit: z.coerce.number().int().min(1).max(env.FEED_MAX_LIMIT).default(env.FEED_DEFAULT_LIMIT),
  session: z.string().regex(/^[A-Za-z0-9_-]{8,64}$/).optional(),
  feedType: z.enum(PLAN_VARIANTS).default('for_you'),
});

export const consumeEventSchema = z.object({
  itemId: z.string().min(1),
  sessionId: z.string().min(1).nullable().default(null),
  action: z.enum(['play', 'complete', 'save', 'share']),
  dwellMs: z.number().int().nonnegative().optional(),
});

function userOf(req: Request): string {
  if (!req.userId) throw new AppError(401, 'UNAUTHORIZED', 'Missing verified user id');
  return req.userId;
}

export function createFeedController(feed: FeedService, ping: () => Promise<boolean>) {
  return {
    async getFeed(req: Request, res: Response) {
      const userId = userOf(req);
      const query = feedQuerySchema.parse(req.query);

      const page = await feed.getFeed({
        userId,
        cursor: query.cursor,
        limit: query.limit,
        session: query.session,
        feedType: query.feedType,
        requestId: req.id,
      });

      res.json({ success: true, data: page });
    },

    async recordEvent(req: Request, res: Response) {
      const userId = userOf(req);
      const event = consumeEventSchema.parse(req.body);

      await feed.recordConsumption({ userId, ...event });
      res.status(202).json({ success: true });
    },

    async health(_req: Request, res: Response) {
      const redisUp = await ping();
      res.status(redisUp ? 200 : 503).json({
        success: redisUp,
        data: { status: redisUp ? 'ok' : 'degraded', redis: redisUp ? 'up' : 'down' },
      });
    },
  };
}

export type FeedController = ReturnType<typeof createFeedController>;
