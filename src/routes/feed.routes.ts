import { Router } from 'express';
import type { RequestHandler } from 'express';
import { requireUser } from '../middleware/auth.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { FeedController } from '../controllers/feed.controller.js';

export interface FeedRateLimiters {
  rateLimitFeed: RequestHandler;
  rateLimitEvents: RequestHandler;
}

export function createFeedRouter(controller: FeedController, limiters: FeedRateLimiters): Router {
  const router = Router();
  const { rateLimitFeed, rateLimitEvents } = limiters;

  // Liveness (no user required, must be before any /:param routes)
  router.get('/health', asyncHandler(controller.health));

  router.get('/', requireUser, rateLimitFeed, asyncHandler(controller.getFeed));
  router.post('/events', requireUser, rateLimitEvents, asyncHandler(controller.recordEvent));

  return router;
}
