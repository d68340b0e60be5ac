import express from 'express';
import type { Express } from 'express';
import { requestId, requestLogger } from './middleware/requestLogger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRateLimiter } from './middleware/rateLimiter.js';
import { createFeedController } from './controllers/feed.controller.js';
import { createFeedRouter } from './routes/feed.routes.js';
import type { FeedEngine } from './engine.js';

export function createApp(engine: FeedEngine): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));
  app.use(requestId);
  app.use(requestLogger);

  const controller = createFeedController(engine.feed, engine.ping);
  const { rateLimitStore, rateLimits } = engine;
  app.use(
    '/api/feed',
    createFeedRouter(controller, {
      rateLimitFeed: createRateLimiter(rateLimitStore, { name: 'feed', limit: rateLimits.feedPerMinute }),
      rateLimitEvents: createRateLimiter(rateLimitStore, { name: 'events', limit: rateLimits.eventsPerMinute }),
    }),
  );

  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route not found', retryable: false },
    });
  });
  app.use(errorHandler);

  return app;
}
