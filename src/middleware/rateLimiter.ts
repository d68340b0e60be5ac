import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Redis } from 'ioredis';
import { redis } from '../config/redis.js';
import { logger } from '../utils/logger.js';
import { AppError } from './errorHandler.js';

/** Fixed-window hit counter shared by every instance of the service. */
export interface RateLimitStore {
  /** Count one hit on `key` and return the total for the current window. */
  hit(key: string, windowSeconds: number): Promise<number>;
}

export class RedisRateLimitStore implements RateLimitStore {
  constructor(private readonly client: Redis = redis) {}

  async hit(key: string, windowSeconds: number): Promise<number> {
    const count = await this.client.incr(key);
    if (count === 1) await this.client.expire(key, windowSeconds);
    return count;
  }
}

export interface RateLimitOptions {
  /** Distinguishes limiters sharing a store, e.g. `feed` and `events`. */
  name: string;
  limit: number;
  windowSeconds?: number;
}

/**
 * Per-user request limit. Keys on the verified user id, falling back to the
 * client address. An unreachable store lets the request through.
 */
export function createRateLimiter(store: RateLimitStore, options: RateLimitOptions): RequestHandler {
  const windowSeconds = options.windowSeconds ?? 60;

  return (req: Request, res: Response, next: NextFunction) => {
    const who = req.userId ?? req.ip ?? 'anonymous';
    const key = `feed:ratelimit:${options.name}:${who}`;

    store.hit(key, windowSeconds).then(
      (count) => {
        res.setHeader('X-RateLimit-Limit', String(options.limit));
        res.setHeader('X-RateLimit-Remaining', String(Math.max(0, options.limit - count)));
        next(count > options.limit ? new AppError(429, 'RATE_LIMITED', 'Too many requests, slow down', true) : undefined);
      },
      (err: unknown) => {
        logger.warn({ requestId: req.id, limiter: options.name, err }, 'Rate limit store unavailable, allowing request');
        next();
      },
    );
  };
}
