import type { Redis } from 'ioredis';
import { z } from 'zod';
import { redis } from '../config/redis.js';
import { logger } from '../utils/logger.js';
import { PlanStoreUnavailableError } from '../utils/errors.js';
import { BUCKET_ORDER, CONTEXT_SOURCES, PLAN_VARIANTS } from '../types/index.js';
import type { FeedPlan } from '../types/index.js';

/**
 * Shared, write-once storage for feed plans. `createIfAbsent` is the only
 * write and succeeds for exactly one caller per live session.
 */
export interface PlanStore {
  get(sessionId: string): Promise<FeedPlan | null>;
  createIfAbsent(plan: FeedPlan): Promise<boolean>;
  /** Monotonic generation counter per session, used to seed plan ordering. */
  nextEpoch(sessionId: string): Promise<number>;
}

const EPOCH_TTL_SECONDS = 24 * 60 * 60;

const planKey = (sessionId: string) => `feed:plan:${sessionId}`;
const epochKey = (sessionId: string) => `feed:plan-epoch:${sessionId}`;

const bucketKind = z.enum(BUCKET_ORDER);
const itemKind = z.union([bucketKind, z.literal('image')]);
const perBucket = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ trending: value, personalized: value, friends: value });

const feedPlanSchema = z.object({
  planId: z.string(),
  userId: z.string(),
  variant: z.enum(PLAN_VARIANTS),
  epoch: z.number().int(),
  items: z.array(z.object({ id: z.string(), bucket: itemKind })),
  generatedAt: z.string(),
  ttlSeconds: z.number().int(),
  mixSummary: z.object({
    counts: perBucket(z.number().int()),
    sources: perBucket(z.array(z.string())),
    coldStart: z.object({ genres: z.boolean(), friends: z.boolean() }),
    toppedUp: z.number().int(),
    images: z.number().int(),
    degradedSources: z.array(z.enum(CONTEXT_SOURCES)),
  }),
});

export class RedisPlanStore implements PlanStore {
  constructor(private readonly client: Redis = redis) {}

  async get(sessionId: string): Promise<FeedPlan | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(planKey(sessionId));
    } catch (error) {
      throw new PlanStoreUnavailableError('get', error);
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }
    const parsed = feedPlanSchema.safeParse(json);
    if (!parsed.success) {
      logger.error({ sessionId }, 'Stored feed plan is malformed, treating as expired');
      return null;
    }
    return parsed.data;
  }

  async createIfAbsent(plan: FeedPlan): Promise<boolean> {
    try {
      const result = await this.client.set(
        planKey(plan.planId),
        JSON.stringify(plan),
        'EX',
        plan.ttlSeconds,
        'NX',
      );
      return result === 'OK';
    } catch (error) {
      throw new PlanStoreUnavailableError('createIfAbsent', error);
    }
  }

  async nextEpoch(sessionId: string): Promise<number> {
    try {
      const epoch = await this.client.incr(epochKey(sessionId));
      await this.client.expire(epochKey(sessionId), EPOCH_TTL_SECONDS);
      return epoch;
    } catch (error) {
      throw new PlanStoreUnavailableError('nextEpoch', error);
    }
  }
}
