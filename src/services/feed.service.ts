/**
 * Feed service — one feed request end to end:
 * context -> plan (reuse or generate) -> slice -> hydrate -> annotate.
 *
 * The whole request runs under a deadline. Analytics, the account-level seen
 * record and the session seen-set refresh are written after the response is
 * assembled and never fail it.
 */

import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { DeadlineExceededError, SessionOwnershipError } from '../utils/errors.js';
import type { ContextLoader } from './context.service.js';
import type { DedupStore } from './dedup.service.js';
import type { Hydrator } from './hydration.service.js';
import type { Paginator } from './pagination.service.js';
import type { AnalyticsEmitter, ItemConsumedEvent } from './analytics.service.js';
import type { PlanGenerator } from '../pipeline/index.js';
import type { ContextSourceName, FeedItem, FeedPlan, MixSummary, PlanVariant } from '../types/index.js';

export interface FeedRequest {
  userId: string;
  cursor?: string;
  limit?: number;
  /** Client-chosen session id for a first page; generated when absent. */
  session?: string;
  /** Plan variant for a new session; ignored once the session has a plan. */
  feedType?: PlanVariant;
  requestId?: string;
}

export type FeedType = 'personalized' | 'cold_start' | 'trending';

export interface FeedPage {
  items: FeedItem[];
  nextCursor: string | null;
  hasMore: boolean;
  meta: {
    sessionId: string;
    feedType: FeedType;
    itemCount: number;
    planSize: number;
    generatedAt: string;
    latencyMs: number;
    degradedSources: ContextSourceName[];
    mix: MixSummary['counts'];
  };
}

export interface FeedServiceOptions {
  defaultLimit: number;
  maxLimit: number;
  deadlineMs: number;
}

export interface FeedServiceDeps {
  contextLoader: Pick<ContextLoader, 'load'>;
  generator: Pick<PlanGenerator, 'getOrCreatePlan'>;
  paginator: Paginator;
  hydrator: Pick<Hydrator, 'hydrate'>;
  dedup: Pick<DedupStore, 'accountMark' | 'sessionMark'>;
  analytics: AnalyticsEmitter;
  options: FeedServiceOptions;
}

export function feedTypeOf(plan: FeedPlan): FeedType {
  if (plan.variant === 'trending') return 'trending';
  const { coldStart } = plan.mixSummary;
  return coldStart.genres && coldStart.friends ? 'cold_start' : 'personalized';
}

export class FeedService {
  constructor(private readonly deps: FeedServiceDeps) {}

  async getFeed(request: FeedRequest): Promise<FeedPage> {
    const { deadlineMs } = this.deps.options;
    return withTimeout(
      this.assemble(request),
      deadlineMs,
      () => new DeadlineExceededError(deadlineMs, 'feed request'),
    );
  }

  async recordConsumption(event: ItemConsumedEvent): Promise<void> {
    this.deps.analytics.itemConsumed(event).catch((err: unknown) => {
      logger.warn({ userId: event.userId, itemId: event.itemId, err }, 'Failed to enqueue item-consumed event');
    });
    this.markAccountSeen(event.userId, [event.itemId]);
  }

  private async assemble(request: FeedRequest): Promise<FeedPage> {
    const started = Date.now();
    const { contextLoader, generator, paginator, hydrator, options } = this.deps;
    const requestId = request.requestId ?? randomUUID();
    const pageSize = Math.min(request.limit ?? options.defaultLimit, options.maxLimit);

    let plan: FeedPlan;
    let cursor: string | null = null;
    const context = await contextLoader.load(request.userId);

    if (request.cursor) {
      const decoded = await paginator.decode(request.cursor);
      if (decoded.plan.userId !== request.userId) throw new SessionOwnershipError();
      plan = decoded.plan;
      cursor = request.cursor;
    } else {
      const sessionId = request.session ?? randomUUID();
      plan = await generator.getOrCreatePlan(sessionId, request.userId, pageSize, {
        requestId,
        context,
        variant: request.feedType,
      });
    }

    const page = paginator.slice(cursor, plan, pageSize);
    const hydrated = await hydrator.hydrate(page.items.map((item) => item.id));

    const bucketOf = new Map(page.items.map((item) => [item.id, item.bucket]));
    const items = hydrated.map((item) => ({
      ...item,
      bucket: bucketOf.get(item.id),
      isSaved: context.savedIds.has(item.id),
    }));

    const served = page.items.map((item) => item.id);
    this.deps.analytics
      .itemsShown({
        userId: request.userId,
        sessionId: plan.planId,
        itemIds: served,
        offset: page.offset,
        requestId,
      })
      .catch((err: unknown) => {
        logger.warn({ requestId, err }, 'Failed to enqueue item-shown event');
      });
    this.markAccountSeen(request.userId, served);
    this.refreshSessionSeen(plan.planId, served, requestId);

    const latencyMs = Date.now() - started;
    logger.debug({ requestId, sessionId: plan.planId, items: items.length, latencyMs }, 'Feed page served');

    return {
      items,
      nextCursor: page.nextCursor,
      hasMore: page.hasMore,
      meta: {
        sessionId: plan.planId,
        feedType: feedTypeOf(plan),
        itemCount: items.length,
        planSize: plan.items.length,
        generatedAt: plan.generatedAt,
        latencyMs,
        degradedSources: [...context.degradedSources],
        mix: plan.mixSummary.counts,
      },
    };
  }

  /** Re-marking served ids pushes the seen-set TTL out while the session is active. */
  private refreshSessionSeen(sessionId: string, ids: string[], requestId: string): void {
    if (ids.length === 0) return;
    this.deps.dedup.sessionMark(sessionId, ids).catch((err: unknown) => {
      logger.warn({ requestId, sessionId, err }, 'Failed to refresh session seen set');
    });
  }

  private markAccountSeen(userId: string, ids: string[]): void {
    if (ids.length === 0) return;
    this.deps.dedup.accountMark(userId, ids).catch((err: unknown) => {
      logger.warn({ userId, err }, 'Failed to record account seen items');
    });
  }
}
