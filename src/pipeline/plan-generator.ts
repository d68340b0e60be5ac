/**
 * Feed plan generator.
 *
 * Returns the live plan for a session, or generates, persists and returns a
 * new one. Persisting is create-if-absent: when concurrent first requests
 * race, every caller ends up with the single stored plan.
 *
 * Planned ids are marked as emitted before the plan is stored, so a stored
 * plan is always covered by the session seen set.
 */

import { randomUUID } from 'crypto';
import { planTargetSize } from '../config/feed.js';
import type { FeedConfig } from '../config/feed.js';
import { emptyContext } from '../services/context.service.js';
import type { DedupStore } from '../services/dedup.service.js';
import type { PlanStore } from '../services/plan-store.service.js';
import { BucketUnavailableError, PlanConflictError, SessionOwnershipError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { BucketKind, FeedPlan, MixSummary, PlannedItem, PlanVariant, UserContext } from '../types/index.js';
import type { ImageMixer } from './images.js';
import type { PlanPipeline } from './plan-pipeline.js';
import { PipelineStage } from './types.js';
import type { PlanCandidate, PlanQuery } from './types.js';

export interface PlanRequestOptions {
  requestId?: string;
  /** Context already loaded for this request; skips the context hydrator. */
  context?: UserContext;
  /** Only used when a new plan is generated; a live plan keeps its variant. */
  variant?: PlanVariant;
}

export interface PlanGeneratorDeps {
  pipeline: PlanPipeline;
  images: Pick<ImageMixer, 'mix'>;
  plans: PlanStore;
  dedup: Pick<DedupStore, 'sessionSeen' | 'sessionMark'>;
  config: FeedConfig;
  now?: () => Date;
}

function perBucket<T>(make: (bucket: BucketKind) => T): Record<BucketKind, T> {
  return { trending: make('trending'), personalized: make('personalized'), friends: make('friends') };
}

export function summarizeMix(
  query: PlanQuery,
  retrieved: PlanCandidate[],
  selected: PlanCandidate[],
  items: PlannedItem[],
): MixSummary {
  return {
    counts: perBucket((bucket) => selected.filter((c) => c.bucket === bucket).length),
    sources: perBucket((bucket) => [
      ...new Set(retrieved.filter((c) => c.bucket === bucket).map((c) => c.origin)),
    ].sort()),
    coldStart: {
      genres: query.context.genres.size === 0,
      friends: query.context.friendIds.size === 0,
    },
    toppedUp: selected.filter((c) => c.toppedUp).length,
    images: items.filter((item) => item.bucket === 'image').length,
    degradedSources: [...query.context.degradedSources],
  };
}

export class PlanGenerator {
  private readonly now: () => Date;

  constructor(private readonly deps: PlanGeneratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async getOrCreatePlan(
    sessionId: string,
    userId: string,
    pageSize: number,
    options: PlanRequestOptions = {},
  ): Promise<FeedPlan> {
    const { plans, dedup, config } = this.deps;
    const requestId = options.requestId ?? randomUUID();

    const existing = await plans.get(sessionId);
    if (existing) return this.ownedBy(existing, userId);

    const [epoch, sessionSeenIds] = await Promise.all([
      plans.nextEpoch(sessionId),
      dedup.sessionSeen(sessionId),
    ]);

    const query: PlanQuery = {
      requestId,
      sessionId,
      userId,
      pageSize,
      variant: options.variant ?? 'for_you',
      targetSize: planTargetSize(pageSize, config),
      epoch,
      sessionSeenIds,
      context: options.context ?? emptyContext(userId),
      contextLoaded: options.context !== undefined,
    };

    const result = await this.deps.pipeline.execute(query);
    const selected = result.selectedCandidates;
    const failedSources = result.pipelineMetrics.failedComponents.filter(
      (c) => c.stage === PipelineStage.Source,
    );
    if (selected.length === 0 && failedSources.length > 0) {
      throw new BucketUnavailableError(failedSources.map((c) => c.name).join(','));
    }

    const items = await this.deps.images.mix(
      query,
      selected.map((c): PlannedItem => ({ id: c.id, bucket: c.bucket })),
    );

    const plan: FeedPlan = {
      planId: sessionId,
      userId,
      variant: query.variant,
      epoch,
      items,
      generatedAt: this.now().toISOString(),
      ttlSeconds: config.planTtlSeconds,
      mixSummary: summarizeMix(result.query, result.retrievedCandidates, selected, items),
    };

    await dedup.sessionMark(sessionId, items.map((item) => item.id));

    const created = await plans.createIfAbsent(plan);
    if (!created) {
      const winner = await plans.get(sessionId);
      if (!winner) throw new PlanConflictError(sessionId);
      logger.info({ requestId, sessionId, epoch, winnerEpoch: winner.epoch }, 'Plan create race lost, using stored plan');
      return this.ownedBy(winner, userId);
    }

    logger.info(
      {
        requestId,
        sessionId,
        epoch,
        variant: plan.variant,
        size: plan.items.length,
        images: plan.mixSummary.images,
        counts: plan.mixSummary.counts,
        coldStart: plan.mixSummary.coldStart,
        failed: result.pipelineMetrics.failedComponents.map((c) => c.name),
      },
      'Feed plan created',
    );
    return plan;
  }

  private ownedBy(plan: FeedPlan, userId: string): FeedPlan {
    if (plan.userId !== userId) throw new SessionOwnershipError();
    return plan;
  }
}
