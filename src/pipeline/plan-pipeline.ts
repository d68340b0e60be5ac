/**
 * Plan pipeline — composes the concrete components into the candidate
 * pipeline that produces one feed plan.
 *
 * 1. **Query Hydration**: load the user context unless the caller supplied it
 * 2. **Candidate Sourcing** (parallel):
 *    - TrendingSource: deeper read for a trending-only plan
 *    - PersonalizedSource: user genres, or default genres on cold start
 *    - FriendsSource: per-user friend activity, or community on cold start
 *    (the last two only for the mixed `for_you` plan)
 * 3. **Candidate Hydration**: account-level probably-seen flag
 * 4. **Filters** (sequential):
 *    - DeduplicateFilter: first bucket to find an id keeps it
 *    - SessionSeenFilter: hard-exclude ids already emitted in the session
 *    - AccountSeenFilter: trending-only plans drop probably-seen items
 * 5. **Scoring**: SeenPenaltyScorer
 * 6. **Selection**: ShareSelector (quotas, top-up, tiered shuffle)
 * 7. **Side Effects**: PlanMetricsLogSideEffect
 *
 * Images are interleaved by the plan generator after the pipeline returns.
 *
 * Shared store failures abort the run; a failing bucket only loses its share.
 */

import { CandidatePipeline } from './candidate-pipeline.js';
import type { PlanQuery, PlanCandidate } from './types.js';
import { TrendingSource, PersonalizedSource, FriendsSource } from './sources.js';
import type { CandidateIndex } from './sources.js';
import { UserContextHydrator, AccountSeenHydrator } from './hydrators.js';
import { AccountSeenFilter, DeduplicateFilter, SessionSeenFilter } from './filters.js';
import { SeenPenaltyScorer } from './scorers.js';
import { ShareSelector } from './selector.js';
import { PlanMetricsLogSideEffect } from './side-effects.js';
import type { FeedConfig } from '../config/feed.js';
import type { ContextLoader } from '../services/context.service.js';
import type { DedupStore } from '../services/dedup.service.js';
import { StoreUnavailableError } from '../utils/errors.js';

export type PlanPipeline = CandidatePipeline<PlanQuery, PlanCandidate>;

export interface PlanPipelineDeps {
  index: CandidateIndex;
  contextLoader: Pick<ContextLoader, 'load'>;
  dedup: Pick<DedupStore, 'accountProbablySeenMany'>;
  config: FeedConfig;
}

export function createPlanPipeline({ index, contextLoader, dedup, config }: PlanPipelineDeps): PlanPipeline {
  return new CandidatePipeline<PlanQuery, PlanCandidate>({
    name: 'FeedPlan',
    resultSize: (query) => query.targetSize,
    queryHydrators: [new UserContextHydrator(contextLoader)],
    sources: [
      new TrendingSource(index, config),
      new PersonalizedSource(index, config),
      new FriendsSource(index, config),
    ],
    hydrators: [new AccountSeenHydrator(dedup)],
    filters: [new DeduplicateFilter(), new SessionSeenFilter(), new AccountSeenFilter()],
    scorers: [new SeenPenaltyScorer(config.seenPenalty)],
    selector: new ShareSelector(config),
    postSelectionFilters: [],
    sideEffects: [new PlanMetricsLogSideEffect()],
    isFatal: (error) => error instanceof StoreUnavailableError,
  });
}
