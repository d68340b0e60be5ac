/**
 * Pipeline module — candidate pipeline framework and the feed plan pipeline.
 */

// Core pipeline framework
export { CandidatePipeline } from './candidate-pipeline.js';
export type { CandidatePipelineConfig } from './candidate-pipeline.js';

export type {
  QueryHydrator,
  Source,
  Hydrator,
  Filter,
  Scorer,
  Selector,
  SideEffect,
} from './interfaces.js';

export { PipelineStage } from './types.js';
export type {
  PlanQuery,
  PlanCandidate,
  FilterResult,
  PipelineResult,
  PipelineMetrics,
} from './types.js';

// Concrete implementations
export {
  TrendingSource,
  PersonalizedSource,
  FriendsSource,
  COMMUNITY_BUCKET,
  TRENDING_BUCKET,
  IMAGE_BUCKET,
  genreBucket,
  friendsBucket,
} from './sources.js';
export type { CandidateIndex } from './sources.js';
export { UserContextHydrator, AccountSeenHydrator } from './hydrators.js';
export { AccountSeenFilter, DeduplicateFilter, SessionSeenFilter } from './filters.js';
export { SeenPenaltyScorer } from './scorers.js';
export { ShareSelector, compareCandidates } from './selector.js';
export { PlanMetricsLogSideEffect } from './side-effects.js';
export { mulberry32, planSeed, tieredShuffle } from './shuffle.js';
export { ImageMixer, interleaveEvery } from './images.js';
export type { Random, TieredShuffleConfig } from './shuffle.js';

// Plan assembly
export { createPlanPipeline } from './plan-pipeline.js';
export type { PlanPipeline, PlanPipelineDeps } from './plan-pipeline.js';
export { PlanGenerator, summarizeMix } from './plan-generator.js';
export type { PlanGeneratorDeps, PlanRequestOptions } from './plan-generator.js';
