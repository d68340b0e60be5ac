/**
 * Core types for the plan generation pipeline.
 */

import type { BucketKind, PlanVariant, UserContext } from '../types/index.js';

/**
 * Pipeline stages, in execution order:
 * QueryHydration -> Source -> Hydration -> Filter -> Score -> Select -> PostFilter
 */
export enum PipelineStage {
  QueryHydrator = 'QueryHydrator',
  Source = 'Source',
  Hydrator = 'Hydrator',
  Filter = 'Filter',
  Scorer = 'Scorer',
  Selector = 'Selector',
  PostSelectionFilter = 'PostSelectionFilter',
  SideEffect = 'SideEffect',
}

/** Query flowing through plan generation. `context` is filled by query hydration. */
export interface PlanQuery {
  requestId: string;
  sessionId: string;
  userId: string;
  pageSize: number;
  variant: PlanVariant;
  /** Number of slots the plan aims to fill. */
  targetSize: number;
  epoch: number;
  sessionSeenIds: ReadonlySet<string>;
  context: UserContext;
  /** False until the user context has been loaded into `context`. */
  contextLoaded: boolean;
}

/** A candidate drawn from one index bucket. */
export interface PlanCandidate {
  id: string;
  bucket: BucketKind;
  /** Index bucket the entry was read from, e.g. `genre:drama` or `community`. */
  origin: string;
  score: number;
  updatedAt: string;
  tags: string[];

  // Pipeline-assigned fields
  probablySeen: boolean;
  finalScore: number;
  toppedUp: boolean;
}

/** Result of a filter stage: kept and removed candidate sets. */
export interface FilterResult<C> {
  kept: C[];
  removed: C[];
}

/** Output returned by the pipeline after all stages execute. */
export interface PipelineResult<Q, C> {
  query: Q;
  retrievedCandidates: C[];
  filteredCandidates: C[];
  selectedCandidates: C[];
  pipelineMetrics: PipelineMetrics;
}

/** Timing and count metrics for observability. */
export interface PipelineMetrics {
  totalMs: number;
  stageMetrics: Record<string, { durationMs: number; candidateCount: number }>;
  /** Components whose failure was absorbed. */
  failedComponents: Array<{ stage: PipelineStage; name: string }>;
}
