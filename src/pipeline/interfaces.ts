/**
 * Pipeline component interfaces.
 *
 *   QueryHydrator -> enrich the query (user context)
 *   Source        -> fetch candidates (one per plan bucket)
 *   Hydrator      -> annotate candidates (account-level seen signal)
 *   Filter        -> drop candidates (duplicates, session-seen)
 *   Scorer        -> adjust scores (seen penalty)
 *   Selector      -> allocate shares and order the plan
 *   SideEffect    -> fire-and-forget work after selection
 */

import type { FilterResult } from './types.js';

/**
 * QueryHydrator enriches the query with user context data.
 * Hydrators run in parallel.
 */
export interface QueryHydrator<Q> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q): Promise<Partial<Q>>;
}

/**
 * Source fetches raw candidates from a data store.
 * Multiple sources run in parallel and their results are concatenated in
 * configuration order.
 */
export interface Source<Q, C> {
  name: string;
  enable(query: Q): boolean;
  getCandidates(query: Q): Promise<C[]>;
}

/**
 * Hydrator enriches candidates with additional data after sourcing.
 * Must return the same number of candidates in the same order.
 */
export interface Hydrator<Q, C> {
  name: string;
  enable(query: Q): boolean;
  hydrate(query: Q, candidates: C[]): Promise<C[]>;
}

/**
 * Filter partitions candidates into kept and removed sets.
 * Filters run sequentially — each sees the output of the previous.
 */
export interface Filter<Q, C> {
  name: string;
  enable(query: Q): boolean;
  filter(query: Q, candidates: C[]): Promise<FilterResult<C>>;
}

/**
 * Scorer assigns scores to candidates. Scorers run sequentially.
 *
 * IMPORTANT: Must return the same candidates in the same order.
 * Dropping candidates in a scorer is not allowed — use a Filter instead.
 */
export interface Scorer<Q, C> {
  name: string;
  enable(query: Q): boolean;
  score(query: Q, candidates: C[]): Promise<C[]>;
}

/**
 * Selector picks and orders the final candidates.
 */
export interface Selector<Q, C> {
  name: string;
  enable(query: Q): boolean;
  select(query: Q, candidates: C[]): C[];
}

/**
 * SideEffect runs asynchronous operations after selection (logging, metrics).
 * Fire-and-forget — does not block the result.
 */
export interface SideEffect<Q, C> {
  name: string;
  enable(query: Q): boolean;
  run(query: Q, selectedCandidates: C[]): Promise<void>;
}
