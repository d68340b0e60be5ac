/**
 * Candidate filters — partition candidates into kept and removed sets.
 */

import type { Filter } from './interfaces.js';
import type { PlanQuery, PlanCandidate, FilterResult } from './types.js';

/**
 * Remove duplicate ids, keeping the first occurrence. Sources are
 * concatenated in bucket order, so an id found by several buckets stays
 * with the earliest one.
 */
export class DeduplicateFilter implements Filter<PlanQuery, PlanCandidate> {
  name = 'DeduplicateFilter';

  enable(): boolean {
    return true;
  }

  async filter(_query: PlanQuery, candidates: PlanCandidate[]): Promise<FilterResult<PlanCandidate>> {
    const seen = new Set<string>();
    const kept: PlanCandidate[] = [];
    const removed: PlanCandidate[] = [];

    for (const c of candidates) {
      if (seen.has(c.id)) {
        removed.push(c);
      } else {
        seen.add(c.id);
        kept.push(c);
      }
    }

    return { kept, removed };
  }
}

/** Hard-exclude everything already emitted in this session. */
export class SessionSeenFilter implements Filter<PlanQuery, PlanCandidate> {
  name = 'SessionSeenFilter';

  enable(query: PlanQuery): boolean {
    return query.sessionSeenIds.size > 0;
  }

  async filter(query: PlanQuery, candidates: PlanCandidate[]): Promise<FilterResult<PlanCandidate>> {
    const kept: PlanCandidate[] = [];
    const removed: PlanCandidate[] = [];

    for (const c of candidates) {
      if (query.sessionSeenIds.has(c.id)) {
        removed.push(c);
      } else {
        kept.push(c);
      }
    }

    return { kept, removed };
  }
}

/**
 * Drop items the account has probably seen. Trending-only plans filter on
 * the signal; mixed plans only penalize it in scoring.
 */
export class AccountSeenFilter implements Filter<PlanQuery, PlanCandidate> {
  name = 'AccountSeenFilter';

  enable(query: PlanQuery): boolean {
    return query.variant === 'trending';
  }

  async filter(_query: PlanQuery, candidates: PlanCandidate[]): Promise<FilterResult<PlanCandidate>> {
    return {
      kept: candidates.filter((c) => !c.probablySeen),
      removed: candidates.filter((c) => c.probablySeen),
    };
  }
}
