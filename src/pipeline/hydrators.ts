/**
 * Hydrators — enrich the query with user context and candidates with the
 * account-level seen signal.
 */

import type { Hydrator, QueryHydrator } from './interfaces.js';
import type { PlanCandidate, PlanQuery } from './types.js';
import type { ContextLoader } from '../services/context.service.js';
import type { DedupStore } from '../services/dedup.service.js';

/**
 * UserContextHydrator — loads preferences, follows, seen history and saved
 * items. Skipped when the caller already supplied a context.
 */
export class UserContextHydrator implements QueryHydrator<PlanQuery> {
  name = 'UserContextHydrator';

  constructor(private readonly loader: Pick<ContextLoader, 'load'>) {}

  enable(query: PlanQuery): boolean {
    return !query.contextLoaded;
  }

  async hydrate(query: PlanQuery): Promise<Partial<PlanQuery>> {
    const context = await this.loader.load(query.userId);
    return { context, contextLoaded: true };
  }
}

/**
 * AccountSeenHydrator — flags candidates the user has probably seen before,
 * from the account Bloom filter and the loaded watch history.
 * The flag only feeds scoring; nothing is dropped here.
 */
export class AccountSeenHydrator implements Hydrator<PlanQuery, PlanCandidate> {
  name = 'AccountSeenHydrator';

  constructor(private readonly dedup: Pick<DedupStore, 'accountProbablySeenMany'>) {}

  enable(): boolean {
    return true;
  }

  async hydrate(query: PlanQuery, candidates: PlanCandidate[]): Promise<PlanCandidate[]> {
    const ids = [...new Set(candidates.map((c) => c.id))];
    const probablySeen = await this.dedup.accountProbablySeenMany(query.userId, ids);

    return candidates.map((c) => ({
      ...c,
      probablySeen: probablySeen.has(c.id) || query.context.seenIds.has(c.id),
    }));
  }
}
