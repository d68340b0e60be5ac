import type { Scorer } from './interfaces.js';
import type { PlanQuery, PlanCandidate } from './types.js';

/**
 * SeenPenaltyScorer — multiplies the index score of probably-seen
 * candidates by the configured penalty. Stale content sinks but stays
 * reachable.
 */
export class SeenPenaltyScorer implements Scorer<PlanQuery, PlanCandidate> {
  name = 'SeenPenaltyScorer';

  constructor(private readonly penalty: number) {}

  enable(): boolean {
    return true;
  }

  async score(_query: PlanQuery, candidates: PlanCandidate[]): Promise<PlanCandidate[]> {
    return candidates.map((c) => ({
      ...c,
      finalScore: c.probablySeen ? c.score * this.penalty : c.score,
    }));
  }
}
