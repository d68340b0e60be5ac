/**
 * ShareSelector — allocates plan slots across buckets and orders the plan.
 *
 *   1. Each bucket keeps its best `quota` candidates; a short bucket leaves
 *      its slots empty rather than rescaling the others.
 *   2. A plan shorter than two pages is topped up from unused trending
 *      candidates, up to the target size.
 *   3. The best `fixedHead` items by score lead; the rest keep bucket order
 *      and go through the seeded tiered shuffle.
 *
 * A trending-only plan is the best `targetSize` candidates in score order.
 */

import type { Selector } from './interfaces.js';
import type { PlanQuery, PlanCandidate } from './types.js';
import { allocateQuotas } from '../config/feed.js';
import type { FeedConfig } from '../config/feed.js';
import { mulberry32, planSeed, tieredShuffle } from './shuffle.js';
import { BUCKET_ORDER } from '../types/index.js';
import type { BucketKind } from '../types/index.js';

/** Descending final score, then most recently updated, then id. */
export function compareCandidates(a: PlanCandidate, b: PlanCandidate): number {
  if (b.finalScore !== a.finalScore) return b.finalScore - a.finalScore;
  const updated = Date.parse(b.updatedAt) - Date.parse(a.updatedAt);
  if (updated !== 0 && !Number.isNaN(updated)) return updated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class ShareSelector implements Selector<PlanQuery, PlanCandidate> {
  name = 'ShareSelector';

  constructor(private readonly config: FeedConfig) {}

  enable(): boolean {
    return true;
  }

  select(query: PlanQuery, candidates: PlanCandidate[]): PlanCandidate[] {
    if (query.variant === 'trending') {
      return candidates
        .filter((c) => c.bucket === 'trending')
        .sort(compareCandidates)
        .slice(0, query.targetSize);
    }

    const quotas = allocateQuotas(query.targetSize, this.config.shares, BUCKET_ORDER);
    const picked: Record<BucketKind, PlanCandidate[]> = { trending: [], personalized: [], friends: [] };
    const leftovers: PlanCandidate[] = [];

    for (const bucket of BUCKET_ORDER) {
      const ranked = candidates.filter((c) => c.bucket === bucket).sort(compareCandidates);
      picked[bucket] = ranked.slice(0, quotas[bucket]);
      if (bucket === 'trending') leftovers.push(...ranked.slice(quotas[bucket]));
    }

    let total = BUCKET_ORDER.reduce((sum, bucket) => sum + picked[bucket].length, 0);
    if (total < query.pageSize * 2) {
      for (const candidate of leftovers) {
        if (total >= query.targetSize) break;
        picked.trending.push({ ...candidate, toppedUp: true });
        total++;
      }
    }

    const ordered = BUCKET_ORDER.flatMap((bucket) => picked[bucket]);
    const head = [...ordered].sort(compareCandidates).slice(0, this.config.shuffle.fixedHead);
    const headIds = new Set(head.map((c) => c.id));
    const rest = ordered.filter((c) => !headIds.has(c.id));

    return tieredShuffle(head, rest, this.config.shuffle, mulberry32(planSeed(query.sessionId, query.epoch)));
  }
}
