/**
 * Image interleave — places one image item after every `imageEvery`
 * selected items, reading the `images` index bucket.
 *
 * Runs after selection so images never take a bucket's share. A missing or
 * failing image bucket leaves the plan as selected.
 */

import type { FeedConfig } from '../config/feed.js';
import { logger } from '../utils/logger.js';
import type { IndexEntry, PlannedItem } from '../types/index.js';
import { IMAGE_BUCKET } from './sources.js';
import type { CandidateIndex } from './sources.js';
import type { PlanQuery } from './types.js';

/** Insert `inserts[k]` after every `every`-th element of `items` while inserts last. */
export function interleaveEvery<T>(items: readonly T[], inserts: readonly T[], every: number): T[] {
  if (every <= 0 || inserts.length === 0) return [...items];

  const result: T[] = [];
  let next = 0;
  items.forEach((item, i) => {
    result.push(item);
    if ((i + 1) % every === 0 && next < inserts.length) {
      result.push(inserts[next++]);
    }
  });
  return result;
}

export class ImageMixer {
  constructor(
    private readonly index: CandidateIndex,
    private readonly config: Pick<FeedConfig, 'imageEvery' | 'oversample'>,
  ) {}

  async mix(query: Pick<PlanQuery, 'requestId' | 'sessionSeenIds'>, items: PlannedItem[]): Promise<PlannedItem[]> {
    const { imageEvery, oversample } = this.config;
    const slots = imageEvery > 0 ? Math.floor(items.length / imageEvery) : 0;
    if (slots === 0) return items;

    let entries: IndexEntry[];
    try {
      if (!(await this.index.exists(IMAGE_BUCKET))) return items;
      entries = await this.index.rangeTop(IMAGE_BUCKET, Math.ceil(slots * oversample) + query.sessionSeenIds.size);
    } catch (err) {
      logger.warn({ requestId: query.requestId, err }, 'Image bucket unavailable, planning without images');
      return items;
    }

    const planned = new Set(items.map((item) => item.id));
    const images = entries
      .filter((entry) => !planned.has(entry.id) && !query.sessionSeenIds.has(entry.id))
      .slice(0, slots)
      .map((entry): PlannedItem => ({ id: entry.id, bucket: 'image' }));

    return interleaveEvery(items, images, imageEvery);
  }
}
