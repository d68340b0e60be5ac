/**
 * Hydrator — resolves planned ids to display metadata.
 *
 * Cache first (per id, short TTL), then one batched lookup for the misses.
 * Ids the backend cannot resolve are dropped from the page and logged.
 */

import { z } from 'zod';
import { supabase } from '../config/supabase.js';
import { logger } from '../utils/logger.js';
import type { ContentMetadata, FeedItem } from '../types/index.js';

export interface MetadataBackend {
  batchGet(ids: readonly string[]): Promise<Map<string, ContentMetadata>>;
}

export interface MetadataCache {
  getMetadataMany(ids: string[]): Promise<Map<string, ContentMetadata>>;
  setMetadataMany(entries: ContentMetadata[]): Promise<void>;
}

export function toFeedItem(metadata: ContentMetadata): FeedItem {
  const isImage = metadata.contentType === 'image';
  return {
    id: metadata.id,
    title: metadata.title,
    overview: metadata.overview,
    posterRef: metadata.posterPath,
    playbackRef: isImage ? metadata.imageUrl : metadata.youtubeKey,
    contentType: metadata.contentType,
    tags: metadata.genres,
    releaseDate: metadata.releaseDate,
    rating: metadata.voteAverage,
  };
}

export class Hydrator {
  constructor(
    private readonly backend: MetadataBackend,
    private readonly cache: MetadataCache,
  ) {}

  async hydrate(ids: readonly string[]): Promise<FeedItem[]> {
    if (ids.length === 0) return [];

    const unique = [...new Set(ids)];
    const resolved = await this.cache.getMetadataMany(unique);
    const misses = unique.filter((id) => !resolved.has(id));

    if (misses.length > 0) {
      try {
        const fetched = await this.backend.batchGet(misses);
        for (const [id, metadata] of fetched) resolved.set(id, metadata);
        await this.cache.setMetadataMany([...fetched.values()]);
      } catch (error) {
        logger.error({ err: error, count: misses.length }, 'Metadata batch lookup failed');
      }
    }

    const items: FeedItem[] = [];
    const missing: string[] = [];
    for (const id of ids) {
      const metadata = resolved.get(id);
      if (metadata) {
        items.push(toFeedItem(metadata));
      } else {
        missing.push(id);
      }
    }

    if (missing.length > 0) {
      logger.warn(
        { requested: ids.length, missing: missing.length, sample: missing.slice(0, 5) },
        'Hydration partial, omitting unresolved ids',
      );
    }
    logger.debug(
      { requested: ids.length, cacheHits: unique.length - misses.length, hydrated: items.length },
      'Hydration complete',
    );
    return items;
  }
}

const contentRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  overview: z.string().nullable().optional(),
  poster_path: z.string().nullable().optional(),
  youtube_key: z.string().nullable().optional(),
  image_url: z.string().nullable().optional(),
  content_type: z.string().nullable().optional(),
  genres: z.array(z.string()).nullable().optional(),
  release_date: z.string().nullable().optional(),
  vote_average: z.number().nullable().optional(),
});

type ContentRow = z.infer<typeof contentRowSchema>;

function rowToMetadata(row: ContentRow): ContentMetadata {
  return {
    id: row.id,
    title: row.title || 'Untitled',
    overview: row.overview ?? null,
    posterPath: row.poster_path ?? null,
    youtubeKey: row.youtube_key ?? null,
    imageUrl: row.image_url ?? null,
    contentType: row.content_type || 'trailer',
    genres: row.genres ?? [],
    releaseDate: row.release_date ?? null,
    voteAverage: row.vote_average ?? null,
  };
}

/** Targeted lookup against the `content` table; never loads the catalog. */
export const supabaseMetadataBackend: MetadataBackend = {
  async batchGet(ids) {
    const { data, error } = await supabase
      .from('content')
      .select(
        'id, title, overview, poster_path, youtube_key, image_url, content_type, genres, release_date, vote_average',
      )
      .in('id', [...ids]);
    if (error) throw error;

    const found = new Map<string, ContentMetadata>();
    for (const row of data ?? []) {
      const parsed = contentRowSchema.safeParse(row);
      if (parsed.success) {
        found.set(parsed.data.id, rowToMetadata(parsed.data));
      } else {
        logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Skipping malformed content row');
      }
    }
    return found;
  },
};
