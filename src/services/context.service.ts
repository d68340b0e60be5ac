/**
 * User context loader.
 *
 * Fetches the four user data sources concurrently, each under its own
 * timeout. A source that fails or is too slow contributes an empty value
 * and is reported in `degradedSources`; the loader itself never throws.
 */

import { z } from 'zod';
import { supabase } from '../config/supabase.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { TimeoutError } from '../utils/errors.js';
import { CONTEXT_SOURCES } from '../types/index.js';
import type { ContextSourceName, UserContext } from '../types/index.js';

export interface UserDataSource {
  readonly name: ContextSourceName;
  get(userId: string): Promise<string[]>;
}

export type ContextSources = Record<ContextSourceName, UserDataSource>;

export interface ContextCache {
  getContext(userId: string): Promise<UserContext | null>;
  setContext(context: UserContext): Promise<void>;
}

export interface ContextLoaderOptions {
  sourceTimeoutMs: number;
  cache?: ContextCache;
}

export class ContextLoader {
  constructor(
    private readonly sources: ContextSources,
    private readonly options: ContextLoaderOptions,
  ) {}

  async load(userId: string): Promise<UserContext> {
    const cached = await this.options.cache?.getContext(userId);
    if (cached) return cached;

    const results = await Promise.allSettled(
      CONTEXT_SOURCES.map((name) =>
        withTimeout(
          this.sources[name].get(userId),
          this.options.sourceTimeoutMs,
          () => new TimeoutError(this.options.sourceTimeoutMs, `context source ${name}`),
        ),
      ),
    );

    const degradedSources: ContextSourceName[] = [];
    const valueOf = (name: ContextSourceName): string[] => {
      const result = results[CONTEXT_SOURCES.indexOf(name)];
      if (result.status === 'fulfilled') return result.value;
      degradedSources.push(name);
      logger.warn({ userId, source: name, err: result.reason }, 'Context source degraded, using empty value');
      return [];
    };

    const context: UserContext = Object.freeze({
      userId,
      genres: new Set(valueOf('preferences').map((g) => g.toLowerCase())),
      friendIds: new Set(valueOf('follows')),
      seenIds: new Set(valueOf('seenHistory')),
      savedIds: new Set(valueOf('savedItems')),
      loadedAt: new Date().toISOString(),
      degradedSources: Object.freeze(degradedSources),
    });

    if (degradedSources.length === 0 && this.options.cache) {
      await this.options.cache.setContext(context);
    }
    return context;
  }
}

/** Context used before hydration and by requests that never need one. */
export function emptyContext(userId: string): UserContext {
  return Object.freeze({
    userId,
    genres: new Set<string>(),
    friendIds: new Set<string>(),
    seenIds: new Set<string>(),
    savedIds: new Set<string>(),
    loadedAt: new Date(0).toISOString(),
    degradedSources: [],
  });
}

// --- Supabase-backed sources ---

const SEEN_HISTORY_LIMIT = 200;

const preferencesRowSchema = z.object({ selected_genres: z.array(z.string()).nullable() });
const followRowSchema = z.object({ following_id: z.string() });
const titleRowSchema = z.object({ title_id: z.string() });

function parseRows<T>(schema: z.ZodType<T>, rows: unknown, source: ContextSourceName): T[] {
  const parsed = z.array(schema).safeParse(rows ?? []);
  if (!parsed.success) {
    throw new Error(`Unexpected ${source} rows: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export const preferencesSource: UserDataSource = {
  name: 'preferences',
  async get(userId) {
    const { data, error } = await supabase
      .from('user_preferences')
      .select('selected_genres')
      .eq('user_id', userId)
      .limit(1);
    if (error) throw error;
    const [row] = parseRows(preferencesRowSchema, data, 'preferences');
    return row?.selected_genres ?? [];
  },
};

export const followsSource: UserDataSource = {
  name: 'follows',
  async get(userId) {
    const { data, error } = await supabase
      .from('follows')
      .select('following_id')
      .eq('follower_id', userId);
    if (error) throw error;
    return parseRows(followRowSchema, data, 'follows').map((row) => row.following_id);
  },
};

export const seenHistorySource: UserDataSource = {
  name: 'seenHistory',
  async get(userId) {
    const { data, error } = await supabase
      .from('watch_history')
      .select('title_id')
      .eq('user_id', userId)
      .order('watched_at', { ascending: false })
      .limit(SEEN_HISTORY_LIMIT);
    if (error) throw error;
    return parseRows(titleRowSchema, data, 'seenHistory').map((row) => row.title_id);
  },
};

export const savedItemsSource: UserDataSource = {
  name: 'savedItems',
  async get(userId) {
    const { data, error } = await supabase
      .from('user_titles')
      .select('title_id')
      .eq('user_id', userId)
      .in('status', ['saved', 'favorite']);
    if (error) throw error;
    return parseRows(titleRowSchema, data, 'savedItems').map((row) => row.title_id);
  },
};

export const supabaseContextSources: ContextSources = {
  preferences: preferencesSource,
  follows: followsSource,
  seenHistory: seenHistorySource,
  savedItems: savedItemsSource,
};
