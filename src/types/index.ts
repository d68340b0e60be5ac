declare global {
  namespace Express {
    interface Request {
      id?: string;
      userId?: string;
    }
  }
}

/** Logical partitions of a plan, in the order they are concatenated. */
export const BUCKET_ORDER = ['trending', 'personalized', 'friends'] as const;

export type BucketKind = (typeof BUCKET_ORDER)[number];

export type BucketShares = Record<BucketKind, number>;

/** Plan flavours a client can ask for on the first page of a session. */
export const PLAN_VARIANTS = ['for_you', 'trending'] as const;

export type PlanVariant = (typeof PLAN_VARIANTS)[number];

/** Where a planned item came from: one of the share buckets, or the image interleave. */
export type PlannedItemKind = BucketKind | 'image';

/** A ranked candidate inside one published index bucket. */
export interface IndexEntry {
  id: string;
  score: number;
  tags: string[];
  updatedAt: string;
}

/** One fully published version of a named index bucket. */
export interface IndexSnapshot {
  bucket: string;
  version: number;
  publishedAt: string;
  entries: IndexEntry[];
}

export const CONTEXT_SOURCES = ['preferences', 'follows', 'seenHistory', 'savedItems'] as const;

export type ContextSourceName = (typeof CONTEXT_SOURCES)[number];

/**
 * Snapshot of everything the planner needs to know about a user.
 * Built once per request and frozen; nothing downstream mutates it.
 */
export interface UserContext {
  readonly userId: string;
  readonly genres: ReadonlySet<string>;
  readonly friendIds: ReadonlySet<string>;
  readonly seenIds: ReadonlySet<string>;
  readonly savedIds: ReadonlySet<string>;
  readonly loadedAt: string;
  /** Sources that timed out or failed and were replaced by an empty value. */
  readonly degradedSources: readonly ContextSourceName[];
}

export interface PlannedItem {
  id: string;
  bucket: PlannedItemKind;
}

export interface MixSummary {
  counts: Record<BucketKind, number>;
  /** Index buckets each logical bucket actually read from. */
  sources: Record<BucketKind, string[]>;
  coldStart: { genres: boolean; friends: boolean };
  toppedUp: number;
  /** Image items interleaved after selection. */
  images: number;
  degradedSources: ContextSourceName[];
}

/** Immutable, session-scoped ordering of content ids. `planId` is the session id. */
export interface FeedPlan {
  planId: string;
  userId: string;
  variant: PlanVariant;
  epoch: number;
  items: PlannedItem[];
  generatedAt: string;
  ttlSeconds: number;
  mixSummary: MixSummary;
}

export interface Cursor {
  sessionId: string;
  offset: number;
}

/** Raw metadata row as returned by the metadata backend. */
export interface ContentMetadata {
  id: string;
  title: string;
  overview: string | null;
  posterPath: string | null;
  youtubeKey: string | null;
  imageUrl: string | null;
  contentType: string;
  genres: string[];
  releaseDate: string | null;
  voteAverage: number | null;
}

export interface FeedItem {
  id: string;
  title: string;
  overview: string | null;
  posterRef: string | null;
  playbackRef: string | null;
  contentType: string;
  tags: string[];
  releaseDate: string | null;
  rating: number | null;
  bucket?: PlannedItemKind;
  isSaved?: boolean;
}
