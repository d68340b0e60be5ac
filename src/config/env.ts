import { config } from 'dotenv';
import { z } from 'zod';

config();

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const shareFromEnv = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_KEY: z.string().min(1),
    CURSOR_SECRET: z.string().min(8),

    FEED_TRENDING_SHARE: shareFromEnv(0.5),
    FEED_PERSONALIZED_SHARE: shareFromEnv(0.3),
    FEED_FRIENDS_SHARE: shareFromEnv(0.2),
    FEED_OVERSAMPLE: z.coerce.number().min(1).default(3),
    FEED_PLAN_PAGE_MULTIPLE: z.coerce.number().int().min(1).default(3),
    FEED_MIN_PLAN_SIZE: intFromEnv(50),
    FEED_SHUFFLE_FIXED_HEAD: intFromEnv(3),
    FEED_SHUFFLE_MIDDLE_BAND: intFromEnv(4),
    FEED_SHUFFLE_MIDDLE_WINDOW: z.coerce.number().int().min(1).default(2),
    FEED_SEEN_PENALTY: z.coerce.number().min(0).max(1).default(0.5),
    FEED_TRENDING_ONLY_BUFFER: z.coerce.number().min(1).default(4),
    FEED_IMAGE_EVERY: intFromEnv(3),
    FEED_DEFAULT_GENRES: z
      .string()
      .default('action,comedy,drama')
      .transform((value) => value.split(',').map((g) => g.trim()).filter(Boolean)),
    FEED_DEFAULT_LIMIT: z.coerce.number().int().min(1).default(10),
    FEED_MAX_LIMIT: z.coerce.number().int().min(1).default(50),

    FEED_PLAN_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
    SESSION_TTL_SECONDS: z.coerce.number().int().min(1).default(600),
    CONTEXT_SOURCE_TIMEOUT_MS: z.coerce.number().int().min(1).default(60),
    CONTEXT_CACHE_TTL_SECONDS: intFromEnv(30),
    METADATA_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
    DEDUP_TIMEOUT_MS: z.coerce.number().int().min(1).default(80),
    ACCOUNT_SEEN_CAPACITY: z.coerce.number().int().min(1).default(10_000),
    ACCOUNT_SEEN_FP_RATE: z.coerce.number().gt(0).lt(1).default(0.01),
    ACCOUNT_SEEN_TTL_DAYS: z.coerce.number().int().min(1).default(30),
    INDEX_REFRESH_INTERVAL_MS: intFromEnv(5000),
    INDEX_SNAPSHOT_RETENTION_SECONDS: z.coerce.number().int().min(1).default(3600),
    INDEX_BUCKET_FALLBACKS: z.string().default(''),
    REQUEST_DEADLINE_MS: z.coerce.number().int().min(1).default(150),
    RATE_LIMIT_FEED_PER_MINUTE: z.coerce.number().int().min(1).default(60),
    RATE_LIMIT_EVENTS_PER_MINUTE: z.coerce.number().int().min(1).default(300),
  })
  .superRefine((value, ctx) => {
    const total = value.FEED_TRENDING_SHARE + value.FEED_PERSONALIZED_SHARE + value.FEED_FRIENDS_SHARE;
    if (Math.abs(total - 1) > 1e-6) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['FEED_TRENDING_SHARE'],
        message: `Bucket shares must sum to 1.0 (got ${total})`,
      });
    }
    if (value.FEED_MAX_LIMIT < value.FEED_DEFAULT_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['FEED_MAX_LIMIT'],
        message: 'FEED_MAX_LIMIT must be at least FEED_DEFAULT_LIMIT',
      });
    }
    // Seen set must outlive the plan.
    if (value.SESSION_TTL_SECONDS <= value.FEED_PLAN_TTL_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_TTL_SECONDS'],
        message: 'SESSION_TTL_SECONDS must be greater than FEED_PLAN_TTL_SECONDS',
      });
    }
    if (value.DEDUP_TIMEOUT_MS >= value.REQUEST_DEADLINE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DEDUP_TIMEOUT_MS'],
        message: 'DEDUP_TIMEOUT_MS must be below REQUEST_DEADLINE_MS',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }
  return parsed.data;
}

export const env: Env = parseEnv(process.env);
