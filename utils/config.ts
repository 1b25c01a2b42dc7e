// utils/config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import { URL } from 'url';
import logger from './logger';
import { ConfigError, describeError } from './errors';

const num = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().finite());

const flag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform(v => v === 'true');

const isTimeZone = (tz: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
};

const timeZone = z.string().default('UTC').refine(isTimeZone, 'Unknown IANA time zone');

// Define the schema for our environment variables
const envSchema = z.object({
  PORT: num('3001'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Persistence
  STORE_DRIVER: z.enum(['mongo', 'file']).default('file'),
  MONGODB_URI: z.string().url().optional(),
  MONGO_POOL_SIZE: num('10'),
  STORAGE_DIR: z.string().min(1).default('storage'),
  PUBLISHED_RETENTION: num('150').pipe(z.number().int().positive()),
  WORKING_RETENTION_HOURS: num('336').pipe(z.number().positive()), // raw/rewritten, 14 days
  ARCHIVE_PUBLISHED: flag('true'),

  // Redis - Primary (Locks, Circuit Breaker, Rate Limits)
  REDIS_URL: z.string().optional(),
  // Redis - Queue (Daily trigger) - Optional, falls back to REDIS_URL
  REDIS_QUEUE_URL: z.string().optional(),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: num('900000'), // 15 minutes
  RATE_LIMIT_MAX_API: num('150'),

  // Security
  ADMIN_SECRET: z.string().min(16, 'Admin secret must be at least 16 chars long').optional(),
  CORS_ORIGINS: z.string().default(''),
  TRUST_PROXY_LVL: num('1'),

  // Text Generation
  GEMINI_API_KEY: z.string().optional(),
  AI_MODEL: z.string().default('gemini-2.5-flash'),
  AI_TIMEOUT_MS: num('30000'),
  AI_MAX_RETRIES: num('2').pipe(z.number().int().min(0)),
  AI_RETRY_BASE_DELAY_MS: num('1000'),
  REWRITE_CONCURRENCY: num('2').pipe(z.number().int().positive()),

  // Feeds
  SOURCES_FILE: z.string().default('config/sources.json'),
  FEED_TIMEOUT_MS: num('60000'),
  ENRICH_TIMEOUT_MS: num('120000'),
  FETCH_CONCURRENCY: num('4').pipe(z.number().int().positive()),
  MAX_ENTRIES_PER_SOURCE: num('20').pipe(z.number().int().positive()),
  PAGE_FETCH_DELAY_MS: num('500'),

  // Ranking
  ARTICLES_PER_RUN: num('5').pipe(z.number().int().positive()),
  MAX_PER_SOURCE: num('2').pipe(z.number().int().positive()),
  MIN_ARTICLES: num('3').pipe(z.number().int().min(0)),
  FRESHNESS_HORIZON_HOURS: num('100').pipe(z.number().positive()),

  // Orchestration
  RETRY_FAILED_REWRITES: flag('true'),
  RUN_ON_STARTUP: flag('false'),
  RUN_LOCK_TTL_SECONDS: num('3600').pipe(z.number().int().positive()),
  RUN_TIME: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM (24h)').default('07:00'),
  SCHEDULE_TIMEZONE: timeZone,
  QUERY_TIMEZONE: timeZone,
}).superRefine((env, ctx) => {
  if (env.STORE_DRIVER === 'mongo' && !env.MONGODB_URI) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['MONGODB_URI'],
      message: 'Required when STORE_DRIVER=mongo',
    });
  }
});

type Env = z.infer<typeof envSchema>;

export interface BullMQConnection {
  host: string;
  port: number;
  username?: string;
  password?: string;
  tls?: { rejectUnauthorized: boolean };
}

// Combine trusted local origins with configured ones
const getCorsOrigins = (env: Env): string[] => {
  const defaults = ['http://localhost:3000'];
  if (env.CORS_ORIGINS) {
    const extras = env.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean);
    defaults.push(...extras);
  }
  return Array.from(new Set(defaults));
};

// --- BULLMQ CONFIG (QUEUE) ---
const getBullMQConfig = (env: Env): BullMQConnection | undefined => {
  const targetUrl = env.REDIS_QUEUE_URL || env.REDIS_URL;
  if (!targetUrl) return undefined;

  try {
    const parsed = new URL(targetUrl);
    return {
      host: parsed.hostname,
      port: Number(parsed.port) || 6379,
      username: parsed.username || undefined,
      password: parsed.password || undefined,
      tls: targetUrl.startsWith('rediss:') ? { rejectUnauthorized: false } : undefined,
    };
  } catch (err) {
    logger.error(`❌ Failed to parse Redis URL for BullMQ: ${describeError(err)}`);
    return undefined;
  }
};

const toConfig = (env: Env) => {
  const [hour, minute] = env.RUN_TIME.split(':').map(Number);

  return {
    port: env.PORT,
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',

    store: {
      driver: env.STORE_DRIVER,
      mongoUri: env.MONGODB_URI,
      mongoPoolSize: env.MONGO_POOL_SIZE,
      storageDir: env.STORAGE_DIR,
      publishedRetention: env.PUBLISHED_RETENTION,
      workingRetentionHours: env.WORKING_RETENTION_HOURS,
      archivePublished: env.ARCHIVE_PUBLISHED,
    },

    redisUrl: env.REDIS_URL,
    bullMQConnection: getBullMQConfig(env),

    adminSecret: env.ADMIN_SECRET,
    corsOrigins: getCorsOrigins(env),
    trustProxyLevel: env.TRUST_PROXY_LVL,

    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxApi: env.RATE_LIMIT_MAX_API,
    },

    ai: {
      apiKey: env.GEMINI_API_KEY?.trim() || undefined,
      model: env.AI_MODEL,
      timeoutMs: env.AI_TIMEOUT_MS,
      maxRetries: env.AI_MAX_RETRIES,
      retryBaseDelayMs: env.AI_RETRY_BASE_DELAY_MS,
      concurrency: env.REWRITE_CONCURRENCY,
    },

    feeds: {
      sourcesFile: env.SOURCES_FILE,
      timeoutMs: env.FEED_TIMEOUT_MS,
      enrichTimeoutMs: env.ENRICH_TIMEOUT_MS,
      concurrency: env.FETCH_CONCURRENCY,
      maxEntriesPerSource: env.MAX_ENTRIES_PER_SOURCE,
      pageFetchDelayMs: env.PAGE_FETCH_DELAY_MS,
    },

    ranking: {
      articlesPerRun: env.ARTICLES_PER_RUN,
      maxPerSource: env.MAX_PER_SOURCE,
      minArticles: env.MIN_ARTICLES,
      freshnessHorizonHours: env.FRESHNESS_HORIZON_HOURS,
    },

    pipeline: {
      retryFailedRewrites: env.RETRY_FAILED_REWRITES,
      runOnStartup: env.RUN_ON_STARTUP,
      runLockTtlSeconds: env.RUN_LOCK_TTL_SECONDS,
    },

    schedule: {
      hour,
      minute,
      timeZone: env.SCHEDULE_TIMEZONE,
    },

    query: {
      timeZone: env.QUERY_TIMEZONE,
    },
  };
};

export type AppConfig = ReturnType<typeof toConfig>;

/**
 * Pure parse of an environment map. Throws ConfigError listing every issue.
 */
export const buildConfig = (source: NodeJS.ProcessEnv): AppConfig => {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return toConfig(result.data);
};

/**
 * Entry-point loader: reads .env, validates, and exits on bad configuration.
 */
export const loadConfig = (): AppConfig => {
  dotenv.config();

  try {
    const config = buildConfig(process.env);
    logger.info('✅ Configuration Validated & Loaded');
    return config;
  } catch (err) {
    logger.error('❌ Invalid Environment Configuration:');
    if (err instanceof ConfigError) {
      err.issues.forEach(issue => logger.error(`   -> ${issue}`));
    } else {
      logger.error(describeError(err));
    }
    process.exit(1);
  }
};
