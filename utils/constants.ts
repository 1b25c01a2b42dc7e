// utils/constants.ts

// --- CENTRAL CONFIGURATION ---
export const CONSTANTS = {
  // Feed Normalization
  FEED: {
    MAX_DESCRIPTION_CHARS: 1500,
    MAX_TAGS: 8,
    SHORT_DESCRIPTION_CHARS: 100, // below this, page enrichment pulls paragraphs
    PAGE_PARAGRAPHS: 5,
    SHARE_ATTRIBUTES: ['data-shares', 'data-reactions', 'data-likes'],
  },

  // Ranking
  RANKING: {
    FRESHNESS_MAX: 100,
    COMMENT_WEIGHT: 2,
    SHARE_WEIGHT: 0.5,
    JITTER_MAX: 5,
  },

  // Rewrite Rules
  REWRITE: {
    MAX_SENTENCES: 5,
    MAX_INPUT_DESCRIPTION_CHARS: 800,
    MAX_OUTPUT_TOKENS: 600,
  },

  // Query Surface
  QUERY: {
    DEFAULT_LIMIT: 20,
    MAX_LIMIT: 100,
  },

  // Run History kept in memory
  RUNS: {
    HISTORY_SIZE: 20,
  },

  // Queue Configuration (Centralized)
  QUEUE: {
    NAME: 'pipeline-queue',
    DAILY_JOB: 'daily-pipeline-run',
  },

  // Redis Keys (Prevent typos)
  REDIS_KEYS: {
    RUN_LOCK: 'pipeline:run_lock',
    LAST_RUN: 'pipeline:last_run',
  },

  // Circuit Breaker Provider Names
  PROVIDERS: {
    TEXT_GENERATION: 'GEMINI',
  },
};

// File names used by the JSON-file store driver
export const COLLECTION_FILES = {
  raw: 'raw_articles.json',
  rewritten: 'rewritten_articles.json',
  published: 'published_articles.json',
} as const;
