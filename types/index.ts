// types/index.ts

// --- 1. Lifecycle Enums ---
export const ARTICLE_STATUSES = ['raw', 'rewritten', 'published', 'rewrite_failed'] as const;
export type ArticleStatus = typeof ARTICLE_STATUSES[number];

export const ARTICLE_BADGES = ['aggregated', 'paid'] as const;
export type ArticleBadge = typeof ARTICLE_BADGES[number];

export const COLLECTIONS = ['raw', 'rewritten', 'published'] as const;
export type CollectionName = typeof COLLECTIONS[number];

// --- 2. Feed Sources ---
export interface IFeedSource {
  name: string;
  feedUrl: string;
  baseUrl?: string;
  logo?: string;
  category: string;
  // CSS selector holding the comment count on the article page
  popularitySelector?: string | null;
  // Fetch each article page for richer metadata (slow, opt-in)
  enrichPages: boolean;
}

// --- 3. Candidate (normalized feed entry) ---
export interface ICandidate {
  id: string;
  sourceName: string;
  sourceLogo?: string;
  url: string;
  imageUrl?: string;
  originalTitle: string;
  originalDescription: string;
  publishedAt: string; // ISO timestamp reported by the source
  category: string;
  tags: string[];

  // Raw popularity inputs
  ageHours: number;
  commentCount: number;
  socialShares: number;
}

export interface IScoredCandidate extends ICandidate {
  popularityScore: number;
  jitter: number;
}

// --- 4. Article (persisted) ---
export interface IArticle extends ICandidate {
  rewrittenTitle?: string;
  rewrittenDescription?: string;
  sitePublishedAt?: string; // when the article was promoted to published
  popularityScore: number;
  badge: ArticleBadge;
  status: ArticleStatus;
  failureReason?: string;
}

export type RewrittenArticle = IArticle & {
  status: 'rewritten';
  rewrittenTitle: string;
  rewrittenDescription: string;
};

// --- 5. Pipeline Runs ---
export type RunTrigger = 'scheduled' | 'manual' | 'startup' | 'cli';

export type PipelinePhase = 'idle' | 'fetching' | 'ranking' | 'rewriting' | 'publishing' | 'done';

export interface ISourceFailure {
  source: string;
  reason: string;
}

export interface IRunSummary {
  runId: string;
  trigger: RunTrigger;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outcome: 'completed' | 'failed';
  fetchedPerSource: Record<string, number>;
  sourceFailures: ISourceFailure[];
  candidates: number;
  selected: number;
  rewritten: number;
  rewriteFailed: number;
  published: number;
  error?: string;
}

// --- 6. Query Surface ---
export interface IArticleFilters {
  category?: string;
  badge?: ArticleBadge;
  source?: string;
  today?: boolean;
}

export interface IArticlePage {
  total: number;
  limit: number;
  offset: number;
  articles: IArticle[];
}

export interface ISourceCount {
  source: string;
  count: number;
}

// --- 7. Google Gemini Interfaces ---
export interface IGeminiPart {
  text?: string;
}

export interface IGeminiCandidate {
  content?: { parts?: IGeminiPart[]; role?: string };
  finishReason?: string;
}

export interface IGeminiResponse {
  candidates?: IGeminiCandidate[];
}
