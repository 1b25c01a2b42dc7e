// utils/validationSchemas.ts
import { z } from 'zod';
import { ARTICLE_BADGES, ARTICLE_STATUSES } from '../types';
import type { IArticle, IFeedSource } from '../types';

/**
 * Reusable Validation Rules
 */
const rules = {
    articleId: z.string().regex(/^[0-9a-f]{12}$/, "Invalid article id"),
    url: z.string().url("Invalid URL format"),
    isoDate: z.string().refine(v => !Number.isNaN(Date.parse(v)), "Invalid timestamp"),
};

/**
 * Store boundary: every record read or written goes through this.
 * Unknown keys (e.g. MongoDB's `position`) are stripped.
 */
export const ArticleSchema: z.ZodType<IArticle, z.ZodTypeDef, unknown> = z.object({
    id: rules.articleId,
    sourceName: z.string().min(1),
    sourceLogo: z.string().optional(),
    url: z.string().min(1),
    imageUrl: z.string().optional(),
    originalTitle: z.string(),
    originalDescription: z.string(),
    publishedAt: rules.isoDate,
    category: z.string(),
    tags: z.array(z.string()).default([]),
    ageHours: z.number().min(0),
    commentCount: z.number().int().min(0).default(0),
    socialShares: z.number().int().min(0).default(0),
    rewrittenTitle: z.string().optional(),
    rewrittenDescription: z.string().optional(),
    sitePublishedAt: rules.isoDate.optional(),
    popularityScore: z.number(),
    badge: z.enum(ARTICLE_BADGES).default('aggregated'),
    status: z.enum(ARTICLE_STATUSES),
    failureReason: z.string().optional(),
});

/**
 * Feed source registry (config/sources.json)
 */
export const FeedSourceSchema: z.ZodType<IFeedSource, z.ZodTypeDef, unknown> = z.object({
    name: z.string().min(1),
    feedUrl: rules.url,
    baseUrl: rules.url.optional(),
    logo: z.string().optional(),
    category: z.string().min(1),
    popularitySelector: z.string().min(1).nullable().optional(),
    enrichPages: z.boolean().default(false),
});

export const FeedSourceListSchema = z.array(FeedSourceSchema).min(1, "At least one feed source is required");

/**
 * Text-generation reply
 */
export const RewriteResponseSchema = z.object({
    rewritten_title: z.string().trim().min(1, "Empty title"),
    rewritten_description: z.string().trim().min(1, "Empty description"),
});

/**
 * Run summaries mirrored to Redis by another process
 */
export const RunSummarySchema = z.object({
    runId: z.string(),
    trigger: z.enum(['scheduled', 'manual', 'startup', 'cli']),
    startedAt: z.string(),
    finishedAt: z.string(),
    durationMs: z.number(),
    outcome: z.enum(['completed', 'failed']),
    fetchedPerSource: z.record(z.number()),
    sourceFailures: z.array(z.object({ source: z.string(), reason: z.string() })),
    candidates: z.number(),
    selected: z.number(),
    rewritten: z.number(),
    rewriteFailed: z.number(),
    published: z.number(),
    error: z.string().optional(),
});

/**
 * Route Schemas
 */
export const schemas = {
    getArticle: z.object({
        params: z.object({ id: rules.articleId }),
    }),

    runJob: z.object({
        query: z.object({
            wait: z.enum(['true', 'false']).optional(),
            key: z.string().optional(),
        }),
    }),
};

export default schemas;
