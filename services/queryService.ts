// services/queryService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { calendarDate } from '../utils/helpers';
import { describeError } from '../utils/errors';
import { ARTICLE_BADGES } from '../types';
import type { ArticleBadge, IArticle, IArticleFilters, IArticlePage, ISourceCount } from '../types';
import type { ICollectionStore } from './store/ICollectionStore';

/** Filter values as they arrive from a query string (strings, arrays, nested objects). */
export interface RawArticleFilters {
    category?: unknown;
    badge?: unknown;
    source?: unknown;
    today?: unknown;
}

export interface QueryServiceOptions {
    store: ICollectionStore;
    timeZone: string;
    clock?: () => Date;
}

export interface TodayDigest {
    count: number;
    articles: IArticle[];
}

export interface PublishedStats {
    total: number;
    lastUpdated: string | null;
}

// Repeated query parameters keep their first value; anything non-string is dropped.
const firstValue = (value: unknown): string | undefined => {
    const first = Array.isArray(value) ? value[0] : value;
    if (typeof first !== 'string') return undefined;
    const trimmed = first.trim();
    return trimmed ? trimmed : undefined;
};

const isBadge = (value: string): value is ArticleBadge =>
    ARTICLE_BADGES.some(badge => badge === value);

export const parseFilters = (raw: RawArticleFilters): IArticleFilters => {
    const filters: IArticleFilters = {};

    const category = firstValue(raw.category);
    if (category) filters.category = category;

    const badge = firstValue(raw.badge);
    if (badge && isBadge(badge)) filters.badge = badge;

    const source = firstValue(raw.source);
    if (source) filters.source = source;

    // Presence flag: a bare `?today` arrives as ''
    const today = Array.isArray(raw.today) ? raw.today[0] : raw.today;
    if (typeof today === 'string') {
        const flag = today.trim().toLowerCase();
        if (flag !== '0' && flag !== 'false') filters.today = true;
    }

    return filters;
};

export const clampLimit = (raw: unknown): number => {
    const value = Math.floor(Number(firstValue(raw) ?? NaN));
    if (!Number.isFinite(value) || value <= 0) return CONSTANTS.QUERY.DEFAULT_LIMIT;
    return Math.min(value, CONSTANTS.QUERY.MAX_LIMIT);
};

export const clampOffset = (raw: unknown): number => {
    const value = Math.floor(Number(firstValue(raw) ?? NaN));
    if (!Number.isFinite(value) || value < 0) return 0;
    return value;
};

/**
 * Read-only views over the published collection. Bad input is never an error;
 * a failing store reads as an empty collection.
 */
class QueryService {
    private readonly clock: () => Date;

    constructor(private readonly options: QueryServiceOptions) {
        this.clock = options.clock ?? (() => new Date());
    }

    async list(rawFilters: RawArticleFilters, rawLimit?: unknown, rawOffset?: unknown): Promise<IArticlePage> {
        const filters = parseFilters(rawFilters);
        const limit = clampLimit(rawLimit);
        const offset = clampOffset(rawOffset);

        const matching = this.applyFilters(await this.published(), filters);

        return {
            total: matching.length,
            limit,
            offset,
            articles: matching.slice(offset, offset + limit),
        };
    }

    async get(id: string): Promise<IArticle | null> {
        const articles = await this.published();
        return articles.find(a => a.id === id) ?? null;
    }

    async today(): Promise<TodayDigest> {
        const articles = this.applyFilters(await this.published(), { today: true });
        return { count: articles.length, articles };
    }

    async sources(): Promise<ISourceCount[]> {
        const counts = new Map<string, number>();
        for (const article of await this.published()) {
            counts.set(article.sourceName, (counts.get(article.sourceName) ?? 0) + 1);
        }
        return Array.from(counts, ([source, count]) => ({ source, count }))
            .sort((a, b) => b.count - a.count || a.source.localeCompare(b.source));
    }

    async stats(): Promise<PublishedStats> {
        const articles = await this.published();
        const lastUpdated = articles.reduce<string | null>((latest, a) => {
            if (!a.sitePublishedAt) return latest;
            return latest === null || Date.parse(a.sitePublishedAt) > Date.parse(latest) ? a.sitePublishedAt : latest;
        }, null);
        return { total: articles.length, lastUpdated };
    }

    // --- Private Helpers ---

    private async published(): Promise<IArticle[]> {
        try {
            return await this.options.store.read('published');
        } catch (err) {
            logger.error(`Query: published collection unavailable: ${describeError(err)}`);
            return [];
        }
    }

    private applyFilters(articles: IArticle[], filters: IArticleFilters): IArticle[] {
        const source = filters.source?.toLowerCase();
        const today = filters.today ? calendarDate(this.clock(), this.options.timeZone) : null;

        return articles.filter(a =>
            (!filters.category || a.category === filters.category) &&
            (!filters.badge || a.badge === filters.badge) &&
            (!source || a.sourceName.toLowerCase() === source) &&
            (!today || (!!a.sitePublishedAt && calendarDate(new Date(a.sitePublishedAt), this.options.timeZone) === today))
        );
    }
}

export default QueryService;
