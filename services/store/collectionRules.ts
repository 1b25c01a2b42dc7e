// services/store/collectionRules.ts
import logger from '../../utils/logger';
import { InvalidTransitionError } from '../../utils/errors';
import { ArticleSchema } from '../../utils/validationSchemas';
import type { CollectionName, IArticle } from '../../types';

const ACCEPTED_STATUSES: Record<CollectionName, readonly IArticle['status'][]> = {
    raw: ['raw', 'rewrite_failed'],
    rewritten: ['rewritten'],
    published: [],
};

/** Parses persisted data. Non-arrays read as empty; invalid records are dropped. */
export const parseStored = (collection: CollectionName, data: unknown): IArticle[] => {
    if (!Array.isArray(data)) return [];

    const articles: IArticle[] = [];
    let dropped = 0;
    for (const item of data) {
        const parsed = ArticleSchema.safeParse(item);
        if (parsed.success) articles.push(parsed.data);
        else dropped++;
    }
    if (dropped > 0) logger.warn(`Store: dropped ${dropped} unreadable record(s) from ${collection}`);
    return articles;
};

/**
 * Boundary checks for `merge`. `rawIds` is the current id set of `raw`,
 * required for writes into `rewritten`.
 */
export const assertMergeAllowed = (
    collection: CollectionName,
    articles: readonly IArticle[],
    rawIds: ReadonlySet<string>
): IArticle[] => {
    if (collection === 'published') {
        throw new InvalidTransitionError('Records enter published only through promotion');
    }

    const allowed = ACCEPTED_STATUSES[collection];
    return articles.map(article => {
        const parsed = ArticleSchema.safeParse(article);
        if (!parsed.success) {
            throw new InvalidTransitionError(
                `Invalid article ${article.id}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`
            );
        }
        if (!allowed.includes(parsed.data.status)) {
            throw new InvalidTransitionError(`${collection} does not accept status "${parsed.data.status}" (${article.id})`);
        }
        if (collection === 'rewritten' && !rawIds.has(parsed.data.id)) {
            throw new InvalidTransitionError(`Article ${article.id} is not in raw`);
        }
        return parsed.data;
    });
};

/**
 * Upsert by id: existing ids are replaced in place, new ids are appended
 * in order of first appearance, duplicates within the batch keep the last value.
 */
export const mergeRecords = (existing: readonly IArticle[], incoming: readonly IArticle[]): IArticle[] => {
    const latest = new Map<string, IArticle>();
    for (const article of incoming) latest.set(article.id, article);

    const merged = existing.map(article => latest.get(article.id) ?? article);
    const present = new Set(existing.map(a => a.id));

    for (const [id, article] of latest) {
        if (!present.has(id)) merged.push(article);
    }
    return merged;
};

/**
 * Boundary checks for `remove`. `rewrittenIds` is the current id set of
 * `rewritten`, required for deletes from `raw`.
 */
export const assertRemoveAllowed = (
    collection: CollectionName,
    ids: readonly string[],
    rewrittenIds: ReadonlySet<string>
): void => {
    if (collection === 'published') {
        throw new InvalidTransitionError('Records leave published only through retention');
    }
    if (collection === 'raw') {
        const referenced = ids.find(id => rewrittenIds.has(id));
        if (referenced) {
            throw new InvalidTransitionError(`Article ${referenced} is still in rewritten`);
        }
    }
};

export interface PromotionResult {
    published: IArticle[];
    promoted: IArticle[];
}

/**
 * Builds the next `published` collection. New ids go to the front in the given
 * order, already-published ids are replaced where they stand, then the list is
 * trimmed to `retention`.
 */
export const applyPromotion = (
    rewritten: readonly IArticle[],
    published: readonly IArticle[],
    ids: readonly string[],
    publishedAt: string,
    retention: number
): PromotionResult => {
    const byId = new Map(rewritten.map(a => [a.id, a]));
    const uniqueIds = Array.from(new Set(ids));

    const promoted = uniqueIds.map(id => {
        const source = byId.get(id);
        if (!source) {
            throw new InvalidTransitionError(`Cannot promote ${id}: not in rewritten`);
        }
        if (source.status !== 'rewritten' || !source.rewrittenTitle || !source.rewrittenDescription) {
            throw new InvalidTransitionError(`Cannot promote ${id}: status is "${source.status}"`);
        }
        const record: IArticle = {
            ...source,
            status: 'published',
            badge: 'aggregated',
            sitePublishedAt: publishedAt,
        };
        return record;
    });

    const promotedById = new Map(promoted.map(a => [a.id, a]));
    const alreadyPublished = new Set(published.map(a => a.id));

    const fresh = promoted.filter(a => !alreadyPublished.has(a.id));
    const updated = published.map(a => promotedById.get(a.id) ?? a);

    return {
        published: [...fresh, ...updated].slice(0, Math.max(0, retention)),
        promoted,
    };
};
