import { describe, it, expect } from 'vitest';
import { applyPromotion, assertMergeAllowed, assertRemoveAllowed, mergeRecords, parseStored } from '../../../services/store/collectionRules';
import { InvalidTransitionError } from '../../../utils/errors';
import { makeArticle, makePublished, makeRewritten } from '../../fixtures/articles';

const T = '2026-03-01T07:00:00.000Z';

describe('mergeRecords', () => {
    it('replaces in place, appends new ids in order and keeps the last duplicate', () => {
        const merged = mergeRecords(
            [makeArticle(1), makeArticle(2)],
            [makeArticle(3), makeArticle(2, { popularityScore: 10 }), makeArticle(3, { popularityScore: 30 })],
        );

        expect(merged.map(a => [a.id, a.popularityScore])).toEqual([
            [makeArticle(1).id, 50],
            [makeArticle(2).id, 10],
            [makeArticle(3).id, 30],
        ]);
    });
});

describe('assertMergeAllowed', () => {
    it('accepts raw and rewrite_failed records into raw', () => {
        const accepted = assertMergeAllowed('raw', [makeArticle(1), makeArticle(2, { status: 'rewrite_failed' })], new Set());
        expect(accepted).toHaveLength(2);
    });

    it('requires rewritten records to exist in raw', () => {
        expect(() => assertMergeAllowed('rewritten', [makeRewritten(1)], new Set()))
            .toThrow(InvalidTransitionError);
        expect(assertMergeAllowed('rewritten', [makeRewritten(1)], new Set([makeArticle(1).id]))).toHaveLength(1);
    });

    it('rejects schema violations', () => {
        expect(() => assertMergeAllowed('raw', [makeArticle(1, { id: 'short' })], new Set()))
            .toThrow('Invalid article short: id: Invalid article id');
    });
});

describe('assertRemoveAllowed', () => {
    it('refuses deletes from published', () => {
        expect(() => assertRemoveAllowed('published', ['a'], new Set()))
            .toThrow('Records leave published only through retention');
    });

    it('blocks raw deletes for ids still in rewritten', () => {
        const rewrittenIds = new Set([makeArticle(2).id]);
        expect(() => assertRemoveAllowed('raw', [makeArticle(1).id, makeArticle(2).id], rewrittenIds))
            .toThrow(InvalidTransitionError);
        expect(() => assertRemoveAllowed('raw', [makeArticle(1).id], rewrittenIds)).not.toThrow();
        expect(() => assertRemoveAllowed('rewritten', [makeArticle(2).id], rewrittenIds)).not.toThrow();
    });
});

describe('applyPromotion', () => {
    it('refuses records that were never rewritten', () => {
        const notReady = makeArticle(1, { status: 'rewrite_failed' });
        expect(() => applyPromotion([notReady], [], [notReady.id], T, 10))
            .toThrow(`Cannot promote ${notReady.id}: status is "rewrite_failed"`);
    });

    it('de-duplicates the requested ids', () => {
        const result = applyPromotion([makeRewritten(1)], [], [makeArticle(1).id, makeArticle(1).id], T, 10);
        expect(result.promoted).toHaveLength(1);
        expect(result.published).toHaveLength(1);
    });

    it('leaves the other published records untouched', () => {
        const existing = makePublished(2, { badge: 'paid' });
        const result = applyPromotion([makeRewritten(1)], [existing], [makeArticle(1).id], T, 10);

        expect(result.published).toEqual([
            { ...makeRewritten(1), status: 'published', badge: 'aggregated', sitePublishedAt: T },
            existing,
        ]);
    });
});

describe('parseStored', () => {
    it('fills defaults for optional counters', () => {
        const { tags: _tags, commentCount: _comments, ...partial } = makeArticle(1);
        expect(parseStored('raw', [partial])).toEqual([{ ...makeArticle(1), tags: [], commentCount: 0 }]);
    });
});
