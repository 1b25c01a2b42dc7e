import { describe, it, expect } from 'vitest';
import { extractPageSignals } from '../../../services/feeds/pageEnricher';
import { makeSource } from '../../fixtures/articles';
import { TIMBER_PAGE } from '../../fixtures/feeds';

const longDescription = 'x'.repeat(120);

describe('extractPageSignals', () => {
    it('reads body text, social image, comments and shares', () => {
        const signals = extractPageSignals(TIMBER_PAGE, makeSource({ popularitySelector: '.comment-count' }), 'short');

        expect(signals).toEqual({
            description: 'First paragraph. Second paragraph.',
            imageUrl: 'https://cdn.studio.test/og.jpg',
            commentCount: 34,
            socialShares: 1200,
        });
    });

    it('keeps a long feed description', () => {
        const signals = extractPageSignals(TIMBER_PAGE, makeSource(), longDescription);
        expect(signals.description).toBeUndefined();
    });

    it('skips the comment count without a selector', () => {
        const signals = extractPageSignals(TIMBER_PAGE, makeSource({ popularitySelector: null }), longDescription);
        expect(signals.commentCount).toBeUndefined();
    });

    it('falls back to the twitter card and sums share attributes', () => {
        const html = `<html><head><meta name="twitter:image" content=" https://cdn.studio.test/card.jpg "></head>
            <body><div class="entry-content"><p>Only text.</p></div>
            <b data-reactions="7"></b><i data-likes="3"></i></body></html>`;

        expect(extractPageSignals(html, makeSource(), '')).toEqual({
            description: 'Only text.',
            imageUrl: 'https://cdn.studio.test/card.jpg',
            socialShares: 10,
        });
    });

    it('returns nothing for an empty page', () => {
        expect(extractPageSignals('<html><body></body></html>', makeSource(), longDescription)).toEqual({});
    });
});
