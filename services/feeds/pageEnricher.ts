// services/feeds/pageEnricher.ts
import { parseHTML } from 'linkedom';
import apiClient, { HttpClient } from '../../utils/apiClient';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { cleanText } from '../../utils/helpers';
import { describeError } from '../../utils/errors';
import type { ICandidate, IFeedSource } from '../../types';

const BODY_SELECTORS = ['article p', '.entry-content p', '.article-body p', 'p'];

export interface PageSignals {
    description?: string;
    imageUrl?: string;
    commentCount?: number;
    socialShares?: number;
}

const parseCount = (raw: string | null | undefined): number | undefined => {
    if (!raw) return undefined;
    const digits = raw.replace(/\D/g, '');
    if (!digits) return undefined;
    const value = Number.parseInt(digits, 10);
    return Number.isFinite(value) ? value : undefined;
};

/**
 * Reads the signals a feed entry lacks from the article page itself.
 * Only fields that were found are returned.
 */
export const extractPageSignals = (html: string, source: IFeedSource, currentDescription: string): PageSignals => {
    const { document } = parseHTML(html);
    const signals: PageSignals = {};

    // 1. Body text when the feed summary is too thin
    if (currentDescription.length < CONSTANTS.FEED.SHORT_DESCRIPTION_CHARS) {
        for (const selector of BODY_SELECTORS) {
            const paragraphs = Array.from(document.querySelectorAll(selector)).slice(0, CONSTANTS.FEED.PAGE_PARAGRAPHS);
            if (paragraphs.length === 0) continue;
            const text = cleanText(paragraphs.map(p => p.textContent ?? '').join(' '));
            if (text) signals.description = text.slice(0, CONSTANTS.FEED.MAX_DESCRIPTION_CHARS);
            break;
        }
    }

    // 2. Social card image
    const ogImage = document.querySelector('meta[property="og:image"]')?.getAttribute('content')
        || document.querySelector('meta[name="twitter:image"]')?.getAttribute('content');
    if (ogImage) signals.imageUrl = ogImage.trim();

    // 3. Comment count
    if (source.popularitySelector) {
        const count = parseCount(document.querySelector(source.popularitySelector)?.textContent);
        if (count !== undefined) signals.commentCount = count;
    }

    // 4. Share counters embedded as data attributes
    let shares: number | undefined;
    for (const attr of CONSTANTS.FEED.SHARE_ATTRIBUTES) {
        const value = parseCount(document.querySelector(`[${attr}]`)?.getAttribute(attr));
        if (value !== undefined) shares = (shares ?? 0) + value;
    }
    if (shares !== undefined) signals.socialShares = shares;

    return signals;
};

export interface PageEnricherOptions {
    timeoutMs: number;
    http?: HttpClient;
}

class PageEnricher {
    private readonly http: HttpClient;

    constructor(private readonly options: PageEnricherOptions) {
        this.http = options.http ?? apiClient;
    }

    /** Page failures (including an aborted `signal`) leave the candidate as it was. */
    public async enrich(candidate: ICandidate, source: IFeedSource, signal?: AbortSignal): Promise<ICandidate> {
        try {
            const response = await this.http.get<string>(candidate.url, {
                timeout: this.options.timeoutMs,
                signal,
                responseType: 'text',
                headers: { 'Accept': 'text/html,application/xhtml+xml' },
            });
            if (typeof response.data !== 'string') return candidate;

            const signals = extractPageSignals(response.data, source, candidate.originalDescription);

            return {
                ...candidate,
                originalDescription: signals.description ?? candidate.originalDescription,
                imageUrl: candidate.imageUrl ?? signals.imageUrl,
                commentCount: signals.commentCount ?? candidate.commentCount,
                socialShares: signals.socialShares ?? candidate.socialShares,
            };
        } catch (err) {
            logger.warn(`Page enrichment skipped for ${candidate.url}: ${describeError(err)}`);
            return candidate;
        }
    }
}

export default PageEnricher;
