// services/feeds/RssFeedAdapter.ts
import Parser from 'rss-parser';
import sanitizeHtml from 'sanitize-html';
import { z } from 'zod';
import apiClient, { HttpClient } from '../../utils/apiClient';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { articleId, cleanText, hoursSince, normalizeUrl, sleep as defaultSleep } from '../../utils/helpers';
import { SourceUnavailableError, describeError } from '../../utils/errors';
import type { ICandidate, IFeedSource } from '../../types';
import type { IFeedAdapter } from './IFeedAdapter';
import type PageEnricher from './pageEnricher';

type CustomItem = {
    mediaContent?: unknown;
    mediaThumbnail?: unknown;
    slashComments?: unknown;
    contentEncoded?: string;
};

type FeedItem = CustomItem & Parser.Item;

// Attribute-carrying media nodes as xml2js hands them over
const MediaNodeSchema = z.object({
    $: z.object({
        url: z.string(),
        medium: z.string().optional(),
        type: z.string().optional(),
    }),
});

const TagSchema = z.union([
    z.string(),
    z.object({ _: z.string() }).transform(t => t._),
]);

export interface RssFeedOptions {
    timeoutMs: number;
    // Budget for all page fetches of one source; entries past it keep their feed data
    enrichTimeoutMs: number;
    maxEntriesPerSource: number;
    pageFetchDelayMs: number;
    http?: HttpClient;
    enricher?: PageEnricher;
    sleep?: (ms: number) => Promise<void>;
}

const stripHtml = (html: string): string =>
    cleanText(sanitizeHtml(html, { allowedTags: [], allowedAttributes: {} }));

const firstMediaUrl = (value: unknown): string | undefined => {
    const nodes = Array.isArray(value) ? value : [value];
    for (const node of nodes) {
        const parsed = MediaNodeSchema.safeParse(node);
        if (!parsed.success) continue;
        const { url, medium, type } = parsed.data.$;
        const kind = medium ?? type ?? 'image';
        if (url.startsWith('http') && kind.startsWith('image')) return url;
    }
    return undefined;
};

const firstInlineImage = (html: string): string | undefined => {
    const match = html.match(/<img[^>]+src=["']([^"']+)["']/i);
    return match && match[1].startsWith('http') ? match[1] : undefined;
};

export class RssFeedAdapter implements IFeedAdapter {
    name = 'RSS';
    private readonly http: HttpClient;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly parser = new Parser<Record<string, unknown>, CustomItem>({
        customFields: {
            item: [
                ['media:content', 'mediaContent', { keepArray: true }],
                ['media:thumbnail', 'mediaThumbnail', { keepArray: true }],
                ['slash:comments', 'slashComments'],
                ['content:encoded', 'contentEncoded'],
            ],
        },
    });

    constructor(private readonly options: RssFeedOptions) {
        this.http = options.http ?? apiClient;
        this.sleep = options.sleep ?? defaultSleep;
    }

    async fetchCandidates(source: IFeedSource, now: Date): Promise<ICandidate[]> {
        logger.info(`📡 Crawling ${source.name} (${source.feedUrl})`);

        let items: FeedItem[];
        try {
            const response = await this.http.get<string>(source.feedUrl, {
                timeout: this.options.timeoutMs,
                responseType: 'text',
                headers: { 'Accept': 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.5' },
            });
            if (typeof response.data !== 'string' || !response.data.trim()) {
                throw new Error('Empty feed body');
            }
            const feed = await this.parser.parseString(response.data);
            items = feed.items;
        } catch (err) {
            throw new SourceUnavailableError(source.name, describeError(err));
        }

        logger.debug(`   Found ${items.length} entries in ${source.name}`);

        const candidates = items
            .slice(0, this.options.maxEntriesPerSource)
            .flatMap(item => this.normalize(item, source, now) ?? []);

        const result = source.enrichPages && this.options.enricher
            ? await this.enrichAll(candidates, source, this.options.enricher)
            : candidates;

        logger.info(`   ✓ ${source.name}: ${result.length} candidates`);
        return result;
    }

    private async enrichAll(candidates: ICandidate[], source: IFeedSource, enricher: PageEnricher): Promise<ICandidate[]> {
        const controller = new AbortController();
        const budget = this.options.enrichTimeoutMs;
        const timer = budget > 0 ? setTimeout(() => controller.abort(), budget) : undefined;

        const enriched: ICandidate[] = [];
        let skipped = 0;
        try {
            for (const [index, candidate] of candidates.entries()) {
                if (index > 0 && !controller.signal.aborted) await this.sleep(this.options.pageFetchDelayMs);
                if (controller.signal.aborted) {
                    skipped++;
                    enriched.push(candidate);
                    continue;
                }
                enriched.push(await enricher.enrich(candidate, source, controller.signal));
            }
        } finally {
            clearTimeout(timer);
        }

        if (controller.signal.aborted) {
            logger.warn(`⏱️ ${source.name}: page enrichment stopped after ${budget}ms; ${skipped} entries kept their feed data`);
        }
        return enriched;
    }

    /** Maps one feed entry to a Candidate; entries without a link are skipped. */
    public normalize(item: FeedItem, source: IFeedSource, now: Date): ICandidate | null {
        const link = item.link?.trim();
        if (!link) return null;

        const url = normalizeUrl(link);
        const html = item.content || item.summary || item.contentEncoded || '';

        const description = stripHtml(html || item.contentSnippet || '')
            .slice(0, CONSTANTS.FEED.MAX_DESCRIPTION_CHARS);

        const enclosureImage = item.enclosure && (item.enclosure.type ?? '').includes('image')
            ? item.enclosure.url
            : undefined;

        const imageUrl = firstMediaUrl(item.mediaContent)
            ?? firstMediaUrl(item.mediaThumbnail)
            ?? enclosureImage
            ?? firstInlineImage(html)
            ?? firstInlineImage(item.contentEncoded ?? '');

        const tags = Array.from(new Set(
            (item.categories ?? [])
                .map((raw: unknown) => TagSchema.safeParse(raw))
                .flatMap(r => (r.success ? [r.data.trim()] : []))
                .filter(Boolean)
        )).slice(0, CONSTANTS.FEED.MAX_TAGS);

        const reported = item.isoDate ?? item.pubDate;
        const publishedAt = reported && !Number.isNaN(Date.parse(reported))
            ? new Date(reported).toISOString()
            : now.toISOString();

        const comments = Number.parseInt(String(item.slashComments ?? ''), 10);

        return {
            id: articleId(source.name, url),
            sourceName: source.name,
            sourceLogo: source.logo,
            url,
            imageUrl,
            originalTitle: cleanText(item.title) || 'Untitled',
            originalDescription: description,
            publishedAt,
            category: source.category,
            tags,
            ageHours: hoursSince(publishedAt, now),
            commentCount: Number.isFinite(comments) && comments > 0 ? comments : 0,
            socialShares: 0,
        };
    }
}

export default RssFeedAdapter;
