// utils/helpers.ts
import crypto from 'crypto';

// 1. Pause execution for X milliseconds
export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

// 2. Clean up messy text (HTML tags, entities, extra spaces)
export const cleanText = (text: string | null | undefined): string => {
    if (!text) return "";
    let clean = text.replace(/<[^>]*>?/gm, ' ');
    clean = clean
        .replace(/&nbsp;/g, ' ')
        .replace(/&amp;/g, '&')
        .replace(/&quot;/g, '"')
        .replace(/&#0?39;|&apos;/g, "'")
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>');
    // Normalize whitespace (turn multiple spaces/newlines into single space)
    return clean.replace(/\s+/g, ' ').trim();
};

const TRACKING_PARAMS = /^(utm_[a-z]+|fbclid|gclid|mc_cid|mc_eid)$/i;

// 3. URL Normalization: stable identity for the same article across fetches
export const normalizeUrl = (url: string): string => {
    if (!url) return "";
    try {
        const urlObj = new URL(url.trim());

        // A. Remove Fragment (#section)
        urlObj.hash = '';

        // B. Drop tracking parameters, keep the ones that address content (?p=123)
        for (const key of Array.from(urlObj.searchParams.keys())) {
            if (TRACKING_PARAMS.test(key)) urlObj.searchParams.delete(key);
        }

        // C. Remove Trailing Slash (site.com/story/ == site.com/story)
        let finalUrl = urlObj.toString();
        if (finalUrl.endsWith('/')) {
            finalUrl = finalUrl.slice(0, -1);
        }
        return finalUrl;
    } catch (e) {
        return url.trim();
    }
};

// 4. Stable article id: same source + same URL => same id
export const articleId = (sourceName: string, url: string): string =>
    crypto.createHash('md5').update(`${sourceName}:${url}`).digest('hex').slice(0, 12);

// 5. JSON Extractor for model output (code fences, leading chatter)
export const extractJSON = (text: string): string => {
    if (!text) return "{}";
    const trimmed = text.trim();
    try {
        JSON.parse(trimmed);
        return trimmed;
    } catch (e) {
        const firstOpen = trimmed.indexOf('{');
        const lastClose = trimmed.lastIndexOf('}');

        if (firstOpen !== -1 && lastClose !== -1 && lastClose > firstOpen) {
            return trimmed.substring(firstOpen, lastClose + 1);
        }
        return "{}";
    }
};

// 6. Sentence counter used to enforce the description length rule
export const countSentences = (text: string): number => {
    const clean = text.replace(/\s+/g, ' ').trim();
    if (!clean) return 0;
    return clean
        .split(/(?<=[.!?]["'”’)]?)\s+(?=\S)/)
        .filter(part => /[A-Za-z0-9]/.test(part))
        .length;
};

// 7. Hours elapsed between an ISO timestamp and `now` (never negative)
export const hoursSince = (iso: string, now: Date): number => {
    const then = new Date(iso).getTime();
    if (Number.isNaN(then)) return 0;
    return Math.max(0, (now.getTime() - then) / (1000 * 60 * 60));
};

// 8. Race a promise against a deadline
export const withTimeout = <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
    if (!Number.isFinite(ms) || ms <= 0) return promise;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    });

    return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
};

/**
 * 9. Bounded fan-out: runs `worker` over `items` in batches of `concurrency`.
 * Results keep the input order. Rejections propagate, so callers that need
 * isolation catch inside `worker`.
 */
export const mapInBatches = async <T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
    const size = Math.max(1, Math.floor(concurrency) || 1);
    const results: R[] = [];

    for (let i = 0; i < items.length; i += size) {
        const batch = items.slice(i, i + size);
        const settled = await Promise.all(batch.map((item, idx) => worker(item, i + idx)));
        results.push(...settled);
    }
    return results;
};

// 10. Deterministic PRNG (mulberry32) for reproducible ranking jitter
export const seededRandom = (seed: number): (() => number) => {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6D2B79F5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

// 11. Calendar date (YYYY-MM-DD) of an instant in a given IANA time zone
export const calendarDate = (date: Date, timeZone: string): string => {
    const parts = new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(date);

    const pick = (type: Intl.DateTimeFormatPartTypes) =>
        parts.find(p => p.type === type)?.value ?? '00';

    return `${pick('year')}-${pick('month')}-${pick('day')}`;
};
