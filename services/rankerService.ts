// services/rankerService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import type { ICandidate, IScoredCandidate } from '../types';

const { FRESHNESS_MAX, COMMENT_WEIGHT, SHARE_WEIGHT, JITTER_MAX } = CONSTANTS.RANKING;

export interface RankerOptions {
    articlesPerRun: number;   // N
    maxPerSource: number;     // K
    freshnessHorizonHours: number;
    random?: () => number;    // uniform [0, 1); seed it for reproducible runs
}

/**
 * Linear decay from FRESHNESS_MAX at age 0 to 0 at the horizon.
 * Negative ages (clock skew, future-dated entries) count as brand new.
 */
export const freshness = (ageHours: number, horizonHours: number): number => {
    const age = Math.max(0, ageHours);
    return Math.max(0, FRESHNESS_MAX * (1 - age / horizonHours));
};

const round2 = (n: number) => Math.round(n * 100) / 100;

class RankerService {
    private readonly random: () => number;

    constructor(private readonly options: RankerOptions) {
        this.random = options.random ?? Math.random;
    }

    public score(candidate: ICandidate): IScoredCandidate {
        const jitter = this.random() * JITTER_MAX;
        const popularityScore = round2(
            freshness(candidate.ageHours, this.options.freshnessHorizonHours) +
            COMMENT_WEIGHT * Math.max(0, candidate.commentCount) +
            SHARE_WEIGHT * Math.max(0, candidate.socialShares) +
            jitter
        );
        return { ...candidate, popularityScore, jitter };
    }

    /**
     * Scores, orders and picks at most N candidates with at most K per source.
     * Duplicate ids keep their first occurrence.
     */
    public rank(candidates: readonly ICandidate[]): IScoredCandidate[] {
        const { articlesPerRun, maxPerSource } = this.options;

        // 1. Dedupe
        const seen = new Set<string>();
        const unique: ICandidate[] = [];
        for (const candidate of candidates) {
            if (seen.has(candidate.id)) continue;
            seen.add(candidate.id);
            unique.push(candidate);
        }

        // 2. Score & Sort (ties broken by id so the order is total)
        const scored = unique.map(c => this.score(c));
        scored.sort((a, b) =>
            b.popularityScore - a.popularityScore || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
        );

        // 3. Greedy selection with the diversity cap
        const selected: IScoredCandidate[] = [];
        const perSource = new Map<string, number>();

        for (const item of scored) {
            if (selected.length >= articlesPerRun) break;
            const count = perSource.get(item.sourceName) ?? 0;
            if (count >= maxPerSource) continue;
            selected.push(item);
            perSource.set(item.sourceName, count + 1);
        }

        logger.info(`🏆 Selected ${selected.length} of ${unique.length} candidates`);
        selected.forEach((a, i) =>
            logger.debug(`   ${i + 1}. [${a.sourceName}] ${a.originalTitle.slice(0, 70)} (score=${a.popularityScore})`)
        );

        return selected;
    }
}

export default RankerService;
