// jobs/pipelineOrchestrator.ts
import crypto from 'crypto';
import logger from '../utils/logger';
import redisClient, { RedisFacade } from '../utils/redisClient';
import { CONSTANTS } from '../utils/constants';
import { calendarDate, hoursSince, mapInBatches, withTimeout } from '../utils/helpers';
import { RewriteFailedError, describeError } from '../utils/errors';
import { RunSummarySchema } from '../utils/validationSchemas';
import type RankerService from '../services/rankerService';
import type RewriteService from '../services/rewriteService';
import type { RewriteOutcome } from '../services/rewriteService';
import type { IFeedAdapter } from '../services/feeds/IFeedAdapter';
import type { ICollectionStore } from '../services/store/ICollectionStore';
import type RunGuard from './runGuard';
import type {
    IArticle,
    ICandidate,
    IFeedSource,
    IRunSummary,
    IScoredCandidate,
    ISourceFailure,
    PipelinePhase,
    RunTrigger,
} from '../types';

export interface OrchestratorOptions {
    fetchConcurrency: number;
    // Backstop per source; the adapter bounds the feed request and page enrichment itself
    sourceTimeoutMs: number;
    rewriteConcurrency: number;
    minArticles: number;
    retryFailedRewrites: boolean;
    // Failed rewrites older than this are no longer retried
    retryMaxAgeHours: number;
    // raw/rewritten records older than this are pruned unless still published
    workingRetentionHours: number;
    archivePublished: boolean;
}

export interface OrchestratorDeps {
    sources: readonly IFeedSource[];
    feedAdapter: IFeedAdapter;
    ranker: RankerService;
    rewriter: RewriteService;
    store: ICollectionStore;
    guard: RunGuard;
    options: OrchestratorOptions;
    redis?: Pick<RedisFacade, 'get' | 'set'>;
    clock?: () => Date;
    newRunId?: () => string;
}

export interface TriggeredRun {
    runId: string;
    completion: Promise<IRunSummary>;
}

export interface PipelineStatus {
    state: PipelinePhase;
    active: boolean;
    activeRunId: string | null;
    lastRun: IRunSummary | null;
    history: IRunSummary[];
}

const SUMMARY_TTL_SECONDS = 7 * 24 * 60 * 60;

// Only candidate fields survive into the pool; rewrite output and failure notes do not.
const candidateFields = (c: ICandidate): ICandidate => ({
    id: c.id,
    sourceName: c.sourceName,
    sourceLogo: c.sourceLogo,
    url: c.url,
    imageUrl: c.imageUrl,
    originalTitle: c.originalTitle,
    originalDescription: c.originalDescription,
    publishedAt: c.publishedAt,
    category: c.category,
    tags: c.tags,
    ageHours: c.ageHours,
    commentCount: c.commentCount,
    socialShares: c.socialShares,
});

const toCandidate = (article: IArticle, now: Date): ICandidate => ({
    ...candidateFields(article),
    ageHours: hoursSince(article.publishedAt, now),
});

const toRawArticle = (scored: IScoredCandidate): IArticle => ({
    ...candidateFields(scored),
    popularityScore: scored.popularityScore,
    badge: 'aggregated',
    status: 'raw',
});

/**
 * Runs the pipeline end to end: fetch → rank → rewrite → publish.
 * Per-source and per-article failures are tallied; store failures fail the run.
 */
class PipelineOrchestrator {
    private phase: PipelinePhase = 'idle';
    private history: IRunSummary[] = [];
    private readonly clock: () => Date;
    private readonly newRunId: () => string;
    private readonly redis: Pick<RedisFacade, 'get' | 'set'>;

    constructor(private readonly deps: OrchestratorDeps) {
        this.clock = deps.clock ?? (() => new Date());
        this.newRunId = deps.newRunId ?? (() => crypto.randomUUID());
        this.redis = deps.redis ?? redisClient;
    }

    /**
     * Starts a run and returns as soon as the guard is held.
     * Rejects with RunInProgressError when a run is already active.
     */
    async trigger(trigger: RunTrigger): Promise<TriggeredRun> {
        const runId = this.newRunId();
        await this.deps.guard.acquire(runId);

        logger.info(`▶️ Pipeline run ${runId} started (trigger: ${trigger})`);
        const completion = this.execute(runId, trigger).finally(() => this.deps.guard.release());
        return { runId, completion };
    }

    /** Trigger and wait for the summary. */
    async runOnce(trigger: RunTrigger): Promise<IRunSummary> {
        const { completion } = await this.trigger(trigger);
        return completion;
    }

    async getStatus(): Promise<PipelineStatus> {
        let lastRun = this.history[0] ?? null;

        // Runs started by the other process only reach us through Redis
        const mirrored = RunSummarySchema.safeParse(await this.redis.get(CONSTANTS.REDIS_KEYS.LAST_RUN));
        if (mirrored.success && (!lastRun || mirrored.data.startedAt > lastRun.startedAt)) {
            lastRun = mirrored.data;
        }

        return {
            state: this.phase,
            active: this.deps.guard.active !== null,
            activeRunId: this.deps.guard.active,
            lastRun,
            history: [...this.history],
        };
    }

    private async execute(runId: string, trigger: RunTrigger): Promise<IRunSummary> {
        const { store, options } = this.deps;
        const started = this.clock();

        const fetchedPerSource: Record<string, number> = {};
        const sourceFailures: ISourceFailure[] = [];
        let candidates = 0;
        let selected = 0;
        let rewritten = 0;
        let rewriteFailed = 0;
        let published = 0;
        let error: string | undefined;

        try {
            // 0. Snapshot what is live before this run changes it
            if (options.archivePublished) await this.archive(started);

            // 1. Fetch
            this.phase = 'fetching';
            const pool = await this.fetchAll(started, fetchedPerSource, sourceFailures);

            // 2. Build the candidate pool
            const [rawExisting, rewrittenExisting] = await Promise.all([
                store.read('raw'),
                store.read('rewritten'),
            ]);
            const done = new Set(rewrittenExisting.map(a => a.id));
            const fresh = pool.filter(c => !done.has(c.id));
            const freshIds = new Set(fresh.map(c => c.id));

            const carried = options.retryFailedRewrites
                ? rawExisting
                    .filter(a => a.status === 'rewrite_failed' && !done.has(a.id) && !freshIds.has(a.id))
                    .filter(a => hoursSince(a.publishedAt, started) <= options.retryMaxAgeHours)
                    .map(a => toCandidate(a, started))
                : [];
            if (carried.length > 0) {
                logger.info(`↩️ Retrying ${carried.length} previously failed rewrite(s)`);
            }

            const pooled = [...fresh, ...carried];
            candidates = pooled.length;

            // 3. Rank
            this.phase = 'ranking';
            const ranked = this.deps.ranker.rank(pooled);
            selected = ranked.length;
            if (selected < options.minArticles) {
                logger.warn(`⚠️ Only ${selected} article(s) selected (minimum ${options.minArticles}). Continuing.`);
            }

            const rawRecords = ranked.map(toRawArticle);
            await store.merge('raw', rawRecords);

            // 4. Rewrite
            this.phase = 'rewriting';
            const outcomes = await mapInBatches(rawRecords, options.rewriteConcurrency, article => this.rewriteSafely(article));

            const successes: IArticle[] = [];
            const failures: IArticle[] = [];
            for (const outcome of outcomes) {
                if (outcome.ok) successes.push(outcome.article);
                else failures.push(outcome.article);
            }
            rewritten = successes.length;
            rewriteFailed = failures.length;

            await store.merge('raw', failures);
            await store.merge('rewritten', successes);

            // 5. Publish (single atomic batch, last)
            this.phase = 'publishing';
            const promoted = await store.promote(successes.map(a => a.id), this.clock().toISOString());
            published = promoted.length;

            // 6. Housekeeping
            await this.pruneWorkingSet(started);

        } catch (err) {
            error = describeError(err);
            published = 0;
            logger.error(`❌ Pipeline run ${runId} aborted: ${error}`);
        } finally {
            this.phase = 'done';
        }

        const finished = this.clock();
        const summary: IRunSummary = {
            runId,
            trigger,
            startedAt: started.toISOString(),
            finishedAt: finished.toISOString(),
            durationMs: finished.getTime() - started.getTime(),
            outcome: error === undefined ? 'completed' : 'failed',
            fetchedPerSource,
            sourceFailures,
            candidates,
            selected,
            rewritten,
            rewriteFailed,
            published,
            ...(error === undefined ? {} : { error }),
        };

        await this.record(summary);
        return summary;
    }

    private async fetchAll(
        now: Date,
        fetchedPerSource: Record<string, number>,
        sourceFailures: ISourceFailure[]
    ): Promise<ICandidate[]> {
        const { sources, feedAdapter, options } = this.deps;

        const results = await mapInBatches(sources, options.fetchConcurrency, async (source) => {
            try {
                return await withTimeout(
                    feedAdapter.fetchCandidates(source, now),
                    options.sourceTimeoutMs,
                    `Feed ${source.name}`
                );
            } catch (err) {
                const reason = describeError(err);
                logger.warn(`⚠️ ${source.name} skipped: ${reason}`);
                sourceFailures.push({ source: source.name, reason });
                return [];
            }
        });

        sources.forEach((source, i) => { fetchedPerSource[source.name] = results[i].length; });
        return results.flat();
    }

    private async rewriteSafely(article: IArticle): Promise<RewriteOutcome> {
        try {
            return await this.deps.rewriter.rewrite(article);
        } catch (err) {
            const reason = describeError(err);
            return {
                ok: false,
                error: new RewriteFailedError(article.id, reason, 1),
                article: { ...article, status: 'rewrite_failed', failureReason: reason },
            };
        }
    }

    // Dated copy of `published` (UTC day); a failed snapshot never blocks the run.
    private async archive(now: Date): Promise<void> {
        try {
            await this.deps.store.archivePublished(calendarDate(now, 'UTC'));
        } catch (err) {
            logger.warn(`📦 Archive skipped: ${describeError(err)}`);
        }
    }

    /**
     * Drops raw/rewritten records past the retention window unless they are
     * still published. Rewritten goes first so raw never loses a referenced id.
     */
    private async pruneWorkingSet(now: Date): Promise<void> {
        const { store, options } = this.deps;
        try {
            const [raw, rewritten, published] = await Promise.all([
                store.read('raw'),
                store.read('rewritten'),
                store.read('published'),
            ]);
            const live = new Set(published.map(a => a.id));
            const expired = (a: IArticle) => !live.has(a.id) && hoursSince(a.publishedAt, now) > options.workingRetentionHours;

            const staleRewritten = rewritten.filter(expired).map(a => a.id);
            const keptRewritten = new Set(rewritten.filter(a => !expired(a)).map(a => a.id));
            const staleRaw = raw.filter(a => expired(a) && !keptRewritten.has(a.id)).map(a => a.id);

            if (staleRewritten.length === 0 && staleRaw.length === 0) return;

            if (staleRewritten.length > 0) await store.remove('rewritten', staleRewritten);
            if (staleRaw.length > 0) await store.remove('raw', staleRaw);
            logger.info(`🧹 Pruned ${staleRaw.length} raw and ${staleRewritten.length} rewritten record(s) older than ${options.workingRetentionHours}h`);
        } catch (err) {
            logger.warn(`🧹 Pruning skipped: ${describeError(err)}`);
        }
    }

    private async record(summary: IRunSummary): Promise<void> {
        this.history = [summary, ...this.history].slice(0, CONSTANTS.RUNS.HISTORY_SIZE);
        await this.redis.set(CONSTANTS.REDIS_KEYS.LAST_RUN, summary, SUMMARY_TTL_SECONDS);

        const line = `published=${summary.published} rewritten=${summary.rewritten} failed=${summary.rewriteFailed} ` +
            `selected=${summary.selected} candidates=${summary.candidates} sourceFailures=${summary.sourceFailures.length}`;

        if (summary.outcome === 'completed') {
            logger.info(`✅ Pipeline run ${summary.runId} completed in ${summary.durationMs}ms (${line})`);
        } else {
            logger.error(`❌ Pipeline run ${summary.runId} failed after ${summary.durationMs}ms (${line})`);
        }
    }
}

export default PipelineOrchestrator;
