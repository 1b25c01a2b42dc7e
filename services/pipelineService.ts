// services/pipelineService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { createCollectionStore } from './store';
import { loadSources } from './feeds/sourceRegistry';
import { RssFeedAdapter } from './feeds/RssFeedAdapter';
import PageEnricher from './feeds/pageEnricher';
import { GeminiTextGenerator } from './ai/GeminiTextGenerator';
import RankerService from './rankerService';
import RewriteService from './rewriteService';
import QueryService from './queryService';
import PipelineOrchestrator from '../jobs/pipelineOrchestrator';
import RunGuard from '../jobs/runGuard';
import FileRunLock from '../jobs/fileRunLock';
import type { AppConfig } from '../utils/config';
import type { ICollectionStore } from './store/ICollectionStore';
import type { IFeedSource } from '../types';

export interface Pipeline {
    sources: IFeedSource[];
    store: ICollectionStore;
    orchestrator: PipelineOrchestrator;
    query: QueryService;
}

/**
 * Composition root: builds every service from validated configuration.
 * Nothing below this point reads the environment.
 */
export const createPipeline = (config: AppConfig): Pipeline => {
    const sources = loadSources(config.feeds.sourcesFile);

    const store = createCollectionStore({
        driver: config.store.driver,
        storageDir: config.store.storageDir,
        publishedRetention: config.store.publishedRetention,
    });

    const feedAdapter = new RssFeedAdapter({
        timeoutMs: config.feeds.timeoutMs,
        maxEntriesPerSource: config.feeds.maxEntriesPerSource,
        pageFetchDelayMs: config.feeds.pageFetchDelayMs,
        enrichTimeoutMs: config.feeds.enrichTimeoutMs,
        enricher: new PageEnricher({ timeoutMs: Math.min(config.feeds.timeoutMs, 10000) }),
    });

    const ranker = new RankerService({
        articlesPerRun: config.ranking.articlesPerRun,
        maxPerSource: config.ranking.maxPerSource,
        freshnessHorizonHours: config.ranking.freshnessHorizonHours,
    });

    const rewriter = new RewriteService({
        generator: new GeminiTextGenerator({
            apiKey: config.ai.apiKey,
            model: config.ai.model,
            timeoutMs: config.ai.timeoutMs,
        }),
        maxRetries: config.ai.maxRetries,
        baseDelayMs: config.ai.retryBaseDelayMs,
    });

    const orchestrator = new PipelineOrchestrator({
        sources,
        feedAdapter,
        ranker,
        rewriter,
        store,
        guard: new RunGuard({
            lockTtlSeconds: config.pipeline.runLockTtlSeconds,
            lockKey: CONSTANTS.REDIS_KEYS.RUN_LOCK,
            hostLock: new FileRunLock({ directory: config.store.storageDir }),
        }),
        options: {
            fetchConcurrency: config.feeds.concurrency,
            sourceTimeoutMs: config.feeds.timeoutMs + config.feeds.enrichTimeoutMs + 5000,
            rewriteConcurrency: config.ai.concurrency,
            minArticles: config.ranking.minArticles,
            retryFailedRewrites: config.pipeline.retryFailedRewrites,
            retryMaxAgeHours: config.ranking.freshnessHorizonHours,
            workingRetentionHours: config.store.workingRetentionHours,
            archivePublished: config.store.archivePublished,
        },
    });

    const query = new QueryService({ store, timeZone: config.query.timeZone });

    logger.info(`🧩 Pipeline ready: ${sources.length} sources, store=${store.name}, model=${config.ai.model}`);
    return { sources, store, orchestrator, query };
};
