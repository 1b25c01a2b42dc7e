// jobs/worker.ts
import { Worker, Job } from 'bullmq';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { describeError } from '../utils/errors';
import type { BullMQConnection } from '../utils/config';

let pipelineWorker: Worker | null = null;

/**
 * Consumes the daily trigger job. The handler owns the run and its failures;
 * the job itself only fails on unexpected errors.
 */
export const startWorker = (connection: BullMQConnection, handler: () => Promise<void>): Worker | null => {
    if (pipelineWorker) {
        logger.warn("⚠️ Worker already running.");
        return pipelineWorker;
    }

    try {
        pipelineWorker = new Worker(CONSTANTS.QUEUE.NAME, async (job: Job) => {
            switch (job.name) {
                case CONSTANTS.QUEUE.DAILY_JOB:
                    await handler();
                    return null;

                default:
                    logger.warn(`⚠️ Unknown Job Type: ${job.name}`);
                    return null;
            }
        }, {
            connection: { ...connection, maxRetriesPerRequest: null },
            concurrency: 1,
            // A full run (fetch + rewrites) can take several minutes
            lockDuration: 15 * 60 * 1000,
            maxStalledCount: 1,
        });

        // --- Event Listeners ---
        pipelineWorker.on('completed', (job: Job) => {
            logger.info(`✅ Job ${job.id} (${job.name}) completed.`);
        });

        pipelineWorker.on('failed', (job: Job | undefined, err: Error) => {
            logger.error(`🔥 Job ${job?.id ?? 'unknown'} (${job?.name}) failed: ${err.message}`);
        });

        pipelineWorker.on('error', (err: Error) => {
            logger.error(`⚠️ Worker Connection Error: ${err.message}`);
        });

        logger.info(`✅ Background Worker Started (Queue: ${CONSTANTS.QUEUE.NAME})`);
        return pipelineWorker;

    } catch (err) {
        logger.error(`❌ Failed to start Worker: ${describeError(err)}`);
        return null;
    }
};

export const shutdownWorker = async (): Promise<void> => {
    if (!pipelineWorker) return;

    logger.info('🛑 Shutting down Worker...');
    try {
        await pipelineWorker.close();
        logger.info('✅ Worker shutdown complete.');
    } catch (err) {
        logger.error(`⚠️ Error shutting down worker: ${describeError(err)}`);
    } finally {
        pipelineWorker = null;
    }
};
