// jobs/queueManager.ts
import { Queue } from 'bullmq';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { describeError } from '../utils/errors';
import type { BullMQConnection } from '../utils/config';

// Registry to hold the pipeline queue
const queues: Record<string, Queue> = {};

const PIPELINE_QUEUE_NAME = CONSTANTS.QUEUE.NAME;

const queueManager = {
    /**
     * Initializes the queue. Safe to call more than once.
     */
    initialize: async (connection: BullMQConnection | undefined): Promise<boolean> => {
        if (queues[PIPELINE_QUEUE_NAME]) return true;

        if (!connection) {
            logger.warn("⚠️ REDIS_URL not set or invalid. Queue-based scheduling is disabled.");
            return false;
        }

        try {
            const queue = new Queue(PIPELINE_QUEUE_NAME, {
                connection,
                defaultJobOptions: {
                    removeOnComplete: 20,
                    removeOnFail: 50,
                    // A missed daily run is not replayed; the next day's run picks up the backlog.
                    attempts: 1,
                }
            });

            queue.on('error', (err: Error) => {
                if (!err.message.includes('ECONNREFUSED')) {
                    logger.error(`❌ Queue [${PIPELINE_QUEUE_NAME}] Connection Error: ${err.message}`);
                }
            });

            queues[PIPELINE_QUEUE_NAME] = queue;
            logger.info(`✅ Job Queue Initialized: [${PIPELINE_QUEUE_NAME}]`);
            return true;
        } catch (err) {
            logger.error(`❌ Failed to initialize Queue: ${describeError(err)}`);
            return false;
        }
    },

    /**
     * Replaces any repeatable job with the same name, then registers the new pattern.
     */
    scheduleRepeatableJob: async (name: string, cronPattern: string, tz: string, data: Record<string, unknown> = {}) => {
        const queue = queues[PIPELINE_QUEUE_NAME];
        if (!queue) return null;

        try {
            const repeatableJobs = await queue.getRepeatableJobs();
            for (const existing of repeatableJobs.filter(j => j.name === name)) {
                await queue.removeRepeatableByKey(existing.key);
            }

            const job = await queue.add(name, data, {
                repeat: { pattern: cronPattern, tz }
            });

            logger.info(`⏰ Job Scheduled: ${name} (${cronPattern} ${tz})`);
            return job;
        } catch (err) {
            logger.error(`❌ Failed to schedule job ${name}: ${describeError(err)}`);
            return null;
        }
    },

    shutdown: async (): Promise<void> => {
        logger.info('🛑 Shutting down Job Queues...');
        const pending = Object.entries(queues).map(async ([name, queue]) => {
            try {
                await queue.close();
            } catch (err) {
                logger.warn(`⚠️ Error closing queue: ${describeError(err)}`);
            } finally {
                delete queues[name];
            }
        });

        await Promise.all(pending);
        logger.info('✅ All Job Queues closed.');
    }
};

export default queueManager;
