// workerEntry.ts
import { loadConfig } from './utils/config';
import logger from './utils/logger';
import dbLoader from './utils/dbLoader';
import { describeError } from './utils/errors';
import { registerShutdownHandler } from './utils/shutdownHandler';
import { createPipeline } from './services/pipelineService';
import { createTicker, startScheduler } from './jobs/scheduler';

const RUN_NOW = process.argv.includes('--run-now');

const initWorkerService = async () => {
  logger.info('🛠️ Starting Background Worker...');
  const config = loadConfig();

  try {
    // 1. Unified Database & Redis Connection
    await dbLoader.connect({
      mongoUri: config.store.driver === 'mongo' ? config.store.mongoUri : undefined,
      mongoPoolSize: config.store.mongoPoolSize,
      redisUrl: config.redisUrl,
    });

    const { orchestrator } = createPipeline(config);

    // 2. One-shot mode: run once and exit
    if (RUN_NOW) {
      const summary = await orchestrator.runOnce('cli');
      await dbLoader.disconnect();
      process.exit(summary.outcome === 'completed' ? 0 : 1);
    }

    // 3. Daily trigger (BullMQ when Redis is configured, in-process timer otherwise)
    const ticker = await startScheduler(orchestrator, createTicker(config.schedule, config.bullMQConnection));
    registerShutdownHandler('Worker', [() => ticker.stop()]);

    // 4. Optional immediate run
    if (config.pipeline.runOnStartup) {
      void orchestrator.runOnce('startup')
        .catch((err: unknown) => logger.warn(`Startup run skipped: ${describeError(err)}`));
    }

    logger.info(`🚀 Background Worker Fully Operational (daily at ${config.schedule.hour}:${String(config.schedule.minute).padStart(2, '0')} ${config.schedule.timeZone})`);

  } catch (err) {
    logger.error(`❌ Worker Startup Failed: ${describeError(err)}`);
    process.exit(1);
  }
};

void initWorkerService();
