// server.ts
import { loadConfig } from './utils/config';
import logger from './utils/logger';
import dbLoader from './utils/dbLoader';
import { describeError } from './utils/errors';
import { registerShutdownHandler } from './utils/shutdownHandler';
import { createPipeline } from './services/pipelineService';
import { createApp } from './app';

const startServer = async () => {
    try {
        logger.info('🚀 Starting Server Initialization...');
        const config = loadConfig();

        // 1. Connect to Infrastructure (DB & Redis)
        await dbLoader.connect({
            mongoUri: config.store.driver === 'mongo' ? config.store.mongoUri : undefined,
            mongoPoolSize: config.store.mongoPoolSize,
            redisUrl: config.redisUrl,
        });

        // 2. Build services and the HTTP app
        const pipeline = createPipeline(config);
        const app = createApp({
            query: pipeline.query,
            orchestrator: pipeline.orchestrator,
            store: pipeline.store,
            settings: {
                corsOrigins: config.corsOrigins,
                trustProxyLevel: config.trustProxyLevel,
                adminSecret: config.adminSecret,
                rateLimit: config.rateLimit,
                redisConfigured: Boolean(config.redisUrl),
            },
        });

        // 3. Start HTTP Server
        const HOST = '0.0.0.0';
        const server = app.listen(config.port, HOST, () => {
            logger.info(`✅ Server running on http://${HOST}:${config.port}`);
        });

        // 4. Register Graceful Shutdown
        registerShutdownHandler('API Server', [
            () => new Promise<void>((resolve, reject) => {
                server.close((err) => {
                    if (err) reject(err);
                    else {
                        logger.info('Http server closed.');
                        resolve();
                    }
                });
            }),
        ]);

    } catch (err) {
        logger.error(`❌ Critical Startup Error: ${describeError(err)}`);
        process.exit(1);
    }
};

void startServer();
