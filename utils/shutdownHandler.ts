// utils/shutdownHandler.ts
import logger from './logger';
import dbLoader from './dbLoader';
import { describeError } from './errors';

type CleanupTask = () => Promise<void> | void;

/**
 * Registers process signal handlers for graceful shutdown.
 * @param serverName Name of the process (e.g. 'API Server', 'Worker') for logging.
 * @param cleanupTasks Run in order before the database connections close.
 */
export const registerShutdownHandler = (serverName: string, cleanupTasks: CleanupTask[]) => {
    let shuttingDown = false;

    const gracefulShutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`🛑 ${serverName} received Kill Signal, shutting down gracefully...`);

        // Force exit if cleanup takes too long (10 seconds)
        const forceExit = setTimeout(() => {
            logger.error('🛑 Force Shutdown (Timeout)');
            process.exit(1);
        }, 10000);

        try {
            if (cleanupTasks.length > 0) {
                logger.info('⏳ Cleaning up resources...');
                for (const task of cleanupTasks) {
                    await task();
                }
            }

            // Always disconnect DB and Redis last
            await dbLoader.disconnect();

            clearTimeout(forceExit);
            logger.info(`✅ ${serverName} resources released. Exiting.`);
            process.exit(0);
        } catch (err) {
            logger.error(`⚠️ Error during shutdown: ${describeError(err)}`);
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void gracefulShutdown());
    process.on('SIGINT', () => void gracefulShutdown());
};
