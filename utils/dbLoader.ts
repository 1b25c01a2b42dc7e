// utils/dbLoader.ts
import mongoose from 'mongoose';
import logger from './logger';
import { initRedis, default as redisClient } from './redisClient';
import { describeError } from './errors';

export interface InfrastructureOptions {
    mongoUri?: string; // only the mongo store driver needs it
    mongoPoolSize: number;
    redisUrl?: string;
}

/**
 * Centralized Database Loader
 * Handles connections for MongoDB (when the mongo store is selected) and Redis.
 * Uses exponential backoff for MongoDB reconnection.
 */
class DbLoader {
    private isConnected: boolean = false;
    private mongoActive: boolean = false;
    private readonly MAX_RETRIES = 10;
    private readonly BASE_DELAY_MS = 1000;

    public async connect(options: InfrastructureOptions): Promise<void> {
        if (this.isConnected) {
            logger.info("ℹ️ Database connections already active.");
            return;
        }

        logger.info('🚀 Initializing Infrastructure...');

        const mongoPromise = options.mongoUri
            ? this.connectMongo(options.mongoUri, options.mongoPoolSize)
            : Promise.resolve();

        // Redis is optional. Errors here must not block MongoDB.
        const redisPromise = initRedis(options.redisUrl).catch((err: unknown) => {
            logger.warn(`⚠️ Redis Initialization failed: ${describeError(err)}. Running without shared locks.`);
            return null;
        });

        await Promise.all([mongoPromise, redisPromise]);

        this.isConnected = true;
        logger.info('✨ Infrastructure Ready');
    }

    private async connectMongo(uri: string, poolSize: number): Promise<void> {
        let retries = 0;

        while (retries < this.MAX_RETRIES) {
            try {
                // Clear previous listeners to avoid duplicates on reconnect
                mongoose.connection.removeAllListeners('error');
                mongoose.connection.removeAllListeners('disconnected');

                mongoose.connection.on('error', (err: Error) => logger.error(`🔥 MongoDB Error: ${err.message}`));
                mongoose.connection.on('disconnected', () => logger.warn('⚠️ MongoDB Disconnected'));

                await mongoose.connect(uri, {
                    maxPoolSize: poolSize,
                    minPoolSize: 2,
                    serverSelectionTimeoutMS: 5000,
                    socketTimeoutMS: 45000,
                });

                this.mongoActive = true;
                logger.info('✅ MongoDB Connected');
                return;

            } catch (err) {
                retries++;

                // Exponential Backoff: 2s, 4s, 8s, 16s... max 30s
                const delay = Math.min(this.BASE_DELAY_MS * Math.pow(2, retries), 30000);

                logger.error(`⚠️ MongoDB Connection Failed (Attempt ${retries}/${this.MAX_RETRIES}). Retrying in ${delay / 1000}s... Error: ${describeError(err)}`);

                if (retries >= this.MAX_RETRIES) {
                    logger.error(`❌ Critical Infrastructure Failure: Could not connect to MongoDB after ${this.MAX_RETRIES} attempts.`);
                    process.exit(1);
                }

                await new Promise(res => setTimeout(res, delay));
            }
        }
    }

    public async disconnect(): Promise<void> {
        if (!this.isConnected) return;

        try {
            logger.info('🛑 Closing Infrastructure connections...');
            await Promise.all([
                redisClient.disconnect(),
                this.mongoActive ? mongoose.disconnect() : Promise.resolve()
            ]);
            this.isConnected = false;
            this.mongoActive = false;
            logger.info('✅ Infrastructure closed gracefully.');
        } catch (err) {
            logger.error(`⚠️ Error during disconnect: ${describeError(err)}`);
        }
    }
}

export default new DbLoader();
