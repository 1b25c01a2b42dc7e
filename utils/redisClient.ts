// utils/redisClient.ts
import { createClient } from 'redis';
import logger from './logger';
import { describeError } from './errors';

type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;
let connectionPromise: Promise<RedisClient | null> | null = null;
let isHealthy = false;

export type LockResult = 'acquired' | 'held' | 'unavailable';

const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
end
return 0
`;

/**
 * Initialize Redis Connection.
 * Without a URL every operation below degrades to a no-op.
 */
export const initRedis = async (url?: string): Promise<RedisClient | null> => {
    if (client && (client.isOpen || client.isReady)) {
        return client;
    }

    if (connectionPromise) {
        return connectionPromise;
    }

    connectionPromise = (async () => {
        if (!url) {
            logger.warn("⚠️ REDIS_URL not set. Run locks, circuit breaker and shared rate limits are disabled.");
            return null;
        }

        try {
            const newClient = createClient({
                url,
                socket: {
                    reconnectStrategy: (retries: number) => {
                        if (retries > 20) {
                            logger.error("❌ Redis: Max Retries Reached. Waiting 5s...");
                            return 5000;
                        }
                        return Math.min(retries * 100, 3000);
                    },
                    connectTimeout: 15000,
                    keepAlive: 15000
                }
            });

            newClient.on('error', (err: Error) => {
                isHealthy = false;
                if (!err.message.includes('ECONNREFUSED') && !err.message.includes('Socket closed')) {
                    logger.warn(`Redis Client Warning: ${err.message}`);
                }
            });

            newClient.on('ready', () => {
                if (!isHealthy) logger.info('✅ Redis Client Ready & Connected');
                isHealthy = true;
            });

            newClient.on('end', () => {
                isHealthy = false;
                logger.warn('Redis Client Disconnected');
            });

            await newClient.connect();
            client = newClient;
            return client;

        } catch (err) {
            logger.error(`❌ Redis Initialization Failed: ${describeError(err)}`);
            client = null;
            isHealthy = false;
            return null;
        } finally {
            connectionPromise = null;
        }
    })();

    return connectionPromise;
};

const redisClient = {
    // --- BASIC OPS ---

    get: async (key: string): Promise<unknown> => {
        if (!client || !isHealthy) return null;
        try {
            const data = await client.get(key);
            if (!data) return null;
            try { return JSON.parse(data); } catch { return data; }
        } catch (e) {
            logger.warn(`Redis Get Error: ${describeError(e)}`);
            return null;
        }
    },

    set: async (key: string, data: unknown, ttlSeconds: number = 900): Promise<void> => {
        if (!client || !isHealthy) return;
        try {
            const value = typeof data === 'string' ? data : JSON.stringify(data);
            await client.set(key, value, { EX: ttlSeconds });
        } catch (e) {
            logger.warn(`Redis Set Error: ${describeError(e)}`);
        }
    },

    del: async (key: string): Promise<void> => {
        if (!client || !isHealthy) return;
        try { await client.del(key); } catch (e) { logger.warn(`Redis Del Error: ${describeError(e)}`); }
    },

    incr: async (key: string): Promise<number> => {
        if (!client || !isHealthy) return 0;
        try { return await client.incr(key); } catch (e) {
            logger.warn(`Redis Incr Error: ${describeError(e)}`);
            return 0;
        }
    },

    expire: async (key: string, seconds: number): Promise<boolean> => {
        if (!client || !isHealthy) return false;
        try { return await client.expire(key, seconds); } catch (e) {
            logger.warn(`Redis Expire Error: ${describeError(e)}`);
            return false;
        }
    },

    // --- LOCKING (Runs) ---

    acquireLock: async (key: string, owner: string, ttlSeconds: number = 60): Promise<LockResult> => {
        if (!client || !isHealthy) return 'unavailable';
        try {
            const result = await client.set(key, owner, {
                NX: true,
                EX: ttlSeconds
            });
            return result === 'OK' ? 'acquired' : 'held';
        } catch (e) {
            logger.warn(`Redis Lock Error: ${describeError(e)}`);
            return 'unavailable';
        }
    },

    // Deletes the lock only while `owner` still holds it; FALSE when it expired or changed hands.
    releaseLock: async (key: string, owner: string): Promise<boolean> => {
        if (!client || !isHealthy) return false;
        try {
            const removed = await client.eval(RELEASE_LOCK_SCRIPT, { keys: [key], arguments: [owner] });
            return removed === 1;
        } catch (e) {
            logger.warn(`Redis Unlock Error: ${describeError(e)}`);
            return false;
        }
    },

    disconnect: async (): Promise<void> => {
        if (client) {
            try {
                if (client.isOpen) await client.quit();
                logger.info('✅ Redis Connection Closed');
            } catch (e) {
                logger.error(`Error closing Redis connection: ${describeError(e)}`);
            } finally {
                client = null;
                isHealthy = false;
            }
        }
    },

    getClient: () => client,
    isReady: () => isHealthy,
};

export type RedisFacade = typeof redisClient;

export default redisClient;
