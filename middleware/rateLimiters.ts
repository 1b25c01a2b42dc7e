// middleware/rateLimiters.ts
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { RedisStore } from 'rate-limit-redis';
import { Request, Response, NextFunction } from 'express';
import redisClient from '../utils/redisClient';
import logger from '../utils/logger';
import { describeError } from '../utils/errors';

type ReplyValue = boolean | number | string;
type Reply = ReplyValue | ReplyValue[];

const isReplyValue = (value: unknown): value is ReplyValue =>
    typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';

const isReply = (value: unknown): value is Reply =>
    isReplyValue(value) || (Array.isArray(value) && value.every(isReplyValue));

export interface RateLimitOptions {
    windowMs: number;
    max: number;
}

const keyGenerator = (req: Request): string => req.ip || 'unknown-ip';

const LIMIT_MESSAGE = {
    status: 'fail',
    message: 'Too many requests, please try again later.'
};

// --- 1. Memory Limiter (Backup) ---
const createMemoryLimiter = ({ windowMs, max }: RateLimitOptions) => rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    message: LIMIT_MESSAGE,
    skipFailedRequests: true,
});

// --- 2. Redis Limiter (Primary) ---
const createRedisLimiter = ({ windowMs, max }: RateLimitOptions): RateLimitRequestHandler | null => {
    try {
        const store = new RedisStore({
            prefix: 'limiter:',
            sendCommand: async (...args: string[]): Promise<Reply> => {
                const client = redisClient.getClient();
                if (!client || !client.isOpen) throw new Error('Redis not connected');

                const reply: unknown = await client.sendCommand(args);
                if (!isReply(reply)) throw new Error('Unexpected Redis reply');
                return reply;
            },
        });

        return rateLimit({
            windowMs,
            limit: max,
            standardHeaders: true,
            legacyHeaders: false,
            keyGenerator,
            store,
            // Redis hiccups must not lock readers out
            passOnStoreError: true,
            message: LIMIT_MESSAGE,
            skipFailedRequests: true,
            handler: (req: Request, res: Response, _next: NextFunction, options) => {
                logger.warn(`Rate Limit Exceeded: ${keyGenerator(req)}`);
                res.status(options.statusCode).send(options.message);
            },
        });
    } catch (e) {
        logger.warn(`Failed to create Redis limiter: ${describeError(e)}`);
        return null;
    }
};

/**
 * API limiter that checks Redis health per request: shared Redis counters when
 * connected, process-local counters otherwise.
 */
export const createApiLimiter = (options: RateLimitOptions) => {
    const memoryLimiter = createMemoryLimiter(options);
    let redisLimiter: RateLimitRequestHandler | null = null;

    return (req: Request, res: Response, next: NextFunction) => {
        if (redisClient.isReady()) {
            if (!redisLimiter) redisLimiter = createRedisLimiter(options);
            if (redisLimiter) return redisLimiter(req, res, next);
        }
        return memoryLimiter(req, res, next);
    };
};
