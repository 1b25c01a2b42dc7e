// utils/CircuitBreaker.ts
import redisClient, { RedisFacade } from './redisClient';
import logger from './logger';
import { describeError } from './errors';

type BreakerStore = Pick<RedisFacade, 'isReady' | 'get' | 'set' | 'del' | 'incr' | 'expire'>;

export interface BreakerOptions {
    threshold: number;
    cooldownSeconds: number;
    failureWindowSeconds: number;
}

const DEFAULTS: BreakerOptions = {
    threshold: 5,
    cooldownSeconds: 600,
    failureWindowSeconds: 600,
};

/**
 * Circuit Breaker shared across processes through Redis.
 * Keeps a failing text-generation provider from being hammered.
 * Without Redis every request is allowed.
 */
export class CircuitBreaker {
    private readonly options: BreakerOptions;

    constructor(private readonly redis: BreakerStore = redisClient, options: Partial<BreakerOptions> = {}) {
        this.options = { ...DEFAULTS, ...options };
    }

    /** TRUE while the circuit is closed. */
    async allowsRequests(provider: string): Promise<boolean> {
        if (!this.redis.isReady()) return true;

        const tripped = await this.redis.get(`breaker:open:${provider}`);
        return !tripped;
    }

    /** Counts a failure; at the threshold the circuit opens for the cooldown. */
    async recordFailure(provider: string): Promise<void> {
        if (!this.redis.isReady()) return;

        const failKey = `breaker:fail:${provider}`;
        const { threshold, cooldownSeconds, failureWindowSeconds } = this.options;

        try {
            const count = await this.redis.incr(failKey);
            if (count === 1) await this.redis.expire(failKey, failureWindowSeconds);

            if (count >= threshold) {
                logger.error(`🔥 ${provider} is failing repeatedly (${count} times). Opening Circuit Breaker for ${cooldownSeconds}s.`);
                await this.redis.set(`breaker:open:${provider}`, '1', cooldownSeconds);
                await this.redis.del(failKey);
            }
        } catch (error) {
            logger.warn(`CircuitBreaker Error: ${describeError(error)}`);
        }
    }

    async recordSuccess(provider: string): Promise<void> {
        if (!this.redis.isReady()) return;
        await this.redis.del(`breaker:fail:${provider}`);
    }
}

export default new CircuitBreaker();
