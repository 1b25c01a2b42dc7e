import { describe, it, expect } from 'vitest';
import { CircuitBreaker } from '../../utils/CircuitBreaker';

const memoryRedis = (ready = true) => {
    const values = new Map<string, unknown>();
    return {
        values,
        isReady: () => ready,
        get: async (key: string) => values.get(key) ?? null,
        set: async (key: string, data: unknown, _ttl?: number) => { values.set(key, data); },
        del: async (key: string) => { values.delete(key); },
        incr: async (key: string) => {
            const next = Number(values.get(key) ?? 0) + 1;
            values.set(key, next);
            return next;
        },
        expire: async (_key: string, _seconds: number) => true,
    };
};

describe('CircuitBreaker', () => {
    it('allows requests until the failure threshold is reached', async () => {
        const redis = memoryRedis();
        const breaker = new CircuitBreaker(redis, { threshold: 3 });

        await breaker.recordFailure('GEMINI');
        await breaker.recordFailure('GEMINI');
        expect(await breaker.allowsRequests('GEMINI')).toBe(true);

        await breaker.recordFailure('GEMINI');
        expect(await breaker.allowsRequests('GEMINI')).toBe(false);
        expect(redis.values.has('breaker:fail:GEMINI')).toBe(false);
    });

    it('resets the failure count on success', async () => {
        const redis = memoryRedis();
        const breaker = new CircuitBreaker(redis, { threshold: 2 });

        await breaker.recordFailure('GEMINI');
        await breaker.recordSuccess('GEMINI');
        await breaker.recordFailure('GEMINI');

        expect(await breaker.allowsRequests('GEMINI')).toBe(true);
    });

    it('allows every request without Redis', async () => {
        const breaker = new CircuitBreaker(memoryRedis(false), { threshold: 1 });

        await breaker.recordFailure('GEMINI');

        expect(await breaker.allowsRequests('GEMINI')).toBe(true);
    });
});
