import { afterEach, describe, it, expect, vi } from 'vitest';
import {
    QueueTicker,
    TimerTicker,
    createTicker,
    msUntilNextRun,
    startScheduler,
    toCronPattern,
} from '../../jobs/scheduler';
import { RunInProgressError } from '../../utils/errors';
import type { Ticker } from '../../jobs/scheduler';

const bull = vi.hoisted(() => ({
    removed: [] as string[],
    added: [] as Array<{ name: string; data: unknown; opts: unknown }>,
    processors: [] as Array<(job: { id: string; name: string }) => Promise<unknown>>,
}));

vi.mock('bullmq', () => ({
    Queue: class {
        on() { return this; }
        async getRepeatableJobs() { return [{ name: 'daily-pipeline-run', key: 'stale-key' }]; }
        async removeRepeatableByKey(key: string) { bull.removed.push(key); return true; }
        async add(name: string, data: unknown, opts: unknown) { bull.added.push({ name, data, opts }); return { id: '1' }; }
        async close() { return undefined; }
    },
    Worker: class {
        constructor(_name: string, processor: (job: { id: string; name: string }) => Promise<unknown>) {
            bull.processors.push(processor);
        }
        on() { return this; }
        async close() { return undefined; }
    },
}));

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

afterEach(() => {
    vi.useRealTimers();
});

describe('msUntilNextRun', () => {
    const seven = { hour: 7, minute: 0, timeZone: 'UTC' };

    it('waits until the next wall-clock time today', () => {
        expect(msUntilNextRun(seven, new Date('2026-03-01T06:30:00.000Z'))).toBe(30 * MINUTE);
    });

    it('rolls over to tomorrow once the time has passed', () => {
        expect(msUntilNextRun(seven, new Date('2026-03-01T08:00:00.000Z'))).toBe(23 * HOUR);
        expect(msUntilNextRun(seven, new Date('2026-03-01T07:00:00.000Z'))).toBe(24 * HOUR);
    });

    it('reads the wall clock in the schedule zone', () => {
        // 21:00Z is 06:00 in Tokyo
        const tokyo = { hour: 7, minute: 0, timeZone: 'Asia/Tokyo' };
        expect(msUntilNextRun(tokyo, new Date('2026-03-01T21:00:00.000Z'))).toBe(HOUR);
    });
});

describe('toCronPattern', () => {
    it('builds a daily pattern', () => {
        expect(toCronPattern({ hour: 7, minute: 5, timeZone: 'UTC' })).toBe('5 7 * * *');
    });
});

describe('TimerTicker', () => {
    it('fires daily at the scheduled time until stopped', async () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-03-01T06:30:00.000Z'));
        const handler = vi.fn(async () => undefined);
        const ticker = new TimerTicker({ hour: 7, minute: 0, timeZone: 'UTC' });

        await ticker.start(handler);

        await vi.advanceTimersByTimeAsync(29 * MINUTE);
        expect(handler).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(MINUTE);
        expect(handler).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(24 * HOUR);
        expect(handler).toHaveBeenCalledTimes(2);

        await ticker.stop();
        await vi.advanceTimersByTimeAsync(48 * HOUR);
        expect(handler).toHaveBeenCalledTimes(2);
    });

    it('keeps firing after a handler failure', async () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-03-01T06:59:00.000Z'));
        const handler = vi.fn(async () => { throw new Error('boom'); });
        const ticker = new TimerTicker({ hour: 7, minute: 0, timeZone: 'UTC' });

        await ticker.start(handler);
        await vi.advanceTimersByTimeAsync(MINUTE + 24 * HOUR);
        await ticker.stop();

        expect(handler).toHaveBeenCalledTimes(2);
    });
});

describe('QueueTicker', () => {
    it('replaces the repeatable job and runs the handler for daily jobs', async () => {
        const ticker = new QueueTicker({ hour: 7, minute: 30, timeZone: 'Europe/Paris' }, { host: 'localhost', port: 6379 });
        const handler = vi.fn(async () => undefined);

        await ticker.start(handler);

        expect(bull.removed).toEqual(['stale-key']);
        expect(bull.added).toEqual([{
            name: 'daily-pipeline-run',
            data: { trigger: 'scheduled' },
            opts: { repeat: { pattern: '30 7 * * *', tz: 'Europe/Paris' } },
        }]);

        await bull.processors[0]({ id: '1', name: 'daily-pipeline-run' });
        await bull.processors[0]({ id: '2', name: 'something-else' });
        expect(handler).toHaveBeenCalledTimes(1);

        await ticker.stop();
    });
});

describe('createTicker', () => {
    const schedule = { hour: 7, minute: 0, timeZone: 'UTC' };

    it('uses the queue only when a connection is configured', () => {
        expect(createTicker(schedule, undefined)).toBeInstanceOf(TimerTicker);
        expect(createTicker(schedule, { host: 'localhost', port: 6379 })).toBeInstanceOf(QueueTicker);
    });
});

describe('startScheduler', () => {
    const capture = () => {
        let fire: () => Promise<void> = async () => undefined;
        const ticker: Ticker = {
            name: 'manual',
            start: async (handler) => { fire = handler; },
            stop: async () => undefined,
        };
        return { ticker, fire: () => fire() };
    };

    it('runs the pipeline with the scheduled trigger', async () => {
        const { ticker, fire } = capture();
        const runOnce = vi.fn(async () => { throw new RunInProgressError('run-7'); });

        await startScheduler({ runOnce }, ticker);

        await expect(fire()).resolves.toBeUndefined();
        expect(runOnce).toHaveBeenCalledWith('scheduled');
    });

    it('propagates unexpected failures to the ticker', async () => {
        const { ticker, fire } = capture();
        await startScheduler({ runOnce: async () => { throw new Error('unexpected'); } }, ticker);

        await expect(fire()).rejects.toThrow('unexpected');
    });
});
