import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import RunGuard from '../../jobs/runGuard';
import FileRunLock from '../../jobs/fileRunLock';
import { RunInProgressError } from '../../utils/errors';
import type { LockResult } from '../../utils/redisClient';

const lockClient = (ready: boolean, result: LockResult) => ({
    isReady: () => ready,
    acquireLock: vi.fn(async (_key: string, _owner: string, _ttl?: number): Promise<LockResult> => result),
    releaseLock: vi.fn(async (_key: string, _owner: string) => true),
});

// Owner-checked lock over a Map, with expiry driven by the test.
const sharedLock = () => {
    const owners = new Map<string, string>();
    return {
        owners,
        expire: (key: string) => { owners.delete(key); },
        client: {
            isReady: () => true,
            acquireLock: async (key: string, owner: string): Promise<LockResult> => {
                if (owners.has(key)) return 'held';
                owners.set(key, owner);
                return 'acquired';
            },
            releaseLock: async (key: string, owner: string) => {
                if (owners.get(key) !== owner) return false;
                owners.delete(key);
                return true;
            },
        },
    };
};

describe('RunGuard', () => {
    it('admits one run at a time in process', async () => {
        const guard = new RunGuard({ lockTtlSeconds: 60, redis: lockClient(false, 'unavailable') });

        await guard.acquire('run-1');
        await expect(guard.acquire('run-2')).rejects.toThrow('Pipeline run run-1 is already in progress');
        expect(guard.active).toBe('run-1');

        await guard.release();
        expect(guard.active).toBeNull();
        await guard.acquire('run-2');
        expect(guard.active).toBe('run-2');
    });

    it('takes and releases the shared lock when Redis is up', async () => {
        const redis = lockClient(true, 'acquired');
        const guard = new RunGuard({ lockTtlSeconds: 120, lockKey: 'test:lock', redis });

        await guard.acquire('run-1');
        await guard.release();

        expect(redis.acquireLock).toHaveBeenCalledWith('test:lock', 'run-1', 120);
        expect(redis.releaseLock).toHaveBeenCalledWith('test:lock', 'run-1');
    });

    it('rejects when another process holds the shared lock', async () => {
        const redis = lockClient(true, 'held');
        const guard = new RunGuard({ lockTtlSeconds: 60, redis });

        const attempt = guard.acquire('run-1');

        await expect(attempt).rejects.toBeInstanceOf(RunInProgressError);
        await expect(attempt).rejects.toMatchObject({ activeRunId: null });
        expect(guard.active).toBeNull();

        await guard.release();
        expect(redis.releaseLock).not.toHaveBeenCalled();
    });

    it('runs under the local locks when Redis errors', async () => {
        const redis = lockClient(true, 'unavailable');
        const guard = new RunGuard({ lockTtlSeconds: 60, redis });

        await guard.acquire('run-1');
        expect(guard.active).toBe('run-1');

        await guard.release();
        expect(redis.releaseLock).not.toHaveBeenCalled();
    });

    it('leaves a newer holder alone when its own lock expired mid-run', async () => {
        const lock = sharedLock();
        const first = new RunGuard({ lockTtlSeconds: 60, lockKey: 'test:lock', redis: lock.client });
        const second = new RunGuard({ lockTtlSeconds: 60, lockKey: 'test:lock', redis: lock.client });
        const third = new RunGuard({ lockTtlSeconds: 60, lockKey: 'test:lock', redis: lock.client });

        await first.acquire('run-a');
        lock.expire('test:lock');
        await second.acquire('run-b');

        await first.release();
        expect(lock.owners.get('test:lock')).toBe('run-b');

        await expect(third.acquire('run-c')).rejects.toBeInstanceOf(RunInProgressError);
        expect(third.active).toBeNull();
    });
});

describe('RunGuard with a host lock', () => {
    const dirs: string[] = [];

    afterEach(async () => {
        await Promise.all(dirs.splice(0).map(dir => fs.rm(dir, { recursive: true, force: true })));
    });

    it('keeps a second guard on the same storage directory out without Redis', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-guard-'));
        dirs.push(dir);
        const offline = lockClient(false, 'unavailable');
        const api = new RunGuard({ lockTtlSeconds: 60, redis: offline, hostLock: new FileRunLock({ directory: dir }) });
        const worker = new RunGuard({ lockTtlSeconds: 60, redis: offline, hostLock: new FileRunLock({ directory: dir }) });

        await api.acquire('run-1');

        const attempt = worker.acquire('run-2');
        await expect(attempt).rejects.toBeInstanceOf(RunInProgressError);
        await expect(attempt).rejects.toMatchObject({ activeRunId: null });
        expect(worker.active).toBeNull();

        await api.release();
        await worker.acquire('run-2');
        expect(worker.active).toBe('run-2');
        await worker.release();
    });
});
