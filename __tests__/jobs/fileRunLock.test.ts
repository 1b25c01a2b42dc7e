import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import FileRunLock from '../../jobs/fileRunLock';

describe('FileRunLock', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-lock-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('grants the lock to one holder at a time', async () => {
        const first = new FileRunLock({ directory: dir });
        const second = new FileRunLock({ directory: dir });

        expect(await first.acquire()).toBe(true);
        expect(await second.acquire()).toBe(false);

        await first.release();
        expect(await second.acquire()).toBe(true);
        await second.release();
    });

    it('creates the storage directory on first use', async () => {
        const nested = path.join(dir, 'storage');
        const lock = new FileRunLock({ directory: nested });

        expect(await lock.acquire()).toBe(true);
        await expect(fs.stat(lock.lockPath)).resolves.toBeDefined();

        await lock.release();
        await expect(fs.stat(lock.lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('ignores a release without a held lock', async () => {
        await expect(new FileRunLock({ directory: dir }).release()).resolves.toBeUndefined();
    });
});
