// jobs/fileRunLock.ts
import { promises as fs } from 'fs';
import path from 'path';
import lockfile from 'proper-lockfile';
import logger from '../utils/logger';
import { describeError } from '../utils/errors';
import type { HostLock } from './runGuard';

const LOCK_NAME = 'pipeline-run.lock';

const isHeldElsewhere = (err: unknown): boolean =>
    err instanceof Error && 'code' in err && err.code === 'ELOCKED';

export interface FileRunLockOptions {
    directory: string;
    staleMs?: number;
}

/**
 * Run lock kept as a lock directory inside STORAGE_DIR. The holder refreshes
 * its mtime while the run lasts; a holder that died goes stale after `staleMs`.
 */
class FileRunLock implements HostLock {
    private unlock: (() => Promise<void>) | null = null;

    constructor(private readonly options: FileRunLockOptions) {}

    get lockPath(): string {
        return path.join(this.options.directory, LOCK_NAME);
    }

    async acquire(): Promise<boolean> {
        await fs.mkdir(this.options.directory, { recursive: true });

        try {
            this.unlock = await lockfile.lock(this.options.directory, {
                lockfilePath: this.lockPath,
                realpath: false,
                retries: 0,
                stale: this.options.staleMs ?? 30000,
                onCompromised: (err: Error) => logger.error(`🔒 Run lock compromised: ${err.message}`),
            });
            return true;
        } catch (err) {
            if (isHeldElsewhere(err)) return false;
            throw err;
        }
    }

    async release(): Promise<void> {
        const unlock = this.unlock;
        this.unlock = null;
        if (!unlock) return;

        try {
            await unlock();
        } catch (err) {
            logger.warn(`Run lock release failed: ${describeError(err)}`);
        }
    }
}

export default FileRunLock;
