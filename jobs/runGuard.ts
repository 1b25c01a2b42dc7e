// jobs/runGuard.ts
import redisClient, { RedisFacade } from '../utils/redisClient';
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { RunInProgressError } from '../utils/errors';

type LockClient = Pick<RedisFacade, 'isReady' | 'acquireLock' | 'releaseLock'>;

/** A lock the processes sharing one storage directory all see. */
export interface HostLock {
    acquire(): Promise<boolean>;
    release(): Promise<void>;
}

export interface RunGuardOptions {
    lockTtlSeconds: number;
    lockKey?: string;
    redis?: LockClient;
    hostLock?: HostLock;
}

/**
 * Single-run gate, in three layers:
 * 1. an in-process flag, taken synchronously so two triggers in one tick cannot both pass;
 * 2. the host lock, shared by the API and worker processes on the same storage directory;
 * 3. the Redis lock, shared by every process when Redis is connected.
 */
class RunGuard {
    private activeRunId: string | null = null;
    private remoteOwner: string | null = null;
    private holdsHostLock = false;
    private readonly redis: LockClient;
    private readonly lockKey: string;

    constructor(private readonly options: RunGuardOptions) {
        this.redis = options.redis ?? redisClient;
        this.lockKey = options.lockKey ?? CONSTANTS.REDIS_KEYS.RUN_LOCK;
    }

    get active(): string | null {
        return this.activeRunId;
    }

    /** Throws RunInProgressError and changes nothing when another run holds the gate. */
    async acquire(runId: string): Promise<void> {
        if (this.activeRunId) {
            throw new RunInProgressError(this.activeRunId);
        }
        this.activeRunId = runId;

        try {
            await this.takeHostLock();
            await this.takeRemoteLock(runId);
        } catch (err) {
            await this.release();
            throw err;
        }
    }

    async release(): Promise<void> {
        try {
            if (this.remoteOwner) {
                const owned = await this.redis.releaseLock(this.lockKey, this.remoteOwner);
                if (!owned) logger.warn(`🔒 Run lock for ${this.remoteOwner} expired before release; left untouched.`);
                this.remoteOwner = null;
            }
            if (this.holdsHostLock && this.options.hostLock) {
                await this.options.hostLock.release();
                this.holdsHostLock = false;
            }
        } finally {
            this.activeRunId = null;
        }
    }

    // --- Private Helpers ---

    private async takeHostLock(): Promise<void> {
        const { hostLock } = this.options;
        if (!hostLock) return;

        if (!(await hostLock.acquire())) {
            logger.warn('🔒 Run lock held by another process on this host.');
            throw new RunInProgressError(null);
        }
        this.holdsHostLock = true;
    }

    private async takeRemoteLock(runId: string): Promise<void> {
        if (!this.redis.isReady()) return;

        const result = await this.redis.acquireLock(this.lockKey, runId, this.options.lockTtlSeconds);
        if (result === 'held') {
            logger.warn('🔒 Run lock held by another process.');
            throw new RunInProgressError(null);
        }
        if (result === 'unavailable') {
            logger.warn('🔒 Redis run lock unavailable; continuing under the local locks.');
            return;
        }
        this.remoteOwner = runId;
    }
}

export default RunGuard;
