// utils/errors.ts
import AppError from './AppError';
import type { CollectionName } from '../types';

export const describeError = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);

/** A feed could not be fetched or parsed. Caught per source by the orchestrator. */
export class SourceUnavailableError extends AppError {
    constructor(public readonly source: string, reason: string) {
        super(`Source "${source}" unavailable: ${reason}`, 502);
    }
}

/** The text-generation call failed. `retryable` drives the rewrite retry loop. */
export class TextGenerationError extends AppError {
    constructor(message: string, public readonly retryable: boolean, statusCode: number = 502) {
        super(message, statusCode);
    }
}

/** A rewrite was rejected after all attempts. */
export class RewriteFailedError extends AppError {
    constructor(public readonly articleId: string, reason: string, public readonly attempts: number) {
        super(`Rewrite failed for ${articleId} after ${attempts} attempt(s): ${reason}`, 502);
    }
}

export class RunInProgressError extends AppError {
    constructor(public readonly activeRunId: string | null) {
        super(activeRunId
            ? `Pipeline run ${activeRunId} is already in progress`
            : 'A pipeline run is already in progress', 409);
    }
}

/** Persistence layer unreachable. Fatal to a run. */
export class StoreUnavailableError extends AppError {
    constructor(operation: string, collection: CollectionName, reason: string) {
        super(`Store unavailable during ${operation}(${collection}): ${reason}`, 503);
    }
}

/** A write that would break the raw ⊇ rewritten ⊇ published chain. */
export class InvalidTransitionError extends AppError {
    constructor(message: string) {
        super(message, 409);
    }
}

export class ConfigError extends AppError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`, 500);
    }
}
