// services/store/storeErrors.ts
import AppError from '../../utils/AppError';
import { StoreUnavailableError, describeError } from '../../utils/errors';
import type { CollectionName } from '../../types';

/**
 * Runs a store operation; domain errors (AppError) pass through,
 * anything else is an infrastructure failure.
 */
export const guardStoreCall = async <T>(
    operation: string,
    collection: CollectionName,
    task: () => Promise<T>
): Promise<T> => {
    try {
        return await task();
    } catch (err) {
        if (err instanceof AppError) throw err;
        throw new StoreUnavailableError(operation, collection, describeError(err));
    }
};
