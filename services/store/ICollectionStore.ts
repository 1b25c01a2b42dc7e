// services/store/ICollectionStore.ts
import type { CollectionName, IArticle } from '../../types';

/**
 * Persistence for the three article collections.
 * Every write is all-or-nothing for readers; infrastructure failures raise StoreUnavailableError.
 */
export interface ICollectionStore {
    name: string;

    /** Full ordered contents. Absent or unreadable data is an empty collection. */
    read(collection: CollectionName): Promise<IArticle[]>;

    /**
     * Idempotent upsert by id (last write wins, existing records keep their slot).
     * `published` only accepts records through `promote`.
     */
    merge(collection: CollectionName, articles: readonly IArticle[]): Promise<void>;

    /**
     * Moves rewritten records into `published` as one batch and returns them.
     * Rejects the whole batch unless every id is a `rewritten` record.
     */
    promote(ids: readonly string[], publishedAt: string): Promise<IArticle[]>;

    /**
     * Deletes records from `raw` or `rewritten` and returns how many went.
     * `raw` keeps every id still present in `rewritten`; `published` only shrinks through retention.
     */
    remove(collection: CollectionName, ids: readonly string[]): Promise<number>;

    /**
     * Stores a copy of `published` under `date` (YYYY-MM-DD), replacing that day's copy.
     * Returns the number of records archived; an empty collection archives nothing.
     */
    archivePublished(date: string): Promise<number>;

    /** Liveness probe for /health. */
    ping(): Promise<boolean>;
}
