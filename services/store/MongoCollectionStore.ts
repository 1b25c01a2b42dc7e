// services/store/MongoCollectionStore.ts
import mongoose, { ClientSession, Connection } from 'mongoose';
import logger from '../../utils/logger';
import { getArticleModel } from '../../models/articleModel';
import { getArchiveModel } from '../../models/archiveModel';
import { guardStoreCall } from './storeErrors';
import { applyPromotion, assertMergeAllowed, assertRemoveAllowed, mergeRecords, parseStored } from './collectionRules';
import type { CollectionName, IArticle } from '../../types';
import type { ICollectionStore } from './ICollectionStore';

export interface MongoStoreOptions {
    publishedRetention: number;
    connection?: Connection;
}

/**
 * MongoDB driver. Each write runs inside a transaction, so it needs a replica set
 * (Atlas or a single-node `rs0`).
 */
export class MongoCollectionStore implements ICollectionStore {
    name = 'mongo';
    private readonly connection: Connection;

    constructor(private readonly options: MongoStoreOptions) {
        this.connection = options.connection ?? mongoose.connection;
    }

    async read(collection: CollectionName): Promise<IArticle[]> {
        return guardStoreCall('read', collection, () => this.load(collection));
    }

    async merge(collection: CollectionName, articles: readonly IArticle[]): Promise<void> {
        await guardStoreCall('merge', collection, () =>
            this.connection.transaction(async (session) => {
                const rawIds = collection === 'rewritten'
                    ? new Set((await this.load('raw', session)).map(a => a.id))
                    : new Set<string>();
                const accepted = assertMergeAllowed(collection, articles, rawIds);
                if (accepted.length === 0) return;

                const existing = await this.load(collection, session);
                await this.replaceAll(collection, mergeRecords(existing, accepted), session);
                logger.debug(`💾 Merged ${accepted.length} record(s) into ${collection}`);
            })
        );
    }

    async promote(ids: readonly string[], publishedAt: string): Promise<IArticle[]> {
        if (ids.length === 0) return [];

        return guardStoreCall('promote', 'published', () =>
            this.connection.transaction(async (session) => {
                const [rewritten, published] = await Promise.all([
                    this.load('rewritten', session),
                    this.load('published', session),
                ]);
                const result = applyPromotion(rewritten, published, ids, publishedAt, this.options.publishedRetention);
                await this.replaceAll('published', result.published, session);
                logger.info(`💾 Promoted ${result.promoted.length} article(s); published holds ${result.published.length}`);
                return result.promoted;
            })
        );
    }

    async remove(collection: CollectionName, ids: readonly string[]): Promise<number> {
        if (ids.length === 0) return 0;

        return guardStoreCall('remove', collection, () =>
            this.connection.transaction(async (session) => {
                const rewrittenIds = collection === 'raw'
                    ? new Set((await this.load('rewritten', session)).map(a => a.id))
                    : new Set<string>();
                assertRemoveAllowed(collection, ids, rewrittenIds);

                const result = await getArticleModel(collection, this.connection)
                    .deleteMany({ _id: { $in: [...ids] } }, { session });
                return result.deletedCount;
            })
        );
    }

    // One document per day in `published_archive`; a second run on the same day replaces it.
    async archivePublished(date: string): Promise<number> {
        return guardStoreCall('archive', 'published', async () => {
            const published = await this.load('published');
            if (published.length === 0) return 0;

            await getArchiveModel(this.connection).replaceOne(
                { _id: date },
                { _id: date, articles: published, archivedAt: new Date() },
                { upsert: true }
            );
            logger.info(`📦 Archived ${published.length} published article(s) for ${date}`);
            return published.length;
        });
    }

    async ping(): Promise<boolean> {
        return this.connection.readyState === 1;
    }

    // --- Private Helpers ---

    private async load(collection: CollectionName, session?: ClientSession): Promise<IArticle[]> {
        const docs = await getArticleModel(collection, this.connection)
            .find({})
            .sort({ position: 1 })
            .session(session ?? null)
            .lean();
        return parseStored(collection, docs);
    }

    // Rewrites positions for the whole list and removes ids no longer present.
    private async replaceAll(collection: CollectionName, articles: IArticle[], session: ClientSession): Promise<void> {
        const Model = getArticleModel(collection, this.connection);
        const ids = articles.map(a => a.id);

        await Model.deleteMany({ _id: { $nin: ids } }, { session });

        if (articles.length === 0) return;

        await Model.bulkWrite(
            articles.map((article, position) => ({
                replaceOne: {
                    filter: { _id: article.id },
                    replacement: { ...article, position },
                    upsert: true,
                },
            })),
            { session, ordered: true }
        );
    }
}

export default MongoCollectionStore;
