// services/store/FileCollectionStore.ts
import { promises as fs } from 'fs';
import path from 'path';
import logger from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { COLLECTION_FILES } from '../../utils/constants';
import { guardStoreCall } from './storeErrors';
import { applyPromotion, assertMergeAllowed, assertRemoveAllowed, mergeRecords, parseStored } from './collectionRules';
import type { CollectionName, IArticle } from '../../types';
import type { ICollectionStore } from './ICollectionStore';

export interface FileStoreOptions {
    directory: string;
    publishedRetention: number;
}

const ARCHIVE_DIR = 'archive';

const isMissingFile = (err: unknown): boolean =>
    err instanceof Error && 'code' in err && err.code === 'ENOENT';

/**
 * JSON-file driver. One file per collection; each write lands in a temp file
 * that is renamed over the target, so readers see the old or the new file.
 */
export class FileCollectionStore implements ICollectionStore {
    name = 'file';
    private writeQueue: Promise<unknown> = Promise.resolve();

    constructor(private readonly options: FileStoreOptions) {}

    private filePath(collection: CollectionName): string {
        return path.join(this.options.directory, COLLECTION_FILES[collection]);
    }

    async read(collection: CollectionName): Promise<IArticle[]> {
        return guardStoreCall('read', collection, () => this.readFile(collection));
    }

    async merge(collection: CollectionName, articles: readonly IArticle[]): Promise<void> {
        await this.serialize(() => guardStoreCall('merge', collection, async () => {
            const rawIds = collection === 'rewritten'
                ? new Set((await this.readFile('raw')).map(a => a.id))
                : new Set<string>();
            const accepted = assertMergeAllowed(collection, articles, rawIds);
            if (accepted.length === 0) return;

            const existing = await this.readFile(collection);
            await this.writeFile(collection, mergeRecords(existing, accepted));
            logger.debug(`💾 Merged ${accepted.length} record(s) into ${collection}`);
        }));
    }

    async promote(ids: readonly string[], publishedAt: string): Promise<IArticle[]> {
        return this.serialize(() => guardStoreCall('promote', 'published', async () => {
            if (ids.length === 0) return [];

            const [rewritten, published] = await Promise.all([
                this.readFile('rewritten'),
                this.readFile('published'),
            ]);
            const result = applyPromotion(rewritten, published, ids, publishedAt, this.options.publishedRetention);
            await this.writeFile('published', result.published);
            logger.info(`💾 Promoted ${result.promoted.length} article(s); published holds ${result.published.length}`);
            return result.promoted;
        }));
    }

    async remove(collection: CollectionName, ids: readonly string[]): Promise<number> {
        return this.serialize(() => guardStoreCall('remove', collection, async () => {
            if (ids.length === 0) return 0;

            const rewrittenIds = collection === 'raw'
                ? new Set((await this.readFile('rewritten')).map(a => a.id))
                : new Set<string>();
            assertRemoveAllowed(collection, ids, rewrittenIds);

            const doomed = new Set(ids);
            const existing = await this.readFile(collection);
            const kept = existing.filter(a => !doomed.has(a.id));
            if (kept.length === existing.length) return 0;

            await this.writeFile(collection, kept);
            return existing.length - kept.length;
        }));
    }

    // archive/published_<date>.json; a second run on the same day replaces it
    async archivePublished(date: string): Promise<number> {
        return this.serialize(() => guardStoreCall('archive', 'published', async () => {
            const published = await this.readFile('published');
            if (published.length === 0) return 0;

            const directory = path.join(this.options.directory, ARCHIVE_DIR);
            await this.writeJson(directory, path.join(directory, `published_${date}.json`), published);
            logger.info(`📦 Archived ${published.length} published article(s) for ${date}`);
            return published.length;
        }));
    }

    async ping(): Promise<boolean> {
        try {
            await fs.mkdir(this.options.directory, { recursive: true });
            await fs.access(this.options.directory);
            return true;
        } catch (err) {
            logger.warn(`File store unreachable: ${describeError(err)}`);
            return false;
        }
    }

    // --- Private Helpers ---

    // Writes in this process run one after another; the run lock keeps other processes out.
    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.writeQueue.then(task, task);
        this.writeQueue = run.catch(() => undefined);
        return run;
    }

    private async readFile(collection: CollectionName): Promise<IArticle[]> {
        let text: string;
        try {
            text = await fs.readFile(this.filePath(collection), 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) return [];
            throw err;
        }

        try {
            return parseStored(collection, JSON.parse(text));
        } catch (err) {
            logger.warn(`Store: ${COLLECTION_FILES[collection]} is not valid JSON, reading as empty`);
            return [];
        }
    }

    private async writeFile(collection: CollectionName, articles: IArticle[]): Promise<void> {
        await this.writeJson(this.options.directory, this.filePath(collection), articles);
    }

    private async writeJson(directory: string, target: string, articles: IArticle[]): Promise<void> {
        const temp = `${target}.${process.pid}.${Date.now()}.tmp`;

        await fs.mkdir(directory, { recursive: true });
        await fs.writeFile(temp, JSON.stringify(articles, null, 2), 'utf-8');
        await fs.rename(temp, target);
    }
}

export default FileCollectionStore;
