// services/store/index.ts
import FileCollectionStore from './FileCollectionStore';
import MongoCollectionStore from './MongoCollectionStore';
import type { ICollectionStore } from './ICollectionStore';

export interface StoreOptions {
    driver: 'mongo' | 'file';
    storageDir: string;
    publishedRetention: number;
}

export const createCollectionStore = (options: StoreOptions): ICollectionStore =>
    options.driver === 'mongo'
        ? new MongoCollectionStore({ publishedRetention: options.publishedRetention })
        : new FileCollectionStore({ directory: options.storageDir, publishedRetention: options.publishedRetention });

export type { ICollectionStore };
