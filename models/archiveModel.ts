// models/archiveModel.ts
import mongoose, { Schema, Model, Connection } from 'mongoose';
import type { IArticle } from '../types';

// Daily copy of the published collection, keyed by YYYY-MM-DD.
export interface PublishedSnapshot {
  _id: string;
  articles: IArticle[];
  archivedAt: Date;
}

const snapshotSchema = new Schema<PublishedSnapshot>({
  _id: { type: String, required: true },
  articles: { type: [{ type: Schema.Types.Mixed }], default: [] },
  archivedAt: { type: Date, required: true },
}, {
  versionKey: false,
});

const MODEL_NAME = 'PublishedSnapshot';

export const getArchiveModel = (connection: Connection = mongoose.connection): Model<PublishedSnapshot> => {
  if (connection.modelNames().includes(MODEL_NAME)) {
    return connection.model<PublishedSnapshot>(MODEL_NAME);
  }
  return connection.model<PublishedSnapshot>(MODEL_NAME, snapshotSchema, 'published_archive');
};
