// models/articleModel.ts
import mongoose, { Schema, Model, Connection } from 'mongoose';
import { ARTICLE_BADGES, ARTICLE_STATUSES } from '../types';
import type { CollectionName, IArticle } from '../types';

// Persisted shape: the article id doubles as _id, `position` keeps collection order.
export interface StoredArticle extends IArticle {
  _id: string;
  position: number;
}

const articleSchema = new Schema<StoredArticle>({
  _id: { type: String, required: true },
  position: { type: Number, required: true, index: true },

  id: { type: String, required: true },
  sourceName: { type: String, required: true, trim: true, index: true },
  sourceLogo: { type: String },
  url: { type: String, required: true, trim: true },
  imageUrl: { type: String, trim: true },

  originalTitle: { type: String, required: true },
  originalDescription: { type: String, default: '' },
  publishedAt: { type: String, required: true },

  // Core Feed Filters
  category: { type: String, required: true, trim: true, index: true },
  tags: { type: [String], default: [] },

  // Popularity inputs
  ageHours: { type: Number, default: 0 },
  commentCount: { type: Number, default: 0 },
  socialShares: { type: Number, default: 0 },
  popularityScore: { type: Number, default: 0 },

  // Editorial output
  rewrittenTitle: { type: String },
  rewrittenDescription: { type: String },
  sitePublishedAt: { type: String, index: true },

  badge: { type: String, enum: [...ARTICLE_BADGES], default: 'aggregated', index: true },
  status: { type: String, enum: [...ARTICLE_STATUSES], required: true },
  failureReason: { type: String },
}, {
  versionKey: false,
  autoIndex: process.env.NODE_ENV !== 'production',
});

const COLLECTION_NAMES: Record<CollectionName, string> = {
  raw: 'raw_articles',
  rewritten: 'rewritten_articles',
  published: 'published_articles',
};

const MODEL_NAMES: Record<CollectionName, string> = {
  raw: 'RawArticle',
  rewritten: 'RewrittenArticle',
  published: 'PublishedArticle',
};

/**
 * One model per store collection, registered once per connection.
 */
export const getArticleModel = (
  collection: CollectionName,
  connection: Connection = mongoose.connection
): Model<StoredArticle> => {
  const name = MODEL_NAMES[collection];
  if (connection.modelNames().includes(name)) {
    return connection.model<StoredArticle>(name);
  }
  return connection.model<StoredArticle>(name, articleSchema, COLLECTION_NAMES[collection]);
};
