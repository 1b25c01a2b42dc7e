// controllers/articleController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import AppError from '../utils/AppError';
import type QueryService from '../services/queryService';

/**
 * Read handlers over the published collection.
 */
export const createArticleController = (query: QueryService) => ({

    // @desc    Filtered, paginated published articles
    // @route   GET /api/articles?category&badge&source&today&limit&offset
    getArticles: asyncHandler(async (req: Request, res: Response) => {
        const { category, badge, source, today, limit, offset } = req.query;
        const page = await query.list({ category, badge, source, today }, limit, offset);
        res.status(200).json(page);
    }),

    // @desc    Articles promoted today (query time zone)
    // @route   GET /api/articles/today
    getToday: asyncHandler(async (_req: Request, res: Response) => {
        res.status(200).json(await query.today());
    }),

    // @desc    Single published article
    // @route   GET /api/articles/:id
    getArticleById: asyncHandler(async (req: Request, res: Response) => {
        const article = await query.get(req.params.id);
        if (!article) {
            throw new AppError('Article not found', 404);
        }
        res.status(200).json(article);
    }),

    // @desc    Published counts per source, most common first
    // @route   GET /api/sources
    getSources: asyncHandler(async (_req: Request, res: Response) => {
        res.status(200).json(await query.sources());
    }),
});

export type ArticleController = ReturnType<typeof createArticleController>;
