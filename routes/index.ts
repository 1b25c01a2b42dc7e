// routes/index.ts
import express from 'express';
import { createArticleRoutes } from './articleRoutes';
import { createJobRoutes } from './jobRoutes';
import type { ArticleController } from '../controllers/articleController';
import type { JobController } from '../controllers/jobController';

export interface ApiRouterDeps {
    articles: ArticleController;
    jobs: JobController;
    adminSecret?: string;
}

export const createApiRouter = ({ articles, jobs, adminSecret }: ApiRouterDeps) => {
    const router = express.Router();

    // --- 1. System Routes (Secret Key Protected) ---
    router.use('/jobs', createJobRoutes(jobs, adminSecret));

    // --- 2. Main Content Routes ---
    router.use('/', createArticleRoutes(articles));

    // --- 3. API 404 Handler ---
    router.use('*', (req, res) => {
        res.status(404).json({
            success: false,
            message: "API Endpoint Not Found",
            path: req.originalUrl
        });
    });

    return router;
};
