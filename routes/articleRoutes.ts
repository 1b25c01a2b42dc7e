// routes/articleRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import schemas from '../utils/validationSchemas';
import type { ArticleController } from '../controllers/articleController';

export const createArticleRoutes = (controller: ArticleController) => {
    const router = express.Router();

    // Query parameters are parsed leniently by the service; bad values fall back to defaults.
    router.get('/articles', controller.getArticles);
    router.get('/articles/today', controller.getToday);
    router.get('/articles/:id', validate(schemas.getArticle), controller.getArticleById);
    router.get('/sources', controller.getSources);

    return router;
};
