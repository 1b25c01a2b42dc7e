// app.ts
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import mongoSanitize from 'express-mongo-sanitize';
import hpp from 'hpp';

import logger from './utils/logger';
import redisClient from './utils/redisClient';
import asyncHandler from './utils/asyncHandler';
import { errorHandler } from './middleware/errorMiddleware';
import { createApiLimiter } from './middleware/rateLimiters';
import { createApiRouter } from './routes/index';
import { createArticleController } from './controllers/articleController';
import { createJobController } from './controllers/jobController';
import type QueryService from './services/queryService';
import type PipelineOrchestrator from './jobs/pipelineOrchestrator';
import type { ICollectionStore } from './services/store/ICollectionStore';

export interface HttpSettings {
    corsOrigins: string[];
    trustProxyLevel: number;
    adminSecret?: string;
    rateLimit: { windowMs: number; maxApi: number };
    redisConfigured: boolean;
}

export interface AppDeps {
    query: QueryService;
    orchestrator: PipelineOrchestrator;
    store: ICollectionStore;
    settings: HttpSettings;
}

export const createApp = ({ query, orchestrator, store, settings }: AppDeps) => {
    const app = express();

    // --- 1. Trust Proxy ---
    // Must be set BEFORE rate limiters or logging that relies on IPs
    app.set('trust proxy', settings.trustProxyLevel);

    // --- 2. Request Logging ---
    app.use((req: Request, _res: Response, next: NextFunction) => {
        if (req.url !== '/health' && req.url !== '/ping') {
            logger.http(`${req.method} ${req.url}`);
        }
        next();
    });

    // --- 3. Security Middleware ---
    app.disable('x-powered-by');
    app.use(helmet({
        crossOriginResourcePolicy: { policy: "cross-origin" },
    }));

    app.use(compression());
    app.use(mongoSanitize());
    app.use(hpp({ whitelist: ['category', 'badge', 'source', 'today', 'limit', 'offset'] }));

    // --- 4. CORS Configuration ---
    app.use(cors({
        origin: settings.corsOrigins,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'x-admin-key'],
    }));

    app.use(express.json({ limit: '50kb' }));

    // --- 5. System Routes ---
    app.get('/', (_req: Request, res: Response) => { res.status(200).send('Archyards Pipeline Running'); });

    app.get('/ping', (_req: Request, res: Response) => {
        res.status(200).send('OK');
    });

    app.get('/health', asyncHandler(async (_req: Request, res: Response) => {
        const [storeUp, stats] = await Promise.all([store.ping(), query.stats()]);
        const redisStatus = !settings.redisConfigured ? 'DISABLED' : redisClient.isReady() ? 'UP' : 'DOWN';

        const healthy = storeUp && redisStatus !== 'DOWN';
        res.status(storeUp ? 200 : 503).json({
            status: healthy ? 'OK' : 'DEGRADED',
            store: storeUp ? 'UP' : 'DOWN',
            redis: redisStatus,
            totalArticles: stats.total,
            lastUpdated: stats.lastUpdated,
        });
    }));

    // --- 6. Global Rate Limiter ---
    const apiLimiter = createApiLimiter({ windowMs: settings.rateLimit.windowMs, max: settings.rateLimit.maxApi });
    app.use('/api/', apiLimiter);

    // --- 7. Mount Routes ---
    const apiRouter = createApiRouter({
        articles: createArticleController(query),
        jobs: createJobController(orchestrator),
        adminSecret: settings.adminSecret,
    });
    app.use('/api/v1', apiRouter);
    // Fallback
    app.use('/api', apiRouter);

    // --- 8. Error Handling ---
    app.use(errorHandler);

    return app;
};

export default createApp;
