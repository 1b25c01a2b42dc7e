// controllers/jobController.ts
import { Request, Response } from 'express';
import asyncHandler from '../utils/asyncHandler';
import logger from '../utils/logger';
import { describeError } from '../utils/errors';
import type PipelineOrchestrator from '../jobs/pipelineOrchestrator';

export const createJobController = (orchestrator: PipelineOrchestrator) => ({

    /**
     * Manually trigger a pipeline run.
     * 202 with the run id, or 200 with the summary when `?wait=true`.
     * A run already in progress surfaces as 409 through the error middleware.
     */
    triggerRun: asyncHandler(async (req: Request, res: Response) => {
        const { runId, completion } = await orchestrator.trigger('manual');
        logger.info(`👉 Manual pipeline run ${runId} triggered by IP: ${req.ip}`);

        if (req.query.wait === 'true') {
            res.status(200).json(await completion);
            return;
        }

        completion.catch((err: unknown) => logger.error(`Run ${runId} rejected: ${describeError(err)}`));
        res.status(202).json({ status: 'accepted', runId });
    }),

    getStatus: asyncHandler(async (_req: Request, res: Response) => {
        res.status(200).json(await orchestrator.getStatus());
    }),
});

export type JobController = ReturnType<typeof createJobController>;
