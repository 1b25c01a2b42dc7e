// routes/jobRoutes.ts
import express from 'express';
import validate from '../middleware/validate';
import schemas from '../utils/validationSchemas';
import { requireAdminSecret } from '../middleware/authMiddleware';
import type { JobController } from '../controllers/jobController';

export const createJobRoutes = (controller: JobController, adminSecret: string | undefined) => {
    const router = express.Router();

    // Verify Admin Secret for ALL job routes
    router.use(requireAdminSecret(adminSecret));

    // Usage: POST /api/jobs/run?key=YOUR_SECRET[&wait=true]
    router.post('/run', validate(schemas.runJob), controller.triggerRun);

    // Usage: GET /api/jobs/status?key=YOUR_SECRET
    router.get('/status', controller.getStatus);

    return router;
};
