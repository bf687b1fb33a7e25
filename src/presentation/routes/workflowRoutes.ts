import { Router, Request, Response } from 'express';
import { DailyLessonWorkflow } from '../../application/DailyLessonWorkflow';
import { asyncHandler } from '../middleware/errorHandler';

/**
 * Creates daily workflow routes with dependency injection.
 */
export function createWorkflowRoutes(workflow: DailyLessonWorkflow): Router {
    const router = Router();

    /**
     * POST /workflow/run
     *
     * Runs one daily workflow and returns its result; 500 when the run failed.
     */
    router.post(
        '/workflow/run',
        asyncHandler(async (_req: Request, res: Response) => {
            const result = await workflow.run();
            res.status(result.success ? 200 : 500).json(result);
        })
    );

    /**
     * GET /stats
     */
    router.get(
        '/stats',
        asyncHandler(async (_req: Request, res: Response) => {
            const stats = await workflow.getStatistics();
            res.json({
                ...stats,
                lastRunAt: stats.lastRunAt ? stats.lastRunAt.toISOString() : null,
            });
        })
    );

    return router;
}
