import { Router, Request, Response } from 'express';
import { validateLessonContent } from '../../domain/entities/LessonContent';
import { LessonVideoGenerator } from '../../application/DailyLessonWorkflow';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

function requireText(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    if (typeof value !== 'string' || !value.trim()) {
        throw new BadRequestError(`${field} is required`);
    }
    return value.trim();
}

/**
 * Creates lesson video routes with dependency injection.
 */
export function createVideoRoutes(videos: LessonVideoGenerator): Router {
    const router = Router();

    /**
     * POST /videos
     *
     * Body: { topic, subtopic, lesson }. Renders the lesson synchronously and
     * returns where the video was written.
     */
    router.post(
        '/videos',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            if (typeof body !== 'object' || body === null || Array.isArray(body)) {
                throw new BadRequestError('Request body must be a JSON object');
            }
            const fields = Object.fromEntries(Object.entries(body));
            const topic = requireText(fields, 'topic');
            const subtopic = requireText(fields, 'subtopic');
            const lesson = validateLessonContent(fields.lesson);

            const result = await videos.generate(lesson, topic, subtopic);

            res.status(201).json({
                outputPath: result.outputPath,
                durationSeconds: result.durationSeconds,
                slideCount: result.slideCount,
                narratedSlides: result.narratedSlides,
                truncated: result.truncated,
            });
        })
    );

    return router;
}
