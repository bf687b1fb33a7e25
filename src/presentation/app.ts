import express, { Application, NextFunction, Request, Response } from 'express';
import { Config } from '../config';
import { DEFAULT_SEGMENT_FORMAT, SegmentFormat } from '../domain/entities/Segment';
import { ILessonPoster, IVideoPublisher } from '../domain/ports/IDistribution';
import { ITTSClient } from '../domain/ports/ITTSClient';
import { resolveSlideStyle } from '../domain/services/SlideStyles';
import { DailyLessonWorkflow } from '../application/DailyLessonWorkflow';
import { LessonVideoPipeline } from '../application/pipelines/LessonVideoPipeline';
import { NarrationSynthesizer } from '../application/services/NarrationSynthesizer';
import { SegmentEncoder } from '../application/services/SegmentEncoder';
import { TimelineAssembler } from '../application/services/TimelineAssembler';

// Infrastructure imports
import { ChatCompletionClient } from '../infrastructure/llm/ChatCompletionClient';
import { ChatCompletionLessonGenerator } from '../infrastructure/llm/ChatCompletionLessonGenerator';
import { TelegramLessonPoster } from '../infrastructure/notifications/TelegramLessonPoster';
import { CanvasSlideRenderer } from '../infrastructure/rendering/CanvasSlideRenderer';
import { FontProvider } from '../infrastructure/rendering/FontProvider';
import { JsonFileTopicRepository } from '../infrastructure/topics/JsonFileTopicRepository';
import { FishAudioTTSClient } from '../infrastructure/tts/FishAudioTTSClient';
import { OpenAITTSClient } from '../infrastructure/tts/OpenAITTSClient';
import { FluentFfmpegMediaEncoder } from '../infrastructure/video/FluentFfmpegMediaEncoder';
import { YouTubeShortsPublisher } from '../infrastructure/youtube/YouTubeShortsPublisher';

// Route imports
import { createVideoRoutes } from './routes/videoRoutes';
import { createWorkflowRoutes } from './routes/workflowRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Services the HTTP layer and the workflow script run on.
 */
export interface AppServices {
    pipeline: LessonVideoPipeline;
    /** Absent when no LLM key is configured */
    workflow: DailyLessonWorkflow | null;
}

function createTtsClient(config: Config): ITTSClient {
    if (config.ttsProvider === 'fish') {
        return new FishAudioTTSClient(config.fishAudioApiKey, config.ttsVoice, config.fishAudioBaseUrl);
    }
    return new OpenAITTSClient(config.openaiApiKey, config.ttsVoice);
}

function createPublisher(config: Config): IVideoPublisher | undefined {
    if (!config.youtubeClientId) {
        return undefined;
    }
    return new YouTubeShortsPublisher({
        clientId: config.youtubeClientId,
        clientSecret: config.youtubeClientSecret,
        refreshToken: config.youtubeRefreshToken,
    });
}

function createPoster(config: Config): ILessonPoster | undefined {
    if (!config.telegramBotToken) {
        return undefined;
    }
    return new TelegramLessonPoster(config.telegramBotToken, config.telegramChannelId);
}

/**
 * Wires every component from configuration.
 */
export async function createDependencies(config: Config): Promise<AppServices> {
    const style = resolveSlideStyle(config.slideStyle, {
        width: config.canvasWidth,
        height: config.canvasHeight,
    });
    const format: SegmentFormat = {
        ...DEFAULT_SEGMENT_FORMAT,
        width: config.canvasWidth,
        height: config.canvasHeight,
        fps: config.videoFps,
    };

    const encoder = new FluentFfmpegMediaEncoder({
        timeoutSeconds: config.ffmpegTimeoutSeconds,
        probeTimeoutMs: config.ffprobeTimeoutMs,
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
    });
    const fonts = new FontProvider({ candidates: config.fontPaths.map((fontPath) => ({ path: fontPath })) });

    const pipeline = new LessonVideoPipeline(
        {
            renderer: new CanvasSlideRenderer(style, fonts),
            narrator: new NarrationSynthesizer(createTtsClient(config), {
                speed: config.ttsSpeed,
                timeoutMs: config.ttsTimeoutMs,
            }),
            segmentEncoder: new SegmentEncoder(encoder, {
                format,
                tailBufferSeconds: config.audioTailBufferSeconds,
            }),
            assembler: new TimelineAssembler(encoder),
        },
        {
            style,
            outputDir: config.outputDir,
            maxDurationSeconds: config.maxVideoSeconds,
            truncation: config.truncationPolicy,
        }
    );

    let workflow: DailyLessonWorkflow | null = null;
    if (config.llmApiKey) {
        const llm = new ChatCompletionClient(config.llmApiKey, config.llmModel, config.llmBaseUrl);
        workflow = new DailyLessonWorkflow({
            topics: await JsonFileTopicRepository.open(config.topicsStateFile, config.topicsFile),
            generator: new ChatCompletionLessonGenerator(llm),
            videos: pipeline,
            publisher: createPublisher(config),
            poster: createPoster(config),
        });
    } else {
        console.log('ℹ️ LLM_API_KEY not set, daily workflow disabled');
    }

    return { pipeline, workflow };
}

/**
 * Creates and configures the Express application.
 */
export function createApp(services: AppServices): Application {
    const app = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
            style: services.pipeline.style.name,
            workflow: services.workflow !== null,
        });
    });

    // API routes
    app.use('/api', createVideoRoutes(services.pipeline));
    if (services.workflow) {
        app.use('/api', createWorkflowRoutes(services.workflow));
    }

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
