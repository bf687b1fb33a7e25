import { LessonContent } from '../domain/entities/LessonContent';
import { IContentGenerator } from '../domain/ports/IContentGenerator';
import { ILessonPoster, IVideoPublisher, LessonPost, PublishedVideo } from '../domain/ports/IDistribution';
import { ITopicRepository, RotationStatistics } from '../domain/ports/ITopicRepository';
import { formatVideoCaption } from '../domain/services/LessonFormatter';
import { LessonVideoResult } from './pipelines/LessonVideoPipeline';

/**
 * The part of LessonVideoPipeline the workflow drives.
 */
export interface LessonVideoGenerator {
    generate(lesson: LessonContent, topic: string, subtopic: string): Promise<LessonVideoResult>;
}

export interface DailyLessonDependencies {
    topics: ITopicRepository;
    generator: IContentGenerator;
    videos: LessonVideoGenerator;
    /** Optional; without it the video is only kept on disk */
    publisher?: IVideoPublisher;
    /** Optional; without it nothing is posted */
    poster?: ILessonPoster;
    now?: () => Date;
}

export interface WorkflowResult {
    success: boolean;
    subject: string | null;
    topic: string | null;
    subtopic: string | null;
    videoPath: string | null;
    videoDurationSeconds: number | null;
    youtubeUrl: string | null;
    telegramMessageId: string | null;
    error: string | null;
    timestamp: string;
}

/** Subjects with fewer topics than this get new ones generated. */
export const DEFAULT_MIN_TOPICS = 50;

/**
 * One daily run: pick the next subject and topic, write a lesson, turn it
 * into a video, distribute it, then record the result.
 *
 * Distribution is best-effort. A failed upload or post is logged and the run
 * still counts as a success because the video exists.
 */
export class DailyLessonWorkflow {
    private readonly now: () => Date;

    constructor(private readonly deps: DailyLessonDependencies) {
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Runs the workflow. Never throws; failures are reported in the result.
     */
    async run(): Promise<WorkflowResult> {
        const result: WorkflowResult = {
            success: false,
            subject: null,
            topic: null,
            subtopic: null,
            videoPath: null,
            videoDurationSeconds: null,
            youtubeUrl: null,
            telegramMessageId: null,
            error: null,
            timestamp: this.now().toISOString(),
        };

        try {
            console.log('[Workflow] Step 1/7: selecting subject...');
            const subject = await this.deps.topics.nextSubject();
            if (!subject) {
                throw new Error('No subjects found');
            }
            result.subject = subject;

            console.log(`[Workflow] Step 2/7: next topic for ${subject}...`);
            let topic = await this.deps.topics.nextUnusedTopic(subject);
            if (!topic) {
                console.log(`[Workflow] All topics of ${subject} used, starting new cycle...`);
                await this.deps.topics.startNewCycle(subject);
                topic = await this.deps.topics.nextUnusedTopic(subject);
                if (!topic) {
                    throw new Error(`No topics available for subject: ${subject}`);
                }
            }
            result.topic = topic.topic;
            result.subtopic = topic.subtopic;

            console.log(`[Workflow] Step 3/7: writing lesson for ${topic.topic} / ${topic.subtopic}...`);
            const lesson = await this.deps.generator.generateLesson(topic.topic, topic.subtopic);

            console.log('[Workflow] Step 4/7: producing video...');
            const video = await this.deps.videos.generate(lesson, topic.topic, topic.subtopic);
            result.videoPath = video.outputPath;
            result.videoDurationSeconds = video.durationSeconds;

            const post: LessonPost = { topic: topic.topic, subtopic: topic.subtopic, lesson };

            console.log('[Workflow] Step 5/7: publishing video...');
            const published = await this.publish(video.outputPath, post);
            result.youtubeUrl = published?.videoUrl ?? null;

            console.log('[Workflow] Step 6/7: posting lesson...');
            result.telegramMessageId = await this.notify(post, result.youtubeUrl, video.outputPath);

            console.log('[Workflow] Step 7/7: recording run...');
            await this.deps.topics.recordCase({
                topicId: topic.id,
                caseText: lesson.caseText,
                mnemonic: lesson.mnemonic,
                videoPath: video.outputPath,
                videoUrl: result.youtubeUrl,
                telegramMessageId: result.telegramMessageId,
                createdAt: this.now(),
            });
            await this.deps.topics.markUsed(topic.id);
            await this.deps.topics.completeRun(subject);

            result.success = true;
            console.log(`[Workflow] ✅ Completed: ${subject} / ${topic.topic} - ${topic.subtopic}`);
        } catch (error) {
            result.error = error instanceof Error ? error.message : String(error);
            console.error('[Workflow] ❌ Failed:', result.error);
        }

        return result;
    }

    /**
     * Tops up every subject that has fewer than minTopics topics.
     * @returns number of topics added per subject
     */
    async topUpTopics(minTopics: number = DEFAULT_MIN_TOPICS): Promise<Record<string, number>> {
        const added: Record<string, number> = {};
        for (const subject of await this.deps.topics.listSubjects()) {
            const count = await this.deps.topics.countTopics(subject);
            if (count >= minTopics) {
                continue;
            }
            console.log(`[Workflow] ${subject} has ${count} topics, generating ${minTopics - count} more...`);
            const ideas = await this.deps.generator.generateTopics(subject, minTopics - count);
            added[subject] = await this.deps.topics.addTopics(subject, ideas);
        }
        return added;
    }

    getStatistics(): Promise<RotationStatistics> {
        return this.deps.topics.getStatistics();
    }

    private async publish(videoPath: string, post: LessonPost): Promise<PublishedVideo | null> {
        if (!this.deps.publisher) {
            console.log('[Workflow] No video publisher configured, skipping');
            return null;
        }
        try {
            return await this.deps.publisher.publish(videoPath, post);
        } catch (error) {
            console.warn('[Workflow] ⚠️ Video upload failed:', error instanceof Error ? error.message : error);
            return null;
        }
    }

    /**
     * Posts the lesson text. Without a public video URL the file itself is
     * sent first so the channel still gets the video.
     */
    private async notify(post: LessonPost, videoUrl: string | null, videoPath: string): Promise<string | null> {
        if (!this.deps.poster) {
            console.log('[Workflow] No lesson poster configured, skipping');
            return null;
        }
        try {
            let videoMessageId: string | null = null;
            if (!videoUrl) {
                videoMessageId = await this.deps.poster.sendVideo(
                    videoPath,
                    formatVideoCaption(post.topic, post.subtopic, post.lesson)
                );
            }
            const messageId = await this.deps.poster.postLesson(post, videoUrl);
            return messageId ?? videoMessageId;
        } catch (error) {
            console.warn('[Workflow] ⚠️ Lesson post failed:', error instanceof Error ? error.message : error);
            return null;
        }
    }
}
