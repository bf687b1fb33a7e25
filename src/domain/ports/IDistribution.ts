import { LessonContent } from '../entities/LessonContent';

export interface PublishedVideo {
    videoId: string;
    videoUrl: string;
}

export interface LessonPost {
    topic: string;
    subtopic: string;
    lesson: LessonContent;
}

/**
 * IVideoPublisher - Port for a short-form video platform.
 * Receives only the finished file; it never writes to it.
 * Implementations: YouTubeShortsPublisher
 */
export interface IVideoPublisher {
    publish(videoPath: string, post: LessonPost): Promise<PublishedVideo>;
}

/**
 * ILessonPoster - Port for a messaging channel.
 * Implementations: TelegramLessonPoster
 */
export interface ILessonPoster {
    /**
     * Posts the lesson text, linking the video when a URL is known.
     * @returns message id, or null when the post did not go through
     */
    postLesson(post: LessonPost, videoUrl: string | null): Promise<string | null>;

    /**
     * Uploads the video file itself with a caption.
     * @returns message id, or null when the upload did not go through
     */
    sendVideo(videoPath: string, caption: string): Promise<string | null>;
}
