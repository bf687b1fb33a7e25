import { LessonContent } from '../entities/LessonContent';

export interface TopicIdea {
    topic: string;
    subtopic: string;
}

/**
 * IContentGenerator - Port for the service that writes lessons.
 * Implementations: ChatCompletionLessonGenerator
 */
export interface IContentGenerator {
    /**
     * Writes a validated lesson for a topic.
     * @throws LessonValidationError when the service returns a malformed lesson
     */
    generateLesson(topic: string, subtopic: string): Promise<LessonContent>;

    /**
     * Suggests new topics for a subject. Resolves to [] when none could be produced.
     */
    generateTopics(subject: string, count: number): Promise<TopicIdea[]>;
}
