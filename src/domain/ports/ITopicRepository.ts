import { TopicIdea } from './IContentGenerator';

export interface TopicRecord extends TopicIdea {
    id: number;
    subject: string;
    cycle: number;
    used: boolean;
}

/**
 * What a finished run leaves behind for a topic.
 */
export interface CaseRecord {
    topicId: number;
    caseText: string;
    mnemonic: string;
    videoPath: string | null;
    videoUrl: string | null;
    telegramMessageId: string | null;
    createdAt: Date;
}

export interface RotationStatistics {
    totalSubjects: number;
    totalTopics: number;
    totalCases: number;
    topicsBySubject: Record<string, number>;
    currentSubject: string | null;
    totalRuns: number;
    lastRunAt: Date | null;
}

/**
 * ITopicRepository - Port for subject/topic rotation bookkeeping.
 * Implementations: InMemoryTopicRepository, JsonFileTopicRepository
 */
export interface ITopicRepository {
    listSubjects(): Promise<string[]>;

    /** Subject the next run should draw from, or null when none exist */
    nextSubject(): Promise<string | null>;

    /** First unused topic of the subject's current cycle */
    nextUnusedTopic(subject: string): Promise<TopicRecord | null>;

    /**
     * Re-queues every topic of the subject in a new cycle.
     * @returns false when the current cycle still has unused topics
     */
    startNewCycle(subject: string): Promise<boolean>;

    markUsed(topicId: number): Promise<void>;

    addTopics(subject: string, topics: TopicIdea[]): Promise<number>;

    countTopics(subject: string): Promise<number>;

    recordCase(record: CaseRecord): Promise<void>;

    /** Moves the rotation past the subject and counts a completed run */
    completeRun(subject: string): Promise<void>;

    getStatistics(): Promise<RotationStatistics>;
}
