import fs from 'fs';
import Ajv from 'ajv';
import { TopicIdea } from '../../domain/ports/IContentGenerator';
import {
    CaseRecord,
    ITopicRepository,
    RotationStatistics,
    TopicRecord,
} from '../../domain/ports/ITopicRepository';

export interface TopicSeed {
    subjects: Array<{ name: string; topics: TopicIdea[] }>;
}

/**
 * Everything the repository holds, in a JSON-safe form.
 */
export interface RotationState {
    subjects: string[];
    topics: TopicRecord[];
    cases: Array<Omit<CaseRecord, 'createdAt'> & { createdAt: string }>;
    currentSubject: string | null;
    totalRuns: number;
    lastRunAt: string | null;
}

const seedSchema = {
    type: 'object',
    properties: {
        subjects: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    name: { type: 'string', minLength: 1 },
                    topics: {
                        type: 'array',
                        items: {
                            type: 'object',
                            properties: {
                                topic: { type: 'string', minLength: 1 },
                                subtopic: { type: 'string', minLength: 1 },
                            },
                            required: ['topic', 'subtopic'],
                        },
                    },
                },
                required: ['name', 'topics'],
            },
        },
    },
    required: ['subjects'],
};

const validateSeed = new Ajv({ allErrors: true }).compile<TopicSeed>(seedSchema);

/**
 * Subject/topic rotation kept in memory, seeded from a JSON topics file.
 *
 * Subjects rotate round-robin, one per completed run. Inside a subject,
 * topics are served in insertion order; once every topic of the current
 * cycle is used, a new cycle re-queues all of them.
 */
export class InMemoryTopicRepository implements ITopicRepository {
    private readonly subjects: string[] = [];
    private readonly topics: TopicRecord[] = [];
    private readonly cases: CaseRecord[] = [];
    private nextId = 1;
    private currentSubject: string | null = null;
    private totalRuns = 0;
    private lastRunAt: Date | null = null;

    constructor(
        seed: TopicSeed = { subjects: [] },
        private readonly now: () => Date = () => new Date()
    ) {
        for (const subject of seed.subjects) {
            this.addSubject(subject.name);
            this.insertTopics(subject.name, subject.topics);
        }
    }

    static async fromFile(filePath: string, now?: () => Date): Promise<InMemoryTopicRepository> {
        const raw: unknown = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
        if (!validateSeed(raw)) {
            const problems = (validateSeed.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
            throw new Error(`Invalid topics file ${filePath}: ${problems.join('; ')}`);
        }
        return new InMemoryTopicRepository(raw, now);
    }

    /**
     * Rebuilds a repository from a snapshot taken with toState().
     */
    static fromState(state: RotationState, now?: () => Date): InMemoryTopicRepository {
        const repo = new InMemoryTopicRepository({ subjects: [] }, now);
        repo.subjects.push(...state.subjects);
        repo.topics.push(...state.topics.map((t) => ({ ...t })));
        repo.cases.push(...state.cases.map((c) => ({ ...c, createdAt: new Date(c.createdAt) })));
        repo.nextId = state.topics.reduce((max, t) => Math.max(max, t.id), 0) + 1;
        repo.currentSubject = state.currentSubject;
        repo.totalRuns = state.totalRuns;
        repo.lastRunAt = state.lastRunAt ? new Date(state.lastRunAt) : null;
        return repo;
    }

    toState(): RotationState {
        return {
            subjects: [...this.subjects],
            topics: this.topics.map((t) => ({ ...t })),
            cases: this.cases.map((c) => ({ ...c, createdAt: c.createdAt.toISOString() })),
            currentSubject: this.currentSubject,
            totalRuns: this.totalRuns,
            lastRunAt: this.lastRunAt ? this.lastRunAt.toISOString() : null,
        };
    }

    async listSubjects(): Promise<string[]> {
        return [...this.subjects];
    }

    async nextSubject(): Promise<string | null> {
        if (this.subjects.length === 0) {
            return null;
        }
        const index = this.currentSubject === null ? -1 : this.subjects.indexOf(this.currentSubject);
        return this.subjects[(index + 1) % this.subjects.length];
    }

    async nextUnusedTopic(subject: string): Promise<TopicRecord | null> {
        const cycle = this.currentCycle(subject);
        const topic = this.topics.find((t) => t.subject === subject && t.cycle === cycle && !t.used);
        return topic ? { ...topic } : null;
    }

    async startNewCycle(subject: string): Promise<boolean> {
        const cycle = this.currentCycle(subject);
        const subjectTopics = this.topics.filter((t) => t.subject === subject);
        if (subjectTopics.length === 0 || subjectTopics.some((t) => t.cycle === cycle && !t.used)) {
            return false;
        }
        for (const topic of subjectTopics) {
            topic.used = false;
            topic.cycle = cycle + 1;
        }
        console.log(`[Topics] ${subject}: starting cycle ${cycle + 1}`);
        return true;
    }

    async markUsed(topicId: number): Promise<void> {
        const topic = this.topics.find((t) => t.id === topicId);
        if (!topic) {
            throw new Error(`Unknown topic id ${topicId}`);
        }
        topic.used = true;
    }

    async addTopics(subject: string, topics: TopicIdea[]): Promise<number> {
        this.addSubject(subject);
        return this.insertTopics(subject, topics);
    }

    async countTopics(subject: string): Promise<number> {
        return this.topics.filter((t) => t.subject === subject).length;
    }

    async recordCase(record: CaseRecord): Promise<void> {
        this.cases.push({ ...record });
    }

    async completeRun(subject: string): Promise<void> {
        this.currentSubject = subject;
        this.totalRuns++;
        this.lastRunAt = this.now();
    }

    async getStatistics(): Promise<RotationStatistics> {
        const topicsBySubject: Record<string, number> = {};
        for (const subject of this.subjects) {
            topicsBySubject[subject] = this.topics.filter((t) => t.subject === subject).length;
        }
        return {
            totalSubjects: this.subjects.length,
            totalTopics: this.topics.length,
            totalCases: this.cases.length,
            topicsBySubject,
            currentSubject: this.currentSubject,
            totalRuns: this.totalRuns,
            lastRunAt: this.lastRunAt,
        };
    }

    private addSubject(name: string): void {
        if (!this.subjects.includes(name)) {
            this.subjects.push(name);
        }
    }

    private currentCycle(subject: string): number {
        return this.topics
            .filter((t) => t.subject === subject)
            .reduce((max, t) => Math.max(max, t.cycle), 1);
    }

    /**
     * New topics join the subject's current cycle; duplicates are skipped.
     */
    private insertTopics(subject: string, topics: TopicIdea[]): number {
        const cycle = this.currentCycle(subject);
        let added = 0;
        for (const idea of topics) {
            const topic = idea.topic.trim();
            const subtopic = idea.subtopic.trim();
            const duplicate = this.topics.some(
                (t) => t.subject === subject && t.topic === topic && t.subtopic === subtopic
            );
            if (duplicate || !topic || !subtopic) {
                continue;
            }
            this.topics.push({ id: this.nextId++, subject, topic, subtopic, cycle, used: false });
            added++;
        }
        return added;
    }
}
