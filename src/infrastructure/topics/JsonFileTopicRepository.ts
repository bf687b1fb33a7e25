import fs from 'fs';
import path from 'path';
import Ajv from 'ajv';
import { v4 as uuidv4 } from 'uuid';
import { TopicIdea } from '../../domain/ports/IContentGenerator';
import {
    CaseRecord,
    ITopicRepository,
    RotationStatistics,
    TopicRecord,
} from '../../domain/ports/ITopicRepository';
import { InMemoryTopicRepository, RotationState } from './InMemoryTopicRepository';

const nullableString = { type: ['string', 'null'] };

const stateSchema = {
    type: 'object',
    properties: {
        subjects: { type: 'array', items: { type: 'string' } },
        topics: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    id: { type: 'integer', minimum: 1 },
                    subject: { type: 'string' },
                    topic: { type: 'string' },
                    subtopic: { type: 'string' },
                    cycle: { type: 'integer', minimum: 1 },
                    used: { type: 'boolean' },
                },
                required: ['id', 'subject', 'topic', 'subtopic', 'cycle', 'used'],
            },
        },
        cases: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    topicId: { type: 'integer' },
                    caseText: { type: 'string' },
                    mnemonic: { type: 'string' },
                    videoPath: nullableString,
                    videoUrl: nullableString,
                    telegramMessageId: nullableString,
                    createdAt: { type: 'string' },
                },
                required: ['topicId', 'caseText', 'mnemonic', 'videoPath', 'videoUrl', 'telegramMessageId', 'createdAt'],
            },
        },
        currentSubject: nullableString,
        totalRuns: { type: 'integer', minimum: 0 },
        lastRunAt: nullableString,
    },
    required: ['subjects', 'topics', 'cases', 'currentSubject', 'totalRuns', 'lastRunAt'],
};

const validateState = new Ajv({ allErrors: true, allowUnionTypes: true }).compile<RotationState>(stateSchema);

/**
 * Topic rotation that survives restarts.
 *
 * State lives in memory and is written to a JSON file after every change.
 * On first start the repository is seeded from the topics file.
 */
export class JsonFileTopicRepository implements ITopicRepository {
    private constructor(
        private readonly inner: InMemoryTopicRepository,
        private readonly statePath: string
    ) { }

    static async open(statePath: string, seedPath: string, now?: () => Date): Promise<JsonFileTopicRepository> {
        if (fs.existsSync(statePath)) {
            const raw: unknown = JSON.parse(await fs.promises.readFile(statePath, 'utf-8'));
            if (!validateState(raw)) {
                const problems = (validateState.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
                throw new Error(`Invalid rotation state ${statePath}: ${problems.join('; ')}`);
            }
            const repo = new JsonFileTopicRepository(InMemoryTopicRepository.fromState(raw, now), statePath);
            console.log(`[Topics] Loaded ${raw.topics.length} topics from ${statePath}`);
            return repo;
        }

        const repo = new JsonFileTopicRepository(await InMemoryTopicRepository.fromFile(seedPath, now), statePath);
        await repo.save();
        console.log(`[Topics] Seeded rotation state from ${seedPath}`);
        return repo;
    }

    listSubjects(): Promise<string[]> {
        return this.inner.listSubjects();
    }

    nextSubject(): Promise<string | null> {
        return this.inner.nextSubject();
    }

    nextUnusedTopic(subject: string): Promise<TopicRecord | null> {
        return this.inner.nextUnusedTopic(subject);
    }

    async startNewCycle(subject: string): Promise<boolean> {
        const started = await this.inner.startNewCycle(subject);
        if (started) {
            await this.save();
        }
        return started;
    }

    async markUsed(topicId: number): Promise<void> {
        await this.inner.markUsed(topicId);
        await this.save();
    }

    async addTopics(subject: string, topics: TopicIdea[]): Promise<number> {
        const added = await this.inner.addTopics(subject, topics);
        await this.save();
        return added;
    }

    countTopics(subject: string): Promise<number> {
        return this.inner.countTopics(subject);
    }

    async recordCase(record: CaseRecord): Promise<void> {
        await this.inner.recordCase(record);
        await this.save();
    }

    async completeRun(subject: string): Promise<void> {
        await this.inner.completeRun(subject);
        await this.save();
    }

    getStatistics(): Promise<RotationStatistics> {
        return this.inner.getStatistics();
    }

    /**
     * Writes a sibling temp file and renames it over the state file.
     */
    private async save(): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.statePath), { recursive: true });
        const tempPath = `${this.statePath}.${uuidv4()}.tmp`;
        try {
            await fs.promises.writeFile(tempPath, JSON.stringify(this.inner.toState(), null, 2));
            await fs.promises.rename(tempPath, this.statePath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw error;
        }
    }
}
