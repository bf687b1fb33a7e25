import fs from 'fs';
import os from 'os';
import path from 'path';
import { InMemoryTopicRepository, TopicSeed } from '../../../../src/infrastructure/topics/InMemoryTopicRepository';

const SEED: TopicSeed = {
    subjects: [
        {
            name: 'Internal Medicine',
            topics: [
                { topic: 'Heart Failure', subtopic: 'Acute' },
                { topic: 'Asthma', subtopic: 'Acute Severe' },
            ],
        },
        { name: 'Surgery', topics: [{ topic: 'Appendicitis', subtopic: 'Diagnosis' }] },
    ],
};

describe('InMemoryTopicRepository', () => {
    const fixedNow = new Date('2026-01-15T08:00:00.000Z');
    let repo: InMemoryTopicRepository;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        repo = new InMemoryTopicRepository(SEED, () => fixedNow);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('subject rotation', () => {
        test('should start with the first subject', async () => {
            await expect(repo.nextSubject()).resolves.toBe('Internal Medicine');
        });

        test('should move on after each completed run and wrap around', async () => {
            await repo.completeRun('Internal Medicine');
            await expect(repo.nextSubject()).resolves.toBe('Surgery');

            await repo.completeRun('Surgery');
            await expect(repo.nextSubject()).resolves.toBe('Internal Medicine');
        });

        test('should have no subject when empty', async () => {
            await expect(new InMemoryTopicRepository().nextSubject()).resolves.toBeNull();
        });
    });

    describe('topic cycles', () => {
        test('should serve topics in insertion order', async () => {
            const first = await repo.nextUnusedTopic('Internal Medicine');
            expect(first).toEqual({ id: 1, subject: 'Internal Medicine', topic: 'Heart Failure', subtopic: 'Acute', cycle: 1, used: false });

            await repo.markUsed(1);
            await expect(repo.nextUnusedTopic('Internal Medicine')).resolves.toMatchObject({ id: 2, topic: 'Asthma' });
        });

        test('should refuse a new cycle while topics remain', async () => {
            await repo.markUsed(1);

            await expect(repo.startNewCycle('Internal Medicine')).resolves.toBe(false);
        });

        test('should re-queue every topic once the cycle is used up', async () => {
            await repo.markUsed(1);
            await repo.markUsed(2);
            await expect(repo.nextUnusedTopic('Internal Medicine')).resolves.toBeNull();

            await expect(repo.startNewCycle('Internal Medicine')).resolves.toBe(true);

            await expect(repo.nextUnusedTopic('Internal Medicine')).resolves.toMatchObject({ id: 1, cycle: 2, used: false });
        });

        test('should refuse a new cycle for a subject without topics', async () => {
            await expect(repo.startNewCycle('Pediatrics')).resolves.toBe(false);
        });

        test('should reject an unknown topic id', async () => {
            await expect(repo.markUsed(99)).rejects.toThrow('Unknown topic id 99');
        });

        test('should not expose internal records', async () => {
            const topic = await repo.nextUnusedTopic('Surgery');
            if (!topic) {
                throw new Error('expected a topic');
            }
            topic.used = true;

            await expect(repo.nextUnusedTopic('Surgery')).resolves.toMatchObject({ used: false });
        });
    });

    describe('addTopics', () => {
        test('should skip duplicates and blank ideas', async () => {
            const added = await repo.addTopics('Internal Medicine', [
                { topic: ' Heart Failure ', subtopic: 'Acute' },
                { topic: 'Diabetes', subtopic: 'DKA' },
                { topic: ' ', subtopic: 'Nothing' },
            ]);

            expect(added).toBe(1);
            await expect(repo.countTopics('Internal Medicine')).resolves.toBe(3);
        });

        test('should register a new subject at the end of the rotation', async () => {
            await repo.addTopics('Pediatrics', [{ topic: 'Croup', subtopic: 'Management' }]);

            await expect(repo.listSubjects()).resolves.toEqual(['Internal Medicine', 'Surgery', 'Pediatrics']);
        });

        test('should add new topics to the current cycle', async () => {
            await repo.markUsed(3);
            await repo.startNewCycle('Surgery');

            await repo.addTopics('Surgery', [{ topic: 'Hernia', subtopic: 'Inguinal' }]);

            const hernia = repo.toState().topics.find((t) => t.topic === 'Hernia');
            expect(hernia).toMatchObject({ id: 4, cycle: 2, used: false });
        });
    });

    describe('statistics', () => {
        test('should count subjects, topics, cases and runs', async () => {
            await repo.recordCase({
                topicId: 1,
                caseText: 'Case.',
                mnemonic: 'M',
                videoPath: '/videos/a.mp4',
                videoUrl: null,
                telegramMessageId: '42',
                createdAt: fixedNow,
            });
            await repo.completeRun('Internal Medicine');

            await expect(repo.getStatistics()).resolves.toEqual({
                totalSubjects: 2,
                totalTopics: 3,
                totalCases: 1,
                topicsBySubject: { 'Internal Medicine': 2, Surgery: 1 },
                currentSubject: 'Internal Medicine',
                totalRuns: 1,
                lastRunAt: fixedNow,
            });
        });
    });

    describe('state snapshots', () => {
        test('should restore rotation, cycles and id sequence', async () => {
            await repo.markUsed(1);
            await repo.completeRun('Internal Medicine');

            const restored = InMemoryTopicRepository.fromState(repo.toState());

            await expect(restored.nextSubject()).resolves.toBe('Surgery');
            await expect(restored.nextUnusedTopic('Internal Medicine')).resolves.toMatchObject({ id: 2 });
            await restored.addTopics('Surgery', [{ topic: 'Hernia', subtopic: 'Inguinal' }]);
            expect(restored.toState().topics.map((t) => t.id)).toEqual([1, 2, 3, 4]);
            expect(restored.toState().lastRunAt).toBe('2026-01-15T08:00:00.000Z');
        });
    });

    describe('fromFile', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'topics-test-'));
        });

        afterEach(async () => {
            await fs.promises.rm(dir, { recursive: true, force: true });
        });

        test('should load a seed file', async () => {
            const file = path.join(dir, 'topics.json');
            await fs.promises.writeFile(file, JSON.stringify(SEED));

            const loaded = await InMemoryTopicRepository.fromFile(file);

            await expect(loaded.countTopics('Internal Medicine')).resolves.toBe(2);
        });

        test('should reject a malformed seed file', async () => {
            const file = path.join(dir, 'topics.json');
            await fs.promises.writeFile(file, JSON.stringify({ subjects: [{ name: 'Surgery' }] }));

            await expect(InMemoryTopicRepository.fromFile(file)).rejects.toThrow(
                `Invalid topics file ${file}: /subjects/0 must have required property 'topics'`
            );
        });

        test('should load the bundled topics file', async () => {
            const loaded = await InMemoryTopicRepository.fromFile(path.join(__dirname, '../../../../data/topics.json'));

            await expect(loaded.listSubjects()).resolves.toContain('Internal Medicine');
        });
    });
});
