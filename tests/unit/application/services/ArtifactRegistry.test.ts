import fs from 'fs';
import os from 'os';
import path from 'path';
import { ArtifactRegistry, withArtifactRegistry } from '../../../../src/application/services/ArtifactRegistry';

describe('ArtifactRegistry', () => {
    let baseDir: string;
    let logSpy: jest.SpyInstance;

    beforeEach(async () => {
        baseDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'artifacts-test-'));
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(async () => {
        logSpy.mockRestore();
        await fs.promises.rm(baseDir, { recursive: true, force: true });
    });

    test('should create a run directory under the base directory', async () => {
        const registry = await ArtifactRegistry.create({ baseDir });

        expect(path.dirname(registry.dir)).toBe(baseDir);
        expect(path.basename(registry.dir).startsWith(`lesson-video-${registry.runId.slice(0, 8)}-`)).toBe(true);
        expect(fs.existsSync(registry.dir)).toBe(true);

        await registry.release();
    });

    test('should register allocated paths before anything is written', async () => {
        const registry = await ArtifactRegistry.create({ baseDir });

        const imagePath = registry.allocate('slide_00_case.png');

        expect(imagePath).toBe(path.join(registry.dir, 'slide_00_case.png'));
        expect(registry.paths).toEqual([imagePath]);
        expect(fs.existsSync(imagePath)).toBe(false);

        await registry.release();
    });

    test('should reject names that leave the run directory', async () => {
        const registry = await ArtifactRegistry.create({ baseDir });

        expect(() => registry.allocate('../escape.png')).toThrow('Artifact name must be a plain file name: ../escape.png');

        await registry.release();
    });

    test('should delete every artifact and the run directory on release', async () => {
        const registry = await ArtifactRegistry.create({ baseDir });
        const inside = registry.allocate('a.mp3');
        await fs.promises.writeFile(inside, 'audio');
        const outside = registry.register(path.join(baseDir, 'external.tmp'));
        await fs.promises.writeFile(outside, 'tmp');

        await registry.release();

        expect(fs.existsSync(inside)).toBe(false);
        expect(fs.existsSync(outside)).toBe(false);
        expect(fs.existsSync(registry.dir)).toBe(false);
        expect(registry.isReleased).toBe(true);
        expect(registry.paths).toEqual([]);
    });

    test('should tolerate artifacts that were never written', async () => {
        const registry = await ArtifactRegistry.create({ baseDir });
        registry.allocate('never-written.mp4');

        await expect(registry.release()).resolves.toBeUndefined();
        expect(fs.existsSync(registry.dir)).toBe(false);
    });

    test('should make release idempotent and refuse later allocations', async () => {
        const registry = await ArtifactRegistry.create({ baseDir });

        await registry.release();
        await registry.release();

        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(() => registry.allocate('late.png')).toThrow(`Artifact registry ${registry.runId} was already released`);
    });

    describe('withArtifactRegistry', () => {
        test('should release after success', async () => {
            let dir = '';

            const result = await withArtifactRegistry(async (registry) => {
                dir = registry.dir;
                await fs.promises.writeFile(registry.allocate('x.png'), 'png');
                return 'done';
            }, { baseDir });

            expect(result).toBe('done');
            expect(fs.existsSync(dir)).toBe(false);
        });

        test('should release when the run throws', async () => {
            let dir = '';

            await expect(
                withArtifactRegistry(async (registry) => {
                    dir = registry.dir;
                    await fs.promises.writeFile(registry.allocate('x.png'), 'png');
                    throw new Error('render failed');
                }, { baseDir })
            ).rejects.toThrow('render failed');

            expect(dir).not.toBe('');
            expect(fs.existsSync(dir)).toBe(false);
            expect(await fs.promises.readdir(baseDir)).toEqual([]);
        });
    });
});
