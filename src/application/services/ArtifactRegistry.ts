import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export interface ArtifactRegistryOptions {
    /** Parent of the run's temp directory (default: os.tmpdir()) */
    baseDir?: string;
}

/**
 * Owns every temporary file of one pipeline run.
 *
 * Paths are registered when they are handed out, before anything is written
 * to them, so a half-written artifact is still removed on release.
 */
export class ArtifactRegistry {
    private readonly artifacts = new Set<string>();
    private released = false;

    private constructor(
        readonly runId: string,
        readonly dir: string
    ) { }

    static async create(options: ArtifactRegistryOptions = {}): Promise<ArtifactRegistry> {
        const runId = uuidv4();
        const baseDir = options.baseDir ?? os.tmpdir();
        await fs.promises.mkdir(baseDir, { recursive: true });
        const dir = await fs.promises.mkdtemp(path.join(baseDir, `lesson-video-${runId.slice(0, 8)}-`));
        return new ArtifactRegistry(runId, dir);
    }

    /**
     * Returns a registered path for a new artifact inside the run directory.
     */
    allocate(fileName: string): string {
        if (this.released) {
            throw new Error(`Artifact registry ${this.runId} was already released`);
        }
        if (path.basename(fileName) !== fileName) {
            throw new Error(`Artifact name must be a plain file name: ${fileName}`);
        }
        return this.register(path.join(this.dir, fileName));
    }

    /**
     * Tracks a path created elsewhere so it is removed with the run.
     */
    register(filePath: string): string {
        this.artifacts.add(filePath);
        return filePath;
    }

    get paths(): readonly string[] {
        return [...this.artifacts];
    }

    get isReleased(): boolean {
        return this.released;
    }

    /**
     * Deletes every registered artifact and the run directory.
     * Safe to call more than once; failures are logged, never thrown.
     */
    async release(): Promise<void> {
        if (this.released) {
            return;
        }
        this.released = true;

        let failures = 0;
        for (const artifact of this.artifacts) {
            try {
                await fs.promises.rm(artifact, { force: true });
            } catch (error) {
                failures++;
                console.warn(`[Artifacts] Failed to delete ${artifact}:`, error);
            }
        }
        try {
            await fs.promises.rm(this.dir, { recursive: true, force: true });
        } catch (error) {
            failures++;
            console.warn(`[Artifacts] Failed to delete run directory ${this.dir}:`, error);
        }

        console.log(`[Artifacts] Released ${this.artifacts.size} artifact(s) for run ${this.runId}` +
            (failures ? ` (${failures} failure(s))` : ''));
        this.artifacts.clear();
    }
}

/**
 * Runs fn with a fresh registry and releases it on every exit path.
 */
export async function withArtifactRegistry<T>(
    fn: (registry: ArtifactRegistry) => Promise<T>,
    options?: ArtifactRegistryOptions
): Promise<T> {
    const registry = await ArtifactRegistry.create(options);
    try {
        return await fn(registry);
    } finally {
        await registry.release();
    }
}
