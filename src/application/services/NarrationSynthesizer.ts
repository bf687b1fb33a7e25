import fs from 'fs';
import { AudioFormat, ITTSClient } from '../../domain/ports/ITTSClient';
import { withTimeout } from '../../infrastructure/resilience/RetryUtils';
import { ArtifactRegistry } from './ArtifactRegistry';

/**
 * The voice is fixed by the TTS client, so every slide of a run shares it.
 */
export interface NarrationOptions {
    speed?: number;
    format?: AudioFormat;
    timeoutMs: number;
}

/**
 * Turns slide narration into an audio artifact.
 *
 * Narration is optional for the video: any failure is logged and reported as
 * null so the slide falls back to silence instead of aborting the run.
 */
export class NarrationSynthesizer {
    constructor(
        private readonly tts: ITTSClient,
        private readonly options: NarrationOptions
    ) {
        if (options.timeoutMs <= 0) {
            throw new Error('Narration timeout must be positive');
        }
    }

    /**
     * @returns path of the written audio, or null when the slide stays silent
     */
    async synthesize(
        text: string | undefined,
        registry: ArtifactRegistry,
        name: string
    ): Promise<string | null> {
        if (!text || !text.trim()) {
            return null;
        }

        const format = this.options.format ?? 'mp3';
        try {
            const result = await withTimeout(
                this.tts.synthesize(text, {
                    speed: this.options.speed,
                    format,
                    timeoutMs: this.options.timeoutMs,
                }),
                this.options.timeoutMs,
                `Narration for ${name}`
            );

            const audioPath = registry.allocate(`${name}.${result.format}`);
            await fs.promises.writeFile(audioPath, result.audio);
            console.log(`[Narration] ${name}: ${result.audio.length} bytes`);
            return audioPath;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Narration] ⚠️ ${name} will be silent: ${message}`);
            return null;
        }
    }
}
