import { Segment, SegmentFormat, createSegment } from '../../domain/entities/Segment';
import { EncodingError } from '../../domain/errors/PipelineErrors';
import { IMediaEncoder } from '../../domain/ports/IMediaEncoder';
import { ArtifactRegistry } from './ArtifactRegistry';

export interface SegmentEncoderOptions {
    format: SegmentFormat;
    /** Added after narration so the last word is not clipped */
    tailBufferSeconds: number;
}

export interface SegmentInput {
    index: number;
    /** Used for artifact names */
    name: string;
    imagePath: string;
    audioPath: string | null;
    defaultDurationSeconds: number;
}

/**
 * Encodes one slide (still image + narration or silence) into a video clip.
 * Every clip of a run uses the same SegmentFormat. Encoder failures propagate.
 */
export class SegmentEncoder {
    constructor(
        private readonly encoder: IMediaEncoder,
        private readonly options: SegmentEncoderOptions
    ) {
        if (options.tailBufferSeconds < 0) {
            throw new Error('Tail buffer cannot be negative');
        }
    }

    get format(): SegmentFormat {
        return this.options.format;
    }

    async encode(input: SegmentInput, registry: ArtifactRegistry): Promise<Segment> {
        const durationSeconds = await this.resolveDuration(input);

        let audioPath = input.audioPath;
        if (!audioPath) {
            audioPath = registry.allocate(`${input.name}_silence.m4a`);
            await this.encoder.generateSilence(audioPath, durationSeconds, this.options.format);
        }

        const videoPath = registry.allocate(`${input.name}.mp4`);
        await this.encoder.encodeStill({
            imagePath: input.imagePath,
            audioPath,
            durationSeconds,
            outputPath: videoPath,
            format: this.options.format,
        });

        console.log(`[Segment] ${input.name}: ${durationSeconds.toFixed(2)}s${input.audioPath ? '' : ' (silent)'}`);

        return createSegment({
            index: input.index,
            videoPath,
            imagePath: input.imagePath,
            audioPath,
            silent: input.audioPath === null,
            durationSeconds,
        });
    }

    /**
     * Narrated slides last as long as their audio plus the tail buffer.
     * Silent slides, and slides whose audio cannot be probed, use the default.
     */
    private async resolveDuration(input: SegmentInput): Promise<number> {
        if (input.audioPath) {
            try {
                const probed = await this.encoder.probeDuration(input.audioPath);
                return probed + this.options.tailBufferSeconds;
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.warn(`[Segment] Could not probe ${input.audioPath}, using default duration: ${message}`);
            }
        }

        if (!Number.isFinite(input.defaultDurationSeconds) || input.defaultDurationSeconds <= 0) {
            throw new EncodingError(`No usable duration for segment ${input.name}`);
        }
        return input.defaultDurationSeconds;
    }
}
