import { SegmentFormat } from '../entities/Segment';

export interface EncodeStillRequest {
    imagePath: string;
    audioPath: string;
    durationSeconds: number;
    outputPath: string;
    format: SegmentFormat;
}

export interface ConcatRequest {
    /** Concat-demuxer list file naming the segment files in order */
    listPath: string;
    outputPath: string;
    /** Cut the output at this timestamp when set */
    maxDurationSeconds?: number;
}

/**
 * IMediaEncoder - Port for the external encoding capability.
 * Every method either produces its output file or rejects with EncodingError.
 * Implementations: FluentFfmpegMediaEncoder
 */
export interface IMediaEncoder {
    /** Real duration of an audio or video file, in seconds */
    probeDuration(filePath: string): Promise<number>;

    /** Writes a silent audio track of exactly durationSeconds */
    generateSilence(outputPath: string, durationSeconds: number, format: SegmentFormat): Promise<void>;

    /** Loops one still image for the duration and muxes it with the audio */
    encodeStill(request: EncodeStillRequest): Promise<void>;

    /** Joins uniformly encoded segments without re-encoding */
    concat(request: ConcatRequest): Promise<void>;
}
