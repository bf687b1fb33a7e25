/**
 * Segment is one encoded (image + audio) clip of the final video.
 * Every segment of a run shares the same SegmentFormat so the timeline
 * can be concatenated without re-encoding.
 */
export interface Segment {
    /** Zero-based position in the timeline */
    readonly index: number;
    /** Encoded clip on disk */
    readonly videoPath: string;
    /** Still image the clip loops */
    readonly imagePath: string;
    /** Audio track muxed into the clip (narration or generated silence) */
    readonly audioPath: string;
    /** True when the audio track is generated silence */
    readonly silent: boolean;
    /** Resolved clip length in seconds */
    readonly durationSeconds: number;
}

/**
 * Creates a frozen Segment with validated properties.
 */
export function createSegment(params: {
    index: number;
    videoPath: string;
    imagePath: string;
    audioPath: string;
    silent: boolean;
    durationSeconds: number;
}): Segment {
    if (params.index < 0) {
        throw new Error('Segment index must be non-negative');
    }
    if (!params.videoPath.trim()) {
        throw new Error('Segment videoPath cannot be empty');
    }
    if (!params.imagePath.trim()) {
        throw new Error('Segment imagePath cannot be empty');
    }
    if (!params.audioPath.trim()) {
        throw new Error('Segment audioPath cannot be empty');
    }
    if (!Number.isFinite(params.durationSeconds) || params.durationSeconds <= 0) {
        throw new Error('Segment durationSeconds must be a positive number');
    }

    return Object.freeze({ ...params });
}

/**
 * Sums the durations of a timeline, in seconds.
 */
export function getTotalDuration(segments: readonly Segment[]): number {
    return segments.reduce((sum, s) => sum + s.durationSeconds, 0);
}

/**
 * Encoding parameters shared by every segment of a run.
 */
export interface SegmentFormat {
    width: number;
    height: number;
    fps: number;
    videoCodec: string;
    pixelFormat: string;
    /** x264 tune; "stillimage" suits looped slides */
    tune: string;
    preset: string;
    audioCodec: string;
    audioBitrate: string;
    audioSampleRate: number;
    audioChannels: number;
}

export const DEFAULT_SEGMENT_FORMAT: SegmentFormat = {
    width: 1080,
    height: 1920,
    fps: 30,
    videoCodec: 'libx264',
    pixelFormat: 'yuv420p',
    tune: 'stillimage',
    preset: 'medium',
    audioCodec: 'aac',
    audioBitrate: '192k',
    audioSampleRate: 44100,
    audioChannels: 2,
};
