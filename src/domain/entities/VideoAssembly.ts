import { Segment, getTotalDuration } from './Segment';

/**
 * How an over-long timeline is brought under the duration cap.
 * - 'hard-cut': keep every segment and cut the output at the cap, which may
 *   end the video mid-sentence on the last segment.
 * - 'drop-trailing': remove whole trailing segments until the rest fits;
 *   cut at the cap only when a single remaining segment is still too long.
 */
export type TruncationPolicy = 'hard-cut' | 'drop-trailing';

/**
 * VideoAssembly is the ordered timeline plus where and how to write it.
 */
export interface VideoAssembly {
    segments: readonly Segment[];
    outputPath: string;
    maxDurationSeconds: number;
    truncation: TruncationPolicy;
}

/**
 * The concrete concatenation to run for an assembly.
 */
export interface TimelinePlan {
    /** Segments to concatenate, in order */
    segments: Segment[];
    /** Sum of the kept segment durations */
    totalSeconds: number;
    /** Duration of the file that will be written */
    outputSeconds: number;
    /** Set when the output must be cut at this timestamp */
    cutAtSeconds?: number;
    /** Trailing segments removed by the drop-trailing policy */
    droppedSegments: number;
}

/**
 * Decides which segments are concatenated and where the output is cut.
 */
export function planTimeline(
    segments: readonly Segment[],
    maxDurationSeconds: number,
    truncation: TruncationPolicy
): TimelinePlan {
    if (maxDurationSeconds <= 0) {
        throw new Error('maxDurationSeconds must be positive');
    }

    const kept = [...segments].sort((a, b) => a.index - b.index);
    let droppedSegments = 0;

    if (truncation === 'drop-trailing') {
        while (kept.length > 1 && getTotalDuration(kept) > maxDurationSeconds) {
            kept.pop();
            droppedSegments++;
        }
    }

    const totalSeconds = getTotalDuration(kept);
    if (totalSeconds <= maxDurationSeconds) {
        return { segments: kept, totalSeconds, outputSeconds: totalSeconds, droppedSegments };
    }

    return {
        segments: kept,
        totalSeconds,
        outputSeconds: maxDurationSeconds,
        cutAtSeconds: maxDurationSeconds,
        droppedSegments,
    };
}
