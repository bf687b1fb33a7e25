/**
 * Raised when a lesson record does not match the shape the slide templates need.
 */
export class LessonValidationError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid lesson content: ${problems.join('; ')}`);
        this.name = 'LessonValidationError';
    }
}

/**
 * Raised when ffmpeg or ffprobe cannot produce an artifact.
 * Encoding failures abort the run; they are never retried.
 */
export class EncodingError extends Error {
    constructor(
        message: string,
        public readonly stderrTail?: string
    ) {
        super(stderrTail ? `${message}\nstderr: ${stderrTail}` : message);
        this.name = 'EncodingError';
    }
}

/**
 * Raised when the segment timeline cannot be turned into an output file.
 */
export class AssemblyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AssemblyError';
    }
}
