const MAX_PART_LENGTH = 30;

/**
 * Keeps letters, digits, spaces, hyphens and underscores; trims and shortens.
 */
export function sanitizeNamePart(value: string, maxLength: number = MAX_PART_LENGTH): string {
    const cleaned = Array.from(value)
        .filter((ch) => /[\p{L}\p{N} _-]/u.test(ch))
        .join('')
        .trim()
        .slice(0, maxLength)
        .trim();
    return cleaned || 'untitled';
}

/**
 * Deterministic, filesystem-safe output name for a lesson video.
 */
export function buildOutputFileName(topic: string, subtopic: string): string {
    return `${sanitizeNamePart(topic)}_${sanitizeNamePart(subtopic)}.mp4`;
}
