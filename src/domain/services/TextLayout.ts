/**
 * Text layout helpers shared by the slide renderer and its tests.
 * Widths are rendered pixels reported by a measuring function bound to the
 * resolved font, never character counts.
 */

export type MeasureText = (text: string) => number;

export const ELLIPSIS = '...';

/** Line advance as a multiple of the font size. */
export const DEFAULT_LINE_SPACING = 1.4;

/**
 * Greedily packs words into lines no wider than maxWidth.
 * A word that is wider than maxWidth on its own is broken by characters.
 */
export function wrapText(text: string, maxWidth: number, measure: MeasureText): string[] {
    const words = text.split(/\s+/).filter(Boolean);
    const lines: string[] = [];
    let current = '';

    for (const word of words) {
        const candidate = current ? `${current} ${word}` : word;
        if (measure(candidate) <= maxWidth) {
            current = candidate;
            continue;
        }

        if (current) {
            lines.push(current);
        }
        current = word;

        if (measure(current) > maxWidth) {
            const pieces = breakWord(current, maxWidth, measure);
            lines.push(...pieces.slice(0, -1));
            current = pieces[pieces.length - 1] ?? '';
        }
    }

    if (current) {
        lines.push(current);
    }
    return lines;
}

function breakWord(word: string, maxWidth: number, measure: MeasureText): string[] {
    const pieces: string[] = [];
    let piece = '';
    for (const ch of Array.from(word)) {
        if (piece && measure(piece + ch) > maxWidth) {
            pieces.push(piece);
            piece = ch;
        } else {
            piece += ch;
        }
    }
    if (piece) {
        pieces.push(piece);
    }
    return pieces;
}

/**
 * Cuts text longer than maxChars to maxChars - 3 characters plus "...".
 */
export function truncateToBudget(text: string, maxChars: number): string {
    if (text.length <= maxChars) {
        return text;
    }
    const keep = Math.max(0, maxChars - ELLIPSIS.length);
    return text.slice(0, keep) + ELLIPSIS;
}

/**
 * Shortens a single line until it is no wider than maxWidth, ending in "...".
 */
export function fitToWidth(text: string, maxWidth: number, measure: MeasureText): string {
    if (measure(text) <= maxWidth) {
        return text;
    }
    let base = text.endsWith(ELLIPSIS) ? text.slice(0, -ELLIPSIS.length) : text;
    while (base.length > 0 && measure(base + ELLIPSIS) > maxWidth) {
        base = base.slice(0, -1);
    }
    return base + ELLIPSIS;
}

/**
 * Vertical distance between consecutive lines of one element.
 */
export function lineAdvance(fontSize: number, spacing: number = DEFAULT_LINE_SPACING): number {
    return Math.round(fontSize * spacing);
}

/**
 * Left edge that centers a line of the given width on the canvas.
 */
export function centeredX(canvasWidth: number, lineWidth: number): number {
    return Math.max(0, (canvasWidth - lineWidth) / 2);
}
