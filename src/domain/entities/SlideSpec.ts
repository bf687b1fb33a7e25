/**
 * RGB color as a CSS hex string, e.g. "#0F172A".
 */
export type HexColor = string;

export type TextAlign = 'center' | 'left';

/**
 * TextElement is the atomic drawable unit on a slide.
 */
export interface TextElement {
    text: string;
    /** Font size in pixels */
    fontSize: number;
    color: HexColor;
    /**
     * Top of the first line in pixels from the top of the canvas, or, when
     * `flow` is set, the gap below the previous element's last line.
     */
    y: number;
    flow?: boolean;
    align: TextAlign;
    /** Left edge for left-aligned text (ignored when centered) */
    x?: number;
    bold?: boolean;
    /** Wrap into lines no wider than this many rendered pixels */
    wrapWidth?: number;
    /** Character budget for a single-line field; longer text is cut and ends in "..." */
    maxChars?: number;
}

export type Background =
    | { kind: 'solid'; color: HexColor }
    | { kind: 'gradient'; from: HexColor; to: HexColor };

/**
 * SlideSpec describes one visual + narration unit of the final video.
 * Created per run from a lesson, stateless and consumed once.
 */
export interface SlideSpec {
    /** Short identifier used for artifact names and logs (e.g. "case", "think") */
    name: string;
    elements: TextElement[];
    /** Narration for the slide; absent or empty means the slide is silent */
    narration?: string;
    /** Duration used when no narration audio exists */
    defaultDurationSeconds: number;
}

export function hasNarration(slide: SlideSpec): boolean {
    return Boolean(slide.narration && slide.narration.trim());
}
