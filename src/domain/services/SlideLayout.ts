import { SlideSpec, TextElement } from '../entities/SlideSpec';
import {
    MeasureText,
    centeredX,
    fitToWidth,
    lineAdvance,
    truncateToBudget,
    wrapText,
} from './TextLayout';

export interface LayoutOptions {
    canvas: { width: number; height: number };
    marginX: number;
    lineSpacing: number;
}

/**
 * One line of text at its final position. y is the top of the line.
 */
export interface PositionedLine {
    text: string;
    x: number;
    y: number;
    width: number;
    element: TextElement;
}

/**
 * Returns a measuring function for the font an element resolves to.
 */
export type MeasureFor = (element: TextElement) => MeasureText;

/**
 * Widest a line of the element may be.
 */
export function maxLineWidth(element: TextElement, options: LayoutOptions): number {
    if (element.wrapWidth !== undefined) {
        return element.wrapWidth;
    }
    const left = element.align === 'left' ? element.x ?? options.marginX : options.marginX;
    return Math.max(1, options.canvas.width - left - options.marginX);
}

/**
 * Splits an element into the lines it is drawn as.
 * Wrapped elements are packed by pixel width; single-line fields are cut to
 * their character budget and then shortened until they fit.
 */
export function linesFor(element: TextElement, measure: MeasureText, options: LayoutOptions): string[] {
    const text = element.maxChars !== undefined
        ? truncateToBudget(element.text.trim(), element.maxChars)
        : element.text.trim();
    if (!text) {
        return [];
    }

    const maxWidth = maxLineWidth(element, options);
    if (element.wrapWidth !== undefined) {
        return wrapText(text, maxWidth, measure);
    }
    return [fitToWidth(text, maxWidth, measure)];
}

/**
 * Positions every line of a slide. Lines that would start below the canvas
 * are dropped so nothing is drawn off-slide.
 */
export function layoutSlide(slide: SlideSpec, options: LayoutOptions, measureFor: MeasureFor): PositionedLine[] {
    const positioned: PositionedLine[] = [];
    let cursor = 0;

    for (const element of slide.elements) {
        const measure = measureFor(element);
        const lines = linesFor(element, measure, options);
        const advance = lineAdvance(element.fontSize, options.lineSpacing);
        const top = element.flow ? cursor + element.y : element.y;

        lines.forEach((text, i) => {
            const y = top + i * advance;
            if (y + element.fontSize > options.canvas.height) {
                return;
            }
            const width = measure(text);
            const x = element.align === 'center'
                ? centeredX(options.canvas.width, width)
                : element.x ?? options.marginX;
            positioned.push({ text, x, y, width, element });
        });

        cursor = lines.length > 0 ? top + (lines.length - 1) * advance + element.fontSize : top;
    }

    return positioned;
}
