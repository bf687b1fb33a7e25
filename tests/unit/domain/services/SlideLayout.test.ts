import { SlideSpec, TextElement } from '../../../../src/domain/entities/SlideSpec';
import {
    LayoutOptions,
    layoutSlide,
    linesFor,
    maxLineWidth,
} from '../../../../src/domain/services/SlideLayout';

const options: LayoutOptions = {
    canvas: { width: 1080, height: 1920 },
    marginX: 60,
    lineSpacing: 1.4,
};

const tenPx = (text: string) => text.length * 10;

function element(overrides: Partial<TextElement>): TextElement {
    return {
        text: 'text',
        fontSize: 40,
        color: '#FFFFFF',
        y: 0,
        align: 'center',
        ...overrides,
    };
}

function slide(elements: TextElement[]): SlideSpec {
    return { name: 'test', elements, defaultDurationSeconds: 3 };
}

describe('SlideLayout', () => {
    describe('maxLineWidth', () => {
        test('should use the wrap width when set', () => {
            expect(maxLineWidth(element({ wrapWidth: 500 }), options)).toBe(500);
        });

        test('should measure from x to the right margin for left-aligned text', () => {
            expect(maxLineWidth(element({ align: 'left', x: 80 }), options)).toBe(940);
        });

        test('should keep both margins for centered text', () => {
            expect(maxLineWidth(element({}), options)).toBe(960);
        });
    });

    describe('linesFor', () => {
        test('should cut a long option to its character budget', () => {
            const option = element({ text: `A) ${'z'.repeat(200)}`, align: 'left', x: 80, maxChars: 43 });

            const lines = linesFor(option, tenPx, options);

            expect(lines).toEqual([`A) ${'z'.repeat(37)}...`]);
        });

        test('should shorten a budgeted line further when it is still too wide', () => {
            const wide = (text: string) => text.length * 30;
            const option = element({ text: `A) ${'z'.repeat(200)}`, align: 'left', x: 80, maxChars: 43 });

            const [line] = linesFor(option, wide, options);

            expect(line).toBe(`A) ${'z'.repeat(25)}...`);
            expect(wide(line)).toBeLessThanOrEqual(940);
        });

        test('should wrap elements with a wrap width', () => {
            const body = element({ text: 'aaa bbb ccc', wrapWidth: 70 });
            expect(linesFor(body, tenPx, options)).toEqual(['aaa bbb', 'ccc']);
        });

        test('should return nothing for blank text', () => {
            expect(linesFor(element({ text: '   ' }), tenPx, options)).toEqual([]);
        });
    });

    describe('layoutSlide', () => {
        test('should stack flowing elements below the previous one', () => {
            const lines = layoutSlide(
                slide([
                    element({ text: 'Title', fontSize: 40, y: 100, wrapWidth: 960 }),
                    element({ text: 'aaa bbb ccc', fontSize: 20, y: 10, flow: true, align: 'left', x: 60, wrapWidth: 70 }),
                ]),
                options,
                () => tenPx
            );

            expect(lines.map(({ text, x, y, width }) => ({ text, x, y, width }))).toEqual([
                { text: 'Title', x: 515, y: 100, width: 50 },
                { text: 'aaa bbb', x: 60, y: 150, width: 70 },
                { text: 'ccc', x: 60, y: 178, width: 30 },
            ]);
        });

        test('should drop lines that would leave the canvas', () => {
            const lines = layoutSlide(
                slide([
                    element({ text: 'visible', y: 1800 }),
                    element({ text: 'hidden', y: 1900 }),
                ]),
                options,
                () => tenPx
            );

            expect(lines.map((l) => l.text)).toEqual(['visible']);
        });

        test('should keep every line inside the canvas width', () => {
            const text = 'A patient with chest pain radiating to the left arm and jaw for thirty minutes';
            const lines = layoutSlide(
                slide([element({ text, fontSize: 50, y: 200, wrapWidth: 960 })]),
                options,
                () => (t: string) => t.length * 28
            );

            expect(lines.length).toBeGreaterThan(1);
            for (const line of lines) {
                expect(line.x).toBeGreaterThanOrEqual(0);
                expect(line.x + line.width).toBeLessThanOrEqual(options.canvas.width);
            }
        });

        test('should leave the cursor in place for an empty flowing element', () => {
            const lines = layoutSlide(
                slide([
                    element({ text: 'Top', fontSize: 40, y: 100 }),
                    element({ text: '', fontSize: 40, y: 30, flow: true }),
                    element({ text: 'Next', fontSize: 40, y: 20, flow: true }),
                ]),
                options,
                () => tenPx
            );

            expect(lines.map((l) => [l.text, l.y])).toEqual([
                ['Top', 100],
                ['Next', 190],
            ]);
        });
    });
});
