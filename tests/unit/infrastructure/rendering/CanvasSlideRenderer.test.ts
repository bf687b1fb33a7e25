import fs from 'fs';
import os from 'os';
import path from 'path';
import { SlideSpec } from '../../../../src/domain/entities/SlideSpec';
import { resolveSlideStyle } from '../../../../src/domain/services/SlideStyles';
import { buildSlides } from '../../../../src/domain/services/SlideTemplates';
import { CanvasSlideRenderer } from '../../../../src/infrastructure/rendering/CanvasSlideRenderer';
import { FontProvider } from '../../../../src/infrastructure/rendering/FontProvider';
import { makeLesson } from '../../../fixtures/lessons';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function pngSize(file: Buffer): { width: number; height: number } {
    // IHDR is the first chunk: width and height follow the chunk type
    return { width: file.readUInt32BE(16), height: file.readUInt32BE(20) };
}

describe('CanvasSlideRenderer', () => {
    let dir: string;
    let warnSpy: jest.SpyInstance;

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'slides-test-'));
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(async () => {
        warnSpy.mockRestore();
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    function renderer(styleName: 'classic' | 'premium', width: number, height: number): CanvasSlideRenderer {
        const style = resolveSlideStyle(styleName, { width, height });
        const fonts = new FontProvider({
            skipDefaults: true,
            registry: { registerFromPath: () => null, has: () => false },
        });
        return new CanvasSlideRenderer(style, fonts);
    }

    test('should write a PNG with the configured dimensions', async () => {
        const slide: SlideSpec = {
            name: 'test',
            elements: [{ text: 'Hello', fontSize: 40, color: '#FFFFFF', y: 100, align: 'center', wrapWidth: 300 }],
            defaultDurationSeconds: 3,
        };
        const outputPath = path.join(dir, 'slide.png');

        const result = await renderer('classic', 360, 640).render(slide, outputPath);

        const file = await fs.promises.readFile(outputPath);
        expect(result).toEqual({ imagePath: outputPath, width: 360, height: 640 });
        expect(file.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
        expect(pngSize(file)).toEqual({ width: 360, height: 640 });
    });

    test('should render every slide of a lesson, including very long text', async () => {
        const lesson = makeLesson({ caseText: 'Severe central chest pain radiating to the jaw. '.repeat(40) });
        lesson.caseQuestions[0].options.A = 'An extremely long distractor option '.repeat(6);
        const slides = buildSlides(lesson, 'Cardiology', 'Acute coronary syndrome', resolveSlideStyle('premium'));
        const subject = renderer('premium', 270, 480);

        for (const [i, slide] of slides.entries()) {
            const outputPath = path.join(dir, `slide_${i}.png`);
            await subject.render(slide, outputPath);
            expect(pngSize(await fs.promises.readFile(outputPath))).toEqual({ width: 270, height: 480 });
        }
    });

    test('should fail when the output directory does not exist', async () => {
        const slide: SlideSpec = { name: 'empty', elements: [], defaultDurationSeconds: 3 };

        await expect(
            renderer('classic', 100, 100).render(slide, path.join(dir, 'missing', 'slide.png'))
        ).rejects.toThrow();
    });
});
