import fs from 'fs';
import { createCanvas, SKRSContext2D } from '@napi-rs/canvas';
import { Background, SlideSpec, TextElement } from '../../domain/entities/SlideSpec';
import { ISlideRenderer, RenderedSlide } from '../../domain/ports/ISlideRenderer';
import { LayoutOptions, layoutSlide } from '../../domain/services/SlideLayout';
import { SlideStyle } from '../../domain/services/SlideStyles';
import { FontProvider } from './FontProvider';

/**
 * Draws slides onto a fixed-size canvas and writes them as PNG files.
 * One renderer serves every slide style; the style only supplies sizes,
 * colors and the background.
 */
export class CanvasSlideRenderer implements ISlideRenderer {
    private readonly layout: LayoutOptions;

    constructor(
        private readonly style: SlideStyle,
        private readonly fonts: FontProvider
    ) {
        this.layout = {
            canvas: style.canvas,
            marginX: style.marginX,
            lineSpacing: style.lineSpacing,
        };
    }

    async render(slide: SlideSpec, outputPath: string): Promise<RenderedSlide> {
        const { width, height } = this.style.canvas;
        const canvas = createCanvas(width, height);
        const ctx = canvas.getContext('2d');

        this.paintBackground(ctx, this.style.background);

        ctx.textBaseline = 'top';
        const lines = layoutSlide(slide, this.layout, (element) => {
            this.applyFont(ctx, element);
            return (text: string) => ctx.measureText(text).width;
        });

        for (const line of lines) {
            this.applyFont(ctx, line.element);
            ctx.fillStyle = line.element.color;
            ctx.fillText(line.text, line.x, line.y);
        }

        const png = await canvas.encode('png');
        await fs.promises.writeFile(outputPath, png);

        return { imagePath: outputPath, width, height };
    }

    private applyFont(ctx: SKRSContext2D, element: TextElement): void {
        ctx.font = this.fonts.resolve(this.style.fontFamily, element.fontSize, element.bold).css;
    }

    private paintBackground(ctx: SKRSContext2D, background: Background): void {
        const { width, height } = this.style.canvas;
        if (background.kind === 'solid') {
            ctx.fillStyle = background.color;
        } else {
            const gradient = ctx.createLinearGradient(0, 0, 0, height);
            gradient.addColorStop(0, background.from);
            gradient.addColorStop(1, background.to);
            ctx.fillStyle = gradient;
        }
        ctx.fillRect(0, 0, width, height);
    }
}
