import { SlideSpec } from '../entities/SlideSpec';

export interface RenderedSlide {
    imagePath: string;
    width: number;
    height: number;
}

/**
 * ISlideRenderer - Port for drawing a slide to a still image.
 * Implementations: CanvasSlideRenderer
 */
export interface ISlideRenderer {
    /**
     * Draws the slide and writes a PNG of the configured canvas size.
     */
    render(slide: SlideSpec, outputPath: string): Promise<RenderedSlide>;
}
