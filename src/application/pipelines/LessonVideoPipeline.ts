import path from 'path';
import { LessonContent } from '../../domain/entities/LessonContent';
import { Segment } from '../../domain/entities/Segment';
import { SlideSpec } from '../../domain/entities/SlideSpec';
import { TruncationPolicy } from '../../domain/entities/VideoAssembly';
import { ISlideRenderer } from '../../domain/ports/ISlideRenderer';
import { buildOutputFileName } from '../../domain/services/OutputNaming';
import { SlideStyle } from '../../domain/services/SlideStyles';
import { buildSlides } from '../../domain/services/SlideTemplates';
import { ArtifactRegistry, ArtifactRegistryOptions, withArtifactRegistry } from '../services/ArtifactRegistry';
import { NarrationSynthesizer } from '../services/NarrationSynthesizer';
import { SegmentEncoder } from '../services/SegmentEncoder';
import { TimelineAssembler } from '../services/TimelineAssembler';

export interface LessonVideoDependencies {
    renderer: ISlideRenderer;
    narrator: NarrationSynthesizer;
    segmentEncoder: SegmentEncoder;
    assembler: TimelineAssembler;
}

export interface LessonVideoOptions {
    style: SlideStyle;
    outputDir: string;
    maxDurationSeconds: number;
    truncation: TruncationPolicy;
    /** Where run directories for temporary artifacts are created */
    artifacts?: ArtifactRegistryOptions;
}

export interface SlideReport {
    name: string;
    durationSeconds: number;
    silent: boolean;
}

export interface LessonVideoResult {
    outputPath: string;
    durationSeconds: number;
    slideCount: number;
    narratedSlides: number;
    truncated: boolean;
    droppedSegments: number;
    slides: SlideReport[];
}

/**
 * Turns a lesson into one vertical video.
 *
 * Slides are processed one at a time in order: render, narrate, encode.
 * The finished segments are then concatenated under the duration cap.
 * All temporary artifacts are removed when the run ends, whether it
 * succeeded or not.
 */
export class LessonVideoPipeline {
    constructor(
        private readonly deps: LessonVideoDependencies,
        private readonly options: LessonVideoOptions
    ) { }

    get style(): SlideStyle {
        return this.options.style;
    }

    async generate(lesson: LessonContent, topic: string, subtopic: string): Promise<LessonVideoResult> {
        const slides = buildSlides(lesson, topic, subtopic, this.options.style);
        const outputPath = path.join(this.options.outputDir, buildOutputFileName(topic, subtopic));
        console.log(`[Pipeline] ${slides.length} slides (${this.options.style.name}) -> ${outputPath}`);

        return withArtifactRegistry(async (registry) => {
            const segments: Segment[] = [];
            const reports: SlideReport[] = [];

            for (const [index, slide] of slides.entries()) {
                const name = `slide_${String(index).padStart(2, '0')}_${slide.name}`;
                console.log(`[Pipeline] Slide ${index + 1}/${slides.length}: ${slide.name}`);

                const segment = await this.processSlide(registry, index, name, slide);
                segments.push(segment);
                reports.push({ name: slide.name, durationSeconds: segment.durationSeconds, silent: segment.silent });
            }

            const assembled = await this.deps.assembler.assemble(
                {
                    segments,
                    outputPath,
                    maxDurationSeconds: this.options.maxDurationSeconds,
                    truncation: this.options.truncation,
                },
                registry
            );

            return {
                outputPath: assembled.outputPath,
                durationSeconds: assembled.durationSeconds,
                slideCount: slides.length,
                narratedSlides: reports.filter((r) => !r.silent).length,
                truncated: assembled.truncated,
                droppedSegments: assembled.droppedSegments,
                slides: reports,
            };
        }, this.options.artifacts);
    }

    private async processSlide(
        registry: ArtifactRegistry,
        index: number,
        name: string,
        slide: SlideSpec
    ): Promise<Segment> {
        const imagePath = registry.allocate(`${name}.png`);
        await this.deps.renderer.render(slide, imagePath);

        const audioPath = await this.deps.narrator.synthesize(slide.narration, registry, name);

        return this.deps.segmentEncoder.encode(
            { index, name, imagePath, audioPath, defaultDurationSeconds: slide.defaultDurationSeconds },
            registry
        );
    }
}
