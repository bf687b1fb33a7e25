import fs from 'fs';
import path from 'path';
import { VideoAssembly, planTimeline } from '../../domain/entities/VideoAssembly';
import { AssemblyError } from '../../domain/errors/PipelineErrors';
import { IMediaEncoder } from '../../domain/ports/IMediaEncoder';
import { ArtifactRegistry } from './ArtifactRegistry';

export interface AssemblyResult {
    outputPath: string;
    /** Length of the written file */
    durationSeconds: number;
    /** Sum of the concatenated segments before any cut */
    timelineSeconds: number;
    /** True when the cap removed content */
    truncated: boolean;
    segmentCount: number;
    droppedSegments: number;
}

/**
 * Concatenates encoded segments, in order, into the final file under the
 * duration cap. Segments share one format, so no re-encoding takes place.
 */
export class TimelineAssembler {
    constructor(private readonly encoder: IMediaEncoder) { }

    async assemble(assembly: VideoAssembly, registry: ArtifactRegistry): Promise<AssemblyResult> {
        if (assembly.segments.length === 0) {
            throw new AssemblyError('Cannot assemble an empty timeline');
        }

        const plan = planTimeline(assembly.segments, assembly.maxDurationSeconds, assembly.truncation);
        if (plan.droppedSegments > 0) {
            console.warn(`[Timeline] Dropped ${plan.droppedSegments} trailing segment(s) to stay under ${assembly.maxDurationSeconds}s`);
        }
        if (plan.cutAtSeconds !== undefined) {
            console.warn(`[Timeline] ${plan.totalSeconds.toFixed(2)}s timeline cut at ${plan.cutAtSeconds}s`);
        }

        const listPath = registry.allocate('concat.txt');
        await fs.promises.writeFile(listPath, concatList(plan.segments.map((s) => s.videoPath)));

        try {
            await fs.promises.mkdir(path.dirname(assembly.outputPath), { recursive: true });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new AssemblyError(`Output directory for ${assembly.outputPath} is not writable: ${message}`);
        }

        try {
            await this.encoder.concat({
                listPath,
                outputPath: assembly.outputPath,
                maxDurationSeconds: plan.cutAtSeconds,
            });
        } catch (error) {
            await fs.promises.rm(assembly.outputPath, { force: true });
            throw error;
        }

        console.log(`[Timeline] Wrote ${assembly.outputPath} (${plan.outputSeconds.toFixed(2)}s, ${plan.segments.length} segments)`);

        return {
            outputPath: assembly.outputPath,
            durationSeconds: plan.outputSeconds,
            timelineSeconds: plan.totalSeconds,
            truncated: plan.cutAtSeconds !== undefined || plan.droppedSegments > 0,
            segmentCount: plan.segments.length,
            droppedSegments: plan.droppedSegments,
        };
    }
}

/**
 * Concat-demuxer list: one quoted absolute path per line.
 */
export function concatList(paths: readonly string[]): string {
    return paths
        .map((p) => `file '${path.resolve(p).replace(/'/g, "'\\''")}'`)
        .join('\n') + '\n';
}
