import { spawn } from 'child_process';
import ffmpeg, { FfmpegCommand } from 'fluent-ffmpeg';
import { SegmentFormat } from '../../domain/entities/Segment';
import { EncodingError } from '../../domain/errors/PipelineErrors';
import { ConcatRequest, EncodeStillRequest, IMediaEncoder } from '../../domain/ports/IMediaEncoder';
import { TimeoutError } from '../resilience/RetryUtils';

export interface FluentFfmpegOptions {
    /** Kill an ffmpeg run after this many seconds */
    timeoutSeconds: number;
    /** Kill ffprobe after this many milliseconds */
    probeTimeoutMs: number;
    ffmpegPath?: string;
    ffprobePath?: string;
}

const STDERR_TAIL_LINES = 8;

/**
 * Encodes slide segments with the local ffmpeg binary through fluent-ffmpeg.
 * Requires 'ffmpeg' and 'ffprobe' to be installed in the system.
 */
export class FluentFfmpegMediaEncoder implements IMediaEncoder {
    private readonly options: FluentFfmpegOptions;
    private readonly ffprobePath: string;

    constructor(options: FluentFfmpegOptions) {
        if (options.timeoutSeconds <= 0) {
            throw new Error('FFmpeg timeout must be positive');
        }
        this.options = options;
        this.ffprobePath = options.ffprobePath ?? 'ffprobe';
        if (options.ffmpegPath) {
            ffmpeg.setFfmpegPath(options.ffmpegPath);
        }
    }

    /**
     * fluent-ffmpeg's ffprobe() gives no handle on its child process, so
     * ffprobe is spawned here and killed when it outlives probeTimeoutMs.
     */
    probeDuration(filePath: string): Promise<number> {
        const { probeTimeoutMs } = this.options;
        return new Promise((resolve, reject) => {
            const child = spawn(this.ffprobePath, [
                '-v', 'error',
                '-show_entries', 'format=duration',
                '-of', 'default=noprint_wrappers=1:nokey=1',
                filePath,
            ]);
            let stdout = '';
            let stderr = '';
            let settled = false;

            const settle = (finish: () => void): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timeoutId);
                finish();
            };

            const timeoutId = setTimeout(() => {
                child.kill('SIGKILL');
                console.warn(`[FFmpeg] ffprobe killed after ${probeTimeoutMs}ms: ${filePath}`);
                settle(() => reject(new TimeoutError(`ffprobe ${filePath}`, probeTimeoutMs)));
            }, probeTimeoutMs);

            child.stdout.on('data', (data: Buffer) => {
                stdout += data.toString();
            });
            child.stderr.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            child.on('error', (err: Error) => {
                settle(() => reject(new EncodingError(`ffprobe failed for ${filePath}: ${err.message}`)));
            });

            child.on('close', (code: number | null) => {
                settle(() => {
                    if (code !== 0) {
                        reject(new EncodingError(`ffprobe failed for ${filePath}: exit code ${code}`, tail(stderr)));
                        return;
                    }
                    const duration = Number(stdout.trim());
                    if (!Number.isFinite(duration) || duration <= 0) {
                        reject(new EncodingError(`ffprobe reported no duration for ${filePath}`));
                        return;
                    }
                    resolve(duration);
                });
            });
        });
    }

    generateSilence(outputPath: string, durationSeconds: number, format: SegmentFormat): Promise<void> {
        const layout = format.audioChannels === 1 ? 'mono' : 'stereo';
        const cmd = this.command()
            .input(`anullsrc=r=${format.audioSampleRate}:cl=${layout}`)
            .inputFormat('lavfi')
            .outputOptions([
                `-t ${durationSeconds}`,
                `-c:a ${format.audioCodec}`,
                `-b:a ${format.audioBitrate}`,
            ]);
        return this.run(cmd, outputPath, 'silence');
    }

    encodeStill(request: EncodeStillRequest): Promise<void> {
        const { format } = request;
        const cmd = this.command()
            .input(request.imagePath)
            .inputOptions(['-loop 1', `-framerate ${format.fps}`])
            .input(request.audioPath)
            .outputOptions([
                `-t ${request.durationSeconds}`,
                `-vf scale=${format.width}:${format.height},setsar=1`,
                `-r ${format.fps}`,
                `-c:v ${format.videoCodec}`,
                `-tune ${format.tune}`,
                `-preset ${format.preset}`,
                `-pix_fmt ${format.pixelFormat}`,
                // Pad narration with silence so both streams end together
                '-af apad',
                `-c:a ${format.audioCodec}`,
                `-b:a ${format.audioBitrate}`,
                `-ar ${format.audioSampleRate}`,
                `-ac ${format.audioChannels}`,
                '-movflags +faststart',
            ]);
        return this.run(cmd, request.outputPath, 'segment');
    }

    concat(request: ConcatRequest): Promise<void> {
        const outputOptions = ['-c copy', '-movflags +faststart'];
        if (request.maxDurationSeconds !== undefined) {
            outputOptions.push(`-t ${request.maxDurationSeconds}`);
        }
        const cmd = this.command()
            .input(request.listPath)
            .inputOptions(['-f concat', '-safe 0'])
            .outputOptions(outputOptions);
        return this.run(cmd, request.outputPath, 'concat');
    }

    private command(): FfmpegCommand {
        return ffmpeg({ timeout: this.options.timeoutSeconds });
    }

    private run(cmd: FfmpegCommand, outputPath: string, label: string): Promise<void> {
        return new Promise((resolve, reject) => {
            cmd.on('start', (commandLine: string) => {
                console.log(`[FFmpeg] ${label}: ${commandLine}`);
            })
                .on('end', () => resolve())
                .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
                    reject(new EncodingError(`FFmpeg ${label} failed: ${err.message}`, tail(stderr)));
                })
                .save(outputPath);
        });
    }
}

function tail(stderr: string | null): string | undefined {
    if (!stderr) {
        return undefined;
    }
    return stderr.trim().split('\n').slice(-STDERR_TAIL_LINES).join('\n');
}
