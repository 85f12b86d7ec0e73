import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { FootageTrack } from '../../domain/entities/FootageClip';
import { CompositionError, JobCancelledError } from '../../domain/errors/PipelineErrors';
import { IVideoComposer, MuxRequest } from '../../domain/ports/IVideoComposer';
import { buildForceStyle, toSrt } from '../../domain/services/SubtitleFormatter';

/** Background music level under the narration */
export const MUSIC_VOLUME = 0.2;

/**
 * Seconds with at most millisecond precision, without trailing zeros.
 */
export function formatSeconds(seconds: number): string {
    return Number(seconds.toFixed(3)).toString();
}

/**
 * Escapes a value for use inside a quoted filtergraph option.
 */
export function escapeFilterValue(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/:/g, '\\:').replace(/'/g, "\\'");
}

function escapeDrawtext(text: string): string {
    return escapeFilterValue(text).replace(/%/g, '\\%');
}

/**
 * Filter chain that trims, crops and scales every planned clip, then
 * concatenates them into [vout]. Input i is clip i.
 */
export function buildVisualTrackFilters(track: FootageTrack): string[] {
    const { width, height, frameRate } = track;
    const filters = track.clips.map((clip, i) => {
        const steps = [
            `trim=start=${formatSeconds(clip.trimStartSeconds)}:end=${formatSeconds(clip.trimEndSeconds)}`,
            'setpts=PTS-STARTPTS',
        ];
        if (clip.crop) {
            steps.push(`crop=${clip.crop.width}:${clip.crop.height}:${clip.crop.x}:${clip.crop.y}`);
            steps.push(`scale=${width}:${height}`);
        } else {
            // Unknown source size: fill the frame, then cut the overflow from the centre
            steps.push(`scale=${width}:${height}:force_original_aspect_ratio=increase`);
            steps.push(`crop=${width}:${height}`);
        }
        steps.push('setsar=1', `fps=${frameRate}`, 'format=yuv420p');
        return `[${i}:v]${steps.join(',')}[v${i}]`;
    });

    const labels = track.clips.map((_, i) => `[v${i}]`).join('');
    filters.push(`${labels}concat=n=${track.clips.length}:v=1:a=0[vout]`);
    return filters;
}

export interface MuxInputs {
    /** Input index of the looping background music, when present */
    musicInput?: number;
    /** Input index of the watermark image, when present */
    watermarkInput?: number;
}

/**
 * Filter chain for the final reel. Input 0 is the visual track, input 1 the
 * narration. Produces [vout] and [aout].
 */
export function buildMuxFilters(request: MuxRequest, subtitlesPath: string | null, inputs: MuxInputs): string[] {
    const filters: string[] = [];

    if (subtitlesPath) {
        const style = buildForceStyle(request.style);
        filters.push(`[0:v]subtitles=filename='${escapeFilterValue(subtitlesPath)}':force_style='${style}'[vsub]`);
    } else {
        filters.push('[0:v]null[vsub]');
    }

    const watermark = request.watermark;
    if (watermark?.type === 'text') {
        filters.push(
            `[vsub]drawtext=text='${escapeDrawtext(watermark.text)}':fontcolor=white@0.6:fontsize=36:x=w-tw-40:y=40[vout]`
        );
    } else if (watermark?.type === 'image' && inputs.watermarkInput !== undefined) {
        filters.push(`[${inputs.watermarkInput}:v]scale=200:-1[wm]`);
        filters.push('[vsub][wm]overlay=W-w-40:40[vout]');
    } else {
        filters.push('[vsub]null[vout]');
    }

    if (inputs.musicInput !== undefined) {
        filters.push(`[${inputs.musicInput}:a]volume=${MUSIC_VOLUME}[bg_music]`);
        filters.push('[1:a][bg_music]amix=inputs=2:duration=first:dropout_transition=0[aout]');
    } else {
        filters.push('[1:a]anull[aout]');
    }

    return filters;
}

/**
 * Encodes reels locally with FFmpeg.
 * Requires 'ffmpeg' to be installed in the system.
 *
 * Every output is written to a temporary file and renamed into place, so an
 * aborted or failed render never leaves a file at the final path.
 */
export class FFmpegVideoComposer implements IVideoComposer {
    async renderVisualTrack(track: FootageTrack, outputPath: string, signal?: AbortSignal): Promise<void> {
        if (track.clips.length === 0) {
            throw new CompositionError('no_footage', 'Visual track has no clips');
        }

        console.log(`[FFmpeg] Rendering visual track: ${track.clips.length} clips, ${formatSeconds(track.durationSeconds)}s`);
        const cmd = ffmpeg();
        track.clips.forEach((clip) => cmd.input(clip.sourcePath));
        cmd.complexFilter(buildVisualTrackFilters(track), ['vout']);
        cmd.outputOptions([
            '-c:v libx264',
            '-pix_fmt yuv420p',
            '-an',
            `-t ${formatSeconds(track.durationSeconds)}`,
            '-movflags +faststart',
        ]);

        await this.run(cmd, outputPath, signal);
    }

    async mux(request: MuxRequest, signal?: AbortSignal): Promise<void> {
        const subtitlesPath = request.captions.segments.length > 0 ? `${request.outputPath}.${uuidv4()}.srt` : null;
        if (subtitlesPath) {
            await fs.promises.writeFile(subtitlesPath, toSrt(request.captions), 'utf-8');
        }

        try {
            const cmd = ffmpeg();
            cmd.input(request.visualTrackPath);
            cmd.input(request.audioPath);

            const inputs: MuxInputs = {};
            let nextInput = 2;
            if (request.backgroundMusicPath) {
                cmd.input(request.backgroundMusicPath).inputOptions('-stream_loop -1');
                inputs.musicInput = nextInput++;
            }
            if (request.watermark?.type === 'image') {
                cmd.input(request.watermark.path);
                inputs.watermarkInput = nextInput++;
            }

            console.log(`[FFmpeg] Muxing ${request.captions.segments.length} captions over ${formatSeconds(request.durationSeconds)}s`);
            cmd.complexFilter(buildMuxFilters(request, subtitlesPath, inputs), ['vout', 'aout']);
            cmd.outputOptions([
                '-c:v libx264',
                '-c:a aac',
                '-pix_fmt yuv420p',
                `-t ${formatSeconds(request.durationSeconds)}`,
                '-movflags +faststart',
            ]);

            await this.run(cmd, request.outputPath, signal);
        } finally {
            if (subtitlesPath) {
                await fs.promises.rm(subtitlesPath, { force: true });
            }
        }
    }

    private async run(cmd: ffmpeg.FfmpegCommand, outputPath: string, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            throw new JobCancelledError();
        }
        const tempPath = `${outputPath}.${uuidv4()}.tmp.mp4`;

        try {
            await new Promise<void>((resolve, reject) => {
                const onAbort = () => {
                    cmd.kill('SIGKILL');
                    reject(new JobCancelledError());
                };
                signal?.addEventListener('abort', onAbort, { once: true });

                cmd.on('end', () => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve();
                });
                cmd.on('error', (err: Error) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(new CompositionError('render_failed', `FFmpeg error: ${err.message}`, { cause: err }));
                });
                cmd.save(tempPath);
            });
            await fs.promises.rename(tempPath, outputPath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw error;
        }
    }
}
