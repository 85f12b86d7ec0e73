import ffmpeg from 'fluent-ffmpeg';
import { IMediaProbe, MediaInfo } from '../../domain/ports/IMediaProbe';

function toNumber(value: unknown): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Reads media properties with ffprobe (through fluent-ffmpeg).
 * Requires 'ffprobe' to be installed in the system.
 */
export class FFprobeMediaProbe implements IMediaProbe {
    probe(filePath: string): Promise<MediaInfo> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err, data) => {
                if (err) {
                    reject(new Error(`ffprobe failed for ${filePath}: ${err.message}`));
                    return;
                }

                const video = data.streams.find((stream) => stream.codec_type === 'video');
                const audio = data.streams.find((stream) => stream.codec_type === 'audio');
                const durationSeconds = toNumber(data.format.duration) || toNumber(audio?.duration) || toNumber(video?.duration);

                resolve({
                    durationSeconds,
                    width: toNumber(video?.width),
                    height: toNumber(video?.height),
                    sampleRate: toNumber(audio?.sample_rate),
                });
            });
        });
    }
}
