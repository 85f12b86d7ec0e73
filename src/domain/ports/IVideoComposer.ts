import { CaptionTrack } from '../entities/CaptionSegment';
import { FootageTrack } from '../entities/FootageClip';
import { Watermark } from '../entities/RenderedVideo';
import { SubtitleStyle } from '../services/SubtitleFormatter';

export interface MuxRequest {
    visualTrackPath: string;
    audioPath: string;
    captions: CaptionTrack;
    style: SubtitleStyle;
    watermark?: Watermark;
    backgroundMusicPath?: string;
    /** Output length; equal to the narration duration */
    durationSeconds: number;
    outputPath: string;
}

/**
 * IVideoComposer - Port for encoding the visual track and the final reel.
 * Implementations: FFmpegVideoComposer
 */
export interface IVideoComposer {
    /** Encodes the planned clips into a silent video at outputPath */
    renderVisualTrack(track: FootageTrack, outputPath: string, signal?: AbortSignal): Promise<void>;

    /** Burns captions and watermark over the visual track and mixes the audio */
    mux(request: MuxRequest, signal?: AbortSignal): Promise<void>;
}
