import { StageName } from './PipelineJob';

/**
 * Watermark burned into the visual track.
 */
export type Watermark =
    | { type: 'text'; text: string }
    | { type: 'image'; path: string };

/**
 * A stage that finished degraded. Kept with the cached video so a cache hit
 * reports the same outcome as the run that produced it.
 */
export interface StageDegradation {
    stage: StageName;
    note: string;
}

/**
 * RenderedVideo is the final muxed reel and the terminal output of a job.
 */
export interface RenderedVideo {
    /** Job fingerprint this video was rendered for */
    fingerprint: string;
    /** Path of the MP4 inside the media store */
    videoPath: string;
    /** Equal to the narration duration */
    durationSeconds: number;
    width: number;
    height: number;
    captionCount: number;
    clipCount: number;
    hasBackgroundMusic: boolean;
    watermark?: Watermark;
    degradations?: StageDegradation[];
}

/**
 * Metadata handed to a publisher along with the video.
 */
export interface PublishMetadata {
    title?: string;
    description?: string;
    hashtags?: string[];
}

export interface PublishReceipt {
    /** Identifier assigned by the destination */
    remoteId: string;
    /** Public URL, if the destination returned one */
    url?: string;
    publishedAt: Date;
}
