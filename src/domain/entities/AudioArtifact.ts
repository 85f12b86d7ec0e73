import { deepFreeze } from './Immutable';

/**
 * Timing of a single spoken word, as reported by a voice provider.
 */
export interface WordTiming {
    text: string;
    startSeconds: number;
    endSeconds: number;
}

/**
 * Timing of a whole script segment, as reported by a voice provider.
 */
export interface SegmentTiming {
    segmentId: string;
    startSeconds: number;
    endSeconds: number;
}

export type AudioFormat = 'mp3' | 'wav' | 'ogg';

/**
 * AudioArtifact is the synthesized narration.
 * The waveform itself lives in the media store; the artifact only references it.
 */
export interface AudioArtifact {
    /** Path of the audio file inside the media store */
    audioPath: string;
    format: AudioFormat;
    sampleRate: number;
    /** Measured duration of the audio in seconds */
    durationSeconds: number;
    /** Name of the voice provider that produced it */
    provider: string;
    wordTimings?: WordTiming[];
    segmentTimings?: SegmentTiming[];
}

export function createAudioArtifact(params: AudioArtifact): AudioArtifact {
    if (!params.audioPath.trim()) {
        throw new Error('AudioArtifact audioPath cannot be empty');
    }
    if (!Number.isFinite(params.durationSeconds) || params.durationSeconds <= 0) {
        throw new Error(`AudioArtifact duration must be positive, got: ${params.durationSeconds}`);
    }
    if (params.sampleRate <= 0) {
        throw new Error('AudioArtifact sampleRate must be positive');
    }

    const artifact: AudioArtifact = {
        audioPath: params.audioPath,
        format: params.format,
        sampleRate: params.sampleRate,
        durationSeconds: params.durationSeconds,
        provider: params.provider,
    };
    if (params.wordTimings && params.wordTimings.length > 0) {
        artifact.wordTimings = params.wordTimings.map((word) => ({ ...word }));
    }
    if (params.segmentTimings && params.segmentTimings.length > 0) {
        artifact.segmentTimings = params.segmentTimings.map((segment) => ({ ...segment }));
    }

    return deepFreeze(artifact);
}

/**
 * Whether the provider supplied any timing hints the aligner can use.
 */
export function hasTimingHints(audio: AudioArtifact): boolean {
    return (audio.segmentTimings?.length ?? 0) > 0 || (audio.wordTimings?.length ?? 0) > 0;
}
