import { AudioArtifact } from '../../domain/entities/AudioArtifact';
import { CaptionTrack } from '../../domain/entities/CaptionSegment';
import { FootageTrack } from '../../domain/entities/FootageClip';
import { RenderedVideo } from '../../domain/entities/RenderedVideo';
import { ScriptArtifact } from '../../domain/entities/ScriptArtifact';
import {
    isAudioArtifact,
    isCaptionTrack,
    isFootageTrack,
    isRenderedVideo,
    isScriptArtifact,
} from '../../domain/entities/ArtifactGuards';
import { IMediaStore } from '../../domain/ports/IMediaStore';
import { ArtifactCodec } from '../../infrastructure/cache/ContentCache';

export interface ArtifactCodecs {
    script: ArtifactCodec<ScriptArtifact>;
    narration: ArtifactCodec<AudioArtifact>;
    captions: ArtifactCodec<CaptionTrack>;
    footage: ArtifactCodec<FootageTrack>;
    composition: ArtifactCodec<RenderedVideo>;
    render: ArtifactCodec<RenderedVideo>;
}

/**
 * Codecs for every cached artifact. Hits that point at media files no longer
 * in the store are rejected, so the stage runs again.
 */
export function createArtifactCodecs(mediaStore: IMediaStore): ArtifactCodecs {
    const videoExists = (video: RenderedVideo) => mediaStore.exists(video.videoPath);

    return {
        script: { stage: 'script', accepts: isScriptArtifact },
        narration: {
            stage: 'narration',
            accepts: isAudioArtifact,
            validate: (audio) => mediaStore.exists(audio.audioPath),
        },
        captions: { stage: 'captions', accepts: isCaptionTrack },
        footage: {
            stage: 'footage',
            accepts: isFootageTrack,
            validate: (track) => (track.visualTrackPath ? mediaStore.exists(track.visualTrackPath) : Promise.resolve(false)),
        },
        composition: {
            stage: 'composition',
            accepts: isRenderedVideo,
            validate: videoExists,
        },
        render: {
            stage: 'render',
            accepts: isRenderedVideo,
            validate: videoExists,
        },
    };
}
