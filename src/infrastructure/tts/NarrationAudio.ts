import { AudioArtifact, AudioFormat, WordTiming, createAudioArtifact } from '../../domain/entities/AudioArtifact';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { IMediaStore } from '../../domain/ports/IMediaStore';

/**
 * Stores synthesized audio in the media store and measures it.
 * The measured duration, not an estimate, is what the rest of the pipeline uses.
 */
export async function storeNarration(
    mediaStore: IMediaStore,
    probe: IMediaProbe,
    params: {
        provider: string;
        data: Buffer;
        format: AudioFormat;
        wordTimings?: WordTiming[];
    }
): Promise<AudioArtifact> {
    if (params.data.length === 0) {
        throw new ProviderError(params.provider, 'provider_unavailable', 'Voice provider returned empty audio');
    }

    const audioPath = await mediaStore.writeBuffer(params.data, params.format);
    const info = await probe.probe(audioPath);
    if (!(info.durationSeconds > 0)) {
        throw new ProviderError(params.provider, 'provider_unavailable', `Synthesized audio has no measurable duration (${audioPath})`);
    }

    return createAudioArtifact({
        audioPath,
        format: params.format,
        sampleRate: info.sampleRate > 0 ? info.sampleRate : 44100,
        durationSeconds: info.durationSeconds,
        provider: params.provider,
        wordTimings: params.wordTimings,
    });
}
