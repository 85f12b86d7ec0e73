import { AudioArtifact } from '../entities/AudioArtifact';
import { ScriptArtifact } from '../entities/ScriptArtifact';
import { IStageAdapter } from './IStageAdapter';

export interface VoiceConfig {
    /** Provider-specific voice identifier; adapters fall back to their default */
    voiceId?: string;
    speed?: number;
}

export interface VoiceRequest {
    script: ScriptArtifact;
    voice: VoiceConfig;
}

/**
 * IVoiceSynthesizer - Port for text-to-speech narration.
 * Fails with ProviderError{rate_limited, unsupported_voice, provider_unavailable}.
 * Implementations: OpenAIVoiceSynthesizer, FishAudioVoiceSynthesizer, ElevenLabsVoiceSynthesizer
 */
export type IVoiceSynthesizer = IStageAdapter<VoiceRequest, AudioArtifact>;
