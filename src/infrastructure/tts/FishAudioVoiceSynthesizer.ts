import axios from 'axios';
import { AudioArtifact } from '../../domain/entities/AudioArtifact';
import { getNarrationText } from '../../domain/entities/ScriptArtifact';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { IMediaStore } from '../../domain/ports/IMediaStore';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { IVoiceSynthesizer, VoiceRequest } from '../../domain/ports/IVoiceSynthesizer';
import { providerErrorFromHttp } from '../http/ProviderHttpError';
import { storeNarration } from './NarrationAudio';

/**
 * Fish Audio voice synthesis with a reference (cloned) voice.
 */
export class FishAudioVoiceSynthesizer implements IVoiceSynthesizer {
    readonly name = 'fishaudio';

    private readonly apiKey: string;
    private readonly voiceId: string;

    constructor(
        apiKey: string,
        voiceId: string,
        private readonly mediaStore: IMediaStore,
        private readonly probe: IMediaProbe,
        private readonly baseUrl: string = 'https://api.fish.audio'
    ) {
        if (!apiKey) {
            throw new Error('Fish Audio API key is required');
        }
        if (!voiceId) {
            throw new Error('Fish Audio voice ID is required');
        }
        this.apiKey = apiKey;
        this.voiceId = voiceId;
    }

    async produce(request: VoiceRequest, context: AdapterContext): Promise<AudioArtifact> {
        const text = getNarrationText(request.script);
        if (!text.trim()) {
            throw new ProviderError(this.name, 'invalid_prompt', 'Text is required for TTS');
        }

        const referenceId = request.voice.voiceId || this.voiceId;
        console.log(`[${context.jobId}] [Fish Audio] Synthesizing with voice ID: ${referenceId}`);

        let data: Buffer;
        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/tts`,
                {
                    text,
                    reference_id: referenceId,
                    format: 'mp3',
                    speed: request.voice.speed || 1.0,
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    responseType: 'arraybuffer',
                    signal: context.signal,
                    timeout: 120000,
                }
            );

            const contentType = String(response.headers['content-type'] ?? '');
            if (contentType.includes('application/json')) {
                throw new ProviderError(this.name, 'provider_unavailable', 'Fish Audio returned JSON instead of audio');
            }
            data = Buffer.from(response.data);
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'unsupported_voice');
        }

        return storeNarration(this.mediaStore, this.probe, { provider: this.name, data, format: 'mp3' });
    }
}
