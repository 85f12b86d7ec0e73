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

const OPENAI_VOICES = ['alloy', 'ash', 'coral', 'echo', 'fable', 'nova', 'onyx', 'sage', 'shimmer'];

/**
 * OpenAI text-to-speech. Returns audio without timing hints, so captions are
 * timed proportionally.
 */
export class OpenAIVoiceSynthesizer implements IVoiceSynthesizer {
    readonly name = 'openai';

    private readonly apiKey: string;
    private readonly voice: string;

    constructor(
        apiKey: string,
        private readonly mediaStore: IMediaStore,
        private readonly probe: IMediaProbe,
        voice: string = 'alloy',
        private readonly baseUrl: string = 'https://api.openai.com'
    ) {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.voice = voice;
    }

    async produce(request: VoiceRequest, context: AdapterContext): Promise<AudioArtifact> {
        const text = getNarrationText(request.script);
        if (!text.trim()) {
            throw new ProviderError(this.name, 'invalid_prompt', 'Text is required for TTS');
        }

        const voice = request.voice.voiceId || this.voice;
        if (!OPENAI_VOICES.includes(voice)) {
            throw new ProviderError(this.name, 'unsupported_voice', `OpenAI TTS has no voice named "${voice}"`);
        }

        let data: Buffer;
        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/audio/speech`,
                {
                    model: 'tts-1',
                    input: text,
                    voice,
                    response_format: 'mp3',
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
            data = Buffer.from(response.data);
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'unsupported_voice');
        }

        return storeNarration(this.mediaStore, this.probe, { provider: this.name, data, format: 'mp3' });
    }
}
