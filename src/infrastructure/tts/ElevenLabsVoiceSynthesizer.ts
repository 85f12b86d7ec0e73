import axios from 'axios';
import { AudioArtifact, WordTiming } from '../../domain/entities/AudioArtifact';
import { getNarrationText } from '../../domain/entities/ScriptArtifact';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { IMediaStore } from '../../domain/ports/IMediaStore';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { IVoiceSynthesizer, VoiceRequest } from '../../domain/ports/IVoiceSynthesizer';
import { providerErrorFromHttp } from '../http/ProviderHttpError';
import { storeNarration } from './NarrationAudio';

interface CharacterAlignment {
    characters: string[];
    character_start_times_seconds: number[];
    character_end_times_seconds: number[];
}

interface TimestampedSpeechResponse {
    audio_base64?: string;
    alignment?: CharacterAlignment | null;
}

/**
 * Groups per-character timings into word timings; whitespace separates words.
 */
export function wordsFromCharacterAlignment(alignment: CharacterAlignment): WordTiming[] {
    const words: WordTiming[] = [];
    let text = '';
    let start = 0;
    let end = 0;

    const flush = () => {
        if (text) {
            words.push({ text, startSeconds: start, endSeconds: end });
            text = '';
        }
    };

    alignment.characters.forEach((character, i) => {
        if (/\s/.test(character)) {
            flush();
            return;
        }
        if (!text) {
            start = alignment.character_start_times_seconds[i] ?? end;
        }
        text += character;
        end = alignment.character_end_times_seconds[i] ?? start;
    });
    flush();

    return words;
}

/**
 * ElevenLabs voice synthesis through the with-timestamps endpoint, so the
 * narration carries word timings for caption alignment.
 */
export class ElevenLabsVoiceSynthesizer implements IVoiceSynthesizer {
    readonly name = 'elevenlabs';

    private readonly apiKey: string;
    private readonly voiceId: string;

    constructor(
        apiKey: string,
        voiceId: string,
        private readonly mediaStore: IMediaStore,
        private readonly probe: IMediaProbe,
        private readonly modelId: string = 'eleven_multilingual_v2',
        private readonly baseUrl: string = 'https://api.elevenlabs.io'
    ) {
        if (!apiKey) {
            throw new Error('ElevenLabs API key is required');
        }
        if (!voiceId) {
            throw new Error('ElevenLabs voice ID is required');
        }
        this.apiKey = apiKey;
        this.voiceId = voiceId;
    }

    async produce(request: VoiceRequest, context: AdapterContext): Promise<AudioArtifact> {
        const text = getNarrationText(request.script);
        if (!text.trim()) {
            throw new ProviderError(this.name, 'invalid_prompt', 'Text is required for TTS');
        }

        const voiceId = request.voice.voiceId || this.voiceId;
        let body: TimestampedSpeechResponse;
        try {
            const response = await axios.post<TimestampedSpeechResponse>(
                `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}/with-timestamps`,
                {
                    text,
                    model_id: this.modelId,
                    ...(request.voice.speed ? { voice_settings: { speed: request.voice.speed } } : {}),
                },
                {
                    headers: {
                        'xi-api-key': this.apiKey,
                        'Content-Type': 'application/json',
                    },
                    signal: context.signal,
                    timeout: 120000,
                }
            );
            body = response.data;
        } catch (error) {
            throw providerErrorFromHttp(this.name, error, 'unsupported_voice');
        }

        if (!body.audio_base64) {
            throw new ProviderError(this.name, 'provider_unavailable', 'ElevenLabs response did not include audio');
        }

        return storeNarration(this.mediaStore, this.probe, {
            provider: this.name,
            data: Buffer.from(body.audio_base64, 'base64'),
            format: 'mp3',
            wordTimings: body.alignment ? wordsFromCharacterAlignment(body.alignment) : undefined,
        });
    }
}
