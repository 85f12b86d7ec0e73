import nock from 'nock';
import { createScriptArtifact } from '../../../../src/domain/entities/ScriptArtifact';
import {
    ElevenLabsVoiceSynthesizer,
    wordsFromCharacterAlignment,
} from '../../../../src/infrastructure/tts/ElevenLabsVoiceSynthesizer';
import { FakeMediaProbe, FakeMediaStore } from '../../../helpers/fakes';
import { makeAdapterContext } from '../../../helpers/fixtures';

const BASE_URL = 'https://elevenlabs.test';

describe('wordsFromCharacterAlignment', () => {
    it('should group characters into words at whitespace', () => {
        const words = wordsFromCharacterAlignment({
            characters: [' ', 'H', 'i', ' ', ' ', 'y', 'o', '.'],
            character_start_times_seconds: [0, 0.1, 0.2, 0.3, 0.35, 0.4, 0.5, 0.6],
            character_end_times_seconds: [0.1, 0.2, 0.3, 0.35, 0.4, 0.5, 0.6, 0.7],
        });

        expect(words).toEqual([
            { text: 'Hi', startSeconds: 0.1, endSeconds: 0.3 },
            { text: 'yo.', startSeconds: 0.4, endSeconds: 0.7 },
        ]);
    });

    it('should return nothing for whitespace only', () => {
        expect(
            wordsFromCharacterAlignment({
                characters: [' ', '\n'],
                character_start_times_seconds: [0, 0.1],
                character_end_times_seconds: [0.1, 0.2],
            })
        ).toEqual([]);
    });
});

describe('ElevenLabsVoiceSynthesizer', () => {
    const script = createScriptArtifact({ rawText: 'Hi yo.' });
    let mediaStore: FakeMediaStore;
    let synthesizer: ElevenLabsVoiceSynthesizer;

    beforeEach(() => {
        mediaStore = new FakeMediaStore();
        synthesizer = new ElevenLabsVoiceSynthesizer(
            'test-secret',
            'voice-1',
            mediaStore,
            new FakeMediaProbe(),
            'eleven_multilingual_v2',
            BASE_URL
        );
    });

    afterEach(() => {
        nock.cleanAll();
    });

    it('should require an API key and a voice', () => {
        expect(() => new ElevenLabsVoiceSynthesizer('', 'voice-1', mediaStore, new FakeMediaProbe())).toThrow(
            'ElevenLabs API key is required'
        );
        expect(() => new ElevenLabsVoiceSynthesizer('test-secret', '', mediaStore, new FakeMediaProbe())).toThrow(
            'ElevenLabs voice ID is required'
        );
    });

    it('should attach word timings from the character alignment', async () => {
        nock(BASE_URL)
            .matchHeader('xi-api-key', 'test-secret')
            .post('/v1/text-to-speech/voice-1/with-timestamps', { text: 'Hi yo.', model_id: 'eleven_multilingual_v2' })
            .reply(200, {
                audio_base64: Buffer.from('ID3-audio').toString('base64'),
                alignment: {
                    characters: ['H', 'i', ' ', 'y', 'o', '.'],
                    character_start_times_seconds: [0, 0.1, 0.2, 0.3, 0.4, 0.5],
                    character_end_times_seconds: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6],
                },
            });

        const audio = await synthesizer.produce({ script, voice: {} }, makeAdapterContext());

        expect(audio.provider).toBe('elevenlabs');
        expect(audio.wordTimings).toEqual([
            { text: 'Hi', startSeconds: 0, endSeconds: 0.2 },
            { text: 'yo.', startSeconds: 0.3, endSeconds: 0.6 },
        ]);
    });

    it('should send the requested speed as a voice setting', async () => {
        nock(BASE_URL)
            .post('/v1/text-to-speech/voice-2/with-timestamps', {
                text: 'Hi yo.',
                model_id: 'eleven_multilingual_v2',
                voice_settings: { speed: 1.1 },
            })
            .reply(200, { audio_base64: Buffer.from('ID3-audio').toString('base64'), alignment: null });

        const audio = await synthesizer.produce({ script, voice: { voiceId: 'voice-2', speed: 1.1 } }, makeAdapterContext());

        expect(audio.wordTimings).toBeUndefined();
    });

    it('should fail when the response carries no audio', async () => {
        nock(BASE_URL).post('/v1/text-to-speech/voice-1/with-timestamps').reply(200, { alignment: null });

        await expect(synthesizer.produce({ script, voice: {} }, makeAdapterContext())).rejects.toMatchObject({
            code: 'provider_unavailable',
            message: 'ElevenLabs response did not include audio',
        });
    });

    it('should report an unknown voice as terminal', async () => {
        nock(BASE_URL)
            .post('/v1/text-to-speech/voice-1/with-timestamps')
            .reply(404, { detail: { status: 'voice_not_found' } });

        await expect(synthesizer.produce({ script, voice: {} }, makeAdapterContext())).rejects.toMatchObject({
            code: 'unsupported_voice',
            message: 'elevenlabs request failed (404): {"status":"voice_not_found"}',
        });
    });
});
