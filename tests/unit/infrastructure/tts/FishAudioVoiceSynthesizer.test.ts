import nock from 'nock';
import { createScriptArtifact } from '../../../../src/domain/entities/ScriptArtifact';
import { FishAudioVoiceSynthesizer } from '../../../../src/infrastructure/tts/FishAudioVoiceSynthesizer';
import { FakeMediaProbe, FakeMediaStore } from '../../../helpers/fakes';
import { makeAdapterContext } from '../../../helpers/fixtures';
import { silenceConsole } from '../../../helpers/harness';

const BASE_URL = 'https://fish.test';

describe('FishAudioVoiceSynthesizer', () => {
    silenceConsole();

    const script = createScriptArtifact({ rawText: 'Deep water is cold.' });
    let mediaStore: FakeMediaStore;
    let synthesizer: FishAudioVoiceSynthesizer;

    beforeEach(() => {
        mediaStore = new FakeMediaStore();
        synthesizer = new FishAudioVoiceSynthesizer('test-secret', 'voice-clone', mediaStore, new FakeMediaProbe(), BASE_URL);
    });

    afterEach(() => {
        nock.cleanAll();
    });

    describe('Constructor validation', () => {
        it('should throw error when API key is missing', () => {
            expect(() => new FishAudioVoiceSynthesizer('', 'voice-clone', mediaStore, new FakeMediaProbe())).toThrow(
                'Fish Audio API key is required'
            );
        });

        it('should throw error when voice ID is missing', () => {
            expect(() => new FishAudioVoiceSynthesizer('test-secret', '', mediaStore, new FakeMediaProbe())).toThrow(
                'Fish Audio voice ID is required'
            );
        });
    });

    it('should synthesize with the configured reference voice', async () => {
        nock(BASE_URL)
            .matchHeader('authorization', 'Bearer test-secret')
            .post('/v1/tts', { text: 'Deep water is cold.', reference_id: 'voice-clone', format: 'mp3', speed: 1 })
            .reply(200, Buffer.from('ID3-audio'), { 'Content-Type': 'audio/mpeg' });

        const audio = await synthesizer.produce({ script, voice: {} }, makeAdapterContext());

        expect(audio.provider).toBe('fishaudio');
        expect(audio.audioPath).toBe('/media/blobs/blob_1.mp3');
        expect(audio.durationSeconds).toBe(10);
    });

    it('should let the request pick another reference voice', async () => {
        nock(BASE_URL)
            .post('/v1/tts', (body: { reference_id: string }) => body.reference_id === 'narrator-2')
            .reply(200, Buffer.from('ID3-audio'), { 'Content-Type': 'audio/mpeg' });

        const audio = await synthesizer.produce({ script, voice: { voiceId: 'narrator-2' } }, makeAdapterContext());

        expect(audio.format).toBe('mp3');
    });

    it('should reject a JSON body returned instead of audio', async () => {
        nock(BASE_URL)
            .post('/v1/tts')
            .reply(200, { status: 'queued' }, { 'Content-Type': 'application/json' });

        await expect(synthesizer.produce({ script, voice: {} }, makeAdapterContext())).rejects.toMatchObject({
            provider: 'fishaudio',
            code: 'provider_unavailable',
            message: 'Fish Audio returned JSON instead of audio',
        });
    });

    it('should map server errors to a retryable failure', async () => {
        nock(BASE_URL).post('/v1/tts').reply(502, { message: 'Bad gateway' });

        await expect(synthesizer.produce({ script, voice: {} }, makeAdapterContext())).rejects.toMatchObject({
            code: 'provider_unavailable',
            retryable: true,
            message: 'fishaudio request failed (502): Bad gateway',
        });
    });
});
