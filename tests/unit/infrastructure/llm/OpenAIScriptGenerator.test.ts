import nock from 'nock';
import { OpenAIScriptGenerator } from '../../../../src/infrastructure/llm/OpenAIScriptGenerator';
import { ProviderError } from '../../../../src/domain/errors/PipelineErrors';
import { makeAdapterContext } from '../../../helpers/fixtures';
import { silenceConsole } from '../../../helpers/harness';

const BASE_URL = 'https://llm.test';

function chatReply(content: string) {
    return { choices: [{ message: { content } }] };
}

describe('OpenAIScriptGenerator', () => {
    silenceConsole();

    const request = { prompt: 'Why octopuses have three hearts', targetDurationSeconds: 30, maxSearchTerms: 2 };
    let generator: OpenAIScriptGenerator;

    beforeEach(() => {
        generator = new OpenAIScriptGenerator('test-secret', 'gpt-4o-mini', BASE_URL);
    });

    afterEach(() => {
        nock.cleanAll();
    });

    it('should require an API key', () => {
        expect(() => new OpenAIScriptGenerator('')).toThrow('OpenAI API key is required');
    });

    it('should turn the JSON reply into a segmented script', async () => {
        nock(BASE_URL)
            .matchHeader('authorization', 'Bearer test-secret')
            .post('/v1/chat/completions', (body: { model: string; response_format: { type: string } }) =>
                body.model === 'gpt-4o-mini' && body.response_format.type === 'json_object'
            )
            .reply(200, chatReply(JSON.stringify({
                script: 'Octopuses have three hearts. Two pump "blood" to the gills.',
                searchTerms: ['octopus', '#reef', 'deep sea'],
                title: ' Three hearts ',
                hashtags: ['octopus', 'ocean'],
            })));

        const script = await generator.produce(request, makeAdapterContext());

        expect(script.segments.map((segment) => segment.text)).toEqual([
            'Octopuses have three hearts.',
            'Two pump blood to the gills.',
        ]);
        expect(script.searchTerms).toEqual(['octopus', 'reef']);
        expect(script.title).toBe('Three hearts');
        expect(script.hashtags).toEqual(['octopus', 'ocean']);
    });

    it('should reject an empty prompt without calling the API', async () => {
        await expect(generator.produce({ ...request, prompt: '  ' }, makeAdapterContext())).rejects.toMatchObject({
            code: 'invalid_prompt',
            message: 'Prompt is required for script generation',
        });
    });

    it('should map rate limiting to a retryable error', async () => {
        nock(BASE_URL).post('/v1/chat/completions').reply(429, { error: { message: 'Too many requests' } });

        const error = await generator.produce(request, makeAdapterContext()).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({
            provider: 'openai-script',
            code: 'rate_limited',
            retryable: true,
            message: 'openai-script request failed (429): Too many requests',
        });
    });

    it('should map a rejected key to a terminal error', async () => {
        nock(BASE_URL).post('/v1/chat/completions').reply(401, { error: { message: 'Incorrect API key' } });

        await expect(generator.produce(request, makeAdapterContext())).rejects.toMatchObject({
            code: 'invalid_credentials',
            retryable: false,
        });
    });

    it('should report a reply without narration as content_policy', async () => {
        nock(BASE_URL).post('/v1/chat/completions').reply(200, chatReply('{"script": "  "}'));

        await expect(generator.produce(request, makeAdapterContext())).rejects.toMatchObject({
            code: 'content_policy',
            message: 'Script response did not contain any narration',
        });
    });

    describe('parseResponse', () => {
        it('should strip markdown code fences', () => {
            const parsed = generator.parseResponse('```json\n{"script": "Hello there.", "searchTerms": ["sea", 3]}\n```');

            expect(parsed).toEqual({ script: 'Hello there.', searchTerms: ['sea'], title: undefined, hashtags: [] });
        });

        it('should treat unparseable text as a transient provider failure', () => {
            expect(() => generator.parseResponse('Sure! Here is your script')).toThrow(
                new ProviderError('openai-script', 'provider_unavailable', 'Failed to parse script response as JSON: Sure! Here is your script')
            );
        });
    });
});
