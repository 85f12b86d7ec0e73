import axios from 'axios';
import nock from 'nock';
import { extractApiMessage, providerErrorFromHttp } from '../../../../src/infrastructure/http/ProviderHttpError';
import { JobCancelledError, ProviderError } from '../../../../src/domain/errors/PipelineErrors';

const BASE_URL = 'https://api.example.test';

async function failureFor(status: number, body: Record<string, unknown>): Promise<unknown> {
    nock(BASE_URL).get('/resource').reply(status, body);
    try {
        await axios.get(`${BASE_URL}/resource`);
    } catch (error) {
        return error;
    }
    throw new Error('request unexpectedly succeeded');
}

describe('providerErrorFromHttp', () => {
    afterEach(() => {
        nock.cleanAll();
    });

    it.each([
        [429, 'rate_limited', true],
        [503, 'provider_unavailable', true],
        [401, 'invalid_credentials', false],
        [400, 'invalid_prompt', false],
    ])('should map HTTP %d to %s', async (status, code, retryable) => {
        const mapped = providerErrorFromHttp('openai', await failureFor(status, { error: { message: 'nope' } }));

        expect(mapped).toBeInstanceOf(ProviderError);
        expect(mapped).toMatchObject({ provider: 'openai', code, retryable });
        expect(mapped.message).toBe(`openai request failed (${status}): nope`);
    });

    it('should use the adapter terminal code for other client errors', async () => {
        const mapped = providerErrorFromHttp('pexels', await failureFor(404, { message: 'none' }), 'no_results');

        expect(mapped).toMatchObject({ code: 'no_results' });
    });

    it('should treat connection failures as provider_unavailable', async () => {
        nock(BASE_URL).get('/resource').replyWithError('socket hang up');
        const error = await axios.get(`${BASE_URL}/resource`).catch((e: unknown) => e);

        expect(providerErrorFromHttp('pexels', error)).toMatchObject({ code: 'provider_unavailable' });
    });

    it('should pass through errors that are already mapped', () => {
        const original = new ProviderError('openai', 'timeout', 'slow');
        const cancelled = new JobCancelledError();

        expect(providerErrorFromHttp('openai', original)).toBe(original);
        expect(providerErrorFromHttp('openai', cancelled)).toBe(cancelled);
    });

    it('should leave unrelated errors untouched', () => {
        const plain = new TypeError('bad');

        expect(providerErrorFromHttp('openai', plain)).toBe(plain);
    });
});

describe('extractApiMessage', () => {
    it('should read the common error body shapes', () => {
        expect(extractApiMessage({ error: { message: 'a' } })).toBe('a');
        expect(extractApiMessage({ error: 'b' })).toBe('b');
        expect(extractApiMessage({ message: 'c' })).toBe('c');
        expect(extractApiMessage({ detail: [{ msg: 'd' }] })).toBe('[{"msg":"d"}]');
        expect(extractApiMessage(Buffer.from('{"message":"e"}'))).toBe('e');
        expect(extractApiMessage(42)).toBeUndefined();
    });
});
