import axios from 'axios';
import { JobCancelledError, ProviderError, ProviderErrorCode, getErrorMessage } from '../../domain/errors/PipelineErrors';

/**
 * Pulls a readable message out of an API error body. Handles the
 * `{ error: { message } }`, `{ message }` and `{ detail }` shapes, and bodies
 * that arrived as raw bytes.
 */
export function extractApiMessage(data: unknown): string | undefined {
    if (Buffer.isBuffer(data) || data instanceof ArrayBuffer) {
        const text = Buffer.from(data instanceof ArrayBuffer ? new Uint8Array(data) : data).toString('utf-8');
        try {
            return extractApiMessage(JSON.parse(text));
        } catch {
            return text || undefined;
        }
    }
    if (typeof data === 'string') {
        return data || undefined;
    }
    if (typeof data !== 'object' || data === null) {
        return undefined;
    }
    if ('error' in data) {
        const inner = data.error;
        if (typeof inner === 'string') {
            return inner;
        }
        if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
            return inner.message;
        }
    }
    if ('message' in data && typeof data.message === 'string') {
        return data.message;
    }
    if ('detail' in data) {
        return typeof data.detail === 'string' ? data.detail : JSON.stringify(data.detail);
    }
    return undefined;
}

/**
 * Maps an HTTP client failure to a ProviderError.
 *
 * 429 is rate_limited, 5xx and missing responses are provider_unavailable,
 * client timeouts are timeout, 401/403 are invalid_credentials, and any other
 * 4xx gets the adapter's terminal code. Cancellation becomes JobCancelledError;
 * errors that are not HTTP failures pass through unchanged.
 */
export function providerErrorFromHttp(
    provider: string,
    error: unknown,
    terminalCode: ProviderErrorCode = 'invalid_prompt'
): Error {
    if (error instanceof ProviderError || error instanceof JobCancelledError) {
        return error;
    }
    if (axios.isCancel(error)) {
        return new JobCancelledError(`${provider} request was cancelled`);
    }
    if (!axios.isAxiosError(error)) {
        return error instanceof Error ? error : new Error(getErrorMessage(error));
    }

    const status = error.response?.status;
    const detail = extractApiMessage(error.response?.data) ?? error.message;
    const message = status ? `${provider} request failed (${status}): ${detail}` : `${provider} request failed: ${detail}`;

    let code: ProviderErrorCode;
    if (status === 429) {
        code = 'rate_limited';
    } else if (status === 401 || status === 403) {
        code = 'invalid_credentials';
    } else if (status !== undefined && status >= 500) {
        code = 'provider_unavailable';
    } else if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        code = 'timeout';
    } else if (status === undefined) {
        code = 'provider_unavailable';
    } else {
        code = terminalCode;
    }

    return new ProviderError(provider, code, message, { cause: error });
}
