/**
 * Retry Utilities
 *
 * Exponential backoff for transient provider failures. The wait between
 * attempts is abortable so a cancelled job stops retrying at once.
 */

import { JobCancelledError, ProviderError } from '../../domain/errors/PipelineErrors';

export interface RetryOptions {
    /** Retries after the first attempt (default: 3) */
    maxRetries?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Decides whether a failure is worth another attempt (default: retryable ProviderErrors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry, before the backoff wait */
    onRetry?: (retry: number, error: unknown, nextDelayMs: number) => void;
    /** Stops retrying (and interrupts the backoff wait) when aborted */
    signal?: AbortSignal;
}

type ResolvedRetryOptions = Required<Omit<RetryOptions, 'signal'>> & { signal?: AbortSignal };

const DEFAULT_OPTIONS: ResolvedRetryOptions = {
    maxRetries: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: isTransientError,
    onRetry: () => { },
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @param fn - The async function to execute; receives the 1-based attempt number
 * @returns The result of the first successful attempt
 * @throws The last error once retries are exhausted or the error is not retryable
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts: ResolvedRetryOptions = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        if (opts.signal?.aborted) {
            throw new JobCancelledError();
        }

        try {
            return await fn(attempt);
        } catch (error) {
            const retriesUsed = attempt - 1;
            if (retriesUsed >= opts.maxRetries || !opts.isRetryable(error) || opts.signal?.aborted) {
                throw error;
            }

            // Calculate delay with jitter
            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

            opts.onRetry(attempt, error, delay);
            await sleep(delay, opts.signal);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Default retry predicate: only ProviderErrors flagged retryable.
 */
export function isTransientError(error: unknown): boolean {
    return error instanceof ProviderError && error.retryable;
}

/**
 * Sleeps for a duration; rejects with JobCancelledError if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new JobCancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new JobCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
