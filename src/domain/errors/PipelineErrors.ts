import { StageName } from '../entities/PipelineJob';

/**
 * Failure codes an adapter can report.
 */
export type ProviderErrorCode =
    | 'rate_limited'
    | 'timeout'
    | 'provider_unavailable'
    | 'invalid_prompt'
    | 'unsupported_voice'
    | 'no_results'
    | 'invalid_credentials'
    | 'content_policy';

const RETRYABLE_CODES: ReadonlySet<ProviderErrorCode> = new Set<ProviderErrorCode>([
    'rate_limited',
    'timeout',
    'provider_unavailable',
]);

export function isRetryableCode(code: ProviderErrorCode): boolean {
    return RETRYABLE_CODES.has(code);
}

/**
 * Upstream dependency failure raised by a stage adapter.
 */
export class ProviderError extends Error {
    public readonly retryable: boolean;

    constructor(
        public readonly provider: string,
        public readonly code: ProviderErrorCode,
        message: string,
        options?: { retryable?: boolean; cause?: unknown }
    ) {
        super(message);
        this.name = 'ProviderError';
        this.retryable = options?.retryable ?? isRetryableCode(code);
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }

    get kind(): 'transient' | 'terminal' {
        return this.retryable ? 'transient' : 'terminal';
    }
}

/**
 * Script and audio could not be reconciled closely enough to use provider timing.
 */
export class AlignmentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AlignmentError';
    }
}

export type CompositionFailure = 'no_footage' | 'invalid_duration' | 'render_failed';

/**
 * No visual track can be composed.
 */
export class CompositionError extends Error {
    constructor(
        public readonly reason: CompositionFailure,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = 'CompositionError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * Cache storage I/O failure. Always recoverable: callers treat it as a miss.
 */
export class CacheError extends Error {
    constructor(
        public readonly operation: 'read' | 'write' | 'delete' | 'list',
        public readonly fingerprint: string | null,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = 'CacheError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * The job (or one requester of a shared computation) was cancelled.
 */
export class JobCancelledError extends Error {
    constructor(message: string = 'Job was cancelled') {
        super(message);
        this.name = 'JobCancelledError';
    }
}

/**
 * An operation is not allowed in the job's current state (e.g. publishing a failed job).
 */
export class JobStateError extends Error {
    constructor(
        public readonly jobId: string,
        message: string
    ) {
        super(message);
        this.name = 'JobStateError';
    }
}

export class JobNotFoundError extends Error {
    constructor(public readonly jobId: string) {
        super(`Job not found: ${jobId}`);
        this.name = 'JobNotFoundError';
    }
}

export type PipelineErrorKind =
    | 'provider_transient'
    | 'provider_terminal'
    | 'composition'
    | 'alignment'
    | 'cancelled'
    | 'invalid_config'
    | 'internal';

/**
 * What a caller receives when a job fails.
 */
export class PipelineError extends Error {
    constructor(
        public readonly jobId: string,
        public readonly stage: StageName | null,
        public readonly kind: PipelineErrorKind,
        message: string,
        public readonly retainedStages: StageName[] = [],
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = 'PipelineError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * Maps any error thrown inside a stage to the kind reported to the caller.
 */
export function classifyStageError(error: unknown): PipelineErrorKind {
    if (error instanceof PipelineError) {
        return error.kind;
    }
    if (error instanceof JobCancelledError) {
        return 'cancelled';
    }
    if (error instanceof ProviderError) {
        return error.retryable ? 'provider_transient' : 'provider_terminal';
    }
    if (error instanceof CompositionError) {
        return 'composition';
    }
    if (error instanceof AlignmentError) {
        return 'alignment';
    }
    return 'internal';
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
