/**
 * Per-call context handed to every stage adapter.
 */
export interface AdapterContext {
    jobId: string;
    /** Aborted when the job is cancelled; adapters pass it to their HTTP client */
    signal: AbortSignal;
    /** 1-based attempt number (retries increment it) */
    attempt: number;
}

/**
 * IStageAdapter - uniform contract for every external capability.
 * Implementations throw ProviderError; the error's `retryable` flag tells the
 * orchestrator whether the failure is transient or terminal.
 */
export interface IStageAdapter<TInput, TOutput> {
    /** Adapter name, also used as the throttling key */
    readonly name: string;

    produce(input: TInput, context: AdapterContext): Promise<TOutput>;
}
