import { StageName, updateStageState } from '../../domain/entities/PipelineJob';
import { PipelineError, classifyStageError, getErrorMessage } from '../../domain/errors/PipelineErrors';
import { AdapterContext } from '../../domain/ports/IStageAdapter';
import { ArtifactCodec, ContentCache } from '../../infrastructure/cache/ContentCache';
import { JobManager } from '../JobManager';
import { ProviderGate } from '../resilience/ProviderGate';
import { withRetry } from '../resilience/RetryUtils';
import { JobContext } from './PipelineInfrastructure';

export interface StageRunnerOptions {
    initialBackoffMs: number;
    maxBackoffMs: number;
}

export interface StageRunOptions<T> {
    /** Returns why the artifact is degraded, or undefined when it is complete */
    degradedReason?: (artifact: T) => string | undefined;
    /** Returning false keeps the artifact out of the cache */
    shouldCommit?: (artifact: T) => boolean;
}

/**
 * Shared mechanics of every stage: cache lookup with single-flight, stage
 * bookkeeping on the job record, and gated provider calls with retries.
 */
export class StageRunner {
    constructor(
        private readonly cache: ContentCache,
        private readonly gate: ProviderGate,
        private readonly jobManager: JobManager,
        private readonly options: StageRunnerOptions
    ) { }

    /**
     * Returns the stage artifact from the cache or computes it.
     * @throws PipelineError naming the stage when the computation fails
     */
    async run<T>(
        context: JobContext,
        stage: StageName,
        codec: ArtifactCodec<T>,
        compute: (signal: AbortSignal) => Promise<T>,
        options: StageRunOptions<T> = {}
    ): Promise<T> {
        const { jobId } = context;
        const fingerprint = context.fingerprints[stage];

        this.jobManager.updateJob(jobId, (job) =>
            updateStageState({ ...job, currentStage: stage }, stage, {
                status: 'running',
                fingerprint,
                startedAt: new Date(),
            })
        );

        try {
            const lookup = await this.cache.getOrCompute(fingerprint, codec, compute, {
                signal: context.signal,
                shouldCommit: options.shouldCommit,
            });
            const note = options.degradedReason?.(lookup.value);

            this.jobManager.updateJob(jobId, (job) => {
                const updated = updateStageState(job, stage, {
                    status: note ? 'degraded' : 'ready',
                    cached: lookup.cached,
                    retained: lookup.stored,
                    note,
                    finishedAt: new Date(),
                });
                return note ? { ...updated, diagnostics: [...updated.diagnostics, `${stage}: ${note}`] } : updated;
            });

            const source = lookup.cached ? 'cache hit' : lookup.shared ? 'shared computation' : 'computed';
            console.log(`[${jobId}] ${stage} ready (${source}${note ? `, degraded: ${note}` : ''})`);
            return lookup.value;
        } catch (error) {
            this.jobManager.updateJob(jobId, (job) =>
                updateStageState(job, stage, { status: 'failed', note: getErrorMessage(error), finishedAt: new Date() })
            );
            throw new PipelineError(jobId, stage, classifyStageError(error), getErrorMessage(error), [], { cause: error });
        }
    }

    /**
     * Calls a provider under its concurrency gate, retrying transient failures.
     * Retries are counted on the stage.
     */
    callProvider<T>(
        context: Pick<JobContext, 'jobId' | 'config'>,
        stage: StageName,
        provider: string,
        signal: AbortSignal,
        fn: (adapterContext: AdapterContext) => Promise<T>
    ): Promise<T> {
        const { jobId } = context;
        const maxRetries = context.config.maxProviderRetries;

        return withRetry(
            (attempt) => this.gate.run(provider, () => fn({ jobId, signal, attempt }), signal),
            {
                maxRetries,
                initialBackoffMs: this.options.initialBackoffMs,
                maxBackoffMs: this.options.maxBackoffMs,
                signal,
                onRetry: (retry, error, delayMs) => {
                    console.warn(
                        `[${jobId}] ${provider} failed: ${getErrorMessage(error)}. Retry ${retry}/${maxRetries} in ${delayMs}ms`
                    );
                    this.jobManager.updateJob(jobId, (job) =>
                        updateStageState(job, stage, { retries: job.stages[stage].retries + 1 })
                    );
                },
            }
        );
    }
}
