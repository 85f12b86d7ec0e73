import { JobErrorReport, STAGE_ORDER, StageName } from '../../domain/entities/PipelineJob';
import {
    PipelineError,
    PipelineErrorKind,
    ProviderError,
    classifyStageError,
    getErrorMessage,
} from '../../domain/errors/PipelineErrors';
import { JobManager } from '../JobManager';

export class OrchestratorErrorService {
    constructor(private readonly jobManager: JobManager) { }

    /**
     * Records a failed run on the job and returns the error for the caller,
     * with the stages a retry can reuse.
     */
    handleJobError(jobId: string, error: unknown, cancelled: boolean): PipelineError {
        const job = this.jobManager.getJob(jobId);
        const kind: PipelineErrorKind = cancelled ? 'cancelled' : classifyStageError(error);
        const stage: StageName | null = error instanceof PipelineError ? error.stage : job?.currentStage ?? null;
        const cause = error instanceof PipelineError && error.cause !== undefined ? error.cause : error;
        const message = getErrorMessage(error);

        const retainedStages = job ? STAGE_ORDER.filter((name) => job.stages[name].retained) : [];
        const report: JobErrorReport = { stage, kind, message, retainedStages };

        if (kind === 'cancelled') {
            console.warn(`[${jobId}] Job cancelled${stage ? ` during ${stage}` : ''}`);
        } else {
            console.error(`[${jobId}] Job failed${stage ? ` in ${stage}` : ''} (${kind}):`, cause);
        }
        this.jobManager.failJob(jobId, report);

        return new PipelineError(jobId, stage, kind, message, retainedStages, { cause });
    }

    /**
     * Converts a failure into a message for people rather than logs.
     */
    getFriendlyErrorMessage(error: PipelineError): string {
        const cause = error.cause;
        switch (error.kind) {
            case 'cancelled':
                return 'The job was cancelled.';
            case 'provider_transient':
                return `${providerLabel(cause)} is unavailable right now. Please try again in a moment; finished stages will be reused.`;
            case 'provider_terminal':
                if (cause instanceof ProviderError && cause.code === 'invalid_credentials') {
                    return `${providerLabel(cause)} rejected our credentials. Please contact the admin.`;
                }
                if (cause instanceof ProviderError && cause.code === 'content_policy') {
                    return 'The prompt was refused by the script provider. Please try a different topic.';
                }
                return `${providerLabel(cause)} could not handle this request. Please try a different prompt or voice.`;
            case 'composition':
                return 'The video could not be assembled. Try different search terms or supply background videos.';
            case 'alignment':
                return 'Captions could not be timed against the narration.';
            case 'invalid_config':
                return `The job configuration is invalid: ${error.message}`;
            default:
                return 'Something went wrong. An unexpected error occurred. Please try again.';
        }
    }
}

function providerLabel(cause: unknown): string {
    return cause instanceof ProviderError ? `The ${cause.provider} service` : 'An external service';
}
