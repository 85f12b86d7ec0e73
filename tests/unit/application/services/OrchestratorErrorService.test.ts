import { OrchestratorErrorService } from '../../../../src/application/services/OrchestratorErrorService';
import { JobManager } from '../../../../src/application/JobManager';
import { startJob, updateStageState } from '../../../../src/domain/entities/PipelineJob';
import {
    CompositionError,
    PipelineError,
    ProviderError,
} from '../../../../src/domain/errors/PipelineErrors';
import { silenceConsole } from '../../../helpers/harness';

describe('OrchestratorErrorService', () => {
    silenceConsole();

    let jobManager: JobManager;
    let service: OrchestratorErrorService;
    let jobId: string;

    beforeEach(() => {
        jobManager = new JobManager(null);
        service = new OrchestratorErrorService(jobManager);
        jobId = jobManager.createJob('d'.repeat(64)).id;
        jobManager.updateJob(jobId, (job) => ({
            ...updateStageState(startJob(job), 'script', { status: 'ready', retained: true }),
            currentStage: 'footage',
        }));
    });

    describe('handleJobError', () => {
        it('should keep the stage and cause of a stage failure', () => {
            const cause = new ProviderError('openai-tts', 'timeout', 'timed out');
            const stageError = new PipelineError(jobId, 'narration', 'provider_transient', 'timed out', [], { cause });

            const error = service.handleJobError(jobId, stageError, false);

            expect(error).toMatchObject({ jobId, stage: 'narration', kind: 'provider_transient', message: 'timed out' });
            expect(error.retainedStages).toEqual(['script']);
            expect(error.cause).toBe(cause);
        });

        it('should record the failure on the job', () => {
            service.handleJobError(jobId, new CompositionError('no_footage', 'Footage search returned no clips'), false);

            const job = jobManager.getJob(jobId);
            expect(job?.status).toBe('failed');
            expect(job?.milestones).toEqual(['pending', 'failed']);
            expect(job?.error).toEqual({
                stage: 'footage',
                kind: 'composition',
                message: 'Footage search returned no clips',
                retainedStages: ['script'],
            });
        });

        it('should report any failure after an abort as a cancellation', () => {
            const error = service.handleJobError(jobId, new Error('socket hang up'), true);

            expect(error.kind).toBe('cancelled');
            expect(error.stage).toBe('footage');
        });

        it('should classify unknown errors as internal', () => {
            expect(service.handleJobError(jobId, 'boom', false)).toMatchObject({ kind: 'internal', message: 'boom' });
        });
    });

    describe('getFriendlyErrorMessage', () => {
        function failure(kind: PipelineError['kind'], cause?: unknown): PipelineError {
            return new PipelineError(jobId, 'narration', kind, 'raw message', [], { cause });
        }

        it('should name the provider that rejected the credentials', () => {
            const cause = new ProviderError('openai-tts', 'invalid_credentials', 'bad key');

            expect(service.getFriendlyErrorMessage(failure('provider_terminal', cause))).toBe(
                'The openai-tts service rejected our credentials. Please contact the admin.'
            );
        });

        it('should suggest a retry for transient failures', () => {
            expect(service.getFriendlyErrorMessage(failure('provider_transient'))).toBe(
                'An external service is unavailable right now. Please try again in a moment; finished stages will be reused.'
            );
        });

        it('should include the message for invalid configs', () => {
            expect(service.getFriendlyErrorMessage(failure('invalid_config'))).toBe(
                'The job configuration is invalid: raw message'
            );
        });

        it('should fall back to a generic message', () => {
            expect(service.getFriendlyErrorMessage(failure('internal'))).toBe(
                'Something went wrong. An unexpected error occurred. Please try again.'
            );
        });
    });
});
