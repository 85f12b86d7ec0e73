import { JobConfig } from '../domain/entities/JobConfig';
import {
    JobMilestone,
    PipelineJob,
    STAGE_ORDER,
    completeJob,
    reachMilestone,
    startJob,
    updateStageState,
} from '../domain/entities/PipelineJob';
import { PublishMetadata, PublishReceipt, RenderedVideo, StageDegradation } from '../domain/entities/RenderedVideo';
import { JobNotFoundError, JobStateError, PipelineError, getErrorMessage } from '../domain/errors/PipelineErrors';
import { IFootageProvider } from '../domain/ports/IFootageProvider';
import { IMediaProbe } from '../domain/ports/IMediaProbe';
import { IMediaStore } from '../domain/ports/IMediaStore';
import { IPublisher } from '../domain/ports/IPublisher';
import { IScriptGenerator } from '../domain/ports/IScriptGenerator';
import { IVideoComposer } from '../domain/ports/IVideoComposer';
import { IVoiceSynthesizer } from '../domain/ports/IVoiceSynthesizer';
import { AlignerOptions, DEFAULT_ALIGNER_OPTIONS, SubtitleAligner } from '../domain/services/SubtitleAligner';
import { ContentCache } from '../infrastructure/cache/ContentCache';
import { JobManager } from './JobManager';
import { ArtifactCodecs, createArtifactCodecs } from './pipelines/ArtifactCodecs';
import { ReelPipeline, createReelPipeline } from './pipelines/JobProcessingPipeline';
import { createJobContext, executeParallel, executePipeline, requireArtifact } from './pipelines/PipelineInfrastructure';
import { StageFingerprints, computeStageFingerprints } from './pipelines/StageFingerprints';
import { StageRunner } from './pipelines/StageRunner';
import { ProviderGate, Semaphore } from './resilience/ProviderGate';
import { withRetry } from './resilience/RetryUtils';
import { OrchestratorErrorService } from './services/OrchestratorErrorService';

export interface OrchestratorDependencies {
    scriptGenerator: IScriptGenerator;
    /** Registered by name; a job picks one with its voiceProvider */
    voiceSynthesizers: IVoiceSynthesizer[];
    footageProvider: IFootageProvider;
    composer: IVideoComposer;
    mediaStore: IMediaStore;
    probe: IMediaProbe;
    cache: ContentCache;
    jobManager: JobManager;
    publisher?: IPublisher;
}

export interface OrchestratorOptions {
    /** Concurrent calls per provider */
    providerConcurrency: number;
    /** Jobs running at once; later ones queue */
    jobConcurrency: number;
    retryInitialBackoffMs: number;
    retryMaxBackoffMs: number;
    maxBackgroundVideos: number;
    footageMaxClipSeconds: number;
    aligner: AlignerOptions;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
    providerConcurrency: 2,
    jobConcurrency: 1,
    retryInitialBackoffMs: 1000,
    retryMaxBackoffMs: 30000,
    maxBackgroundVideos: 8,
    footageMaxClipSeconds: 0,
    aligner: DEFAULT_ALIGNER_OPTIONS,
};

export interface PipelineResult {
    job: PipelineJob;
    video: RenderedVideo;
    /** The whole video came from the cache */
    cached: boolean;
}

export interface RunOptions {
    signal?: AbortSignal;
}

const MILESTONES_BEFORE_SUCCESS: JobMilestone[] = [
    'script_ready',
    'audio_ready',
    'captions_ready',
    'footage_ready',
    'composed',
];

/**
 * Drives jobs through script, narration, captions, footage and composition.
 *
 * Every stage is content-addressed: a job whose inputs were seen before
 * reuses the cached artifacts, and concurrent jobs with equal inputs share
 * one computation per stage.
 */
export class PipelineOrchestrator {
    private readonly options: OrchestratorOptions;
    private readonly voices: Map<string, IVoiceSynthesizer>;
    private readonly codecs: ArtifactCodecs;
    private readonly gate: ProviderGate;
    private readonly jobSlots: Semaphore;
    private readonly pipeline: ReelPipeline;
    private readonly errorService: OrchestratorErrorService;
    private readonly controllers = new Map<string, AbortController>();

    constructor(
        private readonly deps: OrchestratorDependencies,
        options: Partial<OrchestratorOptions> = {}
    ) {
        this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
        this.voices = new Map(deps.voiceSynthesizers.map((voice) => [voice.name, voice]));
        this.codecs = createArtifactCodecs(deps.mediaStore);
        this.gate = new ProviderGate(this.options.providerConcurrency);
        this.jobSlots = new Semaphore(this.options.jobConcurrency);
        this.errorService = new OrchestratorErrorService(deps.jobManager);

        const runner = new StageRunner(deps.cache, this.gate, deps.jobManager, {
            initialBackoffMs: this.options.retryInitialBackoffMs,
            maxBackoffMs: this.options.retryMaxBackoffMs,
        });
        this.pipeline = createReelPipeline({
            scriptGenerator: deps.scriptGenerator,
            voices: this.voices,
            footageProvider: deps.footageProvider,
            composer: deps.composer,
            mediaStore: deps.mediaStore,
            probe: deps.probe,
            aligner: new SubtitleAligner(this.options.aligner),
            jobManager: deps.jobManager,
            runner,
            codecs: this.codecs,
            footage: {
                maxBackgroundVideos: this.options.maxBackgroundVideos,
                maxClipSeconds: this.options.footageMaxClipSeconds,
            },
        });
    }

    /**
     * Names of the registered voice synthesizers.
     */
    voiceProviders(): string[] {
        return Array.from(this.voices.keys());
    }

    friendlyMessage(error: PipelineError): string {
        return this.errorService.getFriendlyErrorMessage(error);
    }

    /**
     * Cache keys a config maps to.
     */
    fingerprintsFor(config: JobConfig): StageFingerprints {
        return computeStageFingerprints(config, {
            scriptGenerator: this.deps.scriptGenerator.name,
            footageProvider: this.deps.footageProvider.name,
            maxBackgroundVideos: this.options.maxBackgroundVideos,
            footageMaxClipSeconds: this.options.footageMaxClipSeconds,
            aligner: this.options.aligner,
        });
    }

    /**
     * Runs a job to completion.
     * @throws PipelineError describing the failed stage and the stages a retry can reuse
     */
    async run(config: JobConfig, options: RunOptions = {}): Promise<PipelineResult> {
        const { job, controller, fingerprints } = this.createJob(config);
        const onAbort = () => controller.abort();
        if (options.signal?.aborted) {
            controller.abort();
        }
        options.signal?.addEventListener('abort', onAbort, { once: true });

        try {
            return await this.runQueued(job.id, config, fingerprints, controller);
        } finally {
            options.signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Queues a job and returns it at once. Progress is read with getJob.
     */
    submit(config: JobConfig): PipelineJob {
        const { job, controller, fingerprints } = this.createJob(config);

        void this.runQueued(job.id, config, fingerprints, controller).catch((error: unknown) => {
            // PipelineErrors are already recorded on the job
            if (!(error instanceof PipelineError)) {
                console.error(`[${job.id}] Background run failed:`, error);
            }
        });

        return job;
    }

    /**
     * Requests cancellation of a queued or running job.
     * @returns false when the job is not active
     */
    cancel(jobId: string): boolean {
        if (!this.deps.jobManager.getJob(jobId)) {
            throw new JobNotFoundError(jobId);
        }
        const controller = this.controllers.get(jobId);
        if (!controller || controller.signal.aborted) {
            return false;
        }
        console.log(`[${jobId}] Cancellation requested`);
        controller.abort();
        return true;
    }

    getJob(jobId: string): PipelineJob | null {
        return this.deps.jobManager.getJob(jobId);
    }

    listJobs(): PipelineJob[] {
        return this.deps.jobManager
            .getAllJobs()
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    }

    /**
     * Uploads the video of a succeeded job. Title and hashtags default to the
     * script's.
     */
    async publish(jobId: string, metadata: PublishMetadata = {}): Promise<PublishReceipt> {
        const job = this.deps.jobManager.getJob(jobId);
        if (!job) {
            throw new JobNotFoundError(jobId);
        }
        const publisher = this.deps.publisher;
        if (!publisher) {
            throw new JobStateError(jobId, 'No publisher is configured');
        }
        if (job.status !== 'succeeded' || !job.video) {
            throw new JobStateError(jobId, `Only succeeded jobs can be published (status: ${job.status})`);
        }
        const video = job.video;
        if (!(await this.deps.mediaStore.exists(video.videoPath))) {
            throw new JobStateError(jobId, 'The rendered video is no longer in the media store');
        }

        const merged: PublishMetadata = {
            title: metadata.title ?? job.title,
            description: metadata.description,
            hashtags: metadata.hashtags ?? job.hashtags,
        };

        console.log(`[${jobId}] Publishing via ${publisher.name}...`);
        const signal = new AbortController().signal;
        const receipt = await withRetry(
            (attempt) => this.gate.run(publisher.name, () => publisher.upload(video, merged, { jobId, signal, attempt })),
            {
                maxRetries: job.config?.maxProviderRetries ?? 3,
                initialBackoffMs: this.options.retryInitialBackoffMs,
                maxBackoffMs: this.options.retryMaxBackoffMs,
                onRetry: (retry, error) => console.warn(`[${jobId}] Publish retry ${retry}: ${getErrorMessage(error)}`),
            }
        );

        this.deps.jobManager.updateJob(jobId, (current) => ({ ...current, publishReceipt: receipt, updatedAt: new Date() }));
        console.log(`[${jobId}] Published as ${receipt.remoteId}`);
        return receipt;
    }

    /**
     * Rejects configs that name unknown providers before a job is created.
     * @throws PipelineError of kind invalid_config
     */
    validate(config: JobConfig): void {
        if (!this.voices.has(config.voiceProvider)) {
            throw new PipelineError(
                '',
                null,
                'invalid_config',
                `Unknown voice provider "${config.voiceProvider}" (available: ${this.voiceProviders().join(', ')})`
            );
        }
    }

    private createJob(config: JobConfig): { job: PipelineJob; controller: AbortController; fingerprints: StageFingerprints } {
        this.validate(config);
        const fingerprints = this.fingerprintsFor(config);
        const job = this.deps.jobManager.createJob(fingerprints.job, config);
        const controller = new AbortController();
        this.controllers.set(job.id, controller);
        console.log(`[${job.id}] Created (fingerprint ${fingerprints.job.substring(0, 12)})`);
        return { job, controller, fingerprints };
    }

    private async runQueued(
        jobId: string,
        config: JobConfig,
        fingerprints: StageFingerprints,
        controller: AbortController
    ): Promise<PipelineResult> {
        try {
            return await this.jobSlots.use(() => this.execute(jobId, config, fingerprints, controller.signal), controller.signal);
        } catch (error) {
            if (error instanceof PipelineError) {
                throw error;
            }
            // Cancelled while waiting for a slot
            throw this.errorService.handleJobError(jobId, error, controller.signal.aborted);
        } finally {
            this.controllers.delete(jobId);
        }
    }

    private async execute(
        jobId: string,
        config: JobConfig,
        fingerprints: StageFingerprints,
        signal: AbortSignal
    ): Promise<PipelineResult> {
        this.deps.jobManager.updateJob(jobId, startJob);
        console.log(`[${jobId}] 🚀 Starting pipeline`);

        try {
            const hit = await this.deps.cache.get(fingerprints.job, this.codecs.render);
            if (hit) {
                return await this.finishFromCache(jobId, fingerprints, hit);
            }

            let context = createJobContext(jobId, config, fingerprints, signal);
            context = await executePipeline(context, this.pipeline.prepare);
            context = await executeParallel(context, this.pipeline.parallel);
            context = await executePipeline(context, this.pipeline.finish);

            const video = this.withDegradations(jobId, requireArtifact(context.video, 'a rendered video', 'Pipeline'));
            if (!context.footage?.degraded) {
                await this.deps.cache.put(fingerprints.job, 'render', video);
            }

            const job = this.requireJob(jobId, this.deps.jobManager.updateJob(jobId, (current) => completeJob(current, video)));
            console.log(`[${jobId}] ✅ Finished: ${job.status}`);
            return { job, video, cached: false };
        } catch (error) {
            throw this.errorService.handleJobError(jobId, error, signal.aborted);
        }
    }

    private async finishFromCache(
        jobId: string,
        fingerprints: StageFingerprints,
        video: RenderedVideo
    ): Promise<PipelineResult> {
        console.log(`[${jobId}] Video found in cache, skipping all stages`);
        // Publish defaults come from the script, when it is still cached
        const script = await this.deps.cache.get(fingerprints.script, this.codecs.script);
        const degradations = video.degradations ?? [];

        const updated = this.deps.jobManager.updateJob(jobId, (current) => {
            let job: PipelineJob = script ? { ...current, title: script.title, hashtags: [...script.hashtags] } : current;
            for (const stage of STAGE_ORDER) {
                const note = degradations.find((degradation) => degradation.stage === stage)?.note;
                job = updateStageState(job, stage, {
                    status: note ? 'degraded' : 'ready',
                    note,
                    fingerprint: fingerprints[stage],
                    cached: true,
                    retained: true,
                    finishedAt: new Date(),
                });
            }
            for (const milestone of MILESTONES_BEFORE_SUCCESS) {
                job = reachMilestone(job, milestone);
            }
            job = {
                ...job,
                diagnostics: [...job.diagnostics, ...degradations.map((degradation) => `${degradation.stage}: ${degradation.note}`)],
            };
            return completeJob(job, video);
        });
        return { job: this.requireJob(jobId, updated), video, cached: true };
    }

    /**
     * Records the stages that finished degraded on the video, so a later cache
     * hit on the job fingerprint reports the same status and diagnostics.
     */
    private withDegradations(jobId: string, video: RenderedVideo): RenderedVideo {
        const job = this.deps.jobManager.getJob(jobId);
        if (!job) {
            return video;
        }
        const degradations = STAGE_ORDER.flatMap((stage): StageDegradation[] => {
            const state = job.stages[stage];
            return state.status === 'degraded' ? [{ stage, note: state.note ?? 'degraded' }] : [];
        });
        return degradations.length > 0 ? { ...video, degradations } : video;
    }

    private requireJob(jobId: string, job: PipelineJob | null): PipelineJob {
        if (!job) {
            throw new JobNotFoundError(jobId);
        }
        return job;
    }
}
