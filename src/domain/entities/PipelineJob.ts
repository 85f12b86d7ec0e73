import { JobConfig } from './JobConfig';
import { PublishReceipt, RenderedVideo } from './RenderedVideo';

export type StageName = 'script' | 'narration' | 'captions' | 'footage' | 'composition';

export const STAGE_ORDER: readonly StageName[] = ['script', 'narration', 'captions', 'footage', 'composition'];

/**
 * Overall status of a job.
 * partial_failure is terminal: the video was produced from at least one degraded stage.
 */
export type PipelineJobStatus = 'pending' | 'running' | 'partial_failure' | 'succeeded' | 'failed';

/**
 * Progress markers of the job state machine.
 */
export type JobMilestone =
    | 'pending'
    | 'script_ready'
    | 'audio_ready'
    | 'captions_ready'
    | 'footage_ready'
    | 'composed'
    | 'succeeded'
    | 'failed';

/**
 * Milestones that must already be reached before each milestone.
 * captions_ready and footage_ready both only need audio_ready, so they may be
 * reached in either order.
 */
const MILESTONE_PREREQUISITES: Record<JobMilestone, JobMilestone[]> = {
    pending: [],
    script_ready: ['pending'],
    audio_ready: ['script_ready'],
    captions_ready: ['audio_ready'],
    footage_ready: ['audio_ready'],
    composed: ['captions_ready', 'footage_ready'],
    succeeded: ['composed'],
    failed: [],
};

export type StageStatus = 'pending' | 'running' | 'ready' | 'degraded' | 'failed';

export interface StageState {
    status: StageStatus;
    fingerprint?: string;
    /** True when the artifact came from the cache */
    cached: boolean;
    /** True when the artifact is in the cache and a retry can reuse it */
    retained: boolean;
    /** Number of retries (attempts after the first) across provider calls */
    retries: number;
    /** Why the stage degraded, when it did */
    note?: string;
    startedAt?: Date;
    finishedAt?: Date;
}

/**
 * What a failed job reports.
 */
export interface JobErrorReport {
    stage: StageName | null;
    kind: string;
    message: string;
    /** Stages whose artifacts are cached and can be reused by a retry */
    retainedStages: StageName[];
}

/**
 * PipelineJob is the unit of work driven by the orchestrator.
 */
export interface PipelineJob {
    id: string;
    /** Hash of prompt + configuration */
    fingerprint: string;
    status: PipelineJobStatus;
    config?: JobConfig;
    /** Hook title and hashtags from the script, used as publish defaults */
    title?: string;
    hashtags?: string[];
    /** Milestones reached so far, in order */
    milestones: JobMilestone[];
    currentStage?: StageName;
    stages: Record<StageName, StageState>;
    diagnostics: string[];
    error?: JobErrorReport;
    video?: RenderedVideo;
    publishReceipt?: PublishReceipt;
    createdAt: Date;
    updatedAt: Date;
}

function createStageState(): StageState {
    return { status: 'pending', cached: false, retained: false, retries: 0 };
}

/**
 * Creates a new PipelineJob with initial state.
 */
export function createPipelineJob(id: string, fingerprint: string, config?: JobConfig): PipelineJob {
    if (!id.trim()) {
        throw new Error('PipelineJob id cannot be empty');
    }
    if (!fingerprint.trim()) {
        throw new Error('PipelineJob fingerprint cannot be empty');
    }

    const now = new Date();
    return {
        id: id.trim(),
        fingerprint,
        status: 'pending',
        config,
        milestones: ['pending'],
        stages: {
            script: createStageState(),
            narration: createStageState(),
            captions: createStageState(),
            footage: createStageState(),
            composition: createStageState(),
        },
        diagnostics: [],
        createdAt: now,
        updatedAt: now,
    };
}

export function isJobTerminal(job: PipelineJob): boolean {
    return job.status === 'succeeded' || job.status === 'failed' || job.status === 'partial_failure';
}

export function hasReachedMilestone(job: PipelineJob, milestone: JobMilestone): boolean {
    return job.milestones.includes(milestone);
}

/**
 * Whether the job may move to the given milestone now.
 */
export function canReachMilestone(job: PipelineJob, milestone: JobMilestone): boolean {
    if (hasReachedMilestone(job, 'failed') || hasReachedMilestone(job, 'succeeded')) {
        return false;
    }
    if (hasReachedMilestone(job, milestone)) {
        return false;
    }
    return MILESTONE_PREREQUISITES[milestone].every((required) => hasReachedMilestone(job, required));
}

/**
 * Records a milestone, returning a new job.
 * @throws Error if the transition is not allowed by the state machine
 */
export function reachMilestone(job: PipelineJob, milestone: JobMilestone): PipelineJob {
    if (!canReachMilestone(job, milestone)) {
        throw new Error(`Invalid transition for job ${job.id}: cannot reach '${milestone}' from [${job.milestones.join(', ')}]`);
    }
    return {
        ...job,
        milestones: [...job.milestones, milestone],
        updatedAt: new Date(),
    };
}

/**
 * Updates one stage's state, returning a new job.
 */
export function updateStageState(job: PipelineJob, stage: StageName, patch: Partial<StageState>): PipelineJob {
    return {
        ...job,
        stages: {
            ...job.stages,
            [stage]: { ...job.stages[stage], ...patch },
        },
        updatedAt: new Date(),
    };
}

/**
 * Marks the job as running.
 */
export function startJob(job: PipelineJob): PipelineJob {
    return { ...job, status: 'running', updatedAt: new Date() };
}

/**
 * Marks a job as finished with its video. Degraded stages make it a partial failure.
 */
export function completeJob(job: PipelineJob, video: RenderedVideo): PipelineJob {
    const withMilestone = reachMilestone(job, 'succeeded');
    const degraded = STAGE_ORDER.some((stage) => job.stages[stage].status === 'degraded');
    return {
        ...withMilestone,
        status: degraded ? 'partial_failure' : 'succeeded',
        currentStage: undefined,
        video,
        updatedAt: new Date(),
    };
}

/**
 * Marks a job as failed with its error report.
 */
export function failJob(job: PipelineJob, error: JobErrorReport): PipelineJob {
    const milestones: JobMilestone[] = hasReachedMilestone(job, 'failed') ? job.milestones : [...job.milestones, 'failed'];
    return {
        ...job,
        status: 'failed',
        milestones,
        error,
        updatedAt: new Date(),
    };
}
