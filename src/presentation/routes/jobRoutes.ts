import { Router, Request, Response } from 'express';
import { PipelineOrchestrator } from '../../application/PipelineOrchestrator';
import { JobConfig, JobConfigDefaults, JobConfigInput, SubtitlesPosition, createJobConfig } from '../../domain/entities/JobConfig';
import { PipelineJob, isJobTerminal } from '../../domain/entities/PipelineJob';
import { PublishMetadata } from '../../domain/entities/RenderedVideo';
import { asyncHandler, BadRequestError, ConflictError, NotFoundError } from '../middleware/errorHandler';

type Body = { [key: string]: unknown };

function asBody(value: unknown): Body {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new BadRequestError('Request body must be a JSON object');
    }
    return { ...value };
}

function optionalString(body: Body, key: string): string | undefined {
    const value = body[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new BadRequestError(`${key} must be a string`);
    }
    return value;
}

function optionalNumber(body: Body, key: string): number | undefined {
    const value = body[key];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new BadRequestError(`${key} must be a number`);
    }
    return value;
}

function optionalStringArray(body: Body, key: string): string[] | undefined {
    const value = body[key];
    if (value === undefined) {
        return undefined;
    }
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new BadRequestError(`${key} must be an array of strings`);
    }
    return value;
}

const POSITIONS: readonly SubtitlesPosition[] = ['top', 'center', 'bottom'];

function optionalPosition(body: Body): SubtitlesPosition | undefined {
    const value = optionalString(body, 'subtitlesPosition');
    if (value === undefined) {
        return undefined;
    }
    const position = POSITIONS.find((candidate) => candidate === value);
    if (!position) {
        throw new BadRequestError('subtitlesPosition must be "top", "center" or "bottom"');
    }
    return position;
}

/**
 * Reads a job request body. Omitted fields take the process defaults.
 */
export function parseJobRequest(value: unknown): JobConfigInput {
    const body = asBody(value);
    return {
        prompt: optionalString(body, 'prompt'),
        script: optionalString(body, 'script'),
        scriptDurationSeconds: optionalNumber(body, 'scriptDurationSeconds'),
        voiceProvider: optionalString(body, 'voiceProvider'),
        voiceId: optionalString(body, 'voiceId'),
        fontSize: optionalNumber(body, 'fontSize'),
        fontName: optionalString(body, 'fontName'),
        strokeColor: optionalString(body, 'strokeColor'),
        textColor: optionalString(body, 'textColor'),
        strokeWidth: optionalNumber(body, 'strokeWidth'),
        subtitlesPosition: optionalPosition(body),
        watermarkPathOrText: optionalString(body, 'watermarkPathOrText'),
        backgroundMusicPath: optionalString(body, 'backgroundMusicPath'),
        backgroundVideoPaths: optionalStringArray(body, 'backgroundVideoPaths'),
        maxSearchTerms: optionalNumber(body, 'maxSearchTerms'),
        maxProviderRetries: optionalNumber(body, 'maxProviderRetries'),
    };
}

function toJobConfig(input: JobConfigInput, defaults: JobConfigDefaults): JobConfig {
    try {
        return createJobConfig(input, defaults);
    } catch (error) {
        throw new BadRequestError(error instanceof Error ? error.message : String(error));
    }
}

function parsePublishRequest(value: unknown): PublishMetadata {
    const body = value === undefined ? {} : asBody(value);
    return {
        title: optionalString(body, 'title'),
        description: optionalString(body, 'description'),
        hashtags: optionalStringArray(body, 'hashtags'),
    };
}

/**
 * Serializes a job for API responses.
 */
export function toJobResponse(job: PipelineJob): Record<string, unknown> {
    const response: Record<string, unknown> = {
        jobId: job.id,
        status: job.status,
        fingerprint: job.fingerprint,
        milestones: job.milestones,
        stages: job.stages,
        createdAt: job.createdAt.toISOString(),
        updatedAt: job.updatedAt.toISOString(),
    };

    // Add current stage for in-progress jobs
    if (job.currentStage && !isJobTerminal(job)) {
        response.stage = job.currentStage;
    }
    if (job.diagnostics.length > 0) {
        response.diagnostics = job.diagnostics;
    }
    if (job.status === 'failed' && job.error) {
        response.error = job.error;
    }
    if (job.video) {
        response.video = job.video;
    }
    if (job.publishReceipt) {
        response.publishReceipt = job.publishReceipt;
    }

    return response;
}

/**
 * Creates job routes with dependency injection.
 */
export function createJobRoutes(orchestrator: PipelineOrchestrator, defaults: JobConfigDefaults): Router {
    const router = Router();

    const findJob = (jobId: string): PipelineJob => {
        const job = orchestrator.getJob(jobId);
        if (!job) {
            throw new NotFoundError(`Job not found: ${jobId}`);
        }
        return job;
    };

    /**
     * POST /jobs
     *
     * Starts a new reel job.
     * Returns immediately with the job ID for polling.
     */
    router.post(
        '/jobs',
        asyncHandler(async (req: Request, res: Response) => {
            const config = toJobConfig(parseJobRequest(req.body), defaults);
            const job = orchestrator.submit(config);
            res.status(202).json({
                jobId: job.id,
                status: job.status,
                fingerprint: job.fingerprint,
            });
        })
    );

    /**
     * GET /jobs
     *
     * Lists all jobs, newest first.
     */
    router.get(
        '/jobs',
        asyncHandler(async (req: Request, res: Response) => {
            const jobs = orchestrator.listJobs();
            res.json({
                total: jobs.length,
                jobs: jobs.map((job) => ({
                    jobId: job.id,
                    status: job.status,
                    stage: job.currentStage,
                    createdAt: job.createdAt.toISOString(),
                    updatedAt: job.updatedAt.toISOString(),
                })),
            });
        })
    );

    /**
     * GET /jobs/:jobId
     *
     * Returns the current status and results of a job.
     */
    router.get(
        '/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(toJobResponse(findJob(req.params.jobId)));
        })
    );

    /**
     * POST /jobs/:jobId/cancel
     */
    router.post(
        '/jobs/:jobId/cancel',
        asyncHandler(async (req: Request, res: Response) => {
            const job = findJob(req.params.jobId);
            if (!orchestrator.cancel(job.id)) {
                throw new ConflictError(`Job ${job.id} is not running (status: ${job.status})`);
            }
            res.status(202).json({ jobId: job.id, cancelling: true });
        })
    );

    /**
     * POST /jobs/:jobId/publish
     *
     * Uploads the finished video. Body fields override the script's title and hashtags.
     */
    router.post(
        '/jobs/:jobId/publish',
        asyncHandler(async (req: Request, res: Response) => {
            const job = findJob(req.params.jobId);
            const receipt = await orchestrator.publish(job.id, parsePublishRequest(req.body));
            res.json({
                jobId: job.id,
                remoteId: receipt.remoteId,
                url: receipt.url,
                publishedAt: receipt.publishedAt.toISOString(),
            });
        })
    );

    return router;
}
