/**
 * Pipeline infrastructure for decomposing the orchestration into stages.
 * Each step produces one artifact.
 */

import { AudioArtifact } from '../../domain/entities/AudioArtifact';
import { CaptionTrack } from '../../domain/entities/CaptionSegment';
import { FootageTrack } from '../../domain/entities/FootageClip';
import { JobConfig } from '../../domain/entities/JobConfig';
import { StageName } from '../../domain/entities/PipelineJob';
import { RenderedVideo } from '../../domain/entities/RenderedVideo';
import { ScriptArtifact } from '../../domain/entities/ScriptArtifact';
import { StageFingerprints } from './StageFingerprints';

/**
 * JobContext carries all state through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface JobContext {
    readonly jobId: string;
    readonly config: JobConfig;
    readonly fingerprints: StageFingerprints;
    /** Aborted when the job is cancelled or a sibling stage fails */
    readonly signal: AbortSignal;

    script?: ScriptArtifact;
    audio?: AudioArtifact;
    captions?: CaptionTrack;
    footage?: FootageTrack;
    video?: RenderedVideo;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    readonly stage: StageName;
    execute(context: JobContext): Promise<JobContext>;
}

/**
 * Creates the initial context of a job.
 */
export function createJobContext(
    jobId: string,
    config: JobConfig,
    fingerprints: StageFingerprints,
    signal: AbortSignal
): JobContext {
    return { jobId, config, fingerprints, signal };
}

/**
 * Returns the artifact a step depends on.
 * @throws Error when an earlier step did not run
 */
export function requireArtifact<T>(value: T | undefined, what: string, step: string): T {
    if (value === undefined) {
        throw new Error(`${step} requires ${what}, which no earlier step produced`);
    }
    return value;
}

/**
 * Executes a pipeline of steps sequentially.
 */
export async function executePipeline(context: JobContext, steps: PipelineStep[]): Promise<JobContext> {
    let currentContext = context;

    for (const step of steps) {
        console.log(`[Pipeline] Executing ${step.name}...`);
        currentContext = await step.execute(currentContext);
    }

    return currentContext;
}

/**
 * Runs steps concurrently on the same context. The first failure aborts the
 * siblings; the call settles only after every step has stopped, and rethrows
 * the first failure that was not caused by that abort.
 */
export async function executeParallel(context: JobContext, steps: PipelineStep[]): Promise<JobContext> {
    const siblings = new AbortController();
    const onParentAbort = () => siblings.abort();
    if (context.signal.aborted) {
        siblings.abort();
    }
    context.signal.addEventListener('abort', onParentAbort, { once: true });

    const failures: unknown[] = [];
    const scoped: JobContext = { ...context, signal: siblings.signal };

    try {
        const results = await Promise.all(
            steps.map(async (step) => {
                console.log(`[Pipeline] Executing ${step.name}...`);
                try {
                    return await step.execute(scoped);
                } catch (error) {
                    failures.push(error);
                    siblings.abort();
                    return null;
                }
            })
        );

        if (failures.length > 0) {
            throw failures[0];
        }

        return results.reduce<JobContext>(
            (merged, result) => (result ? { ...merged, ...pickArtifacts(result) } : merged),
            context
        );
    } finally {
        context.signal.removeEventListener('abort', onParentAbort);
    }
}

function pickArtifacts(context: JobContext): Partial<JobContext> {
    const artifacts: Partial<JobContext> = {};
    if (context.script) artifacts.script = context.script;
    if (context.audio) artifacts.audio = context.audio;
    if (context.captions) artifacts.captions = context.captions;
    if (context.footage) artifacts.footage = context.footage;
    if (context.video) artifacts.video = context.video;
    return artifacts;
}
