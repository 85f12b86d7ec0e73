import path from 'path';
import { AudioArtifact } from '../../../domain/entities/AudioArtifact';
import { FootageCandidate, FootageTrack } from '../../../domain/entities/FootageClip';
import { reachMilestone } from '../../../domain/entities/PipelineJob';
import { ScriptArtifact } from '../../../domain/entities/ScriptArtifact';
import { CompositionError, JobCancelledError, ProviderError, getErrorMessage } from '../../../domain/errors/PipelineErrors';
import { IFootageProvider } from '../../../domain/ports/IFootageProvider';
import { IMediaProbe } from '../../../domain/ports/IMediaProbe';
import { IMediaStore } from '../../../domain/ports/IMediaStore';
import { IVideoComposer } from '../../../domain/ports/IVideoComposer';
import { dedupeCandidates, planFootageTrack } from '../../../domain/services/FootageComposer';
import { JobManager } from '../../JobManager';
import { ArtifactCodecs } from '../ArtifactCodecs';
import { JobContext, PipelineStep, requireArtifact } from '../PipelineInfrastructure';
import { StageRunner } from '../StageRunner';

export interface FootageStepOptions {
    /** Upper bound on candidates downloaded */
    maxBackgroundVideos: number;
    /** Longest single cut; 0 uses whole clips */
    maxClipSeconds: number;
}

/** Shortest stock clip worth downloading */
const MIN_CLIP_SECONDS = 3;

interface Gathered {
    candidates: FootageCandidate[];
    problems: string[];
}

/**
 * Gathers background footage and renders the looped, cropped visual track.
 *
 * Searches that fail transiently, and downloads that fail, shrink the
 * candidate list instead of failing the job; such a track is degraded and
 * never cached. No usable footage at all is a CompositionError.
 */
export class FootageStep implements PipelineStep {
    readonly name = 'Footage';
    readonly stage = 'footage';

    constructor(
        private readonly provider: IFootageProvider,
        private readonly mediaStore: IMediaStore,
        private readonly probe: IMediaProbe,
        private readonly composer: IVideoComposer,
        private readonly runner: StageRunner,
        private readonly codecs: ArtifactCodecs,
        private readonly jobManager: JobManager,
        private readonly options: FootageStepOptions
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        const script = requireArtifact(context.script, 'a script', this.name);
        const audio = requireArtifact(context.audio, 'narration audio', this.name);

        const footage = await this.runner.run(
            context,
            this.stage,
            this.codecs.footage,
            async (signal) => {
                const gathered = context.config.backgroundVideoPaths
                    ? await this.localCandidates(context.jobId, context.config.backgroundVideoPaths)
                    : await this.downloadCandidates(context, await this.searchCandidates(context, script, audio, signal), signal);

                const track = planFootageTrack(gathered.candidates, audio.durationSeconds, {
                    maxClipSeconds: this.options.maxClipSeconds,
                    problems: gathered.problems,
                });
                console.log(
                    `[${context.jobId}] Planned ${track.clips.length} clips from ${track.candidateCount} candidates`
                );

                const visualTrackPath = this.mediaStore.outputPath(`visual_${context.fingerprints.footage.substring(0, 16)}`, 'mp4');
                await this.composer.renderVisualTrack(track, visualTrackPath, signal);
                return { ...track, visualTrackPath };
            },
            {
                shouldCommit: (track) => !track.degraded,
                degradedReason: (track) => (track.degraded ? track.problems.join('; ') || 'incomplete footage' : undefined),
            }
        );

        this.jobManager.updateJob(context.jobId, (job) => reachMilestone(job, 'footage_ready'));
        return { ...context, footage };
    }

    /**
     * Search terms of the script, or the prompt when the script carries none.
     */
    static searchTermsFor(script: ScriptArtifact, prompt: string, maxTerms: number): string[] {
        const terms = script.searchTerms.slice(0, maxTerms);
        if (terms.length > 0) {
            return terms;
        }
        const fallback = prompt.trim() || script.title || script.segments[0]?.text || '';
        return fallback ? [fallback] : [];
    }

    private async searchCandidates(
        context: JobContext,
        script: ScriptArtifact,
        audio: AudioArtifact,
        signal: AbortSignal
    ): Promise<Gathered> {
        const { jobId, config } = context;
        const terms = FootageStep.searchTermsFor(script, config.prompt, config.maxSearchTerms);
        const minDurationSeconds = Math.min(MIN_CLIP_SECONDS, audio.durationSeconds);
        const found: FootageCandidate[] = [];
        const failedTerms: string[] = [];

        for (const term of terms) {
            if (dedupeCandidates(found).length >= this.options.maxBackgroundVideos) {
                break;
            }
            try {
                const results = await this.runner.callProvider(context, this.stage, this.provider.name, signal, (adapterContext) =>
                    this.provider.search({ keywords: term, minDurationSeconds }, adapterContext)
                );
                console.log(`[${jobId}] "${term}": ${results.length} clips from ${this.provider.name}`);
                found.push(...results.map((candidate) => ({ ...candidate, searchTerm: term })));
            } catch (error) {
                if (error instanceof ProviderError && error.code === 'no_results') {
                    console.log(`[${jobId}] "${term}": no clips`);
                    continue;
                }
                if (error instanceof ProviderError && error.retryable) {
                    console.warn(`[${jobId}] Footage search for "${term}" failed: ${error.message}`);
                    failedTerms.push(term);
                    continue;
                }
                throw error;
            }
        }

        return {
            candidates: dedupeCandidates(found).slice(0, this.options.maxBackgroundVideos),
            problems: failedTerms.length > 0 ? [`search failed for ${failedTerms.length} of ${terms.length} terms`] : [],
        };
    }

    private async downloadCandidates(context: JobContext, gathered: Gathered, signal: AbortSignal): Promise<Gathered> {
        if (gathered.candidates.length === 0) {
            throw new CompositionError('no_footage', 'Footage search returned no clips');
        }

        const downloaded: FootageCandidate[] = [];
        let failed = 0;
        for (const candidate of gathered.candidates) {
            const url = candidate.url;
            if (!url) {
                continue;
            }
            try {
                const localPath = await this.runner.callProvider(context, this.stage, 'download', signal, () =>
                    this.mediaStore.download(url, 'mp4', signal)
                );
                downloaded.push({ ...candidate, localPath });
            } catch (error) {
                if (!(error instanceof ProviderError)) {
                    throw error;
                }
                console.warn(`[${context.jobId}] Download of ${candidate.id} failed: ${error.message}`);
                failed++;
            }
        }

        const problems = [...gathered.problems];
        if (failed > 0) {
            problems.push(`${failed} of ${gathered.candidates.length} downloads failed`);
        }
        return { candidates: downloaded, problems };
    }

    private async localCandidates(jobId: string, paths: readonly string[]): Promise<Gathered> {
        const candidates: FootageCandidate[] = [];
        for (const [index, localPath] of paths.entries()) {
            try {
                const info = await this.probe.probe(localPath);
                candidates.push({
                    id: `local:${index}:${path.basename(localPath)}`,
                    provider: 'local',
                    localPath,
                    durationSeconds: info.durationSeconds,
                    width: info.width,
                    height: info.height,
                });
            } catch (error) {
                if (error instanceof JobCancelledError) {
                    throw error;
                }
                console.warn(`[${jobId}] Skipping background video ${localPath}: ${getErrorMessage(error)}`);
            }
        }
        return { candidates, problems: [] };
    }
}
