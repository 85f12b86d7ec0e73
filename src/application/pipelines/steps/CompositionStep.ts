import { resolveWatermark } from '../../../domain/entities/JobConfig';
import { reachMilestone } from '../../../domain/entities/PipelineJob';
import { RenderedVideo } from '../../../domain/entities/RenderedVideo';
import { CompositionError } from '../../../domain/errors/PipelineErrors';
import { IMediaStore } from '../../../domain/ports/IMediaStore';
import { IVideoComposer } from '../../../domain/ports/IVideoComposer';
import { buildSubtitleStyle } from '../../../domain/services/SubtitleFormatter';
import { JobManager } from '../../JobManager';
import { ArtifactCodecs } from '../ArtifactCodecs';
import { JobContext, PipelineStep, requireArtifact } from '../PipelineInfrastructure';
import { StageRunner } from '../StageRunner';

/**
 * Burns captions and watermark into the visual track and mixes narration
 * with optional background music.
 */
export class CompositionStep implements PipelineStep {
    readonly name = 'Composition';
    readonly stage = 'composition';

    constructor(
        private readonly composer: IVideoComposer,
        private readonly mediaStore: IMediaStore,
        private readonly runner: StageRunner,
        private readonly codecs: ArtifactCodecs,
        private readonly jobManager: JobManager
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        const { jobId, config, fingerprints } = context;
        const audio = requireArtifact(context.audio, 'narration audio', this.name);
        const captions = requireArtifact(context.captions, 'captions', this.name);
        const footage = requireArtifact(context.footage, 'footage', this.name);

        const video = await this.runner.run(
            context,
            this.stage,
            this.codecs.composition,
            async (signal): Promise<RenderedVideo> => {
                if (!footage.visualTrackPath) {
                    throw new CompositionError('no_footage', 'Footage track was never rendered');
                }
                const watermark = resolveWatermark(config);
                const outputPath = this.mediaStore.outputPath(`reel_${fingerprints.composition.substring(0, 16)}`, 'mp4');

                console.log(`[${jobId}] Composing ${audio.durationSeconds.toFixed(2)}s reel...`);
                await this.composer.mux(
                    {
                        visualTrackPath: footage.visualTrackPath,
                        audioPath: audio.audioPath,
                        captions,
                        style: buildSubtitleStyle(config),
                        watermark,
                        backgroundMusicPath: config.backgroundMusicPath,
                        durationSeconds: audio.durationSeconds,
                        outputPath,
                    },
                    signal
                );

                return {
                    fingerprint: fingerprints.job,
                    videoPath: outputPath,
                    durationSeconds: audio.durationSeconds,
                    width: footage.width,
                    height: footage.height,
                    captionCount: captions.segments.length,
                    clipCount: footage.clips.length,
                    hasBackgroundMusic: Boolean(config.backgroundMusicPath),
                    ...(watermark ? { watermark } : {}),
                };
            },
            // Renders of degraded footage stay out of the cache
            { shouldCommit: () => !footage.degraded }
        );

        this.jobManager.updateJob(jobId, (job) => reachMilestone(job, 'composed'));
        return { ...context, video };
    }
}
