import { reachMilestone } from '../../../domain/entities/PipelineJob';
import { SubtitleAligner } from '../../../domain/services/SubtitleAligner';
import { JobManager } from '../../JobManager';
import { ArtifactCodecs } from '../ArtifactCodecs';
import { JobContext, PipelineStep, requireArtifact } from '../PipelineInfrastructure';
import { StageRunner } from '../StageRunner';

export class CaptionsStep implements PipelineStep {
    readonly name = 'Captions';
    readonly stage = 'captions';

    constructor(
        private readonly aligner: SubtitleAligner,
        private readonly runner: StageRunner,
        private readonly codecs: ArtifactCodecs,
        private readonly jobManager: JobManager
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        const script = requireArtifact(context.script, 'a script', this.name);
        const audio = requireArtifact(context.audio, 'narration audio', this.name);

        // Degraded captions are still cached: realigning the same inputs gives the same result
        const captions = await this.runner.run(
            context,
            this.stage,
            this.codecs.captions,
            async () => this.aligner.align(script, audio),
            { degradedReason: (track) => (track.degraded ? track.diagnostics.join(', ') : undefined) }
        );

        this.jobManager.updateJob(context.jobId, (job) => reachMilestone(job, 'captions_ready'));
        return { ...context, captions };
    }
}
