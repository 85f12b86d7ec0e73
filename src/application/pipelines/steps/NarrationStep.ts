import { reachMilestone } from '../../../domain/entities/PipelineJob';
import { IVoiceSynthesizer } from '../../../domain/ports/IVoiceSynthesizer';
import { JobManager } from '../../JobManager';
import { ArtifactCodecs } from '../ArtifactCodecs';
import { JobContext, PipelineStep, requireArtifact } from '../PipelineInfrastructure';
import { StageRunner } from '../StageRunner';

export class NarrationStep implements PipelineStep {
    readonly name = 'Narration';
    readonly stage = 'narration';

    constructor(
        private readonly voices: ReadonlyMap<string, IVoiceSynthesizer>,
        private readonly runner: StageRunner,
        private readonly codecs: ArtifactCodecs,
        private readonly jobManager: JobManager
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        const { jobId, config } = context;
        const script = requireArtifact(context.script, 'a script', this.name);
        const voice = this.voices.get(config.voiceProvider);
        if (!voice) {
            throw new Error(`Voice provider "${config.voiceProvider}" is not registered`);
        }

        const audio = await this.runner.run(context, this.stage, this.codecs.narration, (signal) => {
            console.log(`[${jobId}] Synthesizing narration with ${voice.name} (${script.segments.length} segments)...`);
            return this.runner.callProvider(context, this.stage, voice.name, signal, (adapterContext) =>
                voice.produce({ script, voice: { voiceId: config.voiceId } }, adapterContext)
            );
        });

        console.log(`[${jobId}] Narration: ${audio.durationSeconds.toFixed(2)}s`);
        this.jobManager.updateJob(jobId, (job) => reachMilestone(job, 'audio_ready'));
        return { ...context, audio };
    }
}
