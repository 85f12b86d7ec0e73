import { createScriptArtifact } from '../../../domain/entities/ScriptArtifact';
import { reachMilestone } from '../../../domain/entities/PipelineJob';
import { IScriptGenerator } from '../../../domain/ports/IScriptGenerator';
import { JobManager } from '../../JobManager';
import { ArtifactCodecs } from '../ArtifactCodecs';
import { JobContext, PipelineStep } from '../PipelineInfrastructure';
import { StageRunner } from '../StageRunner';

/**
 * Produces the narration script: a supplied script is segmented as-is,
 * otherwise the generator writes one from the prompt.
 */
export class ScriptStep implements PipelineStep {
    readonly name = 'Script';
    readonly stage = 'script';

    constructor(
        private readonly generator: IScriptGenerator,
        private readonly runner: StageRunner,
        private readonly codecs: ArtifactCodecs,
        private readonly jobManager: JobManager
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        const { jobId, config } = context;

        const script = await this.runner.run(context, this.stage, this.codecs.script, async (signal) => {
            if (config.script) {
                console.log(`[${jobId}] Using supplied script (${config.script.length} chars)`);
                return createScriptArtifact({ rawText: config.script });
            }

            console.log(`[${jobId}] Generating ${config.scriptDurationSeconds}s script with ${this.generator.name}...`);
            return this.runner.callProvider(context, this.stage, this.generator.name, signal, (adapterContext) =>
                this.generator.produce(
                    {
                        prompt: config.prompt,
                        targetDurationSeconds: config.scriptDurationSeconds,
                        maxSearchTerms: config.maxSearchTerms,
                    },
                    adapterContext
                )
            );
        });

        this.jobManager.updateJob(jobId, (job) => ({
            ...reachMilestone(job, 'script_ready'),
            title: script.title,
            hashtags: [...script.hashtags],
        }));

        return { ...context, script };
    }
}
