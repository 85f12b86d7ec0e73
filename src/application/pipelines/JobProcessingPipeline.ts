import { IFootageProvider } from '../../domain/ports/IFootageProvider';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { IMediaStore } from '../../domain/ports/IMediaStore';
import { IScriptGenerator } from '../../domain/ports/IScriptGenerator';
import { IVideoComposer } from '../../domain/ports/IVideoComposer';
import { IVoiceSynthesizer } from '../../domain/ports/IVoiceSynthesizer';
import { SubtitleAligner } from '../../domain/services/SubtitleAligner';
import { JobManager } from '../JobManager';
import { ArtifactCodecs } from './ArtifactCodecs';
import { PipelineStep } from './PipelineInfrastructure';
import { StageRunner } from './StageRunner';
import { CaptionsStep } from './steps/CaptionsStep';
import { CompositionStep } from './steps/CompositionStep';
import { FootageStep, FootageStepOptions } from './steps/FootageStep';
import { NarrationStep } from './steps/NarrationStep';
import { ScriptStep } from './steps/ScriptStep';

// Dependencies needed for pipeline creation
export interface PipelineDependencies {
    scriptGenerator: IScriptGenerator;
    voices: ReadonlyMap<string, IVoiceSynthesizer>;
    footageProvider: IFootageProvider;
    composer: IVideoComposer;
    mediaStore: IMediaStore;
    probe: IMediaProbe;
    aligner: SubtitleAligner;
    jobManager: JobManager;
    runner: StageRunner;
    codecs: ArtifactCodecs;
    footage: FootageStepOptions;
}

/**
 * The reel pipeline in three phases: script and narration in order, then
 * captions and footage side by side, then composition.
 */
export interface ReelPipeline {
    prepare: PipelineStep[];
    parallel: PipelineStep[];
    finish: PipelineStep[];
}

export function createReelPipeline(deps: PipelineDependencies): ReelPipeline {
    const { runner, codecs, jobManager } = deps;

    return {
        prepare: [
            new ScriptStep(deps.scriptGenerator, runner, codecs, jobManager),
            new NarrationStep(deps.voices, runner, codecs, jobManager),
        ],
        parallel: [
            new CaptionsStep(deps.aligner, runner, codecs, jobManager),
            new FootageStep(
                deps.footageProvider,
                deps.mediaStore,
                deps.probe,
                deps.composer,
                runner,
                codecs,
                jobManager,
                deps.footage
            ),
        ],
        finish: [new CompositionStep(deps.composer, deps.mediaStore, runner, codecs, jobManager)],
    };
}
