import { createAudioArtifact, AudioArtifact } from '../../src/domain/entities/AudioArtifact';
import { JobConfig, JobConfigDefaults, JobConfigInput, createJobConfig } from '../../src/domain/entities/JobConfig';
import { AdapterContext } from '../../src/domain/ports/IStageAdapter';

export const TEST_JOB_DEFAULTS: JobConfigDefaults = {
    scriptDurationSeconds: 30,
    voiceProvider: 'openai',
    fontSize: 24,
    fontName: 'Roboto',
    strokeColor: '#000000',
    textColor: '#ffffff',
    strokeWidth: 1,
    subtitlesPosition: 'bottom',
    watermarkPathOrText: '',
    maxSearchTerms: 10,
    maxProviderRetries: 3,
};

export function makeJobConfig(input: JobConfigInput = {}): JobConfig {
    return createJobConfig({ prompt: 'Why octopuses have three hearts', ...input }, TEST_JOB_DEFAULTS);
}

export function makeAudio(durationSeconds: number, extra: Partial<AudioArtifact> = {}): AudioArtifact {
    return createAudioArtifact({
        audioPath: 'narration.mp3',
        format: 'mp3',
        sampleRate: 44100,
        durationSeconds,
        provider: 'test',
        ...extra,
    });
}

export function makeAdapterContext(signal: AbortSignal = new AbortController().signal): AdapterContext {
    return { jobId: 'job_test', signal, attempt: 1 };
}
