import { JobManager } from '../../src/application/JobManager';
import { OrchestratorOptions, PipelineOrchestrator } from '../../src/application/PipelineOrchestrator';
import { PipelineJob, isJobTerminal } from '../../src/domain/entities/PipelineJob';
import { ContentCache } from '../../src/infrastructure/cache/ContentCache';
import { InMemoryCacheStore } from '../../src/infrastructure/cache/InMemoryCacheStore';
import {
    FakeFootageProvider,
    FakeMediaProbe,
    FakeMediaStore,
    FakePublisher,
    FakeScriptGenerator,
    FakeVideoComposer,
    FakeVoiceSynthesizer,
    wait,
} from './fakes';

export interface TestHarness {
    orchestrator: PipelineOrchestrator;
    jobManager: JobManager;
    store: InMemoryCacheStore;
    cache: ContentCache;
    mediaStore: FakeMediaStore;
    probe: FakeMediaProbe;
    composer: FakeVideoComposer;
    scriptGenerator: FakeScriptGenerator;
    voice: FakeVoiceSynthesizer;
    footage: FakeFootageProvider;
    publisher: FakePublisher;
}

/**
 * Orchestrator wired to in-process fakes, an in-memory cache and an
 * unpersisted job registry. Backoff is one millisecond.
 */
export function createTestHarness(options: Partial<OrchestratorOptions> = {}): TestHarness {
    const mediaStore = new FakeMediaStore();
    const probe = new FakeMediaProbe();
    const composer = new FakeVideoComposer(mediaStore);
    const scriptGenerator = new FakeScriptGenerator();
    const voice = new FakeVoiceSynthesizer('openai', mediaStore);
    const footage = new FakeFootageProvider();
    const publisher = new FakePublisher();
    const store = new InMemoryCacheStore();
    const cache = new ContentCache(store);
    const jobManager = new JobManager(null);

    const orchestrator = new PipelineOrchestrator(
        {
            scriptGenerator,
            voiceSynthesizers: [voice],
            footageProvider: footage,
            composer,
            mediaStore,
            probe,
            cache,
            jobManager,
            publisher,
        },
        { retryInitialBackoffMs: 1, retryMaxBackoffMs: 4, ...options }
    );

    return { orchestrator, jobManager, store, cache, mediaStore, probe, composer, scriptGenerator, voice, footage, publisher };
}

/**
 * Silences the pipeline's console output for a test file.
 */
export function silenceConsole(): void {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });
}

/**
 * Polls until a submitted job finishes.
 */
export async function waitForTerminal(orchestrator: PipelineOrchestrator, jobId: string): Promise<PipelineJob> {
    for (let i = 0; i < 500; i++) {
        const job = orchestrator.getJob(jobId);
        if (job && isJobTerminal(job)) {
            return job;
        }
        await wait(2);
    }
    throw new Error(`Job ${jobId} did not finish`);
}
