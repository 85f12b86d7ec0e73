import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { JobManager } from '../application/JobManager';
import { PipelineOrchestrator, OrchestratorDependencies } from '../application/PipelineOrchestrator';
import { IFootageProvider } from '../domain/ports/IFootageProvider';
import { ICacheStore } from '../domain/ports/ICacheStore';
import { IMediaProbe } from '../domain/ports/IMediaProbe';
import { IMediaStore } from '../domain/ports/IMediaStore';
import { IVoiceSynthesizer } from '../domain/ports/IVoiceSynthesizer';

// Infrastructure imports
import { ContentCache } from '../infrastructure/cache/ContentCache';
import { FileCacheStore } from '../infrastructure/cache/FileCacheStore';
import { RedisCacheStore } from '../infrastructure/cache/RedisCacheStore';
import { OpenAIScriptGenerator } from '../infrastructure/llm/OpenAIScriptGenerator';
import { FFprobeMediaProbe } from '../infrastructure/media/FFprobeMediaProbe';
import { LocalMediaStore } from '../infrastructure/media/LocalMediaStore';
import { WebhookPublisher } from '../infrastructure/publish/WebhookPublisher';
import { ElevenLabsVoiceSynthesizer } from '../infrastructure/tts/ElevenLabsVoiceSynthesizer';
import { FishAudioVoiceSynthesizer } from '../infrastructure/tts/FishAudioVoiceSynthesizer';
import { OpenAIVoiceSynthesizer } from '../infrastructure/tts/OpenAIVoiceSynthesizer';
import { FFmpegVideoComposer } from '../infrastructure/video/FFmpegVideoComposer';
import { PexelsFootageProvider } from '../infrastructure/video/PexelsFootageProvider';
import { PixabayFootageProvider } from '../infrastructure/video/PixabayFootageProvider';

// Route imports
import { createJobRoutes } from './routes/jobRoutes';
import { errorHandler } from './middleware/errorHandler';

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, orchestrator: PipelineOrchestrator = createDependencies(config).orchestrator): Application {
    const app = express();

    // Middleware
    app.use(cors({
        origin: config.corsOrigins,
        credentials: true
    }));
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
            voiceProviders: orchestrator.voiceProviders(),
        });
    });

    // Routes
    app.use(createJobRoutes(orchestrator, config.jobDefaults));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): {
    jobManager: JobManager;
    orchestrator: PipelineOrchestrator;
    cache: ContentCache;
} {
    const mediaStore = new LocalMediaStore(config.mediaDir);
    const probe = new FFprobeMediaProbe();
    const cache = new ContentCache(createCacheStore(config), {
        maxEntries: config.cacheMaxEntries,
        maxBytes: config.cacheMaxBytes,
        maxAgeSeconds: config.cacheMaxAgeSeconds,
    });
    const jobManager = new JobManager(config.jobsPath);

    const deps: OrchestratorDependencies = {
        scriptGenerator: new OpenAIScriptGenerator(config.openaiApiKey, config.openaiModel),
        voiceSynthesizers: createVoiceSynthesizers(config, mediaStore, probe),
        footageProvider: createFootageProvider(config),
        composer: new FFmpegVideoComposer(),
        mediaStore,
        probe,
        cache,
        jobManager,
        publisher: config.publishWebhookUrl
            ? new WebhookPublisher(config.publishWebhookUrl, config.publishWebhookToken)
            : undefined,
    };
    console.log(`📤 Publishing: ${deps.publisher ? 'webhook' : 'disabled'}`);

    const orchestrator = new PipelineOrchestrator(deps, {
        providerConcurrency: config.providerConcurrency,
        jobConcurrency: config.jobConcurrency,
        retryInitialBackoffMs: config.retryInitialBackoffMs,
        maxBackgroundVideos: config.maxBackgroundVideos,
        footageMaxClipSeconds: config.footageMaxClipSeconds,
    });
    return { jobManager, orchestrator, cache };
}

// --- Helper Functions ---

function createCacheStore(config: Config): ICacheStore {
    if (config.redisUrl) {
        console.log('🗄️  Cache: Redis');
        return new RedisCacheStore(config.redisUrl);
    }
    console.log(`🗄️  Cache: ${config.cacheDir}`);
    return new FileCacheStore(config.cacheDir);
}

function createVoiceSynthesizers(config: Config, mediaStore: IMediaStore, probe: IMediaProbe): IVoiceSynthesizer[] {
    const voices: IVoiceSynthesizer[] = [
        new OpenAIVoiceSynthesizer(config.openaiApiKey, mediaStore, probe, config.openaiTtsVoice),
    ];

    if (config.fishAudioApiKey && config.fishAudioVoiceId) {
        voices.push(new FishAudioVoiceSynthesizer(
            config.fishAudioApiKey,
            config.fishAudioVoiceId,
            mediaStore,
            probe,
            config.fishAudioBaseUrl
        ));
    }
    if (config.elevenLabsApiKey && config.elevenLabsVoiceId) {
        voices.push(new ElevenLabsVoiceSynthesizer(
            config.elevenLabsApiKey,
            config.elevenLabsVoiceId,
            mediaStore,
            probe,
            config.elevenLabsModelId
        ));
    }

    console.log(`🎙️ Voices: ${voices.map((voice) => voice.name).join(', ')}`);
    return voices;
}

function createFootageProvider(config: Config): IFootageProvider {
    if (config.footageProvider === 'pixabay') {
        console.log('🎞️ Footage: Pixabay');
        return new PixabayFootageProvider(config.pixabayApiKey);
    }
    console.log('🎞️ Footage: Pexels');
    return new PexelsFootageProvider(config.pexelsApiKey);
}
