import dotenv from 'dotenv';
import { JobConfigDefaults, SubtitlesPosition } from '../domain/entities/JobConfig';

// Load environment variables
dotenv.config();

export type FootageProviderName = 'pexels' | 'pixabay';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    /** Origins allowed by CORS */
    corsOrigins: string[];

    // OpenAI (script generation + TTS)
    openaiApiKey: string;
    openaiModel: string;
    openaiTtsVoice: string;

    // Fish Audio TTS
    fishAudioApiKey: string;
    fishAudioBaseUrl: string;
    fishAudioVoiceId: string;

    // ElevenLabs TTS
    elevenLabsApiKey: string;
    elevenLabsVoiceId: string;
    elevenLabsModelId: string;

    // Stock footage
    footageProvider: FootageProviderName;
    pexelsApiKey: string;
    pixabayApiKey: string;
    /** Upper bound on footage candidates downloaded per job */
    maxBackgroundVideos: number;
    /** Longest single cut in the visual track; 0 uses whole clips */
    footageMaxClipSeconds: number;

    // Storage
    mediaDir: string;
    cacheDir: string;
    cacheMaxEntries: number;
    cacheMaxBytes: number;
    cacheMaxAgeSeconds: number;
    redisUrl?: string;
    jobsPath: string;

    // Resilience & concurrency
    retryInitialBackoffMs: number;
    providerConcurrency: number;
    jobConcurrency: number;

    // Publishing
    publishWebhookUrl: string;
    publishWebhookToken?: string;

    // Defaults applied to every job
    jobDefaults: JobConfigDefaults;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    const match = choices.find((choice) => choice === value);
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
    }
    return match;
}

const FOOTAGE_PROVIDERS: readonly FootageProviderName[] = ['pexels', 'pixabay'];
const SUBTITLE_POSITIONS: readonly SubtitlesPosition[] = ['top', 'center', 'bottom'];

/**
 * Loads configuration from environment variables.
 * API keys default to empty; validateConfig reports the ones a setup needs.
 */
export function loadConfig(): Config {
    const maxProviderRetries = getEnvVarNumber('MAX_PROVIDER_RETRIES', 3);
    const publishWebhookToken = getEnvVar('PUBLISH_WEBHOOK_TOKEN', '');

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        corsOrigins: getEnvVar('CORS_ORIGINS', 'http://localhost:3000,http://localhost:8080')
            .split(',')
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0),

        // OpenAI
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4o-mini'),
        openaiTtsVoice: getEnvVar('OPENAI_TTS_VOICE', 'alloy'),

        // Fish Audio TTS
        fishAudioApiKey: getEnvVar('FISH_AUDIO_API_KEY', ''),
        fishAudioBaseUrl: getEnvVar('FISH_AUDIO_BASE_URL', 'https://api.fish.audio'),
        fishAudioVoiceId: getEnvVar('FISH_AUDIO_VOICE_ID', ''),

        // ElevenLabs TTS
        elevenLabsApiKey: getEnvVar('ELEVENLABS_API_KEY', ''),
        elevenLabsVoiceId: getEnvVar('ELEVENLABS_VOICE_ID', ''),
        elevenLabsModelId: getEnvVar('ELEVENLABS_MODEL_ID', 'eleven_multilingual_v2'),

        // Stock footage
        footageProvider: getEnvVarChoice('FOOTAGE_PROVIDER', FOOTAGE_PROVIDERS, 'pexels'),
        pexelsApiKey: getEnvVar('PEXELS_API_KEY', ''),
        pixabayApiKey: getEnvVar('PIXABAY_API_KEY', ''),
        maxBackgroundVideos: getEnvVarNumber('MAX_BG_VIDEOS', 8),
        footageMaxClipSeconds: getEnvVarNumber('FOOTAGE_MAX_CLIP_SECONDS', 0),

        // Storage
        mediaDir: getEnvVar('MEDIA_DIR', './data/media'),
        cacheDir: getEnvVar('CACHE_DIR', './data/cache'),
        cacheMaxEntries: getEnvVarNumber('CACHE_MAX_ENTRIES', 500),
        cacheMaxBytes: getEnvVarNumber('CACHE_MAX_BYTES', 0),
        cacheMaxAgeSeconds: getEnvVarNumber('CACHE_MAX_AGE_SECONDS', 0),
        redisUrl: process.env.REDIS_URL ? getEnvVar('REDIS_URL') : undefined,
        jobsPath: getEnvVar('JOBS_PATH', './data/jobs.json'),

        // Resilience & concurrency
        retryInitialBackoffMs: getEnvVarNumber('RETRY_INITIAL_BACKOFF_MS', 1000),
        providerConcurrency: getEnvVarNumber('PROVIDER_CONCURRENCY', 2),
        jobConcurrency: getEnvVarNumber('JOB_CONCURRENCY', 1),

        // Publishing
        publishWebhookUrl: getEnvVar('PUBLISH_WEBHOOK_URL', ''),
        publishWebhookToken: publishWebhookToken || undefined,

        // Job defaults
        jobDefaults: {
            scriptDurationSeconds: getEnvVarNumber('SCRIPT_DURATION_SECONDS', 30),
            voiceProvider: getEnvVar('DEFAULT_VOICE_PROVIDER', 'openai').toLowerCase(),
            fontSize: getEnvVarNumber('CAPTION_FONT_SIZE', 24),
            fontName: getEnvVar('CAPTION_FONT_NAME', 'Roboto'),
            strokeColor: getEnvVar('CAPTION_STROKE_COLOR', '#000000'),
            textColor: getEnvVar('CAPTION_TEXT_COLOR', '#ffffff'),
            strokeWidth: getEnvVarNumber('CAPTION_STROKE_WIDTH', 1),
            subtitlesPosition: getEnvVarChoice('CAPTION_POSITION', SUBTITLE_POSITIONS, 'bottom'),
            watermarkPathOrText: getEnvVar('WATERMARK', ''),
            maxSearchTerms: getEnvVarNumber('MAX_SEARCH_TERMS', 10),
            maxProviderRetries,
        },
    };
}

/**
 * Validates that required API keys are present for the configured providers.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required for script generation');
    }

    const voice = config.jobDefaults.voiceProvider;
    if (voice === 'fishaudio' && (!config.fishAudioApiKey || !config.fishAudioVoiceId)) {
        errors.push('FISH_AUDIO_API_KEY and FISH_AUDIO_VOICE_ID are required when the default voice provider is "fishaudio"');
    }
    if (voice === 'elevenlabs' && (!config.elevenLabsApiKey || !config.elevenLabsVoiceId)) {
        errors.push('ELEVENLABS_API_KEY and ELEVENLABS_VOICE_ID are required when the default voice provider is "elevenlabs"');
    }
    if (!['openai', 'fishaudio', 'elevenlabs'].includes(voice)) {
        errors.push(`DEFAULT_VOICE_PROVIDER must be openai, fishaudio or elevenlabs, got: ${voice}`);
    }

    if (config.footageProvider === 'pexels' && !config.pexelsApiKey) {
        errors.push('PEXELS_API_KEY is required when FOOTAGE_PROVIDER is "pexels"');
    }
    if (config.footageProvider === 'pixabay' && !config.pixabayApiKey) {
        errors.push('PIXABAY_API_KEY is required when FOOTAGE_PROVIDER is "pixabay"');
    }

    if (!Number.isInteger(config.providerConcurrency) || config.providerConcurrency < 1) {
        errors.push('PROVIDER_CONCURRENCY must be a positive integer');
    }
    if (!Number.isInteger(config.jobConcurrency) || config.jobConcurrency < 1) {
        errors.push('JOB_CONCURRENCY must be a positive integer');
    }
    if (!Number.isInteger(config.jobDefaults.maxProviderRetries) || config.jobDefaults.maxProviderRetries < 0) {
        errors.push('MAX_PROVIDER_RETRIES must be a non-negative integer');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
