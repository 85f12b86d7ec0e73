import { deepFreeze } from './Immutable';
import { Watermark } from './RenderedVideo';

export type SubtitlesPosition = 'top' | 'center' | 'bottom';

/**
 * JobConfig is the immutable configuration of one pipeline job.
 * It is built once from the request and process defaults, then threaded through
 * every stage via the job context.
 */
export interface JobConfig {
    /** Topic the narration is generated from */
    readonly prompt: string;
    /** Narration supplied by the caller; bypasses the script generator */
    readonly script?: string;
    /** Target narration length handed to the script generator */
    readonly scriptDurationSeconds: number;
    /** Registered voice synthesizer name (e.g. 'openai', 'elevenlabs') */
    readonly voiceProvider: string;
    readonly voiceId?: string;

    // Caption styling
    readonly fontSize: number;
    readonly fontName: string;
    readonly strokeColor: string;
    readonly textColor: string;
    readonly strokeWidth: number;
    readonly subtitlesPosition: SubtitlesPosition;

    /** Path to an image file or a literal text; empty for no watermark */
    readonly watermarkPathOrText: string;
    readonly backgroundMusicPath?: string;
    /** Local background videos; bypasses the footage search */
    readonly backgroundVideoPaths?: readonly string[];
    /** Upper bound on footage search terms */
    readonly maxSearchTerms: number;

    /** Retries after the first attempt for transient provider errors */
    readonly maxProviderRetries: number;
}

export type JobConfigInput = Partial<JobConfig> & { prompt?: string; script?: string };

export type JobConfigDefaults = Omit<JobConfig, 'prompt' | 'script' | 'voiceId' | 'backgroundMusicPath' | 'backgroundVideoPaths'>;

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;
const IMAGE_EXTENSIONS = /\.(png|jpe?g|webp|gif)$/i;

/**
 * Builds and validates a frozen JobConfig.
 * @throws Error describing the first invalid field
 */
export function createJobConfig(input: JobConfigInput, defaults: JobConfigDefaults): JobConfig {
    const prompt = (input.prompt ?? '').trim();
    const script = input.script?.trim() || undefined;
    if (!prompt && !script) {
        throw new Error('JobConfig requires either a prompt or a script');
    }

    const config: JobConfig = {
        prompt,
        script,
        scriptDurationSeconds: input.scriptDurationSeconds ?? defaults.scriptDurationSeconds,
        voiceProvider: (input.voiceProvider ?? defaults.voiceProvider).trim().toLowerCase(),
        voiceId: input.voiceId?.trim() || undefined,
        fontSize: input.fontSize ?? defaults.fontSize,
        fontName: input.fontName ?? defaults.fontName,
        strokeColor: input.strokeColor ?? defaults.strokeColor,
        textColor: input.textColor ?? defaults.textColor,
        strokeWidth: input.strokeWidth ?? defaults.strokeWidth,
        subtitlesPosition: input.subtitlesPosition ?? defaults.subtitlesPosition,
        watermarkPathOrText: (input.watermarkPathOrText ?? defaults.watermarkPathOrText).trim(),
        backgroundMusicPath: input.backgroundMusicPath?.trim() || undefined,
        backgroundVideoPaths: input.backgroundVideoPaths && input.backgroundVideoPaths.length > 0
            ? [...input.backgroundVideoPaths]
            : undefined,
        maxSearchTerms: input.maxSearchTerms ?? defaults.maxSearchTerms,
        maxProviderRetries: input.maxProviderRetries ?? defaults.maxProviderRetries,
    };

    if (!(config.scriptDurationSeconds > 0)) {
        throw new Error('scriptDurationSeconds must be positive');
    }
    if (!config.voiceProvider) {
        throw new Error('voiceProvider cannot be empty');
    }
    if (!(config.fontSize > 0)) {
        throw new Error('fontSize must be positive');
    }
    if (!HEX_COLOR.test(config.strokeColor) || !HEX_COLOR.test(config.textColor)) {
        throw new Error('strokeColor and textColor must be #RRGGBB colors');
    }
    if (config.strokeWidth < 0) {
        throw new Error('strokeWidth cannot be negative');
    }
    if (!['top', 'center', 'bottom'].includes(config.subtitlesPosition)) {
        throw new Error('subtitlesPosition must be "top", "center" or "bottom"');
    }
    if (!Number.isInteger(config.maxProviderRetries) || config.maxProviderRetries < 0) {
        throw new Error('maxProviderRetries must be a non-negative integer');
    }
    if (!Number.isInteger(config.maxSearchTerms) || config.maxSearchTerms < 1) {
        throw new Error('maxSearchTerms must be a positive integer');
    }

    return deepFreeze(config);
}

/**
 * Interprets watermarkPathOrText: image paths become image watermarks, anything
 * else is drawn as text.
 */
export function resolveWatermark(config: JobConfig): Watermark | undefined {
    const value = config.watermarkPathOrText;
    if (!value) {
        return undefined;
    }
    if (IMAGE_EXTENSIONS.test(value)) {
        return { type: 'image', path: value };
    }
    return { type: 'text', text: value };
}
