import { JobConfig } from '../../domain/entities/JobConfig';
import { computeFingerprint, normalizeText } from '../../domain/services/Fingerprint';
import { AlignerOptions } from '../../domain/services/SubtitleAligner';

/**
 * Cache keys of one job. Each stage hashes its own inputs plus the
 * fingerprints of the stages it consumes, so a change upstream changes every
 * key below it.
 */
export interface StageFingerprints {
    script: string;
    narration: string;
    captions: string;
    footage: string;
    composition: string;
    /** Key of the final video; equal configs share it */
    job: string;
}

/**
 * What, besides the job config, determines stage output.
 */
export interface FingerprintEnvironment {
    scriptGenerator: string;
    footageProvider: string;
    maxBackgroundVideos: number;
    footageMaxClipSeconds: number;
    aligner: AlignerOptions;
}

export function computeStageFingerprints(config: JobConfig, env: FingerprintEnvironment): StageFingerprints {
    const script = computeFingerprint('script', config.script
        ? { source: 'supplied', script: normalizeText(config.script), maxSearchTerms: config.maxSearchTerms }
        : {
              source: env.scriptGenerator,
              prompt: normalizeText(config.prompt),
              durationSeconds: config.scriptDurationSeconds,
              maxSearchTerms: config.maxSearchTerms,
          });

    const narration = computeFingerprint('narration', {
        script,
        provider: config.voiceProvider,
        voiceId: config.voiceId,
    });

    const captions = computeFingerprint('captions', {
        script,
        narration,
        minSegmentSeconds: env.aligner.minSegmentSeconds,
        maxDisplaySeconds: env.aligner.maxDisplaySeconds,
    });

    const footage = computeFingerprint('footage', {
        script,
        narration,
        // Search terms fall back to the prompt when a supplied script has none
        prompt: normalizeText(config.prompt),
        provider: config.backgroundVideoPaths ? 'local' : env.footageProvider,
        backgroundVideoPaths: config.backgroundVideoPaths,
        maxBackgroundVideos: env.maxBackgroundVideos,
        maxClipSeconds: env.footageMaxClipSeconds,
    });

    const composition = computeFingerprint('composition', {
        narration,
        captions,
        footage,
        fontSize: config.fontSize,
        fontName: config.fontName,
        strokeColor: config.strokeColor.toLowerCase(),
        textColor: config.textColor.toLowerCase(),
        strokeWidth: config.strokeWidth,
        subtitlesPosition: config.subtitlesPosition,
        watermark: config.watermarkPathOrText,
        backgroundMusicPath: config.backgroundMusicPath,
    });

    return {
        script,
        narration,
        captions,
        footage,
        composition,
        job: computeFingerprint('render', { composition }),
    };
}
