import { AudioArtifact } from './AudioArtifact';
import { CaptionTrack } from './CaptionSegment';
import { FootageTrack } from './FootageClip';
import { STAGE_ORDER } from './PipelineJob';
import { RenderedVideo, StageDegradation } from './RenderedVideo';
import { ScriptArtifact } from './ScriptArtifact';

// Shape checks for artifacts read back from the cache.

type UnknownRecord = { [key: string]: unknown };

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function isString(value: unknown): value is string {
    return typeof value === 'string';
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(isString);
}

function isOptional<T>(value: unknown, guard: (v: unknown) => v is T): boolean {
    return value === undefined || guard(value);
}

function isArrayOf<T>(value: unknown, guard: (v: unknown) => v is T): value is T[] {
    return Array.isArray(value) && value.every(guard);
}

function isTimedText(value: unknown): value is { text: string; startSeconds: number; endSeconds: number } {
    return isRecord(value) && isString(value.text) && isNumber(value.startSeconds) && isNumber(value.endSeconds);
}

function isSegmentTiming(value: unknown): value is { segmentId: string; startSeconds: number; endSeconds: number } {
    return isRecord(value) && isString(value.segmentId) && isNumber(value.startSeconds) && isNumber(value.endSeconds);
}

function isStageDegradation(value: unknown): value is StageDegradation {
    return isRecord(value) && STAGE_ORDER.some((stage) => stage === value.stage) && isString(value.note);
}

export function isScriptArtifact(value: unknown): value is ScriptArtifact {
    return (
        isRecord(value) &&
        isString(value.rawText) &&
        isArrayOf(value.segments, (segment): segment is ScriptArtifact['segments'][number] =>
            isRecord(segment) && isString(segment.id) && isNumber(segment.index) && isString(segment.text)
        ) &&
        isStringArray(value.searchTerms) &&
        isStringArray(value.hashtags) &&
        isOptional(value.title, isString)
    );
}

export function isAudioArtifact(value: unknown): value is AudioArtifact {
    return (
        isRecord(value) &&
        isString(value.audioPath) &&
        (value.format === 'mp3' || value.format === 'wav' || value.format === 'ogg') &&
        isNumber(value.sampleRate) &&
        isNumber(value.durationSeconds) &&
        isString(value.provider) &&
        (value.wordTimings === undefined || isArrayOf(value.wordTimings, isTimedText)) &&
        (value.segmentTimings === undefined || isArrayOf(value.segmentTimings, isSegmentTiming))
    );
}

export function isCaptionTrack(value: unknown): value is CaptionTrack {
    return (
        isRecord(value) &&
        isNumber(value.durationSeconds) &&
        isArrayOf(value.segments, (segment): segment is CaptionTrack['segments'][number] =>
            isRecord(segment) && isString(segment.scriptSegmentId) && isTimedText(segment)
        ) &&
        (value.timingSource === 'provider' || value.timingSource === 'proportional') &&
        isStringArray(value.diagnostics) &&
        typeof value.degraded === 'boolean'
    );
}

export function isFootageTrack(value: unknown): value is FootageTrack {
    return (
        isRecord(value) &&
        isNumber(value.durationSeconds) &&
        isNumber(value.width) &&
        isNumber(value.height) &&
        isNumber(value.frameRate) &&
        isNumber(value.candidateCount) &&
        typeof value.degraded === 'boolean' &&
        isStringArray(value.problems) &&
        isOptional(value.visualTrackPath, isString) &&
        isArrayOf(value.clips, (clip): clip is FootageTrack['clips'][number] =>
            isRecord(clip) &&
            isString(clip.candidateId) &&
            isString(clip.sourcePath) &&
            isNumber(clip.trimStartSeconds) &&
            isNumber(clip.trimEndSeconds) &&
            isNumber(clip.placementStartSeconds) &&
            isNumber(clip.placementEndSeconds) &&
            isNumber(clip.loopIndex) &&
            (clip.crop === null ||
                (isRecord(clip.crop) &&
                    isNumber(clip.crop.x) &&
                    isNumber(clip.crop.y) &&
                    isNumber(clip.crop.width) &&
                    isNumber(clip.crop.height)))
        )
    );
}

export function isRenderedVideo(value: unknown): value is RenderedVideo {
    if (!isRecord(value)) {
        return false;
    }
    const watermark = value.watermark;
    const watermarkOk =
        watermark === undefined ||
        (isRecord(watermark) &&
            ((watermark.type === 'text' && isString(watermark.text)) ||
                (watermark.type === 'image' && isString(watermark.path))));
    return (
        watermarkOk &&
        isString(value.fingerprint) &&
        isString(value.videoPath) &&
        isNumber(value.durationSeconds) &&
        isNumber(value.width) &&
        isNumber(value.height) &&
        isNumber(value.captionCount) &&
        isNumber(value.clipCount) &&
        typeof value.hasBackgroundMusic === 'boolean' &&
        (value.degradations === undefined || isArrayOf(value.degradations, isStageDegradation))
    );
}
