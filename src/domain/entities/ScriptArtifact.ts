import { createHash } from 'crypto';
import { deepFreeze } from './Immutable';

/**
 * ScriptSegment is one sentence or clause of the narration, in reading order.
 */
export interface ScriptSegment {
    /** Stable identifier derived from position and text */
    id: string;
    /** Zero-based position in the script */
    index: number;
    /** Display/narration text for this segment */
    text: string;
}

/**
 * ScriptArtifact is the output of the script stage.
 */
export interface ScriptArtifact {
    /** Narration text as produced by the generator (or supplied by the caller) */
    rawText: string;
    /** Ordered segments used for narration and captions */
    segments: ScriptSegment[];
    /** Stock footage search terms suggested for this script */
    searchTerms: string[];
    /** Hook title for publishing */
    title?: string;
    /** Hashtags for publishing */
    hashtags: string[];
}

/** Default upper bound for a single segment, in characters. */
export const DEFAULT_MAX_SEGMENT_CHARS = 100;

/**
 * Builds the stable id of a segment from its index and text.
 */
export function createSegmentId(index: number, text: string): string {
    const digest = createHash('sha1').update(`${index}:${text}`).digest('hex');
    return `seg_${index}_${digest.substring(0, 8)}`;
}

/**
 * Splits narration text into sentence/clause units.
 * Breaks on newlines and sentence-ending punctuation, then wraps any unit longer
 * than maxChars at the last whitespace that fits.
 */
export function splitScriptText(text: string, maxChars: number = DEFAULT_MAX_SEGMENT_CHARS): string[] {
    const units: string[] = [];

    for (const line of text.split(/\r?\n/)) {
        for (const sentence of line.split(/(?<=[.!?])\s+/)) {
            const trimmed = sentence.replace(/\s+/g, ' ').trim();
            if (!trimmed || /^[.!?,;:\s"'-]*$/.test(trimmed)) {
                continue;
            }
            units.push(...wrapUnit(trimmed, maxChars));
        }
    }

    return units;
}

function wrapUnit(unit: string, maxChars: number): string[] {
    if (maxChars <= 0 || unit.length <= maxChars) {
        return [unit];
    }

    const pieces: string[] = [];
    let rest = unit;
    while (rest.length > maxChars) {
        let cut = rest.lastIndexOf(' ', maxChars);
        if (cut <= 0) {
            cut = rest.indexOf(' ', maxChars);
        }
        if (cut <= 0) {
            break;
        }
        pieces.push(rest.substring(0, cut).trim());
        rest = rest.substring(cut + 1).trim();
    }
    if (rest) {
        pieces.push(rest);
    }
    return pieces;
}

/**
 * Creates an immutable ScriptArtifact from raw narration text.
 */
export function createScriptArtifact(params: {
    rawText: string;
    searchTerms?: string[];
    title?: string;
    hashtags?: string[];
    maxSegmentChars?: number;
}): ScriptArtifact {
    const rawText = params.rawText.replace(/"/g, '').trim();
    const segments = splitScriptText(rawText, params.maxSegmentChars).map((text, index) => ({
        id: createSegmentId(index, text),
        index,
        text,
    }));

    return deepFreeze({
        rawText,
        segments,
        searchTerms: (params.searchTerms ?? [])
            .map((term) => term.replace(/#/g, '').trim())
            .filter((term) => term.length > 0),
        title: params.title?.trim() || undefined,
        hashtags: (params.hashtags ?? []).map((tag) => tag.trim()).filter((tag) => tag.length > 0),
    });
}

/**
 * Narration text spoken by the voice stage: the segments joined in order.
 */
export function getNarrationText(script: ScriptArtifact): string {
    return script.segments.map((segment) => segment.text).join(' ');
}
