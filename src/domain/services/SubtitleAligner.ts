import { AudioArtifact, WordTiming, hasTimingHints } from '../entities/AudioArtifact';
import { AlignmentDiagnostic, CaptionSegment, CaptionTrack } from '../entities/CaptionSegment';
import { ScriptArtifact, ScriptSegment } from '../entities/ScriptArtifact';
import { AlignmentError } from '../errors/PipelineErrors';

export interface AlignerOptions {
    /** Shortest time a caption stays on screen in proportional mode */
    minSegmentSeconds: number;
    /** Captions longer than this are split at whitespace */
    maxDisplaySeconds: number;
}

export const DEFAULT_ALIGNER_OPTIONS: AlignerOptions = {
    minSegmentSeconds: 0.5,
    maxDisplaySeconds: 15,
};

interface Span {
    start: number;
    end: number;
}

const EPSILON = 1e-9;

function normalizeToken(token: string): string {
    return token.toLowerCase().replace(/[^\p{L}\p{N}']+/gu, '');
}

function tokenize(text: string): string[] {
    return text.split(/\s+/).map(normalizeToken).filter((token) => token.length > 0);
}

/**
 * Turns script segments plus narration audio into timed captions.
 *
 * Provider timestamps are used when present and consistent with the script;
 * otherwise the narration duration is shared out by character count. The
 * result always covers [0, duration] without gaps or overlaps.
 */
export class SubtitleAligner {
    private readonly options: AlignerOptions;

    constructor(options: Partial<AlignerOptions> = {}) {
        this.options = { ...DEFAULT_ALIGNER_OPTIONS, ...options };
        if (this.options.minSegmentSeconds < 0) {
            throw new Error('minSegmentSeconds cannot be negative');
        }
        if (this.options.maxDisplaySeconds <= 0) {
            throw new Error('maxDisplaySeconds must be positive');
        }
    }

    align(script: ScriptArtifact, audio: AudioArtifact): CaptionTrack {
        const durationSeconds = audio.durationSeconds;
        const diagnostics: AlignmentDiagnostic[] = [];

        if (script.segments.length === 0) {
            return {
                durationSeconds,
                segments: [],
                timingSource: 'proportional',
                diagnostics: ['empty_script'],
                degraded: true,
            };
        }

        let providerSpans: Span[] | null = null;
        let degraded = false;

        if (hasTimingHints(audio)) {
            try {
                providerSpans = this.spansFromProviderTiming(script.segments, audio);
            } catch (error) {
                if (!(error instanceof AlignmentError)) {
                    throw error;
                }
                console.warn(`[Aligner] Provider timing rejected, falling back to proportional: ${error.message}`);
                diagnostics.push('provider_timing_rejected');
                degraded = true;
            }
        }

        const timingSource = providerSpans ? 'provider' : 'proportional';
        const spans = providerSpans ?? this.allocateProportionally(script.segments, durationSeconds, diagnostics);

        const captions: CaptionSegment[] = script.segments.map((segment, i) => ({
            startSeconds: spans[i].start,
            endSeconds: spans[i].end,
            text: segment.text,
            scriptSegmentId: segment.id,
        }));

        return {
            durationSeconds,
            segments: this.splitLongCaptions(captions, diagnostics),
            timingSource,
            diagnostics,
            degraded,
        };
    }

    /**
     * Maps each script segment to its provider-reported span, then makes the
     * sequence gapless: overlaps shrink the earlier caption, gaps extend it.
     * @throws AlignmentError if the timing cannot be reconciled with the script
     */
    spansFromProviderTiming(segments: ScriptSegment[], audio: AudioArtifact): Span[] {
        const duration = audio.durationSeconds;
        let spans: Span[];

        if (audio.segmentTimings && audio.segmentTimings.length > 0) {
            const byId = new Map(audio.segmentTimings.map((timing) => [timing.segmentId, timing]));
            spans = segments.map((segment) => {
                const timing = byId.get(segment.id);
                if (!timing) {
                    throw new AlignmentError(`No provider timing for segment ${segment.id}`);
                }
                return { start: timing.startSeconds, end: timing.endSeconds };
            });
        } else {
            spans = this.spansFromWords(segments, audio.wordTimings ?? []);
        }

        spans.forEach((span, i) => {
            if (!Number.isFinite(span.start) || !Number.isFinite(span.end) || span.end < span.start) {
                throw new AlignmentError(`Invalid provider span for segment ${i}`);
            }
            if (i > 0 && span.start < spans[i - 1].start) {
                throw new AlignmentError(`Provider timing is not monotonic at segment ${i}`);
            }
        });

        const clampTime = (t: number) => Math.min(Math.max(t, 0), duration);
        const resolved: Span[] = spans.map((span, i) => {
            const next = spans[i + 1];
            const start = i === 0 ? 0 : clampTime(span.start);
            const end = next ? clampTime(next.start) : duration;
            return { start, end };
        });

        resolved.forEach((span, i) => {
            if (span.end - span.start <= EPSILON) {
                throw new AlignmentError(`Segment ${i} collapses to zero length after clamping`);
            }
        });

        return resolved;
    }

    private spansFromWords(segments: ScriptSegment[], words: WordTiming[]): Span[] {
        const timed = words
            .map((word) => ({ ...word, token: normalizeToken(word.text) }))
            .filter((word) => word.token.length > 0);
        const segmentTokens = segments.map((segment) => tokenize(segment.text));
        const expected = segmentTokens.reduce((sum, tokens) => sum + tokens.length, 0);

        if (expected !== timed.length) {
            throw new AlignmentError(`Script has ${expected} words but provider timed ${timed.length}`);
        }

        let cursor = 0;
        let mismatches = 0;
        const spans = segmentTokens.map((tokens, i) => {
            if (tokens.length === 0) {
                throw new AlignmentError(`Segment ${i} has no words to align`);
            }
            const slice = timed.slice(cursor, cursor + tokens.length);
            slice.forEach((word, j) => {
                if (word.token !== tokens[j]) {
                    mismatches++;
                }
            });
            cursor += tokens.length;
            return { start: slice[0].startSeconds, end: slice[slice.length - 1].endSeconds };
        });

        if (mismatches * 2 > expected) {
            throw new AlignmentError(`Provider words differ from the script (${mismatches}/${expected} mismatched)`);
        }
        return spans;
    }

    /**
     * Shares the duration out by character count, then lifts segments below the
     * minimum display time by taking time from longer segments in proportion to
     * how far above the minimum they are.
     */
    allocateProportionally(segments: ScriptSegment[], durationSeconds: number, diagnostics: AlignmentDiagnostic[] = []): Span[] {
        const count = segments.length;
        const min = this.options.minSegmentSeconds;
        let durations: number[];

        if (count * min > durationSeconds + EPSILON) {
            diagnostics.push('min_duration_unsatisfiable');
            durations = segments.map(() => durationSeconds / count);
        } else {
            const weights = segments.map((segment) => Math.max(1, segment.text.length));
            const totalWeight = weights.reduce((sum, weight) => sum + weight, 0);
            durations = this.enforceMinimum(
                weights.map((weight) => (durationSeconds * weight) / totalWeight),
                min
            );
        }

        const spans: Span[] = [];
        let cursor = 0;
        durations.forEach((duration, i) => {
            const end = i === count - 1 ? durationSeconds : cursor + duration;
            spans.push({ start: cursor, end });
            cursor = end;
        });
        return spans;
    }

    private enforceMinimum(durations: number[], min: number): number[] {
        const deficit = durations.reduce((sum, d) => sum + (d < min ? min - d : 0), 0);
        if (deficit <= EPSILON) {
            return durations;
        }
        const slack = durations.reduce((sum, d) => sum + (d > min ? d - min : 0), 0);
        return durations.map((d) => {
            if (d <= min) {
                return min;
            }
            return d - (deficit * (d - min)) / slack;
        });
    }

    private splitLongCaptions(captions: CaptionSegment[], diagnostics: AlignmentDiagnostic[]): CaptionSegment[] {
        const max = this.options.maxDisplaySeconds;
        const result: CaptionSegment[] = [];

        for (const caption of captions) {
            const duration = caption.endSeconds - caption.startSeconds;
            if (duration <= max + EPSILON) {
                result.push(caption);
                continue;
            }

            const pieces = splitAtWhitespace(caption.text, Math.ceil(duration / max));
            if (pieces.length < 2) {
                if (!diagnostics.includes('unsplittable_segment')) {
                    diagnostics.push('unsplittable_segment');
                }
                result.push(caption);
                continue;
            }

            const totalChars = pieces.reduce((sum, piece) => sum + piece.length, 0);
            let cursor = caption.startSeconds;
            pieces.forEach((piece, i) => {
                const end = i === pieces.length - 1
                    ? caption.endSeconds
                    : cursor + (duration * piece.length) / totalChars;
                result.push({
                    startSeconds: cursor,
                    endSeconds: end,
                    text: piece,
                    scriptSegmentId: caption.scriptSegmentId,
                });
                cursor = end;
            });
        }

        return result;
    }
}

/**
 * Cuts text into at most `parts` pieces, each cut at the whitespace nearest to
 * an even share of the characters.
 */
export function splitAtWhitespace(text: string, parts: number): string[] {
    const spaces: number[] = [];
    for (let i = 0; i < text.length; i++) {
        if (/\s/.test(text[i])) {
            spaces.push(i);
        }
    }

    const cuts: number[] = [];
    for (let j = 1; j < parts; j++) {
        const target = (text.length * j) / parts;
        const previous = cuts.length > 0 ? cuts[cuts.length - 1] : -1;
        let best = -1;
        for (const space of spaces) {
            if (space <= previous) {
                continue;
            }
            if (best === -1 || Math.abs(space - target) < Math.abs(best - target)) {
                best = space;
            }
        }
        if (best !== -1) {
            cuts.push(best);
        }
    }

    const pieces: string[] = [];
    let start = 0;
    for (const cut of cuts) {
        pieces.push(text.substring(start, cut).trim());
        start = cut + 1;
    }
    pieces.push(text.substring(start).trim());
    return pieces.filter((piece) => piece.length > 0);
}
