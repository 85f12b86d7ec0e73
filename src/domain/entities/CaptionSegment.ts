/**
 * CaptionSegment is one timed on-screen subtitle.
 */
export interface CaptionSegment {
    /** Start time in seconds from the beginning of the narration */
    startSeconds: number;
    /** End time in seconds from the beginning of the narration */
    endSeconds: number;
    /** Text displayed on screen */
    text: string;
    /** The script segment this caption was derived from */
    scriptSegmentId: string;
}

export type CaptionTimingSource = 'provider' | 'proportional';

export type AlignmentDiagnostic =
    | 'empty_script'
    | 'provider_timing_rejected'
    | 'min_duration_unsatisfiable'
    | 'unsplittable_segment';

/**
 * CaptionTrack is the ordered, gapless caption sequence for a narration.
 */
export interface CaptionTrack {
    durationSeconds: number;
    segments: CaptionSegment[];
    timingSource: CaptionTimingSource;
    diagnostics: AlignmentDiagnostic[];
    /** True when the track is usable but not what the provider timing would have given */
    degraded: boolean;
}

/**
 * Checks the coverage invariants of a caption sequence.
 * Returns a list of violations (empty when valid).
 */
export function validateCaptionCoverage(
    segments: CaptionSegment[],
    durationSeconds: number,
    toleranceSeconds: number = 0.001
): string[] {
    const problems: string[] = [];
    if (segments.length === 0) {
        return problems;
    }

    if (Math.abs(segments[0].startSeconds) > toleranceSeconds) {
        problems.push(`first caption starts at ${segments[0].startSeconds}, expected 0`);
    }

    segments.forEach((segment, i) => {
        if (segment.endSeconds < segment.startSeconds) {
            problems.push(`caption ${i} ends before it starts`);
        }
        if (segment.startSeconds < -toleranceSeconds || segment.endSeconds > durationSeconds + toleranceSeconds) {
            problems.push(`caption ${i} lies outside [0, ${durationSeconds}]`);
        }
        const next = segments[i + 1];
        if (next) {
            if (next.startSeconds < segment.startSeconds) {
                problems.push(`caption ${i + 1} starts before caption ${i}`);
            }
            if (segment.endSeconds > next.startSeconds + toleranceSeconds) {
                problems.push(`caption ${i} overlaps caption ${i + 1}`);
            }
            if (next.startSeconds - segment.endSeconds > toleranceSeconds) {
                problems.push(`gap between caption ${i} and ${i + 1}`);
            }
        }
    });

    const last = segments[segments.length - 1];
    if (Math.abs(last.endSeconds - durationSeconds) > toleranceSeconds) {
        problems.push(`last caption ends at ${last.endSeconds}, expected ${durationSeconds}`);
    }

    return problems;
}
