/**
 * FootageCandidate is a stock clip returned by a footage search, before placement.
 */
export interface FootageCandidate {
    /** Provider-scoped identifier (e.g. "pexels:12345") */
    id: string;
    provider: string;
    /** Remote download URL (absent for local background videos) */
    url?: string;
    /** Local file path once downloaded (or for local background videos) */
    localPath?: string;
    durationSeconds: number;
    /** Source frame size; 0 when unknown */
    width: number;
    height: number;
    /** The search term that found this clip */
    searchTerm?: string;
}

/**
 * Crop rectangle applied to the source frame before scaling.
 */
export interface CropWindow {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * FootageClip is a trimmed source clip placed on the output timeline.
 */
export interface FootageClip {
    candidateId: string;
    sourcePath: string;
    trimStartSeconds: number;
    trimEndSeconds: number;
    placementStartSeconds: number;
    placementEndSeconds: number;
    /** How many times the candidate list had wrapped when this clip was placed */
    loopIndex: number;
    /** Null when the source size is unknown; the renderer then crops after scaling */
    crop: CropWindow | null;
}

/**
 * FootageTrack is the silent visual track of the reel.
 */
export interface FootageTrack {
    durationSeconds: number;
    width: number;
    height: number;
    frameRate: number;
    clips: FootageClip[];
    /** Rendered silent video, set once the track has been encoded */
    visualTrackPath?: string;
    /** Number of distinct candidates the plan drew from */
    candidateCount: number;
    /** True when some footage searches failed and fewer candidates were available */
    degraded: boolean;
    /** What went wrong while gathering candidates, e.g. "2 of 5 downloads failed" */
    problems: string[];
}

export function getClipDuration(clip: FootageClip): number {
    return clip.placementEndSeconds - clip.placementStartSeconds;
}

/**
 * Checks that clip placements tile [0, duration] with no gaps or overlaps.
 * Returns a list of violations (empty when valid).
 */
export function validateFootageTiling(
    clips: FootageClip[],
    durationSeconds: number,
    toleranceSeconds: number = 1e-6
): string[] {
    const problems: string[] = [];
    if (clips.length === 0) {
        problems.push('no clips placed');
        return problems;
    }

    let cursor = 0;
    clips.forEach((clip, i) => {
        if (Math.abs(clip.placementStartSeconds - cursor) > toleranceSeconds) {
            problems.push(`clip ${i} starts at ${clip.placementStartSeconds}, expected ${cursor}`);
        }
        if (clip.placementEndSeconds <= clip.placementStartSeconds) {
            problems.push(`clip ${i} has no duration`);
        }
        const trimmed = clip.trimEndSeconds - clip.trimStartSeconds;
        if (Math.abs(trimmed - getClipDuration(clip)) > toleranceSeconds) {
            problems.push(`clip ${i} trim window does not match its placement`);
        }
        cursor = clip.placementEndSeconds;
    });

    if (Math.abs(cursor - durationSeconds) > toleranceSeconds) {
        problems.push(`track ends at ${cursor}, expected ${durationSeconds}`);
    }
    return problems;
}
