import { CropWindow, FootageCandidate, FootageClip, FootageTrack } from '../entities/FootageClip';
import { CompositionError } from '../errors/PipelineErrors';

export interface FootagePlanOptions {
    width: number;
    height: number;
    frameRate: number;
    /** Cap on a single cut; candidates are cycled more often when set */
    maxClipSeconds?: number;
    /** Why the candidate list is smaller than it should have been; any entry degrades the track */
    problems?: string[];
}

export const DEFAULT_FOOTAGE_PLAN: FootagePlanOptions = {
    width: 1080,
    height: 1920,
    frameRate: 30,
};

const EPSILON = 1e-9;

function toEven(value: number): number {
    return Math.max(2, Math.floor(value / 2) * 2);
}

/**
 * Centre crop of a source frame to the output aspect ratio.
 * Returns null when the source size is unknown.
 */
export function computeCropWindow(
    sourceWidth: number,
    sourceHeight: number,
    outputWidth: number = DEFAULT_FOOTAGE_PLAN.width,
    outputHeight: number = DEFAULT_FOOTAGE_PLAN.height
): CropWindow | null {
    if (!(sourceWidth > 0) || !(sourceHeight > 0)) {
        return null;
    }

    const targetRatio = outputWidth / outputHeight;
    if (sourceWidth / sourceHeight > targetRatio) {
        const width = toEven(sourceHeight * targetRatio);
        return { x: Math.floor((sourceWidth - width) / 2), y: 0, width, height: sourceHeight };
    }
    const height = toEven(sourceWidth / targetRatio);
    return { x: 0, y: Math.floor((sourceHeight - height) / 2), width: sourceWidth, height };
}

/**
 * Drops repeated candidate ids, keeping the first (best ranked) occurrence.
 */
export function dedupeCandidates(candidates: FootageCandidate[]): FootageCandidate[] {
    const seen = new Set<string>();
    return candidates.filter((candidate) => {
        if (seen.has(candidate.id)) {
            return false;
        }
        seen.add(candidate.id);
        return true;
    });
}

/**
 * Lays candidates end to end until the target duration is covered.
 *
 * Candidates are taken in rank order and the list wraps around when it runs
 * out. The last clip is trimmed so the track ends exactly at the target.
 * @throws CompositionError when there is nothing to place or the target is not positive
 */
export function planFootageTrack(
    candidates: FootageCandidate[],
    targetSeconds: number,
    options: Partial<FootagePlanOptions> = {}
): FootageTrack {
    const opts: FootagePlanOptions = { ...DEFAULT_FOOTAGE_PLAN, ...options };

    if (!Number.isFinite(targetSeconds) || targetSeconds <= 0) {
        throw new CompositionError('invalid_duration', `Target duration must be positive, got ${targetSeconds}`);
    }

    const frameSeconds = 1 / opts.frameRate;
    const usable = dedupeCandidates(candidates).filter(
        (candidate) => Boolean(candidate.localPath) && candidate.durationSeconds >= frameSeconds
    );
    if (usable.length === 0) {
        throw new CompositionError('no_footage', `No usable footage among ${candidates.length} candidates`);
    }

    const maxClip = opts.maxClipSeconds && opts.maxClipSeconds > 0 ? opts.maxClipSeconds : Infinity;
    const clips: FootageClip[] = [];
    let cursor = 0;
    let index = 0;

    while (targetSeconds - cursor > EPSILON) {
        const candidate = usable[index % usable.length];
        const remaining = targetSeconds - cursor;
        const available = Math.min(candidate.durationSeconds, maxClip);
        const isLast = available >= remaining - EPSILON;
        const length = isLast ? remaining : available;
        const end = isLast ? targetSeconds : cursor + length;

        clips.push({
            candidateId: candidate.id,
            sourcePath: candidate.localPath ?? '',
            trimStartSeconds: 0,
            trimEndSeconds: end - cursor,
            placementStartSeconds: cursor,
            placementEndSeconds: end,
            loopIndex: Math.floor(index / usable.length),
            crop: computeCropWindow(candidate.width, candidate.height, opts.width, opts.height),
        });

        cursor = end;
        index++;
    }

    return {
        durationSeconds: targetSeconds,
        width: opts.width,
        height: opts.height,
        frameRate: opts.frameRate,
        clips,
        candidateCount: usable.length,
        degraded: (opts.problems ?? []).length > 0,
        problems: [...(opts.problems ?? [])],
    };
}
