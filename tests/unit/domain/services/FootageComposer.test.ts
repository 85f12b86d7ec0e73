import {
    computeCropWindow,
    dedupeCandidates,
    planFootageTrack,
} from '../../../../src/domain/services/FootageComposer';
import { FootageCandidate, validateFootageTiling } from '../../../../src/domain/entities/FootageClip';
import { CompositionError } from '../../../../src/domain/errors/PipelineErrors';

function candidate(id: string, durationSeconds: number, extra: Partial<FootageCandidate> = {}): FootageCandidate {
    return {
        id,
        provider: 'test',
        localPath: `/media/${id}.mp4`,
        durationSeconds,
        width: 1920,
        height: 1080,
        ...extra,
    };
}

describe('planFootageTrack', () => {
    it('should loop a single clip until the narration is covered', () => {
        const track = planFootageTrack([candidate('a', 10)], 25);

        expect(track.clips.map((clip) => clip.placementEndSeconds - clip.placementStartSeconds)).toEqual([10, 10, 5]);
        expect(track.clips.map((clip) => clip.loopIndex)).toEqual([0, 1, 2]);
        expect(track.clips[2].trimEndSeconds).toBe(5);
        expect(validateFootageTiling(track.clips, 25)).toEqual([]);
    });

    it('should take candidates in rank order and wrap around', () => {
        const track = planFootageTrack([candidate('a', 10), candidate('b', 4)], 20);

        expect(track.clips.map((clip) => [clip.candidateId, clip.placementStartSeconds, clip.placementEndSeconds, clip.loopIndex])).toEqual([
            ['a', 0, 10, 0],
            ['b', 10, 14, 0],
            ['a', 14, 20, 1],
        ]);
        expect(track.candidateCount).toBe(2);
    });

    it('should cap each cut at maxClipSeconds', () => {
        const track = planFootageTrack([candidate('a', 10)], 7, { maxClipSeconds: 3 });

        expect(track.clips.map((clip) => clip.trimEndSeconds)).toEqual([3, 3, 1]);
    });

    it('should crop landscape sources to the portrait frame', () => {
        const track = planFootageTrack([candidate('a', 10)], 5);

        expect(track.clips[0].crop).toEqual({ x: 657, y: 0, width: 606, height: 1080 });
        expect(track.width).toBe(1080);
        expect(track.height).toBe(1920);
        expect(track.frameRate).toBe(30);
    });

    it('should skip candidates that were never downloaded', () => {
        const track = planFootageTrack([candidate('a', 10, { localPath: undefined }), candidate('b', 10)], 5);

        expect(track.clips.map((clip) => clip.candidateId)).toEqual(['b']);
        expect(track.candidateCount).toBe(1);
    });

    it('should degrade the track when gathering reported problems', () => {
        const track = planFootageTrack([candidate('a', 10)], 5, { problems: ['1 of 2 downloads failed'] });

        expect(track.degraded).toBe(true);
        expect(track.problems).toEqual(['1 of 2 downloads failed']);
        expect(planFootageTrack([candidate('a', 10)], 5)).toMatchObject({ degraded: false, problems: [] });
    });

    it('should fail with no_footage when nothing is usable', () => {
        expect(() => planFootageTrack([], 10)).toThrow(CompositionError);

        let caught: unknown;
        try {
            planFootageTrack([candidate('a', 0.001)], 10);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(CompositionError);
        expect(caught).toMatchObject({ reason: 'no_footage' });
    });

    it('should reject a non-positive target duration', () => {
        expect(() => planFootageTrack([candidate('a', 10)], 0)).toThrow('Target duration must be positive, got 0');
    });
});

describe('computeCropWindow', () => {
    it('should leave a source that already matches the frame uncropped', () => {
        expect(computeCropWindow(1080, 1920)).toEqual({ x: 0, y: 0, width: 1080, height: 1920 });
    });

    it('should crop the height of sources narrower than the frame', () => {
        expect(computeCropWindow(540, 1920)).toEqual({ x: 0, y: 480, width: 540, height: 960 });
    });

    it('should return null for an unknown size', () => {
        expect(computeCropWindow(0, 0)).toBeNull();
    });
});

describe('dedupeCandidates', () => {
    it('should keep the first occurrence of each id', () => {
        const result = dedupeCandidates([candidate('a', 5), candidate('b', 6), candidate('a', 7)]);

        expect(result.map((c) => [c.id, c.durationSeconds])).toEqual([['a', 5], ['b', 6]]);
    });
});
