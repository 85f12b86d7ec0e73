import {
    canReachMilestone,
    completeJob,
    createPipelineJob,
    failJob,
    JobMilestone,
    PipelineJob,
    reachMilestone,
    updateStageState,
} from '../../../../src/domain/entities/PipelineJob';
import { RenderedVideo } from '../../../../src/domain/entities/RenderedVideo';

const VIDEO: RenderedVideo = {
    fingerprint: 'fp',
    videoPath: '/media/reel.mp4',
    durationSeconds: 10,
    width: 1080,
    height: 1920,
    captionCount: 2,
    clipCount: 1,
    hasBackgroundMusic: false,
};

const TO_COMPOSED: JobMilestone[] = ['script_ready', 'audio_ready', 'footage_ready', 'captions_ready', 'composed'];

function throughComposed(job: PipelineJob): PipelineJob {
    return TO_COMPOSED.reduce(reachMilestone, job);
}

describe('PipelineJob', () => {
    it('should start pending with every stage pending', () => {
        const job = createPipelineJob('job_1', 'fp');

        expect(job.status).toBe('pending');
        expect(job.milestones).toEqual(['pending']);
        expect(job.stages.footage).toEqual({ status: 'pending', cached: false, retained: false, retries: 0 });
    });

    it('should reject an empty id or fingerprint', () => {
        expect(() => createPipelineJob(' ', 'fp')).toThrow('PipelineJob id cannot be empty');
        expect(() => createPipelineJob('job_1', '')).toThrow('PipelineJob fingerprint cannot be empty');
    });

    it('should allow captions and footage in either order', () => {
        const job = reachMilestone(reachMilestone(createPipelineJob('job_1', 'fp'), 'script_ready'), 'audio_ready');

        expect(canReachMilestone(job, 'footage_ready')).toBe(true);
        expect(canReachMilestone(job, 'captions_ready')).toBe(true);
        expect(canReachMilestone(job, 'composed')).toBe(false);
    });

    it('should refuse skipped milestones', () => {
        expect(() => reachMilestone(createPipelineJob('job_1', 'fp'), 'audio_ready')).toThrow(
            "Invalid transition for job job_1: cannot reach 'audio_ready' from [pending]"
        );
    });

    it('should succeed when no stage degraded', () => {
        const job = completeJob(throughComposed(createPipelineJob('job_1', 'fp')), VIDEO);

        expect(job.status).toBe('succeeded');
        expect(job.milestones[job.milestones.length - 1]).toBe('succeeded');
        expect(job.video).toBe(VIDEO);
    });

    it('should report a partial failure when a stage degraded', () => {
        const degraded = updateStageState(throughComposed(createPipelineJob('job_1', 'fp')), 'footage', { status: 'degraded' });

        expect(completeJob(degraded, VIDEO).status).toBe('partial_failure');
    });

    it('should record the failure once and block further milestones', () => {
        const report = { stage: null, kind: 'cancelled', message: 'stop', retainedStages: [] };
        const failed = failJob(failJob(createPipelineJob('job_1', 'fp'), report), report);

        expect(failed.status).toBe('failed');
        expect(failed.milestones).toEqual(['pending', 'failed']);
        expect(canReachMilestone(failed, 'script_ready')).toBe(false);
    });
});
