import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { JobConfig } from '../domain/entities/JobConfig';
import {
    JobErrorReport,
    PipelineJob,
    PipelineJobStatus,
    createPipelineJob,
    failJob,
} from '../domain/entities/PipelineJob';

const DATE_FIELDS = new Set(['createdAt', 'updatedAt', 'startedAt', 'finishedAt', 'publishedAt']);
const JOB_STATUSES: readonly PipelineJobStatus[] = ['pending', 'running', 'partial_failure', 'succeeded', 'failed'];

function reviveDates(key: string, value: unknown): unknown {
    if (DATE_FIELDS.has(key) && typeof value === 'string') {
        return new Date(value);
    }
    return value;
}

function isPersistedJob(value: unknown): value is PipelineJob {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const record: { [key: string]: unknown } = { ...value };
    return (
        typeof record.id === 'string' &&
        typeof record.fingerprint === 'string' &&
        JOB_STATUSES.some((status) => status === record.status) &&
        Array.isArray(record.milestones) &&
        typeof record.stages === 'object' &&
        record.stages !== null &&
        record.createdAt instanceof Date
    );
}

/**
 * Job registry with optional file-based persistence.
 * Pass null as the path to keep jobs in memory only.
 */
export class JobManager {
    private jobs: Map<string, PipelineJob> = new Map();
    private readonly persistencePath: string | null;

    constructor(persistencePath: string | null = 'data/jobs.json') {
        this.persistencePath = persistencePath ? path.resolve(process.cwd(), persistencePath) : null;
        if (this.persistencePath) {
            this.ensureDataDir(this.persistencePath);
            this.loadFromDisk(this.persistencePath);
        }
    }

    private ensureDataDir(filePath: string) {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    private loadFromDisk(filePath: string) {
        try {
            if (!fs.existsSync(filePath)) {
                return;
            }
            const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'), reviveDates);
            if (typeof parsed !== 'object' || parsed === null) {
                return;
            }
            for (const job of Object.values(parsed)) {
                if (!isPersistedJob(job)) {
                    continue;
                }
                // A job that was running when the process stopped cannot resume
                const restored =
                    job.status === 'running' || job.status === 'pending'
                        ? failJob(job, {
                              stage: job.currentStage ?? null,
                              kind: 'cancelled',
                              message: 'Interrupted by a restart',
                              retainedStages: [],
                          })
                        : job;
                this.jobs.set(restored.id, restored);
            }
            console.log(`Loaded ${this.jobs.size} jobs from disk`);
        } catch (error) {
            console.error('Failed to load jobs from disk:', error);
        }
    }

    private saveToDisk() {
        if (!this.persistencePath) {
            return;
        }
        try {
            const data = Object.fromEntries(this.jobs);
            fs.writeFileSync(this.persistencePath, JSON.stringify(data, null, 2));
        } catch (error) {
            console.error('Failed to save jobs to disk:', error);
        }
    }

    /**
     * Creates a new pending job.
     */
    createJob(fingerprint: string, config?: JobConfig): PipelineJob {
        const id = `job_${uuidv4().substring(0, 8)}`;
        const job = createPipelineJob(id, fingerprint, config);
        this.jobs.set(id, job);
        this.saveToDisk();
        return job;
    }

    /**
     * Gets a job by ID.
     */
    getJob(id: string): PipelineJob | null {
        return this.jobs.get(id) || null;
    }

    /**
     * Applies a transition to a stored job.
     */
    updateJob(id: string, update: (job: PipelineJob) => PipelineJob): PipelineJob | null {
        const job = this.jobs.get(id);
        if (!job) {
            return null;
        }
        const updated = update(job);
        this.jobs.set(id, updated);
        this.saveToDisk();
        return updated;
    }

    /**
     * Marks a job as failed.
     */
    failJob(id: string, report: JobErrorReport): PipelineJob | null {
        return this.updateJob(id, (job) => failJob(job, report));
    }

    getAllJobs(): PipelineJob[] {
        return Array.from(this.jobs.values());
    }

    getJobsByStatus(status: PipelineJobStatus): PipelineJob[] {
        return Array.from(this.jobs.values()).filter((job) => job.status === status);
    }

    clear(): void {
        this.jobs.clear();
        this.saveToDisk();
    }
}
