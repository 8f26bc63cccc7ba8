/**
 * Processing Job Store
 *
 * One record per ingestion run in `<dataDir>/jobs.json`.
 * pending → processing → completed | failed
 */

import * as path from 'path';
import { z } from 'zod';
import { JSONFile, WriteQueue, type FileSystem } from '../storage';
import { generateId } from './ids';
import { ProcessingJobSchema, type JobStatus, type ProcessingJob, type SourceType } from './types';

export interface JobStats {
    total: number;
    byStatus: Record<JobStatus, number>;
    averageProcessingTimeSeconds: number;
}

type JobUpdate = Partial<Pick<ProcessingJob, 'chunksCreated' | 'embeddingsGenerated' | 'errorMessage' | 'processingTimeSeconds'>>;

const JobFileSchema = z.object({ jobs: z.array(ProcessingJobSchema) });
type JobFile = z.infer<typeof JobFileSchema>;

/** Allowed transitions; terminal states have none */
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
    pending: ['processing', 'failed'],
    processing: ['completed', 'failed'],
    completed: [],
    failed: [],
};

export class JobStore {
    private file: JSONFile<JobFile>;
    private writes = new WriteQueue();

    constructor(
        fs: FileSystem,
        dataDir: string,
        private now: () => number = Date.now
    ) {
        this.file = new JSONFile(fs, path.join(dataDir, 'jobs.json'), JobFileSchema, () => ({ jobs: [] }));
    }

    async create(source: { sourceType: SourceType; sourceId: string; sourceTitle: string }): Promise<ProcessingJob> {
        return this.writes.run(async () => {
            const data = await this.file.read();
            const timestamp = this.now();
            const iso = new Date(timestamp).toISOString();

            const job: ProcessingJob = {
                id: generateId('job', timestamp),
                ...source,
                status: 'pending',
                chunksCreated: 0,
                embeddingsGenerated: 0,
                errorMessage: '',
                processingTimeSeconds: null,
                createdAt: iso,
                updatedAt: iso,
            };

            data.jobs.push(job);
            await this.file.write(data);
            return job;
        });
    }

    /**
     * Move a job to `status`. Throws on an unknown id or an illegal transition.
     */
    async transition(id: string, status: JobStatus, update: JobUpdate = {}): Promise<ProcessingJob> {
        return this.writes.run(async () => {
            const data = await this.file.read();
            const index = data.jobs.findIndex(job => job.id === id);
            if (index < 0) {
                throw new Error(`Job not found: ${id}`);
            }

            const current = data.jobs[index];
            if (!TRANSITIONS[current.status].includes(status)) {
                throw new Error(`Job ${id} cannot move from ${current.status} to ${status}`);
            }

            const updated: ProcessingJob = {
                ...current,
                ...update,
                status,
                updatedAt: new Date(this.now()).toISOString(),
            };
            data.jobs[index] = updated;

            await this.file.write(data);
            return updated;
        });
    }

    async get(id: string): Promise<ProcessingJob | null> {
        const { jobs } = await this.file.read();
        return jobs.find(job => job.id === id) ?? null;
    }

    /**
     * Jobs newest first, optionally for one source
     */
    async list(filter: { sourceType?: SourceType; sourceId?: string; status?: JobStatus } = {}): Promise<ProcessingJob[]> {
        const { jobs } = await this.file.read();
        return jobs
            .filter(job => filter.sourceType === undefined || job.sourceType === filter.sourceType)
            .filter(job => filter.sourceId === undefined || job.sourceId === filter.sourceId)
            .filter(job => filter.status === undefined || job.status === filter.status)
            .reverse();
    }

    async getStats(): Promise<JobStats> {
        const { jobs } = await this.file.read();

        const byStatus: Record<JobStatus, number> = { pending: 0, processing: 0, completed: 0, failed: 0 };
        let timed = 0;
        let totalSeconds = 0;

        for (const job of jobs) {
            byStatus[job.status]++;
            if (job.processingTimeSeconds !== null) {
                timed++;
                totalSeconds += job.processingTimeSeconds;
            }
        }

        return {
            total: jobs.length,
            byStatus,
            averageProcessingTimeSeconds: timed === 0 ? 0 : Math.round((totalSeconds / timed) * 100) / 100,
        };
    }
}
