/**
 * Processing Job Store Tests
 */

import { InMemoryFileSystem } from '../../storage';
import { isValidId } from '../ids';
import { JobStore } from '../job-store';

const source = { sourceType: 'project' as const, sourceId: 'proj-1', sourceTitle: 'Portfolio Site' };

describe('JobStore', () => {
  let jobs: JobStore;
  let now: number;

  beforeEach(() => {
    now = Date.parse('2026-01-01T00:00:00.000Z');
    jobs = new JobStore(new InMemoryFileSystem(), '/data', () => now);
  });

  it('should create pending jobs', async () => {
    const job = await jobs.create(source);

    expect(isValidId('job', job.id)).toBe(true);
    expect(job).toMatchObject({
      status: 'pending',
      chunksCreated: 0,
      embeddingsGenerated: 0,
      errorMessage: '',
      processingTimeSeconds: null,
    });
  });

  it('should move through processing to completed', async () => {
    const job = await jobs.create(source);
    await jobs.transition(job.id, 'processing');
    now += 1500;

    const done = await jobs.transition(job.id, 'completed', {
      chunksCreated: 3,
      embeddingsGenerated: 3,
      processingTimeSeconds: 1.5,
    });

    expect(done).toMatchObject({ status: 'completed', chunksCreated: 3, processingTimeSeconds: 1.5 });
    expect(done.updatedAt).toBe('2026-01-01T00:00:01.500Z');
    expect((await jobs.get(job.id))?.status).toBe('completed');
  });

  it('should reject illegal transitions', async () => {
    const job = await jobs.create(source);

    await expect(jobs.transition(job.id, 'completed')).rejects.toThrow(
      `Job ${job.id} cannot move from pending to completed`
    );

    await jobs.transition(job.id, 'failed', { errorMessage: 'boom' });
    await expect(jobs.transition(job.id, 'processing')).rejects.toThrow('cannot move from failed to processing');
    await expect(jobs.transition('nope', 'processing')).rejects.toThrow('Job not found: nope');
  });

  it('should list newest first with filters', async () => {
    const first = await jobs.create(source);
    const second = await jobs.create({ ...source, sourceId: 'proj-2' });
    await jobs.transition(first.id, 'failed');

    expect((await jobs.list()).map(j => j.id)).toEqual([second.id, first.id]);
    expect((await jobs.list({ status: 'failed' })).map(j => j.id)).toEqual([first.id]);
    expect((await jobs.list({ sourceId: 'proj-2' })).map(j => j.id)).toEqual([second.id]);
  });

  it('should average processing time over finished jobs', async () => {
    const a = await jobs.create(source);
    const b = await jobs.create(source);
    await jobs.create(source);
    await jobs.transition(a.id, 'failed', { processingTimeSeconds: 1 });
    await jobs.transition(b.id, 'processing');
    await jobs.transition(b.id, 'completed', { processingTimeSeconds: 2 });

    expect(await jobs.getStats()).toEqual({
      total: 3,
      byStatus: { pending: 1, processing: 0, completed: 1, failed: 1 },
      averageProcessingTimeSeconds: 1.5,
    });
  });
});
