/**
 * Ingestion Tests - chunk, embed, store and job bookkeeping
 */

import { createTestService, muteConsole, words } from './fixtures';

describe('PortfolioRAGService ingestion', () => {
  beforeEach(() => {
    muteConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ============================================================================
  // Happy path
  // ============================================================================

  it('should chunk 900 tokens into two embedded chunks', async () => {
    const { service } = createTestService();

    const result = await service.ingest('blog', 'post-1', 'Long Post', words(900));

    expect(result).toEqual({
      jobId: result.jobId,
      status: 'completed',
      chunksCreated: 2,
      embeddingsGenerated: 2,
    });

    const chunks = await service.chunkStore.listSourceChunks('blog', 'post-1');
    expect(chunks.map(c => c.tokenCount)).toEqual([500, 450]);
    expect(chunks.every(c => c.embeddingVector.length > 0)).toBe(true);

    const job = await service.jobs.get(result.jobId);
    expect(job?.status).toBe('completed');
    expect(job?.chunksCreated).toBe(2);
    expect(job?.processingTimeSeconds).not.toBeNull();
  });

  it('should replace a source on re-ingestion', async () => {
    const { service } = createTestService();
    await service.ingest('blog', 'post-1', 'Long Post', words(900));

    await service.ingest('blog', 'post-1', 'Long Post', 'Short replacement text.');

    const chunks = await service.chunkStore.listSourceChunks('blog', 'post-1');
    expect(chunks.map(c => c.content)).toEqual(['Short replacement text.']);
    expect((await service.chunkStore.getStats()).totalChunks).toBe(1);
    expect(await service.jobs.list()).toHaveLength(2);
  });

  it('should reuse cached embeddings when the same text is ingested again', async () => {
    const { service, api } = createTestService();

    await service.ingest('blog', 'post-1', 'Long Post', words(900));
    await service.ingest('blog', 'post-1', 'Long Post', words(900));

    expect(api.callsTo('/embeddings')).toBe(2);
    expect(await service.chunkStore.listSourceChunks('blog', 'post-1')).toHaveLength(2);
  });

  it('should ingest each profile section as its own source', async () => {
    const { service } = createTestService();

    const results = await service.ingestProfile({
      profileId: 'p1',
      name: 'Alex',
      bio: 'Backend developer.',
      skills: ['TypeScript'],
    });

    expect(results.map(r => r.status)).toEqual(['completed', 'completed']);
    const stats = await service.chunkStore.getStats();
    expect(stats.bySourceType.profile).toBe(1);
    expect(stats.bySourceType.skills).toBe(1);
  });

  it('should remove a profile section that is no longer present', async () => {
    const { service } = createTestService();
    await service.ingestProfile({
      profileId: 'p1',
      name: 'Alex',
      bio: 'Backend developer.',
      resume: 'Old resume mentions golang.',
    });
    await service.query('golang experience?');
    expect(service.queryCache.getStats().size).toBe(1);

    await service.ingestProfile({ profileId: 'p1', name: 'Alex', bio: 'Backend developer.' });

    expect(await service.chunkStore.listSourceChunks('resume', 'p1')).toEqual([]);
    expect((await service.chunkStore.listSourceChunks('profile', 'p1')).map(c => c.content)).toEqual([
      'Backend developer.',
    ]);
    expect(service.queryCache.getStats().size).toBe(0);
  });

  it('should remove a project that no longer has content', async () => {
    const { service } = createTestService();
    await service.ingestProject({ projectId: 'proj-1', title: 'Portfolio Site', description: 'A React dashboard.' });

    expect(await service.ingestProject({ projectId: 'proj-1', title: 'Portfolio Site' })).toBeNull();
    expect(await service.chunkStore.listSourceChunks('project', 'proj-1')).toEqual([]);
  });

  it('should skip a project without content', async () => {
    const { service } = createTestService();

    expect(await service.ingestProject({ projectId: 'empty', title: 'Empty' })).toBeNull();
  });

  // ============================================================================
  // Failures
  // ============================================================================

  it('should fail the job on invalid metadata', async () => {
    const { service, api } = createTestService();

    const result = await service.ingest('project', 'proj-1', 'Portfolio Site', 'Some text', { unknownKey: 1 });

    expect(result.status).toBe('failed');
    expect(result.chunksCreated).toBe(0);
    expect(result.error).toMatch(/^Invalid project metadata: .*unknownKey/);
    expect((await service.jobs.get(result.jobId))?.errorMessage).toBe(result.error);
    expect((await service.chunkStore.getStats()).totalChunks).toBe(0);
    expect(api.fetch).not.toHaveBeenCalled();
  });

  it('should fail the job on empty text', async () => {
    const { service } = createTestService();

    const result = await service.ingest('blog', 'b1', 'Empty', '   \n ');

    expect(result).toMatchObject({ status: 'failed', error: 'No content to ingest for blog/b1' });
  });

  it('should fail the job when no API key is configured', async () => {
    const { service } = createTestService({ apiKey: undefined });

    const result = await service.ingest('blog', 'b1', 'Post', 'Some text');

    expect(result).toMatchObject({ status: 'failed', error: 'Embedding API key is not configured' });
  });

  it('should keep chunks whose embedding failed and fill them in later', async () => {
    const { service, api } = createTestService();
    api.state.failInputsContaining = 'flaky';

    const result = await service.ingest('blog', 'b2', 'Flaky', 'A flaky paragraph.');

    expect(result).toMatchObject({ status: 'completed', chunksCreated: 1, embeddingsGenerated: 0 });
    expect(await service.chunkStore.listChunksMissingEmbeddings()).toHaveLength(1);

    api.state.failInputsContaining = null;

    expect(await service.regenerateMissingEmbeddings()).toEqual({ processed: 1, updated: 1, failed: 0 });
    expect(await service.chunkStore.listChunksMissingEmbeddings()).toEqual([]);
  });

  it('should continue past a failed source in a batch', async () => {
    const { service } = createTestService();

    const results = await service.ingestMany([
      { sourceType: 'blog', sourceId: 'b1', sourceTitle: 'Empty', text: '' },
      { sourceType: 'blog', sourceId: 'b2', sourceTitle: 'Post', text: 'Some text' },
    ]);

    expect(results.map(r => r.status)).toEqual(['failed', 'completed']);
  });
});
