/**
 * Chunk Store Tests
 */

import { InMemoryFileSystem } from '../../storage';
import { ChunkStore, type NewChunk } from '../chunk-store';
import { isValidId } from '../ids';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');

describe('ChunkStore', () => {
  let fs: InMemoryFileSystem;
  let store: ChunkStore;
  let now: number;

  const input = (chunkIndex: number, overrides: Partial<NewChunk> = {}): NewChunk => ({
    content: `Chunk ${chunkIndex}`,
    sourceType: 'project',
    sourceId: 'proj-1',
    sourceTitle: 'Portfolio Site',
    chunkIndex,
    embeddingVector: [1, 0],
    tokenCount: 2,
    ...overrides,
  });

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    now = T0;
    store = new ChunkStore(fs, '/data', () => now);
  });

  it('should create chunks with generated ids and timestamps', async () => {
    const chunk = await store.upsertChunk(input(0));

    expect(isValidId('chunk', chunk.id)).toBe(true);
    expect(chunk.createdAt).toBe('2026-01-01T00:00:00.000Z');
    expect(chunk.isActive).toBe(true);
    expect(chunk.metadata).toEqual({});
  });

  it('should replace a chunk with the same source position and keep createdAt', async () => {
    const first = await store.upsertChunk(input(0));
    now = T0 + 60_000;
    const second = await store.upsertChunk(input(0, { content: 'Updated' }));

    expect(second.id).toBe(first.id);
    expect(second.createdAt).toBe(first.createdAt);
    expect(second.updatedAt).toBe('2026-01-01T00:01:00.000Z');
    expect(await store.listSourceChunks('project', 'proj-1')).toHaveLength(1);
  });

  it('should replace all chunks of a source in one write', async () => {
    await store.replaceSourceChunks('project', 'proj-1', [input(0), input(1), input(2)]);
    await store.upsertChunk(input(0, { sourceId: 'proj-2' }));

    const { removed, created } = await store.replaceSourceChunks('project', 'proj-1', [input(0), input(1)]);

    expect(removed).toBe(3);
    expect(created.map(c => c.chunkIndex)).toEqual([0, 1]);
    expect(await store.listSourceChunks('project', 'proj-1')).toHaveLength(2);
    expect(await store.listSourceChunks('project', 'proj-2')).toHaveLength(1);
  });

  it('should list active embedded chunks newest first', async () => {
    await store.upsertChunk(input(0, { sourceId: 'old' }));
    now = T0 + 1000;
    const newer = await store.upsertChunk(input(0, { sourceId: 'new' }));
    const hidden = await store.upsertChunk(input(0, { sourceId: 'hidden' }));
    await store.upsertChunk(input(0, { sourceId: 'unembedded', embeddingVector: [] }));
    await store.setActive(hidden.id, false);

    const listed = await store.listActiveChunks();

    expect(listed.map(c => c.sourceId)).toEqual(['new', 'old']);
    expect((await store.listActiveChunks({}, 1))[0].id).toBe(newer.id);
    expect(await store.listActiveChunks({ sourceType: 'blog' })).toEqual([]);
  });

  it('should serialize concurrent writes', async () => {
    await Promise.all([0, 1, 2, 3, 4].map(i => store.upsertChunk(input(i))));

    expect(await store.listSourceChunks('project', 'proj-1')).toHaveLength(5);
    expect(fs.writeCounts.get('/data/chunks.json')).toBe(5);
  });

  it('should persist a versioned document', async () => {
    await store.upsertChunk(input(0));

    const raw = JSON.parse(fs.peek('/data/chunks.json') ?? '{}');
    expect(raw.version).toBe(1);
    expect(raw.chunks).toHaveLength(1);
  });

  it('should track chunks missing embeddings and fill them in', async () => {
    const missing = await store.upsertChunk(input(0, { embeddingVector: [] }));

    expect((await store.listChunksMissingEmbeddings()).map(c => c.id)).toEqual([missing.id]);

    await store.updateEmbedding(missing.id, [0, 1]);
    expect(await store.listChunksMissingEmbeddings()).toEqual([]);
    expect((await store.getChunk(missing.id))?.embeddingVector).toEqual([0, 1]);
  });

  it('should report stats and embedding coverage', async () => {
    await store.upsertChunk(input(0));
    await store.upsertChunk(input(1));
    await store.upsertChunk(input(0, { sourceType: 'skills', sourceId: 'p1', embeddingVector: [] }));

    const stats = await store.getStats();

    expect(stats.totalChunks).toBe(3);
    expect(stats.chunksWithEmbeddings).toBe(2);
    expect(stats.embeddingCoverage).toBe(66.7);
    expect(stats.bySourceType.project).toBe(2);
    expect(stats.bySourceType.skills).toBe(1);
  });

  it('should delete a source and clear everything', async () => {
    await store.replaceSourceChunks('project', 'proj-1', [input(0), input(1)]);
    await store.upsertChunk(input(0, { sourceId: 'proj-2' }));

    expect(await store.deleteSource('project', 'proj-1')).toBe(2);
    expect(await store.clear()).toBe(1);
    expect((await store.getStats()).totalChunks).toBe(0);
  });
});
