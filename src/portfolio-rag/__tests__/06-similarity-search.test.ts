/**
 * Similarity Search Tests
 */

import { InMemoryFileSystem } from '../../storage';
import { ChunkStore } from '../chunk-store';
import { EmbeddingProvider } from '../embeddings';
import { EmbeddingUnavailableError } from '../errors';
import { SimilaritySearch, type SearchConfig } from '../similarity-search';
import { SimpleTokenizer } from '../tokenizer';
import type { SourceType } from '../types';
import { VectorCache } from '../vector-cache';
import { createFakeApi, silentLogger } from './fixtures';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');

describe('SimilaritySearch', () => {
  let fs: InMemoryFileSystem;
  let store: ChunkStore;
  let now: number;

  const createSearch = (config: Partial<SearchConfig> = {}, apiKey: string | undefined = 'test-secret') => {
    const api = createFakeApi();
    const embeddings = new EmbeddingProvider(
      {
        apiKey,
        baseUrl: 'https://api.test/v1',
        embeddingModel: 'text-embedding-test',
        maxInputTokens: 8192,
        embeddingTimeoutMs: 1000,
        retry: { maxRetries: 0, initialDelayMs: 0, maxDelayMs: 0, backoffMultiplier: 2 },
        quiet: true,
      },
      {
        cache: new VectorCache(fs, { dataDir: '/data', embeddingCacheTtlMs: 60_000, durableEmbeddingTtlMs: null }),
        tokenizer: new SimpleTokenizer(),
        fetch: api.fetch,
        logger: silentLogger,
      }
    );
    return new SimilaritySearch(store, embeddings, {
      similarityThreshold: 0.7,
      maxChunks: 5,
      overFetchMultiplier: 3,
      batchSize: 100,
      ...config,
    });
  };

  const addChunk = async (id: string, vector: number[], at: number = T0, sourceType: SourceType = 'project') => {
    now = at;
    return store.upsertChunk({
      id,
      content: `content ${id}`,
      sourceType,
      sourceId: id,
      sourceTitle: `Title ${id}`,
      chunkIndex: 0,
      embeddingVector: vector,
      tokenCount: 2,
    });
  };

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    now = T0;
    store = new ChunkStore(fs, '/data', () => now);
  });

  // ============================================================================
  // Scoring
  // ============================================================================

  it('should keep chunks at or above the threshold, best first', async () => {
    await addChunk('exact', [1, 0]);
    await addChunk('close', [0.8, 0.6]);
    await addChunk('far', [0.6, 0.8]);
    await addChunk('other-model', [1, 0, 0]);

    const results = await createSearch().searchWithVector([1, 0]);

    expect(results.map(r => r.chunk.id)).toEqual(['exact', 'close']);
    expect(results[0].score).toBeCloseTo(1);
    expect(results[1].score).toBeCloseTo(0.8);
  });

  it('should break score ties by newer chunk', async () => {
    await addChunk('older', [1, 0], T0);
    await addChunk('newer', [1, 0], T0 + 1000);

    const results = await createSearch().searchWithVector([1, 0]);

    expect(results.map(r => r.chunk.id)).toEqual(['newer', 'older']);
  });

  it('should honour the limit and the filter', async () => {
    await addChunk('a', [1, 0]);
    await addChunk('b', [1, 0]);
    await addChunk('c', [1, 0], T0, 'skills');

    const search = createSearch();

    expect(await search.searchWithVector([1, 0], {}, 2)).toHaveLength(2);
    expect((await search.searchWithVector([1, 0], { sourceType: 'skills' })).map(r => r.chunk.id)).toEqual(['c']);
    expect(await search.searchWithVector([1, 0], {}, 0)).toEqual([]);
  });

  it('should only score the newest limit × overFetchMultiplier candidates', async () => {
    await addChunk('relevant-but-old', [1, 0], T0);
    await addChunk('recent-but-unrelated', [0, 1], T0 + 1000);

    expect(await createSearch({ overFetchMultiplier: 1 }).searchWithVector([1, 0], {}, 1)).toEqual([]);

    const wider = await createSearch({ overFetchMultiplier: 3 }).searchWithVector([1, 0], {}, 1);
    expect(wider.map(r => r.chunk.id)).toEqual(['relevant-but-old']);
  });

  it('should score candidates across batches', async () => {
    for (let i = 0; i < 5; i++) {
      await addChunk(`chunk-${i}`, [1, 0], T0 + i);
    }

    const results = await createSearch({ batchSize: 2 }).searchWithVector([1, 0]);

    expect(results.map(r => r.chunk.id)).toEqual(['chunk-4', 'chunk-3', 'chunk-2', 'chunk-1', 'chunk-0']);
  });

  // ============================================================================
  // Query embedding
  // ============================================================================

  it('should embed the query text before searching', async () => {
    // keyword vector for "typescript"
    await addChunk('ts', [1, 0, 0, 0, 0, 0, 0]);
    await addChunk('music', [0, 0, 0, 0, 0, 1, 0]);

    const results = await createSearch().search('Which TypeScript projects?');

    expect(results.map(r => r.chunk.id)).toEqual(['ts']);
  });

  it('should throw EmbeddingUnavailableError when the query cannot be embedded', async () => {
    await addChunk('a', [1, 0]);

    await expect(createSearch({}, undefined).search('anything')).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });
});
