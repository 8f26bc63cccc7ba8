/**
 * Similarity Search
 *
 * Embeds a query, scores candidate chunks by cosine similarity and returns
 * the best ones above the threshold.
 */

import type { ChunkStore } from './chunk-store';
import type { RAGConfig } from './config';
import type { EmbeddingProvider } from './embeddings';
import { EmbeddingUnavailableError } from './errors';
import { batchCosineSimilarity } from './vector-math';
import type { ChunkFilter, ScoredChunk } from './types';

export type SearchConfig = Pick<RAGConfig, 'similarityThreshold' | 'maxChunks' | 'overFetchMultiplier' | 'batchSize'>;

export class SimilaritySearch {
    constructor(
        private store: ChunkStore,
        private embeddings: EmbeddingProvider,
        private config: SearchConfig
    ) {}

    /**
     * Top `limit` chunks for `queryText`, highest score first.
     * Throws EmbeddingUnavailableError when the query cannot be embedded.
     */
    async search(
        queryText: string,
        filter: ChunkFilter = {},
        limit: number = this.config.maxChunks,
        signal?: AbortSignal
    ): Promise<ScoredChunk[]> {
        const result = await this.embeddings.tryEmbed(queryText, signal);
        if (!result.ok) {
            throw new EmbeddingUnavailableError('Could not embed the query', { cause: result.error });
        }
        if (result.value.length === 0) {
            throw new EmbeddingUnavailableError('Query embedding is empty');
        }

        return this.searchWithVector(result.value, filter, limit);
    }

    /**
     * Same as `search`, for callers that already hold the query vector
     */
    async searchWithVector(
        queryVector: readonly number[],
        filter: ChunkFilter = {},
        limit: number = this.config.maxChunks
    ): Promise<ScoredChunk[]> {
        if (limit <= 0 || queryVector.length === 0) return [];

        const candidates = (
            await this.store.listActiveChunks(filter, limit * this.config.overFetchMultiplier)
        ).filter(chunk => chunk.embeddingVector.length > 0);

        const scored: ScoredChunk[] = [];

        for (let offset = 0; offset < candidates.length; offset += this.config.batchSize) {
            const batch = candidates.slice(offset, offset + this.config.batchSize);
            const scores = batchCosineSimilarity(queryVector, batch.map(chunk => chunk.embeddingVector));

            for (const { index, score } of scores) {
                if (score >= this.config.similarityThreshold) {
                    scored.push({ chunk: batch[index], score });
                }
            }
        }

        scored.sort((a, b) =>
            b.score - a.score || Date.parse(b.chunk.createdAt) - Date.parse(a.chunk.createdAt)
        );

        return scored.slice(0, limit);
    }
}
