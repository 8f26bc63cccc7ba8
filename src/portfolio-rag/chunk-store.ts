/**
 * Chunk Store
 *
 * Durable chunk records in `<dataDir>/chunks.json`. Every mutation is a
 * read-modify-write run through a write queue, so concurrent writers
 * serialize and the last write wins.
 */

import * as path from 'path';
import { z } from 'zod';
import { JSONFile, WriteQueue, type FileSystem } from '../storage';
import { generateId } from './ids';
import {
    ChunkSchema,
    type Chunk,
    type ChunkFilter,
    type ChunkMetadata,
    type SourceType,
} from './types';

// =============================================================================
// Types
// =============================================================================

/** Fields supplied when creating a chunk; the store fills in the rest */
export interface NewChunk {
    id?: string;
    content: string;
    sourceType: SourceType;
    sourceId: string;
    sourceTitle: string;
    chunkIndex: number;
    embeddingVector: number[];
    tokenCount: number;
    metadata?: ChunkMetadata;
    isActive?: boolean;
}

export interface ChunkStoreStats {
    totalChunks: number;
    activeChunks: number;
    chunksWithEmbeddings: number;
    bySourceType: Record<SourceType, number>;

    /** Percentage of chunks with an embedding, 0-100 with one decimal */
    embeddingCoverage: number;
}

const ChunkFileSchema = z.object({
    version: z.literal(1),
    chunks: z.array(ChunkSchema),
});

type ChunkFile = z.infer<typeof ChunkFileSchema>;

const CHUNKS_FILENAME = 'chunks.json';

// =============================================================================
// Chunk Store
// =============================================================================

export class ChunkStore {
    private file: JSONFile<ChunkFile>;
    private writes = new WriteQueue();

    constructor(
        fs: FileSystem,
        dataDir: string,
        private now: () => number = Date.now
    ) {
        this.file = new JSONFile(fs, path.join(dataDir, CHUNKS_FILENAME), ChunkFileSchema, () => ({
            version: 1,
            chunks: [],
        }));
    }

    // =========================================================================
    // Reads
    // =========================================================================

    /**
     * Active chunks that have an embedding, newest first
     */
    async listActiveChunks(filter: ChunkFilter = {}, limit?: number): Promise<Chunk[]> {
        const { chunks } = await this.file.read();

        const matching = chunks
            .filter(chunk => chunk.isActive && chunk.embeddingVector.length > 0)
            .filter(chunk => matchesFilter(chunk, filter))
            .sort(newestFirst);

        return limit === undefined ? matching : matching.slice(0, Math.max(0, limit));
    }

    async getChunk(id: string): Promise<Chunk | null> {
        const { chunks } = await this.file.read();
        return chunks.find(chunk => chunk.id === id) ?? null;
    }

    /**
     * All chunks of one source, active or not, in chunk order
     */
    async listSourceChunks(sourceType: SourceType, sourceId: string): Promise<Chunk[]> {
        const { chunks } = await this.file.read();
        return chunks
            .filter(chunk => chunk.sourceType === sourceType && chunk.sourceId === sourceId)
            .sort((a, b) => a.chunkIndex - b.chunkIndex);
    }

    async listChunksMissingEmbeddings(): Promise<Chunk[]> {
        const { chunks } = await this.file.read();
        return chunks.filter(chunk => chunk.isActive && chunk.embeddingVector.length === 0);
    }

    // =========================================================================
    // Writes
    // =========================================================================

    /**
     * Insert or replace one chunk. A chunk with the same id, or the same
     * (sourceType, sourceId, chunkIndex), is replaced and keeps its createdAt.
     */
    async upsertChunk(input: NewChunk): Promise<Chunk> {
        return this.writes.run(async () => {
            const data = await this.file.read();
            const timestamp = new Date(this.now()).toISOString();

            const index = data.chunks.findIndex(
                chunk =>
                    (input.id !== undefined && chunk.id === input.id) ||
                    (chunk.sourceType === input.sourceType &&
                        chunk.sourceId === input.sourceId &&
                        chunk.chunkIndex === input.chunkIndex)
            );
            const existing = index >= 0 ? data.chunks[index] : undefined;

            const chunk = this.buildChunk(input, timestamp, existing);
            if (index >= 0) {
                data.chunks[index] = chunk;
            } else {
                data.chunks.push(chunk);
            }

            await this.file.write(data);
            return chunk;
        });
    }

    /**
     * Replace every chunk of a source with `inputs` in one write
     */
    async replaceSourceChunks(
        sourceType: SourceType,
        sourceId: string,
        inputs: readonly Omit<NewChunk, 'sourceType' | 'sourceId'>[]
    ): Promise<{ removed: number; created: Chunk[] }> {
        return this.writes.run(async () => {
            const data = await this.file.read();
            const timestamp = new Date(this.now()).toISOString();

            const kept = data.chunks.filter(
                chunk => !(chunk.sourceType === sourceType && chunk.sourceId === sourceId)
            );
            const removed = data.chunks.length - kept.length;

            const created = inputs.map(input =>
                this.buildChunk({ ...input, sourceType, sourceId }, timestamp)
            );

            await this.file.write({ version: 1, chunks: [...kept, ...created] });
            return { removed, created };
        });
    }

    async setActive(id: string, isActive: boolean): Promise<Chunk | null> {
        return this.update(id, chunk => ({ ...chunk, isActive }));
    }

    async updateEmbedding(id: string, embeddingVector: number[]): Promise<Chunk | null> {
        return this.update(id, chunk => ({ ...chunk, embeddingVector }));
    }

    /**
     * Delete every chunk of a source; returns how many were deleted
     */
    async deleteSource(sourceType: SourceType, sourceId: string): Promise<number> {
        const { removed } = await this.replaceSourceChunks(sourceType, sourceId, []);
        return removed;
    }

    async clear(): Promise<number> {
        return this.writes.run(async () => {
            const data = await this.file.read();
            await this.file.write({ version: 1, chunks: [] });
            return data.chunks.length;
        });
    }

    // =========================================================================
    // Stats
    // =========================================================================

    async getStats(): Promise<ChunkStoreStats> {
        const { chunks } = await this.file.read();

        const bySourceType: Record<SourceType, number> = {
            profile: 0,
            project: 0,
            experience: 0,
            skills: 0,
            education: 0,
            resume: 0,
            blog: 0,
            code: 0,
        };
        let active = 0;
        let withEmbeddings = 0;

        for (const chunk of chunks) {
            bySourceType[chunk.sourceType]++;
            if (chunk.isActive) active++;
            if (chunk.embeddingVector.length > 0) withEmbeddings++;
        }

        return {
            totalChunks: chunks.length,
            activeChunks: active,
            chunksWithEmbeddings: withEmbeddings,
            bySourceType,
            embeddingCoverage: chunks.length === 0 ? 0 : Math.round((withEmbeddings / chunks.length) * 1000) / 10,
        };
    }

    // =========================================================================
    // Helpers
    // =========================================================================

    private async update(id: string, change: (chunk: Chunk) => Chunk): Promise<Chunk | null> {
        return this.writes.run(async () => {
            const data = await this.file.read();
            const index = data.chunks.findIndex(chunk => chunk.id === id);
            if (index < 0) return null;

            const updated = {
                ...change(data.chunks[index]),
                updatedAt: new Date(this.now()).toISOString(),
            };
            data.chunks[index] = updated;

            await this.file.write(data);
            return updated;
        });
    }

    private buildChunk(input: NewChunk, timestamp: string, existing?: Chunk): Chunk {
        return {
            id: existing?.id ?? input.id ?? generateId('chunk', this.now()),
            content: input.content,
            sourceType: input.sourceType,
            sourceId: input.sourceId,
            sourceTitle: input.sourceTitle,
            chunkIndex: input.chunkIndex,
            embeddingVector: input.embeddingVector,
            tokenCount: input.tokenCount,
            metadata: input.metadata ?? {},
            isActive: input.isActive ?? true,
            createdAt: existing?.createdAt ?? timestamp,
            updatedAt: timestamp,
        };
    }
}

// =============================================================================
// Utility Functions
// =============================================================================

function matchesFilter(chunk: Chunk, filter: ChunkFilter): boolean {
    if (filter.sourceType !== undefined && chunk.sourceType !== filter.sourceType) return false;
    if (filter.sourceId !== undefined && chunk.sourceId !== filter.sourceId) return false;
    return true;
}

/** Newest createdAt first; chunkIndex keeps a source's chunks in order on ties */
export function newestFirst(a: Chunk, b: Chunk): number {
    const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
    return byTime !== 0 ? byTime : a.chunkIndex - b.chunkIndex;
}
