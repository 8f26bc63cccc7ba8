/**
 * Content Ingestor
 *
 * Turns one source text into embedded chunks and records the run as a
 * processing job. Re-ingesting a source replaces its chunks.
 */

import type { z } from 'zod';
import type { ChunkStore, NewChunk } from './chunk-store';
import type { TextChunker } from './chunker';
import type { EmbeddingProvider } from './embeddings';
import {
    ConfigurationError,
    EmptyInputError,
    MetadataValidationError,
    err,
    ok,
    toRagError,
    type Result,
} from './errors';
import type { JobStore } from './job-store';
import { createLogger, type Logger } from './logger';
import {
    CHUNK_METADATA_SCHEMAS,
    type ChunkMetadata,
    type IngestRequest,
    type IngestResult,
    type SourceType,
} from './types';

export interface ContentIngestorDeps {
    chunker: TextChunker;
    embeddings: EmbeddingProvider;
    store: ChunkStore;
    jobs: JobStore;
    logger?: Logger;
    now?: () => number;
}

/**
 * Check metadata against the schema for its source type
 */
export function validateMetadata(
    sourceType: SourceType,
    metadata: unknown
): Result<ChunkMetadata, MetadataValidationError> {
    const schema: z.ZodType<ChunkMetadata, z.ZodTypeDef, unknown> = CHUNK_METADATA_SCHEMAS[sourceType];
    const parsed = schema.safeParse(metadata ?? {});

    if (parsed.success) {
        return ok(parsed.data);
    }

    const issues = parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return err(new MetadataValidationError(`Invalid ${sourceType} metadata: ${issues.join('; ')}`, issues));
}

export class ContentIngestor {
    private chunker: TextChunker;
    private embeddings: EmbeddingProvider;
    private store: ChunkStore;
    private jobs: JobStore;
    private logger: Logger;
    private now: () => number;

    constructor(deps: ContentIngestorDeps) {
        this.chunker = deps.chunker;
        this.embeddings = deps.embeddings;
        this.store = deps.store;
        this.jobs = deps.jobs;
        this.logger = deps.logger ?? createLogger('Ingestion');
        this.now = deps.now ?? Date.now;
    }

    /**
     * Ingest one source. Failures end the job as `failed` and come back in
     * the result; only storage errors while recording the job escape.
     */
    async ingest(request: IngestRequest): Promise<IngestResult> {
        const startedAt = this.now();
        const job = await this.jobs.create({
            sourceType: request.sourceType,
            sourceId: request.sourceId,
            sourceTitle: request.sourceTitle,
        });

        try {
            await this.jobs.transition(job.id, 'processing');

            const metadata = validateMetadata(request.sourceType, request.metadata);
            if (!metadata.ok) throw metadata.error;

            const drafts = this.chunker.chunkWithTokens(request.text);
            if (drafts.length === 0) {
                throw new EmptyInputError(`No content to ingest for ${request.sourceType}/${request.sourceId}`);
            }

            const chunks: Array<Omit<NewChunk, 'sourceType' | 'sourceId'>> = [];
            let embedded = 0;

            for (const draft of drafts) {
                const vector = await this.embedChunk(draft.content, draft.chunkIndex);
                if (vector.length > 0) embedded++;

                chunks.push({
                    content: draft.content,
                    sourceTitle: request.sourceTitle,
                    chunkIndex: draft.chunkIndex,
                    embeddingVector: vector,
                    tokenCount: draft.tokenCount,
                    metadata: metadata.value,
                });
            }

            const { removed } = await this.store.replaceSourceChunks(request.sourceType, request.sourceId, chunks);

            const completed = await this.jobs.transition(job.id, 'completed', {
                chunksCreated: chunks.length,
                embeddingsGenerated: embedded,
                processingTimeSeconds: this.elapsedSeconds(startedAt),
            });

            this.logger.info(
                `Ingested ${request.sourceType}/${request.sourceId}: ${chunks.length} chunks ` +
                    `(${embedded} embedded, ${removed} replaced)`
            );

            return {
                jobId: completed.id,
                status: completed.status,
                chunksCreated: completed.chunksCreated,
                embeddingsGenerated: completed.embeddingsGenerated,
            };
        } catch (error) {
            const ragError = toRagError(error, 'embeddings');
            this.logger.error(`Ingestion of ${request.sourceType}/${request.sourceId} failed: ${ragError.message}`);

            const failed = await this.jobs.transition(job.id, 'failed', {
                errorMessage: ragError.message,
                processingTimeSeconds: this.elapsedSeconds(startedAt),
            });

            return {
                jobId: failed.id,
                status: failed.status,
                chunksCreated: 0,
                embeddingsGenerated: 0,
                error: ragError.message,
            };
        }
    }

    /**
     * Ingest several sources in order; one failure does not stop the rest
     */
    async ingestMany(requests: readonly IngestRequest[]): Promise<IngestResult[]> {
        const results: IngestResult[] = [];
        for (const request of requests) {
            results.push(await this.ingest(request));
        }
        return results;
    }

    /**
     * Embedding for one chunk, or [] when it can be retried later.
     * Missing credentials fail the whole job.
     */
    private async embedChunk(content: string, chunkIndex: number): Promise<number[]> {
        const result = await this.embeddings.tryEmbed(content);
        if (result.ok) return result.value;

        if (result.error instanceof ConfigurationError) {
            throw result.error;
        }

        this.logger.warn(`Chunk ${chunkIndex} stored without embedding: ${result.error.message}`);
        return [];
    }

    private elapsedSeconds(startedAt: number): number {
        return Math.round((this.now() - startedAt) / 10) / 100;
    }
}
