/**
 * Portfolio RAG Service
 *
 * Wires the pipeline together and exposes the query, ingestion and
 * cache-management entrypoints. Every collaborator is constructed here from
 * one config, or injected for tests.
 */

import { RealFileSystem, type FileSystem } from '../storage';
import { AnswerSynthesizer } from './answer-synthesizer';
import { ChunkStore, type ChunkStoreStats } from './chunk-store';
import { TextChunker } from './chunker';
import { ConfidenceScorer } from './confidence';
import {
    loadConfigFromEnv,
    resolveConfig,
    type RAGConfig,
    type RAGConfigOverrides,
} from './config';
import {
    ProfileSchema,
    ProjectSchema,
    emptyProfileSections,
    profileToRequests,
    projectToRequest,
    type ProfileInput,
    type ProjectInput,
} from './content-sources';
import { EmbeddingProvider, type FetchLike } from './embeddings';
import { ConfigurationError, EmptyInputError, QueryTimeoutError, type RagError } from './errors';
import { GenerationClient } from './generation';
import { ContentIngestor } from './ingestion';
import { JobStore, type JobStats } from './job-store';
import { createLogger, type Logger } from './logger';
import { FALLBACK_MESSAGES } from './prompts';
import { QueryCache, type QueryCacheStats } from './query-cache';
import { QueryLog, type QueryLogStats } from './query-log';
import { SimilaritySearch } from './similarity-search';
import { createTokenizer, type Tokenizer } from './tokenizer';
import type {
    CacheScope,
    IngestRequest,
    IngestResult,
    QueryOptions,
    QueryResponse,
    QuerySource,
    QueryStage,
    QueryStatus,
    ScoredChunk,
    SourceType,
} from './types';
import { VectorCache, type VectorCacheStats } from './vector-cache';

// ============================================================================
// Types
// ============================================================================

export interface PortfolioRAGServiceDeps {
    fs?: FileSystem;
    fetch?: FetchLike;
    tokenizer?: Tokenizer;
    now?: () => number;
    logger?: Logger;
}

export interface RAGStats {
    chunks: ChunkStoreStats;
    embeddingCache: VectorCacheStats;
    queryCache: QueryCacheStats;
    queries: QueryLogStats;
    jobs: JobStats;
}

export interface RegenerationResult {
    processed: number;
    updated: number;
    failed: number;
}

interface QueryProgress {
    stage: QueryStage;
}

const EXCERPT_LENGTH = 200;

// ============================================================================
// Service
// ============================================================================

export class PortfolioRAGService {
    readonly config: RAGConfig;

    readonly chunker: TextChunker;
    readonly vectorCache: VectorCache;
    readonly embeddings: EmbeddingProvider;
    readonly chunkStore: ChunkStore;
    readonly search: SimilaritySearch;
    readonly generation: GenerationClient;
    readonly synthesizer: AnswerSynthesizer;
    readonly scorer: ConfidenceScorer;
    readonly queryCache: QueryCache;
    readonly queryLog: QueryLog;
    readonly jobs: JobStore;
    readonly ingestor: ContentIngestor;

    private logger: Logger;
    private now: () => number;

    constructor(overrides: RAGConfigOverrides = {}, deps: PortfolioRAGServiceDeps = {}) {
        this.config = resolveConfig(overrides);
        this.now = deps.now ?? Date.now;
        this.logger = deps.logger ?? createLogger('PortfolioRAG', { quiet: this.config.quiet });

        const fs = deps.fs ?? new RealFileSystem();
        const tokenizer =
            deps.tokenizer ??
            createTokenizer({ mode: this.config.tokenizer, encoding: this.config.tokenizerEncoding });
        const { dataDir, quiet } = this.config;

        this.chunker = new TextChunker(this.config, tokenizer);
        this.vectorCache = new VectorCache(fs, this.config, this.now);
        this.embeddings = new EmbeddingProvider(this.config, {
            cache: this.vectorCache,
            tokenizer,
            fetch: deps.fetch,
            logger: createLogger('Embeddings', { quiet }),
        });
        this.chunkStore = new ChunkStore(fs, dataDir, this.now);
        this.search = new SimilaritySearch(this.chunkStore, this.embeddings, this.config);
        this.generation = new GenerationClient(this.config, {
            fetch: deps.fetch,
            logger: createLogger('Generation', { quiet }),
        });
        this.synthesizer = new AnswerSynthesizer(this.generation, this.config, createLogger('Synthesizer', { quiet }));
        this.scorer = new ConfidenceScorer(this.config.maxChunks);
        this.queryCache = new QueryCache(this.config.queryCacheTtlMs, this.now);
        this.queryLog = new QueryLog(fs, dataDir, this.now);
        this.jobs = new JobStore(fs, dataDir, this.now);
        this.ingestor = new ContentIngestor({
            chunker: this.chunker,
            embeddings: this.embeddings,
            store: this.chunkStore,
            jobs: this.jobs,
            logger: createLogger('Ingestion', { quiet }),
            now: this.now,
        });

        if (!this.config.apiKey) {
            this.logger.warn('No API key configured; embedding and generation are unavailable');
        }
    }

    /**
     * Build a service from `PORTFOLIO_*` environment variables
     */
    static fromEnv(
        overrides: RAGConfigOverrides = {},
        deps: PortfolioRAGServiceDeps = {},
        env: NodeJS.ProcessEnv = process.env
    ): PortfolioRAGService {
        return new PortfolioRAGService({ ...loadConfigFromEnv(env), ...overrides }, deps);
    }

    // ========================================================================
    // Query
    // ========================================================================

    /**
     * Answer a question from the ingested content.
     *
     * Resolves with a response for every outcome after the input check:
     * answers, cache hits, fallbacks and timeouts. Rejects only with
     * EmptyInputError for a blank question.
     */
    async query(question: string, options: QueryOptions = {}): Promise<QueryResponse> {
        if (question.trim().length === 0) {
            throw new EmptyInputError('Question is empty');
        }

        const startedAt = this.now();
        const timeoutMs = this.resolveTimeout(options.timeoutMs);
        const controller = new AbortController();
        const progress: QueryProgress = { stage: 'received' };

        let timer: ReturnType<typeof setTimeout> | undefined;
        const timedOut = new Promise<QueryResponse>(resolve => {
            timer = setTimeout(() => {
                const error = new QueryTimeoutError(timeoutMs);
                controller.abort(error);
                this.logger.warn(`${error.message} during ${progress.stage}`);
                resolve(this.timeoutResponse(options, timeoutMs, progress.stage));
            }, timeoutMs);
        });

        const run = this.runQuery(question, options, controller.signal, progress, startedAt).catch((error: unknown) => {
            this.logger.error('Query failed unexpectedly', error);
            return this.fallbackResponse(options, startedAt, progress.stage, 'fallback', FALLBACK_MESSAGES.processingFailed, true);
        });

        try {
            return await Promise.race([run, timedOut]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async runQuery(
        question: string,
        options: QueryOptions,
        signal: AbortSignal,
        progress: QueryProgress,
        startedAt: number
    ): Promise<QueryResponse> {
        const filter = { sourceType: options.contextType, sourceId: options.sourceId };
        const limit = options.maxChunks ?? this.config.maxChunks;

        progress.stage = 'cache_check';
        const cacheKey = this.queryCache.keyFor(question, options.contextType, options.sourceId);
        const cached = this.queryCache.get(cacheKey);
        if (cached) {
            progress.stage = 'done';
            return {
                ...structuredClone(cached),
                status: 'cache_hit',
                stage: 'done',
                cached: true,
                responseTimeSeconds: this.elapsedSeconds(startedAt),
            };
        }

        progress.stage = 'embedding';
        const embedded = await this.embeddings.tryEmbed(question, signal);
        if (!embedded.ok || embedded.value.length === 0) {
            const error = embedded.ok ? null : embedded.error;
            return this.embeddingFailure(error, options, startedAt, progress.stage);
        }

        progress.stage = 'retrieval';
        const ranked = await this.search.searchWithVector(embedded.value, filter, limit);
        if (ranked.length === 0) {
            this.logger.info(`No chunks above threshold for "${question.slice(0, 60)}"`);
            return this.fallbackResponse(options, startedAt, progress.stage, 'no_context', FALLBACK_MESSAGES.noContext, false);
        }

        progress.stage = 'synthesis';
        const synthesis = await this.synthesizer.synthesize(question, ranked, signal);
        if (!synthesis.ok) {
            return this.fallbackResponse(
                options,
                startedAt,
                progress.stage,
                'fallback',
                synthesis.answer,
                synthesis.reason === 'upstream' || synthesis.reason === 'aborted',
                ranked.length
            );
        }

        progress.stage = 'scoring';
        const confidence = this.scorer.score(synthesis.answer, synthesis.tokensUsed, ranked.length, limit);

        const response: QueryResponse = {
            answer: synthesis.answer,
            confidence,
            responseTimeSeconds: this.elapsedSeconds(startedAt),
            chunksUsed: synthesis.chunkIdsUsed,
            chunksRetrieved: ranked.length,
            tokensUsed: synthesis.tokensUsed,
            sources: toSources(ranked, synthesis.chunkIdsUsed),
            status: 'answered',
            stage: 'done',
            cached: false,
            timeout: false,
            retry: false,
            modelUsed: synthesis.model,
            contextType: options.contextType ?? null,
            sourceId: options.sourceId ?? null,
        };

        // A timed-out query has already been answered; its result is dropped
        if (signal.aborted) return response;

        progress.stage = 'cache_write';
        // Callers may mutate what they get back
        this.queryCache.put(cacheKey, structuredClone(response));

        progress.stage = 'logged';
        try {
            await this.queryLog.append({
                queryText: question,
                contextType: options.contextType ?? null,
                sourceId: options.sourceId ?? null,
                chunkIdsRetrieved: ranked.map(item => item.chunk.id),
                chunkIdsUsed: synthesis.chunkIdsUsed,
                similarityScores: ranked.map(item => item.score),
                generatedAnswer: synthesis.answer,
                confidenceScore: confidence,
                tokensUsed: synthesis.tokensUsed,
                processingTimeSeconds: response.responseTimeSeconds,
            });
        } catch (error) {
            this.logger.warn('Could not write query log entry', error);
        }

        progress.stage = 'done';
        return response;
    }

    // ========================================================================
    // Ingestion
    // ========================================================================

    /**
     * Chunk, embed and store one source, replacing its previous chunks
     */
    async ingest(
        sourceType: SourceType,
        sourceId: string,
        sourceTitle: string,
        text: string,
        metadata: Record<string, unknown> = {}
    ): Promise<IngestResult> {
        const result = await this.ingestor.ingest({ sourceType, sourceId, sourceTitle, text, metadata });
        this.afterIngest([result]);
        return result;
    }

    async ingestMany(requests: readonly IngestRequest[]): Promise<IngestResult[]> {
        const results = await this.ingestor.ingestMany(requests);
        this.afterIngest(results);
        return results;
    }

    /**
     * Ingest each non-empty section of a profile as its own source.
     * Sections that are now empty lose their earlier chunks.
     */
    async ingestProfile(profile: ProfileInput): Promise<IngestResult[]> {
        const parsed = ProfileSchema.parse(profile);
        for (const sourceType of emptyProfileSections(parsed)) {
            await this.removeSource(sourceType, parsed.profileId);
        }
        return this.ingestMany(profileToRequests(parsed));
    }

    /**
     * Ingest a project as one source. A project without content is
     * removed from the store and yields null.
     */
    async ingestProject(project: ProjectInput): Promise<IngestResult | null> {
        const request = projectToRequest(ProjectSchema.parse(project));
        if (!request) {
            this.logger.info(`Project ${project.projectId} has no content to ingest`);
            await this.removeSource('project', project.projectId);
            return null;
        }
        const [result] = await this.ingestMany([request]);
        return result;
    }

    /**
     * Delete every chunk of a source; returns how many were removed
     */
    async removeSource(sourceType: SourceType, sourceId: string): Promise<number> {
        const removed = await this.chunkStore.deleteSource(sourceType, sourceId);
        if (removed > 0) {
            this.logger.info(`Removed ${removed} chunks of ${sourceType}/${sourceId}`);
            this.queryCache.clear();
        }
        return removed;
    }

    /**
     * Answers cached before new content arrived may be stale
     */
    private afterIngest(results: readonly IngestResult[]): void {
        if (results.some(result => result.status === 'completed')) {
            const dropped = this.queryCache.clear();
            if (dropped > 0) {
                this.logger.info(`Dropped ${dropped} cached answers after ingestion`);
            }
        }
    }

    // ========================================================================
    // Cache & Maintenance
    // ========================================================================

    /**
     * Empty one or both caches; returns how many entries were removed
     */
    async clearCache(scope: CacheScope = 'all'): Promise<number> {
        let cleared = 0;
        if (scope === 'embeddings' || scope === 'all') {
            cleared += await this.vectorCache.clear();
        }
        if (scope === 'queries' || scope === 'all') {
            cleared += this.queryCache.clear();
        }
        this.logger.info(`Cleared ${cleared} cache entries (${scope})`);
        return cleared;
    }

    async sweepExpiredEmbeddings(): Promise<number> {
        const removed = await this.vectorCache.sweepExpired();
        this.queryCache.sweepExpired();
        return removed;
    }

    /**
     * Retry embedding for chunks stored without one
     */
    async regenerateMissingEmbeddings(): Promise<RegenerationResult> {
        const missing = await this.chunkStore.listChunksMissingEmbeddings();
        let updated = 0;

        for (const chunk of missing) {
            const result = await this.embeddings.tryEmbed(chunk.content);
            if (result.ok && result.value.length > 0) {
                await this.chunkStore.updateEmbedding(chunk.id, result.value);
                updated++;
            } else if (!result.ok && result.error instanceof ConfigurationError) {
                throw result.error;
            }
        }

        if (updated > 0) this.queryCache.clear();
        return { processed: missing.length, updated, failed: missing.length - updated };
    }

    async getStats(): Promise<RAGStats> {
        const [chunks, embeddingCache, queries, jobs] = await Promise.all([
            this.chunkStore.getStats(),
            this.vectorCache.getStats(),
            this.queryLog.getStats(),
            this.jobs.getStats(),
        ]);

        return { chunks, embeddingCache, queryCache: this.queryCache.getStats(), queries, jobs };
    }

    // ========================================================================
    // Responses
    // ========================================================================

    private embeddingFailure(
        error: RagError | null,
        options: QueryOptions,
        startedAt: number,
        stage: QueryStage
    ): QueryResponse {
        if (error instanceof ConfigurationError) {
            this.logger.error(`Query embedding unavailable: ${error.message}`);
            return this.fallbackResponse(options, startedAt, stage, 'fallback', FALLBACK_MESSAGES.serviceUnavailable, false);
        }

        this.logger.warn(`Query embedding failed: ${error ? error.message : 'empty vector'}`);
        return this.fallbackResponse(options, startedAt, stage, 'fallback', FALLBACK_MESSAGES.processingFailed, error?.retryable ?? true);
    }

    private fallbackResponse(
        options: QueryOptions,
        startedAt: number,
        stage: QueryStage,
        status: QueryStatus,
        answer: string,
        retry: boolean,
        chunksRetrieved: number = 0
    ): QueryResponse {
        return {
            answer,
            confidence: 0,
            responseTimeSeconds: this.elapsedSeconds(startedAt),
            chunksUsed: [],
            chunksRetrieved,
            tokensUsed: 0,
            sources: [],
            status,
            stage,
            cached: false,
            timeout: false,
            retry,
            modelUsed: this.generation.getModel(),
            contextType: options.contextType ?? null,
            sourceId: options.sourceId ?? null,
        };
    }

    private timeoutResponse(options: QueryOptions, timeoutMs: number, stage: QueryStage): QueryResponse {
        return {
            answer: FALLBACK_MESSAGES.timeout,
            confidence: 0,
            responseTimeSeconds: round2(timeoutMs / 1000),
            chunksUsed: [],
            chunksRetrieved: 0,
            tokensUsed: 0,
            sources: [],
            status: 'timeout',
            stage,
            cached: false,
            timeout: true,
            retry: true,
            modelUsed: this.generation.getModel(),
            contextType: options.contextType ?? null,
            sourceId: options.sourceId ?? null,
        };
    }

    private resolveTimeout(requested: number | undefined): number {
        const value = requested ?? this.config.queryTimeoutMs;
        if (!Number.isFinite(value)) return this.config.queryTimeoutMs;
        return Math.min(Math.max(Math.round(value), 1), this.config.maxQueryTimeoutMs);
    }

    private elapsedSeconds(startedAt: number): number {
        return round2((this.now() - startedAt) / 1000);
    }
}

// ============================================================================
// Helpers
// ============================================================================

function toSources(ranked: readonly ScoredChunk[], usedIds: readonly string[]): QuerySource[] {
    const used = new Set(usedIds);
    return ranked
        .filter(item => used.has(item.chunk.id))
        .map(({ chunk, score }) => ({
            chunkId: chunk.id,
            sourceType: chunk.sourceType,
            sourceId: chunk.sourceId,
            title: chunk.sourceTitle,
            excerpt: chunk.content.slice(0, EXCERPT_LENGTH),
            score: round2(score),
        }));
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}
