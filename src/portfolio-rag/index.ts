/**
 * Portfolio RAG Module
 *
 * Retrieval-augmented question answering over portfolio content.
 */

// Types
export type {
    SourceType,
    Chunk,
    ChunkFilter,
    ChunkMetadata,
    ChunkMetadataFor,
    EmbeddingCacheEntry,
    QueryLogEntry,
    ProcessingJob,
    JobStatus,
    ScoredChunk,
    QueryOptions,
    QueryResponse,
    QueryStatus,
    QueryStage,
    QuerySource,
    IngestRequest,
    IngestResult,
    CacheScope,
} from './types';

export { SOURCE_TYPES, SOURCE_TYPE_LABELS, isSourceType, CHUNK_METADATA_SCHEMAS } from './types';

// Config
export type { RAGConfig, RAGConfigOverrides, RetryConfig } from './config';
export { DEFAULT_RAG_CONFIG, resolveConfig, loadConfigFromEnv } from './config';

// Errors
export {
    RagError,
    ConfigurationError,
    EmptyInputError,
    MetadataValidationError,
    UpstreamError,
    EmbeddingUnavailableError,
    QueryTimeoutError,
    ok,
    err,
} from './errors';
export type { Result, RagErrorCode } from './errors';

// Chunking
export { TextChunker, normalizeWhitespace, generateContentHash, estimateTokenCount } from './chunker';
export { createTokenizer, TiktokenTokenizer, SimpleTokenizer } from './tokenizer';
export type { Tokenizer } from './tokenizer';

// Vectors & embeddings
export { cosineSimilarity, batchCosineSimilarity, dotProduct, norm, normalize } from './vector-math';
export { VectorCache, isExpired, hashText } from './vector-cache';
export type { CacheLookup } from './vector-cache';
export { EmbeddingProvider } from './embeddings';
export type { FetchLike } from './embeddings';

// Storage
export { ChunkStore } from './chunk-store';
export { JobStore } from './job-store';
export { QueryLog } from './query-log';

// Retrieval & answering
export { SimilaritySearch } from './similarity-search';
export { GenerationClient } from './generation';
export { AnswerSynthesizer, buildContext } from './answer-synthesizer';
export type { SynthesisResult } from './answer-synthesizer';
export { ConfidenceScorer, scoreConfidence } from './confidence';
export { QueryCache } from './query-cache';

// Ingestion
export { ContentIngestor, validateMetadata } from './ingestion';
export {
    ProfileSchema,
    ProjectSchema,
    emptyProfileSections,
    profileToRequests,
    projectToRequest,
} from './content-sources';
export type { Profile, Project, ProfileInput, ProjectInput } from './content-sources';

// Service
export { PortfolioRAGService } from './PortfolioRAGService';
export type { PortfolioRAGServiceDeps, RAGStats, RegenerationResult } from './PortfolioRAGService';
