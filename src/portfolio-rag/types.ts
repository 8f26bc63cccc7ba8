/**
 * Portfolio RAG Types
 *
 * Records persisted by the stores, and the shapes passed between the
 * pipeline stages. Persisted records have zod schemas so that reads from
 * disk are validated rather than trusted.
 */

import { z } from 'zod';

// =============================================================================
// Source Types
// =============================================================================

export const SOURCE_TYPES = [
    'profile',
    'project',
    'experience',
    'skills',
    'education',
    'resume',
    'blog',
    'code',
] as const;

export type SourceType = typeof SOURCE_TYPES[number];

export const SourceTypeSchema = z.enum(SOURCE_TYPES);

/** Human-readable labels, used in the context block */
export const SOURCE_TYPE_LABELS: Record<SourceType, string> = {
    profile: 'Profile Information',
    project: 'Project Description',
    experience: 'Work Experience',
    skills: 'Skills Information',
    education: 'Education Background',
    resume: 'Resume Content',
    blog: 'Blog Post',
    code: 'Code Documentation',
};

export function isSourceType(value: string): value is SourceType {
    return (SOURCE_TYPES as readonly string[]).includes(value);
}

// =============================================================================
// Chunk Metadata
// =============================================================================

const commonMetadata = {
    section: z.string().min(1).optional(),
    tags: z.array(z.string()).optional(),
};

const personMetadata = z.object({
    ...commonMetadata,
    profileId: z.string().min(1).optional(),
}).strict();

/**
 * Metadata accepted for each source type. Unknown keys are rejected.
 */
export const CHUNK_METADATA_SCHEMAS = {
    profile: personMetadata,
    experience: personMetadata,
    skills: personMetadata,
    education: personMetadata,
    resume: personMetadata,
    project: z.object({
        ...commonMetadata,
        projectId: z.string().min(1).optional(),
        projectTitle: z.string().optional(),
        url: z.string().url().optional(),
    }).strict(),
    blog: z.object({
        ...commonMetadata,
        url: z.string().url().optional(),
        publishedAt: z.string().datetime().optional(),
    }).strict(),
    code: z.object({
        ...commonMetadata,
        repository: z.string().optional(),
        path: z.string().optional(),
        language: z.string().optional(),
    }).strict(),
} satisfies Record<SourceType, z.ZodTypeAny>;

export type ChunkMetadataFor<S extends SourceType> = z.infer<typeof CHUNK_METADATA_SCHEMAS[S]>;

/**
 * Union of every per-source metadata shape; stored with each chunk.
 */
export const ChunkMetadataSchema = z.object({
    section: z.string().optional(),
    tags: z.array(z.string()).optional(),
    profileId: z.string().optional(),
    projectId: z.string().optional(),
    projectTitle: z.string().optional(),
    url: z.string().optional(),
    publishedAt: z.string().optional(),
    repository: z.string().optional(),
    path: z.string().optional(),
    language: z.string().optional(),
});

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

// =============================================================================
// Chunk
// =============================================================================

export const ChunkSchema = z.object({
    id: z.string(),
    content: z.string().min(1),
    sourceType: SourceTypeSchema,
    sourceId: z.string(),
    sourceTitle: z.string(),
    chunkIndex: z.number().int().nonnegative(),
    embeddingVector: z.array(z.number()),
    tokenCount: z.number().int().nonnegative(),
    metadata: ChunkMetadataSchema,
    isActive: z.boolean(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

/**
 * A bounded segment of source text stored with its embedding
 */
export type Chunk = z.infer<typeof ChunkSchema>;

export interface ChunkFilter {
    sourceType?: SourceType;
    sourceId?: string;
}

// =============================================================================
// Embedding Cache Entry
// =============================================================================

export const EmbeddingCacheEntrySchema = z.object({
    textHash: z.string(),
    textContentPreview: z.string(),
    embeddingVector: z.array(z.number()),
    modelName: z.string(),
    tokenCount: z.number().int().nonnegative(),
    createdAt: z.string(),
    expiresAt: z.string().optional(),
});

export type EmbeddingCacheEntry = z.infer<typeof EmbeddingCacheEntrySchema>;

// =============================================================================
// Query Log Entry
// =============================================================================

export const QueryLogEntrySchema = z.object({
    id: z.string(),
    queryText: z.string(),
    contextType: SourceTypeSchema.nullable(),
    sourceId: z.string().nullable(),
    chunkIdsRetrieved: z.array(z.string()),
    chunkIdsUsed: z.array(z.string()),
    similarityScores: z.array(z.number()),
    generatedAnswer: z.string(),
    confidenceScore: z.number(),
    tokensUsed: z.number().int().nonnegative(),
    processingTimeSeconds: z.number().nonnegative(),
    createdAt: z.string(),
});

/**
 * Permanent record of one completed query
 */
export type QueryLogEntry = z.infer<typeof QueryLogEntrySchema>;

// =============================================================================
// Processing Job
// =============================================================================

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type JobStatus = typeof JOB_STATUSES[number];

export const ProcessingJobSchema = z.object({
    id: z.string(),
    sourceType: SourceTypeSchema,
    sourceId: z.string(),
    sourceTitle: z.string(),
    status: z.enum(JOB_STATUSES),
    chunksCreated: z.number().int().nonnegative(),
    embeddingsGenerated: z.number().int().nonnegative(),
    errorMessage: z.string(),
    processingTimeSeconds: z.number().nonnegative().nullable(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

export type ProcessingJob = z.infer<typeof ProcessingJobSchema>;

// =============================================================================
// Search & Query
// =============================================================================

export interface ScoredChunk {
    chunk: Chunk;

    /** Cosine similarity, in [-1, 1]; results are always ≥ the threshold */
    score: number;
}

export interface QueryOptions {
    contextType?: SourceType;
    sourceId?: string;
    maxChunks?: number;

    /** Per-query time budget; clamped to the configured hard maximum */
    timeoutMs?: number;
}

/**
 * Where a query ended. `cache_hit` and `done` carry real answers;
 * the others carry curated messages.
 */
export type QueryStatus = 'cache_hit' | 'answered' | 'no_context' | 'fallback' | 'timeout';

export type QueryStage =
    | 'received'
    | 'cache_check'
    | 'embedding'
    | 'retrieval'
    | 'synthesis'
    | 'scoring'
    | 'cache_write'
    | 'logged'
    | 'done';

export interface QuerySource {
    chunkId: string;
    sourceType: SourceType;
    sourceId: string;
    title: string;

    /** First 200 characters of the chunk */
    excerpt: string;
    score: number;
}

export interface QueryResponse {
    answer: string;

    /** Heuristic in [0, 1]; 0 for every non-answer */
    confidence: number;
    responseTimeSeconds: number;
    chunksUsed: string[];
    chunksRetrieved: number;
    tokensUsed: number;
    sources: QuerySource[];
    status: QueryStatus;

    /** Last stage reached before the response was produced */
    stage: QueryStage;
    cached: boolean;
    timeout: boolean;
    retry: boolean;
    modelUsed: string;
    contextType: SourceType | null;
    sourceId: string | null;
}

// =============================================================================
// Ingestion
// =============================================================================

export interface IngestRequest {
    sourceType: SourceType;
    sourceId: string;
    sourceTitle: string;
    text: string;
    metadata?: Record<string, unknown>;
}

export interface IngestResult {
    jobId: string;
    status: JobStatus;
    chunksCreated: number;
    embeddingsGenerated: number;

    /** Curated message when the job failed */
    error?: string;
}

export type CacheScope = 'embeddings' | 'queries' | 'all';
