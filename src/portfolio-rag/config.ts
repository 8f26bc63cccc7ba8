/**
 * RAG Configuration
 *
 * Defaults, environment loading and validation. Components take the slice
 * of `RAGConfig` they need; the service builds them from one merged config.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

// =============================================================================
// Schema
// =============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

export const RetryConfigSchema = z.object({
    maxRetries: z.number().int().min(0).max(10),
    initialDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    backoffMultiplier: z.number().min(1),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const RAGConfigSchema = z.object({
    /** OpenAI-compatible API credential; required for embedding and generation */
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url(),
    embeddingModel: z.string().min(1),
    chatModel: z.string().min(1),

    /** Root directory of the JSON stores */
    dataDir: z.string().min(1),

    tokenizer: z.enum(['tiktoken', 'simple']),
    tokenizerEncoding: z.enum(['cl100k_base', 'p50k_base', 'r50k_base', 'o200k_base']),

    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),

    /** Embedding input window; longer text is truncated */
    maxInputTokens: z.number().int().positive(),
    embeddingTimeoutMs: z.number().int().positive(),
    generationTimeoutMs: z.number().int().positive(),

    /** Fast tier TTL */
    embeddingCacheTtlMs: z.number().int().positive(),

    /** Durable tier TTL; null keeps entries until cleared */
    durableEmbeddingTtlMs: z.number().int().positive().nullable(),
    queryCacheTtlMs: z.number().int().positive(),

    similarityThreshold: z.number().min(-1).max(1),
    maxChunks: z.number().int().positive(),
    overFetchMultiplier: z.number().int().min(1),
    batchSize: z.number().int().positive(),

    maxContextTokens: z.number().int().positive(),
    maxOutputTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    topP: z.number().gt(0).max(1),

    queryTimeoutMs: z.number().int().positive(),
    maxQueryTimeoutMs: z.number().int().positive(),

    retry: RetryConfigSchema,

    /** Silence info-level console output */
    quiet: z.boolean(),
}).superRefine((config, ctx) => {
    if (config.chunkOverlap >= config.chunkSize) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['chunkOverlap'],
            message: 'chunkOverlap must be smaller than chunkSize',
        });
    }
    if (config.queryTimeoutMs > config.maxQueryTimeoutMs) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['queryTimeoutMs'],
            message: 'queryTimeoutMs must not exceed maxQueryTimeoutMs',
        });
    }
});

export type RAGConfig = z.infer<typeof RAGConfigSchema>;

/**
 * Override shape: any top-level key, and any subset of `retry`
 */
export type RAGConfigOverrides = Partial<Omit<RAGConfig, 'retry'>> & {
    retry?: Partial<RetryConfig>;
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 2,
    initialDelayMs: 500,
    maxDelayMs: 8_000,
    backoffMultiplier: 2,
};

export const DEFAULT_RAG_CONFIG: RAGConfig = {
    apiKey: undefined,
    baseUrl: 'https://api.openai.com/v1',
    embeddingModel: 'text-embedding-ada-002',
    chatModel: 'gpt-3.5-turbo',
    dataDir: './data',
    tokenizer: 'tiktoken',
    tokenizerEncoding: 'cl100k_base',
    chunkSize: 500,
    chunkOverlap: 50,
    maxInputTokens: 8192,
    embeddingTimeoutMs: 30_000,
    generationTimeoutMs: 30_000,
    embeddingCacheTtlMs: 7 * DAY_MS,
    durableEmbeddingTtlMs: null,
    queryCacheTtlMs: 60 * 60 * 1000,
    similarityThreshold: 0.7,
    maxChunks: 5,
    overFetchMultiplier: 3,
    batchSize: 100,
    maxContextTokens: 4000,
    maxOutputTokens: 500,
    temperature: 0.7,
    topP: 0.9,
    queryTimeoutMs: 10_000,
    maxQueryTimeoutMs: 30_000,
    retry: DEFAULT_RETRY_CONFIG,
    quiet: false,
};

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: RAGConfigOverrides = {}): RAGConfig {
    const merged = {
        ...DEFAULT_RAG_CONFIG,
        ...overrides,
        retry: { ...DEFAULT_RETRY_CONFIG, ...overrides.retry },
    };

    const parsed = RAGConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid RAG configuration: ${details}`);
    }
    return parsed.data;
}

/**
 * Read overrides from environment variables.
 *
 * `<PREFIX>_OPENAI_API_KEY` wins over plain `OPENAI_API_KEY`. Numeric values
 * that do not parse raise ConfigurationError instead of silently defaulting.
 */
export function loadConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    prefix: string = 'PORTFOLIO'
): RAGConfigOverrides {
    const read = (key: string): string | undefined => {
        const value = env[`${prefix}_${key}`];
        return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
    };

    const overrides: RAGConfigOverrides = {};

    const apiKey = read('OPENAI_API_KEY') ?? env['OPENAI_API_KEY']?.trim();
    if (apiKey) overrides.apiKey = apiKey;

    const baseUrl = read('OPENAI_BASE_URL');
    if (baseUrl) overrides.baseUrl = baseUrl;

    const embeddingModel = read('EMBEDDING_MODEL');
    if (embeddingModel) overrides.embeddingModel = embeddingModel;

    const chatModel = read('CHAT_MODEL');
    if (chatModel) overrides.chatModel = chatModel;

    const dataDir = read('DATA_DIR');
    if (dataDir) overrides.dataDir = dataDir;

    const tokenizer = read('TOKENIZER');
    if (tokenizer !== undefined) {
        if (tokenizer !== 'tiktoken' && tokenizer !== 'simple') {
            throw new ConfigurationError(`${prefix}_TOKENIZER must be "tiktoken" or "simple"`);
        }
        overrides.tokenizer = tokenizer;
    }

    const threshold = readNumber(read, prefix, 'SIMILARITY_THRESHOLD');
    if (threshold !== undefined) overrides.similarityThreshold = threshold;

    const maxChunks = readNumber(read, prefix, 'MAX_CHUNKS');
    if (maxChunks !== undefined) overrides.maxChunks = maxChunks;

    const timeout = readNumber(read, prefix, 'QUERY_TIMEOUT_MS');
    if (timeout !== undefined) overrides.queryTimeoutMs = timeout;

    if (read('QUIET') === 'true') overrides.quiet = true;

    return overrides;
}

function readNumber(
    read: (key: string) => string | undefined,
    prefix: string,
    key: string
): number | undefined {
    const raw = read(key);
    if (raw === undefined) return undefined;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${prefix}_${key} must be a number, got "${raw}"`);
    }
    return value;
}
