/**
 * Embedding Provider
 *
 * Client for an OpenAI-compatible `/embeddings` endpoint, fronted by the
 * two-tier VectorCache. A cache hit never touches the network.
 */

import { z } from 'zod';
import { RequestDeadline } from './cancellation';
import { normalizeWhitespace } from './chunker';
import type { RAGConfig } from './config';
import {
    ConfigurationError,
    EmptyInputError,
    UpstreamError,
    err,
    errorMessage,
    ok,
    toRagError,
    type RagError,
    type Result,
} from './errors';
import { createLogger, type Logger } from './logger';
import { withRetry } from './retry';
import { alignToBoundary, type Tokenizer } from './tokenizer';
import { hashText, type CacheLookup, type VectorCache } from './vector-cache';

// =============================================================================
// Types
// =============================================================================

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type EmbeddingConfig = Pick<
    RAGConfig,
    'apiKey' | 'baseUrl' | 'embeddingModel' | 'maxInputTokens' | 'embeddingTimeoutMs' | 'retry' | 'quiet'
>;

export interface EmbeddingProviderDeps {
    cache: VectorCache;
    tokenizer: Tokenizer;
    fetch?: FetchLike;
    logger?: Logger;
}

const EmbeddingResponseSchema = z.object({
    data: z.array(z.object({ embedding: z.array(z.number()).min(1) })).min(1),
});

// =============================================================================
// Embedding Provider
// =============================================================================

export class EmbeddingProvider {
    private cache: VectorCache;
    private tokenizer: Tokenizer;
    private fetchImpl: FetchLike;
    private logger: Logger;
    private requestCount = 0;

    constructor(private config: EmbeddingConfig, deps: EmbeddingProviderDeps) {
        this.cache = deps.cache;
        this.tokenizer = deps.tokenizer;
        this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
        this.logger = deps.logger ?? createLogger('Embeddings', { quiet: config.quiet });
    }

    /**
     * Embedding vector for `text`, from cache when possible
     */
    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        if (!this.config.apiKey) {
            throw new ConfigurationError('Embedding API key is not configured');
        }

        const textHash = hashText(text);
        const cached = await this.lookupCached(textHash);
        if (cached.status === 'hit') {
            return cached.entry.embeddingVector;
        }
        if (cached.status === 'expired') {
            this.logger.debug(`Cache entry ${textHash.slice(0, 12)} expired, re-embedding`);
        }

        const { text: input, tokenCount } = this.prepareInput(text);
        if (input.length === 0) {
            throw new EmptyInputError('Cannot embed empty text');
        }

        const vector = await withRetry(
            () => this.request(input, signal),
            this.config.retry,
            {
                signal,
                onRetry: (error, attempt, delayMs) =>
                    this.logger.warn(`Retry ${attempt} in ${delayMs}ms: ${error.message}`),
            }
        );

        await this.storeCached(textHash, { text: input, vector, tokenCount });

        return vector;
    }

    /**
     * `embed` that reports failure instead of throwing
     */
    async tryEmbed(text: string, signal?: AbortSignal): Promise<Result<number[], RagError>> {
        try {
            return ok(await this.embed(text, signal));
        } catch (error) {
            return err(toRagError(error, 'embeddings'));
        }
    }

    /**
     * Embed several texts in order. Failed items come back as empty vectors.
     */
    async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
        const vectors: number[][] = [];

        for (const [index, text] of texts.entries()) {
            const result = await this.tryEmbed(text, signal);
            if (result.ok) {
                vectors.push(result.value);
            } else {
                this.logger.warn(`Item ${index} failed: ${result.error.code}`);
                vectors.push([]);
            }
        }

        return vectors;
    }

    getModel(): string {
        return this.config.embeddingModel;
    }

    /** Number of HTTP requests sent so far */
    getRequestCount(): number {
        return this.requestCount;
    }

    // =========================================================================
    // Internals
    // =========================================================================

    /**
     * Cache lookup where a storage failure counts as a miss
     */
    private async lookupCached(textHash: string): Promise<CacheLookup> {
        try {
            return await this.cache.lookup(textHash, this.config.embeddingModel);
        } catch (error) {
            this.logger.warn(`Cache read failed, embedding without cache: ${errorMessage(error)}`);
            return { status: 'miss' };
        }
    }

    /**
     * Cache write that only logs a storage failure
     */
    private async storeCached(
        textHash: string,
        data: { text: string; vector: number[]; tokenCount: number }
    ): Promise<void> {
        try {
            await this.cache.put(textHash, { ...data, modelName: this.config.embeddingModel });
        } catch (error) {
            this.logger.warn(`Cache write failed for ${textHash.slice(0, 12)}: ${errorMessage(error)}`);
        }
    }

    /**
     * Collapse whitespace and truncate to the model's input window
     */
    private prepareInput(text: string): { text: string; tokenCount: number } {
        const normalized = normalizeWhitespace(text);
        if (normalized.length === 0) {
            return { text: '', tokenCount: 0 };
        }

        const tokens = this.tokenizer.encode(normalized);
        if (tokens.length <= this.config.maxInputTokens) {
            return { text: normalized, tokenCount: tokens.length };
        }

        const truncated = tokens.slice(0, alignToBoundary(this.tokenizer, tokens, this.config.maxInputTokens));
        this.logger.debug(`Truncated input from ${tokens.length} to ${truncated.length} tokens`);
        return { text: this.tokenizer.decode(truncated).trim(), tokenCount: truncated.length };
    }

    private async request(input: string, signal?: AbortSignal): Promise<number[]> {
        const deadline = new RequestDeadline(this.config.embeddingTimeoutMs, signal);
        this.requestCount++;

        try {
            let response: Response;
            try {
                response = await this.fetchImpl(`${this.config.baseUrl}/embeddings`, {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                        'Authorization': `Bearer ${this.config.apiKey}`,
                    },
                    body: JSON.stringify({ model: this.config.embeddingModel, input }),
                    signal: deadline.signal,
                });
            } catch (error) {
                throw this.transportError(error, deadline);
            }

            if (!response.ok) {
                throw new UpstreamError(
                    `Embedding request failed with status ${response.status}`,
                    'embeddings',
                    response.status
                );
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (error) {
                if (deadline.signal.aborted) throw this.transportError(error, deadline);
                throw new UpstreamError('Embedding response was not valid JSON', 'embeddings', response.status, {
                    cause: error,
                    retryable: false,
                });
            }

            const parsed = EmbeddingResponseSchema.safeParse(body);
            if (!parsed.success) {
                throw new UpstreamError('Embedding response was malformed', 'embeddings', response.status, {
                    retryable: false,
                });
            }

            return parsed.data.data[0].embedding;
        } finally {
            deadline.dispose();
        }
    }

    private transportError(error: unknown, deadline: RequestDeadline): UpstreamError {
        if (deadline.timedOut) {
            return new UpstreamError(
                `Embedding request timed out after ${deadline.timeoutMs}ms`,
                'embeddings',
                undefined,
                { cause: error }
            );
        }
        if (deadline.cancelled) {
            return new UpstreamError('Embedding request was cancelled', 'embeddings', undefined, {
                cause: error,
                retryable: false,
            });
        }
        return new UpstreamError('Embedding request failed', 'embeddings', undefined, { cause: error });
    }
}
