/**
 * RAG Error Taxonomy
 *
 * Every failure the pipeline can report is one of these. `retryable` tells
 * callers whether trying again later can help.
 */

// ============================================================================
// Error Classes
// ============================================================================

export type RagErrorCode =
    | 'CONFIGURATION'
    | 'EMPTY_INPUT'
    | 'INVALID_METADATA'
    | 'UPSTREAM'
    | 'EMBEDDING_UNAVAILABLE'
    | 'QUERY_TIMEOUT';

export abstract class RagError extends Error {
    abstract readonly code: RagErrorCode;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message);
        this.name = new.target.name;
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/** Missing or invalid credentials/settings. Fatal until fixed. */
export class ConfigurationError extends RagError {
    readonly code = 'CONFIGURATION';
    readonly retryable = false;
}

/** Input was empty after cleaning. Caller error. */
export class EmptyInputError extends RagError {
    readonly code = 'EMPTY_INPUT';
    readonly retryable = false;
}

/** Chunk metadata failed validation at the ingestion boundary. */
export class MetadataValidationError extends RagError {
    readonly code = 'INVALID_METADATA';
    readonly retryable = false;

    constructor(
        message: string,
        readonly issues: string[] = []
    ) {
        super(message);
    }
}

/** External API returned a non-success status, timed out, or sent garbage. */
export class UpstreamError extends RagError {
    readonly code = 'UPSTREAM';
    readonly retryable: boolean;

    constructor(
        message: string,
        readonly service: 'embeddings' | 'generation',
        readonly statusCode?: number,
        options?: { cause?: unknown; retryable?: boolean }
    ) {
        super(message, options);
        this.retryable = options?.retryable ?? isRetryableStatus(statusCode);
    }
}

/** The query could not be embedded, so nothing can be retrieved. */
export class EmbeddingUnavailableError extends RagError {
    readonly code = 'EMBEDDING_UNAVAILABLE';
    readonly retryable = true;
}

/** The query did not finish within its time budget. */
export class QueryTimeoutError extends RagError {
    readonly code = 'QUERY_TIMEOUT';
    readonly retryable = true;

    constructor(readonly timeoutMs: number) {
        super(`Query exceeded ${timeoutMs}ms`);
    }
}

// ============================================================================
// Result
// ============================================================================

export type Result<T, E = RagError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/**
 * Turn anything thrown into a RagError. Unknown failures become
 * non-retryable upstream errors so callers still get one type.
 */
export function toRagError(error: unknown, service: 'embeddings' | 'generation' = 'embeddings'): RagError {
    if (error instanceof RagError) return error;
    return new UpstreamError(errorMessage(error), service, undefined, { cause: error, retryable: false });
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isRetryableStatus(statusCode: number | undefined): boolean {
    if (statusCode === undefined) return true; // network failure / timeout
    return statusCode === 429 || statusCode >= 500;
}
