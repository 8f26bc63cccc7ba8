/**
 * Retry with exponential backoff for retryable RagErrors
 */

import type { RetryConfig } from './config';
import { RagError } from './errors';

export interface RetryOptions {
    signal?: AbortSignal;

    /** Called before each wait; attempt is 1-based */
    onRetry?: (error: RagError, attempt: number, delayMs: number) => void;
}

/**
 * Delay before retry `attempt` (1-based): initialDelay * multiplier^(attempt - 1), capped
 */
export function calculateDelay(config: RetryConfig, attempt: number): number {
    const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
    return Math.floor(Math.min(delay, config.maxDelayMs));
}

/**
 * Run `fn`, retrying while it throws a retryable RagError.
 * Non-RagErrors and non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    config: RetryConfig,
    options: RetryOptions = {}
): Promise<T> {
    let attempt = 0;

    while (true) {
        try {
            return await fn();
        } catch (error) {
            if (!(error instanceof RagError) || !error.retryable) throw error;
            if (attempt >= config.maxRetries || options.signal?.aborted) throw error;

            attempt++;
            const delay = calculateDelay(config, attempt);
            options.onRetry?.(error, attempt, delay);
            await sleep(delay, options.signal);
        }
    }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve();

    return new Promise(resolve => {
        const timer = setTimeout(done, ms);
        function done() {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
        signal?.addEventListener('abort', done, { once: true });
    });
}
