/**
 * Query Cache
 * Full query responses keyed by normalized question and filters.
 */

import { createHash } from 'crypto';
import { TTLCache } from './ttl-cache';
import type { QueryResponse, SourceType } from './types';

export interface QueryCacheStats {
    size: number;
    hits: number;
    misses: number;
}

export class QueryCache {
    private cache: TTLCache<QueryResponse>;

    constructor(
        private defaultTtlMs: number = 60 * 60 * 1000,
        now: () => number = Date.now
    ) {
        this.cache = new TTLCache<QueryResponse>(defaultTtlMs, 10_000, now);
    }

    /**
     * SHA-256 of the JSON tuple `[question, contextType, sourceId]`, question
     * lowercased and trimmed, absent filters as null
     */
    static keyFor(question: string, contextType?: SourceType | null, sourceId?: string | null): string {
        const raw = JSON.stringify([question.trim().toLowerCase(), contextType ?? null, sourceId ?? null]);
        return createHash('sha256').update(raw, 'utf8').digest('hex');
    }

    keyFor(question: string, contextType?: SourceType | null, sourceId?: string | null): string {
        return QueryCache.keyFor(question, contextType, sourceId);
    }

    get(key: string): QueryResponse | null {
        return this.cache.get(key);
    }

    put(key: string, response: QueryResponse, ttlMs: number = this.defaultTtlMs): void {
        this.cache.set(key, response, ttlMs);
    }

    /** Returns the number of live entries dropped */
    clear(): number {
        return this.cache.clear();
    }

    sweepExpired(): number {
        return this.cache.cleanup();
    }

    getStats(): QueryCacheStats {
        const { size, hits, misses } = this.cache.getStats();
        return { size, hits, misses };
    }
}
