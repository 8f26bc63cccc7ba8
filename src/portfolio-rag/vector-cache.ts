/**
 * Vector Cache
 *
 * Two tiers keyed by text hash:
 * - fast: in-memory, short TTL (default 7 days)
 * - durable: JSON file under the data directory, optional expiry
 *
 * A durable hit is promoted into the fast tier. Expired durable entries are
 * reported as `expired` (not `miss`) and stay on disk until swept.
 */

import * as path from 'path';
import { z } from 'zod';
import { JSONFile, WriteQueue, type FileSystem } from '../storage';
import { generateContentHash } from './chunker';
import type { RAGConfig } from './config';
import { TTLCache } from './ttl-cache';
import { EmbeddingCacheEntrySchema, type EmbeddingCacheEntry } from './types';

// =============================================================================
// Types
// =============================================================================

export type CacheLookup =
    | { status: 'hit'; tier: 'fast' | 'durable'; entry: EmbeddingCacheEntry }
    | { status: 'expired'; entry: EmbeddingCacheEntry }
    | { status: 'miss' };

export interface VectorCacheStats {
    fastEntries: number;
    durableEntries: number;
    expiredDurableEntries: number;
    hits: number;
    misses: number;
}

export type VectorCacheConfig = Pick<RAGConfig, 'dataDir' | 'embeddingCacheTtlMs' | 'durableEmbeddingTtlMs'>;

const PREVIEW_LENGTH = 1000;
const CACHE_FILENAME = 'embedding-cache.json';

const DurableCacheSchema = z.record(EmbeddingCacheEntrySchema);

// =============================================================================
// Helpers
// =============================================================================

export function isExpired(entry: EmbeddingCacheEntry, now: number = Date.now()): boolean {
    return entry.expiresAt !== undefined && Date.parse(entry.expiresAt) <= now;
}

/**
 * Cache key for a text: SHA-256 of its whitespace-normalized form
 */
export function hashText(text: string): string {
    return generateContentHash(text);
}

// =============================================================================
// Vector Cache
// =============================================================================

export class VectorCache {
    private fast: TTLCache<EmbeddingCacheEntry>;
    private file: JSONFile<Record<string, EmbeddingCacheEntry>>;
    private durable: Map<string, EmbeddingCacheEntry> | null = null;
    private loading: Promise<Map<string, EmbeddingCacheEntry>> | null = null;
    private writes = new WriteQueue();
    private hits = 0;
    private misses = 0;

    constructor(
        fs: FileSystem,
        private config: VectorCacheConfig,
        private now: () => number = Date.now
    ) {
        this.fast = new TTLCache<EmbeddingCacheEntry>(config.embeddingCacheTtlMs, 10_000, now);
        this.file = new JSONFile(fs, path.join(config.dataDir, CACHE_FILENAME), DurableCacheSchema, () => ({}));
    }

    /**
     * Look a hash up in both tiers. Entries made by another model are misses.
     */
    async lookup(textHash: string, modelName?: string): Promise<CacheLookup> {
        const matchesModel = (entry: EmbeddingCacheEntry) =>
            modelName === undefined || entry.modelName === modelName;

        const fastEntry = this.fast.get(textHash);
        if (fastEntry && matchesModel(fastEntry) && !isExpired(fastEntry, this.now())) {
            this.hits++;
            return { status: 'hit', tier: 'fast', entry: fastEntry };
        }

        const durable = await this.loadDurable();
        const entry = durable.get(textHash);

        if (!entry || !matchesModel(entry)) {
            this.misses++;
            return { status: 'miss' };
        }

        if (isExpired(entry, this.now())) {
            this.fast.delete(textHash);
            this.misses++;
            return { status: 'expired', entry };
        }

        this.fast.set(textHash, entry);
        this.hits++;
        return { status: 'hit', tier: 'durable', entry };
    }

    /**
     * Vector for a hash, or null on miss/expiry
     */
    async get(textHash: string, modelName?: string): Promise<number[] | null> {
        const result = await this.lookup(textHash, modelName);
        return result.status === 'hit' ? result.entry.embeddingVector : null;
    }

    /**
     * Store a vector in both tiers. Last write wins.
     */
    async put(
        textHash: string,
        data: { text: string; vector: number[]; modelName: string; tokenCount: number }
    ): Promise<EmbeddingCacheEntry> {
        const createdAt = this.now();
        const entry: EmbeddingCacheEntry = {
            textHash,
            textContentPreview: data.text.slice(0, PREVIEW_LENGTH),
            embeddingVector: data.vector,
            modelName: data.modelName,
            tokenCount: data.tokenCount,
            createdAt: new Date(createdAt).toISOString(),
        };
        if (this.config.durableEmbeddingTtlMs !== null) {
            entry.expiresAt = new Date(createdAt + this.config.durableEmbeddingTtlMs).toISOString();
        }

        this.fast.set(textHash, entry);

        await this.writes.run(async () => {
            const durable = await this.loadDurable();
            durable.set(textHash, entry);
            await this.persist(durable);
        });

        return entry;
    }

    /**
     * Delete expired durable entries; returns how many were removed
     */
    async sweepExpired(): Promise<number> {
        this.fast.cleanup();

        return this.writes.run(async () => {
            const durable = await this.loadDurable();
            const now = this.now();
            let removed = 0;

            for (const [hash, entry] of durable) {
                if (isExpired(entry, now)) {
                    durable.delete(hash);
                    this.fast.delete(hash);
                    removed++;
                }
            }

            if (removed > 0) {
                await this.persist(durable);
            }
            return removed;
        });
    }

    /**
     * Empty both tiers; returns the number of distinct hashes removed
     */
    async clear(): Promise<number> {
        return this.writes.run(async () => {
            const durable = await this.loadDurable();
            const hashes = new Set<string>([...durable.keys(), ...this.fast.keys()]);

            this.fast.clear();
            durable.clear();
            await this.file.delete();

            return hashes.size;
        });
    }

    async getStats(): Promise<VectorCacheStats> {
        const durable = await this.loadDurable();
        const now = this.now();
        let expired = 0;
        for (const entry of durable.values()) {
            if (isExpired(entry, now)) expired++;
        }

        return {
            fastEntries: this.fast.getStats().size,
            durableEntries: durable.size,
            expiredDurableEntries: expired,
            hits: this.hits,
            misses: this.misses,
        };
    }

    /** Drop the fast tier only, e.g. to force a durable read */
    clearFastTier(): void {
        this.fast.clear();
    }

    // =========================================================================
    // Persistence
    // =========================================================================

    private async loadDurable(): Promise<Map<string, EmbeddingCacheEntry>> {
        if (this.durable) return this.durable;

        if (!this.loading) {
            this.loading = this.file.read().then(record => {
                this.durable = new Map(Object.entries(record));
                return this.durable;
            });
            this.loading.catch(() => {
                this.loading = null;
            });
        }
        return this.loading;
    }

    private async persist(durable: Map<string, EmbeddingCacheEntry>): Promise<void> {
        await this.file.write(Object.fromEntries(durable));
    }
}
