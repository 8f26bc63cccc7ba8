/**
 * In-memory TTL cache
 *
 * Backs the fast embedding tier and the query-result cache.
 */

// ============================================================================
// Types
// ============================================================================

export interface CacheEntry<T> {
    value: T;
    cachedAt: number;
    ttl: number;
}

export interface CacheStats {
    size: number;
    hits: number;
    misses: number;
    evictions: number;
}

// ============================================================================
// Cache
// ============================================================================

export class TTLCache<T> {
    private entries: Map<string, CacheEntry<T>> = new Map();
    private hits = 0;
    private misses = 0;
    private evictions = 0;

    constructor(
        private readonly defaultTTL: number,
        private readonly maxEntries: number = 10_000,
        private readonly now: () => number = Date.now
    ) {}

    get(key: string): T | null {
        const entry = this.entries.get(key);

        if (!entry) {
            this.misses++;
            return null;
        }

        if (this.isExpired(entry)) {
            this.entries.delete(key);
            this.evictions++;
            this.misses++;
            return null;
        }

        // Re-insert so iteration order tracks recency
        this.entries.delete(key);
        this.entries.set(key, entry);

        this.hits++;
        return entry.value;
    }

    set(key: string, value: T, ttl?: number): void {
        this.entries.delete(key);

        while (this.entries.size >= this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
            this.evictions++;
        }

        this.entries.set(key, {
            value,
            cachedAt: this.now(),
            ttl: ttl ?? this.defaultTTL,
        });
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    /**
     * Remove everything; returns how many entries were live
     */
    clear(): number {
        let live = 0;
        for (const entry of this.entries.values()) {
            if (!this.isExpired(entry)) live++;
        }
        this.entries.clear();
        return live;
    }

    /**
     * Drop expired entries; returns how many were dropped
     */
    cleanup(): number {
        let cleaned = 0;

        for (const [key, entry] of this.entries.entries()) {
            if (this.isExpired(entry)) {
                this.entries.delete(key);
                this.evictions++;
                cleaned++;
            }
        }

        return cleaned;
    }

    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    getStats(): CacheStats {
        return {
            size: this.entries.size,
            hits: this.hits,
            misses: this.misses,
            evictions: this.evictions,
        };
    }

    private isExpired(entry: CacheEntry<T>): boolean {
        return this.now() - entry.cachedAt >= entry.ttl;
    }
}
