/**
 * Query Log
 * Append-only record of answered queries in `<dataDir>/queries.jsonl`.
 */

import * as path from 'path';
import { JSONLFile, type FileSystem } from '../storage';
import { generateId } from './ids';
import { QueryLogEntrySchema, type QueryLogEntry } from './types';

export interface QueryLogStats {
    totalQueries: number;
    averageProcessingTimeSeconds: number;
    averageConfidence: number;
    averageTokensUsed: number;
    lastQueryAt: string | null;
}

export class QueryLog {
    private file: JSONLFile<QueryLogEntry>;

    constructor(
        fs: FileSystem,
        dataDir: string,
        private now: () => number = Date.now
    ) {
        this.file = new JSONLFile(fs, path.join(dataDir, 'queries.jsonl'), QueryLogEntrySchema);
    }

    async append(entry: Omit<QueryLogEntry, 'id' | 'createdAt'>): Promise<QueryLogEntry> {
        const timestamp = this.now();
        const full: QueryLogEntry = {
            id: generateId('query', timestamp),
            ...entry,
            createdAt: new Date(timestamp).toISOString(),
        };

        await this.file.append(full);
        return full;
    }

    async readAll(): Promise<QueryLogEntry[]> {
        return this.file.readAll();
    }

    /**
     * Most recent entries, newest first
     */
    async recent(limit: number = 10): Promise<QueryLogEntry[]> {
        const entries = await this.file.readAll();
        return entries.slice(-limit).reverse();
    }

    async getStats(): Promise<QueryLogStats> {
        const entries = await this.file.readAll();
        if (entries.length === 0) {
            return {
                totalQueries: 0,
                averageProcessingTimeSeconds: 0,
                averageConfidence: 0,
                averageTokensUsed: 0,
                lastQueryAt: null,
            };
        }

        const average = (pick: (entry: QueryLogEntry) => number) =>
            round2(entries.reduce((sum, entry) => sum + pick(entry), 0) / entries.length);

        return {
            totalQueries: entries.length,
            averageProcessingTimeSeconds: average(entry => entry.processingTimeSeconds),
            averageConfidence: average(entry => entry.confidenceScore),
            averageTokensUsed: average(entry => entry.tokensUsed),
            lastQueryAt: entries[entries.length - 1].createdAt,
        };
    }
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}
