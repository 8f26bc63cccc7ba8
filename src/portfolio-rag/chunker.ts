/**
 * Text Chunker
 *
 * Splits content into overlapping, token-bounded segments for embedding.
 */

import { createHash } from 'crypto';
import type { RAGConfig } from './config';
import { alignToBoundary, createTokenizer, type Tokenizer } from './tokenizer';

// =============================================================================
// Types
// =============================================================================

export interface TextChunkDraft {
    content: string;
    tokenCount: number;
    chunkIndex: number;
}

export type ChunkerConfig = Pick<RAGConfig, 'chunkSize' | 'chunkOverlap'>;

// =============================================================================
// Main Chunker Class
// =============================================================================

export class TextChunker {
    private config: ChunkerConfig;
    private tokenizer: Tokenizer;

    constructor(config?: Partial<ChunkerConfig>, tokenizer?: Tokenizer) {
        this.config = {
            chunkSize: config?.chunkSize ?? 500,
            chunkOverlap: config?.chunkOverlap ?? 50,
        };

        if (!Number.isInteger(this.config.chunkSize) || this.config.chunkSize <= 0) {
            throw new RangeError('chunkSize must be a positive integer');
        }
        if (this.config.chunkOverlap < 0 || this.config.chunkOverlap >= this.config.chunkSize) {
            throw new RangeError('chunkOverlap must be in [0, chunkSize)');
        }

        this.tokenizer = tokenizer ?? createTokenizer();
    }

    /**
     * Split text into chunk strings
     */
    chunk(text: string): string[] {
        return this.chunkWithTokens(text).map(draft => draft.content);
    }

    /**
     * Split text into chunks, keeping each chunk's token count and position
     */
    chunkWithTokens(text: string): TextChunkDraft[] {
        const normalized = normalizeWhitespace(text);
        if (normalized.length === 0) {
            return [];
        }

        const tokens = this.tokenizer.encode(normalized);
        const { chunkSize, chunkOverlap } = this.config;

        if (tokens.length <= chunkSize) {
            return [{ content: normalized, tokenCount: tokens.length, chunkIndex: 0 }];
        }

        const drafts: TextChunkDraft[] = [];
        let previous: [number, number] = [-1, -1];

        for (const [nominalStart, nominalEnd] of this.windowBounds(tokens.length)) {
            const [start, end] = this.alignWindow(tokens, nominalStart, nominalEnd);
            if (start === previous[0] && end === previous[1]) continue;
            previous = [start, end];

            const window = tokens.slice(start, end);

            // Windows after the first begin with the separator before their first word
            const content = this.tokenizer.decode(window).trim();
            if (content.length > 0) {
                drafts.push({ content, tokenCount: window.length, chunkIndex: drafts.length });
            }
        }

        return drafts;
    }

    /**
     * Token windows as (start, end) offsets, for inspection and tests
     */
    windowBounds(totalTokens: number): Array<[number, number]> {
        const { chunkSize, chunkOverlap } = this.config;
        if (totalTokens <= chunkSize) {
            return totalTokens === 0 ? [] : [[0, totalTokens]];
        }

        const bounds: Array<[number, number]> = [];
        for (let start = 0; start < totalTokens; start += chunkSize - chunkOverlap) {
            bounds.push([start, Math.min(start + chunkSize, totalTokens)]);
        }
        return bounds;
    }

    /**
     * Pull both edges back so no multi-byte character is split. A window
     * that would end up empty is widened to the next boundary instead.
     */
    private alignWindow(tokens: readonly number[], start: number, end: number): [number, number] {
        const alignedStart = alignToBoundary(this.tokenizer, tokens, start);
        let alignedEnd = alignToBoundary(this.tokenizer, tokens, end);

        if (alignedEnd <= alignedStart) {
            alignedEnd = end;
            while (alignedEnd < tokens.length && !this.tokenizer.isBoundary(tokens, alignedEnd)) {
                alignedEnd++;
            }
        }
        return [alignedStart, alignedEnd];
    }

    getTokenizer(): Tokenizer {
        return this.tokenizer;
    }

    getConfig(): ChunkerConfig {
        return { ...this.config };
    }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Collapse every whitespace run to one space and trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * SHA-256 of the whitespace-normalized text
 */
export function generateContentHash(text: string): string {
    return createHash('sha256').update(normalizeWhitespace(text), 'utf8').digest('hex');
}

/**
 * Rough token estimate used for the context budget: words × 1.3
 */
export function estimateTokenCount(text: string): number {
    const words = text.split(/\s+/).filter(Boolean).length;
    return words * 1.3;
}
