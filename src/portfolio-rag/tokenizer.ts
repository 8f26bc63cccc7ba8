/**
 * Tokenizers
 *
 * Two interchangeable implementations with reversible token boundaries:
 * - tiktoken: the BPE encoding the embedding/generation models use
 * - simple: whitespace-anchored word pieces, no native dependency
 */

import { get_encoding, type Tiktoken, type TiktokenEncoding } from 'tiktoken';
import { TextDecoder } from 'util';

// ============================================================================
// Interface
// ============================================================================

export interface Tokenizer {
    readonly name: string;

    /** decode(encode(x)) === x */
    encode(text: string): number[];
    decode(tokens: readonly number[]): string;
    count(text: string): number;

    /** True when splitting `tokens` before `index` does not cut a character in two */
    isBoundary(tokens: readonly number[], index: number): boolean;
}

export type TokenizerMode = 'tiktoken' | 'simple';

export interface TokenizerOptions {
    mode?: TokenizerMode;
    encoding?: TiktokenEncoding;
}

// ============================================================================
// Tiktoken
// ============================================================================

const encoders = new Map<TiktokenEncoding, Tiktoken>();

function getEncoder(encoding: TiktokenEncoding): Tiktoken {
    let encoder = encoders.get(encoding);
    if (!encoder) {
        encoder = get_encoding(encoding);
        encoders.set(encoding, encoder);
    }
    return encoder;
}

export class TiktokenTokenizer implements Tokenizer {
    readonly name: string;
    private encoder: Tiktoken;
    private textDecoder = new TextDecoder();

    constructor(encoding: TiktokenEncoding = 'cl100k_base') {
        this.name = `tiktoken:${encoding}`;
        this.encoder = getEncoder(encoding);
    }

    encode(text: string): number[] {
        // Special-token markers in user text are encoded as plain text
        return Array.from(this.encoder.encode(text, [], []));
    }

    decode(tokens: readonly number[]): string {
        return this.textDecoder.decode(this.encoder.decode(Uint32Array.from(tokens)));
    }

    count(text: string): number {
        return this.encoder.encode(text, [], []).length;
    }

    isBoundary(tokens: readonly number[], index: number): boolean {
        if (index <= 0 || index >= tokens.length) return true;
        // BPE tokens are byte sequences; a UTF-8 continuation byte means the
        // previous token ends mid-character
        const bytes = this.encoder.decode_single_token_bytes(tokens[index]);
        return bytes.length === 0 || (bytes[0] & 0xc0) !== 0x80;
    }
}

// ============================================================================
// Simple (word pieces)
// ============================================================================

/** A run of whitespace with the word after it, or trailing whitespace */
const PIECE_PATTERN = /\s*\S+|\s+/g;

/**
 * Each token is a word together with the whitespace before it. Ids are
 * assigned from a vocabulary that grows as new pieces are seen.
 */
export class SimpleTokenizer implements Tokenizer {
    readonly name = 'simple';
    private pieces: string[] = [];
    private ids = new Map<string, number>();

    encode(text: string): number[] {
        const matches = text.match(PIECE_PATTERN) ?? [];
        return matches.map(piece => this.idFor(piece));
    }

    decode(tokens: readonly number[]): string {
        return tokens.map(id => {
            const piece = this.pieces[id];
            if (piece === undefined) {
                throw new RangeError(`Unknown token id ${id}`);
            }
            return piece;
        }).join('');
    }

    count(text: string): number {
        return (text.match(PIECE_PATTERN) ?? []).length;
    }

    isBoundary(): boolean {
        return true;
    }

    get vocabularySize(): number {
        return this.pieces.length;
    }

    private idFor(piece: string): number {
        let id = this.ids.get(piece);
        if (id === undefined) {
            id = this.pieces.length;
            this.pieces.push(piece);
            this.ids.set(piece, id);
        }
        return id;
    }
}

// ============================================================================
// Boundaries
// ============================================================================

/**
 * Nearest index at or before `index` where the tokens can be split
 */
export function alignToBoundary(tokenizer: Tokenizer, tokens: readonly number[], index: number): number {
    let aligned = Math.min(Math.max(index, 0), tokens.length);
    while (aligned > 0 && !tokenizer.isBoundary(tokens, aligned)) {
        aligned--;
    }
    return aligned;
}

// ============================================================================
// Factory
// ============================================================================

export function createTokenizer(options: TokenizerOptions = {}): Tokenizer {
    if (options.mode === 'simple') {
        return new SimpleTokenizer();
    }
    return new TiktokenTokenizer(options.encoding);
}
