/**
 * Record IDs
 *
 * `<prefix><timestamp>_<random>`: sortable by creation time, URL-safe.
 */

import { customAlphabet } from 'nanoid';

// ============================================================================
// Constants
// ============================================================================

const RANDOM_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

export const ID_PREFIXES = {
    chunk: 'chunk_',
    job: 'job_',
    query: 'query_',
} as const;

export type IdKind = keyof typeof ID_PREFIXES;

// ============================================================================
// Generation
// ============================================================================

export function generateId(kind: IdKind, now: number = Date.now()): string {
    return `${ID_PREFIXES[kind]}${now}_${nanoid()}`;
}

/**
 * Validate an ID of the given kind
 */
export function isValidId(kind: IdKind, id: string): boolean {
    const prefix = ID_PREFIXES[kind];
    if (!id.startsWith(prefix)) return false;

    const parts = id.slice(prefix.length).split('_');
    if (parts.length !== 2) return false;

    const [timestamp, random] = parts;
    if (!/^\d+$/.test(timestamp) || Number(timestamp) <= 0) return false;
    if (random.length !== RANDOM_LENGTH) return false;

    for (const char of random) {
        if (!ALPHABET.includes(char)) return false;
    }
    return true;
}
