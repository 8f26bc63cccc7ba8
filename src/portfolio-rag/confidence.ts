/**
 * Confidence Scorer
 *
 * A heuristic, not a calibrated probability:
 *   0.5
 *   + min(chunks / maxChunks, 1) × 0.3
 *   + min(answer length / 200, 1) × 0.2
 *   + min(tokens / 300, 1) × 0.2
 *   − 0.1 when the answer hedges
 * clamped to [0, 1] and rounded to 2 decimals.
 */

export const UNCERTAINTY_PHRASES = [
    'not sure',
    'unclear',
    "don't know",
    'insufficient',
    'limited information',
] as const;

export const CONFIDENCE_WEIGHTS = {
    base: 0.5,
    chunks: 0.3,
    length: 0.2,
    tokens: 0.2,
    uncertaintyPenalty: 0.1,
    lengthScale: 200,
    tokenScale: 300,
} as const;

export function hasUncertainty(answer: string): boolean {
    const lower = answer.toLowerCase();
    return UNCERTAINTY_PHRASES.some(phrase => lower.includes(phrase));
}

export function scoreConfidence(
    answer: string,
    tokensUsed: number,
    chunkCount: number,
    maxChunks: number
): number {
    const w = CONFIDENCE_WEIGHTS;

    const chunkSignal = maxChunks > 0 ? Math.min(chunkCount / maxChunks, 1) * w.chunks : 0;
    const lengthSignal = Math.min(answer.length / w.lengthScale, 1) * w.length;
    const tokenSignal = Math.min(Math.max(tokensUsed, 0) / w.tokenScale, 1) * w.tokens;
    const penalty = hasUncertainty(answer) ? w.uncertaintyPenalty : 0;

    const raw = w.base + chunkSignal + lengthSignal + tokenSignal - penalty;
    const clamped = Math.max(0, Math.min(1, raw));

    return Math.round(clamped * 100) / 100;
}

export class ConfidenceScorer {
    constructor(private maxChunks: number) {}

    score(answer: string, tokensUsed: number, chunkCount: number, maxChunks: number = this.maxChunks): number {
        return scoreConfidence(answer, tokensUsed, chunkCount, maxChunks);
    }
}
