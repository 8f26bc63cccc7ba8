/**
 * Vector Operations
 */

export function dotProduct(a: readonly number[], b: readonly number[]): number {
    let result = 0;
    for (let i = 0; i < a.length; i++) result += a[i] * b[i];
    return result;
}

export function norm(v: readonly number[]): number {
    let sum = 0;
    for (const x of v) sum += x * x;
    return Math.sqrt(sum);
}

/**
 * Cosine similarity in [-1, 1]. Zero vectors and mismatched
 * dimensions score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length || a.length === 0) return 0;

    const normA = norm(a);
    const normB = norm(b);
    if (normA === 0 || normB === 0) return 0;

    return clampUnit(dotProduct(a, b) / (normA * normB));
}

/**
 * Cosine similarity of one query against many candidates.
 *
 * The query norm is computed once. Candidates whose dimension differs from
 * the query are left out of the result (stale embeddings from another
 * model), so the returned `index` refers back into `candidates`.
 */
export function batchCosineSimilarity(
    query: readonly number[],
    candidates: ReadonlyArray<readonly number[]>
): Array<{ index: number; score: number }> {
    const results: Array<{ index: number; score: number }> = [];
    if (query.length === 0) return results;

    const queryNorm = norm(query);

    for (let index = 0; index < candidates.length; index++) {
        const candidate = candidates[index];
        if (candidate.length !== query.length) continue;

        const denominator = queryNorm * norm(candidate);
        const score = denominator > 0 ? clampUnit(dotProduct(query, candidate) / denominator) : 0;
        results.push({ index, score });
    }

    return results;
}

export function normalize(v: readonly number[]): number[] {
    const n = norm(v);
    if (n === 0) return [...v];
    return v.map(x => x / n);
}

/** Floating-point error can push |cos| a hair past 1 */
function clampUnit(value: number): number {
    return Math.max(-1, Math.min(1, value));
}
