import type { Bm25Params, DocLengths, IdfTable, InvertedIndex } from '../types/index.js';
import { averageDocLength } from '../indexer/index-builder.js';

/**
 * Default BM25 parameters.
 */
export const DEFAULT_BM25: Bm25Params = { k1: 1.2, b: 0.75 };

/**
 * Okapi BM25 over the given query terms.
 *
 * score(d) = Σ idf(t) · tf·(k1+1) / (tf + k1·(1 − b + b·|d|/avgdl))
 *
 * Repeated query terms contribute once per occurrence. Terms missing from the
 * index contribute nothing; a term missing from `idf` counts as idf 0.
 * Only documents matching at least one term appear in the result.
 */
export function bm25Score(
    queryTerms: readonly string[],
    index: InvertedIndex,
    docLengths: DocLengths,
    idf: IdfTable,
    params: Partial<Bm25Params> = {}
): Map<string, number> {
    const { k1, b } = { ...DEFAULT_BM25, ...params };
    const scores = new Map<string, number>();

    const avgdl = averageDocLength(docLengths);
    if (docLengths.size === 0 || avgdl <= 0) return scores;

    for (const term of queryTerms) {
        const postings = index.get(term);
        if (!postings) continue;

        const termIdf = idf.get(term) ?? 0;

        for (const [docId, tf] of postings) {
            const dl = docLengths.get(docId) ?? 0;
            let denom = tf + k1 * (1 - b + (b * dl) / avgdl);
            if (denom === 0) denom = 1;

            const contribution = termIdf * ((tf * (k1 + 1)) / denom);
            scores.set(docId, (scores.get(docId) ?? 0) + contribution);
        }
    }

    return scores;
}
