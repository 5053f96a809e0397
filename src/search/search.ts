import type { IndexSnapshot, SearchResult, SearchConfig } from '../types/index.js';
import { getTextPipeline } from '../nlp/text-pipeline.js';
import { getLogger } from '../utils/logger.js';
import { bm25Score } from './bm25.js';

/**
 * Query options; anything omitted falls back to the search defaults.
 */
export type SearchOptions = Partial<SearchConfig>;

/**
 * Rank documents of a snapshot for a free-text query.
 *
 * The query goes through the same text pipeline as the indexed documents
 * (same stemming flag), so the snapshot must have been built with `useStemming`
 * matching the option given here.
 */
export function search(query: string, snapshot: IndexSnapshot, options: SearchOptions = {}): SearchResult[] {
    const { topK = 50, useStemming = true, k1 = 1.2, b = 0.75 } = options;

    if (topK <= 0 || snapshot.docs.size === 0) return [];

    const terms = getTextPipeline(useStemming).preprocess(query);
    if (terms.length === 0) return [];

    const scores = bm25Score(terms, snapshot.index, snapshot.docLengths, snapshot.idf, { k1, b });

    const ranked = [...scores.entries()]
        .sort(([idA, a], [idB, b2]) => b2 - a || (idA < idB ? -1 : idA > idB ? 1 : 0))
        .slice(0, topK);

    const results: SearchResult[] = [];
    for (const [id, score] of ranked) {
        const doc = snapshot.docs.get(id);
        if (!doc) continue;
        results.push({ ...doc, score: roundScore(score) });
    }

    getLogger().debug({ query, terms, hits: scores.size, returned: results.length }, 'Search completed');
    return results;
}

function roundScore(score: number): number {
    return Math.round(score * 10000) / 10000;
}
