import type { Document } from './publication.js';

/**
 * Posting list: document id → raw term frequency (always ≥ 1).
 */
export type Postings = Map<string, number>;

/**
 * term → posting list.
 */
export type InvertedIndex = Map<string, Postings>;

/**
 * document id → number of preprocessed terms.
 */
export type DocLengths = Map<string, number>;

/**
 * term → BM25 inverse document frequency.
 */
export type IdfTable = Map<string, number>;

/**
 * Everything a query needs, built in one rebuild.
 * Treated as immutable once handed to an IndexHandle.
 */
export interface IndexSnapshot {
    docs: ReadonlyMap<string, Document>;
    index: InvertedIndex;
    docLengths: DocLengths;
    idf: IdfTable;
}

/**
 * On-disk shape of the index file.
 */
export interface IndexFile {
    docs: Record<string, Document>;
    index: Record<string, Record<string, number>>;
    doc_lengths: Record<string, number>;
    idf: Record<string, number>;
}

/**
 * BM25 tuning parameters.
 */
export interface Bm25Params {
    /** Term-frequency saturation */
    k1: number;
    /** Length normalization strength, 0..1 */
    b: number;
}

/**
 * A ranked hit returned to callers.
 */
export interface SearchResult extends Document {
    score: number;
}
