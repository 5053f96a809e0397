import { createHash } from 'node:crypto';
import type {
    PublicationRecord,
    Document,
    InvertedIndex,
    DocLengths,
    IdfTable,
    IndexSnapshot,
} from '../types/index.js';
import { canonicalize } from '../storage/canonicalize.js';
import { getTextPipeline, type TextPipeline } from '../nlp/text-pipeline.js';
import { getLogger } from '../utils/logger.js';

/**
 * Deterministic document id: first 16 hex chars of SHA-1 of the canonical URL.
 */
export function stableId(canonicalUrl: string): string {
    return createHash('sha1').update(canonicalUrl, 'utf-8').digest('hex').slice(0, 16);
}

/**
 * One Document per canonical URL. Records without a URL are skipped;
 * when two records share a canonical URL the later one wins.
 */
export function buildDocuments(records: readonly PublicationRecord[]): Map<string, Document> {
    const docs = new Map<string, Document>();
    let skipped = 0;

    for (const record of records) {
        const url = record.publication_url.trim();
        if (!url) {
            skipped++;
            continue;
        }

        const id = stableId(canonicalize(url));
        docs.set(id, {
            id,
            title: record.title,
            year: record.year,
            authors: [...record.authors],
            publication_url: url,
            author_urls: [...record.author_urls],
            abstract: record.abstract,
        });
    }

    if (skipped > 0) {
        getLogger().warn({ skipped }, 'Skipped records without a publication URL');
    }

    return docs;
}

/**
 * Searchable text of a document: title, abstract, authors, year.
 */
export function documentText(doc: Document): string {
    return [doc.title, doc.abstract, doc.authors.join(' '), doc.year].join(' ');
}

/**
 * Build postings and document lengths.
 *
 * Documents are visited in id order and terms inserted in sorted order, so the
 * same document set always yields identical maps. Lengths and postings come
 * from the same preprocessed term list.
 */
export function buildInvertedIndex(
    docs: ReadonlyMap<string, Document>,
    pipeline: TextPipeline = getTextPipeline()
): { index: InvertedIndex; docLengths: DocLengths } {
    const index: InvertedIndex = new Map();
    const docLengths: DocLengths = new Map();

    for (const id of [...docs.keys()].sort()) {
        const doc = docs.get(id);
        if (!doc) continue;

        const terms = pipeline.preprocess(documentText(doc));
        docLengths.set(id, terms.length);

        // Compute term frequency (TF)
        const tf = new Map<string, number>();
        for (const term of terms) {
            tf.set(term, (tf.get(term) ?? 0) + 1);
        }

        for (const term of [...tf.keys()].sort()) {
            let postings = index.get(term);
            if (!postings) {
                postings = new Map();
                index.set(term, postings);
            }
            postings.set(id, tf.get(term) ?? 0);
        }
    }

    return { index: sortByKey(index), docLengths };
}

/**
 * BM25 IDF: `ln(1 + (N - df + 0.5) / (df + 0.5))`, positive for every df ≤ N.
 */
export function computeIdf(index: InvertedIndex, nDocs: number): IdfTable {
    const idf: IdfTable = new Map();
    for (const [term, postings] of index) {
        const df = postings.size;
        idf.set(term, Math.log(1 + (nDocs - df + 0.5) / (df + 0.5)));
    }
    return idf;
}

/**
 * Full rebuild: documents → postings/lengths → IDF over the whole set.
 */
export function buildIndex(
    records: readonly PublicationRecord[],
    pipeline: TextPipeline = getTextPipeline()
): IndexSnapshot {
    const docs = buildDocuments(records);
    const { index, docLengths } = buildInvertedIndex(docs, pipeline);
    const idf = computeIdf(index, docs.size);

    getLogger().info(
        { documents: docs.size, terms: index.size, stemming: pipeline.useStemming },
        'Index built'
    );

    return { docs, index, docLengths, idf };
}

/**
 * Snapshot with no documents.
 */
export function emptySnapshot(): IndexSnapshot {
    return { docs: new Map(), index: new Map(), docLengths: new Map(), idf: new Map() };
}

/**
 * Mean document length, 0 for an empty corpus.
 */
export function averageDocLength(docLengths: DocLengths): number {
    if (docLengths.size === 0) return 0;
    let total = 0;
    for (const length of docLengths.values()) total += length;
    return total / docLengths.size;
}

function sortByKey<V>(map: Map<string, V>): Map<string, V> {
    return new Map([...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
