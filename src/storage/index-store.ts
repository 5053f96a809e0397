import { existsSync, readFileSync } from 'node:fs';
import type { Document, IndexFile, IndexSnapshot, InvertedIndex } from '../types/index.js';
import { emptySnapshot } from '../indexer/index-builder.js';
import { IndexFormatError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { writeFileAtomic } from './atomic-write.js';
import { toRecord } from './record-store.js';

/**
 * Convert a snapshot to the on-disk document with every map's keys sorted,
 * so equal snapshots serialize to identical bytes.
 */
export function toIndexFile(snapshot: IndexSnapshot): IndexFile {
    const docs: Record<string, Document> = {};
    for (const id of sortedKeys(snapshot.docs)) {
        const doc = snapshot.docs.get(id);
        if (doc) {
            docs[id] = {
                id: doc.id,
                title: doc.title,
                year: doc.year,
                authors: doc.authors,
                publication_url: doc.publication_url,
                author_urls: doc.author_urls,
                abstract: doc.abstract,
            };
        }
    }

    const index: Record<string, Record<string, number>> = {};
    for (const term of sortedKeys(snapshot.index)) {
        const postings = snapshot.index.get(term);
        if (postings) index[term] = mapToObject(postings);
    }

    return {
        docs,
        index,
        doc_lengths: mapToObject(snapshot.docLengths),
        idf: mapToObject(snapshot.idf),
    };
}

/**
 * Serialize a snapshot to JSON text.
 */
export function serializeIndex(snapshot: IndexSnapshot): string {
    return JSON.stringify(toIndexFile(snapshot), null, 2) + '\n';
}

/**
 * Write the index atomically (full rewrite through a temp file + rename).
 */
export function saveIndex(path: string, snapshot: IndexSnapshot): void {
    writeFileAtomic(path, serializeIndex(snapshot));
    getLogger().info(
        { path, documents: snapshot.docs.size, terms: snapshot.index.size },
        'Saved index'
    );
}

/**
 * Load an index file. A missing file is an empty index.
 * @throws IndexFormatError when the file is not a valid index document
 */
export function loadIndex(path: string): IndexSnapshot {
    if (!existsSync(path)) {
        getLogger().warn({ path }, 'Index not found, using empty index');
        return emptySnapshot();
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new IndexFormatError(
            `Index file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    return parseIndexFile(raw, path);
}

/**
 * Validate a parsed index document and rebuild the in-memory maps.
 * Postings pointing at unknown documents and non-positive frequencies are dropped.
 */
export function parseIndexFile(raw: unknown, path = '<memory>'): IndexSnapshot {
    if (!isObject(raw)) {
        throw new IndexFormatError('Index file must contain a JSON object', path);
    }

    const docsRaw = raw['docs'] ?? {};
    const indexRaw = raw['index'] ?? {};
    const lengthsRaw = raw['doc_lengths'] ?? {};
    const idfRaw = raw['idf'] ?? {};

    if (!isObject(docsRaw) || !isObject(indexRaw) || !isObject(lengthsRaw) || !isObject(idfRaw)) {
        throw new IndexFormatError('Index file sections docs/index/doc_lengths/idf must be objects', path);
    }

    const docs = new Map<string, Document>();
    for (const [id, value] of Object.entries(docsRaw)) {
        const record = toRecord(value);
        if (record) docs.set(id, { id, ...record });
    }

    const index: InvertedIndex = new Map();
    let dropped = 0;
    for (const [term, postingsRaw] of Object.entries(indexRaw)) {
        if (!isObject(postingsRaw)) {
            dropped++;
            continue;
        }
        const postings = new Map<string, number>();
        for (const [docId, tf] of Object.entries(postingsRaw)) {
            if (typeof tf === 'number' && Number.isInteger(tf) && tf > 0 && docs.has(docId)) {
                postings.set(docId, tf);
            } else {
                dropped++;
            }
        }
        if (postings.size > 0) index.set(term, postings);
    }

    if (dropped > 0) {
        getLogger().warn({ path, dropped }, 'Dropped invalid postings while loading index');
    }

    return {
        docs,
        index,
        docLengths: numberMap(lengthsRaw),
        idf: numberMap(idfRaw),
    };
}

// ─── Internal helpers ─────────────────────────────────

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberMap(raw: Record<string, unknown>): Map<string, number> {
    const out = new Map<string, number>();
    for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'number' && Number.isFinite(value)) out.set(key, value);
    }
    return out;
}

function sortedKeys(map: ReadonlyMap<string, unknown>): string[] {
    return [...map.keys()].sort();
}

function mapToObject(map: ReadonlyMap<string, number>): Record<string, number> {
    const out: Record<string, number> = {};
    for (const key of sortedKeys(map)) {
        const value = map.get(key);
        if (value !== undefined) out[key] = value;
    }
    return out;
}
