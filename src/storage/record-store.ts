import { existsSync, readFileSync } from 'node:fs';
import { emptyRecord, type PublicationRecord } from '../types/index.js';
import { canonicalize } from './canonicalize.js';
import { writeFileAtomic } from './atomic-write.js';
import { getLogger } from '../utils/logger.js';

/**
 * Outcome of merging a crawl's records into the store.
 */
export interface MergeResult {
    records: PublicationRecord[];
    /** Canonical URLs not present before */
    added: number;
    /** Canonical URLs present before and seen again */
    updated: number;
    total: number;
}

/**
 * Merge newly crawled records into existing ones by canonical URL.
 *
 * Field-level fill-forward: for a URL present in both, each field takes the
 * new value unless the new value is empty and the old one is not. Records
 * without a URL cannot be identified and are dropped.
 */
export function mergeRecords(
    oldRecords: readonly PublicationRecord[],
    newRecords: readonly PublicationRecord[]
): MergeResult {
    const byUrl = new Map<string, PublicationRecord>();

    for (const record of oldRecords) {
        const key = canonicalize(record.publication_url);
        if (!key) continue;
        const existing = byUrl.get(key);
        byUrl.set(key, existing ? mergeRecord(existing, record) : record);
    }

    let added = 0;
    let updated = 0;
    const seenThisPass = new Set<string>();

    for (const record of newRecords) {
        const key = canonicalize(record.publication_url);
        if (!key) continue;

        const existing = byUrl.get(key);
        if (existing) {
            byUrl.set(key, mergeRecord(existing, record));
            if (!seenThisPass.has(key)) updated++;
        } else {
            byUrl.set(key, record);
            added++;
        }
        seenThisPass.add(key);
    }

    const records = Array.from(byUrl.values());
    getLogger().info({ added, updated, total: records.length }, 'Merged publication records');

    return { records, added, updated, total: records.length };
}

/**
 * Fill-forward merge of two versions of the same publication.
 */
export function mergeRecord(older: PublicationRecord, newer: PublicationRecord): PublicationRecord {
    return {
        publication_url: pick(newer.publication_url, older.publication_url),
        title: pick(newer.title, older.title),
        year: pick(newer.year, older.year),
        authors: newer.authors.length > 0 ? newer.authors : older.authors,
        author_urls: newer.author_urls.length > 0 ? newer.author_urls : older.author_urls,
        abstract: pick(newer.abstract, older.abstract),
    };
}

/**
 * Load records from a JSON-Lines file.
 * A missing file is an empty store. Malformed lines are logged and skipped.
 */
export function loadRecords(path: string): PublicationRecord[] {
    const logger = getLogger();

    if (!existsSync(path)) {
        logger.debug({ path }, 'Record store not found, starting empty');
        return [];
    }

    const records: PublicationRecord[] = [];
    const lines = readFileSync(path, 'utf-8').split('\n');

    lines.forEach((line, i) => {
        const trimmed = line.trim();
        if (!trimmed) return;

        try {
            const record = toRecord(JSON.parse(trimmed));
            if (record) {
                records.push(record);
            } else {
                logger.warn({ path, line: i + 1 }, 'Skipping non-object record line');
            }
        } catch (error) {
            logger.warn({ path, line: i + 1, error }, 'Skipping malformed record line');
        }
    });

    logger.debug({ path, count: records.length }, 'Loaded records');
    return records;
}

/**
 * Rewrite the record store with deduplicated content (first occurrence of a
 * canonical URL wins; records without a URL are kept).
 * @returns Number of records written
 */
export function saveRecords(path: string, records: readonly PublicationRecord[]): number {
    const seen = new Set<string>();
    const unique: PublicationRecord[] = [];

    for (const record of records) {
        const key = canonicalize(record.publication_url);
        if (key) {
            if (seen.has(key)) continue;
            seen.add(key);
        }
        unique.push(record);
    }

    const body = unique.map((r) => JSON.stringify(serializeRecord(r)) + '\n').join('');
    writeFileAtomic(path, body);

    getLogger().info({ path, count: unique.length }, 'Saved records');
    return unique.length;
}

/**
 * Coerce a parsed JSON value into a record; missing or mistyped fields become empty.
 * Returns null for non-objects.
 */
export function toRecord(value: unknown): PublicationRecord | null {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;

    const record = emptyRecord();
    if ('publication_url' in value) record.publication_url = asText(value.publication_url);
    if ('title' in value) record.title = asText(value.title);
    if ('year' in value) record.year = asText(value.year);
    if ('authors' in value) record.authors = asTextList(value.authors);
    if ('author_urls' in value) record.author_urls = asTextList(value.author_urls);
    if ('abstract' in value) record.abstract = asText(value.abstract);
    return record;
}

// ─── Internal helpers ─────────────────────────────────

function pick(newer: string, older: string): string {
    return newer.trim() ? newer : older;
}

/**
 * Exactly the persisted fields, in file order.
 */
function serializeRecord(record: PublicationRecord): PublicationRecord {
    return {
        publication_url: record.publication_url,
        title: record.title,
        year: record.year,
        authors: record.authors,
        author_urls: record.author_urls,
        abstract: record.abstract,
    };
}

function asText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return '';
}

function asTextList(value: unknown): string[] {
    if (!Array.isArray(value)) return [];
    return value.filter((v): v is string => typeof v === 'string');
}
