import type { CrawlConfig, IndexSnapshot, PublicationRecord } from '../types/index.js';
import { PoliteCrawler, type CrawlResult, type CrawlStats } from '../crawler/crawler.js';
import { averageDocLength, buildIndex } from '../indexer/index-builder.js';
import { getTextPipeline, type TextPipeline } from '../nlp/text-pipeline.js';
import { saveIndex } from '../storage/index-store.js';
import { loadRecords, mergeRecords, saveRecords } from '../storage/record-store.js';
import { validateCrawlTarget, type DataPaths } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';

/**
 * Anything that can run one crawl.
 */
export interface Crawler {
    crawl(options?: { signal?: AbortSignal }): Promise<CrawlResult>;
}

export type CrawlerFactory = (seedUrl: string, config: CrawlConfig) => Promise<Crawler>;

/**
 * Pipeline counters; durations are in seconds.
 */
export interface PipelineStats {
    /** Records in the store before the crawl */
    old_docs: number;
    /** Publications found by this crawl */
    new_docs: number;
    added: number;
    updated: number;
    /** Records in the store after the merge */
    total_docs: number;
    crawl_time: number;
    index_time: number;
    total_time: number;
}

export interface PipelineOptions {
    seedUrl: string;
    crawl: CrawlConfig;
    paths: DataPaths;
    pipeline?: TextPipeline;
    crawlerFactory?: CrawlerFactory;
    signal?: AbortSignal;
}

export interface PipelineResult {
    stats: PipelineStats;
    crawl: CrawlStats;
    snapshot: IndexSnapshot;
}

export interface RebuildStats {
    documents: number;
    terms: number;
    avg_doc_length: number;
    index_time: number;
}

/**
 * Corpus overview for reporting.
 */
export interface CorpusStats {
    publications: number;
    indexed_documents: number;
    unique_terms: number;
    avg_doc_length: number;
    unique_authors: number;
    /** Earliest and latest plausible year, null when no record has one */
    year_range: { min: number; max: number } | null;
}

const defaultCrawlerFactory: CrawlerFactory = (seedUrl, config) => PoliteCrawler.create(seedUrl, config);

/**
 * Full pipeline:
 *
 * 1. Load the record store
 * 2. Crawl
 * 3. Merge by canonical URL and rewrite the store
 * 4. Rebuild the index over the whole merged corpus
 * 5. Write the index atomically
 *
 * An aborted crawl still merges and persists what it found.
 * @throws ConfigError before any file or network I/O when the seed or crawl settings are invalid
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
    const logger = getLogger();
    const pipeline = options.pipeline ?? getTextPipeline();
    const factory = options.crawlerFactory ?? defaultCrawlerFactory;
    const startTime = performance.now();

    validateCrawlTarget(options.seedUrl, options.crawl);
    logger.info({ seedUrl: options.seedUrl, maxPages: options.crawl.maxPages }, 'Starting crawl + index pipeline');

    // ──────────────────────────────────────────────────
    // Step 1: Existing records
    // ──────────────────────────────────────────────────
    const oldRecords = loadRecords(options.paths.records);
    logger.info({ count: oldRecords.length }, 'Loaded existing publications');

    // ──────────────────────────────────────────────────
    // Step 2: Crawl
    // ──────────────────────────────────────────────────
    const crawlStart = performance.now();
    const crawler = await factory(options.seedUrl, options.crawl);
    const crawlResult = await crawler.crawl({ signal: options.signal });
    const crawlTime = seconds(performance.now() - crawlStart);

    if (crawlResult.stats.stoppedReason === 'aborted') {
        logger.warn({ found: crawlResult.publications.length }, 'Crawl aborted, keeping partial results');
    }

    // ──────────────────────────────────────────────────
    // Step 3: Merge + persist records
    // ──────────────────────────────────────────────────
    const merged = mergeRecords(oldRecords, crawlResult.publications);
    saveRecords(options.paths.records, merged.records);

    // ──────────────────────────────────────────────────
    // Step 4: Rebuild + persist index
    // ──────────────────────────────────────────────────
    const indexStart = performance.now();
    const snapshot = buildIndex(merged.records, pipeline);
    saveIndex(options.paths.index, snapshot);
    const indexTime = seconds(performance.now() - indexStart);

    const stats: PipelineStats = {
        old_docs: oldRecords.length,
        new_docs: crawlResult.publications.length,
        added: merged.added,
        updated: merged.updated,
        total_docs: merged.total,
        crawl_time: crawlTime,
        index_time: indexTime,
        total_time: seconds(performance.now() - startTime),
    };

    logger.info(stats, 'Pipeline complete');
    return { stats, crawl: crawlResult.stats, snapshot };
}

/**
 * Rebuild the index from the record store alone, without crawling.
 */
export function rebuildIndex(options: { paths: DataPaths; pipeline?: TextPipeline }): {
    stats: RebuildStats;
    snapshot: IndexSnapshot;
} {
    const start = performance.now();
    const records = loadRecords(options.paths.records);
    const snapshot = buildIndex(records, options.pipeline ?? getTextPipeline());
    saveIndex(options.paths.index, snapshot);

    const stats: RebuildStats = {
        documents: snapshot.docs.size,
        terms: snapshot.index.size,
        avg_doc_length: round1(averageDocLength(snapshot.docLengths)),
        index_time: seconds(performance.now() - start),
    };
    getLogger().info(stats, 'Index rebuilt');
    return { stats, snapshot };
}

/**
 * Summary of the record store and the index built from it.
 */
export function corpusStats(records: readonly PublicationRecord[], snapshot: IndexSnapshot): CorpusStats {
    const authors = new Set<string>();
    let min = Infinity;
    let max = -Infinity;

    for (const record of records) {
        for (const author of record.authors) authors.add(author);

        const year = Number.parseInt(record.year, 10);
        if (Number.isInteger(year) && year > 1900 && year <= new Date().getFullYear() + 1) {
            min = Math.min(min, year);
            max = Math.max(max, year);
        }
    }

    return {
        publications: records.length,
        indexed_documents: snapshot.docs.size,
        unique_terms: snapshot.index.size,
        avg_doc_length: round1(averageDocLength(snapshot.docLengths)),
        unique_authors: authors.size,
        year_range: Number.isFinite(min) ? { min, max } : null,
    };
}

function seconds(ms: number): number {
    return Math.round(ms) / 1000;
}

function round1(value: number): number {
    return Math.round(value * 10) / 10;
}
