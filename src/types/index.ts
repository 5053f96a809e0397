/**
 * Barrel export for all shared types.
 */
export type { PublicationRecord, Document } from './publication.js';
export { PUBLICATION_FIELDS, emptyRecord } from './publication.js';
export type {
    Postings,
    InvertedIndex,
    DocLengths,
    IdfTable,
    IndexSnapshot,
    IndexFile,
    Bm25Params,
    SearchResult,
} from './search-index.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PubSearchConfig,
    PubSearchConfigInput,
    CrawlConfig,
    SearchConfig,
    StorageConfig,
    ScheduleConfig,
    LogLevel,
} from './config.js';
export type { PageExtractor, PageExtraction } from './extractor.js';
