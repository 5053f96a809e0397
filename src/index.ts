/**
 * Library entry point.
 */
export * from './types/index.js';

export { canonicalize, sameHost, hostOf, isHttpUrl } from './storage/canonicalize.js';
export { loadRecords, saveRecords, mergeRecords, mergeRecord, type MergeResult } from './storage/record-store.js';
export { loadIndex, saveIndex, serializeIndex, parseIndexFile } from './storage/index-store.js';

export { tokenize, normalizeTokens } from './nlp/tokenizer.js';
export { stem } from './nlp/stemmer.js';
export { STOPWORDS } from './nlp/stopwords.js';
export { TextPipeline, getTextPipeline, preprocess } from './nlp/text-pipeline.js';

export {
    stableId,
    buildDocuments,
    buildInvertedIndex,
    computeIdf,
    buildIndex,
    emptySnapshot,
} from './indexer/index-builder.js';

export { bm25Score, DEFAULT_BM25 } from './search/bm25.js';
export { search, type SearchOptions } from './search/search.js';
export { IndexHandle } from './search/index-handle.js';

export { RobotsPolicy } from './crawler/robots.js';
export { CrawlFrontier } from './crawler/frontier.js';
export {
    PoliteCrawler,
    type CrawlResult,
    type CrawlStats,
    type CrawlerDeps,
    type StopReason,
} from './crawler/crawler.js';
export { PortalPageExtractor } from './sources/portal-extractor.js';

export {
    runPipeline,
    rebuildIndex,
    corpusStats,
    type PipelineStats,
    type PipelineResult,
    type CorpusStats,
    type Crawler,
    type CrawlerFactory,
} from './pipeline/orchestrator.js';
export { CrawlScheduler, type CrawlStatus } from './pipeline/scheduler.js';

export { HttpClient, FetchError, DEFAULT_MAX_RETRY_AFTER_MS, type FetchPolicy } from './utils/http-client.js';
export { resolveConfig, mergeConfig, validateConfig, validateCrawlTarget, resolveDataPaths, type DataPaths } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export {
    ConfigError,
    RobotsUnavailableError,
    IndexFormatError,
    SchedulerBusyError,
} from './utils/errors.js';
