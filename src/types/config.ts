/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Politeness and budget settings for one crawl.
 */
export interface CrawlConfig {
    /** User-Agent header, also the robots.txt agent name */
    userAgent: string;
    /** Pause before every request; raised to robots.txt crawl-delay when that is larger */
    delaySeconds: number;
    /** Page budget (size of the visited set) */
    maxPages: number;
    /** Only follow links on the seed's host */
    sameDomainOnly: boolean;
    /** Attempts per URL before it is marked failed */
    maxRetries: number;
    /** Backoff between attempts is `retryBackoffBase ** attempt` seconds */
    retryBackoffBase: number;
    /** Hard timeout per page request */
    timeoutSeconds: number;
    /** Hard timeout for the robots.txt request */
    robotsTimeoutSeconds: number;
    /** Generic links are followed only when they contain one of these (empty: follow all) */
    followPatterns: string[];
    /** Path fragment that marks a publication page */
    publicationPattern: string;
}

/**
 * Query-time settings.
 */
export interface SearchConfig {
    /** Maximum results returned per query */
    topK: number;
    /** Must match the flag the index was built with */
    useStemming: boolean;
    k1: number;
    b: number;
}

/**
 * Flat-file locations.
 */
export interface StorageConfig {
    dataDir: string;
    recordsFile: string;
    indexFile: string;
    statusFile: string;
}

/**
 * Periodic re-crawl settings.
 */
export interface ScheduleConfig {
    intervalDays: number;
    /** Page budget for scheduled crawls */
    maxPages: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PubSearchConfig {
    /** Portal page the crawl starts from */
    seedUrl?: string;

    crawl: CrawlConfig;
    search: SearchConfig;
    storage: StorageConfig;
    schedule: ScheduleConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PubSearchConfig = {
    crawl: {
        userAgent: 'PubSearchCrawler/1.0 (+mailto:crawler@example.com)',
        delaySeconds: 1.2,
        maxPages: 300,
        sameDomainOnly: true,
        maxRetries: 3,
        retryBackoffBase: 2.0,
        timeoutSeconds: 30,
        robotsTimeoutSeconds: 15,
        followPatterns: ['/en/organisations/', '/en/publications/', '/en/persons/'],
        publicationPattern: '/en/publications/',
    },
    search: {
        topK: 50,
        useStemming: true,
        k1: 1.2,
        b: 0.75,
    },
    storage: {
        dataDir: './data',
        recordsFile: 'publications.jsonl',
        indexFile: 'index.json',
        statusFile: 'crawl_status.json',
    },
    schedule: {
        intervalDays: 7,
        maxPages: 50,
    },
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Partial config as accepted from a file, env, or flags (one level deep).
 */
export type PubSearchConfigInput = Partial<Omit<PubSearchConfig, 'crawl' | 'search' | 'storage' | 'schedule'>> & {
    crawl?: Partial<CrawlConfig>;
    search?: Partial<SearchConfig>;
    storage?: Partial<StorageConfig>;
    schedule?: Partial<ScheduleConfig>;
};
