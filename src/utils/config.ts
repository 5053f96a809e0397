import { cosmiconfig } from 'cosmiconfig';
import { join } from 'node:path';
import {
    DEFAULT_CONFIG,
    type CrawlConfig,
    type PubSearchConfig,
    type PubSearchConfigInput,
    type StorageConfig,
} from '../types/index.js';
import { isHttpUrl } from '../storage/canonicalize.js';
import { ConfigError, errorMessage } from './errors.js';
import { getLogger, isLogLevel } from './logger.js';

/**
 * Resolved locations of the flat files.
 */
export interface DataPaths {
    records: string;
    index: string;
    status: string;
}

/**
 * Load configuration from pubsearch.config.json using cosmiconfig.
 * Returns null when there is no config file; defaults apply then.
 */
async function loadConfigFile(searchFrom?: string): Promise<PubSearchConfigInput | null> {
    const explorer = cosmiconfig('pubsearch', {
        searchPlaces: ['pubsearch.config.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        getLogger().warn({ error: errorMessage(error) }, 'Failed to load config file, using defaults');
        return null;
    }

    if (!result || result.isEmpty) return null;
    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return toConfigInput(result.config);
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): PubSearchConfigInput {
    const config: PubSearchConfigInput = {};

    const seedUrl = env['PUBSEARCH_SEED_URL'];
    if (seedUrl) config.seedUrl = seedUrl;

    const userAgent = env['PUBSEARCH_USER_AGENT'];
    if (userAgent) config.crawl = { userAgent };

    const dataDir = env['PUBSEARCH_DATA_DIR'];
    if (dataDir) config.storage = { dataDir };

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: PubSearchConfigInput,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PubSearchConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const merged = mergeConfig(DEFAULT_CONFIG, fileConfig ?? {}, envConfig, cliFlags);
    validateConfig(merged);
    return merged;
}

/**
 * Deep merge (one level) of config layers, later layers winning.
 * Undefined values in a layer never override.
 */
export function mergeConfig(base: PubSearchConfig, ...layers: PubSearchConfigInput[]): PubSearchConfig {
    let merged: PubSearchConfig = base;

    for (const layer of layers) {
        const { crawl, search, storage, schedule, ...top } = layer;
        merged = {
            ...merged,
            ...definedOnly(top),
            crawl: { ...merged.crawl, ...definedOnly(crawl ?? {}) },
            search: { ...merged.search, ...definedOnly(search ?? {}) },
            storage: { ...merged.storage, ...definedOnly(storage ?? {}) },
            schedule: { ...merged.schedule, ...definedOnly(schedule ?? {}) },
        };
    }

    return merged;
}

/**
 * Reject values no crawl or query could run with.
 */
export function validateConfig(config: PubSearchConfig): void {
    const { crawl, search, schedule } = config;

    validateCrawlConfig(crawl);

    requirePositiveInteger(search.topK, 'search.topK');
    requireNonNegative(search.k1, 'search.k1');
    if (!(search.b >= 0 && search.b <= 1)) {
        throw new ConfigError(`search.b must be between 0 and 1, got ${search.b}`, 'search.b');
    }

    requirePositive(schedule.intervalDays, 'schedule.intervalDays');
    requirePositiveInteger(schedule.maxPages, 'schedule.maxPages');
}

/**
 * Seed and crawl settings check, run before the pipeline touches disk or network.
 */
export function validateCrawlTarget(seedUrl: string, crawl: CrawlConfig): void {
    if (!isHttpUrl(seedUrl.trim())) {
        throw new ConfigError(`Seed URL must be an absolute http(s) URL, got "${seedUrl}"`, 'seedUrl');
    }
    validateCrawlConfig(crawl);
}

/**
 * Crawl settings check.
 */
export function validateCrawlConfig(crawl: CrawlConfig): void {
    requirePositiveInteger(crawl.maxPages, 'crawl.maxPages');
    requirePositiveInteger(crawl.maxRetries, 'crawl.maxRetries');
    requireNonNegative(crawl.delaySeconds, 'crawl.delaySeconds');
    requireNonNegative(crawl.retryBackoffBase, 'crawl.retryBackoffBase');
    requirePositive(crawl.timeoutSeconds, 'crawl.timeoutSeconds');
    requirePositive(crawl.robotsTimeoutSeconds, 'crawl.robotsTimeoutSeconds');
    if (!crawl.userAgent.trim()) {
        throw new ConfigError('crawl.userAgent must not be empty', 'crawl.userAgent');
    }
    if (!crawl.publicationPattern) {
        throw new ConfigError('crawl.publicationPattern must not be empty', 'crawl.publicationPattern');
    }
}

/**
 * Absolute-or-relative paths of the record store, index and status files.
 */
export function resolveDataPaths(storage: StorageConfig): DataPaths {
    return {
        records: join(storage.dataDir, storage.recordsFile),
        index: join(storage.dataDir, storage.indexFile),
        status: join(storage.dataDir, storage.statusFile),
    };
}

// ─── Internal helpers ─────────────────────────────────

function requirePositiveInteger(value: number, field: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${field} must be a positive integer, got ${value}`, field);
    }
}

function requirePositive(value: number, field: string): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${field} must be a positive number, got ${value}`, field);
    }
}

function requireNonNegative(value: number, field: string): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(`${field} must be a non-negative number, got ${value}`, field);
    }
}

function definedOnly<T extends object>(value: T): Partial<T> {
    const out: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) out[key] = value[key];
    }
    return out;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a parsed config file to the known sections and field types.
 * Mistyped values are dropped with a warning.
 */
function toConfigInput(raw: unknown): PubSearchConfigInput {
    if (!isObject(raw)) {
        throw new ConfigError('Config file must contain a JSON object');
    }

    const input: PubSearchConfigInput = {};
    const seedUrl = readString(raw, 'seedUrl', 'root');
    if (seedUrl !== undefined) input.seedUrl = seedUrl;
    const jsonLogs = readBoolean(raw, 'jsonLogs', 'root');
    if (jsonLogs !== undefined) input.jsonLogs = jsonLogs;
    const logLevel = readString(raw, 'logLevel', 'root');
    if (logLevel !== undefined && isLogLevel(logLevel)) input.logLevel = logLevel;

    const crawl = section(raw, 'crawl');
    if (crawl) {
        input.crawl = {
            userAgent: readString(crawl, 'userAgent', 'crawl'),
            delaySeconds: readNumber(crawl, 'delaySeconds', 'crawl'),
            maxPages: readNumber(crawl, 'maxPages', 'crawl'),
            sameDomainOnly: readBoolean(crawl, 'sameDomainOnly', 'crawl'),
            maxRetries: readNumber(crawl, 'maxRetries', 'crawl'),
            retryBackoffBase: readNumber(crawl, 'retryBackoffBase', 'crawl'),
            timeoutSeconds: readNumber(crawl, 'timeoutSeconds', 'crawl'),
            robotsTimeoutSeconds: readNumber(crawl, 'robotsTimeoutSeconds', 'crawl'),
            followPatterns: readStringArray(crawl, 'followPatterns', 'crawl'),
            publicationPattern: readString(crawl, 'publicationPattern', 'crawl'),
        };
    }

    const search = section(raw, 'search');
    if (search) {
        input.search = {
            topK: readNumber(search, 'topK', 'search'),
            useStemming: readBoolean(search, 'useStemming', 'search'),
            k1: readNumber(search, 'k1', 'search'),
            b: readNumber(search, 'b', 'search'),
        };
    }

    const storage = section(raw, 'storage');
    if (storage) {
        input.storage = {
            dataDir: readString(storage, 'dataDir', 'storage'),
            recordsFile: readString(storage, 'recordsFile', 'storage'),
            indexFile: readString(storage, 'indexFile', 'storage'),
            statusFile: readString(storage, 'statusFile', 'storage'),
        };
    }

    const schedule = section(raw, 'schedule');
    if (schedule) {
        input.schedule = {
            intervalDays: readNumber(schedule, 'intervalDays', 'schedule'),
            maxPages: readNumber(schedule, 'maxPages', 'schedule'),
        };
    }

    return input;
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
    const value = raw[name];
    if (value === undefined) return undefined;
    if (isObject(value)) return value;
    getLogger().warn({ section: name }, 'Ignoring non-object config section');
    return undefined;
}

function readString(raw: Record<string, unknown>, key: string, sectionName: string): string | undefined {
    const value = raw[key];
    if (value === undefined || typeof value === 'string') return value;
    warnWrongType(sectionName, key);
    return undefined;
}

function readNumber(raw: Record<string, unknown>, key: string, sectionName: string): number | undefined {
    const value = raw[key];
    if (value === undefined || typeof value === 'number') return value;
    warnWrongType(sectionName, key);
    return undefined;
}

function readBoolean(raw: Record<string, unknown>, key: string, sectionName: string): boolean | undefined {
    const value = raw[key];
    if (value === undefined || typeof value === 'boolean') return value;
    warnWrongType(sectionName, key);
    return undefined;
}

function readStringArray(raw: Record<string, unknown>, key: string, sectionName: string): string[] | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    warnWrongType(sectionName, key);
    return undefined;
}

function warnWrongType(sectionName: string, key: string): void {
    getLogger().warn({ section: sectionName, key }, 'Ignoring config value of the wrong type');
}
