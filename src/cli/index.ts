#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, resolveDataPaths } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { getTextPipeline } from '../nlp/text-pipeline.js';
import { IndexHandle } from '../search/index-handle.js';
import { loadRecords } from '../storage/record-store.js';
import { loadIndex } from '../storage/index-store.js';
import { corpusStats, rebuildIndex, runPipeline } from '../pipeline/orchestrator.js';
import { CrawlScheduler } from '../pipeline/scheduler.js';
import type { LogLevel, PubSearchConfig, PubSearchConfigInput, SearchResult } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonOptions {
    dataDir?: string;
    config?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface CrawlOptions extends CommonOptions {
    seed?: string;
    maxPages?: number;
    delay?: number;
    userAgent?: string;
}

interface SearchOptions extends CommonOptions {
    topK?: number;
    stemming: boolean;
    k1?: number;
    b?: number;
    json?: boolean;
}

interface ScheduleOptions extends CommonOptions {
    seed?: string;
    force?: boolean;
}

const program = new Command();

program
    .name('pubsearch')
    .description('Crawl a research portal for publications, index them, and search with BM25.')
    .version(VERSION);

// ─── CRAWL command ────────────────────────────────────────

withCommonOptions(
    program
        .command('crawl')
        .description('Crawl from a seed URL, merge into the record store and rebuild the index')
        .option('-s, --seed <url>', 'Seed URL to start crawling')
        .option('-m, --max-pages <n>', 'Maximum pages to visit', positiveInt)
        .option('--delay <seconds>', 'Delay before every request', nonNegativeNumber)
        .option('--user-agent <ua>', 'User-Agent header')
).action(async (opts: CrawlOptions) => {
    const config = await setup(opts, {
        seedUrl: opts.seed,
        crawl: { maxPages: opts.maxPages, delaySeconds: opts.delay, userAgent: opts.userAgent },
    });
    const logger = getLogger();

    if (!config.seedUrl) {
        fail(new ConfigError('A seed URL is required (--seed, PUBSEARCH_SEED_URL or seedUrl in config)', 'seedUrl'));
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupted, finishing the current page');
        controller.abort();
    });

    try {
        const { stats, crawl } = await runPipeline({
            seedUrl: config.seedUrl,
            crawl: config.crawl,
            paths: resolveDataPaths(config.storage),
            pipeline: getTextPipeline(config.search.useStemming),
            signal: controller.signal,
        });

        console.log('\nCrawl finished.');
        console.log(`  Pages visited:     ${crawl.visited} (${crawl.stoppedReason})`);
        console.log(`  Failed pages:      ${crawl.failed}`);
        console.log(`  New publications:  ${stats.added}`);
        console.log(`  Updated:           ${stats.updated}`);
        console.log(`  Total stored:      ${stats.total_docs}`);
        console.log(`  Time:              ${stats.total_time.toFixed(1)}s`);
    } catch (error) {
        fail(error);
    }
});

// ─── REBUILD command ──────────────────────────────────────

withCommonOptions(
    program.command('rebuild').description('Rebuild the index from the record store without crawling')
).action(async (opts: CommonOptions) => {
    const config = await setup(opts, {});

    try {
        const { stats } = rebuildIndex({
            paths: resolveDataPaths(config.storage),
            pipeline: getTextPipeline(config.search.useStemming),
        });

        console.log('\nIndex rebuilt.');
        console.log(`  Documents:          ${stats.documents}`);
        console.log(`  Unique terms:       ${stats.terms}`);
        console.log(`  Average doc length: ${stats.avg_doc_length} terms`);
    } catch (error) {
        fail(error);
    }
});

// ─── SEARCH command ───────────────────────────────────────

withCommonOptions(
    program
        .command('search')
        .description('Search the index')
        .argument('<query...>', 'Query text')
        .option('-k, --top-k <n>', 'Number of results', positiveInt)
        .option('--no-stemming', 'Query without stemming (index must match)')
        .option('--k1 <k1>', 'BM25 k1', nonNegativeNumber)
        .option('--b <b>', 'BM25 b', nonNegativeNumber)
        .option('--json', 'Print results as JSON', false)
).action(async (query: string[], opts: SearchOptions) => {
    const config = await setup(opts, {
        search: { topK: opts.topK, useStemming: opts.stemming ? undefined : false, k1: opts.k1, b: opts.b },
    });

    try {
        const handle = IndexHandle.open(resolveDataPaths(config.storage).index);
        const results = handle.search(query.join(' '), config.search);

        if (opts.json) {
            console.log(JSON.stringify(results, null, 2));
        } else {
            printResults(results);
        }
    } catch (error) {
        fail(error);
    }
});

// ─── STATS command ────────────────────────────────────────

withCommonOptions(
    program.command('stats').description('Show record store and index statistics')
).action(async (opts: CommonOptions) => {
    const config = await setup(opts, {});

    try {
        const paths = resolveDataPaths(config.storage);
        const stats = corpusStats(loadRecords(paths.records), loadIndex(paths.index));

        console.log('\n📊 Corpus Statistics\n');
        console.log(`  Publications:       ${stats.publications}`);
        console.log(`  Indexed documents:  ${stats.indexed_documents}`);
        console.log(`  Unique terms:       ${stats.unique_terms}`);
        console.log(`  Average doc length: ${stats.avg_doc_length} terms`);
        console.log(`  Unique authors:     ${stats.unique_authors}`);
        if (stats.year_range) {
            console.log(`  Years:              ${stats.year_range.min} - ${stats.year_range.max}`);
        }
        console.log('');
    } catch (error) {
        fail(error);
    }
});

// ─── SCHEDULE command ─────────────────────────────────────

withCommonOptions(
    program
        .command('schedule')
        .description('Run the periodic crawl when it is due')
        .option('-s, --seed <url>', 'Seed URL to start crawling')
        .option('--force', 'Crawl now regardless of the interval', false)
).action(async (opts: ScheduleOptions) => {
    const config = await setup(opts, { seedUrl: opts.seed });
    const paths = resolveDataPaths(config.storage);

    try {
        const scheduler = new CrawlScheduler({
            config,
            handle: new IndexHandle(paths.index),
            pipeline: getTextPipeline(config.search.useStemming),
        });
        process.once('SIGINT', () => scheduler.stop());

        let job = scheduler.checkAndRun();
        if (!job && opts.force) {
            scheduler.writeStatus();
            job = scheduler.requestCrawl({ maxPages: config.schedule.maxPages });
        }

        if (job) {
            const { stats } = await job;
            console.log(`Scheduled crawl complete: ${stats.total_docs} documents indexed.`);
        } else {
            console.log('Crawl not due.');
        }

        const next = scheduler.nextCrawlDate();
        console.log(next ? `Next crawl: ${next.toISOString()}` : 'Next crawl: not scheduled');
    } catch (error) {
        fail(error);
    }
});

program.parseAsync().catch(fail);

// ─── Helpers ──────────────────────────────────────────────

function withCommonOptions(command: Command): Command {
    return command
        .option('--data-dir <dir>', 'Directory of the record store, index and status files')
        .option('--config <dir>', 'Directory to search for pubsearch.config.json')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', logLevel)
        .option('--json-logs', 'Output JSON logs');
}

async function setup(opts: CommonOptions, flags: PubSearchConfigInput): Promise<PubSearchConfig> {
    try {
        const config = await resolveConfig(
            {
                ...flags,
                logLevel: opts.logLevel,
                jsonLogs: opts.jsonLogs,
                storage: { dataDir: opts.dataDir },
            },
            { searchFrom: opts.config }
        );
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        return config;
    } catch (error) {
        return fail(error);
    }
}

function printResults(results: SearchResult[]): void {
    if (results.length === 0) {
        console.log('No results.');
        return;
    }

    results.forEach((r, i) => {
        const year = r.year ? ` (${r.year})` : '';
        console.log(`\n${i + 1}. ${r.title || '(untitled)'}${year}  [${r.score.toFixed(4)}]`);
        if (r.authors.length > 0) console.log(`   ${r.authors.join(', ')}`);
        console.log(`   ${r.publication_url}`);
    });
    console.log('');
}

function fail(error: unknown): never {
    if (error instanceof ConfigError) {
        console.error(`Configuration error: ${error.message}`);
    } else {
        getLogger().error({ error: errorMessage(error) }, 'Command failed');
    }
    process.exit(1);
}

function positiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.');
    return n;
}

function nonNegativeNumber(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative number.');
    return n;
}

function logLevel(value: string): LogLevel {
    if (!isLogLevel(value)) throw new InvalidArgumentError('Expected debug, info, warn, error or silent.');
    return value;
}
