import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { runPipeline, rebuildIndex, corpusStats, type CrawlerFactory } from '../pipeline/orchestrator.js';
import { CrawlScheduler } from '../pipeline/scheduler.js';
import type { CrawlResult } from '../crawler/crawler.js';
import { IndexHandle } from '../search/index-handle.js';
import { loadRecords, saveRecords } from '../storage/record-store.js';
import { loadIndex } from '../storage/index-store.js';
import { buildIndex } from '../indexer/index-builder.js';
import { SchedulerBusyError, ConfigError } from '../utils/errors.js';
import type { DataPaths } from '../utils/config.js';
import { DEFAULT_CONFIG, emptyRecord, type PubSearchConfig, type PublicationRecord } from '../types/index.js';

const SEED = 'https://portal.example.org/en/organisations/lab';

function record(slug: string, fields: Partial<PublicationRecord> = {}): PublicationRecord {
    return { ...emptyRecord(`https://portal.example.org/en/publications/${slug}`), ...fields };
}

function crawlResult(publications: PublicationRecord[], stoppedReason: CrawlResult['stats']['stoppedReason'] = 'frontier_empty'): CrawlResult {
    return {
        publications,
        stats: {
            visited: publications.length + 1,
            parsed: publications.length + 1,
            skipped: 0,
            failed: 0,
            publications: publications.length,
            stoppedReason,
        },
        failedUrls: [],
    };
}

/** Factory whose crawls return the given records; records the budget each crawl got. */
function fakeCrawler(publications: PublicationRecord[]) {
    const budgets: number[] = [];
    const signals: Array<AbortSignal | undefined> = [];
    const factory: CrawlerFactory = async (_seedUrl, config) => {
        budgets.push(config.maxPages);
        return {
            crawl: async (options) => {
                signals.push(options?.signal);
                return crawlResult(publications, options?.signal?.aborted ? 'aborted' : 'frontier_empty');
            },
        };
    };
    return { factory, budgets, signals };
}

/** Factory whose crawl stays pending until released. */
function blockingCrawler(publications: PublicationRecord[]) {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
        release = resolve;
    });
    let starts = 0;
    let signal: AbortSignal | undefined;
    const factory: CrawlerFactory = async () => ({
        crawl: async (options) => {
            starts++;
            signal = options?.signal;
            await gate;
            return crawlResult(publications, signal?.aborted ? 'aborted' : 'frontier_empty');
        },
    });
    return {
        factory,
        release: () => release(),
        starts: () => starts,
        signal: () => signal,
    };
}

describe('pipeline', () => {
    let tmpDir: string;
    let paths: DataPaths;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pubsearch-pipeline-'));
        paths = {
            records: path.join(tmpDir, 'publications.jsonl'),
            index: path.join(tmpDir, 'index.json'),
            status: path.join(tmpDir, 'crawl_status.json'),
        };
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('runPipeline', () => {
        it('should merge, persist records and index, and report counts', async () => {
            saveRecords(paths.records, [record('old', { title: 'Old study of graphs' }), record('kept', { title: 'Kept' })]);
            const { factory } = fakeCrawler([
                record('kept', { title: 'Kept, revised', abstract: 'Now with abstract' }),
                record('fresh', { title: 'Fresh graph results' }),
            ]);

            const { stats, snapshot } = await runPipeline({
                seedUrl: SEED,
                crawl: DEFAULT_CONFIG.crawl,
                paths,
                crawlerFactory: factory,
            });

            expect(stats).toMatchObject({ old_docs: 2, new_docs: 2, added: 1, updated: 1, total_docs: 3 });
            expect(stats.total_time).toBeGreaterThanOrEqual(stats.index_time);

            const stored = loadRecords(paths.records);
            expect(stored.map((r) => r.title)).toEqual(['Old study of graphs', 'Kept, revised', 'Fresh graph results']);
            expect(loadIndex(paths.index).docs.size).toBe(3);
            expect(snapshot.docs.size).toBe(3);
        });

        it('should index the whole merged corpus, not just the new records', async () => {
            saveRecords(paths.records, [record('old', { title: 'Quantum annealing' })]);
            const { factory } = fakeCrawler([record('new', { title: 'Protein folding' })]);

            const { snapshot } = await runPipeline({ seedUrl: SEED, crawl: DEFAULT_CONFIG.crawl, paths, crawlerFactory: factory });

            expect(snapshot.index.has('quantum')).toBe(true);
            expect(snapshot.index.has('protein')).toBe(true);
        });

        it('should keep what an aborted crawl found', async () => {
            const controller = new AbortController();
            controller.abort();
            const { factory } = fakeCrawler([record('partial', { title: 'Partial find' })]);

            const { stats, crawl } = await runPipeline({
                seedUrl: SEED,
                crawl: DEFAULT_CONFIG.crawl,
                paths,
                crawlerFactory: factory,
                signal: controller.signal,
            });

            expect(crawl.stoppedReason).toBe('aborted');
            expect(stats.total_docs).toBe(1);
            expect(loadRecords(paths.records)).toHaveLength(1);
        });

        it('should reject an invalid seed or budget before reading the record store', async () => {
            const { factory, budgets } = fakeCrawler([]);
            // a directory in place of the record file fails on any read
            const unreadable = { ...paths, records: tmpDir };

            await expect(
                runPipeline({ seedUrl: 'not a url', crawl: DEFAULT_CONFIG.crawl, paths: unreadable, crawlerFactory: factory })
            ).rejects.toBeInstanceOf(ConfigError);
            await expect(
                runPipeline({
                    seedUrl: SEED,
                    crawl: { ...DEFAULT_CONFIG.crawl, maxPages: 0 },
                    paths: unreadable,
                    crawlerFactory: factory,
                })
            ).rejects.toBeInstanceOf(ConfigError);
            expect(budgets).toEqual([]);
        });
    });

    describe('rebuildIndex', () => {
        it('should rebuild from the record store and report index stats', () => {
            saveRecords(paths.records, [
                record('a', { title: 'Solar cells' }),
                record('b', { title: 'Wind turbines blades' }),
            ]);

            const { stats, snapshot } = rebuildIndex({ paths });

            expect(stats.documents).toBe(2);
            expect(stats.terms).toBe(snapshot.index.size);
            // solar cell | wind turbin blade
            expect(stats.avg_doc_length).toBe(2.5);
            expect(loadIndex(paths.index).docs.size).toBe(2);
        });
    });

    describe('corpusStats', () => {
        it('should count authors and the plausible year range', () => {
            const records = [
                record('a', { authors: ['Ada', 'Grace'], year: '2018' }),
                record('b', { authors: ['Ada'], year: '2022' }),
                record('c', { year: '1850' }),
                record('d', { year: '' }),
            ];

            const stats = corpusStats(records, buildIndex(records));

            expect(stats.publications).toBe(4);
            expect(stats.unique_authors).toBe(2);
            expect(stats.year_range).toEqual({ min: 2018, max: 2022 });
        });

        it('should report no year range when no record has a year', () => {
            expect(corpusStats([record('a')], buildIndex([])).year_range).toBeNull();
        });
    });

    describe('CrawlScheduler', () => {
        function configFor(dataDir: string): PubSearchConfig {
            return {
                ...DEFAULT_CONFIG,
                seedUrl: SEED,
                storage: { ...DEFAULT_CONFIG.storage, dataDir },
                schedule: { intervalDays: 7, maxPages: 20 },
            };
        }

        it('should publish the crawled snapshot to the handle', async () => {
            const handle = new IndexHandle(paths.index);
            const { factory } = fakeCrawler([record('x', { title: 'Ocean acidification' })]);
            const scheduler = new CrawlScheduler({ config: configFor(tmpDir), handle, crawlerFactory: factory });

            await scheduler.requestCrawl();

            expect(handle.search('ocean')).toHaveLength(1);
            expect(scheduler.running).toBeNull();
        });

        it('should coalesce concurrent crawl requests into one job', async () => {
            const crawler = blockingCrawler([record('x', { title: 'Coral reefs' })]);
            const scheduler = new CrawlScheduler({
                config: configFor(tmpDir),
                handle: new IndexHandle(paths.index),
                crawlerFactory: crawler.factory,
            });

            const first = scheduler.requestCrawl();
            const second = scheduler.requestCrawl();
            expect(second).toBe(first);
            expect(scheduler.running).toBe('crawl');

            crawler.release();
            await first;
            expect(crawler.starts()).toBe(1);
        });

        it('should refuse a rebuild while a crawl runs, and a crawl while a rebuild runs', async () => {
            const crawler = blockingCrawler([]);
            const scheduler = new CrawlScheduler({
                config: configFor(tmpDir),
                handle: new IndexHandle(paths.index),
                crawlerFactory: crawler.factory,
            });

            const crawl = scheduler.requestCrawl();
            expect(() => scheduler.requestRebuild()).toThrow(SchedulerBusyError);
            crawler.release();
            await crawl;

            const rebuild = scheduler.requestRebuild();
            expect(scheduler.requestRebuild()).toBe(rebuild);
            expect(() => scheduler.requestCrawl()).toThrow(SchedulerBusyError);
            await rebuild;
            expect(scheduler.running).toBeNull();
        });

        it('should abort the running crawl on stop', async () => {
            const crawler = blockingCrawler([]);
            const scheduler = new CrawlScheduler({
                config: configFor(tmpDir),
                handle: new IndexHandle(paths.index),
                crawlerFactory: crawler.factory,
            });

            expect(scheduler.stop()).toBe(false);
            const job = scheduler.requestCrawl();
            // let the pipeline reach the crawler
            await new Promise((resolve) => setImmediate(resolve));

            expect(scheduler.stop()).toBe(true);
            expect(crawler.signal()?.aborted).toBe(true);

            crawler.release();
            const result = await job;
            expect(result.crawl.stoppedReason).toBe('aborted');
        });

        it('should require a seed URL', () => {
            const scheduler = new CrawlScheduler({
                config: { ...configFor(tmpDir), seedUrl: undefined },
                handle: new IndexHandle(paths.index),
            });
            expect(() => scheduler.requestCrawl()).toThrow(ConfigError);
        });

        it('should crawl when never crawled or the interval has passed', async () => {
            const { factory, budgets } = fakeCrawler([]);
            const scheduler = new CrawlScheduler({
                config: configFor(tmpDir),
                handle: new IndexHandle(paths.index),
                crawlerFactory: factory,
            });
            const start = new Date('2026-01-01T00:00:00Z');

            expect(scheduler.shouldCrawl(start)).toBe(true);
            expect(scheduler.nextCrawlDate()).toBeNull();

            const job = scheduler.checkAndRun(start);
            expect(job).not.toBeNull();
            await job;
            expect(budgets).toEqual([20]);

            expect(scheduler.readStatus()).toEqual({
                last_crawl_timestamp: start.getTime() / 1000,
                last_crawl_date: '2026-01-01T00:00:00.000Z',
            });
            expect(scheduler.nextCrawlDate()?.toISOString()).toBe('2026-01-08T00:00:00.000Z');
            expect(scheduler.checkAndRun(new Date('2026-01-05T00:00:00Z'))).toBeNull();
            expect(scheduler.shouldCrawl(new Date('2026-01-08T00:00:01Z'))).toBe(true);
        });

        it('should treat an unreadable status file as never crawled', () => {
            fs.writeFileSync(paths.status, '{broken');
            const scheduler = new CrawlScheduler({ config: configFor(tmpDir), handle: new IndexHandle(paths.index) });

            expect(scheduler.readStatus()).toBeNull();
            expect(scheduler.shouldCrawl()).toBe(true);
        });
    });
});
