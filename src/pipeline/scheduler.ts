import { existsSync, readFileSync } from 'node:fs';
import type { IndexSnapshot, PubSearchConfig } from '../types/index.js';
import type { TextPipeline } from '../nlp/text-pipeline.js';
import type { IndexHandle } from '../search/index-handle.js';
import { writeFileAtomic } from '../storage/atomic-write.js';
import { resolveDataPaths } from '../utils/config.js';
import { ConfigError, SchedulerBusyError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    rebuildIndex,
    runPipeline,
    type CrawlerFactory,
    type PipelineResult,
    type RebuildStats,
} from './orchestrator.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Persisted record of the last triggered crawl.
 */
export interface CrawlStatus {
    /** Unix time in seconds */
    last_crawl_timestamp: number;
    /** ISO-8601 */
    last_crawl_date: string;
}

export type JobKind = 'crawl' | 'rebuild';

export interface RebuildResult {
    stats: RebuildStats;
    snapshot: IndexSnapshot;
}

export interface CrawlRequest {
    /** Defaults to the configured seed URL */
    seedUrl?: string;
    /** Defaults to the configured crawl budget */
    maxPages?: number;
}

export interface SchedulerOptions {
    config: PubSearchConfig;
    handle: IndexHandle;
    pipeline?: TextPipeline;
    crawlerFactory?: CrawlerFactory;
}

/**
 * Owner of the single crawl/rebuild worker slot.
 *
 * A second request for the job already running gets the running job's promise;
 * a request for the other kind is refused with SchedulerBusyError. Finished
 * jobs publish their snapshot to the IndexHandle.
 */
export class CrawlScheduler {
    private crawlJob: Promise<PipelineResult> | null = null;
    private rebuildJob: Promise<RebuildResult> | null = null;
    private abortController: AbortController | null = null;

    private readonly config: PubSearchConfig;
    private readonly handle: IndexHandle;
    private readonly pipeline: TextPipeline | undefined;
    private readonly crawlerFactory: CrawlerFactory | undefined;
    readonly statusPath: string;

    constructor(options: SchedulerOptions) {
        this.config = options.config;
        this.handle = options.handle;
        this.pipeline = options.pipeline;
        this.crawlerFactory = options.crawlerFactory;
        this.statusPath = resolveDataPaths(options.config.storage).status;
    }

    /**
     * Kind of the job holding the slot, or null when idle.
     */
    get running(): JobKind | null {
        if (this.crawlJob) return 'crawl';
        if (this.rebuildJob) return 'rebuild';
        return null;
    }

    /**
     * Start a crawl, or join the one in flight.
     * @throws SchedulerBusyError synchronously while a rebuild runs
     * @throws ConfigError synchronously when no seed URL is known
     */
    requestCrawl(request: CrawlRequest = {}): Promise<PipelineResult> {
        if (this.crawlJob) {
            getLogger().info('Crawl already running, joining it');
            return this.crawlJob;
        }
        if (this.rebuildJob) throw new SchedulerBusyError('crawl', 'rebuild');

        const seedUrl = request.seedUrl ?? this.config.seedUrl;
        if (!seedUrl) throw new ConfigError('No seed URL configured', 'seedUrl');

        const controller = new AbortController();
        this.abortController = controller;

        const job = (async () => {
            try {
                const result = await runPipeline({
                    seedUrl,
                    crawl: { ...this.config.crawl, maxPages: request.maxPages ?? this.config.crawl.maxPages },
                    paths: resolveDataPaths(this.config.storage),
                    pipeline: this.pipeline,
                    crawlerFactory: this.crawlerFactory,
                    signal: controller.signal,
                });
                this.handle.publish(result.snapshot);
                return result;
            } finally {
                this.crawlJob = null;
                this.abortController = null;
            }
        })();

        this.crawlJob = job;
        return job;
    }

    /**
     * Rebuild the index from the record store, or join the rebuild in flight.
     * @throws SchedulerBusyError synchronously while a crawl runs
     */
    requestRebuild(): Promise<RebuildResult> {
        if (this.rebuildJob) {
            getLogger().info('Rebuild already running, joining it');
            return this.rebuildJob;
        }
        if (this.crawlJob) throw new SchedulerBusyError('rebuild', 'crawl');

        const job = (async () => {
            try {
                // The build is synchronous; yield so `finally` runs after rebuildJob is set
                await Promise.resolve();
                const result = rebuildIndex({
                    paths: resolveDataPaths(this.config.storage),
                    pipeline: this.pipeline,
                });
                this.handle.publish(result.snapshot);
                return result;
            } finally {
                this.rebuildJob = null;
            }
        })();

        this.rebuildJob = job;
        return job;
    }

    /**
     * Ask the running crawl to stop after the current page.
     * @returns Whether there was a crawl to stop
     */
    stop(): boolean {
        if (!this.abortController) return false;
        getLogger().info('Stopping crawl after the current page');
        this.abortController.abort();
        return true;
    }

    /**
     * True when no crawl was ever recorded or the last one is older than the interval.
     */
    shouldCrawl(now: Date = new Date()): boolean {
        const status = this.readStatus();
        if (!status) return true;
        return now.getTime() - status.last_crawl_timestamp * 1000 > this.config.schedule.intervalDays * DAY_MS;
    }

    /**
     * When due, record the crawl as triggered and start it with the scheduled
     * page budget.
     * @returns The crawl job, or null when not due or the slot is taken by a rebuild
     */
    checkAndRun(now: Date = new Date()): Promise<PipelineResult> | null {
        if (!this.shouldCrawl(now)) {
            getLogger().debug({ next: this.nextCrawlDate()?.toISOString() }, 'Scheduled crawl not due');
            return null;
        }
        if (this.rebuildJob) {
            getLogger().warn('Scheduled crawl due but a rebuild is running, skipping');
            return null;
        }

        getLogger().info({ intervalDays: this.config.schedule.intervalDays }, 'Crawl interval reached, starting crawl');
        // Status records when a crawl was triggered, not when it finished
        this.writeStatus(now);
        return this.requestCrawl({ maxPages: this.config.schedule.maxPages });
    }

    /**
     * Last crawl + interval, or null when no crawl was recorded.
     */
    nextCrawlDate(): Date | null {
        const status = this.readStatus();
        if (!status) return null;
        return new Date(status.last_crawl_timestamp * 1000 + this.config.schedule.intervalDays * DAY_MS);
    }

    /**
     * Status file contents; unreadable or malformed files count as "never crawled".
     */
    readStatus(): CrawlStatus | null {
        if (!existsSync(this.statusPath)) return null;

        try {
            const raw: unknown = JSON.parse(readFileSync(this.statusPath, 'utf-8'));
            if (
                typeof raw === 'object' &&
                raw !== null &&
                'last_crawl_timestamp' in raw &&
                typeof raw.last_crawl_timestamp === 'number' &&
                raw.last_crawl_timestamp > 0
            ) {
                const date = 'last_crawl_date' in raw && typeof raw.last_crawl_date === 'string' ? raw.last_crawl_date : '';
                return { last_crawl_timestamp: raw.last_crawl_timestamp, last_crawl_date: date };
            }
            getLogger().warn({ path: this.statusPath }, 'Crawl status file has no timestamp');
        } catch (error) {
            getLogger().error({ path: this.statusPath, error: errorMessage(error) }, 'Error reading crawl status');
        }
        return null;
    }

    writeStatus(now: Date = new Date()): CrawlStatus {
        const status: CrawlStatus = {
            last_crawl_timestamp: now.getTime() / 1000,
            last_crawl_date: now.toISOString(),
        };
        writeFileAtomic(this.statusPath, JSON.stringify(status, null, 2) + '\n');
        return status;
    }
}
