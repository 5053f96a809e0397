import type { CrawlConfig, PageExtractor, PublicationRecord } from '../types/index.js';
import { sameHost } from '../storage/canonicalize.js';
import { HttpClient, type FetchPolicy, type Sleep } from '../utils/http-client.js';
import { validateCrawlTarget } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { PortalPageExtractor } from '../sources/portal-extractor.js';
import { CrawlFrontier } from './frontier.js';
import { RobotsPolicy } from './robots.js';

/**
 * Why a crawl ended.
 */
export type StopReason = 'frontier_empty' | 'page_budget' | 'aborted';

/**
 * Per-crawl counters. `visited` counts pages taken off the queue, whatever
 * became of them.
 */
export interface CrawlStats {
    visited: number;
    parsed: number;
    skipped: number;
    failed: number;
    publications: number;
    stoppedReason: StopReason;
}

export interface CrawlResult {
    publications: PublicationRecord[];
    stats: CrawlStats;
    /** Pages that could not be fetched or extracted */
    failedUrls: string[];
}

/**
 * Collaborators a crawler can be given instead of the defaults.
 */
export interface CrawlerDeps {
    http?: HttpClient;
    extractor?: PageExtractor;
    sleep?: Sleep;
}

/**
 * Breadth-first crawler for one portal host.
 *
 * One request in flight at a time. Every attempt is preceded by the politeness
 * delay (the larger of the configured delay and robots.txt crawl-delay), and
 * cancellation is checked between pages.
 */
export class PoliteCrawler {
    private constructor(
        readonly seedUrl: string,
        private readonly config: CrawlConfig,
        private readonly http: HttpClient,
        private readonly extractor: PageExtractor,
        readonly robots: RobotsPolicy
    ) {}

    /**
     * Validate settings, then load robots.txt for the seed's origin.
     * @throws ConfigError before any network I/O when the seed or settings are invalid
     */
    static async create(seedUrl: string, config: CrawlConfig, deps: CrawlerDeps = {}): Promise<PoliteCrawler> {
        validateCrawlTarget(seedUrl, config);
        const seed = seedUrl.trim();

        const http =
            deps.http ??
            new HttpClient({
                timeout: config.timeoutSeconds * 1000,
                userAgent: config.userAgent,
                sleep: deps.sleep,
            });
        const extractor = deps.extractor ?? new PortalPageExtractor({ publicationPattern: config.publicationPattern });

        const robots = await RobotsPolicy.load(seed, http, {
            userAgent: config.userAgent,
            timeoutMs: config.robotsTimeoutSeconds * 1000,
        });

        return new PoliteCrawler(seed, config, http, extractor, robots);
    }

    /**
     * Seconds slept before each request.
     */
    get effectiveDelaySeconds(): number {
        return Math.max(this.config.delaySeconds, this.robots.crawlDelaySeconds);
    }

    /**
     * Run the crawl to completion, budget exhaustion, or abort.
     * Fetch failures are recorded and never end the crawl.
     */
    async crawl(options: { signal?: AbortSignal } = {}): Promise<CrawlResult> {
        const logger = getLogger();
        const { signal } = options;
        const { maxPages, sameDomainOnly } = this.config;

        const frontier = new CrawlFrontier();
        frontier.enqueue(this.seedUrl);

        const publications: PublicationRecord[] = [];
        const failedUrls: string[] = [];
        const counts = { parsed: 0, skipped: 0, failed: 0 };

        const policy: FetchPolicy = {
            delayMs: this.effectiveDelaySeconds * 1000,
            maxRetries: this.config.maxRetries,
            backoffBase: this.config.retryBackoffBase,
            timeoutMs: this.config.timeoutSeconds * 1000,
        };

        logger.info(
            { seedUrl: this.seedUrl, maxPages, delaySeconds: this.effectiveDelaySeconds },
            'Starting crawl'
        );

        let stoppedReason: StopReason = 'frontier_empty';

        for (;;) {
            if (signal?.aborted) {
                stoppedReason = 'aborted';
                break;
            }
            if (frontier.visitedCount >= maxPages) {
                stoppedReason = frontier.pending > 0 ? 'page_budget' : 'frontier_empty';
                break;
            }

            const url = frontier.dequeue();
            if (url === null) break;
            if (!frontier.markVisited(url)) continue;

            if (sameDomainOnly && !sameHost(this.seedUrl, url)) {
                counts.skipped++;
                logger.debug({ url }, 'Skipping off-domain URL');
                continue;
            }

            if (!this.robots.isAllowed(url)) {
                counts.skipped++;
                logger.debug({ url }, 'Blocked by robots.txt');
                continue;
            }

            // ── fetching ──
            let html: string;
            try {
                const response = await this.http.fetchPolite(url, policy);
                html = response.body;
            } catch (error) {
                counts.failed++;
                failedUrls.push(url);
                logger.error({ url, error: errorMessage(error) }, 'Skipping page after fetch failure');
                continue;
            }

            // ── parsing ──
            try {
                const page = this.extractor.extract(url, html);

                for (const link of page.publicationLinks) {
                    frontier.enqueue(link);
                }
                for (const link of page.links) {
                    if (this.shouldFollow(link)) frontier.enqueue(link);
                }

                if (page.publication) {
                    publications.push(page.publication);
                    logger.info({ url, title: page.publication.title.slice(0, 60) }, 'Parsed publication');
                }
                counts.parsed++;
            } catch (error) {
                counts.failed++;
                failedUrls.push(url);
                logger.error({ url, error: errorMessage(error) }, 'Extraction failed');
            }
        }

        const stats: CrawlStats = {
            visited: frontier.visitedCount,
            ...counts,
            publications: publications.length,
            stoppedReason,
        };
        logger.info({ ...stats, requests: this.http.getRequestCount() }, 'Crawl complete');

        return { publications, stats, failedUrls };
    }

    /**
     * Generic links: on the seed host (when restricted) and matching a follow
     * pattern (all links when no patterns are configured).
     */
    private shouldFollow(link: string): boolean {
        if (this.config.sameDomainOnly && !sameHost(this.seedUrl, link)) return false;
        const patterns = this.config.followPatterns;
        return patterns.length === 0 || patterns.some((pattern) => link.includes(pattern));
    }
}
