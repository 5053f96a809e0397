import robotsParser, { type Robot } from 'robots-parser';
import { FetchError, type HttpClient } from '../utils/http-client.js';
import { RobotsUnavailableError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * robots.txt rules for one origin, fetched once per crawl.
 *
 * When the file cannot be fetched (network error, timeout, non-2xx) the policy
 * is permissive: every URL is allowed and there is no crawl-delay.
 */
export class RobotsPolicy {
    private constructor(
        readonly robotsUrl: string,
        private readonly userAgent: string,
        private readonly robots: Robot | null
    ) {}

    /**
     * Fetch and parse `<origin>/robots.txt` of the seed URL. A single attempt,
     * no retries.
     */
    static async load(
        seedUrl: string,
        http: HttpClient,
        options: { userAgent: string; timeoutMs: number }
    ): Promise<RobotsPolicy> {
        const robotsUrl = robotsUrlFor(seedUrl);

        try {
            const response = await http.get(robotsUrl, { timeout: options.timeoutMs });
            const policy = RobotsPolicy.fromText(robotsUrl, response.body, options.userAgent);
            getLogger().info(
                { robotsUrl, crawlDelaySeconds: policy.crawlDelaySeconds },
                'Loaded robots.txt'
            );
            return policy;
        } catch (error) {
            const unavailable = new RobotsUnavailableError(
                `Could not load robots.txt: ${errorMessage(error)}`,
                robotsUrl,
                error instanceof FetchError && error.status > 0 ? error.status : undefined
            );
            getLogger().warn(
                { robotsUrl, status: unavailable.status, error: unavailable.message },
                'robots.txt unavailable, crawling without rules'
            );
            return RobotsPolicy.permissive(robotsUrl, options.userAgent);
        }
    }

    /**
     * Policy from robots.txt text already in hand.
     */
    static fromText(robotsUrl: string, text: string, userAgent: string): RobotsPolicy {
        return new RobotsPolicy(robotsUrl, userAgent, robotsParser(robotsUrl, text));
    }

    /**
     * Policy that allows everything.
     */
    static permissive(robotsUrl: string, userAgent: string): RobotsPolicy {
        return new RobotsPolicy(robotsUrl, userAgent, null);
    }

    /**
     * Whether robots.txt loaded; false for a permissive fallback.
     */
    get loaded(): boolean {
        return this.robots !== null;
    }

    isAllowed(url: string): boolean {
        if (!this.robots) return true;
        // undefined: URL is on another origin than this robots.txt
        return this.robots.isAllowed(url, this.userAgent) ?? true;
    }

    /**
     * Crawl-delay for our agent (falling back to the `*` group), 0 when unset.
     */
    get crawlDelaySeconds(): number {
        if (!this.robots) return 0;
        const delay = this.robots.getCrawlDelay(this.userAgent) ?? this.robots.getCrawlDelay('*');
        return delay !== undefined && Number.isFinite(delay) && delay > 0 ? delay : 0;
    }
}

/**
 * `<scheme>://<host>/robots.txt` for any URL on the origin.
 */
export function robotsUrlFor(url: string): string {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/robots.txt`;
}
