import { getLogger } from './logger.js';

/**
 * Client errors expected to clear up on their own; every 5xx is transient too.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 425, 429]);

/**
 * Ceiling on a server-requested Retry-After wait.
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Sleep function, injectable so tests do not wait on real timers.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Pacing and retry policy for one polite fetch.
 */
export interface FetchPolicy {
    /** Pause before every attempt */
    delayMs: number;
    /** Total attempts before giving up */
    maxRetries: number;
    /** Backoff between attempts is `backoffBase ** attempt` seconds */
    backoffBase: number;
    /** Hard timeout per attempt (defaults to the client's) */
    timeoutMs?: number;
    /** Ceiling on a Retry-After wait; the computed backoff still applies below it */
    maxRetryAfterMs?: number;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    url: string;
    status: number;
    headers: Record<string, string>;
    body: string;
}

/**
 * Fetch failure: network error, timeout, or non-2xx status.
 * `status` is 0 when no response was received.
 */
export class FetchError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly url: string,
        public readonly retryAfterMs?: number
    ) {
        super(message);
        this.name = 'FetchError';
    }
}

/**
 * HTTP client for crawling: one request at a time, pacing before each attempt,
 * exponential backoff between attempts, a hard timeout per attempt.
 */
export class HttpClient {
    private requestCount = 0;
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly sleep: Sleep;

    constructor(options?: { timeout?: number; userAgent?: string; sleep?: Sleep }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.userAgent = options?.userAgent ?? 'PubSearchCrawler/1.0';
        this.sleep = options?.sleep ?? sleep;
    }

    /**
     * Make a single GET request. Throws FetchError on any failure.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { headers = {}, timeout = this.defaultTimeout } = options;

        this.requestCount++;

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, ...headers },
                redirect: 'follow',
                signal: controller.signal,
            });

            const body = await response.text();

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new FetchError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    isRetryableStatus(response.status),
                    url,
                    parseRetryAfter(response.headers.get('retry-after')) ?? undefined
                );
            }

            return { url, status: response.status, headers: responseHeaders, body };
        } catch (error) {
            if (error instanceof FetchError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                throw new FetchError(`Request timeout after ${timeout}ms: ${url}`, 0, true, url);
            }

            // Anything below HTTP (DNS, reset, refused, TLS) is worth another attempt
            const code = errorCode(error);
            const detail = error instanceof Error ? error.message : String(error);
            throw new FetchError(`Network error${code ? ` (${code})` : ''}: ${detail}`, 0, true, url);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * GET with crawl politeness: sleep `delayMs` before every attempt and retry
     * any failure up to `maxRetries` attempts in total, backing off
     * `backoffBase ** attempt` seconds in between. A Retry-After header can
     * lengthen that wait up to `maxRetryAfterMs`.
     */
    async fetchPolite(url: string, policy: FetchPolicy): Promise<HttpResponse> {
        const logger = getLogger();
        const attempts = Math.max(1, policy.maxRetries);
        let lastError: FetchError | null = null;

        for (let attempt = 0; attempt < attempts; attempt++) {
            await this.sleep(policy.delayMs);

            try {
                return await this.get(url, { timeout: policy.timeoutMs ?? this.defaultTimeout });
            } catch (error) {
                if (!(error instanceof FetchError)) throw error;
                lastError = error;

                if (attempt < attempts - 1) {
                    const backoffMs = retryWait(attempt, policy, error.retryAfterMs);
                    logger.warn(
                        {
                            url,
                            status: error.status,
                            retryable: error.retryable,
                            attempt: attempt + 1,
                            backoffMs,
                            error: error.message,
                        },
                        'Fetch failed, backing off'
                    );
                    await this.sleep(backoffMs);
                }
            }
        }

        logger.error({ url, attempts, error: lastError?.message }, 'Fetch failed after all attempts');
        throw lastError ?? new FetchError(`Max retries exceeded for ${url}`, 0, false, url);
    }

    /**
     * Number of requests sent (attempts, not URLs).
     */
    getRequestCount(): number {
        return this.requestCount;
    }
}

/**
 * Whether a status is usually transient. Reported on FetchError; fetchPolite
 * retries every failure regardless.
 */
export function isRetryableStatus(status: number): boolean {
    return status >= 500 || RETRYABLE_STATUS_CODES.has(status);
}

/**
 * Backoff before retry number `attempt + 1`: `base ** attempt` seconds.
 */
export function calculateBackoff(attempt: number, base: number): number {
    return Math.pow(base, attempt) * 1000;
}

/**
 * Wait before the next attempt: the computed backoff, or a longer Retry-After
 * capped at the policy's ceiling.
 */
export function retryWait(attempt: number, policy: FetchPolicy, retryAfterMs?: number): number {
    const backoffMs = calculateBackoff(attempt, policy.backoffBase);
    if (retryAfterMs === undefined) return backoffMs;
    const ceiling = policy.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;
    return Math.max(backoffMs, Math.min(retryAfterMs, ceiling));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = Number(header);
    if (Number.isFinite(seconds) && header.trim() !== '') return Math.max(0, seconds * 1000);

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Pull the system error code out of undici's `fetch failed` wrapper.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    const cause = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}
