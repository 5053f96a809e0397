/**
 * Error taxonomy shared across the crawl, index and search paths.
 * `FetchError` lives next to the HTTP client that raises it.
 */

/**
 * Invalid configuration, detected before any network or file I/O.
 * The only error class that is meant to stop the process.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly field?: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * robots.txt could not be fetched; the crawl continues without rules.
 */
export class RobotsUnavailableError extends Error {
    constructor(
        message: string,
        public readonly robotsUrl: string,
        public readonly status?: number
    ) {
        super(message);
        this.name = 'RobotsUnavailableError';
    }
}

/**
 * An index file exists but is not a valid index document.
 */
export class IndexFormatError extends Error {
    constructor(
        message: string,
        public readonly path: string
    ) {
        super(message);
        this.name = 'IndexFormatError';
    }
}

/**
 * A crawl or rebuild was requested while a different job holds the worker slot.
 */
export class SchedulerBusyError extends Error {
    constructor(
        public readonly requested: string,
        public readonly running: string
    ) {
        super(`Cannot start ${requested}: ${running} is already running`);
        this.name = 'SchedulerBusyError';
    }
}

/**
 * Render any thrown value as a message for logs.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
