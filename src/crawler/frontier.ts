import { canonicalize, isHttpUrl } from '../storage/canonicalize.js';

/**
 * FIFO crawl queue with a visited set, both keyed by canonical URL.
 */
export class CrawlFrontier {
    private readonly queue: string[] = [];
    private head = 0;
    private readonly queued = new Set<string>();
    private readonly visited = new Set<string>();

    /**
     * Add a URL unless it is not http(s), already visited, or already waiting.
     * @returns Whether the URL was added
     */
    enqueue(url: string): boolean {
        if (!isHttpUrl(url)) return false;

        const key = canonicalize(url);
        if (this.visited.has(key) || this.queued.has(key)) return false;

        this.queued.add(key);
        this.queue.push(url);
        return true;
    }

    /**
     * Next URL in discovery order, or null when the queue is empty.
     */
    dequeue(): string | null {
        if (this.head >= this.queue.length) return null;

        const url = this.queue[this.head] ?? null;
        this.head++;
        if (url !== null) this.queued.delete(canonicalize(url));

        // Compact once the consumed prefix dominates
        if (this.head > 1024 && this.head * 2 > this.queue.length) {
            this.queue.splice(0, this.head);
            this.head = 0;
        }
        return url;
    }

    /**
     * Record a URL as visited.
     * @returns False when it had already been visited
     */
    markVisited(url: string): boolean {
        const key = canonicalize(url);
        if (this.visited.has(key)) return false;
        this.visited.add(key);
        return true;
    }

    get pending(): number {
        return this.queue.length - this.head;
    }

    get visitedCount(): number {
        return this.visited.size;
    }
}
