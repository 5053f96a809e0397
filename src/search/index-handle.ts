import type { IndexSnapshot, SearchResult } from '../types/index.js';
import { emptySnapshot } from '../indexer/index-builder.js';
import { loadIndex } from '../storage/index-store.js';
import { getLogger } from '../utils/logger.js';
import { search, type SearchOptions } from './search.js';

/**
 * Owner of the index file path and the snapshot currently served to queries.
 *
 * A snapshot is never mutated after publication; rebuilds produce a new one and
 * swap it in with `publish()`. Readers grab `current()` once per query, so a
 * swap mid-query cannot mix two snapshots.
 */
export class IndexHandle {
    private snapshot: IndexSnapshot;
    private loadedAtMs: number | null = null;
    private lastLoadMs = 0;

    constructor(
        readonly path: string,
        snapshot: IndexSnapshot = emptySnapshot()
    ) {
        this.snapshot = snapshot;
    }

    /**
     * Open a handle and load the index file. A missing file yields an empty index.
     */
    static open(path: string): IndexHandle {
        const handle = new IndexHandle(path);
        handle.reload();
        return handle;
    }

    current(): IndexSnapshot {
        return this.snapshot;
    }

    /**
     * Re-read the index file. On failure the previous snapshot stays in place
     * and the error propagates.
     */
    reload(): IndexSnapshot {
        const start = performance.now();
        let next: IndexSnapshot;
        try {
            next = loadIndex(this.path);
        } catch (error) {
            getLogger().error({ path: this.path, error }, 'Index reload failed, keeping previous snapshot');
            throw error;
        }
        this.lastLoadMs = performance.now() - start;
        this.swap(next);
        getLogger().info(
            { path: this.path, documents: next.docs.size, loadTimeMs: Math.round(this.lastLoadMs) },
            'Index loaded'
        );
        return next;
    }

    /**
     * Serve a freshly built snapshot.
     */
    publish(snapshot: IndexSnapshot): void {
        this.swap(snapshot);
        getLogger().debug({ documents: snapshot.docs.size }, 'Published index snapshot');
    }

    search(query: string, options: SearchOptions = {}): SearchResult[] {
        return search(query, this.current(), options);
    }

    /**
     * When the current snapshot was loaded or published, null before either.
     */
    get loadedAt(): Date | null {
        return this.loadedAtMs === null ? null : new Date(this.loadedAtMs);
    }

    /**
     * Duration of the last file load in milliseconds.
     */
    get loadTimeMs(): number {
        return this.lastLoadMs;
    }

    private swap(snapshot: IndexSnapshot): void {
        this.snapshot = snapshot;
        this.loadedAtMs = Date.now();
    }
}
