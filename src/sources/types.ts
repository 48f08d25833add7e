/**
 * src/sources/types.ts
 *
 * Contract between the scheduler and whatever actually talks to the network.
 * A fetcher performs exactly one request per call and reports the outcome to
 * the proxy pool exactly once; retries are the scheduler's business.
 */

import type { FetchResponse, FetchTask, ProxyChoice } from '../engine/types.js';

export interface Fetcher {
    /**
     * Resolves with the raw content, or rejects with a NetworkError,
     * TimeoutError or BlockedError.
     */
    fetch(task: FetchTask, proxy: ProxyChoice): Promise<FetchResponse>;

    /** Releases sockets / browsers. Safe to call more than once. */
    close(): Promise<void>;
}

/** Maps a task to the URL that serves it. */
export type TargetResolver = (task: FetchTask) => string;

export type SerpFetchMode = 'browser' | 'http';
