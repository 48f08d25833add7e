/**
 * src/sources/baseFetcher.ts
 *
 * Shared fetch pipeline. Subclasses implement `request()` (one raw HTTP call
 * or one page render); this class adds the hard timeout, block detection,
 * failure classification and the single proxy report per call.
 */

import { log } from 'crawlee';
import { BlockedError, HarvesterError, NetworkError, TimeoutError, errorMessage } from '../engine/errors.js';
import type { ProxyPool } from '../engine/proxyPool.js';
import { proxyLabel } from '../engine/types.js';
import type { FetchResponse, FetchTask, ProxyChoice, ProxyOutcome } from '../engine/types.js';
import { HardTimeoutError, withHardTimeout } from '../utils/timeout.js';
import { detectBlockPage } from './blockDetection.js';
import type { BlockDetector, InspectedResponse } from './blockDetection.js';
import type { Fetcher, TargetResolver } from './types.js';

export interface BaseFetcherOptions {
    proxyPool: ProxyPool;
    resolveUrl: TargetResolver;
    timeoutMs: number;
    detectBlock?: BlockDetector;
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/** Library timeouts (got, Playwright) all surface as an Error named TimeoutError. */
export function isTimeoutError(err: unknown): boolean {
    if (err instanceof HardTimeoutError || err instanceof TimeoutError) return true;
    if (!(err instanceof Error)) return false;
    if (err.name === 'TimeoutError') return true;
    const code = 'code' in err ? err.code : undefined;
    return typeof code === 'string' && TIMEOUT_CODES.has(code);
}

export abstract class BaseFetcher implements Fetcher {
    protected readonly proxyPool: ProxyPool;
    protected readonly resolveUrl: TargetResolver;
    protected readonly timeoutMs: number;
    private readonly detectBlock: BlockDetector;

    protected constructor(options: BaseFetcherOptions) {
        this.proxyPool = options.proxyPool;
        this.resolveUrl = options.resolveUrl;
        this.timeoutMs = options.timeoutMs;
        this.detectBlock = options.detectBlock ?? detectBlockPage;
    }

    protected abstract readonly name: string;

    protected abstract request(url: string, proxy: ProxyChoice, timeoutMs: number): Promise<InspectedResponse>;

    abstract close(): Promise<void>;

    async fetch(task: FetchTask, proxy: ProxyChoice): Promise<FetchResponse> {
        const url = this.resolveUrl(task);
        const startedAt = Date.now();
        let outcome: ProxyOutcome = 'failure';

        log.debug(`[${this.name}] GET ${url} via ${proxyLabel(proxy)}`);

        try {
            const raw = await withHardTimeout(this.request(url, proxy, this.timeoutMs), this.timeoutMs);

            const blockReason = this.detectBlock(raw);
            if (blockReason) {
                outcome = 'blocked';
                throw new BlockedError(blockReason, raw.statusCode);
            }
            if (raw.statusCode >= 400) {
                throw new NetworkError(`HTTP ${raw.statusCode} from ${url}`);
            }

            outcome = 'success';
            return {
                content: raw.body,
                statusCode: raw.statusCode,
                url: raw.finalUrl,
                durationMs: Date.now() - startedAt,
            };
        } catch (err) {
            throw this.classify(err);
        } finally {
            this.proxyPool.report(proxy, outcome);
        }
    }

    protected classify(err: unknown): HarvesterError {
        if (err instanceof HarvesterError) return err;
        if (isTimeoutError(err)) return new TimeoutError(this.timeoutMs, { cause: err });
        return new NetworkError(errorMessage(err), { cause: err });
    }
}
