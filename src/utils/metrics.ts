/**
 * src/utils/metrics.ts
 *
 * Per-run metrics accumulator fed by EngineEvents.
 *
 * • Pure in-memory, one instance per run. Nothing here touches the engine:
 *   it only listens, so a run with no metrics attached behaves the same.
 *
 * • Response times go into a ring buffer of the last 100 fetches; the
 *   average is computed on read.
 */

import { log } from 'crawlee';
import type { EngineEvents } from '../engine/events.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface MetricsSnapshot {
    /** Fetch attempts dispatched (retries included). */
    requestsStarted: number;
    requestsSucceeded: number;
    /** Tasks that ended in a terminal failure. */
    requestsFailed: number;
    requestsRetried: number;
    /** Success rate 0–100 over settled tasks. */
    successRatePct: number;
    /** Retries caused by a block page. */
    blockedResponses: number;
    proxiesQuarantined: number;
    /** Result blocks dropped by the extractor. */
    itemsSkipped: number;
    keywordsDiscovered: number;
    /** Average fetch time over the last 100 successful fetches. */
    avgResponseTimeMs: number;
    startedAt: number;
    uptimeSeconds: number;
}

const RT_RING_SIZE = 100;

// ─── Accumulator ──────────────────────────────────────────────────────────────

export class RunMetrics {
    private requestsStarted = 0;
    private requestsSucceeded = 0;
    private requestsFailed = 0;
    private requestsRetried = 0;
    private blockedResponses = 0;
    private proxiesQuarantined = 0;
    private itemsSkipped = 0;
    private keywordsDiscovered = 0;
    private readonly responseTimes: number[] = [];
    private readonly startedAt: number;

    constructor(private readonly clock: Clock = systemClock) {
        this.startedAt = clock.now();
    }

    /** Subscribes to `events`; returns a function that detaches again. */
    attach(events: EngineEvents): () => void {
        const unsubscribers = [
            events.on('task:started', () => { this.requestsStarted++; }),
            events.on('task:succeeded', ({ durationMs }) => {
                this.requestsSucceeded++;
                this.recordResponseTime(durationMs);
            }),
            events.on('task:retrying', ({ kind }) => {
                this.requestsRetried++;
                if (kind === 'blocked') this.blockedResponses++;
            }),
            events.on('task:failed', ({ kind }) => {
                this.requestsFailed++;
                if (kind === 'blocked') this.blockedResponses++;
            }),
            events.on('proxy:quarantined', () => { this.proxiesQuarantined++; }),
            events.on('extract:skipped', ({ skipped }) => { this.itemsSkipped += skipped; }),
            events.on('keyword:discovered', () => { this.keywordsDiscovered++; }),
        ];
        return () => unsubscribers.forEach((off) => off());
    }

    snapshot(): MetricsSnapshot {
        const settled = this.requestsSucceeded + this.requestsFailed;
        const successRatePct = settled > 0
            ? Math.round((this.requestsSucceeded / settled) * 100)
            : 100;
        const avgResponseTimeMs = this.responseTimes.length > 0
            ? Math.round(this.responseTimes.reduce((a, b) => a + b, 0) / this.responseTimes.length)
            : 0;

        return {
            requestsStarted: this.requestsStarted,
            requestsSucceeded: this.requestsSucceeded,
            requestsFailed: this.requestsFailed,
            requestsRetried: this.requestsRetried,
            successRatePct,
            blockedResponses: this.blockedResponses,
            proxiesQuarantined: this.proxiesQuarantined,
            itemsSkipped: this.itemsSkipped,
            keywordsDiscovered: this.keywordsDiscovered,
            avgResponseTimeMs,
            startedAt: this.startedAt,
            uptimeSeconds: Math.round((this.clock.now() - this.startedAt) / 1000),
        };
    }

    /** Compact one-line summary to the Crawlee log. */
    logSummary(): void {
        const s = this.snapshot();
        log.info(
            `[Metrics] ✓${s.requestsSucceeded} ✗${s.requestsFailed} ↻${s.requestsRetried} ` +
            `(${s.successRatePct}% ok) | ` +
            `blocked:${s.blockedResponses} quarantined:${s.proxiesQuarantined} | ` +
            `keywords:${s.keywordsDiscovered} skipped:${s.itemsSkipped} | ` +
            `avgRt:${s.avgResponseTimeMs}ms | ${s.uptimeSeconds}s`
        );
    }

    private recordResponseTime(ms: number): void {
        if (!Number.isFinite(ms) || ms < 0) return;
        if (this.responseTimes.length >= RT_RING_SIZE) this.responseTimes.shift();
        this.responseTimes.push(ms);
    }
}
