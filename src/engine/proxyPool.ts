/**
 * src/engine/proxyPool.ts
 *
 * Health-scored proxy rotation with quarantine.
 *
 * SCORING
 * ───────
 *   health = successes − 2 × consecutiveFailures
 *
 * acquire() hands out the healthiest proxy that is not quarantined, breaking
 * ties by least-recently-used. A proxy that fails `quarantineThreshold`
 * times in a row (default 3), or serves a single block page, sits out for
 * `cooldownMs`. When the cooldown ends it comes back with a neutral score.
 *
 * When every proxy is quarantined acquire() waits for the earliest cooldown
 * to expire, unless direct fallback is allowed.
 *
 * Selection and report() are synchronous: no two workers ever observe a
 * half-updated record.
 */

import { log } from 'crawlee';
import type { EngineEvents } from './events.js';
import { DIRECT, proxyLabel } from './types.js';
import type { ProxyChoice, ProxyOutcome, ProxyRecord } from './types.js';
import { systemClock } from '../utils/clock.js';
import type { Clock } from '../utils/clock.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ProxyPoolOptions {
    /** Without rotation every request goes out direct. */
    rotate: boolean;
    quarantineThreshold?: number;
    cooldownMs?: number;
    /** Use DIRECT instead of waiting when every proxy is quarantined. */
    allowDirectFallback?: boolean;
    clock?: Clock;
    events?: EngineEvents;
}

export interface AcquireOptions {
    /** Proxy used by the previous attempt; another one is preferred if eligible. */
    avoid?: ProxyChoice | null;
    /** Ends a cooldown wait early; acquire() then resolves with DIRECT. */
    signal?: AbortSignal;
}

export const DEFAULT_QUARANTINE_THRESHOLD = 3;
export const DEFAULT_COOLDOWN_MS = 5 * 60_000;

// ─── Helpers ──────────────────────────────────────────────────────────────────

function computeHealth(record: ProxyRecord): number {
    return record.successes - 2 * record.consecutiveFailures;
}

export function isValidProxyUrl(url: string): boolean {
    return /^(http|https|socks5):\/\/.+/i.test(url.trim());
}

// ─── Pool ─────────────────────────────────────────────────────────────────────

export class ProxyPool {
    private readonly records: ProxyRecord[];
    private readonly rotate: boolean;
    private readonly threshold: number;
    private readonly cooldownMs: number;
    private readonly allowDirectFallback: boolean;
    private readonly clock: Clock;
    private readonly events: EngineEvents | undefined;

    /** Tie-breaker when two proxies share a lastUsedAt millisecond. */
    private readonly useOrder = new Map<ProxyRecord, number>();
    private useCounter = 0;

    constructor(endpoints: readonly string[], options: ProxyPoolOptions) {
        this.rotate = options.rotate;
        this.threshold = options.quarantineThreshold ?? DEFAULT_QUARANTINE_THRESHOLD;
        this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
        this.allowDirectFallback = options.allowDirectFallback ?? false;
        this.clock = options.clock ?? systemClock;
        this.events = options.events;

        const unique = [...new Set(endpoints.map((e) => e.trim()).filter(Boolean))];
        for (const endpoint of unique) {
            if (!isValidProxyUrl(endpoint)) {
                log.warning(`[ProxyPool] Ignoring malformed proxy URL: ${endpoint}`);
            }
        }
        this.records = unique.filter(isValidProxyUrl).map((endpoint) => ({
            endpoint,
            health: 0,
            successes: 0,
            consecutiveFailures: 0,
            lastUsedAt: 0,
            quarantinedUntil: null,
        }));

        if (this.records.length > 0 && !this.rotate) {
            log.warning(`[ProxyPool] ${this.records.length} proxies configured but rotation is disabled; requests go out direct.`);
        }
    }

    get size(): number {
        return this.records.length;
    }

    get rotationEnabled(): boolean {
        return this.rotate && this.records.length > 0;
    }

    /**
     * Returns the proxy for the next request, DIRECT when there is nothing to
     * rotate. Only suspends when every proxy is quarantined, and an aborted
     * `signal` cuts that wait short with DIRECT, so callers re-check their own
     * stop state before using the result.
     */
    async acquire(options: AcquireOptions = {}): Promise<ProxyChoice> {
        if (!this.rotationEnabled) return DIRECT;

        for (;;) {
            const now = this.clock.now();
            this.releaseExpired(now);

            const eligible = this.records.filter((r) => r.quarantinedUntil === null);
            if (eligible.length > 0) {
                const avoid = options.avoid;
                const candidates = eligible.length > 1 && avoid && avoid !== DIRECT
                    ? eligible.filter((r) => r !== avoid)
                    : eligible;
                const chosen = this.pickBest(candidates);
                chosen.lastUsedAt = now;
                this.useOrder.set(chosen, ++this.useCounter);
                return chosen;
            }

            if (this.allowDirectFallback) {
                log.warning('[ProxyPool] All proxies quarantined, falling back to direct connection.');
                return DIRECT;
            }

            const earliest = Math.min(...this.records.map((r) => r.quarantinedUntil ?? Infinity));
            const waitMs = Math.max(0, earliest - now);
            log.info(`[ProxyPool] All ${this.records.length} proxies quarantined. Waiting ${(waitMs / 1000).toFixed(1)}s for the first cooldown.`);
            await this.clock.sleep(waitMs, options.signal);
            if (options.signal?.aborted) return DIRECT;
        }
    }

    /** Records the outcome of one fetch. Reports for DIRECT are ignored. */
    report(proxy: ProxyChoice, outcome: ProxyOutcome): void {
        if (proxy === DIRECT) return;

        switch (outcome) {
            case 'success':
                proxy.successes++;
                proxy.consecutiveFailures = 0;
                break;
            case 'failure':
                proxy.consecutiveFailures++;
                if (proxy.consecutiveFailures >= this.threshold) {
                    this.quarantine(proxy, 'failures');
                }
                break;
            case 'blocked':
                proxy.consecutiveFailures++;
                this.quarantine(proxy, 'blocked');
                break;
        }
        proxy.health = computeHealth(proxy);
    }

    isQuarantined(endpoint: string): boolean {
        const now = this.clock.now();
        const record = this.records.find((r) => r.endpoint === endpoint);
        return record !== undefined && record.quarantinedUntil !== null && record.quarantinedUntil > now;
    }

    snapshot(): ProxyRecord[] {
        return this.records.map((r) => ({ ...r }));
    }

    // ─── Internals ────────────────────────────────────────────────────────────

    private pickBest(candidates: ProxyRecord[]): ProxyRecord {
        let best = candidates[0];
        for (const candidate of candidates.slice(1)) {
            if (candidate.health > best.health) {
                best = candidate;
            } else if (candidate.health === best.health && this.usedBefore(candidate, best)) {
                best = candidate;
            }
        }
        return best;
    }

    private usedBefore(a: ProxyRecord, b: ProxyRecord): boolean {
        if (a.lastUsedAt !== b.lastUsedAt) return a.lastUsedAt < b.lastUsedAt;
        return (this.useOrder.get(a) ?? 0) < (this.useOrder.get(b) ?? 0);
    }

    private quarantine(proxy: ProxyRecord, reason: 'blocked' | 'failures'): void {
        if (proxy.quarantinedUntil !== null) return;

        const until = this.clock.now() + this.cooldownMs;
        proxy.quarantinedUntil = until;
        log.warning(
            `[ProxyPool] Quarantined ${proxyLabel(proxy)} for ${(this.cooldownMs / 1000).toFixed(0)}s ` +
            `(${reason === 'blocked' ? 'block page' : `${proxy.consecutiveFailures} consecutive failures`}).`
        );
        this.events?.emit('proxy:quarantined', { proxy: proxyLabel(proxy), until, reason });
    }

    private releaseExpired(now: number): void {
        for (const record of this.records) {
            if (record.quarantinedUntil !== null && record.quarantinedUntil <= now) {
                record.quarantinedUntil = null;
                record.successes = 0;
                record.consecutiveFailures = 0;
                record.health = 0;
                log.info(`[ProxyPool] ${proxyLabel(record)} back in rotation.`);
                this.events?.emit('proxy:restored', { proxy: proxyLabel(record) });
            }
        }
    }
}
