/**
 * src/engine/rateLimiter.ts
 *
 * Per-worker randomized pacing. Before every dispatch a worker waits until
 * at least `delay` has passed since its own previous dispatch, where `delay`
 * is drawn uniformly from [minDelayMs, maxDelayMs] on each call. The jitter
 * keeps workers from settling into a synchronized burst pattern.
 *
 * Workers are independent: there is no ordering between them.
 */

import { log } from 'crawlee';
import { systemClock } from '../utils/clock.js';
import type { Clock } from '../utils/clock.js';

export interface RateLimiterOptions {
    minDelayMs: number;
    maxDelayMs: number;
    clock?: Clock;
    /** Uniform [0, 1) source. */
    random?: () => number;
}

export class RateLimiter {
    private readonly lastDispatch = new Map<number, number>();
    private readonly minDelayMs: number;
    private readonly maxDelayMs: number;
    private readonly clock: Clock;
    private readonly random: () => number;

    constructor(options: RateLimiterOptions) {
        if (options.maxDelayMs < options.minDelayMs) {
            throw new RangeError(`maxDelayMs (${options.maxDelayMs}) < minDelayMs (${options.minDelayMs})`);
        }
        this.minDelayMs = options.minDelayMs;
        this.maxDelayMs = options.maxDelayMs;
        this.clock = options.clock ?? systemClock;
        this.random = options.random ?? Math.random;
    }

    nextDelayMs(): number {
        return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
    }

    /**
     * Suspends the worker until its delay has elapsed, then stamps the
     * dispatch time. Resolves with the time actually waited. An aborted
     * `signal` ends the pause early.
     */
    async wait(workerId: number, signal?: AbortSignal): Promise<number> {
        const last = this.lastDispatch.get(workerId);
        let waited = 0;

        if (last !== undefined) {
            const delay = this.nextDelayMs();
            const remaining = last + delay - this.clock.now();
            if (remaining > 0) {
                log.debug(`[RateLimiter] Worker ${workerId} pausing ${(remaining / 1000).toFixed(2)}s`);
                const before = this.clock.now();
                await this.clock.sleep(remaining, signal);
                waited = Math.min(remaining, this.clock.now() - before);
            }
        }

        this.lastDispatch.set(workerId, this.clock.now());
        return waited;
    }

    lastDispatchOf(workerId: number): number | undefined {
        return this.lastDispatch.get(workerId);
    }
}
