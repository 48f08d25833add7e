/**
 * src/engine/backoff.ts
 *
 * Retry delay policy. The scheduler only knows "attempt n failed, how long
 * until the next one"; the curve itself is pluggable.
 *
 * Default formula:
 *   delay = min(baseMs × multiplier^(attempt − 1) + jitter, maxMs)
 */

/** `attempt` is 1-indexed: 1 = first retry. */
export type BackoffPolicy = (attempt: number) => number;

export interface ExponentialBackoffOptions {
    baseMs: number;
    maxMs: number;
    multiplier?: number;
    /** Upper bound of the uniform jitter added before capping. */
    jitterMs?: number;
    random?: () => number;
}

export function exponentialBackoff(options: ExponentialBackoffOptions): BackoffPolicy {
    const multiplier = options.multiplier ?? 2;
    const jitterMs = options.jitterMs ?? Math.round(options.baseMs / 2);
    const random = options.random ?? Math.random;

    return (attempt: number): number => {
        const exponent = Math.max(0, attempt - 1);
        const exponential = options.baseMs * Math.pow(multiplier, exponent);
        const capped = Math.min(exponential + random() * jitterMs, options.maxMs);
        return Math.round(capped);
    };
}

export const noBackoff: BackoffPolicy = () => 0;
