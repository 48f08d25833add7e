/**
 * Time source shared by the rate limiter, proxy pool and scheduler.
 * Tests pass a manual clock so delays resolve instantly and deterministically.
 */
export interface Clock {
    now(): number;
    /** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const done = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, Math.max(0, ms));
        signal?.addEventListener('abort', done, { once: true });
    });
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep,
};
