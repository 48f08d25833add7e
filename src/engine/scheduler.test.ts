import { describe, it, expect } from 'vitest';
import { ResultAggregator } from './aggregator.js';
import { exponentialBackoff } from './backoff.js';
import type { BackoffPolicy } from './backoff.js';
import { Deduplicator } from './dedup.js';
import { ParseError } from './errors.js';
import { EngineEvents } from './events.js';
import { ProxyPool } from './proxyPool.js';
import { RateLimiter } from './rateLimiter.js';
import { Scheduler } from './scheduler.js';
import { ManualClock, ScriptedFetcher, ok, serpPage } from '../testing/fakes.js';
import type { Script } from '../testing/fakes.js';

const P1 = 'http://p1.test:8000';
const P2 = 'http://p2.test:8000';
const P3 = 'http://p3.test:8000';

const BLOCK_PAGE = '<html><body>Our systems have detected unusual traffic from your computer network.</body></html>';

/** sleep() only ends when the run is stopped. */
class StalledClock extends ManualClock {
    override async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        this.sleeps.push(ms);
        if (!signal || signal.aborted) return;
        await new Promise<void>((resolve) => {
            signal.addEventListener('abort', () => resolve(), { once: true });
        });
    }
}

interface SetupOptions {
    proxies?: string[];
    maxConcurrency?: number;
    maxRetries?: number;
    maxRequests?: number;
    backoff?: BackoffPolicy;
    clock?: ManualClock;
}

function setup(script: Script, options: SetupOptions = {}) {
    const clock = options.clock ?? new ManualClock();
    const events = new EngineEvents();
    const proxies = options.proxies ?? [];
    const proxyPool = new ProxyPool(proxies, { rotate: proxies.length > 0, clock, events });
    const fetcher = new ScriptedFetcher({
        proxyPool,
        resolveUrl: (task) => `https://search.test/?q=${encodeURIComponent(task.target)}&p=${task.page}`,
        timeoutMs: 5_000,
    }, script);
    const aggregator = new ResultAggregator();
    const scheduler = new Scheduler({
        fetcher,
        proxyPool,
        rateLimiter: new RateLimiter({ minDelayMs: 0, maxDelayMs: 0, clock }),
        dedup: new Deduplicator(),
        backoff: options.backoff ?? exponentialBackoff({ baseMs: 1_000, maxMs: 30_000, jitterMs: 0 }),
        maxConcurrency: options.maxConcurrency ?? 1,
        maxRetries: options.maxRetries ?? 3,
        maxRequests: options.maxRequests,
        failures: aggregator,
        events,
        clock,
    });
    return { clock, events, proxyPool, fetcher, aggregator, scheduler };
}

describe('Scheduler', () => {
    it('rejects a concurrency below one', () => {
        expect(() => setup(() => ok(''), { maxConcurrency: 0 })).toThrow(RangeError);
    });

    it('accepts each (keyword, purpose, page) once', async () => {
        const { scheduler, fetcher } = setup(() => ok(serpPage([])));
        scheduler.handle('scrape', () => undefined);

        expect(scheduler.submit({ target: 'coffee', purpose: 'scrape' })).toBe(true);
        expect(scheduler.submit({ target: '  Coffee ', purpose: 'scrape' })).toBe(false);
        expect(scheduler.submit({ target: 'coffee', purpose: 'scrape', page: 2 })).toBe(true);
        expect(scheduler.submit({ target: 'coffee', purpose: 'suggest' })).toBe(true);
        expect(scheduler.submit({ target: '   ', purpose: 'scrape' })).toBe(false);
        scheduler.handle('suggest', () => undefined);

        const report = await scheduler.run();
        expect(report).toMatchObject({ dispatched: 3, succeeded: 3, failed: 0 });
        expect(fetcher.calls.map((c) => c.url)).toEqual([
            'https://search.test/?q=coffee&p=1',
            'https://search.test/?q=coffee&p=2',
            'https://search.test/?q=coffee&p=1',
        ]);
    });

    it('rotates past blocked proxies and succeeds on a healthy one', async () => {
        const { scheduler, fetcher, proxyPool, events, clock, aggregator } = setup(
            (_url, call) => (call <= 2 ? ok(BLOCK_PAGE) : ok(serpPage([{ url: 'https://a.test/', title: 'A' }]))),
            { proxies: [P1, P2, P3] }
        );
        const handled: string[] = [];
        scheduler.handle('scrape', (task) => {
            handled.push(task.target);
        });
        const retries: Array<{ kind: string; delayMs: number }> = [];
        events.on('task:retrying', (e) => retries.push({ kind: e.kind, delayMs: e.delayMs }));

        scheduler.submit({ target: 'coffee', purpose: 'scrape' });
        const report = await scheduler.run();

        expect(fetcher.calls.map((c) => c.proxy)).toEqual(['p1.test:8000', 'p2.test:8000', 'p3.test:8000']);
        expect(handled).toEqual(['coffee']);
        // First block is a free immediate retry, the second one backs off
        expect(retries).toEqual([
            { kind: 'blocked', delayMs: 0 },
            { kind: 'blocked', delayMs: 1_000 },
        ]);
        expect(clock.sleeps).toEqual([1_000]);
        expect(proxyPool.isQuarantined(P1)).toBe(true);
        expect(proxyPool.isQuarantined(P2)).toBe(true);
        expect(proxyPool.isQuarantined(P3)).toBe(false);
        expect(report).toMatchObject({ dispatched: 3, succeeded: 1, retried: 2, failed: 0, cancelled: 0 });
        expect(aggregator.failures()).toEqual([]);
    });

    it('records a failure once the retry budget is spent', async () => {
        const { scheduler, aggregator, clock } = setup(() => {
            throw new Error('ECONNRESET');
        }, { maxRetries: 2 });
        scheduler.handle('scrape', () => undefined);

        scheduler.submit({ target: 'coffee', purpose: 'scrape' });
        const report = await scheduler.run();

        expect(clock.sleeps).toEqual([1_000, 2_000]);
        expect(report).toMatchObject({ dispatched: 3, succeeded: 0, retried: 2, failed: 1 });
        expect(aggregator.failures()).toEqual([{
            target: 'coffee',
            purpose: 'scrape',
            page: 1,
            depth: 0,
            kind: 'network',
            message: 'Gave up after 3 attempts: ECONNRESET',
            attempts: 3,
            failedAt: '1970-01-01T00:00:03.000Z',
        }]);
    });

    it('retries a page the handler could not parse', async () => {
        const { scheduler, aggregator } = setup(() => ok('<html></html>'), { maxRetries: 1 });
        let calls = 0;
        scheduler.handle('scrape', () => {
            calls++;
            throw new ParseError('bad page');
        });

        scheduler.submit({ target: 'coffee', purpose: 'scrape' });
        await scheduler.run();

        expect(calls).toBe(2);
        expect(aggregator.failures()[0]).toMatchObject({
            kind: 'parse',
            message: 'Gave up after 2 attempts: bad page',
            attempts: 2,
        });
    });

    it('does not retry an unexpected handler error', async () => {
        const { scheduler, aggregator } = setup(() => ok(serpPage([])));
        scheduler.handle('scrape', () => {
            throw new Error('boom');
        });

        scheduler.submit({ target: 'coffee', purpose: 'scrape' });
        scheduler.submit({ target: 'tea', purpose: 'scrape' });
        const report = await scheduler.run();

        expect(report).toMatchObject({ dispatched: 2, retried: 0, failed: 2 });
        expect(aggregator.failures().map((f) => [f.target, f.kind, f.message, f.attempts])).toEqual([
            ['coffee', 'unexpected', 'boom', 1],
            ['tea', 'unexpected', 'boom', 1],
        ]);
    });

    it('fails tasks whose purpose has no handler', async () => {
        const { scheduler, aggregator } = setup(() => ok('[]'));
        scheduler.submit({ target: 'coffee', purpose: 'suggest' });
        await scheduler.run();
        expect(aggregator.failures()[0].message).toBe('No handler registered for "suggest" tasks');
    });

    it('stops after the request limit and cancels what is left', async () => {
        const { scheduler, fetcher } = setup(() => ok(serpPage([])), { maxRequests: 2 });
        scheduler.handle('scrape', () => undefined);
        for (const keyword of ['a', 'b', 'c']) scheduler.submit({ target: keyword, purpose: 'scrape' });

        const report = await scheduler.run();

        expect(fetcher.calls).toHaveLength(2);
        expect(report).toEqual({
            dispatched: 2,
            succeeded: 2,
            retried: 0,
            failed: 0,
            cancelled: 1,
            stopReason: 'request limit of 2 reached',
        });
        expect(scheduler.submit({ target: 'd', purpose: 'scrape' })).toBe(false);
    });

    it('cancels a backing-off task when stopped', async () => {
        const clock = new StalledClock();
        const { scheduler, events, aggregator } = setup(() => {
            throw new Error('ECONNRESET');
        }, { clock });
        scheduler.handle('scrape', () => undefined);
        events.on('task:retrying', () => {
            setImmediate(() => scheduler.stop('test stop'));
        });

        scheduler.submit({ target: 'coffee', purpose: 'scrape' });
        const report = await scheduler.run();

        expect(clock.sleeps).toEqual([1_000]);
        expect(report).toMatchObject({ dispatched: 1, retried: 1, failed: 0, cancelled: 1, stopReason: 'test stop' });
        expect(aggregator.failures()).toEqual([]);
    });

    it('stops while waiting for every proxy to leave quarantine', async () => {
        const clock = new StalledClock();
        const { scheduler, events, fetcher, aggregator } = setup(() => ok(BLOCK_PAGE), { proxies: [P1], clock });
        scheduler.handle('scrape', () => undefined);
        events.on('task:retrying', () => {
            setImmediate(() => scheduler.stop('user'));
        });

        scheduler.submit({ target: 'coffee', purpose: 'scrape' });
        const report = await scheduler.run();

        // The free block retry finds P1 quarantined for the default five minutes
        expect(clock.sleeps).toEqual([300_000]);
        expect(fetcher.calls).toHaveLength(1);
        expect(report).toMatchObject({ dispatched: 1, retried: 1, failed: 0, cancelled: 1, stopReason: 'user' });
        expect(aggregator.failures()).toEqual([]);
    });

    it('never runs more fetches at once than maxConcurrency', async () => {
        let active = 0;
        let peak = 0;
        const { scheduler } = setup(async () => {
            active++;
            peak = Math.max(peak, active);
            await new Promise<void>((resolve) => setImmediate(resolve));
            active--;
            return ok(serpPage([]));
        }, { maxConcurrency: 2 });
        scheduler.handle('scrape', () => undefined);
        for (const keyword of ['a', 'b', 'c', 'd', 'e']) scheduler.submit({ target: keyword, purpose: 'scrape' });

        const report = await scheduler.run();

        expect(peak).toBe(2);
        expect(report.succeeded).toBe(5);
    });

    it('refuses a second concurrent run', async () => {
        const { scheduler } = setup(() => ok(serpPage([])));
        scheduler.handle('scrape', () => undefined);
        scheduler.submit({ target: 'coffee', purpose: 'scrape' });

        const first = scheduler.run();
        await expect(scheduler.run()).rejects.toThrow('Scheduler.run() is already in progress');
        await first;
    });
});
