/**
 * src/engine/scheduler.ts
 *
 * Bounded worker pool over one shared task queue. Both flows run through it:
 * SERP scraping submits `scrape` tasks, keyword expansion submits `suggest`
 * tasks, and each purpose has one registered content handler.
 *
 * WORKER LOOP
 * ───────────
 *   stop requested? → dequeue → RateLimiter.wait(worker) → ProxyPool.acquire()
 *   → Fetcher.fetch(task, proxy) → handler(task, response) → succeeded
 *
 * FAILURES
 * ────────
 *   NetworkError / TimeoutError / ParseError
 *       → retry after backoff(retryCount) with a fresh proxy, until maxRetries
 *   BlockedError
 *       → proxy already quarantined by the fetcher; the first block of a task
 *         is retried at once without touching the budget, later ones count
 *   anything else
 *       → terminal. Recorded as a FailureRecord, never fatal to the run
 *
 * A task that is backing off does not hold a worker. stop() is cooperative:
 * in-flight fetches finish, nothing new is dequeued, accepted or requeued.
 */

import { log } from 'crawlee';
import type { BackoffPolicy } from './backoff.js';
import { Deduplicator, visitedKeyFor } from './dedup.js';
import { BlockedError, ExhaustedRetriesError, HarvesterError, errorMessage } from './errors.js';
import { EngineEvents } from './events.js';
import type { TaskEventPayload } from './events.js';
import type { ProxyPool } from './proxyPool.js';
import type { RateLimiter } from './rateLimiter.js';
import { createTask, transition } from './taskState.js';
import { proxyLabel } from './types.js';
import type { FailureKind, FailureRecord, FetchResponse, FetchTask, TaskPurpose, TaskRequest } from './types.js';
import type { Fetcher } from '../sources/types.js';
import { systemClock } from '../utils/clock.js';
import type { Clock } from '../utils/clock.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Turns fetched content into results. Throw a ParseError to have the page retried. */
export type TaskHandler = (task: FetchTask, response: FetchResponse) => void | Promise<void>;

export interface FailureSink {
    recordFailure(failure: FailureRecord): void;
}

export interface SchedulerOptions {
    fetcher: Fetcher;
    proxyPool: ProxyPool;
    rateLimiter: RateLimiter;
    dedup: Deduplicator;
    backoff: BackoffPolicy;
    maxConcurrency: number;
    maxRetries: number;
    /** Stop the run after this many dispatched fetches. */
    maxRequests?: number;
    failures?: FailureSink;
    events?: EngineEvents;
    clock?: Clock;
}

export interface SchedulerReport {
    dispatched: number;
    succeeded: number;
    retried: number;
    failed: number;
    cancelled: number;
    stopReason: string | null;
}

// ─── Scheduler ────────────────────────────────────────────────────────────────

export class Scheduler {
    private readonly queue: FetchTask[] = [];
    private readonly handlers: Partial<Record<TaskPurpose, TaskHandler>> = {};
    private readonly abort = new AbortController();
    private waiters: Array<() => void> = [];

    private nextId = 0;
    private inFlight = 0;
    private backingOff = 0;
    private running = false;
    private stopReason: string | null = null;

    private dispatched = 0;
    private succeeded = 0;
    private retried = 0;
    private failed = 0;
    private cancelled = 0;

    readonly events: EngineEvents;
    private readonly clock: Clock;

    constructor(private readonly options: SchedulerOptions) {
        if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
            throw new RangeError(`maxConcurrency must be an integer ≥ 1 (got ${options.maxConcurrency})`);
        }
        this.events = options.events ?? new EngineEvents();
        this.clock = options.clock ?? systemClock;
    }

    // ─── Public API ───────────────────────────────────────────────────────────

    /** Registers the content handler for a purpose, replacing any previous one. */
    handle(purpose: TaskPurpose, handler: TaskHandler): void {
        this.handlers[purpose] = handler;
    }

    /**
     * Queues a fetch unless its (normalised target, purpose) key was already
     * claimed, or the run is stopping. Duplicate submission is a silent no-op.
     */
    submit(request: TaskRequest): boolean {
        if (this.stopReason !== null) return false;

        const target = request.target.trim();
        if (!target) return false;

        const key = visitedKeyFor(target, request.purpose, request.page ?? 1);
        if (!this.options.dedup.tryVisit(key)) return false;

        this.queue.push(createTask(++this.nextId, request));
        this.notify();
        return true;
    }

    /** Drains the queue. Resolves once nothing is queued, in flight or backing off. */
    async run(): Promise<SchedulerReport> {
        if (this.running) {
            throw new Error('Scheduler.run() is already in progress');
        }
        this.running = true;

        try {
            const workers = Array.from(
                { length: this.options.maxConcurrency },
                (_, i) => this.workerLoop(i + 1)
            );
            await Promise.all(workers);
        } finally {
            this.running = false;
        }

        if (this.stopReason !== null) {
            for (const task of this.queue.splice(0)) this.cancel(task);
        }

        return this.report();
    }

    /** Cooperative stop: in-flight fetches finish, nothing else starts. */
    stop(reason: string): void {
        if (this.stopReason !== null) return;
        this.stopReason = reason;
        log.info(`[Scheduler] Stopping: ${reason}`);
        this.events.emit('run:stopped', { reason });
        this.abort.abort();
        this.notify();
    }

    get stopped(): boolean {
        return this.stopReason !== null;
    }

    get pending(): number {
        return this.queue.length;
    }

    report(): SchedulerReport {
        return {
            dispatched: this.dispatched,
            succeeded: this.succeeded,
            retried: this.retried,
            failed: this.failed,
            cancelled: this.cancelled,
            stopReason: this.stopReason,
        };
    }

    // ─── Worker ───────────────────────────────────────────────────────────────

    private async workerLoop(workerId: number): Promise<void> {
        for (;;) {
            if (this.stopReason !== null) {
                // Backing-off tasks still need to be settled as cancelled
                if (this.backingOff === 0) return;
                await this.waitForChange();
                continue;
            }

            const task = this.queue.shift();
            if (!task) {
                if (this.inFlight === 0 && this.backingOff === 0) {
                    this.notify();
                    return;
                }
                await this.waitForChange();
                continue;
            }

            this.inFlight++;
            try {
                await this.execute(task, workerId);
            } finally {
                this.inFlight--;
                this.notify();
            }
        }
    }

    private async execute(task: FetchTask, workerId: number): Promise<void> {
        const signal = this.abort.signal;
        await this.options.rateLimiter.wait(workerId, signal);
        const proxy = await this.options.proxyPool.acquire({ avoid: task.proxy, signal });

        if (this.stopReason !== null) {
            this.queue.unshift(task);
            return;
        }

        task.proxy = proxy;
        task.attempts++;
        transition(task, 'in-flight');
        this.dispatched++;
        if (this.options.maxRequests !== undefined && this.dispatched >= this.options.maxRequests) {
            this.stop(`request limit of ${this.options.maxRequests} reached`);
        }

        this.events.emit('task:started', this.payload(task));

        try {
            const response = await this.options.fetcher.fetch(task, proxy);
            await this.dispatch(task, response);
            transition(task, 'succeeded');
            this.succeeded++;
            this.events.emit('task:succeeded', { ...this.payload(task), durationMs: response.durationMs });
        } catch (err) {
            this.handleFailure(task, err);
        }
    }

    private async dispatch(task: FetchTask, response: FetchResponse): Promise<void> {
        const handler = this.handlers[task.purpose];
        if (!handler) {
            throw new Error(`No handler registered for "${task.purpose}" tasks`);
        }
        await handler(task, response);
    }

    // ─── Failure handling ─────────────────────────────────────────────────────

    private handleFailure(task: FetchTask, err: unknown): void {
        if (!(err instanceof HarvesterError) || !err.retryable) {
            const kind: FailureKind = err instanceof HarvesterError ? err.kind : 'unexpected';
            this.fail(task, kind, errorMessage(err));
            return;
        }

        if (err instanceof BlockedError && !task.blockedRetryUsed) {
            task.blockedRetryUsed = true;
            this.scheduleRetry(task, err, 0);
            return;
        }

        task.retryCount++;
        if (task.retryCount > this.options.maxRetries) {
            const exhausted = new ExhaustedRetriesError(task.attempts, err);
            this.fail(task, exhausted.kind, exhausted.message);
            return;
        }

        this.scheduleRetry(task, err, this.options.backoff(task.retryCount));
    }

    private scheduleRetry(task: FetchTask, err: HarvesterError, delayMs: number): void {
        if (this.stopReason !== null) {
            transition(task, 'retrying');
            this.cancel(task);
            return;
        }

        transition(task, 'retrying');
        this.retried++;
        this.events.emit('task:retrying', {
            ...this.payload(task),
            kind: err.kind,
            message: err.message,
            delayMs,
        });

        if (delayMs <= 0) {
            this.queue.push(task);
            this.notify();
            return;
        }

        this.backingOff++;
        void this.clock.sleep(delayMs, this.abort.signal).then(() => {
            this.backingOff--;
            if (this.stopReason !== null) {
                this.cancel(task);
            } else {
                this.queue.push(task);
            }
            this.notify();
        });
    }

    private fail(task: FetchTask, kind: FailureKind, message: string): void {
        transition(task, 'failed');
        this.failed++;
        log.warning(`[Scheduler] ✗ ${task.purpose} "${task.target}" (page ${task.page}) failed: ${message}`);
        this.events.emit('task:failed', { ...this.payload(task), kind, message });
        this.options.failures?.recordFailure({
            target: task.target,
            purpose: task.purpose,
            page: task.page,
            depth: task.depth,
            kind,
            message,
            attempts: task.attempts,
            failedAt: new Date(this.clock.now()).toISOString(),
        });
    }

    private cancel(task: FetchTask): void {
        transition(task, 'failed');
        this.cancelled++;
        log.debug(`[Scheduler] Cancelled ${task.purpose} "${task.target}" (${this.stopReason ?? 'stopped'})`);
    }

    // ─── Signalling ───────────────────────────────────────────────────────────

    private payload(task: FetchTask): TaskEventPayload {
        return {
            taskId: task.id,
            target: task.target,
            purpose: task.purpose,
            page: task.page,
            depth: task.depth,
            attempt: task.attempts,
            proxy: proxyLabel(task.proxy),
        };
    }

    private waitForChange(): Promise<void> {
        return new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private notify(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) resolve();
    }
}
