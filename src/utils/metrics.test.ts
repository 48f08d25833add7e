import { describe, it, expect } from 'vitest';
import { RunMetrics } from './metrics.js';
import { EngineEvents } from '../engine/events.js';
import type { TaskEventPayload } from '../engine/events.js';
import { ManualClock } from '../testing/fakes.js';

const task: TaskEventPayload = {
    taskId: 1,
    target: 'coffee',
    purpose: 'scrape',
    page: 1,
    depth: 0,
    attempt: 1,
    proxy: 'direct',
};

describe('RunMetrics', () => {
    it('reports full success before anything settles', () => {
        const snapshot = new RunMetrics(new ManualClock()).snapshot();
        expect(snapshot.successRatePct).toBe(100);
        expect(snapshot.avgResponseTimeMs).toBe(0);
    });

    it('counts what the engine emits', () => {
        const clock = new ManualClock(1_000);
        const events = new EngineEvents();
        const metrics = new RunMetrics(clock);
        metrics.attach(events);

        events.emit('task:started', task);
        events.emit('task:started', task);
        events.emit('task:started', task);
        events.emit('task:succeeded', { ...task, durationMs: 100 });
        events.emit('task:succeeded', { ...task, durationMs: 300 });
        events.emit('task:retrying', { ...task, kind: 'blocked', message: 'Blocked: status 429', delayMs: 0 });
        events.emit('task:failed', { ...task, kind: 'blocked', message: 'Gave up', });
        events.emit('proxy:quarantined', { proxy: 'p1.test:8000', until: 2_000, reason: 'blocked' });
        events.emit('extract:skipped', { keyword: 'coffee', page: 1, skipped: 2 });
        events.emit('keyword:discovered', { text: 'coffee beans', depth: 1, parent: 'coffee' });
        clock.advance(5_000);

        expect(metrics.snapshot()).toEqual({
            requestsStarted: 3,
            requestsSucceeded: 2,
            requestsFailed: 1,
            requestsRetried: 1,
            successRatePct: 67,
            blockedResponses: 2,
            proxiesQuarantined: 1,
            itemsSkipped: 2,
            keywordsDiscovered: 1,
            avgResponseTimeMs: 200,
            startedAt: 1_000,
            uptimeSeconds: 5,
        });
    });

    it('stops counting once detached', () => {
        const events = new EngineEvents();
        const metrics = new RunMetrics(new ManualClock());
        const detach = metrics.attach(events);
        events.emit('task:started', task);
        detach();
        events.emit('task:started', task);

        expect(metrics.snapshot().requestsStarted).toBe(1);
        expect(events.listenerCount('task:started')).toBe(0);
    });
});
