/**
 * src/engine/taskState.ts
 *
 * Per-task lifecycle:
 *
 *   pending → in-flight → succeeded
 *                       → retrying → in-flight …
 *                       → failed
 *   retrying → failed   (run stopped while the task was backing off)
 *
 * Nothing here knows about workers or timers; the scheduler drives the
 * transitions and this module only refuses the illegal ones.
 */

import type { FetchTask, TaskRequest, TaskState } from './types.js';

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
    'pending': ['in-flight', 'failed'],
    'in-flight': ['succeeded', 'retrying', 'failed'],
    'retrying': ['in-flight', 'failed'],
    'succeeded': [],
    'failed': [],
};

export class IllegalTransitionError extends Error {
    constructor(readonly taskId: number, readonly from: TaskState, readonly to: TaskState) {
        super(`Task ${taskId}: illegal transition ${from} → ${to}`);
        this.name = 'IllegalTransitionError';
    }
}

export function canTransition(from: TaskState, to: TaskState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function transition(task: FetchTask, to: TaskState): void {
    if (!canTransition(task.state, to)) {
        throw new IllegalTransitionError(task.id, task.state, to);
    }
    task.state = to;
}

export function isTerminal(state: TaskState): boolean {
    return TRANSITIONS[state].length === 0;
}

export function createTask(id: number, request: TaskRequest): FetchTask {
    return {
        id,
        target: request.target.trim(),
        purpose: request.purpose,
        page: request.page ?? 1,
        depth: request.depth ?? 0,
        parent: request.parent ?? null,
        retryCount: 0,
        proxy: null,
        state: 'pending',
        blockedRetryUsed: false,
        attempts: 0,
    };
}
