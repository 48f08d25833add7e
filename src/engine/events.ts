/**
 * src/engine/events.ts
 *
 * Typed diagnostics bus. The engine emits progress and failure events here;
 * the console / log layer subscribes. Nobody listening is fine, and a
 * listener that throws is logged and ignored so it can never change the
 * outcome of a run.
 */

import { EventEmitter } from 'node:events';
import { log } from 'crawlee';
import { errorMessage } from './errors.js';
import type { FailureKind, TaskPurpose } from './types.js';

export interface TaskEventPayload {
    taskId: number;
    target: string;
    purpose: TaskPurpose;
    page: number;
    depth: number;
    attempt: number;
    proxy: string;
}

export interface EngineEventMap {
    'task:started': TaskEventPayload;
    'task:succeeded': TaskEventPayload & { durationMs: number };
    'task:retrying': TaskEventPayload & { kind: FailureKind; message: string; delayMs: number };
    'task:failed': TaskEventPayload & { kind: FailureKind; message: string };
    'proxy:quarantined': { proxy: string; until: number; reason: 'blocked' | 'failures' };
    'proxy:restored': { proxy: string };
    'extract:skipped': { keyword: string; page: number; skipped: number };
    'keyword:discovered': { text: string; depth: number; parent: string | null };
    'run:stopped': { reason: string };
}

export type EngineEventName = keyof EngineEventMap;

export class EngineEvents {
    private readonly emitter = new EventEmitter();

    constructor() {
        // Reporters, metrics and tests may all subscribe to the same event
        this.emitter.setMaxListeners(50);
    }

    on<K extends EngineEventName>(event: K, listener: (payload: EngineEventMap[K]) => void): () => void {
        const wrapped = (payload: EngineEventMap[K]): void => {
            try {
                listener(payload);
            } catch (err) {
                log.warning(`[EngineEvents] Listener for "${event}" threw: ${errorMessage(err)}`);
            }
        };
        this.emitter.on(event, wrapped);
        return () => {
            this.emitter.off(event, wrapped);
        };
    }

    emit<K extends EngineEventName>(event: K, payload: EngineEventMap[K]): void {
        this.emitter.emit(event, payload);
    }

    listenerCount(event: EngineEventName): number {
        return this.emitter.listenerCount(event);
    }
}
