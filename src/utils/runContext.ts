import * as crypto from 'crypto';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

export interface RunContext {
    runId: string;
    startedAt: string;
}

export function createRunContext(clock: Clock = systemClock): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: new Date(clock.now()).toISOString(),
    };
}
