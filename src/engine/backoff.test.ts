import { describe, it, expect } from 'vitest';
import { exponentialBackoff, noBackoff } from './backoff.js';

describe('exponentialBackoff', () => {
    it('doubles per attempt without jitter', () => {
        const backoff = exponentialBackoff({ baseMs: 1000, maxMs: 60_000, jitterMs: 0 });
        expect([1, 2, 3, 4].map(backoff)).toEqual([1000, 2000, 4000, 8000]);
    });

    it('adds jitter before capping at maxMs', () => {
        const backoff = exponentialBackoff({ baseMs: 1000, maxMs: 5000, jitterMs: 500, random: () => 0.5 });
        expect(backoff(1)).toBe(1250);
        expect(backoff(3)).toBe(4250);
        expect(backoff(4)).toBe(5000);
    });

    it('treats attempt 0 like the first retry', () => {
        const backoff = exponentialBackoff({ baseMs: 200, maxMs: 1000, jitterMs: 0 });
        expect(backoff(0)).toBe(200);
    });

    it('noBackoff never waits', () => {
        expect(noBackoff(5)).toBe(0);
    });
});
