import { LogLevel } from 'crawlee';
import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from './logging.js';

describe('resolveLogLevel', () => {
    it('maps level names case-insensitively', () => {
        expect(resolveLogLevel('debug')).toBe(LogLevel.DEBUG);
        expect(resolveLogLevel(' Warn ')).toBe(LogLevel.WARNING);
        expect(resolveLogLevel('OFF')).toBe(LogLevel.OFF);
    });

    it('falls back to INFO for unknown or empty names', () => {
        expect(resolveLogLevel('')).toBe(LogLevel.INFO);
        expect(resolveLogLevel('trace')).toBe(LogLevel.INFO);
    });

    it('lets verbose win', () => {
        expect(resolveLogLevel('error', true)).toBe(LogLevel.DEBUG);
    });
});
