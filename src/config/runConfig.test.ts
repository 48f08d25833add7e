import { describe, it, expect } from 'vitest';
import { loadEnv } from './env.js';
import { parseRunConfig, runConfigFromEnv } from './runConfig.js';
import { ConfigError } from '../engine/errors.js';

function issuesOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof ConfigError) return err.issues;
        throw err;
    }
    throw new Error('expected a ConfigError');
}

describe('parseRunConfig', () => {
    it('fills defaults', () => {
        const cfg = parseRunConfig();
        expect(cfg).toMatchObject({
            headless: true,
            serpFetchMode: 'browser',
            minDelay: 2,
            maxDelay: 5,
            maxConcurrency: 1,
            maxRetries: 3,
            rotateProxy: false,
            language: 'en',
            country: 'us',
            maxDepth: 2,
            modifiers: ['alphabet', 'questions', 'prepositions'],
            suggestVertical: null,
        });
        expect(cfg.maxRequests).toBeUndefined();
    });

    it('rejects a concurrency below one', () => {
        expect(issuesOf(() => parseRunConfig({ maxConcurrency: 0 })))
            .toEqual(['maxConcurrency: Number must be greater than or equal to 1']);
    });

    it('rejects maxDelay below minDelay', () => {
        expect(issuesOf(() => parseRunConfig({ minDelay: 5, maxDelay: 2 })))
            .toEqual(['maxDelay: must be ≥ minDelay (5)']);
    });

    it('rejects unknown keys', () => {
        expect(issuesOf(() => parseRunConfig({ maxConcurency: 2 })))
            .toEqual(["(root): Unrecognized key(s) in object: 'maxConcurency'"]);
    });

    it('reports every problem at once', () => {
        const err = (() => {
            try {
                parseRunConfig({ language: 'eng', resultsPerPage: 5 });
            } catch (e) {
                return e;
            }
            return null;
        })();
        expect(err).toBeInstanceOf(ConfigError);
        expect(err).toMatchObject({
            message: 'Invalid harvester configuration:\n' +
                '- language: expected a two-letter ISO code\n' +
                '- resultsPerPage: Number must be greater than or equal to 10',
        });
    });

    it('lower-cases locale codes and removes repeated modifiers', () => {
        const cfg = parseRunConfig({ language: 'DE', country: 'AT', modifiers: ['questions', 'questions', 'alphabet'] });
        expect(cfg.language).toBe('de');
        expect(cfg.country).toBe('at');
        expect(cfg.modifiers).toEqual(['questions', 'alphabet']);
    });
});

describe('runConfigFromEnv', () => {
    it('maps HARVESTER_* variables and lets defined overrides win', () => {
        const env = loadEnv({
            HARVESTER_MAX_CONCURRENCY: '4',
            HARVESTER_MIN_DELAY: '1',
            HARVESTER_PROXY_URLS: 'http://a.test:8000,\nhttp://b.test:8000',
            HARVESTER_ROTATE_PROXY: 'true',
            HARVESTER_HEADLESS: 'false',
            HARVESTER_MODIFIERS: 'questions',
            HARVESTER_SUGGEST_VERTICAL: 'yt',
        });

        const cfg = runConfigFromEnv(env, { maxConcurrency: undefined, minDelay: 0 });

        expect(cfg).toMatchObject({
            maxConcurrency: 4,
            minDelay: 0,
            proxyUrls: ['http://a.test:8000', 'http://b.test:8000'],
            rotateProxy: true,
            headless: false,
            modifiers: ['questions'],
            suggestVertical: 'yt',
        });
    });

    it('falls back to defaults for empty lists', () => {
        const cfg = runConfigFromEnv(loadEnv({}));
        expect(cfg.modifiers).toEqual(['alphabet', 'questions', 'prepositions']);
        expect(cfg.suggestVertical).toBeNull();
        expect(cfg.proxyUrls).toEqual([]);
    });

    it('rejects values the run config refuses', () => {
        const env = loadEnv({ HARVESTER_MAX_CONCURRENCY: '0' });
        expect(issuesOf(() => runConfigFromEnv(env)))
            .toEqual(['maxConcurrency: Number must be greater than or equal to 1']);
    });
});

describe('loadEnv', () => {
    it('names the variable that failed to parse', () => {
        const issues = issuesOf(() => loadEnv({ HARVESTER_MAX_RETRIES: 'lots' }));
        expect(issues).toHaveLength(1);
        expect(issues[0].startsWith('HARVESTER_MAX_RETRIES: ')).toBe(true);
    });

    it('only treats "false" as disabling headless mode', () => {
        expect(loadEnv({ HARVESTER_HEADLESS: 'no' }).HARVESTER_HEADLESS).toBe(true);
        expect(loadEnv({ HARVESTER_HEADLESS: ' FALSE ' }).HARVESTER_HEADLESS).toBe(false);
        expect(loadEnv({ HARVESTER_ROTATE_PROXY: 'yes' }).HARVESTER_ROTATE_PROXY).toBe(false);
    });
});
