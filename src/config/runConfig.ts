/**
 * src/config/runConfig.ts
 *
 * The single validated configuration object for a run. Everything the engine
 * reads comes from here; it is checked once, up front, and a bad value is the
 * only error that ends a run before any request is made.
 */

import { z, ZodError } from 'zod';
import type { Env } from './envSchema.js';
import { MODIFIERS } from './modifiers.js';
import { ConfigError } from '../engine/errors.js';
import type { Modifier } from '../engine/types.js';

const isoCode = z.string().trim().regex(/^[a-z]{2}$/i, 'expected a two-letter ISO code');

const modifierSchema = z.enum(['alphabet', 'questions', 'prepositions']);

export const runConfigSchema = z.object({
    // Browser / fetch
    headless: z.boolean().default(true),
    browserType: z.enum(['chromium', 'firefox', 'webkit']).default('chromium'),
    serpFetchMode: z.enum(['browser', 'http']).default('browser'),
    requestTimeoutMs: z.number().int().positive().default(60_000),
    userAgents: z.array(z.string().trim().min(1)).default([]),
    blockMarkers: z.array(z.string().trim().min(1)).default([]),

    // Pacing, in seconds
    minDelay: z.number().nonnegative().default(2),
    maxDelay: z.number().nonnegative().default(5),
    maxConcurrency: z.number().int().min(1).default(1),
    maxRequests: z.number().int().min(1).optional(),

    // Retries
    maxRetries: z.number().int().min(0).default(3),
    backoffBaseMs: z.number().int().nonnegative().default(1_000),
    backoffMaxMs: z.number().int().nonnegative().default(30_000),

    // Proxies
    proxyUrls: z.array(z.string().trim()).default([]),
    rotateProxy: z.boolean().default(false),
    quarantineThreshold: z.number().int().min(1).default(3),
    quarantineCooldownMs: z.number().int().nonnegative().default(5 * 60_000),
    allowDirectFallback: z.boolean().default(false),

    // Locale / SERP
    language: isoCode.transform((s) => s.toLowerCase()).default('en'),
    country: isoCode.transform((s) => s.toLowerCase()).default('us'),
    googleDomain: z.string().trim().regex(/^[a-z0-9.-]+\.[a-z]{2,}$/i, 'expected a host name like google.com').default('google.com'),
    resultsPerPage: z.number().int().min(10).max(100).default(10),
    pagesPerKeyword: z.number().int().min(1).default(1),

    // Keyword expansion
    maxDepth: z.number().int().min(0).default(2),
    modifiers: z.array(modifierSchema).default([...MODIFIERS]),
    maxKeywords: z.number().int().min(1).optional(),
    minRelevance: z.number().default(0),
    suggestVertical: z.string().trim().min(1).nullable().default(null),
    includeBaseQuery: z.boolean().default(false),
}).strict().superRefine((cfg, ctx) => {
    if (cfg.maxDelay < cfg.minDelay) {
        ctx.addIssue({
            code: 'custom',
            path: ['maxDelay'],
            message: `must be ≥ minDelay (${cfg.minDelay})`,
        });
    }
    if (cfg.backoffMaxMs < cfg.backoffBaseMs) {
        ctx.addIssue({
            code: 'custom',
            path: ['backoffMaxMs'],
            message: `must be ≥ backoffBaseMs (${cfg.backoffBaseMs})`,
        });
    }
});

export type RunConfig = z.infer<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;

function uniqueModifiers(modifiers: readonly Modifier[]): Modifier[] {
    return [...new Set(modifiers)];
}

/**
 * Validates and fills defaults. Every problem is reported at once in a single
 * ConfigError.
 */
export function parseRunConfig(input: RunConfigInput | Record<string, unknown> = {}): RunConfig {
    try {
        const cfg = runConfigSchema.parse(input);
        return { ...cfg, modifiers: uniqueModifiers(cfg.modifiers) };
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `${key}: ${i.message}`;
            }));
        }
        throw err;
    }
}

/** Maps HARVESTER_* variables onto RunConfig input; `overrides` win. */
export function runConfigFromEnv(env: Env, overrides: RunConfigInput = {}): RunConfig {
    const fromEnv: Record<string, unknown> = {
        headless: env.HARVESTER_HEADLESS,
        browserType: env.HARVESTER_BROWSER,
        serpFetchMode: env.HARVESTER_SERP_FETCH_MODE,
        requestTimeoutMs: env.HARVESTER_REQUEST_TIMEOUT_MS,
        userAgents: env.HARVESTER_USER_AGENTS,
        blockMarkers: env.HARVESTER_BLOCK_MARKERS,
        minDelay: env.HARVESTER_MIN_DELAY,
        maxDelay: env.HARVESTER_MAX_DELAY,
        maxConcurrency: env.HARVESTER_MAX_CONCURRENCY,
        maxRequests: env.HARVESTER_MAX_REQUESTS,
        maxRetries: env.HARVESTER_MAX_RETRIES,
        backoffBaseMs: env.HARVESTER_BACKOFF_BASE_MS,
        backoffMaxMs: env.HARVESTER_BACKOFF_MAX_MS,
        proxyUrls: env.HARVESTER_PROXY_URLS,
        rotateProxy: env.HARVESTER_ROTATE_PROXY,
        quarantineThreshold: env.HARVESTER_QUARANTINE_THRESHOLD,
        quarantineCooldownMs: env.HARVESTER_QUARANTINE_COOLDOWN_MS,
        allowDirectFallback: env.HARVESTER_ALLOW_DIRECT_FALLBACK,
        language: env.HARVESTER_LANGUAGE,
        country: env.HARVESTER_COUNTRY,
        googleDomain: env.HARVESTER_GOOGLE_DOMAIN,
        resultsPerPage: env.HARVESTER_RESULTS_PER_PAGE,
        pagesPerKeyword: env.HARVESTER_PAGES_PER_KEYWORD,
        maxDepth: env.HARVESTER_MAX_DEPTH,
        modifiers: env.HARVESTER_MODIFIERS.length > 0 ? env.HARVESTER_MODIFIERS : undefined,
        maxKeywords: env.HARVESTER_MAX_KEYWORDS,
        minRelevance: env.HARVESTER_MIN_RELEVANCE,
        suggestVertical: env.HARVESTER_SUGGEST_VERTICAL || null,
        includeBaseQuery: env.HARVESTER_INCLUDE_BASE_QUERY,
    };

    // Undefined overrides must not erase env values
    const merged: Record<string, unknown> = { ...fromEnv };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) merged[key] = value;
    }

    return parseRunConfig(merged);
}
