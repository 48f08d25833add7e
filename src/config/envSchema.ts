import { z } from 'zod';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const optionalNumFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite().optional());

/** Comma- or newline-separated list; blanks dropped. */
const listFromEnv = z.preprocess((v) => {
    if (v === undefined) return [];
    if (typeof v === 'string') {
        return v.split(/[\n,]/).map((s) => s.trim()).filter(Boolean);
    }
    return v;
}, z.array(z.string()));

export const envSchema = z.object({
    HARVESTER_HEADLESS: boolUnlessFalse.default(true),
    HARVESTER_BROWSER: z.string().default('chromium'),
    HARVESTER_SERP_FETCH_MODE: z.string().default('browser'),
    HARVESTER_REQUEST_TIMEOUT_MS: numFromEnv.default(60_000),

    HARVESTER_MIN_DELAY: numFromEnv.default(2),
    HARVESTER_MAX_DELAY: numFromEnv.default(5),
    HARVESTER_MAX_CONCURRENCY: numFromEnv.default(1),
    HARVESTER_MAX_REQUESTS: optionalNumFromEnv,
    HARVESTER_MAX_RETRIES: numFromEnv.default(3),
    HARVESTER_BACKOFF_BASE_MS: numFromEnv.default(1_000),
    HARVESTER_BACKOFF_MAX_MS: numFromEnv.default(30_000),

    HARVESTER_PROXY_URLS: listFromEnv,
    HARVESTER_ROTATE_PROXY: boolStrictTrue.default(false),
    HARVESTER_QUARANTINE_THRESHOLD: numFromEnv.default(3),
    HARVESTER_QUARANTINE_COOLDOWN_MS: numFromEnv.default(5 * 60_000),
    HARVESTER_ALLOW_DIRECT_FALLBACK: boolStrictTrue.default(false),

    HARVESTER_LANGUAGE: z.string().default('en'),
    HARVESTER_COUNTRY: z.string().default('us'),
    HARVESTER_GOOGLE_DOMAIN: z.string().default('google.com'),
    HARVESTER_RESULTS_PER_PAGE: numFromEnv.default(10),
    HARVESTER_PAGES_PER_KEYWORD: numFromEnv.default(1),

    HARVESTER_MAX_DEPTH: numFromEnv.default(2),
    HARVESTER_MODIFIERS: listFromEnv,
    HARVESTER_MAX_KEYWORDS: optionalNumFromEnv,
    HARVESTER_MIN_RELEVANCE: numFromEnv.default(0),
    HARVESTER_SUGGEST_VERTICAL: z.string().default(''),
    HARVESTER_INCLUDE_BASE_QUERY: boolStrictTrue.default(false),

    HARVESTER_USER_AGENTS: listFromEnv,
    HARVESTER_BLOCK_MARKERS: listFromEnv,

    HARVESTER_OUTPUT_DIR: z.string().default('data/results'),
    HARVESTER_EXPORT_FORMAT: z.string().default('json'),
    HARVESTER_LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
