/**
 * src/extractors/suggestions.ts
 *
 * Google Autocomplete client. The `client=chrome` endpoint answers with a
 * JSON array:
 *
 *   [ query, [suggestions…], [descriptions…], [], {
 *       "google:suggestrelevance": [1250, 601, …],
 *       "google:suggesttype": ["QUERY", …]
 *   } ]
 *
 * Anything that does not look like that is treated as "no suggestions":
 * autocomplete is best effort, and an empty list is a valid answer.
 */

import { log } from 'crawlee';
import { gotScraping } from 'got-scraping';
import { z } from 'zod';
import { normalizeKeyword } from '../engine/dedup.js';
import { errorMessage } from '../engine/errors.js';
import type { Suggestion } from '../engine/types.js';
import type { SuggestUrlBuilder } from '../sources/targets.js';

// ─── Response Schema ──────────────────────────────────────────────────────────

const SuggestResponseSchema = z.tuple([z.string(), z.array(z.unknown())]).rest(z.unknown());

const SuggestMetadataSchema = z.object({
    'google:suggestrelevance': z.array(z.number()).optional(),
    'google:suggesttype': z.array(z.string()).optional(),
}).passthrough();

const XSSI_PREFIX = /^\)\]\}'?\s*/;

// ─── Client ───────────────────────────────────────────────────────────────────

export interface SuggestionClientOptions {
    endpoint?: string;
    /** `ds` vertical, e.g. "yt" for YouTube suggestions. */
    vertical?: string | null;
    minRelevance?: number;
    timeoutMs?: number;
    /** Transport used by suggest(); defaults to got-scraping. */
    fetchText?: (url: string, timeoutMs: number) => Promise<string>;
}

export const DEFAULT_SUGGEST_ENDPOINT = 'https://suggestqueries.google.com/complete/search';

async function fetchTextWithGot(url: string, timeoutMs: number): Promise<string> {
    const response = await gotScraping({
        url,
        timeout: { request: timeoutMs },
        retry: { limit: 0 },
    });
    return response.body;
}

export class SuggestionClient implements SuggestUrlBuilder {
    private readonly endpoint: string;
    private readonly vertical: string | null;
    private readonly minRelevance: number;
    private readonly timeoutMs: number;
    private readonly fetchText: (url: string, timeoutMs: number) => Promise<string>;

    constructor(options: SuggestionClientOptions = {}) {
        this.endpoint = options.endpoint ?? DEFAULT_SUGGEST_ENDPOINT;
        this.vertical = options.vertical ?? null;
        this.minRelevance = options.minRelevance ?? 0;
        this.timeoutMs = options.timeoutMs ?? 10_000;
        this.fetchText = options.fetchText ?? fetchTextWithGot;
    }

    requestUrl(prefix: string, language: string, country: string): string {
        const params = new URLSearchParams({
            client: 'chrome',
            hl: language,
            gl: country.toUpperCase(),
            q: prefix,
        });
        if (this.vertical) params.set('ds', this.vertical);
        return `${this.endpoint}?${params.toString()}`;
    }

    /**
     * Parses one raw response. Most relevant first; malformed input → [].
     * When the API sends no relevance scores the rank order is turned into
     * descending weights so the ordering survives.
     */
    parse(raw: string, prefix: string): Suggestion[] {
        let data: unknown;
        try {
            data = JSON.parse(raw.replace(XSSI_PREFIX, ''));
        } catch (err) {
            log.debug(`[Suggest] Unparseable response for "${prefix}": ${errorMessage(err)}`);
            return [];
        }

        const parsed = SuggestResponseSchema.safeParse(data);
        if (!parsed.success) {
            log.debug(`[Suggest] Unexpected response shape for "${prefix}"`);
            return [];
        }

        const [, rawSuggestions, ...rest] = parsed.data;
        const meta = SuggestMetadataSchema.safeParse(rest[2]);
        const relevances = meta.success ? meta.data['google:suggestrelevance'] : undefined;
        const types = meta.success ? meta.data['google:suggesttype'] : undefined;

        const seen = new Set<string>();
        const suggestions: Suggestion[] = [];

        rawSuggestions.forEach((value, idx) => {
            if (typeof value !== 'string') return;
            const text = value.trim();
            const key = normalizeKeyword(text);
            if (!key || seen.has(key)) return;
            seen.add(key);

            const relevance = relevances ? (relevances[idx] ?? 0) : rawSuggestions.length - idx;
            if (relevance < this.minRelevance) return;

            suggestions.push({
                text,
                relevance,
                type: types?.[idx] ?? 'QUERY',
                sourceQuery: prefix,
            });
        });

        // Array.prototype.sort is stable, so API order breaks ties
        return suggestions.sort((a, b) => b.relevance - a.relevance);
    }

    /**
     * One-off lookup outside the scheduler (no proxy, no rate limiting).
     * Network failures are logged and yield an empty list.
     */
    async suggest(prefix: string, language: string, country: string): Promise<Suggestion[]> {
        const url = this.requestUrl(prefix, language, country);
        try {
            const raw = await this.fetchText(url, this.timeoutMs);
            return this.parse(raw, prefix);
        } catch (err) {
            log.warning(`[Suggest] Lookup failed for "${prefix}": ${errorMessage(err)}`);
            return [];
        }
    }
}
