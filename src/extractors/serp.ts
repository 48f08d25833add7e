/**
 * src/extractors/serp.ts
 *
 * Turns raw SERP HTML into a SerpResult.
 *
 * Google randomises class names regularly, so every field is looked up
 * through a list of selectors (newest first). A candidate block missing its
 * link or title is skipped and counted; one broken block never costs us the
 * rest of the page. Only a document with no recognisable results container
 * at all is a ParseError, and the scheduler retries those like any other
 * failed fetch.
 */

import * as cheerio from 'cheerio';
import { ParseError } from '../engine/errors.js';
import type { OrganicResult, SerpResult } from '../engine/types.js';

// ─── Selectors ────────────────────────────────────────────────────────────────

export interface SerpSelectors {
    container: string;
    resultBlock: string;
    link: string;
    title: string;
    description: string;
    related: string;
    peopleAlsoAsk: string;
}

export const DEFAULT_SERP_SELECTORS: SerpSelectors = {
    container: '#search, #rso, #botstuff',
    resultBlock: 'div.g, .tF2Cxc, .Ww4FFb',
    link: 'a[href]:not([role="button"])',
    title: 'h3',
    description: '.VwiC3b, .yXK7lf, .lEBKkf, [data-sncf="1"]',
    related: '.AJLUJb .b2Rnsc a, .dg6jd',
    peopleAlsoAsk: '.related-question-pair span, [data-sgrd] div[role="button"]',
};

export interface ExtractionOutcome {
    result: SerpResult;
    /** Candidate blocks dropped for a missing or unusable link/title. Repeated URLs are not counted. */
    skipped: number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/** Unwraps Google's `/url?q=<target>` redirect links. */
export function resolveResultHref(href: string): string {
    if (href.startsWith('/url?') || href.startsWith('https://www.google.com/url?')) {
        const target = new URL(href, 'https://www.google.com').searchParams.get('q');
        return target ?? '';
    }
    return href;
}

export function domainOf(url: string): string | null {
    try {
        return new URL(url).hostname.replace(/^www\./, '');
    } catch {
        return null;
    }
}

// ─── Extractor ────────────────────────────────────────────────────────────────

export class SerpExtractor {
    constructor(
        private readonly selectors: SerpSelectors = DEFAULT_SERP_SELECTORS,
        private readonly now: () => Date = () => new Date()
    ) {}

    extract(rawContent: string, keyword: string, page: number, url = ''): ExtractionOutcome {
        if (!rawContent.trim()) {
            throw new ParseError(`Empty result page for "${keyword}" (page ${page})`);
        }

        const $ = cheerio.load(rawContent);
        const sel = this.selectors;

        // Nested matches (a .tF2Cxc inside a div.g) describe the same result
        const blocks = $(sel.resultBlock).filter((_, el) => $(el).parents(sel.resultBlock).length === 0);

        if (blocks.length === 0 && $(sel.container).length === 0) {
            throw new ParseError(`No results container found for "${keyword}" (page ${page})`);
        }

        const organicResults: OrganicResult[] = [];
        const seenUrls = new Set<string>();
        let skipped = 0;

        blocks.each((_, el) => {
            const $block = $(el);
            const href = $block.find(sel.link).first().attr('href') ?? '';
            const resultUrl = href ? resolveResultHref(href) : '';
            const title = cleanText($block.find(sel.title).first().text());
            const domain = resultUrl.startsWith('http') ? domainOf(resultUrl) : null;

            if (!title || !domain) {
                skipped++;
                return;
            }
            // Google repeats sitelinks of the same page; keep the first. A repeat
            // is well-formed, so it does not count towards `skipped`.
            if (seenUrls.has(resultUrl)) return;
            seenUrls.add(resultUrl);

            organicResults.push({
                url: resultUrl,
                title,
                description: cleanText($block.find(sel.description).first().text()),
                domain,
                position: organicResults.length + 1,
            });
        });

        const relatedKeywords = new Set<string>();
        $(sel.related).each((_, el) => {
            const text = cleanText($(el).text());
            if (text.length > 2) relatedKeywords.add(text);
        });

        const peopleAlsoAsk = new Set<string>();
        $(sel.peopleAlsoAsk).each((_, el) => {
            const text = cleanText($(el).text());
            if (text.includes('?')) peopleAlsoAsk.add(text);
        });

        return {
            result: {
                keyword,
                page,
                url,
                organicResults,
                relatedKeywords: [...relatedKeywords],
                peopleAlsoAsk: [...peopleAlsoAsk],
                retrievedAt: this.now().toISOString(),
            },
            skipped,
        };
    }
}
