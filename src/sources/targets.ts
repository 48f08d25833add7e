/**
 * src/sources/targets.ts
 *
 * URL builders for the two fetch shapes: a search-results page for a
 * keyword, and a suggestion list for a prefix.
 */

import type { FetchTask } from '../engine/types.js';
import type { TargetResolver } from './types.js';

export interface SearchUrlOptions {
    googleDomain: string;
    resultsPerPage: number;
    language: string;
    country: string;
}

/** `page` is 1-based; Google's `start` is the 0-based index of the first result. */
export function buildSearchUrl(keyword: string, page: number, options: SearchUrlOptions): string {
    const params = new URLSearchParams({
        q: keyword,
        num: String(options.resultsPerPage),
        hl: options.language,
        gl: options.country.toLowerCase(),
    });
    const start = (Math.max(1, page) - 1) * options.resultsPerPage;
    if (start > 0) params.set('start', String(start));
    return `https://www.${options.googleDomain}/search?${params.toString()}`;
}

export interface SuggestUrlBuilder {
    requestUrl(prefix: string, language: string, country: string): string;
}

export function createTargetResolver(
    search: SearchUrlOptions,
    suggestions: SuggestUrlBuilder
): TargetResolver {
    return (task: FetchTask): string =>
        task.purpose === 'scrape'
            ? buildSearchUrl(task.target, task.page, search)
            : suggestions.requestUrl(task.target, search.language, search.country);
}
