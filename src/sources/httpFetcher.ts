/**
 * src/sources/httpFetcher.ts
 *
 * Plain HTTP fetcher on got-scraping. Used for every suggestion request and,
 * in `http` SERP mode, for result pages too (raw HTML parsed with cheerio,
 * no headless browser needed).
 *
 * got-scraping generates a realistic header set per request; we still pin the
 * User-Agent and Accept-Language so they match the configured locale.
 * Library retries are disabled: the scheduler owns retry and proxy rotation.
 */

import { gotScraping } from 'got-scraping';
import { DIRECT } from '../engine/types.js';
import type { ProxyChoice } from '../engine/types.js';
import { BaseFetcher } from './baseFetcher.js';
import type { BaseFetcherOptions } from './baseFetcher.js';
import type { InspectedResponse } from './blockDetection.js';
import { browserHeaders, randomUserAgent } from './headers.js';

export interface HttpFetcherOptions extends BaseFetcherOptions {
    language: string;
    country: string;
    userAgents?: readonly string[];
}

/**
 * got-scraping wants credentials decoded: a '+' or '%40' left encoded in the
 * user-info part is sent verbatim and the proxy rejects the login.
 */
export function toGotProxyUrl(endpoint: string): string {
    if (!endpoint.includes('@')) return endpoint;
    try {
        const p = new URL(endpoint);
        const user = decodeURIComponent(p.username);
        const pass = decodeURIComponent(p.password);
        const auth = pass ? `${user}:${pass}` : user;
        return `${p.protocol}//${auth}@${p.hostname}${p.port ? `:${p.port}` : ''}`;
    } catch {
        return endpoint;
    }
}

export class HttpFetcher extends BaseFetcher {
    protected readonly name = 'HttpFetcher';
    private readonly language: string;
    private readonly country: string;
    private readonly userAgents: readonly string[] | undefined;

    constructor(options: HttpFetcherOptions) {
        super(options);
        this.language = options.language;
        this.country = options.country;
        this.userAgents = options.userAgents;
    }

    protected async request(url: string, proxy: ProxyChoice, timeoutMs: number): Promise<InspectedResponse> {
        const response = await gotScraping({
            url,
            proxyUrl: proxy === DIRECT ? undefined : toGotProxyUrl(proxy.endpoint),
            headers: browserHeaders(this.language, this.country, randomUserAgent(this.userAgents)),
            timeout: { request: timeoutMs },
            retry: { limit: 0 },
            throwHttpErrors: false,
            followRedirect: true,
        });

        return {
            body: response.body,
            statusCode: response.statusCode,
            finalUrl: response.url,
        };
    }

    async close(): Promise<void> {
        // got keeps no per-fetcher sockets open
    }
}
