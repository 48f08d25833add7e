/**
 * src/sources/browserFetcher.ts
 *
 * Renders result pages in a real browser (Playwright). Search engines serve
 * a JavaScript-dependent SERP to unknown clients, so the browser mode is the
 * default for scraping.
 *
 * One browser is launched lazily per proxy endpoint (Playwright binds the
 * proxy at launch); each fetch gets a fresh context so cookies never leak
 * between tasks. Trackers are always blocked, heavy resources optionally.
 */

import { log } from 'crawlee';
import { chromium, firefox, webkit } from 'playwright';
import { errorMessage } from '../engine/errors.js';
import { DIRECT, proxyLabel } from '../engine/types.js';
import type { ProxyChoice } from '../engine/types.js';
import { ensureRequestInterception } from '../utils/requestInterception.js';
import type { InterceptablePage } from '../utils/requestInterception.js';
import { BaseFetcher } from './baseFetcher.js';
import type { BaseFetcherOptions } from './baseFetcher.js';
import type { InspectedResponse } from './blockDetection.js';
import { randomUserAgent } from './headers.js';

// ─── Minimal Playwright surface ───────────────────────────────────────────────
// Narrow structural types so tests can hand in a fake browser.

export interface PageLike extends InterceptablePage {
    goto(url: string, options: { timeout: number; waitUntil: 'domcontentloaded' }): Promise<{ status(): number } | null>;
    waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
    content(): Promise<string>;
    url(): string;
}

export interface ContextLike {
    newPage(): Promise<PageLike>;
    close(): Promise<void>;
}

export interface BrowserLike {
    newContext(options: { userAgent: string; locale: string }): Promise<ContextLike>;
    close(): Promise<void>;
}

export interface LaunchSettings {
    headless: boolean;
    proxy?: { server: string; username?: string; password?: string };
}

export interface BrowserLauncher {
    launch(options: LaunchSettings): Promise<BrowserLike>;
}

export type BrowserName = 'chromium' | 'firefox' | 'webkit';

const LAUNCHERS: Record<BrowserName, BrowserLauncher> = { chromium, firefox, webkit };

export interface BrowserFetcherOptions extends BaseFetcherOptions {
    browserType: BrowserName;
    headless: boolean;
    language: string;
    country: string;
    userAgents?: readonly string[];
    blockHeavyResources?: boolean;
    /** Selector that marks a rendered result page. */
    resultsSelector?: string;
    launcher?: BrowserLauncher;
}

/** Playwright takes credentials separately from the server URL. */
export function toPlaywrightProxy(endpoint: string): LaunchSettings['proxy'] {
    const parsed = new URL(endpoint);
    const server = `${parsed.protocol}//${parsed.hostname}${parsed.port ? `:${parsed.port}` : ''}`;
    return {
        server,
        username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
        password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    };
}

export class BrowserFetcher extends BaseFetcher {
    protected readonly name = 'BrowserFetcher';
    private readonly launcher: BrowserLauncher;
    private readonly headless: boolean;
    private readonly locale: string;
    private readonly userAgents: readonly string[] | undefined;
    private readonly blockHeavyResources: boolean;
    private readonly resultsSelector: string;
    private readonly browsers = new Map<string, Promise<BrowserLike>>();

    constructor(options: BrowserFetcherOptions) {
        super(options);
        this.launcher = options.launcher ?? LAUNCHERS[options.browserType];
        this.headless = options.headless;
        this.locale = `${options.language}-${options.country.toUpperCase()}`;
        this.userAgents = options.userAgents;
        this.blockHeavyResources = options.blockHeavyResources ?? true;
        this.resultsSelector = options.resultsSelector ?? '#search';
    }

    protected async request(url: string, proxy: ProxyChoice, timeoutMs: number): Promise<InspectedResponse> {
        const browser = await this.browserFor(proxy);
        const context = await browser.newContext({
            userAgent: randomUserAgent(this.userAgents),
            locale: this.locale,
        });

        try {
            const page = await context.newPage();
            await ensureRequestInterception(page, this.blockHeavyResources);

            const response = await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
            try {
                await page.waitForSelector(this.resultsSelector, { timeout: Math.min(timeoutMs, 10_000) });
            } catch (err) {
                // Challenge pages never render the container; block detection decides next
                log.debug(`[BrowserFetcher] ${this.resultsSelector} not rendered for ${url}: ${errorMessage(err)}`);
            }

            return {
                body: await page.content(),
                statusCode: response?.status() ?? 200,
                finalUrl: page.url(),
            };
        } finally {
            await context.close();
        }
    }

    async close(): Promise<void> {
        const pending = [...this.browsers.values()];
        this.browsers.clear();
        const results = await Promise.allSettled(pending.map(async (b) => (await b).close()));
        for (const r of results) {
            if (r.status === 'rejected') {
                log.warning(`[BrowserFetcher] Failed to close browser: ${errorMessage(r.reason)}`);
            }
        }
    }

    private browserFor(proxy: ProxyChoice): Promise<BrowserLike> {
        const key = proxy === DIRECT ? DIRECT : proxy.endpoint;
        let browser = this.browsers.get(key);
        if (!browser) {
            log.info(`[BrowserFetcher] Launching browser (${this.headless ? 'headless' : 'headed'}) via ${proxyLabel(proxy)}`);
            browser = this.launcher.launch({
                headless: this.headless,
                proxy: proxy === DIRECT ? undefined : toPlaywrightProxy(proxy.endpoint),
            });
            // A failed launch must not poison the cache for later attempts
            void browser.catch(() => this.browsers.delete(key));
            this.browsers.set(key, browser);
        }
        return browser;
    }
}
