/**
 * src/harvester.ts
 *
 * Facade over the engine. Each call builds a fresh engine from the validated
 * RunConfig (proxy pool, rate limiter, deduplicator, scheduler, fetchers),
 * runs one flow to completion and hands back frozen results plus run
 * metadata. Nothing is shared between calls.
 *
 *   scrapeSerps(keywords)     → SerpHarvest     (scrape tasks, SERP extractor)
 *   harvestKeywords(seeds)    → KeywordHarvest  (suggest tasks, BFS expansion)
 */

import { log } from 'crawlee';
import type { RunConfig } from './config/runConfig.js';
import { ResultAggregator } from './engine/aggregator.js';
import { exponentialBackoff } from './engine/backoff.js';
import type { BackoffPolicy } from './engine/backoff.js';
import { Deduplicator } from './engine/dedup.js';
import type { DedupStats } from './engine/dedup.js';
import { EngineEvents } from './engine/events.js';
import { KeywordExpander } from './engine/keywordExpander.js';
import { ProxyPool } from './engine/proxyPool.js';
import { RateLimiter } from './engine/rateLimiter.js';
import { Scheduler } from './engine/scheduler.js';
import type { SchedulerReport } from './engine/scheduler.js';
import type {
    FailureRecord,
    KeywordNode,
    KeywordTree,
    Modifier,
    ProxyRecord,
    SerpResult,
} from './engine/types.js';
import { SerpExtractor } from './extractors/serp.js';
import { SuggestionClient } from './extractors/suggestions.js';
import type { BaseFetcherOptions } from './sources/baseFetcher.js';
import { detectBlockPage, detectBlockStatus, withExtraMarkers } from './sources/blockDetection.js';
import { BrowserFetcher } from './sources/browserFetcher.js';
import type { BrowserLauncher } from './sources/browserFetcher.js';
import { HttpFetcher } from './sources/httpFetcher.js';
import { PurposeRouter } from './sources/purposeRouter.js';
import { createTargetResolver } from './sources/targets.js';
import type { Fetcher } from './sources/types.js';
import { systemClock } from './utils/clock.js';
import type { Clock } from './utils/clock.js';
import { computeKeywordStats } from './utils/keywordStats.js';
import { attachLogReporter } from './utils/logReporter.js';
import type { KeywordStats } from './utils/keywordStats.js';
import { RunMetrics } from './utils/metrics.js';
import type { MetricsSnapshot } from './utils/metrics.js';
import { createRunContext } from './utils/runContext.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface HarvesterDeps {
    /**
     * Replaces the HTTP / browser fetchers, e.g. with a stub in tests. Called
     * once per flow with that engine's proxy pool, so outcome reports reach
     * the pool the scheduler acquires from.
     */
    fetcher?: (wiring: BaseFetcherOptions) => Fetcher;
    /** Browser launcher for the Playwright fetcher. */
    launcher?: BrowserLauncher;
    events?: EngineEvents;
    clock?: Clock;
    random?: () => number;
}

export interface RunMetadata {
    runId: string;
    language: string;
    country: string;
    startedAt: string;
    generatedAt: string;
    maxDepth: number | null;
    modifiers: readonly Modifier[];
    stopReason: string | null;
    scheduler: SchedulerReport;
    metrics: MetricsSnapshot;
    dedup: DedupStats;
    proxies: readonly ProxyRecord[];
}

export interface SerpHarvest {
    readonly results: readonly SerpResult[];
    readonly failures: readonly FailureRecord[];
    readonly skippedItems: number;
    readonly metadata: RunMetadata;
}

export interface KeywordHarvest {
    /** Every node, seeds included, ordered by (depth, discovery). */
    readonly keywords: readonly KeywordNode[];
    readonly forest: readonly KeywordTree[];
    /** Figures over the discovered keywords (seeds excluded). */
    readonly statistics: KeywordStats;
    readonly failures: readonly FailureRecord[];
    readonly metadata: RunMetadata;
}

interface Engine {
    scheduler: Scheduler;
    aggregator: ResultAggregator;
    dedup: Deduplicator;
    proxyPool: ProxyPool;
    fetcher: Fetcher;
    suggestions: SuggestionClient;
    metrics: RunMetrics;
    detach: () => void;
}

// ─── Harvester ────────────────────────────────────────────────────────────────

export class Harvester {
    readonly events: EngineEvents;
    private readonly clock: Clock;
    private readonly random: () => number;
    private active: Scheduler | null = null;

    constructor(readonly config: RunConfig, private readonly deps: HarvesterDeps = {}) {
        this.events = deps.events ?? new EngineEvents();
        this.clock = deps.clock ?? systemClock;
        this.random = deps.random ?? Math.random;
    }

    /** Scrapes `pagesPerKeyword` result pages for every keyword. */
    async scrapeSerps(keywords: readonly string[], pagesPerKeyword = this.config.pagesPerKeyword): Promise<SerpHarvest> {
        const context = createRunContext(this.clock);
        const engine = this.buildEngine();
        const extractor = new SerpExtractor(undefined, () => new Date(this.clock.now()));

        engine.scheduler.handle('scrape', (task, response) => {
            const { result, skipped } = extractor.extract(response.content, task.target, task.page, response.url);
            engine.aggregator.addSerpResult(task.id, result);
            if (skipped > 0) {
                engine.aggregator.recordSkipped(skipped);
                this.events.emit('extract:skipped', { keyword: task.target, page: task.page, skipped });
            }
        });

        let submitted = 0;
        for (const keyword of keywords) {
            for (let page = 1; page <= pagesPerKeyword; page++) {
                if (engine.scheduler.submit({ target: keyword, purpose: 'scrape', page })) submitted++;
            }
        }
        log.info(`[Harvester] Scraping ${submitted} result pages for ${keywords.length} keywords`);

        const report = await this.runEngine(engine, () => engine.scheduler.run());
        const snapshot = engine.aggregator.snapshot();

        return Object.freeze({
            results: snapshot.serpResults,
            failures: snapshot.failures,
            skippedItems: snapshot.skippedItems,
            metadata: this.metadata(engine, context, report, null),
        });
    }

    /** Expands `seeds` breadth-first through the suggestion API. */
    async harvestKeywords(
        seeds: readonly string[],
        maxDepth = this.config.maxDepth,
        modifiers: readonly Modifier[] = this.config.modifiers
    ): Promise<KeywordHarvest> {
        const context = createRunContext(this.clock);
        const engine = this.buildEngine();
        const expander = new KeywordExpander({
            scheduler: engine.scheduler,
            suggestions: engine.suggestions,
            dedup: engine.dedup,
            aggregator: engine.aggregator,
            includeBaseQuery: this.config.includeBaseQuery,
            maxKeywords: this.config.maxKeywords,
            clock: this.clock,
        });

        log.info(`[Harvester] Expanding ${seeds.length} seeds to depth ${maxDepth} (${modifiers.join(', ') || 'no modifiers'})`);

        const summary = await this.runEngine(engine, () => expander.expand(seeds, maxDepth, modifiers));
        const snapshot = engine.aggregator.snapshot();

        return Object.freeze({
            keywords: snapshot.keywords,
            forest: snapshot.forest,
            statistics: Object.freeze(computeKeywordStats(snapshot.keywords.filter((k) => k.depth > 0))),
            failures: snapshot.failures,
            metadata: this.metadata(engine, context, summary.report, { maxDepth, modifiers }),
        });
    }

    /** Cooperative stop of the flow in progress, if any. */
    stop(reason = 'stopped by caller'): void {
        this.active?.stop(reason);
    }

    // ─── Internals ────────────────────────────────────────────────────────────

    private async runEngine<T>(engine: Engine, work: () => Promise<T>): Promise<T> {
        this.active = engine.scheduler;
        try {
            return await work();
        } finally {
            this.active = null;
            engine.detach();
            engine.metrics.logSummary();
            await engine.fetcher.close();
        }
    }

    private buildEngine(): Engine {
        const cfg = this.config;

        const proxyPool = new ProxyPool(cfg.proxyUrls, {
            rotate: cfg.rotateProxy,
            quarantineThreshold: cfg.quarantineThreshold,
            cooldownMs: cfg.quarantineCooldownMs,
            allowDirectFallback: cfg.allowDirectFallback,
            clock: this.clock,
            events: this.events,
        });
        const rateLimiter = new RateLimiter({
            minDelayMs: cfg.minDelay * 1000,
            maxDelayMs: cfg.maxDelay * 1000,
            clock: this.clock,
            random: this.random,
        });
        const backoff: BackoffPolicy = exponentialBackoff({
            baseMs: cfg.backoffBaseMs,
            maxMs: cfg.backoffMaxMs,
            random: this.random,
        });
        const suggestions = new SuggestionClient({
            vertical: cfg.suggestVertical,
            minRelevance: cfg.minRelevance,
            timeoutMs: cfg.requestTimeoutMs,
        });

        const dedup = new Deduplicator(true);
        const aggregator = new ResultAggregator();
        const wiring: BaseFetcherOptions = {
            proxyPool,
            resolveUrl: createTargetResolver(
                {
                    googleDomain: cfg.googleDomain,
                    resultsPerPage: cfg.resultsPerPage,
                    language: cfg.language,
                    country: cfg.country,
                },
                suggestions
            ),
            timeoutMs: cfg.requestTimeoutMs,
        };
        const fetcher = this.deps.fetcher ? this.deps.fetcher(wiring) : this.buildFetcher(wiring);

        const scheduler = new Scheduler({
            fetcher,
            proxyPool,
            rateLimiter,
            dedup,
            backoff,
            maxConcurrency: cfg.maxConcurrency,
            maxRetries: cfg.maxRetries,
            maxRequests: cfg.maxRequests,
            failures: aggregator,
            events: this.events,
            clock: this.clock,
        });

        const metrics = new RunMetrics(this.clock);
        const detachMetrics = metrics.attach(this.events);
        const detachReporter = attachLogReporter(this.events);
        const detach = (): void => {
            detachMetrics();
            detachReporter();
        };

        return { scheduler, aggregator, dedup, proxyPool, fetcher, suggestions, metrics, detach };
    }

    private buildFetcher(wiring: BaseFetcherOptions): Fetcher {
        const cfg = this.config;
        const pageDetector = cfg.blockMarkers.length > 0
            ? withExtraMarkers(cfg.blockMarkers, detectBlockPage)
            : detectBlockPage;
        const userAgents = cfg.userAgents.length > 0 ? cfg.userAgents : undefined;

        const suggestFetcher = new HttpFetcher({
            ...wiring,
            detectBlock: detectBlockStatus,
            language: cfg.language,
            country: cfg.country,
            userAgents,
        });

        const serpFetcher: Fetcher = cfg.serpFetchMode === 'browser'
            ? new BrowserFetcher({
                ...wiring,
                detectBlock: pageDetector,
                browserType: cfg.browserType,
                headless: cfg.headless,
                language: cfg.language,
                country: cfg.country,
                userAgents,
                launcher: this.deps.launcher,
            })
            : new HttpFetcher({
                ...wiring,
                detectBlock: pageDetector,
                language: cfg.language,
                country: cfg.country,
                userAgents,
            });

        return new PurposeRouter({ scrape: serpFetcher, suggest: suggestFetcher });
    }

    private metadata(
        engine: Engine,
        context: { runId: string; startedAt: string },
        report: SchedulerReport,
        expansion: { maxDepth: number; modifiers: readonly Modifier[] } | null
    ): RunMetadata {
        return Object.freeze({
            runId: context.runId,
            language: this.config.language,
            country: this.config.country,
            startedAt: context.startedAt,
            generatedAt: new Date(this.clock.now()).toISOString(),
            maxDepth: expansion ? expansion.maxDepth : null,
            modifiers: Object.freeze([...(expansion ? expansion.modifiers : [])]),
            stopReason: report.stopReason,
            scheduler: report,
            metrics: engine.metrics.snapshot(),
            dedup: engine.dedup.stats(),
            proxies: engine.proxyPool.snapshot(),
        });
    }
}
