export { Harvester } from './harvester.js';
export type { HarvesterDeps, KeywordHarvest, RunMetadata, SerpHarvest } from './harvester.js';
export { parseRunConfig, runConfigFromEnv, runConfigSchema } from './config/runConfig.js';
export type { RunConfig, RunConfigInput } from './config/runConfig.js';
export { loadEnv } from './config/env.js';
export { buildPrefixes, MODIFIERS } from './config/modifiers.js';

export { Scheduler } from './engine/scheduler.js';
export type { SchedulerOptions, SchedulerReport, TaskHandler } from './engine/scheduler.js';
export { ProxyPool } from './engine/proxyPool.js';
export { RateLimiter } from './engine/rateLimiter.js';
export { Deduplicator, normalizeKeyword } from './engine/dedup.js';
export { KeywordExpander } from './engine/keywordExpander.js';
export { ResultAggregator } from './engine/aggregator.js';
export { EngineEvents } from './engine/events.js';
export type { EngineEventMap, EngineEventName } from './engine/events.js';
export { exponentialBackoff, noBackoff } from './engine/backoff.js';
export type { BackoffPolicy } from './engine/backoff.js';
export * from './engine/errors.js';
export * from './engine/types.js';

export { SerpExtractor, DEFAULT_SERP_SELECTORS } from './extractors/serp.js';
export { SuggestionClient } from './extractors/suggestions.js';
export { HttpFetcher } from './sources/httpFetcher.js';
export { BrowserFetcher } from './sources/browserFetcher.js';
export { PurposeRouter } from './sources/purposeRouter.js';
export { detectBlockPage, detectBlockStatus, withExtraMarkers } from './sources/blockDetection.js';
export type { BlockDetector } from './sources/blockDetection.js';
export type { Fetcher } from './sources/types.js';

export { exportKeywordHarvest, exportSerpHarvest } from './export.js';
export { computeKeywordStats } from './utils/keywordStats.js';
