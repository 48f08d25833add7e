/**
 * src/utils/logReporter.ts
 *
 * Console side of EngineEvents: one log line per notable step, routed
 * through the Crawlee logger so `--verbose` / HARVESTER_LOG_LEVEL apply.
 */

import { log } from 'crawlee';
import type { EngineEvents } from '../engine/events.js';

export function attachLogReporter(events: EngineEvents): () => void {
    const unsubscribers = [
        events.on('task:started', (e) => {
            log.debug(`[Harvester] → ${e.purpose} "${e.target}" page ${e.page} (attempt ${e.attempt}, ${e.proxy})`);
        }),
        events.on('task:succeeded', (e) => {
            const what = e.purpose === 'scrape' ? `SERP "${e.target}" page ${e.page}` : `suggestions for "${e.target}"`;
            log.info(`[Harvester] ✓ ${what} in ${e.durationMs}ms`);
        }),
        events.on('task:retrying', (e) => {
            log.warning(
                `[Harvester] ↻ ${e.purpose} "${e.target}" ${e.kind}: ${e.message}. ` +
                `Retrying in ${(e.delayMs / 1000).toFixed(1)}s`
            );
        }),
        events.on('extract:skipped', (e) => {
            log.debug(`[Harvester] Skipped ${e.skipped} malformed result blocks for "${e.keyword}" page ${e.page}`);
        }),
        events.on('proxy:restored', (e) => {
            log.debug(`[Harvester] Proxy ${e.proxy} restored`);
        }),
    ];
    return () => unsubscribers.forEach((off) => off());
}
