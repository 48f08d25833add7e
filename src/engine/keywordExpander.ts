/**
 * src/engine/keywordExpander.ts
 *
 * Breadth-first keyword discovery over the suggestion API.
 *
 *   depth 0      seeds
 *   depth d → d+1  every node at depth d is turned into prefixes (modifiers),
 *                  each prefix becomes one `suggest` task, and every returned
 *                  suggestion not yet claimed becomes a node at depth d+1
 *
 * One level is drained through the Scheduler before the next one is
 * submitted; a stop() between levels ends the traversal. The first task to claim a keyword keeps
 * it: the result is a forest, never a graph.
 */

import { log } from 'crawlee';
import type { ResultAggregator } from './aggregator.js';
import type { Deduplicator } from './dedup.js';
import type { Scheduler, SchedulerReport } from './scheduler.js';
import type { FetchResponse, FetchTask, KeywordNode, Modifier } from './types.js';
import { buildPrefixes } from '../config/modifiers.js';
import type { SuggestionClient } from '../extractors/suggestions.js';
import { systemClock } from '../utils/clock.js';
import type { Clock } from '../utils/clock.js';

export interface KeywordExpanderOptions {
    scheduler: Scheduler;
    suggestions: Pick<SuggestionClient, 'parse'>;
    dedup: Deduplicator;
    aggregator: ResultAggregator;
    /** Also ask for completions of the bare keyword. */
    includeBaseQuery?: boolean;
    /** Stop the run once this many nodes (seeds included) exist. */
    maxKeywords?: number;
    clock?: Clock;
}

export interface ExpansionSummary {
    seeds: number;
    /** Levels whose suggestion tasks were run. */
    levelsExpanded: number;
    report: SchedulerReport;
}

export class KeywordExpander {
    private readonly clock: Clock;
    private nextLevel: KeywordNode[] = [];

    constructor(private readonly options: KeywordExpanderOptions) {
        this.clock = options.clock ?? systemClock;
        options.scheduler.handle('suggest', (task, response) => this.onSuggestions(task, response));
    }

    async expand(
        seeds: readonly string[],
        maxDepth: number,
        modifiers: readonly Modifier[]
    ): Promise<ExpansionSummary> {
        const { scheduler } = this.options;

        let level = this.claimSeeds(seeds);
        const seedCount = level.length;
        let depth = 0;

        while (level.length > 0 && depth < maxDepth && !scheduler.stopped) {
            this.nextLevel = [];

            let submitted = 0;
            for (const node of level) {
                for (const prefix of buildPrefixes(node.text, modifiers, this.options.includeBaseQuery)) {
                    if (scheduler.submit({ target: prefix, purpose: 'suggest', depth, parent: node.text })) {
                        submitted++;
                    }
                }
            }

            log.info(`[Expander] Depth ${depth}: ${level.length} keywords → ${submitted} suggestion requests`);
            await scheduler.run();

            level = this.nextLevel;
            depth++;
            log.info(`[Expander] Depth ${depth}: discovered ${level.length} new keywords`);
        }

        this.nextLevel = [];
        return { seeds: seedCount, levelsExpanded: depth, report: scheduler.report() };
    }

    // ─── Internals ────────────────────────────────────────────────────────────

    private claimSeeds(seeds: readonly string[]): KeywordNode[] {
        const claimed: KeywordNode[] = [];
        for (const seed of seeds) {
            const text = seed.trim().replace(/\s+/g, ' ');
            if (!text || this.limitReached()) continue;
            const node = this.claim(text, 0, null, { relevance: 0, type: 'SEED', sourceQuery: null });
            if (node) claimed.push(node);
        }
        return claimed;
    }

    private onSuggestions(task: FetchTask, response: FetchResponse): void {
        const suggestions = this.options.suggestions.parse(response.content, task.target);
        const parent = task.parent ?? task.target;

        for (const suggestion of suggestions) {
            if (this.limitReached()) {
                this.options.scheduler.stop(`keyword limit of ${this.options.maxKeywords} reached`);
                return;
            }
            const node = this.claim(suggestion.text, task.depth + 1, parent, suggestion);
            if (node) this.nextLevel.push(node);
        }

        if (this.limitReached()) {
            this.options.scheduler.stop(`keyword limit of ${this.options.maxKeywords} reached`);
        }
    }

    private claim(
        text: string,
        depth: number,
        parent: string | null,
        origin: Pick<KeywordNode, 'relevance' | 'type' | 'sourceQuery'>
    ): KeywordNode | null {
        const { dedup, aggregator, scheduler } = this.options;
        if (!dedup.tryVisit({ text, purpose: 'keyword' })) return null;

        const node: KeywordNode = {
            text,
            depth,
            parent,
            relevance: origin.relevance,
            type: origin.type,
            discoveredAt: new Date(this.clock.now()).toISOString(),
            discoveryIndex: aggregator.nextDiscoveryIndex(),
            sourceQuery: origin.sourceQuery,
        };
        aggregator.addKeyword(node);
        scheduler.events.emit('keyword:discovered', { text, depth, parent });
        return node;
    }

    private limitReached(): boolean {
        const max = this.options.maxKeywords;
        return max !== undefined && this.options.aggregator.keywordCount >= max;
    }
}
