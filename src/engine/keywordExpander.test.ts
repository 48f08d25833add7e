import { describe, it, expect } from 'vitest';
import { ResultAggregator } from './aggregator.js';
import { noBackoff } from './backoff.js';
import { Deduplicator } from './dedup.js';
import { EngineEvents } from './events.js';
import { KeywordExpander } from './keywordExpander.js';
import { ProxyPool } from './proxyPool.js';
import { RateLimiter } from './rateLimiter.js';
import { Scheduler } from './scheduler.js';
import type { KeywordTree, Modifier } from './types.js';
import { SuggestionClient } from '../extractors/suggestions.js';
import { detectBlockStatus } from '../sources/blockDetection.js';
import { ManualClock, ScriptedFetcher, ok, suggestBody } from '../testing/fakes.js';

type SuggestTable = Record<string, string[]>;

function setup(table: SuggestTable, maxKeywords?: number) {
    const clock = new ManualClock(Date.UTC(2024, 0, 1));
    const events = new EngineEvents();
    const proxyPool = new ProxyPool([], { rotate: false });
    const suggestions = new SuggestionClient();
    const fetcher = new ScriptedFetcher({
        proxyPool,
        resolveUrl: (task) => suggestions.requestUrl(task.target, 'en', 'us'),
        timeoutMs: 5_000,
        detectBlock: detectBlockStatus,
    }, (url) => {
        const q = new URL(url).searchParams.get('q') ?? '';
        return ok(suggestBody(q, table[q] ?? []), url);
    });
    const dedup = new Deduplicator();
    const aggregator = new ResultAggregator();
    const scheduler = new Scheduler({
        fetcher,
        proxyPool,
        rateLimiter: new RateLimiter({ minDelayMs: 0, maxDelayMs: 0, clock }),
        dedup,
        backoff: noBackoff,
        maxConcurrency: 1,
        maxRetries: 1,
        failures: aggregator,
        events,
        clock,
    });
    const expander = new KeywordExpander({ scheduler, suggestions, dedup, aggregator, maxKeywords, clock });
    const queried = (): string[] => fetcher.calls.map((c) => new URL(c.url).searchParams.get('q') ?? '');
    return { expander, aggregator, scheduler, events, queried };
}

function outline(tree: KeywordTree): unknown {
    return { [tree.node.text]: tree.children.map(outline) };
}

const ALPHABET_ONLY: Modifier[] = ['alphabet'];

describe('KeywordExpander', () => {
    it('grows one child under the seed that surfaced it', async () => {
        const { expander, aggregator, queried } = setup({ 'cat a': ['cat anatomy'] });

        const summary = await expander.expand(['cat'], 1, ALPHABET_ONLY);

        expect(queried()).toHaveLength(26);
        expect(queried()[0]).toBe('cat a');
        expect(summary).toMatchObject({ seeds: 1, levelsExpanded: 1 });
        expect(aggregator.keywords()).toEqual([
            {
                text: 'cat',
                depth: 0,
                parent: null,
                relevance: 0,
                type: 'SEED',
                discoveredAt: '2024-01-01T00:00:00.000Z',
                discoveryIndex: 0,
                sourceQuery: null,
            },
            {
                text: 'cat anatomy',
                depth: 1,
                parent: 'cat',
                relevance: 1,
                type: 'QUERY',
                discoveredAt: '2024-01-01T00:00:00.000Z',
                discoveryIndex: 1,
                sourceQuery: 'cat a',
            },
        ]);
        expect(aggregator.forest().map(outline)).toEqual([{ cat: [{ 'cat anatomy': [] }] }]);
    });

    it('records a keyword reachable from two seeds exactly once', async () => {
        const { expander, aggregator } = setup({
            'cat for': ['cat food'],
            'dog for': ['cat food', 'dog food'],
        });

        await expander.expand(['cat', 'dog'], 1, ['prepositions']);

        const keywords = aggregator.keywords();
        expect(keywords.filter((k) => k.text === 'cat food')).toHaveLength(1);
        expect(keywords.map((k) => [k.text, k.parent])).toEqual([
            ['cat', null],
            ['dog', null],
            ['cat food', 'cat'],
            ['dog food', 'dog'],
        ]);
    });

    it('never expands past maxDepth and never re-adds a known keyword', async () => {
        const { expander, aggregator, queried } = setup({
            'cat a': ['cat anatomy'],
            'cat b': ['cat', 'Cat  Anatomy'],
            'cat anatomy a': ['cat anatomy app'],
            'cat anatomy app a': ['cat anatomy app android'],
        });

        const summary = await expander.expand(['cat'], 2, ALPHABET_ONLY);

        expect(summary.levelsExpanded).toBe(2);
        expect(queried()).toHaveLength(52);
        expect(queried()).not.toContain('cat anatomy app a');
        expect(aggregator.forest().map(outline)).toEqual([
            { cat: [{ 'cat anatomy': [{ 'cat anatomy app': [] }] }] },
        ]);
        expect(Math.max(...aggregator.keywords().map((k) => k.depth))).toBe(2);
    });

    it('returns only the seeds at depth zero', async () => {
        const { expander, aggregator, queried } = setup({});
        const summary = await expander.expand(['  cat  food ', 'Cat Food', ''], 0, ALPHABET_ONLY);

        expect(queried()).toEqual([]);
        expect(summary).toMatchObject({ seeds: 1, levelsExpanded: 0 });
        expect(aggregator.keywords().map((k) => k.text)).toEqual(['cat food']);
    });

    it('stops the run once the keyword limit is reached', async () => {
        const table: SuggestTable = {};
        for (const letter of 'abcdefghijklmnopqrstuvwxyz') table[`cat ${letter}`] = [`cat ${letter}1`, `cat ${letter}2`];
        const { expander, aggregator, events } = setup(table, 4);
        const stops: string[] = [];
        events.on('run:stopped', (e) => stops.push(e.reason));

        const summary = await expander.expand(['cat'], 3, ALPHABET_ONLY);

        expect(aggregator.keywords().map((k) => k.text)).toEqual(['cat', 'cat a1', 'cat a2', 'cat b1']);
        expect(stops).toEqual(['keyword limit of 4 reached']);
        expect(summary.levelsExpanded).toBe(1);
        expect(summary.report).toMatchObject({ dispatched: 2, succeeded: 2, cancelled: 24 });
    });
});
