import { describe, it, expect } from 'vitest';
import { computeKeywordStats } from './keywordStats.js';
import type { KeywordNode } from '../engine/types.js';

function kw(text: string, depth: number, relevance: number, discoveryIndex: number): KeywordNode {
    return {
        text,
        depth,
        parent: 'seed',
        relevance,
        type: 'QUERY',
        discoveredAt: '2024-01-01T00:00:00.000Z',
        discoveryIndex,
        sourceQuery: 'seed a',
    };
}

describe('computeKeywordStats', () => {
    it('returns zeros for an empty set', () => {
        expect(computeKeywordStats([])).toEqual({
            totalKeywords: 0,
            averageRelevance: 0,
            averageKeywordLength: 0,
            averageWordCount: 0,
            depthDistribution: {},
            topKeywords: [],
            longTailPercentage: 0,
        });
    });

    it('summarises relevance, length, depth and long-tail share', () => {
        const stats = computeKeywordStats([
            kw('cat', 1, 100, 0),
            kw('cat food brands', 1, 300, 1),
            kw('cat toys', 2, 300, 2),
        ]);

        expect(stats).toEqual({
            totalKeywords: 3,
            averageRelevance: 233.33,
            averageKeywordLength: 8.7,
            averageWordCount: 2,
            depthDistribution: { 1: 2, 2: 1 },
            topKeywords: [
                { keyword: 'cat food brands', relevance: 300, depth: 1 },
                { keyword: 'cat toys', relevance: 300, depth: 2 },
                { keyword: 'cat', relevance: 100, depth: 1 },
            ],
            longTailPercentage: 33.3,
        });
    });

    it('keeps the top twenty only', () => {
        const nodes = Array.from({ length: 25 }, (_, i) => kw(`kw ${i}`, 1, i, i));
        const { topKeywords } = computeKeywordStats(nodes);
        expect(topKeywords).toHaveLength(20);
        expect(topKeywords[0]).toEqual({ keyword: 'kw 24', relevance: 24, depth: 1 });
        expect(topKeywords[19].keyword).toBe('kw 5');
    });
});
