/**
 * Summary figures for a harvested keyword set.
 */

import type { KeywordNode } from '../engine/types.js';

export interface TopKeyword {
    keyword: string;
    relevance: number;
    depth: number;
}

export interface KeywordStats {
    totalKeywords: number;
    averageRelevance: number;
    averageKeywordLength: number;
    averageWordCount: number;
    /** depth → number of keywords at that depth */
    depthDistribution: Record<number, number>;
    topKeywords: TopKeyword[];
    /** Share of keywords with three or more words, 0–100. */
    longTailPercentage: number;
}

const TOP_KEYWORDS = 20;
const LONG_TAIL_WORDS = 3;

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

function wordCount(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
}

export function computeKeywordStats(nodes: readonly KeywordNode[]): KeywordStats {
    if (nodes.length === 0) {
        return {
            totalKeywords: 0,
            averageRelevance: 0,
            averageKeywordLength: 0,
            averageWordCount: 0,
            depthDistribution: {},
            topKeywords: [],
            longTailPercentage: 0,
        };
    }

    const total = nodes.length;
    const depthDistribution: Record<number, number> = {};
    let relevanceSum = 0;
    let lengthSum = 0;
    let wordSum = 0;
    let longTail = 0;

    for (const node of nodes) {
        depthDistribution[node.depth] = (depthDistribution[node.depth] ?? 0) + 1;
        relevanceSum += node.relevance;
        lengthSum += node.text.length;
        const words = wordCount(node.text);
        wordSum += words;
        if (words >= LONG_TAIL_WORDS) longTail++;
    }

    // Stable sort keeps discovery order among equal relevance
    const topKeywords = [...nodes]
        .sort((a, b) => b.relevance - a.relevance)
        .slice(0, TOP_KEYWORDS)
        .map((n) => ({ keyword: n.text, relevance: n.relevance, depth: n.depth }));

    return {
        totalKeywords: total,
        averageRelevance: round(relevanceSum / total, 2),
        averageKeywordLength: round(lengthSum / total, 1),
        averageWordCount: round(wordSum / total, 1),
        depthDistribution,
        topKeywords,
        longTailPercentage: round((longTail / total) * 100, 1),
    };
}
