/**
 * src/engine/aggregator.ts
 *
 * Collects what the workers produce. Completions arrive in any order, so
 * nothing here trusts arrival order: SERP pages are ordered by the id of the
 * task that fetched them, organic results by position, keyword nodes by
 * (depth, discovery index). All ordering happens at read time.
 */

import type { FailureRecord, KeywordNode, KeywordTree, OrganicResult, SerpResult } from './types.js';

interface SerpEntry {
    taskId: number;
    result: SerpResult;
}

export interface AggregateSnapshot {
    serpResults: readonly SerpResult[];
    keywords: readonly KeywordNode[];
    forest: readonly KeywordTree[];
    failures: readonly FailureRecord[];
    skippedItems: number;
}

function byPosition(a: OrganicResult, b: OrganicResult): number {
    return a.position - b.position;
}

function byDepthThenDiscovery(a: KeywordNode, b: KeywordNode): number {
    return a.depth - b.depth || a.discoveryIndex - b.discoveryIndex;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const inner of Object.values(value)) deepFreeze(inner);
    }
    return value;
}

export class ResultAggregator {
    private readonly serpEntries: SerpEntry[] = [];
    private readonly nodes = new Map<string, KeywordNode>();
    private readonly failureRecords: FailureRecord[] = [];
    private skipped = 0;
    private discoveryCounter = 0;

    // ─── Writes ───────────────────────────────────────────────────────────────

    addSerpResult(taskId: number, result: SerpResult): void {
        this.serpEntries.push({ taskId, result });
    }

    /** Next value for KeywordNode.discoveryIndex. */
    nextDiscoveryIndex(): number {
        return this.discoveryCounter++;
    }

    /** Callers claim the text through the Deduplicator first; a repeat here is a bug. */
    addKeyword(node: KeywordNode): void {
        if (this.nodes.has(node.text)) {
            throw new Error(`Keyword "${node.text}" recorded twice`);
        }
        this.nodes.set(node.text, node);
    }

    recordFailure(failure: FailureRecord): void {
        this.failureRecords.push(failure);
    }

    recordSkipped(count: number): void {
        this.skipped += count;
    }

    // ─── Reads ────────────────────────────────────────────────────────────────

    get keywordCount(): number {
        return this.nodes.size;
    }

    get skippedItems(): number {
        return this.skipped;
    }

    serpResults(): SerpResult[] {
        return [...this.serpEntries]
            .sort((a, b) => a.taskId - b.taskId)
            .map(({ result }) => ({
                ...result,
                organicResults: [...result.organicResults].sort(byPosition),
            }));
    }

    keywords(): KeywordNode[] {
        return [...this.nodes.values()].sort(byDepthThenDiscovery);
    }

    /** Roots are depth-0 nodes; children follow discovery order. */
    forest(): KeywordTree[] {
        const ordered = this.keywords();
        const children = new Map<string, KeywordNode[]>();
        for (const node of ordered) {
            if (node.parent === null) continue;
            const siblings = children.get(node.parent) ?? [];
            siblings.push(node);
            children.set(node.parent, siblings);
        }

        const build = (node: KeywordNode): KeywordTree => ({
            node,
            children: (children.get(node.text) ?? []).map(build),
        });

        return ordered.filter((n) => n.parent === null).map(build);
    }

    failures(): FailureRecord[] {
        return [...this.failureRecords];
    }

    snapshot(): AggregateSnapshot {
        return deepFreeze({
            serpResults: this.serpResults(),
            keywords: this.keywords().map((n) => ({ ...n })),
            forest: this.forest(),
            failures: this.failures().map((f) => ({ ...f })),
            skippedItems: this.skipped,
        });
    }
}
