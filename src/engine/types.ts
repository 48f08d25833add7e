/**
 * src/engine/types.ts
 *
 * Shared types for the harvester engine: tasks, proxies, SERP records and
 * keyword nodes. Every flow (SERP scrape, suggestion expansion) speaks in
 * these types; exporters receive them read-only.
 */

// ─── Tasks ────────────────────────────────────────────────────────────────────

export type TaskPurpose = 'scrape' | 'suggest';

/**
 * `keyword` is not a fetch purpose: the expander uses it to claim
 * keyword texts so a node is discovered at most once per run.
 */
export type VisitPurpose = TaskPurpose | 'keyword';

export type TaskState = 'pending' | 'in-flight' | 'succeeded' | 'retrying' | 'failed';

export interface TaskRequest {
    target: string;
    purpose: TaskPurpose;
    page?: number;          // 1-based, scrape only
    depth?: number;         // expansion depth of the keyword that spawned this task
    parent?: string | null; // keyword whose expansion produced this prefix
}

export interface FetchTask {
    readonly id: number;
    readonly target: string;
    readonly purpose: TaskPurpose;
    readonly page: number;
    readonly depth: number;
    readonly parent: string | null;
    retryCount: number;
    proxy: ProxyChoice | null;
    state: TaskState;
    /** The single budget-free retry granted after the first block page. */
    blockedRetryUsed: boolean;
    /** Fetch attempts made so far, including the current one. */
    attempts: number;
}

// ─── Proxies ──────────────────────────────────────────────────────────────────

export interface ProxyRecord {
    endpoint: string;
    /** successes − 2 × consecutiveFailures */
    health: number;
    successes: number;
    consecutiveFailures: number;
    lastUsedAt: number;
    quarantinedUntil: number | null;
}

/** Sentinel for "no proxy": the request goes out from the host itself. */
export const DIRECT = 'direct' as const;
export type DirectProxy = typeof DIRECT;

export type ProxyChoice = ProxyRecord | DirectProxy;

export type ProxyOutcome = 'success' | 'failure' | 'blocked';

export function proxyLabel(proxy: ProxyChoice | null): string {
    if (proxy === null || proxy === DIRECT) return DIRECT;
    // Never print credentials
    return proxy.endpoint.split('@').pop() ?? proxy.endpoint;
}

// ─── Fetch ────────────────────────────────────────────────────────────────────

export interface FetchResponse {
    content: string;
    statusCode: number;
    url: string;
    durationMs: number;
}

// ─── SERP ─────────────────────────────────────────────────────────────────────

export interface OrganicResult {
    readonly url: string;
    readonly title: string;
    readonly description: string;
    readonly domain: string;
    readonly position: number;
}

export interface SerpResult {
    readonly keyword: string;
    readonly page: number;
    readonly url: string;
    readonly organicResults: readonly OrganicResult[];
    readonly relatedKeywords: readonly string[];
    readonly peopleAlsoAsk: readonly string[];
    readonly retrievedAt: string;
}

// ─── Keywords ─────────────────────────────────────────────────────────────────

export type Modifier = 'alphabet' | 'questions' | 'prepositions';

export interface Suggestion {
    text: string;
    relevance: number;
    type: string;
    sourceQuery: string;
}

export interface KeywordNode {
    readonly text: string;
    readonly depth: number;
    readonly parent: string | null;
    readonly relevance: number;
    /** Suggestion type reported by the API ("QUERY", …); "SEED" for seeds. */
    readonly type: string;
    readonly discoveredAt: string;
    readonly discoveryIndex: number;
    /** Suggestion prefix that surfaced this keyword; null for seeds. */
    readonly sourceQuery: string | null;
}

export interface KeywordTree {
    readonly node: KeywordNode;
    readonly children: readonly KeywordTree[];
}

// ─── Diagnostics ──────────────────────────────────────────────────────────────

export type FailureKind = 'network' | 'timeout' | 'blocked' | 'parse' | 'config' | 'unexpected';

export interface FailureRecord {
    readonly target: string;
    readonly purpose: TaskPurpose;
    readonly page: number;
    readonly depth: number;
    /** Kind of the last failure before the task was abandoned. */
    readonly kind: FailureKind;
    readonly message: string;
    readonly attempts: number;
    readonly failedAt: string;
}
