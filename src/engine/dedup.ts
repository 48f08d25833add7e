/**
 * src/engine/dedup.ts
 *
 * Run-wide visited set. The single place that decides whether a keyword has
 * already been fetched (per purpose) or already claimed as a keyword node.
 *
 * tryVisit() is a synchronous check-and-mark: there is no await between the
 * lookup and the insert, so concurrent workers on the event loop can never
 * both win the same key.
 */

import { log } from 'crawlee';
import type { TaskPurpose, VisitPurpose } from './types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface VisitedKey {
    text: string;
    purpose: VisitPurpose;
    /** SERP page; only pages after the first are part of the key. */
    page?: number;
}

interface PurposeStats {
    claimed: number;
    rejected: number;
}

export type DedupStats = Record<VisitPurpose, PurposeStats>;

// ─── Normalisation ────────────────────────────────────────────────────────────

/** Lower-case, trim and collapse internal whitespace. */
export function normalizeKeyword(text: string): string {
    return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function visitedKeyFor(target: string, purpose: TaskPurpose, page = 1): VisitedKey {
    return purpose === 'scrape' && page > 1
        ? { text: target, purpose, page }
        : { text: target, purpose };
}

function serialize(key: VisitedKey): string {
    const base = `${key.purpose}\u0000${normalizeKeyword(key.text)}`;
    return key.page !== undefined && key.page > 1 ? `${base}\u0000${key.page}` : base;
}

// ─── Deduplicator ─────────────────────────────────────────────────────────────

export class Deduplicator {
    private readonly seen = new Set<string>();
    private readonly counters: DedupStats = {
        scrape: { claimed: 0, rejected: 0 },
        suggest: { claimed: 0, rejected: 0 },
        keyword: { claimed: 0, rejected: 0 },
    };

    constructor(private readonly logSkipped = false) {}

    /**
     * Claims `key`. Returns true only for the first caller; every later call
     * for the same normalised key returns false.
     */
    tryVisit(key: VisitedKey): boolean {
        const id = serialize(key);
        const stats = this.counters[key.purpose];
        if (this.seen.has(id)) {
            stats.rejected++;
            if (this.logSkipped) {
                log.debug(`[Dedup] SKIP ${key.purpose}: "${normalizeKeyword(key.text)}"`);
            }
            return false;
        }
        this.seen.add(id);
        stats.claimed++;
        return true;
    }

    has(key: VisitedKey): boolean {
        return this.seen.has(serialize(key));
    }

    get size(): number {
        return this.seen.size;
    }

    stats(): DedupStats {
        return {
            scrape: { ...this.counters.scrape },
            suggest: { ...this.counters.suggest },
            keyword: { ...this.counters.keyword },
        };
    }
}
