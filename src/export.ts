/**
 * src/export.ts
 *
 * Writers for finished harvests. The engine knows nothing about files; these
 * functions take the frozen SerpHarvest / KeywordHarvest and write one file
 * in the requested format to the output directory.
 *
 * SERP CSV rows are one organic result each; keyword CSV rows are one node.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { log } from 'crawlee';
import { stringify } from 'csv-stringify/sync';
import type { KeywordNode, SerpResult } from './engine/types.js';
import type { KeywordHarvest, SerpHarvest } from './harvester.js';

export type SerpExportFormat = 'json' | 'csv' | 'jsonl';
export type KeywordExportFormat = SerpExportFormat | 'txt';

export const SERP_EXPORT_FORMATS: readonly SerpExportFormat[] = ['json', 'csv', 'jsonl'];
export const KEYWORD_EXPORT_FORMATS: readonly KeywordExportFormat[] = ['json', 'csv', 'jsonl', 'txt'];

export interface ExportOptions<F extends string> {
    format: F;
    outputDir: string;
    /** File name without extension; a timestamped default is used otherwise. */
    baseName?: string;
    /** TXT only: add a header and per-keyword relevance / depth. */
    includeMetadata?: boolean;
}

// ─── File names ───────────────────────────────────────────────────────────────

/** Replaces characters no file system accepts and caps the length at 200. */
export function sanitizeFilename(name: string): string {
    return name.replace(/[<>:"/\\|?*]/g, '_').slice(0, 200);
}

function timestamp(date: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function defaultBaseName(prefix: string, date: Date = new Date()): string {
    return `${prefix}_${timestamp(date)}`;
}

// ─── Serializers ──────────────────────────────────────────────────────────────

export function serpResultsToCsv(results: readonly SerpResult[]): string {
    const rows = results.flatMap((r) => r.organicResults.map((o) => ({
        keyword: r.keyword,
        page: r.page,
        position: o.position,
        title: o.title,
        url: o.url,
        domain: o.domain,
        description: o.description,
        retrieved_at: r.retrievedAt,
    })));
    return stringify(rows, {
        header: true,
        columns: ['keyword', 'page', 'position', 'title', 'url', 'domain', 'description', 'retrieved_at'],
    });
}

export function keywordsToCsv(nodes: readonly KeywordNode[]): string {
    const rows = nodes.map((n) => ({
        keyword: n.text,
        relevance: n.relevance,
        type: n.type,
        depth: n.depth,
        parent_keyword: n.parent ?? '',
        source_query: n.sourceQuery ?? '',
        discovered_at: n.discoveredAt,
    }));
    return stringify(rows, {
        header: true,
        columns: ['keyword', 'relevance', 'type', 'depth', 'parent_keyword', 'source_query', 'discovered_at'],
    });
}

export function toJsonLines(records: readonly unknown[]): string {
    return records.map((r) => JSON.stringify(r)).join('\n') + (records.length > 0 ? '\n' : '');
}

export function keywordsToText(harvest: KeywordHarvest, includeMetadata = false): string {
    const lines: string[] = [];
    if (includeMetadata) {
        const { metadata } = harvest;
        lines.push(`# Generated: ${metadata.generatedAt}`);
        lines.push(`# Language: ${metadata.language}, Country: ${metadata.country}`);
        lines.push(`# Total keywords: ${harvest.keywords.length}`);
        lines.push('#' + '='.repeat(70), '');
    }
    for (const node of harvest.keywords) {
        lines.push(includeMetadata
            ? `${node.text} (relevance: ${node.relevance}, depth: ${node.depth})`
            : node.text);
    }
    return lines.join('\n') + '\n';
}

// ─── Writers ──────────────────────────────────────────────────────────────────

async function writeOutput(options: ExportOptions<string>, prefix: string, content: string): Promise<string> {
    const baseName = sanitizeFilename(options.baseName ?? defaultBaseName(prefix));
    const filePath = path.join(options.outputDir, `${baseName}.${options.format}`);
    await fs.mkdir(options.outputDir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    log.info(`[Export] Wrote ${filePath}`);
    return filePath;
}

/** Writes the harvest and resolves with the file path. */
export async function exportSerpHarvest(
    harvest: SerpHarvest,
    options: ExportOptions<SerpExportFormat>
): Promise<string> {
    let content: string;
    switch (options.format) {
        case 'json':
            content = JSON.stringify({
                metadata: harvest.metadata,
                results: harvest.results,
                failures: harvest.failures,
            }, null, 2);
            break;
        case 'csv':
            content = serpResultsToCsv(harvest.results);
            break;
        case 'jsonl':
            content = toJsonLines(harvest.results);
            break;
    }
    return writeOutput(options, 'serp_results', content);
}

export async function exportKeywordHarvest(
    harvest: KeywordHarvest,
    options: ExportOptions<KeywordExportFormat>
): Promise<string> {
    let content: string;
    switch (options.format) {
        case 'json':
            content = JSON.stringify({
                metadata: { ...harvest.metadata, statistics: harvest.statistics },
                keywords: harvest.keywords,
                forest: harvest.forest,
                failures: harvest.failures,
            }, null, 2);
            break;
        case 'csv':
            content = keywordsToCsv(harvest.keywords);
            break;
        case 'jsonl':
            content = toJsonLines(harvest.keywords);
            break;
        case 'txt':
            content = keywordsToText(harvest, options.includeMetadata);
            break;
    }
    return writeOutput(options, 'keywords', content);
}
