import chalk from 'chalk';
import type { Suggestion } from '../engine/types.js';
import type { KeywordHarvest, SerpHarvest } from '../harvester.js';

function buildBox(lines: string[]): string {
    const width = Math.max(...lines.map((line) => line.length), 35);
    const top = `┌${'─'.repeat(width + 2)}┐`;
    const body = lines.map((line) => `│ ${line.padEnd(width)} │`).join('\n');
    const bottom = `└${'─'.repeat(width + 2)}┘`;
    return `${top}\n${body}\n${bottom}`;
}

export function printSettings(title: string, rows: ReadonlyArray<readonly [string, string]>): void {
    const labelWidth = Math.max(...rows.map(([label]) => label.length));
    console.log(chalk.cyan(buildBox([
        title,
        '',
        ...rows.map(([label, value]) => `${label.padEnd(labelWidth)} : ${value}`),
    ])));
}

function printFailures(failures: SerpHarvest['failures']): void {
    if (failures.length === 0) return;
    console.log(chalk.yellow(`${failures.length} requests failed:`));
    for (const f of failures) {
        console.log(chalk.dim(`  ✗ ${f.purpose} "${f.target}" page ${f.page} (${f.kind}, ${f.attempts} attempts)`));
    }
}

export function printSerpSummary(harvest: SerpHarvest, filePath: string | null): void {
    const organic = harvest.results.reduce((sum, r) => sum + r.organicResults.length, 0);
    console.log();
    console.log(chalk.green('✓ Scraping complete!'));
    if (filePath) console.log(`Results saved to: ${chalk.cyan(filePath)}`);
    console.log(`Pages: ${chalk.yellow(String(harvest.results.length))}  Organic results: ${chalk.yellow(String(organic))}  Skipped blocks: ${harvest.skippedItems}`);
    if (harvest.metadata.stopReason) console.log(chalk.yellow(`Stopped early: ${harvest.metadata.stopReason}`));
    printFailures(harvest.failures);
}

export function printKeywordSummary(harvest: KeywordHarvest, filePath: string | null): void {
    const stats = harvest.statistics;
    console.log();
    console.log(chalk.green('✓ Keyword harvest complete!'));
    if (filePath) console.log(`Keywords saved to: ${chalk.cyan(filePath)}`);
    console.log(`Keywords: ${chalk.yellow(String(stats.totalKeywords))}  Avg relevance: ${stats.averageRelevance}  Long-tail: ${stats.longTailPercentage}%`);
    const depths = Object.entries(stats.depthDistribution).map(([d, n]) => `d${d}=${n}`).join(' ');
    if (depths) console.log(chalk.dim(`Depths: ${depths}`));
    if (stats.topKeywords.length > 0) {
        console.log(chalk.cyan('Top keywords:'));
        for (const top of stats.topKeywords.slice(0, 10)) {
            console.log(`  ${String(top.relevance).padStart(6)}  ${top.keyword}`);
        }
    }
    if (harvest.metadata.stopReason) console.log(chalk.yellow(`Stopped early: ${harvest.metadata.stopReason}`));
    printFailures(harvest.failures);
}

export function printSuggestions(prefix: string, suggestions: readonly Suggestion[]): void {
    if (suggestions.length === 0) {
        console.log(chalk.yellow(`No suggestions for "${prefix}".`));
        return;
    }
    console.log(chalk.cyan(`Suggestions for "${prefix}":`));
    for (const s of suggestions) {
        console.log(`  ${String(s.relevance).padStart(6)}  ${s.text} ${chalk.dim(s.type)}`);
    }
}
