import { Command, Option } from 'commander';
import { exportSerpHarvest, SERP_EXPORT_FORMATS } from '../export.js';
import type { SerpExportFormat } from '../export.js';
import { Harvester } from '../harvester.js';
import { printSerpSummary, printSettings } from '../utils/display.js';
import { loadCommandContext, withInterrupt } from './context.js';
import { addEngineOptions, collectInputs, parseInteger } from './options.js';
import type { EngineCliOptions } from './options.js';

interface SerpCliOptions extends EngineCliOptions {
    keywordsFile?: string;
    pages?: number;
    headless?: boolean;
    browser?: 'chromium' | 'firefox' | 'webkit';
    http?: boolean;
    format?: string;
}

function isSerpFormat(value: string): value is SerpExportFormat {
    return SERP_EXPORT_FORMATS.some((f) => f === value);
}

export async function runSerpCommand(keywords: string[], options: SerpCliOptions): Promise<void> {
    const inputs = await collectInputs(keywords, options.keywordsFile);
    if (inputs.length === 0) {
        throw new Error('No keywords provided. Pass them as arguments or use --keywords-file.');
    }

    const { env, config } = await loadCommandContext(options, {
        pagesPerKeyword: options.pages,
        headless: options.headless,
        browserType: options.browser,
        serpFetchMode: options.http ? 'http' : undefined,
    });
    const format = options.format ?? env.HARVESTER_EXPORT_FORMAT;
    if (!isSerpFormat(format)) {
        throw new Error(`Unsupported export format "${format}" (expected ${SERP_EXPORT_FORMATS.join(', ')})`);
    }

    printSettings('SERP scrape', [
        ['Keywords', String(inputs.length)],
        ['Pages per keyword', String(config.pagesPerKeyword)],
        ['Fetch mode', config.serpFetchMode === 'browser' ? `${config.browserType}${config.headless ? ' (headless)' : ''}` : 'http'],
        ['Proxies', config.proxyUrls.length > 0 ? `${config.proxyUrls.length}${config.rotateProxy ? ' (rotating)' : ' (unused)'}` : 'none'],
        ['Concurrency', String(config.maxConcurrency)],
        ['Delay', `${config.minDelay}s - ${config.maxDelay}s`],
        ['Export format', format],
    ]);

    const harvester = new Harvester(config);
    const harvest = await withInterrupt(harvester, () => harvester.scrapeSerps(inputs));

    const filePath = harvest.results.length > 0
        ? await exportSerpHarvest(harvest, { format, outputDir: options.outputDir ?? env.HARVESTER_OUTPUT_DIR, baseName: options.output })
        : null;
    printSerpSummary(harvest, filePath);
}

export function serpCommand(): Command {
    const command = new Command('serp')
        .description('Scrape search result pages for keywords')
        .argument('[keywords...]', 'Search keywords')
        .option('-f, --keywords-file <path>', 'File with one keyword per line')
        .option('-p, --pages <n>', 'Result pages per keyword', parseInteger)
        .addOption(new Option('--headless', 'Run the browser headless'))
        .addOption(new Option('--no-headless', 'Show the browser window'))
        .addOption(new Option('--browser <type>', 'Browser engine').choices(['chromium', 'firefox', 'webkit']))
        .option('--http', 'Fetch result pages over plain HTTP instead of a browser')
        .addOption(new Option('--format <format>', 'Export format').choices([...SERP_EXPORT_FORMATS]));

    return addEngineOptions(command).action(runSerpCommand);
}
