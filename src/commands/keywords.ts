import { Command, InvalidArgumentError, Option } from 'commander';
import { isModifier, MODIFIERS } from '../config/modifiers.js';
import type { Modifier } from '../engine/types.js';
import { exportKeywordHarvest, KEYWORD_EXPORT_FORMATS } from '../export.js';
import type { KeywordExportFormat } from '../export.js';
import { Harvester } from '../harvester.js';
import { printKeywordSummary, printSettings } from '../utils/display.js';
import { loadCommandContext, withInterrupt } from './context.js';
import { addEngineOptions, collectInputs, parseDecimal, parseInteger } from './options.js';
import type { EngineCliOptions } from './options.js';

interface KeywordsCliOptions extends EngineCliOptions {
    seedsFile?: string;
    depth?: number;
    modifiers?: Modifier[];
    maxKeywords?: number;
    minRelevance?: number;
    vertical?: string;
    includeBase?: boolean;
    format?: string;
    txtMetadata?: boolean;
}

/** "alphabet,questions" → ['alphabet', 'questions'] */
export function parseModifiers(value: string): Modifier[] {
    const names = value.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean);
    const modifiers: Modifier[] = [];
    for (const name of names) {
        if (!isModifier(name)) {
            throw new InvalidArgumentError(`Unknown modifier "${name}" (expected ${MODIFIERS.join(', ')}).`);
        }
        modifiers.push(name);
    }
    return modifiers;
}

function isKeywordFormat(value: string): value is KeywordExportFormat {
    return KEYWORD_EXPORT_FORMATS.some((f) => f === value);
}

export async function runKeywordsCommand(seeds: string[], options: KeywordsCliOptions): Promise<void> {
    const inputs = await collectInputs(seeds, options.seedsFile);
    if (inputs.length === 0) {
        throw new Error('No seed keywords provided. Pass them as arguments or use --seeds-file.');
    }

    const { env, config } = await loadCommandContext(options, {
        maxDepth: options.depth,
        modifiers: options.modifiers,
        maxKeywords: options.maxKeywords,
        minRelevance: options.minRelevance,
        suggestVertical: options.vertical,
        includeBaseQuery: options.includeBase,
    });
    const format = options.format ?? env.HARVESTER_EXPORT_FORMAT;
    if (!isKeywordFormat(format)) {
        throw new Error(`Unsupported export format "${format}" (expected ${KEYWORD_EXPORT_FORMATS.join(', ')})`);
    }

    printSettings('Keyword harvest', [
        ['Seeds', String(inputs.length)],
        ['Max depth', String(config.maxDepth)],
        ['Modifiers', config.modifiers.join(', ') || 'none'],
        ['Max keywords', config.maxKeywords !== undefined ? String(config.maxKeywords) : 'unlimited'],
        ['Language / country', `${config.language} / ${config.country.toUpperCase()}`],
        ['Concurrency', String(config.maxConcurrency)],
        ['Delay', `${config.minDelay}s - ${config.maxDelay}s`],
        ['Export format', format],
    ]);

    const harvester = new Harvester(config);
    const harvest = await withInterrupt(harvester, () => harvester.harvestKeywords(inputs));

    const filePath = await exportKeywordHarvest(harvest, {
        format,
        outputDir: options.outputDir ?? env.HARVESTER_OUTPUT_DIR,
        baseName: options.output,
        includeMetadata: options.txtMetadata,
    });
    printKeywordSummary(harvest, filePath);
}

export function keywordsCommand(): Command {
    const command = new Command('keywords')
        .description('Expand seed keywords through autocomplete suggestions')
        .argument('[seeds...]', 'Seed keywords')
        .option('-f, --seeds-file <path>', 'File with one seed keyword per line')
        .option('-d, --depth <n>', 'Maximum expansion depth', parseInteger)
        .option('-m, --modifiers <list>', `Comma-separated modifiers (${MODIFIERS.join(', ')})`, parseModifiers)
        .option('--max-keywords <n>', 'Stop once this many keywords are known', parseInteger)
        .option('--min-relevance <n>', 'Drop suggestions below this relevance', parseDecimal)
        .option('--vertical <ds>', 'Suggestion vertical, e.g. "yt" for YouTube')
        .option('--include-base', 'Also query the bare keyword')
        .option('--txt-metadata', 'TXT export: include header and relevance / depth')
        .addOption(new Option('--format <format>', 'Export format').choices([...KEYWORD_EXPORT_FORMATS]));

    return addEngineOptions(command).action(runKeywordsCommand);
}
