import { Command } from 'commander';
import { loadEnv } from '../config/env.js';
import { parseRunConfig } from '../config/runConfig.js';
import { SuggestionClient } from '../extractors/suggestions.js';
import { printSuggestions } from '../utils/display.js';

interface SuggestCliOptions {
    lang?: string;
    country?: string;
    vertical?: string;
}

export async function runSuggestCommand(prefix: string, options: SuggestCliOptions): Promise<void> {
    const env = loadEnv();
    const config = parseRunConfig({
        language: options.lang ?? env.HARVESTER_LANGUAGE,
        country: options.country ?? env.HARVESTER_COUNTRY,
        suggestVertical: options.vertical ?? (env.HARVESTER_SUGGEST_VERTICAL || null),
    });
    const client = new SuggestionClient({ vertical: config.suggestVertical });
    printSuggestions(prefix, await client.suggest(prefix, config.language, config.country));
}

export function suggestCommand(): Command {
    return new Command('suggest')
        .description('Print autocomplete suggestions for one prefix')
        .argument('<prefix>', 'Query prefix')
        .option('--lang <code>', 'Interface language (ISO 639-1)')
        .option('--country <code>', 'Country (ISO 3166-1 alpha-2)')
        .option('--vertical <ds>', 'Suggestion vertical, e.g. "yt" for YouTube')
        .action(runSuggestCommand);
}
