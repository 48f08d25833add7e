#!/usr/bin/env node
/**
 * src/main.ts
 *
 * ENTRY POINT: serp-harvester CLI
 *
 *   serp-harvester serp <keywords...>      scrape result pages
 *   serp-harvester keywords <seeds...>     expand seeds through autocomplete
 *   serp-harvester suggest <prefix>        one-off suggestion lookup
 *
 * Settings come from HARVESTER_* variables (and .env); flags override them.
 */

import { createRequire } from 'node:module';
import chalk from 'chalk';
import { Command } from 'commander';
import { serpCommand } from './commands/serp.js';
import { keywordsCommand } from './commands/keywords.js';
import { suggestCommand } from './commands/suggest.js';
import { loadEnv } from './config/env.js';
import { ConfigError } from './engine/errors.js';
import { configureLogging } from './utils/logging.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { name: string; version: string };

async function main(): Promise<void> {
    try {
        const program = new Command();

        program
            .name('serp-harvester')
            .description('Harvest search result pages and expand keywords through autocomplete')
            .version(pkg.version)
            .option('-v, --verbose', 'Debug logging');

        program.hook('preAction', () => {
            const env = loadEnv(process.env, { dotenv: true });
            configureLogging(env.HARVESTER_LOG_LEVEL, program.opts<{ verbose?: boolean }>().verbose);
        });

        program.addCommand(serpCommand());
        program.addCommand(keywordsCommand());
        program.addCommand(suggestCommand());

        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(chalk.red(error.message));
        } else {
            const message = error instanceof Error ? error.message : 'Unknown error';
            console.error(chalk.red(`Harvest failed: ${message}`));
        }
        process.exitCode = 1;
    }
}

void main();
