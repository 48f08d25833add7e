import { log } from 'crawlee';
import { loadEnv } from '../config/env.js';
import type { Env } from '../config/envSchema.js';
import { runConfigFromEnv } from '../config/runConfig.js';
import type { RunConfig, RunConfigInput } from '../config/runConfig.js';
import type { Harvester } from '../harvester.js';
import { engineOverrides } from './options.js';
import type { EngineCliOptions } from './options.js';

export interface CommandContext {
    env: Env;
    config: RunConfig;
}

/** env → RunConfig, then CLI flags on top. Throws ConfigError before anything runs. */
export async function loadCommandContext(
    options: EngineCliOptions,
    extra: RunConfigInput = {}
): Promise<CommandContext> {
    const env = loadEnv();
    const config = runConfigFromEnv(env, { ...(await engineOverrides(options)), ...extra });
    return { env, config };
}

/** First Ctrl+C stops the run cooperatively; results gathered so far are kept. */
export async function withInterrupt<T>(harvester: Harvester, work: () => Promise<T>): Promise<T> {
    const onSigint = (): void => {
        log.warning('[CLI] Interrupted, finishing in-flight requests…');
        harvester.stop('interrupted by user');
    };
    process.once('SIGINT', onSigint);
    try {
        return await work();
    } finally {
        process.off('SIGINT', onSigint);
    }
}
