import { Command, InvalidArgumentError, Option } from 'commander';
import type { RunConfigInput } from '../config/runConfig.js';
import { loadLineList } from '../utils/keywordFile.js';

/** Flags shared by every command that runs the engine. */
export interface EngineCliOptions {
    proxy?: string[];
    proxyFile?: string;
    rotateProxy?: boolean;
    concurrency?: number;
    minDelay?: number;
    maxDelay?: number;
    maxRequests?: number;
    maxRetries?: number;
    timeout?: number;
    lang?: string;
    country?: string;
    outputDir?: string;
    output?: string;
}

export function parseInteger(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
    return n;
}

export function parseDecimal(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
    return n;
}

export function addEngineOptions(command: Command): Command {
    return command
        .option('--proxy <url...>', 'Proxy URL (http, https or socks5); repeatable')
        .option('--proxy-file <path>', 'File with one proxy URL per line')
        .addOption(new Option('--rotate-proxy', 'Rotate through the proxy pool (implied by --proxy / --proxy-file)'))
        .addOption(new Option('--no-rotate-proxy', 'Send every request direct even when proxies are configured'))
        .option('-c, --concurrency <n>', 'Concurrent workers', parseInteger)
        .option('--min-delay <seconds>', 'Minimum delay between requests per worker', parseDecimal)
        .option('--max-delay <seconds>', 'Maximum delay between requests per worker', parseDecimal)
        .option('--max-requests <n>', 'Stop after this many requests', parseInteger)
        .option('--max-retries <n>', 'Retry budget per request', parseInteger)
        .option('--timeout <ms>', 'Hard timeout per request', parseInteger)
        .option('--lang <code>', 'Interface language (ISO 639-1)')
        .option('--country <code>', 'Country (ISO 3166-1 alpha-2)')
        .option('--output-dir <dir>', 'Directory for exported files')
        .option('-o, --output <name>', 'Output file name without extension');
}

/** CLI flags → RunConfig overrides. Flags left out stay undefined so env values apply. */
export async function engineOverrides(options: EngineCliOptions): Promise<RunConfigInput> {
    const proxies = [...(options.proxy ?? [])];
    if (options.proxyFile) {
        proxies.push(...await loadLineList(options.proxyFile));
    }
    const hasCliProxies = proxies.length > 0;

    return {
        proxyUrls: hasCliProxies ? proxies : undefined,
        rotateProxy: options.rotateProxy ?? (hasCliProxies ? true : undefined),
        maxConcurrency: options.concurrency,
        minDelay: options.minDelay,
        maxDelay: options.maxDelay,
        maxRequests: options.maxRequests,
        maxRetries: options.maxRetries,
        requestTimeoutMs: options.timeout,
        language: options.lang,
        country: options.country,
    };
}

/** Positional values plus the lines of an optional file, blanks dropped. */
export async function collectInputs(values: readonly string[], file?: string): Promise<string[]> {
    const inputs = values.map((v) => v.trim()).filter(Boolean);
    if (file) inputs.push(...await loadLineList(file));
    return inputs;
}
