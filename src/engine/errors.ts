/**
 * src/engine/errors.ts
 *
 * Error taxonomy for the harvester. Fetch-level errors are retryable
 * (except ExhaustedRetriesError); ConfigError is the only fatal one and is
 * raised before any task is scheduled.
 */

import type { FailureKind } from './types.js';

export abstract class HarvesterError extends Error {
    abstract readonly kind: FailureKind;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Connection refused, DNS failure, socket reset, unexpected HTTP status. */
export class NetworkError extends HarvesterError {
    readonly kind = 'network' as const;
    readonly retryable = true;
}

/** The request exceeded requestTimeoutMs. */
export class TimeoutError extends HarvesterError {
    readonly kind = 'timeout' as const;
    readonly retryable = true;

    constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
        super(`Request timed out after ${timeoutMs}ms`, options);
    }
}

/** A challenge / CAPTCHA / rate-limit page came back instead of content. */
export class BlockedError extends HarvesterError {
    readonly kind = 'blocked' as const;
    readonly retryable = true;

    constructor(readonly reason: string, readonly statusCode: number | null = null) {
        super(`Blocked: ${reason}${statusCode ? ` (HTTP ${statusCode})` : ''}`);
    }
}

/** The whole response could not be interpreted. Single bad items never raise this. */
export class ParseError extends HarvesterError {
    readonly kind = 'parse' as const;
    readonly retryable = true;
}

/** Terminal. Keeps the kind of the last failure, which is what gets recorded. */
export class ExhaustedRetriesError extends HarvesterError {
    readonly kind: FailureKind;
    readonly retryable = false;

    constructor(readonly attempts: number, readonly lastError: HarvesterError) {
        super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
        this.kind = lastError.kind;
    }
}

export class ConfigError extends HarvesterError {
    readonly kind = 'config' as const;
    readonly retryable = false;

    constructor(readonly issues: string[]) {
        super('Invalid harvester configuration:\n' + issues.map((i) => `- ${i}`).join('\n'));
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
