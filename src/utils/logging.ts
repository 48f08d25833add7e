import { log, LogLevel } from 'crawlee';

const LEVELS: Record<string, LogLevel> = {
    OFF: LogLevel.OFF,
    ERROR: LogLevel.ERROR,
    WARNING: LogLevel.WARNING,
    WARN: LogLevel.WARNING,
    INFO: LogLevel.INFO,
    DEBUG: LogLevel.DEBUG,
};

/** `--verbose` wins over HARVESTER_LOG_LEVEL; unknown names fall back to INFO. */
export function resolveLogLevel(name: string, verbose = false): LogLevel {
    if (verbose) return LogLevel.DEBUG;
    return LEVELS[name.trim().toUpperCase()] ?? LogLevel.INFO;
}

export function configureLogging(name: string, verbose = false): void {
    log.setLevel(resolveLogLevel(name, verbose));
}
