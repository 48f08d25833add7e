import { config as loadDotenv } from 'dotenv';
import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';
import { ConfigError } from '../engine/errors.js';

export interface LoadEnvOptions {
    /** Read `.env` from the working directory first. */
    dotenv?: boolean;
}

/**
 * Parses HARVESTER_* variables. Throws ConfigError listing every bad key;
 * the CLI turns that into a non-zero exit.
 */
export function loadEnv(raw: NodeJS.ProcessEnv = process.env, options: LoadEnvOptions = {}): Env {
    if (options.dotenv) {
        loadDotenv();
    }

    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(err.issues.map((i) => {
                const key = i.path.join('.') || '(root)';
                return `${key}: ${i.message}`;
            }));
        }
        throw err;
    }
}

export type { Env };
