import * as fs from 'fs/promises';
import { log } from 'crawlee';

/**
 * One entry per line; blank lines and lines starting with `#` are ignored.
 * Used for keyword lists and proxy lists alike.
 */
export function parseLineList(content: string): string[] {
    return content
        .split(/\r?\n/)
        .filter((line) => !line.startsWith('#'))
        .map((line) => line.trim())
        .filter(Boolean);
}

export async function loadLineList(filePath: string): Promise<string[]> {
    const entries = parseLineList(await fs.readFile(filePath, 'utf-8'));
    log.info(`[Input] Loaded ${entries.length} entries from ${filePath}`);
    return entries;
}
