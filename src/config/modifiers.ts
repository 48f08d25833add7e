/**
 * src/config/modifiers.ts
 *
 * Prefix expansion strategies for keyword discovery. Each modifier turns one
 * keyword into a fixed set of suggestion prefixes, so the fan-out per
 * expanded keyword is bounded by 26 + |QUESTION_WORDS| + |PREPOSITIONS|.
 */

import type { Modifier } from '../engine/types.js';

export const MODIFIERS: readonly Modifier[] = ['alphabet', 'questions', 'prepositions'];

export const ALPHABET: readonly string[] = 'abcdefghijklmnopqrstuvwxyz'.split('');

/** Placed before the keyword: "how <kw>". */
export const QUESTION_WORDS: readonly string[] = [
    'how', 'what', 'why', 'when', 'where', 'who', 'which', 'are', 'is', 'can', 'will',
];

/** Placed after the keyword: "<kw> for". */
export const PREPOSITIONS: readonly string[] = [
    'for', 'with', 'without', 'near', 'in', 'at', 'to', 'from', 'vs', 'versus',
];

export function isModifier(value: string): value is Modifier {
    return MODIFIERS.some((m) => m === value);
}

/**
 * Suggestion prefixes for `keyword`, in modifier order. Duplicates are
 * removed; the first occurrence keeps its place.
 */
export function buildPrefixes(
    keyword: string,
    modifiers: Iterable<Modifier>,
    includeBaseQuery = false
): string[] {
    const prefixes: string[] = includeBaseQuery ? [keyword] : [];
    const enabled = new Set(modifiers);

    // Fixed order regardless of how the caller listed them
    for (const modifier of MODIFIERS) {
        if (!enabled.has(modifier)) continue;
        switch (modifier) {
            case 'alphabet':
                prefixes.push(...ALPHABET.map((letter) => `${keyword} ${letter}`));
                break;
            case 'questions':
                prefixes.push(...QUESTION_WORDS.map((word) => `${word} ${keyword}`));
                break;
            case 'prepositions':
                prefixes.push(...PREPOSITIONS.map((prep) => `${keyword} ${prep}`));
                break;
        }
    }

    return [...new Set(prefixes)];
}
