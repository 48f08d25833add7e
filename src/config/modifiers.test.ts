import { describe, it, expect } from 'vitest';
import { ALPHABET, PREPOSITIONS, QUESTION_WORDS, buildPrefixes, isModifier } from './modifiers.js';

describe('buildPrefixes', () => {
    it('uses a fixed modifier order whatever the caller passes', () => {
        const prefixes = buildPrefixes('cat', ['prepositions', 'alphabet']);
        expect(prefixes).toHaveLength(ALPHABET.length + PREPOSITIONS.length);
        expect(prefixes.slice(0, 2)).toEqual(['cat a', 'cat b']);
        expect(prefixes[ALPHABET.length]).toBe('cat for');
    });

    it('puts question words in front', () => {
        const prefixes = buildPrefixes('cat food', ['questions']);
        expect(prefixes).toHaveLength(QUESTION_WORDS.length);
        expect(prefixes[0]).toBe('how cat food');
    });

    it('can include the bare keyword first', () => {
        expect(buildPrefixes('cat', ['questions'], true).slice(0, 2)).toEqual(['cat', 'how cat']);
    });

    it('returns nothing without modifiers', () => {
        expect(buildPrefixes('cat', [])).toEqual([]);
    });
});

describe('isModifier', () => {
    it('accepts the three known modifiers only', () => {
        expect(['alphabet', 'questions', 'prepositions', 'letters'].filter(isModifier))
            .toEqual(['alphabet', 'questions', 'prepositions']);
    });
});
