import { describe, it, expect } from 'vitest';
import { SerpExtractor, domainOf, resolveResultHref } from './serp.js';
import { ParseError } from '../engine/errors.js';
import { serpPage } from '../testing/fakes.js';

const FIXED = new Date('2024-03-01T12:00:00.000Z');
const extractor = new SerpExtractor(undefined, () => FIXED);

describe('SerpExtractor', () => {
    it('keeps well-formed blocks and counts the broken one', () => {
        const html = serpPage([
            { url: 'https://www.alpha.test/a', title: 'Alpha', description: '  First\n   result ' },
            { url: 'https://beta.test/b', title: 'Beta' },
            { url: 'https://gamma.test/c', title: '' },
            { url: 'https://delta.test/d', title: 'Delta' },
        ]);

        const { result, skipped } = extractor.extract(html, 'coffee', 1, 'https://www.google.com/search?q=coffee');

        expect(skipped).toBe(1);
        expect(result.organicResults).toEqual([
            { url: 'https://www.alpha.test/a', title: 'Alpha', description: 'First result', domain: 'alpha.test', position: 1 },
            { url: 'https://beta.test/b', title: 'Beta', description: '', domain: 'beta.test', position: 2 },
            { url: 'https://delta.test/d', title: 'Delta', description: '', domain: 'delta.test', position: 3 },
        ]);
        expect(result).toMatchObject({
            keyword: 'coffee',
            page: 1,
            url: 'https://www.google.com/search?q=coffee',
            retrievedAt: '2024-03-01T12:00:00.000Z',
        });
    });

    it('unwraps redirect links and drops repeated urls without counting them as skipped', () => {
        const html = serpPage([
            { url: '/url?q=https://www.example.test/page&amp;sa=U', title: 'Example' },
            { url: 'https://www.example.test/page', title: 'Example sitelink' },
        ]);

        const { result, skipped } = extractor.extract(html, 'example', 2);

        expect(skipped).toBe(0);
        expect(result.organicResults.map((o) => [o.url, o.domain, o.position])).toEqual([
            ['https://www.example.test/page', 'example.test', 1],
        ]);
    });

    it('collects related searches and questions', () => {
        const extra =
            '<div class="AJLUJb"><div class="b2Rnsc"><a href="/search?q=x">cat food recipes</a></div>' +
            '<div class="b2Rnsc"><a href="/search?q=y">cat food recipes</a></div></div>' +
            '<div class="related-question-pair"><span>Is wet cat food better?</span></div>' +
            '<div class="related-question-pair"><span>More results</span></div>';
        const { result } = extractor.extract(serpPage([], extra), 'cat food', 1);

        expect(result.organicResults).toEqual([]);
        expect(result.relatedKeywords).toEqual(['cat food recipes']);
        expect(result.peopleAlsoAsk).toEqual(['Is wet cat food better?']);
    });

    it('throws ParseError when the page has no results container', () => {
        expect(() => extractor.extract('<html><body><p>Something else</p></body></html>', 'coffee', 1)).toThrow(ParseError);
        expect(() => extractor.extract('   ', 'coffee', 1)).toThrow('Empty result page for "coffee" (page 1)');
    });
});

describe('resolveResultHref', () => {
    it('leaves direct links alone', () => {
        expect(resolveResultHref('https://a.test/x')).toBe('https://a.test/x');
        expect(resolveResultHref('https://www.google.com/url?q=https://b.test/&sa=U')).toBe('https://b.test/');
    });
});

describe('domainOf', () => {
    it('strips www and rejects non-urls', () => {
        expect(domainOf('https://www.shop.test/path')).toBe('shop.test');
        expect(domainOf('not a url')).toBeNull();
    });
});
