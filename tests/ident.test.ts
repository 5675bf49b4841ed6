/**
 * Tests for identifiers: parsing, interning, rendering and ordering
 */

import { parseIdent } from '../src/builder/index.js';
import { IdentCache } from '../src/ident/cache.js';
import { compareIdents, identToString, identsEqual } from '../src/ident/ident.js';
import type { Ident } from '../src/types/ast.js';

const go = (local: string): Ident => ({ type: 'prefixed', prefix: 'GO', local });

describe('parseIdent', () => {
    test('parses a prefixed identifier', () => {
        expect(parseIdent('GO:0000001')).toEqual({ type: 'prefixed', prefix: 'GO', local: '0000001' });
    });

    test('parses a URL', () => {
        expect(parseIdent('http://purl.obolibrary.org/obo/GO_0000001')).toEqual({
            type: 'url',
            value: 'http://purl.obolibrary.org/obo/GO_0000001',
        });
    });

    test('parses an unprefixed identifier', () => {
        expect(parseIdent('part_of')).toEqual({ type: 'unprefixed', value: 'part_of' });
    });

    test('keeps colons after the first in the local part', () => {
        expect(parseIdent('ex:a:b')).toEqual({ type: 'prefixed', prefix: 'ex', local: 'a:b' });
    });

    test('accepts an empty local part', () => {
        expect(parseIdent('GO:')).toEqual({ type: 'prefixed', prefix: 'GO', local: '' });
    });

    test('treats an escaped colon as part of an unprefixed identifier', () => {
        expect(parseIdent('a\\:b')).toEqual({ type: 'unprefixed', value: 'a:b' });
    });

    test('rejects whitespace inside an identifier', () => {
        expect(() => parseIdent('GO:1 2')).toThrow(/Syntax error/);
    });
});

describe('IdentCache', () => {
    test('returns the same frozen object for equal text', () => {
        const cache = new IdentCache();
        const a = parseIdent('GO:0000001', cache);
        const b = parseIdent('GO:0000001', cache);

        expect(a).toBe(b);
        expect(Object.isFrozen(a)).toBe(true);
    });

    test('separate caches produce equal but distinct objects', () => {
        const a = parseIdent('GO:0000001');
        const b = parseIdent('GO:0000001');

        expect(a).not.toBe(b);
        expect(a).toEqual(b);
    });

    test('distinguishes where the prefix ends', () => {
        const cache = new IdentCache();
        expect(cache.prefixed('a:b', 'c')).not.toBe(cache.prefixed('a', 'b:c'));
    });

    test('interns strings and counts hits', () => {
        const cache = new IdentCache();
        const first = cache.intern('name');
        const second = cache.intern('name');

        expect(second).toBe(first);
        expect(cache.stats()).toEqual({ strings: 1, idents: 0, hits: 1, misses: 1 });
    });

    test('stats count every identifier kind', () => {
        const cache = new IdentCache();
        cache.prefixed('GO', '1');
        cache.unprefixed('part_of');
        cache.url('http://example.com');
        cache.url('http://example.com');

        const stats = cache.stats();
        expect(stats.idents).toBe(3);
        expect(stats.strings).toBe(1);
        expect(stats.hits).toBe(1);
    });
});

describe('identToString', () => {
    test('renders each kind', () => {
        expect(identToString(go('0000001'))).toBe('GO:0000001');
        expect(identToString({ type: 'unprefixed', value: 'part_of' })).toBe('part_of');
        expect(identToString({ type: 'url', value: 'http://example.com' })).toBe('http://example.com');
    });

    test('escapes separators', () => {
        expect(identToString(go('a b'))).toBe('GO:a\\ b');
        expect(identToString({ type: 'unprefixed', value: 'x,y' })).toBe('x\\,y');
        expect(identToString({ type: 'url', value: 'http://a.b/c d' })).toBe('http://a.b/c\\ d');
    });

    test('round-trips through the parser', () => {
        const id: Ident = { type: 'unprefixed', value: 'weird: {id}' };
        expect(parseIdent(identToString(id))).toEqual(id);
    });
});

describe('identsEqual', () => {
    test('compares by kind and text', () => {
        expect(identsEqual(go('1'), go('1'))).toBe(true);
        expect(identsEqual(go('1'), go('2'))).toBe(false);
        expect(identsEqual({ type: 'unprefixed', value: 'GO' }, { type: 'url', value: 'GO' })).toBe(false);
    });
});

describe('compareIdents', () => {
    test('orders locals as text', () => {
        expect(compareIdents(go('10'), go('2'))).toBeLessThan(0);
        expect(compareIdents(go('0000010'), go('0000002'))).toBeGreaterThan(0);
        expect(compareIdents(go('0002'), go('2'))).toBeLessThan(0);
        expect(compareIdents(go('2'), go('2'))).toBe(0);
    });

    test('sorts A:10 before A:2', () => {
        const ids: Ident[] = [
            { type: 'prefixed', prefix: 'A', local: '2' },
            { type: 'prefixed', prefix: 'A', local: '10' },
        ];
        expect(ids.sort(compareIdents).map(identToString)).toEqual(['A:10', 'A:2']);
    });

    test('orders prefixes before locals', () => {
        expect(compareIdents({ type: 'prefixed', prefix: 'CL', local: '9' }, go('1'))).toBeLessThan(0);
    });

    test('orders prefixed before unprefixed before URL', () => {
        const ids: Ident[] = [
            { type: 'url', value: 'http://a' },
            { type: 'unprefixed', value: 'part_of' },
            go('1'),
        ];
        expect(ids.sort(compareIdents).map((id) => id.type)).toEqual(['prefixed', 'unprefixed', 'url']);
    });
});
