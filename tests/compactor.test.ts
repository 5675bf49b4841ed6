/**
 * Tests for identifier compaction and the identifier visitor
 */

import { parseString } from '../src/parser.js';
import { IdCompactor, IdDecompactor, OBO_PURL_BASE } from '../src/ident/compactor.js';
import { compactIdents, decompactIdents, mapIdents } from '../src/ast/visitor.js';
import type { HeaderFrame } from '../src/types/clauses.js';
import type { Ident } from '../src/types/ast.js';

const url = (value: string): Ident => ({ type: 'url', value });

describe('IdCompactor', () => {
    test('uses a declared base', () => {
        const compactor = new IdCompactor({ GO: 'http://purl.obolibrary.org/obo/GO_' });
        expect(compactor.compact(url('http://purl.obolibrary.org/obo/GO_0000001'))).toEqual({
            type: 'prefixed',
            prefix: 'GO',
            local: '0000001',
        });
    });

    test('falls back to OBO PURLs', () => {
        expect(new IdCompactor().compact(url(`${OBO_PURL_BASE}CL_0000000`))).toEqual({
            type: 'prefixed',
            prefix: 'CL',
            local: '0000000',
        });
    });

    test('prefers the longest matching base', () => {
        const compactor = new IdCompactor(new Map([
            ['ex', 'http://example.org/'],
            ['exa', 'http://example.org/a/'],
        ]));
        expect(compactor.compact(url('http://example.org/a/b'))).toEqual({ type: 'prefixed', prefix: 'exa', local: 'b' });
    });

    test('keeps a URL that is only a base', () => {
        const id = url('http://example.org/');
        expect(new IdCompactor({ ex: 'http://example.org/' }).compact(id)).toBe(id);
    });

    test('leaves non-URL identifiers alone', () => {
        const id: Ident = { type: 'unprefixed', value: 'part_of' };
        expect(new IdCompactor().compact(id)).toBe(id);
    });

    test('reads idspace clauses and built-in spaces from the header', () => {
        const header: HeaderFrame = parseString('idspace: TEST http://example.org/test/\n').header;
        const compactor = IdCompactor.fromHeader(header);

        expect(compactor.compact(url('http://example.org/test/1'))).toEqual({ type: 'prefixed', prefix: 'TEST', local: '1' });
        expect(compactor.compact(url('http://www.w3.org/2001/XMLSchema#string'))).toEqual({
            type: 'prefixed',
            prefix: 'xsd',
            local: 'string',
        });
    });
});

describe('IdDecompactor', () => {
    test('expands undeclared prefixes to OBO PURLs', () => {
        expect(new IdDecompactor().decompact({ type: 'prefixed', prefix: 'GO', local: '0000001' })).toEqual(
            url('http://purl.obolibrary.org/obo/GO_0000001')
        );
    });

    test('uses header bases first', () => {
        const header = parseString('idspace: TEST http://example.org/test/\n').header;
        const decompactor = IdDecompactor.fromHeader(header);

        expect(decompactor.decompact({ type: 'prefixed', prefix: 'TEST', local: '1' })).toEqual(
            url('http://example.org/test/1')
        );
        expect(decompactor.decompact({ type: 'prefixed', prefix: 'xsd', local: 'string' })).toEqual(
            url('http://www.w3.org/2001/XMLSchema#string')
        );
    });

    test('leaves unprefixed identifiers alone', () => {
        const id: Ident = { type: 'unprefixed', value: 'part_of' };
        expect(new IdDecompactor().decompact(id)).toBe(id);
    });
});

describe('document visitor', () => {
    const text = '[Term]\nid: GO:0000001\nis_a: GO:0000002\nrelationship: part_of GO:0000003 {source="GO:ref"}\n';

    test('decompacts and compacts a document', () => {
        const doc = parseString(text);

        decompactIdents(doc, new IdDecompactor());
        expect(doc.toString()).toBe(
            [
                '[Term]',
                'id: http://purl.obolibrary.org/obo/GO_0000001',
                'is_a: http://purl.obolibrary.org/obo/GO_0000002',
                'relationship: part_of http://purl.obolibrary.org/obo/GO_0000003 {source="GO:ref"}',
                '',
            ].join('\n')
        );

        compactIdents(doc, new IdCompactor());
        expect(doc.toString()).toBe(text);
    });

    test('rewrites qualifier keys and header identifiers', () => {
        const doc = parseString('default-namespace: old\n\n[Term]\nid: A:1\nname: a {old="x"}\n');
        const rename = (id: Ident): Ident =>
            id.type === 'unprefixed' && id.value === 'old' ? { type: 'unprefixed', value: 'new' } : id;

        mapIdents(doc, rename);
        expect(doc.toString()).toBe('default-namespace: new\n\n[Term]\nid: A:1\nname: a {new="x"}\n');
    });

    test('keeps import targets as written', () => {
        const doc = parseString('import: http://example.org/other.obo\n');
        compactIdents(doc, new IdCompactor({ ex: 'http://example.org/' }));
        expect(doc.toString()).toBe('import: http://example.org/other.obo\n');
    });
});
