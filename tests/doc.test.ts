/**
 * Tests for document operations: sorting, namespaces, axioms and labels
 */

import { Writable } from 'stream';
import { parseString } from '../src/parser.js';
import { OboDoc } from '../src/doc.js';
import { assignNamespaces } from '../src/semantics/namespaces.js';
import { isOboException } from '../src/types/errors.js';
import { CANONICAL_DOC, makeOntology } from './fixtures.js';

describe('OboDoc.sort', () => {
    const unsorted = [
        'remark: r',
        'format-version: 1.4',
        '',
        '[Typedef]',
        'id: part_of',
        '',
        '[Term]',
        'id: GO:2',
        '',
        '[Term]',
        'id: GO:10',
        'is_a: GO:1',
        'name: ten',
        '',
    ].join('\n');

    test('orders header clauses, frames and clauses', () => {
        const doc = parseString(unsorted).sort();
        expect(doc.toString()).toBe(
            [
                'format-version: 1.4',
                'remark: r',
                '',
                '[Term]',
                'id: GO:10',
                'name: ten',
                'is_a: GO:1',
                '',
                '[Term]',
                'id: GO:2',
                '',
                '[Typedef]',
                'id: part_of',
                '',
            ].join('\n')
        );
    });

    test('isSorted reflects the order', () => {
        const doc = parseString(unsorted);
        expect(doc.isSorted()).toBe(false);
        expect(doc.sort().isSorted()).toBe(true);
    });

    test('is idempotent', () => {
        const once = parseString(unsorted).sort().toString();
        expect(parseString(once).sort().toString()).toBe(once);
    });

    test('orders clauses sharing a tag by value', () => {
        const doc = parseString('[Term]\nid: A:1\nis_a: A:3\nname: a\nis_a: A:2\n').sort();
        expect(doc.toString()).toBe('[Term]\nid: A:1\nname: a\nis_a: A:2\nis_a: A:3\n');
    });

    test('sorts permutations of a frame to the same document', () => {
        const first = parseString(
            '[Term]\nid: A:1\nis_a: A:3\nxref: B:2 {y="1", x="2"}\nis_a: A:2\ndef: "d" [B:9, B:1]\nxref: B:1\n'
        ).sort();
        const second = parseString(
            '[Term]\nid: A:1\nxref: B:1\ndef: "d" [B:1, B:9]\nis_a: A:2\nxref: B:2 {x="2", y="1"}\nis_a: A:3\n'
        ).sort();

        expect(first.toString()).toBe(
            '[Term]\nid: A:1\ndef: "d" [B:1, B:9]\nxref: B:1\nxref: B:2 {x="2", y="1"}\nis_a: A:2\nis_a: A:3\n'
        );
        expect(first.equals(second)).toBe(true);
        expect(first.isSorted()).toBe(true);
    });

    test('isSorted checks xref and qualifier lists', () => {
        expect(parseString('[Term]\nid: A:1\ndef: "d" [B:9, B:1]\n').isSorted()).toBe(false);
        expect(parseString('[Term]\nid: A:1\nname: n {y="1", x="2"}\n').isSorted()).toBe(false);
        expect(parseString('[Term]\nid: A:1\nname: n {x="2", y="1"}\n').isSorted()).toBe(true);
    });

    test('orders repeated header clauses by value', () => {
        const doc = parseString('subsetdef: b "B"\nremark: z\nsubsetdef: a "A"\nremark: y\n').sort();
        expect(doc.toString()).toBe('subsetdef: a "A"\nsubsetdef: b "B"\nremark: y\nremark: z\n');
    });

    test('leaves a canonical document unchanged', () => {
        const doc = parseString(CANONICAL_DOC);
        expect(doc.isSorted()).toBe(true);
        expect(doc.sort().toString()).toBe(CANONICAL_DOC);
    });
});

describe('OboDoc.assignNamespaces', () => {
    test('inserts the default namespace where it is missing', () => {
        const doc = parseString(
            'default-namespace: test\n\n[Term]\nid: A:1\nname: a\nis_a: A:0\n\n[Term]\nid: A:2\nnamespace: other\n'
        );
        expect(doc.assignNamespaces().toString()).toBe(
            'default-namespace: test\n\n[Term]\nid: A:1\nname: a\nnamespace: test\nis_a: A:0\n\n[Term]\nid: A:2\nnamespace: other\n'
        );
    });

    test('reports how many frames changed', () => {
        const doc = parseString(makeOntology(3));
        expect(assignNamespaces(doc.header, doc.entities)).toBe(4);
        expect(assignNamespaces(doc.header, doc.entities)).toBe(0);
    });

    test('needs no default when every frame has a namespace', () => {
        const doc = parseString('[Term]\nid: A:1\nnamespace: n\n');
        expect(assignNamespaces(doc.header, doc.entities)).toBe(0);
    });

    test('fails without a default namespace', () => {
        const doc = parseString('[Term]\nid: A:1\n');

        let caught: unknown;
        try {
            doc.assignNamespaces();
        } catch (error) {
            caught = error;
        }
        expect(isOboException(caught, 'CARDINALITY_ERROR')).toBe(true);
        if (!isOboException(caught)) return;
        expect(caught.error.details).toEqual({ tag: 'default-namespace', kind: 'missing' });
    });

    test('fails on two default namespaces', () => {
        const doc = parseString('default-namespace: a\ndefault-namespace: b\n\n[Term]\nid: A:1\n');
        expect(() => doc.assignNamespaces()).toThrow(/duplicate 'default-namespace'/);
    });
});

describe('OboDoc.mergeOwlAxioms', () => {
    test('joins every owl-axioms clause at the end of the header', () => {
        const doc = parseString('owl-axioms: A\nremark: r\nowl-axioms: B\n').mergeOwlAxioms();

        expect(doc.header.clauses).toEqual([
            { tag: 'remark', value: 'r' },
            { tag: 'owl-axioms', value: 'A\nB' },
        ]);
        expect(doc.toString()).toBe('remark: r\nowl-axioms: A\\nB\n');
    });

    test('is idempotent', () => {
        const doc = parseString('owl-axioms: A\nowl-axioms: B\n').mergeOwlAxioms();
        const once = doc.toString();
        expect(doc.mergeOwlAxioms().toString()).toBe(once);
    });

    test('leaves a header without axioms alone', () => {
        const doc = parseString('format-version: 1.4\n');
        expect(doc.mergeOwlAxioms().toString()).toBe('format-version: 1.4\n');
    });
});

describe('labels and emptiness', () => {
    test('isFullyLabeled requires exactly one name per frame', () => {
        expect(parseString('[Term]\nid: A:1\nname: a\n').isFullyLabeled()).toBe(true);
        expect(parseString('[Term]\nid: A:1\nname: a\n\n[Term]\nid: A:2\n').isFullyLabeled()).toBe(false);
        expect(parseString('[Term]\nid: A:1\nname: a\nname: b\n').isFullyLabeled()).toBe(false);
    });

    test('isEmpty needs no header clauses and no frames', () => {
        expect(new OboDoc().isEmpty()).toBe(true);
        expect(parseString('\n! only a comment\n').isEmpty()).toBe(true);
        expect(parseString('format-version: 1.4\n').isEmpty()).toBe(false);
        expect(parseString('[Term]\nid: A:1\n').isEmpty()).toBe(false);
    });
});

describe('OboDoc.validate', () => {
    test('lists every violation, header first', () => {
        const doc = parseString('format-version: 1.2\nformat-version: 1.4\n\n[Term]\nid: A:1\n');
        expect(doc.violations()).toEqual([
            { tag: 'format-version', kind: 'duplicate' },
            { tag: 'namespace', kind: 'missing', frameId: 'A:1' },
        ]);
        expect(() => doc.validate()).toThrow("Invalid cardinality in header frame: duplicate 'format-version' clause");
    });

    test('passes after namespaces are assigned', () => {
        const doc = parseString(makeOntology(2)).assignNamespaces();
        expect(() => doc.validate()).not.toThrow();
    });
});

describe('OboDoc.equals', () => {
    test('compares structurally', () => {
        expect(parseString(CANONICAL_DOC).equals(parseString(CANONICAL_DOC))).toBe(true);
        expect(parseString('[Term]\nid: A:1\n').equals(parseString('[Term]\nid: A:2\n'))).toBe(false);
    });

    test('ignores free-standing comment lines, which are not kept', () => {
        expect(parseString('! lead\n[Term]\nid: A:1\n').equals(parseString('[Term]\nid: A:1\n'))).toBe(true);
    });

    test('compares the comments kept on clause lines', () => {
        const plain = parseString('[Term]\nid: A:1\nname: a\n');
        expect(parseString('[Term]\nid: A:1\nname: a ! note\n').equals(plain)).toBe(false);
        expect(parseString('[Term] ! frame\nid: A:1\nname: a\n').equals(plain)).toBe(false);
    });
});

describe('OboDoc.toWriter', () => {
    function sink(): { stream: Writable; text: () => string; end: () => Promise<void> } {
        const chunks: string[] = [];
        const stream = new Writable({
            highWaterMark: 16,
            write(chunk: Buffer, _encoding, callback) {
                chunks.push(chunk.toString('utf8'));
                setImmediate(() => callback());
            },
        });
        return {
            stream,
            text: () => chunks.join(''),
            end: () => new Promise<void>((resolve) => stream.end(() => resolve())),
        };
    }

    test('writes the same text as toString', async () => {
        const doc = parseString(CANONICAL_DOC);
        const { stream, text, end } = sink();

        await doc.toWriter(stream);
        await end();
        expect(text()).toBe(doc.toString());
    });

    test('writes nothing for an empty document', async () => {
        const { stream, text, end } = sink();
        await new OboDoc().toWriter(stream);
        await end();
        expect(text()).toBe('');
    });
});
