/**
 * Shared test fixtures for consistent, DRY testing.
 */
import type { ReaderLogEntry, ReaderLogger } from '../src/types/logger.js';

// === Documents ===

/** A sorted document, written exactly the way the serializer prints it. */
export const CANONICAL_DOC = [
    'format-version: 1.4',
    'data-version: releases/2024-01-01',
    'date: 01:02:2024 10:30',
    'saved-by: tester',
    'subsetdef: goslim "Generic slim"',
    'synonymtypedef: systematic "Systematic synonym" EXACT',
    'default-namespace: test_ontology',
    'idspace: TEST http://example.org/test/ "Test space"',
    'treat-xrefs-as-is_a: CL',
    'remark: test fixture',
    'ontology: test',
    '',
    '[Term]',
    'id: TEST:0000001',
    'name: cell',
    'namespace: test_ontology',
    'def: "A unit of life." [PMID:123 "paper", TEST:ref]',
    'synonym: "cellule" RELATED systematic []',
    'xref: CL:0000000',
    'is_a: TEST:0000000 ! root',
    'relationship: part_of TEST:0000002 {source="TEST:ref"}',
    'creation_date: 2024-01-01T10:00:00Z',
    '',
    '[Term]',
    'id: TEST:0000002',
    'name: tissue',
    'intersection_of: TEST:0000003',
    'intersection_of: part_of TEST:0000004',
    '',
    '[Typedef]',
    'id: part_of',
    'name: part of',
    'holds_over_chain: part_of part_of',
    'is_transitive: true',
    '',
    '[Instance]',
    'id: TEST:i1',
    'name: my cell',
    'property_value: has_count "3" xsd:integer',
    'instance_of: TEST:0000001',
    '',
].join('\n');

/**
 * A document with `count` terms and one typedef, separated by blank lines
 * and comments the serializer does not keep.
 */
export function makeOntology(count: number): string {
    const frames = ['format-version: 1.4', 'default-namespace: test', ''];
    for (let i = 1; i <= count; i++) {
        frames.push(
            '[Term]',
            `id: TEST:${String(i).padStart(7, '0')}`,
            `name: term ${i}`,
            '! between clauses',
            `is_a: TEST:${String(i - 1).padStart(7, '0')}`,
            ''
        );
    }
    frames.push('[Typedef]', 'id: part_of', 'is_transitive: true', '');
    return frames.join('\n');
}

// === Helpers ===

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
    const out: T[] = [];
    for await (const item of items) {
        out.push(item);
    }
    return out;
}

export interface RecordingLogger extends ReaderLogger {
    events: ReaderLogEntry[];
}

export function recordingLogger(): RecordingLogger {
    const events: ReaderLogEntry[] = [];
    return {
        events,
        log(entry) {
            events.push(entry);
        },
    };
}

/** Yield the bytes of `text` in fixed-size pieces, splitting characters. */
export async function* byteChunks(text: string, size: number): AsyncGenerator<Uint8Array> {
    const bytes = Buffer.from(text, 'utf8');
    for (let i = 0; i < bytes.length; i += size) {
        yield bytes.subarray(i, i + size);
    }
}
