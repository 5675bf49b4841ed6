/**
 * Frame constructors and clause helpers
 */

import type { Ident, Line, Qualifier } from '../types/ast.js';
import type {
    EntityClause,
    EntityFrame,
    InstanceClause,
    InstanceFrame,
    InstanceTag,
    SharedClause,
    TermClause,
    TermFrame,
    TermTag,
    TypedefClause,
    TypedefFrame,
    TypedefTag,
} from '../types/clauses.js';
import { identToString } from '../ident/ident.js';
import { INSTANCE_CLAUSES, TERM_CLAUSES, TYPEDEF_CLAUSES, type ClauseTable } from './tables.js';

export interface LineExtras {
    qualifiers?: readonly Qualifier[];
    comment?: string;
}

/**
 * Wrap a value in a line, omitting absent qualifiers and comment.
 */
export function line<T>(value: T, extras: LineExtras = {}): Line<T> {
    return {
        value,
        ...(extras.qualifiers && { qualifiers: extras.qualifiers }),
        ...(extras.comment !== undefined && { comment: extras.comment }),
    };
}

export function createTermFrame(id: Ident, clauses: Line<TermClause>[] = []): TermFrame {
    return { type: 'term', id: line(id), clauses };
}

export function createTypedefFrame(id: Ident, clauses: Line<TypedefClause>[] = []): TypedefFrame {
    return { type: 'typedef', id: line(id), clauses };
}

export function createInstanceFrame(id: Ident, clauses: Line<InstanceClause>[] = []): InstanceFrame {
    return { type: 'instance', id: line(id), clauses };
}

/** Rendered identifier of a frame, as reported in errors. */
export function frameIdOf(frame: EntityFrame): string {
    return identToString(frame.id.value);
}

/** Clause lines of any entity frame, read-only. */
export function linesOf(frame: EntityFrame): readonly Line<EntityClause>[] {
    return frame.clauses;
}

export function hasClause(frame: EntityFrame, tag: EntityClause['tag']): boolean {
    return linesOf(frame).some((l) => l.value.tag === tag);
}

function insertionIndex<Tag extends string>(
    lines: readonly Line<{ readonly tag: Tag }>[],
    table: ClauseTable<Tag>,
    tag: Tag
): number {
    const rank = table[tag].rank;
    const index = lines.findIndex((l) => table[l.value.tag].rank > rank);
    return index === -1 ? lines.length : index;
}

/**
 * Insert a clause before the first clause of a later rank. A sorted frame
 * without that tag stays sorted.
 */
export function insertClause(frame: EntityFrame, clause: SharedClause): void {
    const entry = line(clause);
    switch (frame.type) {
        case 'term':
            frame.clauses.splice(insertionIndex<TermTag>(frame.clauses, TERM_CLAUSES, clause.tag), 0, entry);
            break;
        case 'typedef':
            frame.clauses.splice(insertionIndex<TypedefTag>(frame.clauses, TYPEDEF_CLAUSES, clause.tag), 0, entry);
            break;
        case 'instance':
            frame.clauses.splice(insertionIndex<InstanceTag>(frame.clauses, INSTANCE_CLAUSES, clause.tag), 0, entry);
            break;
    }
}
