/**
 * Canonical ordering
 *
 * Header clauses follow the header table, entity frames are grouped by
 * kind and ordered by identifier, and clauses inside a frame follow the
 * frame kind's table. Clauses sharing a tag are ordered by their printed
 * value; xref and qualifier lists are ordered by identifier.
 */

import type { Line, Qualifier, Xref } from '../types/ast.js';
import type {
    EntityClause,
    EntityFrame,
    HeaderClause,
    HeaderFrame,
    InstanceClause,
    TermClause,
    TypedefClause,
} from '../types/clauses.js';
import { compareIdents, compareText } from '../ident/ident.js';
import { renderClause, renderHeaderClause } from '../serializer/printer.js';
import { linesOf } from '../model/frames.js';
import {
    ENTITY_KIND_RANK,
    HEADER_CLAUSES,
    INSTANCE_CLAUSES,
    TERM_CLAUSES,
    TYPEDEF_CLAUSES,
    type ClauseTable,
} from '../model/tables.js';

export function compareXrefs(a: Xref, b: Xref): number {
    return compareIdents(a.id, b.id) || compareText(a.description ?? '', b.description ?? '');
}

export function compareQualifiers(a: Qualifier, b: Qualifier): number {
    return compareIdents(a.key, b.key) || compareText(a.value, b.value);
}

function sortXrefs(xrefs: readonly Xref[]): Xref[] {
    return [...xrefs].sort(compareXrefs);
}

export function compareHeaderClauses(a: HeaderClause, b: HeaderClause): number {
    const rank = HEADER_CLAUSES[a.tag].rank - HEADER_CLAUSES[b.tag].rank;
    if (rank !== 0 || a.tag === 'owl-axioms') {
        // axiom lines keep their source order
        return rank;
    }
    return compareText(renderHeaderClause(a), renderHeaderClause(b));
}

function byLine<C extends EntityClause>(table: ClauseTable<C['tag']>) {
    return (a: Line<C>, b: Line<C>): number => {
        const tagA: C['tag'] = a.value.tag;
        const tagB: C['tag'] = b.value.tag;
        return table[tagA].rank - table[tagB].rank ||
        compareText(renderClause(a.value), renderClause(b.value));
    };
}

/**
 * Order the xref lists carried by a clause.
 */
export function sortClauseLists(clause: TermClause): TermClause;
export function sortClauseLists(clause: TypedefClause): TypedefClause;
export function sortClauseLists(clause: InstanceClause): InstanceClause;
export function sortClauseLists(clause: EntityClause): EntityClause {
    switch (clause.tag) {
        case 'def':
            return { tag: clause.tag, value: { text: clause.value.text, xrefs: sortXrefs(clause.value.xrefs) } };
        case 'synonym':
            return { tag: clause.tag, value: { ...clause.value, xrefs: sortXrefs(clause.value.xrefs) } };
        case 'expand_assertion_to':
        case 'expand_expression_to':
            return { ...clause, xrefs: sortXrefs(clause.xrefs) };
        default:
            return clause;
    }
}

function sortLine<T>(line: Line<T>, sortValue: (value: T) => T): Line<T> {
    return {
        ...line,
        value: sortValue(line.value),
        ...(line.qualifiers && { qualifiers: [...line.qualifiers].sort(compareQualifiers) }),
    };
}

export function compareFrames(a: EntityFrame, b: EntityFrame): number {
    return ENTITY_KIND_RANK[a.type] - ENTITY_KIND_RANK[b.type] || compareIdents(a.id.value, b.id.value);
}

export function sortHeader(header: HeaderFrame): void {
    header.clauses.sort(compareHeaderClauses);
}

export function sortFrame(frame: EntityFrame): void {
    frame.id = sortLine(frame.id, (id) => id);
    switch (frame.type) {
        case 'term':
            frame.clauses = frame.clauses
                .map((l) => sortLine(l, (c) => sortClauseLists(c)))
                .sort(byLine<TermClause>(TERM_CLAUSES));
            break;
        case 'typedef':
            frame.clauses = frame.clauses
                .map((l) => sortLine(l, (c) => sortClauseLists(c)))
                .sort(byLine<TypedefClause>(TYPEDEF_CLAUSES));
            break;
        case 'instance':
            frame.clauses = frame.clauses
                .map((l) => sortLine(l, (c) => sortClauseLists(c)))
                .sort(byLine<InstanceClause>(INSTANCE_CLAUSES));
            break;
    }
}

/**
 * Sort a whole document in place.
 */
export function sortDocument(header: HeaderFrame, entities: EntityFrame[]): void {
    sortHeader(header);
    for (const frame of entities) {
        sortFrame(frame);
    }
    entities.sort(compareFrames);
}

function isOrdered<T>(items: readonly T[], compare: (a: T, b: T) => number): boolean {
    for (let i = 1; i < items.length; i++) {
        const previous = items[i - 1];
        const current = items[i];
        if (previous !== undefined && current !== undefined && compare(previous, current) > 0) {
            return false;
        }
    }
    return true;
}

function hasSortedQualifiers(line: Line<unknown>): boolean {
    return !line.qualifiers || isOrdered(line.qualifiers, compareQualifiers);
}

function hasSortedXrefs(clause: EntityClause): boolean {
    switch (clause.tag) {
        case 'def':
        case 'synonym':
            return isOrdered(clause.value.xrefs, compareXrefs);
        case 'expand_assertion_to':
        case 'expand_expression_to':
            return isOrdered(clause.xrefs, compareXrefs);
        default:
            return true;
    }
}

function isFrameSorted(frame: EntityFrame): boolean {
    const lists = linesOf(frame).every((l) => hasSortedQualifiers(l) && hasSortedXrefs(l.value));
    if (!lists || !hasSortedQualifiers(frame.id)) {
        return false;
    }
    switch (frame.type) {
        case 'term':
            return isOrdered(frame.clauses, byLine<TermClause>(TERM_CLAUSES));
        case 'typedef':
            return isOrdered(frame.clauses, byLine<TypedefClause>(TYPEDEF_CLAUSES));
        case 'instance':
            return isOrdered(frame.clauses, byLine<InstanceClause>(INSTANCE_CLAUSES));
    }
}

/** Whether `sortDocument` would leave the document unchanged. */
export function isDocumentSorted(header: HeaderFrame, entities: readonly EntityFrame[]): boolean {
    return (
        isOrdered(header.clauses, compareHeaderClauses) &&
        entities.every(isFrameSorted) &&
        isOrdered(entities, compareFrames)
    );
}
