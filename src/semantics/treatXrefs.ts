/**
 * Header macro expansion
 *
 * The `treat-xrefs-as-*` header clauses declare that an xref to an ID
 * space stands for a logical axiom. Expansion writes those axioms out as
 * ordinary clauses. Xrefs and the header macros themselves stay in place,
 * and a clause is only appended when an equal clause is not there yet, so
 * expanding twice changes nothing.
 */

import { isDeepStrictEqual } from 'util';
import type { Ident, Line } from '../types/ast.js';
import type {
    EntityFrame,
    HeaderFrame,
    InstanceClause,
    TermClause,
    TermFrame,
    TypedefClause,
    TypedefFrame,
} from '../types/clauses.js';
import { identsEqual } from '../ident/ident.js';
import { line, linesOf } from '../model/frames.js';

/** Prefixes treated as equivalent even without a header macro. */
export const IMPLICIT_EQUIVALENT_PREFIXES = ['BFO', 'RO'] as const;

type AxiomClause = Extract<TermClause, { tag: 'equivalent_to' | 'is_a' | 'relationship' }>;

function appendUnique<C>(clauses: Line<C>[], clause: C): void {
    const entry = line(clause);
    if (!clauses.some((existing) => isDeepStrictEqual(existing, entry))) {
        clauses.push(entry);
    }
}

function appendAxiom(frame: EntityFrame, clause: AxiomClause): void {
    switch (frame.type) {
        case 'term':
            appendUnique<TermClause>(frame.clauses, clause);
            break;
        case 'typedef':
            appendUnique<TypedefClause>(frame.clauses, clause);
            break;
        case 'instance':
            if (clause.tag === 'relationship') {
                appendUnique<InstanceClause>(frame.clauses, clause);
            }
            break;
    }
}

/** Identifiers of the frame's xrefs that live in the given ID space. */
function xrefsIn(frame: EntityFrame, prefix: string): Ident[] {
    const ids: Ident[] = [];
    for (const { value } of linesOf(frame)) {
        if (value.tag === 'xref' && value.value.id.type === 'prefixed' && value.value.id.prefix === prefix) {
            ids.push(value.value.id);
        }
    }
    return ids;
}

function isClassOrRelation(frame: EntityFrame): frame is TermFrame | TypedefFrame {
    return frame.type === 'term' || frame.type === 'typedef';
}

export function expandEquivalent(entities: readonly EntityFrame[], prefix: string): void {
    for (const frame of entities.filter(isClassOrRelation)) {
        for (const id of xrefsIn(frame, prefix)) {
            appendAxiom(frame, { tag: 'equivalent_to', value: id });
        }
    }
}

export function expandIsA(entities: readonly EntityFrame[], prefix: string): void {
    for (const frame of entities.filter(isClassOrRelation)) {
        for (const id of xrefsIn(frame, prefix)) {
            appendAxiom(frame, { tag: 'is_a', value: id });
        }
    }
}

/**
 * `A xref P:B` makes `B` a subclass of `A`: frame `B` gets `is_a: A`.
 */
export function expandHasSubclass(entities: readonly EntityFrame[], prefix: string): void {
    const targets = entities.filter(isClassOrRelation);
    for (const frame of targets) {
        const superclass = frame.id.value;
        for (const id of xrefsIn(frame, prefix)) {
            for (const subclass of targets.filter((f) => identsEqual(f.id.value, id))) {
                appendAxiom(subclass, { tag: 'is_a', value: superclass });
            }
        }
    }
}

export function expandRelationship(entities: readonly EntityFrame[], prefix: string, relation: Ident): void {
    for (const frame of entities) {
        for (const id of xrefsIn(frame, prefix)) {
            appendAxiom(frame, { tag: 'relationship', relation, value: id });
        }
    }
}

function genusDifferentia(genus: Ident, relation: Ident, filler: Ident): TermClause[] {
    return [
        { tag: 'intersection_of', value: genus },
        { tag: 'intersection_of', relation, value: filler },
    ];
}

/**
 * A term with an xref into the ID space and no logical definition of its
 * own is defined as the xref target intersected with `relation some filler`.
 */
export function expandGenusDifferentia(
    entities: readonly EntityFrame[],
    prefix: string,
    relation: Ident,
    filler: Ident
): void {
    for (const frame of entities) {
        if (frame.type !== 'term' || frame.clauses.some((l) => l.value.tag === 'intersection_of')) {
            continue;
        }
        for (const id of xrefsIn(frame, prefix)) {
            for (const clause of genusDifferentia(id, relation, filler)) {
                appendUnique(frame.clauses, clause);
            }
        }
    }
}

/**
 * `A xref P:B` defines term `B` as `A` intersected with
 * `relation some filler`.
 */
export function expandReverseGenusDifferentia(
    entities: readonly EntityFrame[],
    prefix: string,
    relation: Ident,
    filler: Ident
): void {
    const terms = entities.filter((frame): frame is TermFrame => frame.type === 'term');
    for (const frame of terms) {
        for (const id of xrefsIn(frame, prefix)) {
            for (const target of terms.filter((t) => identsEqual(t.id.value, id))) {
                for (const clause of genusDifferentia(frame.id.value, relation, filler)) {
                    appendUnique(target.clauses, clause);
                }
            }
        }
    }
}

/**
 * Apply the implicit macros, then every header macro in header order.
 */
export function treatXrefs(header: HeaderFrame, entities: readonly EntityFrame[]): void {
    for (const prefix of IMPLICIT_EQUIVALENT_PREFIXES) {
        expandEquivalent(entities, prefix);
    }
    for (const clause of header.clauses) {
        switch (clause.tag) {
            case 'treat-xrefs-as-equivalent':
                expandEquivalent(entities, clause.prefix);
                break;
            case 'treat-xrefs-as-is_a':
                expandIsA(entities, clause.prefix);
                break;
            case 'treat-xrefs-as-has-subclass':
                expandHasSubclass(entities, clause.prefix);
                break;
            case 'treat-xrefs-as-relationship':
                expandRelationship(entities, clause.prefix, clause.relation);
                break;
            case 'treat-xrefs-as-genus-differentia':
                expandGenusDifferentia(entities, clause.prefix, clause.relation, clause.filler);
                break;
            case 'treat-xrefs-as-reverse-genus-differentia':
                expandReverseGenusDifferentia(entities, clause.prefix, clause.relation, clause.filler);
                break;
            default:
                break;
        }
    }
}
