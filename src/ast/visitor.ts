import type {
    Definition,
    Ident,
    Line,
    PropertyValue,
    Qualifier,
    Synonym,
    Xref,
} from '../types/ast.js';
import type {
    EntityClause,
    EntityFrame,
    HeaderClause,
    HeaderFrame,
    InstanceClause,
    TermClause,
    TypedefClause,
} from '../types/clauses.js';
import type { IdCompactor, IdDecompactor } from '../ident/compactor.js';

export type IdentMapper = (id: Ident) => Ident;

/** Anything holding a header and entity frames. */
export interface FrameContainer {
    header: HeaderFrame;
    entities: EntityFrame[];
}

function mapXref(xref: Xref, fn: IdentMapper): Xref {
    return { ...xref, id: fn(xref.id) };
}

function mapXrefs(xrefs: readonly Xref[], fn: IdentMapper): Xref[] {
    return xrefs.map((xref) => mapXref(xref, fn));
}

function mapQualifier(qualifier: Qualifier, fn: IdentMapper): Qualifier {
    return { key: fn(qualifier.key), value: qualifier.value };
}

function mapDefinition(def: Definition, fn: IdentMapper): Definition {
    return { text: def.text, xrefs: mapXrefs(def.xrefs, fn) };
}

function mapSynonym(synonym: Synonym, fn: IdentMapper): Synonym {
    return {
        ...synonym,
        ...(synonym.synonymType && { synonymType: fn(synonym.synonymType) }),
        xrefs: mapXrefs(synonym.xrefs, fn),
    };
}

function mapPropertyValue(pv: PropertyValue, fn: IdentMapper): PropertyValue {
    switch (pv.type) {
        case 'resource':
            return { type: 'resource', property: fn(pv.property), target: fn(pv.target) };
        case 'literal':
            return { type: 'literal', property: fn(pv.property), value: pv.value, datatype: fn(pv.datatype) };
    }
}

function mapLine<T>(line: Line<T>, fn: IdentMapper, mapValue: (value: T) => T): Line<T> {
    return {
        ...line,
        value: mapValue(line.value),
        ...(line.qualifiers && { qualifiers: line.qualifiers.map((q) => mapQualifier(q, fn)) }),
    };
}

export function mapClauseIdents(clause: TermClause, fn: IdentMapper): TermClause;
export function mapClauseIdents(clause: TypedefClause, fn: IdentMapper): TypedefClause;
export function mapClauseIdents(clause: InstanceClause, fn: IdentMapper): InstanceClause;
export function mapClauseIdents(clause: EntityClause, fn: IdentMapper): EntityClause {
    switch (clause.tag) {
        case 'namespace':
        case 'alt_id':
        case 'subset':
        case 'is_a':
        case 'union_of':
        case 'equivalent_to':
        case 'disjoint_from':
        case 'replaced_by':
        case 'consider':
        case 'domain':
        case 'range':
        case 'inverse_of':
        case 'transitive_over':
        case 'disjoint_over':
        case 'instance_of':
            return { ...clause, value: fn(clause.value) };
        case 'intersection_of':
            if ('relation' in clause && clause.relation) {
                return { tag: clause.tag, relation: fn(clause.relation), value: fn(clause.value) };
            }
            return { tag: clause.tag, value: fn(clause.value) };
        case 'relationship':
            return { tag: clause.tag, relation: fn(clause.relation), value: fn(clause.value) };
        case 'holds_over_chain':
        case 'equivalent_to_chain':
            return { ...clause, first: fn(clause.first), second: fn(clause.second) };
        case 'expand_assertion_to':
        case 'expand_expression_to':
            return { ...clause, xrefs: mapXrefs(clause.xrefs, fn) };
        case 'def':
            return { tag: clause.tag, value: mapDefinition(clause.value, fn) };
        case 'synonym':
            return { tag: clause.tag, value: mapSynonym(clause.value, fn) };
        case 'xref':
            return { tag: clause.tag, value: mapXref(clause.value, fn) };
        case 'property_value':
            return { tag: clause.tag, value: mapPropertyValue(clause.value, fn) };
        default:
            return clause;
    }
}

/**
 * Rewrite the identifiers of a header clause. `import` targets and
 * `idspace` bases are locations rather than identifiers and stay as they
 * are.
 */
export function mapHeaderClauseIdents(clause: HeaderClause, fn: IdentMapper): HeaderClause {
    switch (clause.tag) {
        case 'default-namespace':
            return { tag: clause.tag, value: fn(clause.value) };
        case 'subsetdef':
            return { ...clause, subset: fn(clause.subset) };
        case 'synonymtypedef':
            return { ...clause, synonymType: fn(clause.synonymType) };
        case 'id-mapping':
            return { tag: clause.tag, source: fn(clause.source), target: fn(clause.target) };
        case 'treat-xrefs-as-genus-differentia':
        case 'treat-xrefs-as-reverse-genus-differentia':
            return { ...clause, relation: fn(clause.relation), filler: fn(clause.filler) };
        case 'treat-xrefs-as-relationship':
            return { ...clause, relation: fn(clause.relation) };
        case 'property_value':
            return { tag: clause.tag, value: mapPropertyValue(clause.value, fn) };
        default:
            return clause;
    }
}

export function mapFrameIdents(frame: EntityFrame, fn: IdentMapper): void {
    frame.id = mapLine(frame.id, fn, fn);
    switch (frame.type) {
        case 'term':
            frame.clauses = frame.clauses.map((l) => mapLine(l, fn, (c) => mapClauseIdents(c, fn)));
            break;
        case 'typedef':
            frame.clauses = frame.clauses.map((l) => mapLine(l, fn, (c) => mapClauseIdents(c, fn)));
            break;
        case 'instance':
            frame.clauses = frame.clauses.map((l) => mapLine(l, fn, (c) => mapClauseIdents(c, fn)));
            break;
    }
}

/**
 * Rewrite every identifier of a document in place. Frame objects are
 * kept, their id line and clause list are replaced.
 */
export function mapIdents(doc: FrameContainer, fn: IdentMapper): void {
    doc.header.clauses = doc.header.clauses.map((clause) => mapHeaderClauseIdents(clause, fn));
    for (const frame of doc.entities) {
        mapFrameIdents(frame, fn);
    }
}

export function compactIdents(doc: FrameContainer, compactor: IdCompactor): void {
    mapIdents(doc, (id) => compactor.compact(id));
}

export function decompactIdents(doc: FrameContainer, decompactor: IdDecompactor): void {
    mapIdents(doc, (id) => decompactor.decompact(id));
}
