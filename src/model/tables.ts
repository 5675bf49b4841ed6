/**
 * Clause tables
 *
 * Serialization rank and cardinality of every clause tag, per frame kind.
 * The mapped types make each table total over its clause union, so adding
 * a clause kind without a table entry does not compile.
 */

import type { EntityKind, HeaderTag, InstanceTag, TermTag, TypedefTag } from '../types/clauses.js';
import type { CardinalityKind } from '../types/errors.js';

export type Cardinality = 'ExactlyOne' | 'ZeroOrOne' | 'NotOne' | 'Any';

export interface ClauseRule {
    readonly rank: number;
    readonly cardinality: Cardinality;
}

export type ClauseTable<Tag extends string> = { readonly [K in Tag]: ClauseRule };

export const HEADER_CLAUSES: ClauseTable<HeaderTag> = {
    'format-version': { rank: 0, cardinality: 'ZeroOrOne' },
    'data-version': { rank: 1, cardinality: 'ZeroOrOne' },
    'date': { rank: 2, cardinality: 'ZeroOrOne' },
    'saved-by': { rank: 3, cardinality: 'ZeroOrOne' },
    'auto-generated-by': { rank: 4, cardinality: 'ZeroOrOne' },
    'import': { rank: 5, cardinality: 'Any' },
    'subsetdef': { rank: 6, cardinality: 'Any' },
    'synonymtypedef': { rank: 7, cardinality: 'Any' },
    'default-namespace': { rank: 8, cardinality: 'ZeroOrOne' },
    'namespace-id-rule': { rank: 9, cardinality: 'ZeroOrOne' },
    'idspace': { rank: 10, cardinality: 'Any' },
    'default-relationship-id-prefix': { rank: 11, cardinality: 'ZeroOrOne' },
    'id-mapping': { rank: 12, cardinality: 'Any' },
    'treat-xrefs-as-equivalent': { rank: 13, cardinality: 'Any' },
    'treat-xrefs-as-genus-differentia': { rank: 14, cardinality: 'Any' },
    'treat-xrefs-as-reverse-genus-differentia': { rank: 15, cardinality: 'Any' },
    'treat-xrefs-as-relationship': { rank: 16, cardinality: 'Any' },
    'treat-xrefs-as-is_a': { rank: 17, cardinality: 'Any' },
    'treat-xrefs-as-has-subclass': { rank: 18, cardinality: 'Any' },
    'property_value': { rank: 19, cardinality: 'Any' },
    'remark': { rank: 20, cardinality: 'Any' },
    'ontology': { rank: 21, cardinality: 'ZeroOrOne' },
    'unreserved': { rank: 22, cardinality: 'Any' },
    // always last
    'owl-axioms': { rank: 23, cardinality: 'Any' },
};

export const TERM_CLAUSES: ClauseTable<TermTag> = {
    is_anonymous: { rank: 0, cardinality: 'ZeroOrOne' },
    name: { rank: 1, cardinality: 'ZeroOrOne' },
    namespace: { rank: 2, cardinality: 'ExactlyOne' },
    alt_id: { rank: 3, cardinality: 'Any' },
    def: { rank: 4, cardinality: 'ZeroOrOne' },
    comment: { rank: 5, cardinality: 'ZeroOrOne' },
    subset: { rank: 6, cardinality: 'Any' },
    synonym: { rank: 7, cardinality: 'Any' },
    xref: { rank: 8, cardinality: 'Any' },
    builtin: { rank: 9, cardinality: 'ZeroOrOne' },
    property_value: { rank: 10, cardinality: 'Any' },
    is_a: { rank: 11, cardinality: 'Any' },
    intersection_of: { rank: 12, cardinality: 'NotOne' },
    union_of: { rank: 13, cardinality: 'NotOne' },
    equivalent_to: { rank: 14, cardinality: 'Any' },
    disjoint_from: { rank: 15, cardinality: 'Any' },
    relationship: { rank: 16, cardinality: 'Any' },
    created_by: { rank: 17, cardinality: 'ZeroOrOne' },
    creation_date: { rank: 18, cardinality: 'ZeroOrOne' },
    is_obsolete: { rank: 19, cardinality: 'ZeroOrOne' },
    replaced_by: { rank: 20, cardinality: 'Any' },
    consider: { rank: 21, cardinality: 'Any' },
};

export const TYPEDEF_CLAUSES: ClauseTable<TypedefTag> = {
    is_anonymous: { rank: 0, cardinality: 'ZeroOrOne' },
    name: { rank: 1, cardinality: 'ZeroOrOne' },
    namespace: { rank: 2, cardinality: 'ExactlyOne' },
    alt_id: { rank: 3, cardinality: 'Any' },
    def: { rank: 4, cardinality: 'ZeroOrOne' },
    comment: { rank: 5, cardinality: 'ZeroOrOne' },
    subset: { rank: 6, cardinality: 'Any' },
    synonym: { rank: 7, cardinality: 'Any' },
    xref: { rank: 8, cardinality: 'Any' },
    property_value: { rank: 9, cardinality: 'Any' },
    domain: { rank: 10, cardinality: 'ZeroOrOne' },
    range: { rank: 11, cardinality: 'ZeroOrOne' },
    builtin: { rank: 12, cardinality: 'ZeroOrOne' },
    holds_over_chain: { rank: 13, cardinality: 'Any' },
    is_anti_symmetric: { rank: 14, cardinality: 'ZeroOrOne' },
    is_cyclic: { rank: 15, cardinality: 'ZeroOrOne' },
    is_reflexive: { rank: 16, cardinality: 'ZeroOrOne' },
    is_symmetric: { rank: 17, cardinality: 'ZeroOrOne' },
    is_asymmetric: { rank: 18, cardinality: 'ZeroOrOne' },
    is_transitive: { rank: 19, cardinality: 'ZeroOrOne' },
    is_functional: { rank: 20, cardinality: 'ZeroOrOne' },
    is_inverse_functional: { rank: 21, cardinality: 'ZeroOrOne' },
    is_a: { rank: 22, cardinality: 'Any' },
    intersection_of: { rank: 23, cardinality: 'NotOne' },
    union_of: { rank: 24, cardinality: 'NotOne' },
    equivalent_to: { rank: 25, cardinality: 'Any' },
    disjoint_from: { rank: 26, cardinality: 'Any' },
    inverse_of: { rank: 27, cardinality: 'ZeroOrOne' },
    transitive_over: { rank: 28, cardinality: 'Any' },
    equivalent_to_chain: { rank: 29, cardinality: 'Any' },
    disjoint_over: { rank: 30, cardinality: 'Any' },
    relationship: { rank: 31, cardinality: 'Any' },
    is_obsolete: { rank: 32, cardinality: 'ZeroOrOne' },
    created_by: { rank: 33, cardinality: 'ZeroOrOne' },
    creation_date: { rank: 34, cardinality: 'ZeroOrOne' },
    replaced_by: { rank: 35, cardinality: 'Any' },
    consider: { rank: 36, cardinality: 'Any' },
    expand_assertion_to: { rank: 37, cardinality: 'Any' },
    expand_expression_to: { rank: 38, cardinality: 'Any' },
    is_metadata_tag: { rank: 39, cardinality: 'ZeroOrOne' },
    is_class_level: { rank: 40, cardinality: 'ZeroOrOne' },
};

export const INSTANCE_CLAUSES: ClauseTable<InstanceTag> = {
    is_anonymous: { rank: 0, cardinality: 'ZeroOrOne' },
    name: { rank: 1, cardinality: 'ZeroOrOne' },
    namespace: { rank: 2, cardinality: 'ExactlyOne' },
    alt_id: { rank: 3, cardinality: 'Any' },
    def: { rank: 4, cardinality: 'ZeroOrOne' },
    comment: { rank: 5, cardinality: 'Any' },
    subset: { rank: 6, cardinality: 'Any' },
    synonym: { rank: 7, cardinality: 'Any' },
    xref: { rank: 8, cardinality: 'Any' },
    property_value: { rank: 9, cardinality: 'Any' },
    instance_of: { rank: 10, cardinality: 'Any' },
    relationship: { rank: 11, cardinality: 'Any' },
    created_by: { rank: 12, cardinality: 'ZeroOrOne' },
    creation_date: { rank: 13, cardinality: 'ZeroOrOne' },
    is_obsolete: { rank: 14, cardinality: 'ZeroOrOne' },
    replaced_by: { rank: 15, cardinality: 'Any' },
    consider: { rank: 16, cardinality: 'Any' },
};

/** Keys of a clause table, in rank order. */
function tagsOf<Tag extends string>(table: ClauseTable<Tag>): readonly Tag[] {
    return Object.keys(table)
        .filter((key): key is Tag => key in table)
        .sort((a, b) => table[a].rank - table[b].rank);
}

export const HEADER_TAGS = tagsOf(HEADER_CLAUSES);
export const TERM_TAGS = tagsOf(TERM_CLAUSES);
export const TYPEDEF_TAGS = tagsOf(TYPEDEF_CLAUSES);
export const INSTANCE_TAGS = tagsOf(INSTANCE_CLAUSES);

/** Frame kinds in canonical document order. */
export const ENTITY_KIND_RANK: { readonly [K in EntityKind]: number } = {
    term: 0,
    typedef: 1,
    instance: 2,
};

/**
 * Whether `count` occurrences satisfy a cardinality. Returns the kind of
 * violation otherwise.
 */
export function checkCount(cardinality: Cardinality, count: number): CardinalityKind | undefined {
    switch (cardinality) {
        case 'ExactlyOne':
            if (count === 0) return 'missing';
            return count > 1 ? 'duplicate' : undefined;
        case 'ZeroOrOne':
            return count > 1 ? 'duplicate' : undefined;
        case 'NotOne':
            return count === 1 ? 'single' : undefined;
        case 'Any':
            return undefined;
    }
}
