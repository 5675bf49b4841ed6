/**
 * Clause tag groups
 *
 * Every clause tag of OBO 1.4, grouped by the shape of its value. The
 * grammar, the clause types and the AST builder are all derived from
 * these lists, so a tag only has to be declared once.
 */

// === Header frame ===

export const HEADER_TEXT_TAGS = [
    'format-version',
    'data-version',
    'saved-by',
    'auto-generated-by',
    'namespace-id-rule',
    'remark',
    'ontology',
    'owl-axioms',
] as const;

export const HEADER_IDENT_TAGS = ['import', 'default-namespace'] as const;

export const HEADER_PREFIX_TAGS = [
    'default-relationship-id-prefix',
    'treat-xrefs-as-equivalent',
    'treat-xrefs-as-is_a',
    'treat-xrefs-as-has-subclass',
] as const;

export const HEADER_GENUS_TAGS = [
    'treat-xrefs-as-genus-differentia',
    'treat-xrefs-as-reverse-genus-differentia',
] as const;

/** Header tags with a bespoke value shape. */
export const HEADER_OTHER_TAGS = [
    'date',
    'subsetdef',
    'synonymtypedef',
    'idspace',
    'id-mapping',
    'treat-xrefs-as-relationship',
    'property_value',
] as const;

// === Term frame ===

export const TERM_FLAG_TAGS = ['is_anonymous', 'builtin', 'is_obsolete'] as const;
export const TERM_TEXT_TAGS = ['name', 'comment', 'created_by'] as const;
export const TERM_IDENT_TAGS = [
    'namespace',
    'alt_id',
    'subset',
    'is_a',
    'union_of',
    'equivalent_to',
    'disjoint_from',
    'replaced_by',
    'consider',
] as const;

// === Typedef frame ===

export const TYPEDEF_FLAG_TAGS = [
    'is_anonymous',
    'builtin',
    'is_anti_symmetric',
    'is_cyclic',
    'is_reflexive',
    'is_symmetric',
    'is_asymmetric',
    'is_transitive',
    'is_functional',
    'is_inverse_functional',
    'is_obsolete',
    'is_metadata_tag',
    'is_class_level',
] as const;
export const TYPEDEF_TEXT_TAGS = ['name', 'comment', 'created_by'] as const;
export const TYPEDEF_IDENT_TAGS = [
    'namespace',
    'alt_id',
    'subset',
    'domain',
    'range',
    'is_a',
    'intersection_of',
    'union_of',
    'equivalent_to',
    'disjoint_from',
    'inverse_of',
    'transitive_over',
    'disjoint_over',
    'replaced_by',
    'consider',
] as const;
export const TYPEDEF_CHAIN_TAGS = ['holds_over_chain', 'equivalent_to_chain'] as const;
export const TYPEDEF_EXPAND_TAGS = ['expand_assertion_to', 'expand_expression_to'] as const;

// === Instance frame ===

export const INSTANCE_FLAG_TAGS = ['is_anonymous', 'is_obsolete'] as const;
export const INSTANCE_TEXT_TAGS = ['name', 'comment', 'created_by'] as const;
export const INSTANCE_IDENT_TAGS = [
    'namespace',
    'alt_id',
    'subset',
    'instance_of',
    'replaced_by',
    'consider',
] as const;

export type HeaderTextTag = typeof HEADER_TEXT_TAGS[number];
export type HeaderIdentTag = typeof HEADER_IDENT_TAGS[number];
export type HeaderPrefixTag = typeof HEADER_PREFIX_TAGS[number];
export type HeaderGenusTag = typeof HEADER_GENUS_TAGS[number];
export type TermFlagTag = typeof TERM_FLAG_TAGS[number];
export type TermTextTag = typeof TERM_TEXT_TAGS[number];
export type TermIdentTag = typeof TERM_IDENT_TAGS[number];
export type TypedefFlagTag = typeof TYPEDEF_FLAG_TAGS[number];
export type TypedefTextTag = typeof TYPEDEF_TEXT_TAGS[number];
export type TypedefIdentTag = typeof TYPEDEF_IDENT_TAGS[number];
export type TypedefChainTag = typeof TYPEDEF_CHAIN_TAGS[number];
export type TypedefExpandTag = typeof TYPEDEF_EXPAND_TAGS[number];
export type InstanceFlagTag = typeof INSTANCE_FLAG_TAGS[number];
export type InstanceTextTag = typeof INSTANCE_TEXT_TAGS[number];
export type InstanceIdentTag = typeof INSTANCE_IDENT_TAGS[number];

/**
 * Narrow a raw tag string to one of the tags of a group.
 */
export function isOneOf<T extends string>(tags: readonly T[], value: string): value is T {
    return tags.some((tag) => tag === value);
}
