/**
 * Clause and Frame Types
 */

import type {
    CreationDate,
    Definition,
    Ident,
    Line,
    NaiveDateTime,
    PropertyValue,
    SynonymScope,
    Synonym,
    Url,
    Xref,
} from './ast.js';
import type {
    HeaderGenusTag,
    HeaderIdentTag,
    HeaderPrefixTag,
    HeaderTextTag,
    InstanceFlagTag,
    InstanceIdentTag,
    InstanceTextTag,
    TermFlagTag,
    TermIdentTag,
    TermTextTag,
    TypedefChainTag,
    TypedefExpandTag,
    TypedefFlagTag,
    TypedefIdentTag,
    TypedefTextTag,
} from './tags.js';

// Distributive helpers: one union member per tag.
type FlagClause<T extends string> = T extends string ? { readonly tag: T; readonly value: boolean } : never;
type TextClause<T extends string> = T extends string ? { readonly tag: T; readonly value: string } : never;
type IdentClause<T extends string> = T extends string ? { readonly tag: T; readonly value: Ident } : never;
type PrefixClause<T extends string> = T extends string ? { readonly tag: T; readonly prefix: string } : never;
type GenusClause<T extends string> = T extends string
    ? { readonly tag: T; readonly prefix: string; readonly relation: Ident; readonly filler: Ident }
    : never;
type ChainClause<T extends string> = T extends string
    ? { readonly tag: T; readonly first: Ident; readonly second: Ident }
    : never;
type ExpandClause<T extends string> = T extends string
    ? { readonly tag: T; readonly value: string; readonly xrefs: readonly Xref[] }
    : never;

export interface DefClause {
    readonly tag: 'def';
    readonly value: Definition;
}

export interface SynonymClause {
    readonly tag: 'synonym';
    readonly value: Synonym;
}

export interface XrefClause {
    readonly tag: 'xref';
    readonly value: Xref;
}

export interface PropertyValueClause {
    readonly tag: 'property_value';
    readonly value: PropertyValue;
}

export interface CreationDateClause {
    readonly tag: 'creation_date';
    readonly value: CreationDate;
}

export interface RelationshipClause {
    readonly tag: 'relationship';
    readonly relation: Ident;
    readonly value: Ident;
}

/** Term `intersection_of`: a genus (`value` alone) or a differentia. */
export interface IntersectionOfClause {
    readonly tag: 'intersection_of';
    readonly relation?: Ident;
    readonly value: Ident;
}

export type HeaderClause =
    | TextClause<HeaderTextTag>
    | IdentClause<HeaderIdentTag>
    | PrefixClause<HeaderPrefixTag>
    | GenusClause<HeaderGenusTag>
    | { readonly tag: 'date'; readonly value: NaiveDateTime }
    | { readonly tag: 'subsetdef'; readonly subset: Ident; readonly description: string }
    | {
        readonly tag: 'synonymtypedef';
        readonly synonymType: Ident;
        readonly description: string;
        readonly scope?: SynonymScope;
    }
    | { readonly tag: 'idspace'; readonly prefix: string; readonly url: Url; readonly description?: string }
    | { readonly tag: 'id-mapping'; readonly source: Ident; readonly target: Ident }
    | { readonly tag: 'treat-xrefs-as-relationship'; readonly prefix: string; readonly relation: Ident }
    | PropertyValueClause
    | { readonly tag: 'unreserved'; readonly key: string; readonly value: string };

export type TermClause =
    | FlagClause<TermFlagTag>
    | TextClause<TermTextTag>
    | IdentClause<TermIdentTag>
    | DefClause
    | SynonymClause
    | XrefClause
    | PropertyValueClause
    | IntersectionOfClause
    | RelationshipClause
    | CreationDateClause;

export type TypedefClause =
    | FlagClause<TypedefFlagTag>
    | TextClause<TypedefTextTag>
    | IdentClause<TypedefIdentTag>
    | ChainClause<TypedefChainTag>
    | ExpandClause<TypedefExpandTag>
    | DefClause
    | SynonymClause
    | XrefClause
    | PropertyValueClause
    | RelationshipClause
    | CreationDateClause;

export type InstanceClause =
    | FlagClause<InstanceFlagTag>
    | TextClause<InstanceTextTag>
    | IdentClause<InstanceIdentTag>
    | DefClause
    | SynonymClause
    | XrefClause
    | PropertyValueClause
    | RelationshipClause
    | CreationDateClause;

export type EntityClause = TermClause | TypedefClause | InstanceClause;

/** Clause shapes every entity frame kind accepts. */
export type SharedClause =
    | FlagClause<InstanceFlagTag>
    | TextClause<InstanceTextTag>
    | IdentClause<'namespace' | 'alt_id' | 'subset' | 'replaced_by' | 'consider'>
    | DefClause
    | SynonymClause
    | XrefClause
    | PropertyValueClause
    | RelationshipClause
    | CreationDateClause;

export type HeaderTag = HeaderClause['tag'];
export type TermTag = TermClause['tag'];
export type TypedefTag = TypedefClause['tag'];
export type InstanceTag = InstanceClause['tag'];

export interface HeaderFrame {
    readonly type: 'header';
    clauses: HeaderClause[];
}

export interface TermFrame {
    readonly type: 'term';
    id: Line<Ident>;
    /** Comment trailing the `[Term]` line. */
    comment?: string;
    clauses: Line<TermClause>[];
}

export interface TypedefFrame {
    readonly type: 'typedef';
    id: Line<Ident>;
    comment?: string;
    clauses: Line<TypedefClause>[];
}

export interface InstanceFrame {
    readonly type: 'instance';
    id: Line<Ident>;
    comment?: string;
    clauses: Line<InstanceClause>[];
}

export type EntityFrame = TermFrame | TypedefFrame | InstanceFrame;
export type EntityKind = EntityFrame['type'];
export type Frame = HeaderFrame | EntityFrame;
