/**
 * Parser Types
 */

/** Grammar rules the lexer can be started from. */
export type StartRule =
    | 'OboDoc'
    | 'HeaderFrame'
    | 'EntityFrame'
    | 'EntitySequence'
    | 'Id'
    | 'QuotedString'
    | 'UnquotedString'
    | 'XrefList'
    | 'QualifierList'
    | 'Iso8601DateTime'
    | 'HeaderClause'
    | 'TermClauseLine'
    | 'TypedefClauseLine'
    | 'InstanceClauseLine';

/** Rules that produce nodes in the parse tree. */
export type Rule =
    | 'OboDoc'
    | 'HeaderFrame'
    | 'HeaderClause'
    | 'EntitySequence'
    | 'TermFrame'
    | 'TypedefFrame'
    | 'InstanceFrame'
    | 'IdLine'
    | 'TermClauseLine'
    | 'TypedefClauseLine'
    | 'InstanceClauseLine'
    | 'TermClause'
    | 'TypedefClause'
    | 'InstanceClause'
    | 'Tag'
    | 'UnreservedTag'
    | 'QualifierList'
    | 'Qualifier'
    | 'QualifierKey'
    | 'Comment'
    | 'Url'
    | 'PrefixedId'
    | 'UnprefixedId'
    | 'IdPrefix'
    | 'IdLocal'
    | 'QuotedString'
    | 'UnquotedString'
    | 'UnquotedLiteral'
    | 'Boolean'
    | 'Xref'
    | 'XrefList'
    | 'Definition'
    | 'Synonym'
    | 'SynonymScope'
    | 'LiteralPropertyValue'
    | 'ResourcePropertyValue'
    | 'IsoDate'
    | 'IsoTime'
    | 'IsoDateTime'
    | 'NaiveDateTime';

export interface Position {
    /** Character offset from the start of the input. */
    offset: number;
    /** 1-based line number. */
    line: number;
    /** 1-based column number. */
    column: number;
}

export interface Span {
    start: Position;
    end: Position;
}

/**
 * A node of the parse tree: the rule that matched, the exact source text
 * and the nested nodes in source order.
 */
export interface Pair {
    rule: Rule;
    text: string;
    span: Span;
    inner: Pair[];
}

/**
 * Where a chunk of text sits in its source. Positions reported by the
 * lexer are shifted by these amounts.
 */
export interface SourceOffsets {
    /** Lines before the chunk. */
    line?: number;
    /** Characters before the chunk. */
    offset?: number;
    /** File the chunk was read from. */
    path?: string;
}
