/**
 * Shared type definitions
 */

// Re-export error types
export {
    OboException,
    isOboException,
    getSuggestion,
    attachPath,
    createSyntaxError,
    createCardinalityError,
    createIoError,
    createInvalidOptionsError,
    serializeOboError,
} from './errors.js';

export type {
    OboErrorCode,
    CardinalityKind,
    ErrorSpan,
    OboError,
    SyntaxErrorOptions,
} from './errors.js';

// Re-export value types
export type {
    PrefixedIdent,
    UnprefixedIdent,
    Url,
    Ident,
    Qualifier,
    Xref,
    SynonymScope,
    Synonym,
    Definition,
    ResourcePropertyValue,
    LiteralPropertyValue,
    PropertyValue,
    IsoDate,
    IsoTimezone,
    IsoTime,
    IsoDateTime,
    CreationDate,
    NaiveDateTime,
    Line,
} from './ast.js';

// Re-export clause and frame types
export type {
    DefClause,
    SynonymClause,
    XrefClause,
    PropertyValueClause,
    CreationDateClause,
    RelationshipClause,
    IntersectionOfClause,
    HeaderClause,
    TermClause,
    TypedefClause,
    InstanceClause,
    EntityClause,
    SharedClause,
    HeaderTag,
    TermTag,
    TypedefTag,
    InstanceTag,
    HeaderFrame,
    TermFrame,
    TypedefFrame,
    InstanceFrame,
    EntityFrame,
    EntityKind,
    Frame,
} from './clauses.js';

export type { StartRule, Rule, Position, Span, Pair, SourceOffsets } from './parser.js';

export { DEFAULTS, readerOptionsSchema, resolveReaderOptions } from './options.js';
export type { ReaderOptions, ResolvedReaderOptions } from './options.js';

export { consoleLogger, noopLogger } from './logger.js';
export type { ReaderEvent, ReaderLogEntry, ReaderLogger } from './logger.js';
