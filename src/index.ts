/**
 * OBO flat-file library entry point
 *
 * Parser, document model, canonical serializer and streaming frame reader
 * for OBO 1.4 ontologies.
 */

// Parsing
export { parseString, parseReader, parseFile, openObo } from './parser.js';
export type { ParseOptions } from './parser.js';
export { parseIdent, parseFrame, parseClause } from './builder/index.js';
export type { ClauseKind } from './builder/index.js';

// Document
export { OboDoc } from './doc.js';

// Types and Interfaces
export * from './types/index.js';

// Grammar
export { Lexer } from './syntax/lexer.js';
export { GRAMMAR, START_RULES } from './syntax/grammar.js';
export { unescape, escapeQuoted, escapeUnquoted, escapeIdent, escapeUrl } from './syntax/escape.js';

// Identifiers
export { IdentCache } from './ident/cache.js';
export type { IdentCacheStats } from './ident/cache.js';
export { identToString, identsEqual, compareIdents, compareText } from './ident/ident.js';
export { IdCompactor, IdDecompactor, BUILTIN_IDSPACES, OBO_PURL_BASE } from './ident/compactor.js';
export type { IdSpaceMap } from './ident/compactor.js';
export { mapIdents, mapFrameIdents, mapClauseIdents, mapHeaderClauseIdents, compactIdents, decompactIdents } from './ast/visitor.js';
export type { IdentMapper, FrameContainer } from './ast/visitor.js';

// Builders
export * from './builder/values.js';
export * from './builder/clauses.js';
export * from './builder/frames.js';

// Model
export * from './model/tables.js';
export * from './model/frames.js';
export * from './model/accessors.js';
export { checkFrame, validateFrame } from './model/cardinality.js';
export type { CardinalityViolation } from './model/cardinality.js';
export { frameLocation } from './model/locations.js';

// Semantics
export {
    sortDocument,
    sortHeader,
    sortFrame,
    sortClauseLists,
    compareFrames,
    compareHeaderClauses,
    compareXrefs,
    compareQualifiers,
    isDocumentSorted,
} from './semantics/sort.js';
export { assignNamespaces } from './semantics/namespaces.js';
export { mergeOwlAxioms } from './semantics/owlAxioms.js';
export * from './semantics/treatXrefs.js';
export { isFullyLabeled, isEmpty } from './semantics/labels.js';

// Serializer
export * from './serializer/printer.js';

// Streaming
export * from './reader/index.js';
