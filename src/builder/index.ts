/**
 * Builder entry points
 *
 * Tokenize a fragment from the matching start rule and build it with a
 * session cache. Each call uses a fresh cache unless one is passed in.
 */

import type { Ident, Line } from '../types/ast.js';
import type { EntityFrame, HeaderClause, InstanceClause, TermClause, TypedefClause } from '../types/clauses.js';
import type { SourceOffsets } from '../types/parser.js';
import { IdentCache } from '../ident/cache.js';
import { Lexer } from '../syntax/lexer.js';
import { buildHeaderClause, buildInstanceClause, buildTermClause, buildTypedefClause } from './clauses.js';
import { buildEntityFrame, buildLine } from './frames.js';
import { buildIdent, nth } from './values.js';

export * from './values.js';
export * from './clauses.js';
export * from './frames.js';

export type ClauseKind = 'header' | 'term' | 'typedef' | 'instance';

/**
 * Parse an identifier: URL first, then prefixed, then unprefixed.
 * @throws OboException with code SYNTAX_ERROR
 */
export function parseIdent(text: string, cache: IdentCache = new IdentCache()): Ident {
    return buildIdent(Lexer.tokenize('Id', text), cache);
}

/**
 * Parse a single `[Term]`, `[Typedef]` or `[Instance]` frame.
 * @throws OboException with code SYNTAX_ERROR
 */
export function parseFrame(
    text: string,
    cache: IdentCache = new IdentCache(),
    offsets: SourceOffsets = {}
): EntityFrame {
    return buildEntityFrame(Lexer.tokenize('EntityFrame', text, offsets), cache);
}

/**
 * Parse one clause line of the given frame kind, with its qualifiers and
 * comment.
 * @throws OboException with code SYNTAX_ERROR
 */
export function parseClause(kind: 'header', text: string, cache?: IdentCache): HeaderClause;
export function parseClause(kind: 'term', text: string, cache?: IdentCache): Line<TermClause>;
export function parseClause(kind: 'typedef', text: string, cache?: IdentCache): Line<TypedefClause>;
export function parseClause(kind: 'instance', text: string, cache?: IdentCache): Line<InstanceClause>;
export function parseClause(
    kind: ClauseKind,
    text: string,
    cache: IdentCache = new IdentCache()
): HeaderClause | Line<TermClause | TypedefClause | InstanceClause> {
    switch (kind) {
        case 'header':
            return buildHeaderClause(Lexer.tokenize('HeaderClause', text), cache);
        case 'term': {
            const pair = Lexer.tokenize('TermClauseLine', text);
            return buildLine(pair, buildTermClause(nth(pair, 0), cache), cache);
        }
        case 'typedef': {
            const pair = Lexer.tokenize('TypedefClauseLine', text);
            return buildLine(pair, buildTypedefClause(nth(pair, 0), cache), cache);
        }
        case 'instance': {
            const pair = Lexer.tokenize('InstanceClauseLine', text);
            return buildLine(pair, buildInstanceClause(nth(pair, 0), cache), cache);
        }
    }
}
