/**
 * Clause builders
 */

import type { HeaderClause, InstanceClause, SharedClause, TermClause, TypedefClause } from '../types/clauses.js';
import type { Pair } from '../types/parser.js';
import {
    HEADER_GENUS_TAGS,
    HEADER_IDENT_TAGS,
    HEADER_PREFIX_TAGS,
    HEADER_TEXT_TAGS,
    INSTANCE_FLAG_TAGS,
    INSTANCE_IDENT_TAGS,
    INSTANCE_TEXT_TAGS,
    TERM_FLAG_TAGS,
    TERM_IDENT_TAGS,
    TERM_TEXT_TAGS,
    TYPEDEF_CHAIN_TAGS,
    TYPEDEF_EXPAND_TAGS,
    TYPEDEF_FLAG_TAGS,
    TYPEDEF_IDENT_TAGS,
    TYPEDEF_TEXT_TAGS,
    isOneOf,
} from '../types/tags.js';
import type { IdentCache } from '../ident/cache.js';
import {
    buildBoolean,
    buildCreationDate,
    buildDefinition,
    buildIdPrefix,
    buildIdent,
    buildNaiveDateTime,
    buildPropertyValue,
    buildQuotedString,
    buildSynonym,
    buildSynonymScope,
    buildUnquotedString,
    buildUrl,
    buildXref,
    buildXrefList,
    childOf,
    invalid,
    nth,
} from './values.js';

export function buildHeaderClause(pair: Pair, cache: IdentCache): HeaderClause {
    const tagPair = nth(pair, 0);
    const tag = tagPair.text;

    if (tagPair.rule === 'UnreservedTag') {
        return { tag: 'unreserved', key: cache.intern(tag), value: buildUnquotedString(nth(pair, 1)) };
    }
    if (isOneOf(HEADER_TEXT_TAGS, tag)) {
        return { tag, value: buildUnquotedString(nth(pair, 1)) };
    }
    if (isOneOf(HEADER_IDENT_TAGS, tag)) {
        return { tag, value: buildIdent(nth(pair, 1), cache) };
    }
    if (isOneOf(HEADER_PREFIX_TAGS, tag)) {
        return { tag, prefix: buildIdPrefix(nth(pair, 1), cache) };
    }
    if (isOneOf(HEADER_GENUS_TAGS, tag)) {
        return {
            tag,
            prefix: buildIdPrefix(nth(pair, 1), cache),
            relation: buildIdent(nth(pair, 2), cache),
            filler: buildIdent(nth(pair, 3), cache),
        };
    }

    switch (tag) {
        case 'treat-xrefs-as-relationship':
            return { tag, prefix: buildIdPrefix(nth(pair, 1), cache), relation: buildIdent(nth(pair, 2), cache) };
        case 'date':
            return { tag, value: buildNaiveDateTime(nth(pair, 1)) };
        case 'subsetdef':
            return { tag, subset: buildIdent(nth(pair, 1), cache), description: buildQuotedString(nth(pair, 2)) };
        case 'synonymtypedef': {
            const scope = childOf(pair, 'SynonymScope');
            return {
                tag,
                synonymType: buildIdent(nth(pair, 1), cache),
                description: buildQuotedString(nth(pair, 2)),
                ...(scope && { scope: buildSynonymScope(scope) }),
            };
        }
        case 'idspace': {
            const description = pair.inner[3];
            return {
                tag,
                prefix: buildIdPrefix(nth(pair, 1), cache),
                url: buildUrl(nth(pair, 2), cache),
                ...(description && { description: buildQuotedString(description) }),
            };
        }
        case 'id-mapping':
            return { tag, source: buildIdent(nth(pair, 1), cache), target: buildIdent(nth(pair, 2), cache) };
        case 'property_value':
            return { tag, value: buildPropertyValue(nth(pair, 1), cache) };
        default:
            throw invalid(tagPair, `Unknown header clause '${tag}'`);
    }
}

/**
 * Clauses every entity frame kind shares, or undefined for other tags.
 */
function buildSharedClause(tag: string, pair: Pair, cache: IdentCache): SharedClause | undefined {
    switch (tag) {
        case 'def':
            return { tag, value: buildDefinition(nth(pair, 1), cache) };
        case 'synonym':
            return { tag, value: buildSynonym(nth(pair, 1), cache) };
        case 'xref':
            return { tag, value: buildXref(nth(pair, 1), cache) };
        case 'property_value':
            return { tag, value: buildPropertyValue(nth(pair, 1), cache) };
        case 'creation_date':
            return { tag, value: buildCreationDate(nth(pair, 1)) };
        case 'relationship':
            return { tag, relation: buildIdent(nth(pair, 1), cache), value: buildIdent(nth(pair, 2), cache) };
        default:
            return undefined;
    }
}

export function buildTermClause(pair: Pair, cache: IdentCache): TermClause {
    const tag = nth(pair, 0).text;

    if (isOneOf(TERM_FLAG_TAGS, tag)) {
        return buildBoolean(nth(pair, 1)) ? { tag, value: true } : { tag, value: false };
    }
    if (isOneOf(TERM_TEXT_TAGS, tag)) {
        return { tag, value: buildUnquotedString(nth(pair, 1)) };
    }
    if (isOneOf(TERM_IDENT_TAGS, tag)) {
        // One identifier kind per literal, so the tag alone picks the clause member.
        const value = buildIdent(nth(pair, 1), cache);
        switch (value.type) {
            case 'prefixed':
                return { tag, value };
            case 'unprefixed':
                return { tag, value };
            case 'url':
                return { tag, value };
        }
    }
    if (tag === 'intersection_of') {
        return pair.inner.length === 3
            ? { tag, relation: buildIdent(nth(pair, 1), cache), value: buildIdent(nth(pair, 2), cache) }
            : { tag, value: buildIdent(nth(pair, 1), cache) };
    }
    const shared = buildSharedClause(tag, pair, cache);
    if (shared) {
        return shared;
    }
    throw invalid(pair, `Unknown term clause '${tag}'`);
}

export function buildTypedefClause(pair: Pair, cache: IdentCache): TypedefClause {
    const tag = nth(pair, 0).text;

    if (isOneOf(TYPEDEF_FLAG_TAGS, tag)) {
        return buildBoolean(nth(pair, 1)) ? { tag, value: true } : { tag, value: false };
    }
    if (isOneOf(TYPEDEF_TEXT_TAGS, tag)) {
        return { tag, value: buildUnquotedString(nth(pair, 1)) };
    }
    if (isOneOf(TYPEDEF_IDENT_TAGS, tag)) {
        const value = buildIdent(nth(pair, 1), cache);
        switch (value.type) {
            case 'prefixed':
                return { tag, value };
            case 'unprefixed':
                return { tag, value };
            case 'url':
                return { tag, value };
        }
    }
    if (isOneOf(TYPEDEF_CHAIN_TAGS, tag)) {
        return { tag, first: buildIdent(nth(pair, 1), cache), second: buildIdent(nth(pair, 2), cache) };
    }
    if (isOneOf(TYPEDEF_EXPAND_TAGS, tag)) {
        return { tag, value: buildQuotedString(nth(pair, 1)), xrefs: buildXrefList(nth(pair, 2), cache) };
    }
    const shared = buildSharedClause(tag, pair, cache);
    if (shared) {
        return shared;
    }
    throw invalid(pair, `Unknown typedef clause '${tag}'`);
}

export function buildInstanceClause(pair: Pair, cache: IdentCache): InstanceClause {
    const tag = nth(pair, 0).text;

    if (isOneOf(INSTANCE_FLAG_TAGS, tag)) {
        return buildBoolean(nth(pair, 1)) ? { tag, value: true } : { tag, value: false };
    }
    if (isOneOf(INSTANCE_TEXT_TAGS, tag)) {
        return { tag, value: buildUnquotedString(nth(pair, 1)) };
    }
    if (isOneOf(INSTANCE_IDENT_TAGS, tag)) {
        const value = buildIdent(nth(pair, 1), cache);
        switch (value.type) {
            case 'prefixed':
                return { tag, value };
            case 'unprefixed':
                return { tag, value };
            case 'url':
                return { tag, value };
        }
    }
    const shared = buildSharedClause(tag, pair, cache);
    if (shared) {
        return shared;
    }
    throw invalid(pair, `Unknown instance clause '${tag}'`);
}
