/**
 * Value builders
 *
 * Turn parse tree nodes into AST values. Builders are local: they see one
 * node and the session cache, never sibling clauses.
 */

import type {
    CreationDate,
    Definition,
    Ident,
    IsoDate,
    IsoDateTime,
    IsoTime,
    IsoTimezone,
    NaiveDateTime,
    PropertyValue,
    Qualifier,
    Synonym,
    SynonymScope,
    Url,
    Xref,
} from '../types/ast.js';
import type { Pair, Rule } from '../types/parser.js';
import { createSyntaxError, type ErrorSpan, type OboException } from '../types/errors.js';
import { IdentCache } from '../ident/cache.js';
import { unescape } from '../syntax/escape.js';
import { Lexer } from '../syntax/lexer.js';

export function spanOf(pair: Pair): ErrorSpan {
    return {
        start: pair.span.start.offset,
        end: pair.span.end.offset,
        line: pair.span.start.line,
        col: pair.span.start.column,
    };
}

/**
 * Error for a node whose shape the grammar should have ruled out, or whose
 * value is out of range.
 */
export function invalid(pair: Pair, message: string): OboException {
    return createSyntaxError(message, { span: spanOf(pair), context: pair.text, found: pair.text });
}

/** The `index`-th child of a node. */
export function nth(pair: Pair, index: number): Pair {
    const child = pair.inner[index];
    if (!child) {
        throw invalid(pair, `Malformed ${pair.rule}: missing child ${index}`);
    }
    return child;
}

export function childOf(pair: Pair, rule: Rule): Pair | undefined {
    return pair.inner.find((child) => child.rule === rule);
}

function expectRule(pair: Pair, ...rules: Rule[]): void {
    if (!rules.includes(pair.rule)) {
        throw invalid(pair, `Expected ${rules.join(' or ')}, got ${pair.rule}`);
    }
}

// --- Identifiers ---

export function buildIdent(pair: Pair, cache: IdentCache): Ident {
    switch (pair.rule) {
        case 'Url':
            return cache.url(unescape(pair.text));
        case 'PrefixedId':
            return cache.prefixed(unescape(nth(pair, 0).text), unescape(nth(pair, 1).text));
        case 'UnprefixedId':
            return cache.unprefixed(unescape(pair.text));
        default:
            throw invalid(pair, `Expected an identifier, got ${pair.rule}`);
    }
}

export function buildUrl(pair: Pair, cache: IdentCache): Url {
    expectRule(pair, 'Url');
    return cache.url(unescape(pair.text));
}

/** A bare identifier prefix, as used by `idspace` and the treat-xrefs macros. */
export function buildIdPrefix(pair: Pair, cache: IdentCache): string {
    expectRule(pair, 'IdPrefix');
    return cache.intern(unescape(pair.text));
}

// --- Strings ---

export function buildQuotedString(pair: Pair): string {
    expectRule(pair, 'QuotedString');
    return unescape(pair.text.slice(1, -1));
}

export function buildUnquotedString(pair: Pair): string {
    expectRule(pair, 'UnquotedString');
    return unescape(pair.text);
}

export function buildBoolean(pair: Pair): boolean {
    expectRule(pair, 'Boolean');
    return pair.text === 'true';
}

export function buildComment(pair: Pair): string {
    expectRule(pair, 'Comment');
    return pair.text.slice(1).trim();
}

// --- Cross-references and qualifiers ---

export function buildXref(pair: Pair, cache: IdentCache): Xref {
    expectRule(pair, 'Xref');
    const id = buildIdent(nth(pair, 0), cache);
    const description = childOf(pair, 'QuotedString');
    return description ? { id, description: buildQuotedString(description) } : { id };
}

export function buildXrefList(pair: Pair, cache: IdentCache): Xref[] {
    expectRule(pair, 'XrefList');
    return pair.inner.map((xref) => buildXref(xref, cache));
}

export function buildQualifier(pair: Pair, cache: IdentCache): Qualifier {
    expectRule(pair, 'Qualifier');
    const keyPair = nth(pair, 0);
    let key: Ident;
    try {
        key = buildIdent(Lexer.tokenize('Id', keyPair.text), cache);
    } catch (error) {
        throw invalid(keyPair, `Invalid qualifier key '${keyPair.text}': ${error instanceof Error ? error.message : String(error)}`);
    }
    return { key, value: buildQuotedString(nth(pair, 1)) };
}

export function buildQualifierList(pair: Pair, cache: IdentCache): Qualifier[] {
    expectRule(pair, 'QualifierList');
    return pair.inner.map((qualifier) => buildQualifier(qualifier, cache));
}

// --- Compound values ---

export function buildDefinition(pair: Pair, cache: IdentCache): Definition {
    expectRule(pair, 'Definition');
    return {
        text: buildQuotedString(nth(pair, 0)),
        xrefs: buildXrefList(nth(pair, 1), cache),
    };
}

export function buildSynonymScope(pair: Pair): SynonymScope {
    expectRule(pair, 'SynonymScope');
    switch (pair.text) {
        case 'EXACT':
        case 'BROAD':
        case 'NARROW':
        case 'RELATED':
            return pair.text;
        default:
            throw invalid(pair, `Unknown synonym scope '${pair.text}'`);
    }
}

export function buildSynonym(pair: Pair, cache: IdentCache): Synonym {
    expectRule(pair, 'Synonym');
    const text = buildQuotedString(nth(pair, 0));
    const scope = buildSynonymScope(nth(pair, 1));
    const xrefs = buildXrefList(nth(pair, pair.inner.length - 1), cache);
    if (pair.inner.length === 4) {
        return { text, scope, synonymType: buildIdent(nth(pair, 2), cache), xrefs };
    }
    return { text, scope, xrefs };
}

export function buildPropertyValue(pair: Pair, cache: IdentCache): PropertyValue {
    const property = buildIdent(nth(pair, 0), cache);
    switch (pair.rule) {
        case 'ResourcePropertyValue':
            return { type: 'resource', property, target: buildIdent(nth(pair, 1), cache) };
        case 'LiteralPropertyValue': {
            const valuePair = nth(pair, 1);
            const value = valuePair.rule === 'QuotedString' ? buildQuotedString(valuePair) : unescape(valuePair.text);
            const datatypePair = nth(pair, 2);
            const datatype = buildIdent(datatypePair, cache);
            if (datatype.type === 'unprefixed') {
                throw invalid(
                    datatypePair,
                    `Invalid datatype '${datatypePair.text}': expected a prefixed identifier or URL`
                );
            }
            return { type: 'literal', property, value, datatype };
        }
        default:
            throw invalid(pair, `Expected a property value, got ${pair.rule}`);
    }
}

// --- Dates ---

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function checkDate(pair: Pair, year: number, month: number, day: number): void {
    if (month < 1 || month > 12) {
        throw invalid(pair, `Invalid month ${month} in date '${pair.text}'`);
    }
    if (day < 1 || day > daysInMonth(year, month)) {
        throw invalid(pair, `Invalid day ${day} in date '${pair.text}'`);
    }
}

function checkTime(pair: Pair, hour: number, minute: number, second = 0): void {
    if (hour > 23 || minute > 59 || second > 59) {
        throw invalid(pair, `Invalid time '${pair.text}'`);
    }
}

export function buildIsoDate(pair: Pair): IsoDate {
    expectRule(pair, 'IsoDate');
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(pair.text);
    if (!match) {
        throw invalid(pair, `Invalid date '${pair.text}'`);
    }
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    checkDate(pair, year, month, day);
    return { year, month, day };
}

function buildTimezone(pair: Pair, text: string): IsoTimezone {
    if (text === 'Z') {
        return { type: 'utc' };
    }
    const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(text);
    if (!match) {
        throw invalid(pair, `Invalid timezone '${text}'`);
    }
    const sign = match[1] === '-' ? '-' : '+';
    const hours = Number(match[2]);
    const minutes = Number(match[3] ?? '0');
    checkTime(pair, hours, minutes);
    return { type: 'offset', sign, hours, minutes };
}

export function buildIsoTime(pair: Pair): IsoTime {
    expectRule(pair, 'IsoTime');
    const match = /^(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(.*)$/.exec(pair.text);
    if (!match) {
        throw invalid(pair, `Invalid time '${pair.text}'`);
    }
    const [hour, minute, second] = [Number(match[1]), Number(match[2]), Number(match[3])];
    checkTime(pair, hour, minute, second);
    const fraction = match[4];
    const zone = match[5];
    return {
        hour,
        minute,
        second,
        ...(fraction !== undefined && { fraction }),
        ...(zone !== undefined && zone !== '' && { timezone: buildTimezone(pair, zone) }),
    };
}

export function buildIsoDateTime(pair: Pair): IsoDateTime {
    expectRule(pair, 'IsoDateTime');
    return { date: buildIsoDate(nth(pair, 0)), time: buildIsoTime(nth(pair, 1)) };
}

export function buildCreationDate(pair: Pair): CreationDate {
    switch (pair.rule) {
        case 'IsoDate':
            return { type: 'date', date: buildIsoDate(pair) };
        case 'IsoDateTime':
            return { type: 'datetime', datetime: buildIsoDateTime(pair) };
        default:
            throw invalid(pair, `Expected a creation date, got ${pair.rule}`);
    }
}

export function buildNaiveDateTime(pair: Pair): NaiveDateTime {
    expectRule(pair, 'NaiveDateTime');
    const match = /^(\d{2}):(\d{2}):(\d{4})[ \t]+(\d{2}):(\d{2})$/.exec(pair.text);
    if (!match) {
        throw invalid(pair, `Invalid date '${pair.text}'`);
    }
    const [day, month, year, hour, minute] = match.slice(1).map(Number);
    checkDate(pair, year, month, day);
    checkTime(pair, hour, minute);
    return { day, month, year, hour, minute };
}
