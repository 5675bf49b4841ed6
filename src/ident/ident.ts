/**
 * Identifier helpers: rendering, equality and canonical ordering.
 */

import type { Ident } from '../types/ast.js';
import { escapeIdent, escapeUrl } from '../syntax/escape.js';

/**
 * Render an identifier the way it is written in an OBO document.
 */
export function identToString(id: Ident): string {
    switch (id.type) {
        case 'prefixed':
            return `${escapeIdent(id.prefix)}:${escapeIdent(id.local)}`;
        case 'unprefixed':
            return escapeIdent(id.value);
        case 'url':
            return escapeUrl(id.value);
    }
}

export function identsEqual(a: Ident, b: Ident): boolean {
    if (a === b) return true;
    if (a.type === 'prefixed' && b.type === 'prefixed') {
        return a.prefix === b.prefix && a.local === b.local;
    }
    if (a.type === 'unprefixed' && b.type === 'unprefixed') {
        return a.value === b.value;
    }
    if (a.type === 'url' && b.type === 'url') {
        return a.value === b.value;
    }
    return false;
}

const TYPE_RANK: Record<Ident['type'], number> = {
    prefixed: 0,
    unprefixed: 1,
    url: 2,
};

/** Code-unit order of two strings. */
export function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Canonical identifier order: prefixed < unprefixed < url, then
 * lexicographic within each kind (prefix first, then local part).
 */
export function compareIdents(a: Ident, b: Ident): number {
    if (a.type === 'prefixed' && b.type === 'prefixed') {
        return compareText(a.prefix, b.prefix) || compareText(a.local, b.local);
    }
    if (a.type === 'unprefixed' && b.type === 'unprefixed') {
        return compareText(a.value, b.value);
    }
    if (a.type === 'url' && b.type === 'url') {
        return compareText(a.value, b.value);
    }
    return TYPE_RANK[a.type] - TYPE_RANK[b.type];
}
