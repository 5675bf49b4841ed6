/**
 * Identifier interning
 *
 * One cache per parse session. Identical identifier text always resolves
 * to the same frozen object, so most equality checks end at `===`.
 * JavaScript runs builders on a single thread, which is what lets every
 * worker of a reader share one cache without locking.
 */

import type { PrefixedIdent, UnprefixedIdent, Url } from '../types/ast.js';

export interface IdentCacheStats {
    /** Distinct interned strings. */
    strings: number;
    /** Distinct identifiers. */
    idents: number;
    hits: number;
    misses: number;
}

export class IdentCache {
    private readonly strings = new Map<string, string>();
    private readonly prefixedIdents = new Map<string, PrefixedIdent>();
    private readonly unprefixedIdents = new Map<string, UnprefixedIdent>();
    private readonly urls = new Map<string, Url>();
    private hits = 0;
    private misses = 0;

    /**
     * Return the shared copy of a string, inserting it on first use.
     */
    intern(text: string): string {
        const existing = this.strings.get(text);
        if (existing !== undefined) {
            this.hits++;
            return existing;
        }
        this.misses++;
        this.strings.set(text, text);
        return text;
    }

    prefixed(prefix: string, local: string): PrefixedIdent {
        // length-prefixed so that ("a:b", "c") and ("a", "b:c") differ
        const key = `${prefix.length}:${prefix}${local}`;
        const existing = this.prefixedIdents.get(key);
        if (existing) {
            this.hits++;
            return existing;
        }
        this.misses++;
        const ident: PrefixedIdent = Object.freeze({ type: 'prefixed', prefix: this.intern(prefix), local });
        this.prefixedIdents.set(key, ident);
        return ident;
    }

    unprefixed(value: string): UnprefixedIdent {
        const existing = this.unprefixedIdents.get(value);
        if (existing) {
            this.hits++;
            return existing;
        }
        this.misses++;
        const ident: UnprefixedIdent = Object.freeze({ type: 'unprefixed', value });
        this.unprefixedIdents.set(value, ident);
        return ident;
    }

    url(value: string): Url {
        const existing = this.urls.get(value);
        if (existing) {
            this.hits++;
            return existing;
        }
        this.misses++;
        const ident: Url = Object.freeze({ type: 'url', value });
        this.urls.set(value, ident);
        return ident;
    }

    stats(): IdentCacheStats {
        return {
            strings: this.strings.size,
            idents: this.prefixedIdents.size + this.unprefixedIdents.size + this.urls.size,
            hits: this.hits,
            misses: this.misses,
        };
    }
}
