/**
 * Identifier compaction
 *
 * Converts between URL identifiers and prefixed identifiers using a map
 * of ID-space prefixes to URL bases. Prefixes without a declared base
 * expand to OBO Foundry PURLs.
 */

import type { Ident } from '../types/ast.js';
import type { HeaderFrame } from '../types/clauses.js';
import { IdentCache } from './cache.js';

export const OBO_PURL_BASE = 'http://purl.obolibrary.org/obo/';

/** ID spaces every OBO document may use without declaring them. */
export const BUILTIN_IDSPACES: Readonly<Record<string, string>> = {
    xsd: 'http://www.w3.org/2001/XMLSchema#',
    rdf: 'http://www.w3.org/1999/02/22-rdf-syntax-ns#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
    owl: 'http://www.w3.org/2002/07/owl#',
    oboInOwl: 'http://www.geneontology.org/formats/oboInOwl#',
};

const PURL_PATTERN = /^http:\/\/purl\.obolibrary\.org\/obo\/([A-Za-z][A-Za-z0-9]*)_(.+)$/;

export type IdSpaceMap = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function toMap(idspaces: IdSpaceMap): Map<string, string> {
    return idspaces instanceof Map ? new Map(idspaces) : new Map(Object.entries(idspaces));
}

/** Built-in ID spaces overlaid with the header's `idspace` clauses. */
function headerIdSpaces(header: HeaderFrame): Map<string, string> {
    const idspaces = toMap(BUILTIN_IDSPACES);
    for (const clause of header.clauses) {
        if (clause.tag === 'idspace') {
            idspaces.set(clause.prefix, clause.url.value);
        }
    }
    return idspaces;
}

/**
 * Rewrites URL identifiers into prefixed form.
 */
export class IdCompactor {
    private readonly bases: Array<[prefix: string, base: string]>;

    constructor(idspaces: IdSpaceMap = {}, private readonly cache = new IdentCache()) {
        // longest base first
        this.bases = [...toMap(idspaces)].sort((a, b) => b[1].length - a[1].length);
    }

    static fromHeader(header: HeaderFrame, cache?: IdentCache): IdCompactor {
        return new IdCompactor(headerIdSpaces(header), cache);
    }

    compact(id: Ident): Ident {
        if (id.type !== 'url') {
            return id;
        }
        for (const [prefix, base] of this.bases) {
            if (id.value.startsWith(base) && id.value.length > base.length) {
                return this.cache.prefixed(prefix, id.value.slice(base.length));
            }
        }
        const purl = PURL_PATTERN.exec(id.value);
        if (purl?.[1] !== undefined && purl[2] !== undefined) {
            return this.cache.prefixed(purl[1], purl[2]);
        }
        return id;
    }
}

/**
 * Rewrites prefixed identifiers into URLs.
 */
export class IdDecompactor {
    private readonly bases: Map<string, string>;

    constructor(idspaces: IdSpaceMap = {}, private readonly cache = new IdentCache()) {
        this.bases = toMap(idspaces);
    }

    static fromHeader(header: HeaderFrame, cache?: IdentCache): IdDecompactor {
        return new IdDecompactor(headerIdSpaces(header), cache);
    }

    decompact(id: Ident): Ident {
        if (id.type !== 'prefixed') {
            return id;
        }
        const base = this.bases.get(id.prefix);
        return this.cache.url(base !== undefined ? `${base}${id.local}` : `${OBO_PURL_BASE}${id.prefix}_${id.local}`);
    }
}
