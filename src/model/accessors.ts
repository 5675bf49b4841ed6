/**
 * Single-valued clause accessors
 *
 * Each accessor looks up a clause that may occur at most once and reports
 * a second occurrence instead of silently picking one of them.
 */

import type { Definition, Ident } from '../types/ast.js';
import type { EntityClause, EntityFrame, HeaderClause, HeaderFrame } from '../types/clauses.js';
import { createCardinalityError } from '../types/errors.js';
import { frameLocation } from './locations.js';
import { frameIdOf, linesOf } from './frames.js';

export type DefinitionLookup =
    | { status: 'ok'; definition: Definition }
    | { status: 'missing' }
    | { status: 'duplicate'; count: number };

type ClauseOf<Tag extends EntityClause['tag']> = Extract<EntityClause, { tag: Tag }>;

function clausesOf<Tag extends EntityClause['tag']>(frame: EntityFrame, tag: Tag): ClauseOf<Tag>[] {
    const found: ClauseOf<Tag>[] = [];
    for (const { value } of linesOf(frame)) {
        if (isTagged(value, tag)) {
            found.push(value);
        }
    }
    return found;
}

function isTagged<Tag extends EntityClause['tag']>(clause: EntityClause, tag: Tag): clause is ClauseOf<Tag> {
    return clause.tag === tag;
}

function single<T>(values: readonly T[], tag: string, frame: EntityFrame): T | undefined {
    if (values.length > 1) {
        throw createCardinalityError(tag, 'duplicate', frameIdOf(frame), frameLocation(frame));
    }
    return values[0];
}

export function definitionOf(frame: EntityFrame): DefinitionLookup {
    const defs = clausesOf(frame, 'def');
    const [first] = defs;
    if (!first) {
        return { status: 'missing' };
    }
    if (defs.length > 1) {
        return { status: 'duplicate', count: defs.length };
    }
    return { status: 'ok', definition: first.value };
}

/**
 * @throws OboException with code CARDINALITY_ERROR on a second `name`
 */
export function nameOf(frame: EntityFrame): string | undefined {
    return single(clausesOf(frame, 'name').map((c) => c.value), 'name', frame);
}

export function namespaceOf(frame: EntityFrame): Ident | undefined {
    return single(clausesOf(frame, 'namespace').map((c) => c.value), 'namespace', frame);
}

function headerValues<Tag extends HeaderClause['tag']>(
    header: HeaderFrame,
    tag: Tag
): Extract<HeaderClause, { tag: Tag }>[] {
    return header.clauses.filter((c): c is Extract<HeaderClause, { tag: Tag }> => c.tag === tag);
}

function singleHeader<T>(values: readonly T[], tag: string): T | undefined {
    if (values.length > 1) {
        throw createCardinalityError(tag, 'duplicate');
    }
    return values[0];
}

export function defaultNamespace(header: HeaderFrame): Ident | undefined {
    return singleHeader(headerValues(header, 'default-namespace').map((c) => c.value), 'default-namespace');
}

export function formatVersion(header: HeaderFrame): string | undefined {
    return singleHeader(headerValues(header, 'format-version').map((c) => c.value), 'format-version');
}

export function dataVersion(header: HeaderFrame): string | undefined {
    return singleHeader(headerValues(header, 'data-version').map((c) => c.value), 'data-version');
}
