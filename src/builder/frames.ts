/**
 * Frame builders
 */

import type { Ident, Line } from '../types/ast.js';
import type {
    EntityFrame,
    HeaderFrame,
    InstanceFrame,
    TermFrame,
    TypedefFrame,
} from '../types/clauses.js';
import type { Pair, Rule } from '../types/parser.js';
import type { IdentCache } from '../ident/cache.js';
import { setFrameLocation } from '../model/locations.js';
import { OboDoc } from '../doc.js';
import { buildHeaderClause, buildInstanceClause, buildTermClause, buildTypedefClause } from './clauses.js';
import { buildComment, buildIdent, buildQualifierList, childOf, invalid, nth, spanOf } from './values.js';

/**
 * Wrap a clause value built from the first child of a line node with the
 * line's qualifiers and comment.
 */
export function buildLine<T>(pair: Pair, value: T, cache: IdentCache): Line<T> {
    const qualifiers = childOf(pair, 'QualifierList');
    const comment = childOf(pair, 'Comment');
    return {
        value,
        ...(qualifiers && { qualifiers: buildQualifierList(qualifiers, cache) }),
        ...(comment && { comment: buildComment(comment) }),
    };
}

export function buildHeaderFrame(pair: Pair, cache: IdentCache): HeaderFrame {
    if (pair.rule !== 'HeaderFrame') {
        throw invalid(pair, `Expected HeaderFrame, got ${pair.rule}`);
    }
    return { type: 'header', clauses: pair.inner.map((clause) => buildHeaderClause(clause, cache)) };
}

interface FrameParts {
    id: Line<Ident>;
    comment?: string;
    lines: Pair[];
}

function frameParts(pair: Pair, lineRule: Rule, cache: IdentCache): FrameParts {
    const idLine = childOf(pair, 'IdLine');
    if (!idLine) {
        throw invalid(pair, 'Frame without an id line');
    }
    const comment = pair.inner[0]?.rule === 'Comment' ? buildComment(pair.inner[0]) : undefined;
    return {
        id: buildLine(idLine, buildIdent(nth(idLine, 0), cache), cache),
        ...(comment !== undefined && { comment }),
        lines: pair.inner.filter((child) => child.rule === lineRule),
    };
}

export function buildTermFrame(pair: Pair, cache: IdentCache): TermFrame {
    const { lines, ...parts } = frameParts(pair, 'TermClauseLine', cache);
    const frame: TermFrame = {
        type: 'term',
        ...parts,
        clauses: lines.map((line) => buildLine(line, buildTermClause(nth(line, 0), cache), cache)),
    };
    setFrameLocation(frame, spanOf(pair));
    return frame;
}

export function buildTypedefFrame(pair: Pair, cache: IdentCache): TypedefFrame {
    const { lines, ...parts } = frameParts(pair, 'TypedefClauseLine', cache);
    const frame: TypedefFrame = {
        type: 'typedef',
        ...parts,
        clauses: lines.map((line) => buildLine(line, buildTypedefClause(nth(line, 0), cache), cache)),
    };
    setFrameLocation(frame, spanOf(pair));
    return frame;
}

export function buildInstanceFrame(pair: Pair, cache: IdentCache): InstanceFrame {
    const { lines, ...parts } = frameParts(pair, 'InstanceClauseLine', cache);
    const frame: InstanceFrame = {
        type: 'instance',
        ...parts,
        clauses: lines.map((line) => buildLine(line, buildInstanceClause(nth(line, 0), cache), cache)),
    };
    setFrameLocation(frame, spanOf(pair));
    return frame;
}

export function buildEntityFrame(pair: Pair, cache: IdentCache): EntityFrame {
    switch (pair.rule) {
        case 'TermFrame':
            return buildTermFrame(pair, cache);
        case 'TypedefFrame':
            return buildTypedefFrame(pair, cache);
        case 'InstanceFrame':
            return buildInstanceFrame(pair, cache);
        default:
            throw invalid(pair, `Expected an entity frame, got ${pair.rule}`);
    }
}

/** Frames of an `EntitySequence` node. */
export function buildEntitySequence(pair: Pair, cache: IdentCache): EntityFrame[] {
    if (pair.rule !== 'EntitySequence') {
        throw invalid(pair, `Expected EntitySequence, got ${pair.rule}`);
    }
    return pair.inner.map((frame) => buildEntityFrame(frame, cache));
}

export function buildOboDoc(pair: Pair, cache: IdentCache): OboDoc {
    if (pair.rule !== 'OboDoc') {
        throw invalid(pair, `Expected OboDoc, got ${pair.rule}`);
    }
    const [header, ...frames] = pair.inner;
    return new OboDoc(
        header ? buildHeaderFrame(header, cache) : { type: 'header', clauses: [] },
        frames.map((frame) => buildEntityFrame(frame, cache))
    );
}
