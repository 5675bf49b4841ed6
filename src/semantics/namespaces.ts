import type { EntityFrame, HeaderFrame } from '../types/clauses.js';
import { createCardinalityError } from '../types/errors.js';
import { defaultNamespace } from '../model/accessors.js';
import { hasClause, insertClause } from '../model/frames.js';

/**
 * Give every entity frame without a `namespace` clause the header's
 * default namespace. Frames that declare their own are left alone, and a
 * missing default is only an error when some frame needs it.
 *
 * @returns number of frames that received a namespace
 * @throws OboException with code CARDINALITY_ERROR
 */
export function assignNamespaces(header: HeaderFrame, entities: readonly EntityFrame[]): number {
    const fallback = defaultNamespace(header);
    const pending = entities.filter((frame) => !hasClause(frame, 'namespace'));
    if (pending.length === 0) {
        return 0;
    }
    if (!fallback) {
        throw createCardinalityError('default-namespace', 'missing');
    }
    for (const frame of pending) {
        insertClause(frame, { tag: 'namespace', value: fallback });
    }
    return pending.length;
}
