import type { HeaderClause, HeaderFrame } from '../types/clauses.js';

/**
 * Join every `owl-axioms` clause of the header into a single clause at
 * the end of the header, texts separated by newlines.
 */
export function mergeOwlAxioms(header: HeaderFrame): void {
    const axioms: string[] = [];
    const others: HeaderClause[] = [];
    for (const clause of header.clauses) {
        if (clause.tag === 'owl-axioms') {
            axioms.push(clause.value);
        } else {
            others.push(clause);
        }
    }
    if (axioms.length === 0) {
        return;
    }
    header.clauses = [...others, { tag: 'owl-axioms', value: axioms.join('\n') }];
}
