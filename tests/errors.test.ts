/**
 * Tests for the structured error system
 */

import {
    OboException,
    isOboException,
    getSuggestion,
    attachPath,
    createSyntaxError,
    createCardinalityError,
    createIoError,
    createInvalidOptionsError,
    serializeOboError,
    type OboError,
} from '../src/types/errors.js';

describe('OboException', () => {
    test('carries the structured error', () => {
        const error: OboError = {
            code: 'SYNTAX_ERROR',
            message: 'Test error',
            span: { start: 0, end: 5 },
            suggestion: 'Try this',
        };

        const exception = new OboException(error);
        expect(exception.message).toBe('Test error');
        expect(exception.name).toBe('OboException');
        expect(exception.code).toBe('SYNTAX_ERROR');
        expect(exception.error).toBe(error);
    });

    test('toJSON returns the error object', () => {
        const error: OboError = { code: 'IO_ERROR', message: 'Test' };
        expect(new OboException(error).toJSON()).toEqual(error);
    });

    test('isOboException narrows by code', () => {
        const exception = createIoError(new Error('boom'));
        expect(isOboException(exception)).toBe(true);
        expect(isOboException(exception, 'IO_ERROR')).toBe(true);
        expect(isOboException(exception, 'SYNTAX_ERROR')).toBe(false);
        expect(isOboException(new Error('plain'))).toBe(false);
    });
});

describe('getSuggestion', () => {
    test('suggests an xref list for a bare definition', () => {
        expect(getSuggestion('def: "A thing."')).toContain('xref list');
    });

    test('suggests an xref list for a bare synonym', () => {
        expect(getSuggestion('synonym: "thing" EXACT')).toBe(
            'A synonym needs an xref list after the scope, e.g. synonym: "..." EXACT []'
        );
    });

    test('suggests closing an unterminated quoted string', () => {
        expect(getSuggestion('name: "unterminated')).toBe('Quoted string is missing its closing \'"\'');
    });

    test('suggests a colon after the tag', () => {
        expect(getSuggestion('name foo')).toBe("Clause tag must be followed by ':'");
    });

    test('suggests escaping braces', () => {
        expect(getSuggestion('comment: use {braces')).toBe("Escape '{' as '\\{' inside unquoted values");
    });

    test('suggests a known frame header', () => {
        expect(getSuggestion('[Trem]')).toBe('Frame header must be one of [Term], [Typedef] or [Instance]');
    });

    test('returns undefined for a valid line', () => {
        expect(getSuggestion('name: ok')).toBeUndefined();
    });
});

describe('createSyntaxError', () => {
    test('reports line and column', () => {
        const exception = createSyntaxError('Unexpected token', {
            span: { start: 3, end: 4, line: 2, col: 4 },
            context: 'name foo',
        });

        expect(exception.error.code).toBe('SYNTAX_ERROR');
        expect(exception.message).toBe('Unexpected token at line 2, column 4');
        expect(exception.error.span?.start).toBe(3);
        expect(exception.error.context).toBe('name foo');
        expect(exception.error.suggestion).toBe("Clause tag must be followed by ':'");
        expect(exception.error.details).toEqual({ reason: 'Unexpected token' });
    });

    test('names the file when a path is given', () => {
        const exception = createSyntaxError('Unexpected token', {
            span: { start: 3, end: 4, line: 2, col: 4 },
            path: 'test.obo',
        });

        expect(exception.message).toBe('Unexpected token at test.obo:2:4');
        expect(exception.error.details?.path).toBe('test.obo');
    });

    test('omits the location without a span', () => {
        expect(createSyntaxError('Bad value').message).toBe('Bad value');
    });
});

describe('attachPath', () => {
    test('rebuilds a syntax error with the path', () => {
        const original = createSyntaxError('Unexpected token', {
            span: { start: 3, end: 4, line: 2, col: 4 },
            expected: '":"',
            found: 'x',
        });

        const rebuilt = attachPath(original, 'test.obo');
        expect(isOboException(rebuilt, 'SYNTAX_ERROR')).toBe(true);
        if (!isOboException(rebuilt)) return;
        expect(rebuilt.message).toBe('Unexpected token at test.obo:2:4');
        expect(rebuilt.error.details).toEqual({
            reason: 'Unexpected token',
            expected: '":"',
            found: 'x',
            path: 'test.obo',
        });
    });

    test('passes other errors through', () => {
        const plain = new Error('boom');
        const cardinality = createCardinalityError('name', 'duplicate', 'GO:1');
        expect(attachPath(plain, 'test.obo')).toBe(plain);
        expect(attachPath(cardinality, 'test.obo')).toBe(cardinality);
    });

    test('keeps an existing path', () => {
        const original = createSyntaxError('Unexpected token', { path: 'a.obo' });
        expect(attachPath(original, 'b.obo')).toBe(original);
        expect(attachPath(original, undefined)).toBe(original);
    });
});

describe('createCardinalityError', () => {
    test('describes a duplicate clause of a frame', () => {
        const exception = createCardinalityError('name', 'duplicate', 'GO:0000001');

        expect(exception.error.code).toBe('CARDINALITY_ERROR');
        expect(exception.message).toBe("Invalid cardinality in frame GO:0000001: duplicate 'name' clause");
        expect(exception.error.suggestion).toBe("Keep a single 'name' clause");
        expect(exception.error.details).toEqual({ tag: 'name', kind: 'duplicate', frameId: 'GO:0000001' });
    });

    test('describes a missing header clause', () => {
        const exception = createCardinalityError('default-namespace', 'missing');

        expect(exception.message).toBe(
            "Invalid cardinality in header frame: missing required 'default-namespace' clause"
        );
        expect(exception.error.suggestion).toBeUndefined();
        expect(exception.error.details).toEqual({ tag: 'default-namespace', kind: 'missing' });
    });
});

describe('createIoError', () => {
    test('wraps the cause with the path', () => {
        const exception = createIoError(new Error('boom'), 'test.obo');

        expect(exception.error.code).toBe('IO_ERROR');
        expect(exception.message).toBe('Failed to read test.obo: boom');
        expect(exception.error.details).toEqual({ cause: 'boom', path: 'test.obo' });
    });

    test('accepts non-error causes', () => {
        expect(createIoError('closed').message).toBe('Failed to read input: closed');
    });
});

describe('createInvalidOptionsError', () => {
    test('prefixes the message', () => {
        const exception = createInvalidOptionsError('threads: too small', { issues: ['threads'] });

        expect(exception.error.code).toBe('INVALID_OPTIONS');
        expect(exception.message).toBe('Invalid reader options: threads: too small');
        expect(exception.error.details).toEqual({ issues: ['threads'] });
    });
});
