/**
 * OBO Lexer
 *
 * Runs the compiled grammar from a chosen start rule and converts grammar
 * failures into SYNTAX_ERROR exceptions.
 */

import * as peggy from 'peggy';
import type { Pair, SourceOffsets, StartRule } from '../types/parser.js';
import { createSyntaxError, type OboException } from '../types/errors.js';
import { GRAMMAR, START_RULES } from './grammar.js';

/** A grammar failure as peggy reports it, or as a worker passes it on. */
export interface GrammarFailure {
    message: string;
    found: string | null;
    location: {
        start: { offset: number; line: number; column: number };
        end: { offset: number; line: number; column: number };
    };
}

let compiled: peggy.Parser | undefined;
let compiledSource: string | undefined;

function grammarParser(): peggy.Parser {
    if (!compiled) {
        compiled = peggy.generate(GRAMMAR, {
            allowedStartRules: Object.values(START_RULES),
        });
    }
    return compiled;
}

function isGrammarFailure(error: unknown): error is GrammarFailure {
    return (
        error instanceof Error &&
        error.name === 'SyntaxError' &&
        'location' in error &&
        typeof error.location === 'object' &&
        error.location !== null &&
        'start' in error.location &&
        'found' in error
    );
}

function lineAt(input: string, line: number): string {
    return input.split(/\r?\n/)[line - 1] ?? '';
}

function toSyntaxError(failure: GrammarFailure, input: string, offsets: SourceOffsets): OboException {
    const lineOffset = offsets.line ?? 0;
    const charOffset = offsets.offset ?? 0;
    const { start, end } = failure.location;
    const match = /^Expected (.+) but (.+) found\.$/s.exec(failure.message);

    return createSyntaxError('Syntax error: ' + failure.message.replace(/\.$/, ''), {
        span: {
            start: start.offset + charOffset,
            end: end.offset + charOffset,
            line: start.line + lineOffset,
            col: start.column,
        },
        context: lineAt(input, start.line),
        expected: match ? match[1] : undefined,
        found: failure.found ?? 'end of input',
        path: offsets.path,
    });
}

/**
 * Entry point into the OBO grammar.
 */
export class Lexer {
    /**
     * Parse `input` from the given start rule. The whole input must match.
     * @throws OboException with code SYNTAX_ERROR
     */
    static tokenize(rule: StartRule, input: string, offsets: SourceOffsets = {}): Pair {
        try {
            const pair: Pair = grammarParser().parse(input, Lexer.parseOptions(rule, offsets));
            return pair;
        } catch (error) {
            if (isGrammarFailure(error)) {
                throw toSyntaxError(error, input, offsets);
            }
            throw error;
        }
    }

    /**
     * Parser options that shift positions by `offsets`, for a parser
     * running outside this module.
     */
    static parseOptions(rule: StartRule, offsets: SourceOffsets = {}): { startRule: string; lineOffset: number; charOffset: number } {
        return { startRule: START_RULES[rule], lineOffset: offsets.line ?? 0, charOffset: offsets.offset ?? 0 };
    }

    /**
     * JavaScript source of the compiled grammar: a single expression
     * evaluating to `{ parse, SyntaxError }`.
     */
    static source(): string {
        if (compiledSource === undefined) {
            compiledSource = peggy.generate(GRAMMAR, {
                allowedStartRules: Object.values(START_RULES),
                output: 'source',
                format: 'bare',
            });
        }
        return compiledSource;
    }

    /**
     * Convert a grammar failure reported for `input` into a SYNTAX_ERROR.
     */
    static failure(failure: GrammarFailure, input: string, offsets: SourceOffsets = {}): OboException {
        return toSyntaxError(failure, input, offsets);
    }
}
