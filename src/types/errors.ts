/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for OBO operations
 */
export type OboErrorCode =
  | 'SYNTAX_ERROR'          // Input does not match the grammar, or a value is out of range
  | 'CARDINALITY_ERROR'     // Clause occurs too often or not at all
  | 'IO_ERROR'              // Stream or file failure
  | 'INVALID_OPTIONS';      // Reader options rejected

export type CardinalityKind = 'missing' | 'duplicate' | 'single';

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface OboError {
  code: OboErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending line
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping OboError for throw/catch patterns
 */
export class OboException extends Error {
  public readonly error: OboError;

  constructor(error: OboError) {
    super(error.message);
    this.name = 'OboException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OboException);
    }
  }

  get code(): OboErrorCode {
    return this.error.code;
  }

  toJSON(): OboError {
    return this.error;
  }
}

/**
 * Narrow an unknown thrown value to an OboException.
 */
export function isOboException(value: unknown, code?: OboErrorCode): value is OboException {
  return value instanceof OboException && (code === undefined || value.error.code === code);
}

/**
 * Common OBO syntax mistakes and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\s*def:\s*"(?:[^"\\]|\\.)*"\s*(?:!.*)?$/,
      suggestion: 'A definition needs an xref list after the text, e.g. def: "..." []'
    },
    {
      pattern: /^\s*synonym:\s*"(?:[^"\\]|\\.)*"\s+[A-Z]+(?:\s+[^\s[]+)?\s*$/,
      suggestion: 'A synonym needs an xref list after the scope, e.g. synonym: "..." EXACT []'
    },
    {
      pattern: /^[^"]*"(?:[^"\\]|\\.)*$/,
      suggestion: 'Quoted string is missing its closing \'"\''
    },
    {
      pattern: /^\s*[A-Za-z_-]+\s+\S/,
      suggestion: "Clause tag must be followed by ':'"
    },
    {
      pattern: /^\s*(?:name|comment|remark|created_by):[^\\{]*\{[^}]*$/,
      suggestion: "Escape '{' as '\\{' inside unquoted values"
    },
    {
      pattern: /^\s*\[(?!Term\]|Typedef\]|Instance\])[^\]]*\]/,
      suggestion: 'Frame header must be one of [Term], [Typedef] or [Instance]'
    },
  ];

/**
 * Get a suggestion for a syntax error based on the offending line
 */
export function getSuggestion(line: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(line)) {
      return suggestion;
    }
  }
  return undefined;
}

export interface SyntaxErrorOptions {
  span?: ErrorSpan;
  /** The line the error occurred on. */
  context?: string;
  expected?: string;
  found?: string;
  path?: string;
}

/**
 * Create a syntax error with optional span and suggestion
 */
export function createSyntaxError(
  message: string,
  options: SyntaxErrorOptions = {}
): OboException {
  const { span, context, expected, found, path } = options;
  const details: Record<string, unknown> = {
    reason: message,
    ...(expected !== undefined && { expected }),
    ...(found !== undefined && { found }),
    ...(path !== undefined && { path }),
  };
  let where = '';
  if (span?.line !== undefined) {
    where = path !== undefined
      ? ` at ${path}:${span.line}:${span.col ?? 1}`
      : ` at line ${span.line}, column ${span.col ?? 1}`;
  }

  return new OboException({
    code: 'SYNTAX_ERROR',
    message: `${message}${where}`,
    span,
    suggestion: context !== undefined ? getSuggestion(context) : undefined,
    context,
    details,
  });
}

/**
 * Rebuild a syntax error so that its message names the source file.
 * Other errors, and errors that already carry a path, pass through.
 */
export function attachPath(error: unknown, path: string | undefined): unknown {
  if (path === undefined || !isOboException(error, 'SYNTAX_ERROR')) {
    return error;
  }
  const { span, context, details } = error.error;
  if (details?.path !== undefined) {
    return error;
  }
  const reason = typeof details?.reason === 'string' ? details.reason : error.message;
  const expected = typeof details?.expected === 'string' ? details.expected : undefined;
  const found = typeof details?.found === 'string' ? details.found : undefined;
  return createSyntaxError(reason, { span, context, expected, found, path });
}

/**
 * Create a cardinality error for a clause of a frame
 */
export function createCardinalityError(
  tag: string,
  kind: CardinalityKind,
  frameId?: string,
  span?: ErrorSpan
): OboException {
  const where = frameId !== undefined ? `frame ${frameId}` : 'header frame';
  const problem = {
    missing: `missing required '${tag}' clause`,
    duplicate: `duplicate '${tag}' clause`,
    single: `single '${tag}' clause (expected none or at least two)`,
  }[kind];

  return new OboException({
    code: 'CARDINALITY_ERROR',
    message: `Invalid cardinality in ${where}: ${problem}`,
    span,
    suggestion: kind === 'duplicate' ? `Keep a single '${tag}' clause` : undefined,
    details: { tag, kind, ...(frameId !== undefined && { frameId }) },
  });
}

/**
 * Create an IO error wrapping the underlying failure
 */
export function createIoError(cause: unknown, path?: string): OboException {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new OboException({
    code: 'IO_ERROR',
    message: path !== undefined ? `Failed to read ${path}: ${reason}` : `Failed to read input: ${reason}`,
    details: { cause: reason, ...(path !== undefined && { path }) },
  });
}

/**
 * Create an invalid options error
 */
export function createInvalidOptionsError(
  message: string,
  details?: Record<string, unknown>
): OboException {
  return new OboException({
    code: 'INVALID_OPTIONS',
    message: `Invalid reader options: ${message}`,
    details,
  });
}

/**
 * Serialize an OboError for JSON output
 */
export function serializeOboError(error: OboError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
