import type { BlockKind } from './model.js';

/**
 * Structured failures and diagnostics for the Quarto cell transformer.
 *
 * Every failure aborts the whole document: callers either get complete output
 * or a `TransformError`, never a truncated conversion.
 */
export type TransformErrorCode =
  | 'UNTERMINATED_BLOCK'
  | 'UNMAPPABLE_OUTPUT_ATTRIBUTES'
  | 'ESCAPED_FENCE'
  | 'UNPROCESSED_SYNTAX'
  | 'NESTING_TOO_DEEP'
  | 'UNSUPPORTED_BLOCK_KIND';

export interface TransformErrorDetails {
  kind?: BlockKind;
  delimiter?: string;
  attributes?: string[];
  /** Offending lines, prefixed with their index (`"12: ::: {.cell ...}"`). */
  context?: string[];
}

export class TransformError extends Error {
  readonly code: TransformErrorCode;
  /** 0-based line in the input document, when the failure has one. */
  readonly line?: number;
  readonly details: TransformErrorDetails;

  constructor(
    code: TransformErrorCode,
    message: string,
    line?: number,
    details: TransformErrorDetails = {}
  ) {
    super(message);
    Object.setPrototypeOf(this, TransformError.prototype);
    this.name = 'TransformError';
    this.code = code;
    this.line = line;
    this.details = details;
  }
}

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: string;
  message: string;
  line?: number; // 0-based
}

export function errorDiagnostic(code: string, message: string, line?: number): Diagnostic {
  return { severity: 'error', code, message, line };
}

export function warningDiagnostic(code: string, message: string, line?: number): Diagnostic {
  return { severity: 'warning', code, message, line };
}

/**
 * Convert a thrown value into an error diagnostic.
 *
 * Anything that is not a `TransformError` is a bug in the transformer, not in
 * the document, so it is rethrown.
 */
export function toDiagnostic(error: unknown): Diagnostic {
  if (!(error instanceof TransformError)) throw error;
  const context = error.details.context;
  const message =
    context && context.length > 0 ? `${error.message}\n${context.join('\n')}` : error.message;
  return errorDiagnostic(error.code, message, error.line);
}
