import type { SourcePosition } from '../lexer/token.js';

/**
 * Diagnostic severity levels
 */
export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'lex-error'
  | 'unrecognized-statement'
  | 'build-error'
  | 'unresolved-reference'
  | 'structural-error'
  | 'duplicate-name'
  | 'missing-environment';

/**
 * A diagnostic message returned alongside the converted document
 */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  /** 0-based index of the statement in the drawing body */
  statementIndex: number;
  /** 0-based character offset into the drawing body */
  offset: number;
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  message: string;
}

export const DIAGNOSTIC_SEVERITY: Record<DiagnosticCode, DiagnosticSeverity> = {
  'lex-error': 'error',
  'unrecognized-statement': 'warning',
  'build-error': 'error',
  'unresolved-reference': 'error',
  'structural-error': 'error',
  'duplicate-name': 'warning',
  'missing-environment': 'error',
};

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  statementIndex: number,
  position: SourcePosition,
): Diagnostic {
  return {
    code,
    severity: DIAGNOSTIC_SEVERITY[code],
    statementIndex,
    offset: position.offset,
    line: position.line,
    column: position.column,
    message,
  };
}
