/**
 * Error types for markup conversion
 *
 * Every error carries the source position it refers to. None of them aborts a
 * document: the pipeline turns each into a diagnostic and moves on.
 */

import type { SourcePosition } from './lexer/token.js';
import type { DiagnosticCode } from './types/diagnostics.js';

/**
 * Base class for conversion errors
 */
export abstract class ConversionError extends Error {
  abstract readonly code: DiagnosticCode;
  /** Position where the error occurred */
  readonly position: SourcePosition;
  /** Message without the position suffix */
  readonly reason: string;

  constructor(message: string, position: SourcePosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = this.constructor.name;
    this.position = position;
    this.reason = message;
  }
}

/**
 * Thrown when a statement's delimiters do not balance
 */
export class LexError extends ConversionError {
  readonly code = 'lex-error';
}

/**
 * Raised when no classification rule accepts a statement
 */
export class ClassificationError extends ConversionError {
  readonly code = 'unrecognized-statement';
}

/**
 * Thrown when a classified statement cannot be turned into elements
 */
export class BuildError extends ConversionError {
  readonly code = 'build-error';
}

/**
 * Raised when a named coordinate is not defined in any visible scope
 */
export class UnresolvedReferenceError extends ConversionError {
  readonly code = 'unresolved-reference';
  readonly names: string[];

  constructor(names: string[], position: SourcePosition) {
    const list = names.map((name) => `'${name}'`).join(', ');
    super(`Unresolved coordinate reference ${list}`, position);
    this.names = names;
  }
}

/**
 * Raised for mismatched group open/close statements
 */
export class StructuralError extends ConversionError {
  readonly code = 'structural-error';
}
