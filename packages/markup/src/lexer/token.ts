import type { OptionSet } from '../options/options.js';
import type { PathOperator, TokenType } from './token-types.js';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 0-based column number */
  column: number;
  /** 0-based character offset from start of the drawing body */
  offset: number;
}

/**
 * Source location spanning start to end positions
 */
export interface SourceLocation {
  start: SourcePosition;
  end: SourcePosition;
}

/** A length with its unit as written, e.g. `1.5cm` */
export interface Length {
  value: number;
  unit: LengthUnit | null;
}

export type LengthUnit = 'cm' | 'mm' | 'pt' | 'in' | 'bp';

export interface Shift {
  x: Length | null;
  y: Length | null;
}

/**
 * Parsed content of a parenthesized coordinate
 */
export type CoordinateSpec =
  | { kind: 'absolute'; x: Length; y: Length }
  | { kind: 'polar'; angle: number; radius: Length }
  | { kind: 'named'; name: string; anchor: string | null; shift: Shift | null }
  | {
      kind: 'perpendicular';
      operator: '-|' | '|-';
      first: CoordinateSpec;
      second: CoordinateSpec;
    }
  | {
      kind: 'relative';
      /** `++` moves the current point, `+` does not; both resolve against the previous point */
      incremental: boolean;
      offset: CoordinateSpec;
    }
  | { kind: 'unsupported'; text: string };

interface BaseToken {
  /** The raw lexeme from the source */
  value: string;
  /** Source location for error reporting */
  loc: SourceLocation;
}

export interface KeywordToken extends BaseToken {
  type: typeof TokenType.KEYWORD;
  /** `\draw`, `\node`, `node`, `at`, ... */
  keyword: string;
  /** Environment name for `\begin{..}` and `\end{..}` */
  environment: string | null;
}

export interface CoordinateToken extends BaseToken {
  type: typeof TokenType.COORDINATE;
  coordinate: CoordinateSpec;
}

export interface OptionBlockToken extends BaseToken {
  type: typeof TokenType.OPTION_BLOCK;
  /** Text between the brackets */
  content: string;
  options: OptionSet;
}

export interface TextToken extends BaseToken {
  type: typeof TokenType.TEXT;
  /** Text between the braces, verbatim */
  text: string;
}

export interface PathOpToken extends BaseToken {
  type: typeof TokenType.PATH_OP;
  operator: PathOperator;
}

export interface DelimiterToken extends BaseToken {
  type: typeof TokenType.DELIMITER;
}

/**
 * A token produced by the lexer
 */
export type Token =
  | KeywordToken
  | CoordinateToken
  | OptionBlockToken
  | TextToken
  | PathOpToken
  | DelimiterToken;
