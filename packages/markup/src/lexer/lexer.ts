import { parseOptions } from '../options/options.js';
import { parseCoordinate } from './coordinate.js';
import { LexError } from '../errors.js';
import type { CoordinateSpec, SourcePosition, Token } from './token.js';
import { PathOperator, TokenType } from './token-types.js';

type RegionOpener = '(' | '[' | '{';

const CLOSERS: Record<RegionOpener, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
};

const REGION_NAMES: Record<RegionOpener, string> = {
  '(': 'coordinate',
  '[': 'option block',
  '{': 'text',
};

/**
 * Delimiters that nest inside each kind of region. Braces nest everywhere;
 * inside text, brackets and parentheses are plain characters.
 */
const NESTED: Record<RegionOpener, string> = {
  '(': '()[]{}',
  '[': '[]{}',
  '{': '{}',
};

const WORD_BREAKS = ' \t\r\n;[]{}()';

export interface LexerOptions {
  /** Longest statement accepted, in characters */
  maxStatementLength?: number;
}

/**
 * Lexer for one drawing statement
 *
 * Regions (`[..]`, `{..}`, `(..)`) are scanned with a stack of nesting
 * markers and come out as single tokens; everything else is keywords, path
 * operators and the closing delimiter.
 */
export class Lexer {
  private input: string = '';
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;
  private base: SourcePosition = { line: 1, column: 0, offset: 0 };
  private readonly maxStatementLength: number;

  constructor(options: LexerOptions = {}) {
    this.maxStatementLength = options.maxStatementLength ?? Infinity;
  }

  /**
   * Tokenize one statement
   *
   * @param input - Statement text, usually ending in `;`
   * @param start - Position of the statement's first character in the drawing body
   * @throws {LexError} On unbalanced delimiters or unterminated text/math
   */
  tokenize(input: string, start: SourcePosition = { line: 1, column: 0, offset: 0 }): Token[] {
    this.input = input;
    this.position = 0;
    this.line = start.line;
    this.column = start.column;
    this.base = start;

    if (input.length > this.maxStatementLength) {
      this.error(`Statement exceeds maximum length of ${this.maxStatementLength} characters`, start);
    }

    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.base.offset + this.position,
    };
  }

  private lexeme(start: SourcePosition): string {
    return this.input.slice(start.offset - this.base.offset, this.position);
  }

  private error(message: string, position: SourcePosition = this.currentPosition()): never {
    throw new LexError(message, position);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const start = this.currentPosition();
    const char = this.peek();

    switch (char) {
      case ';':
        this.advance();
        return { type: TokenType.DELIMITER, value: char, loc: { start, end: this.currentPosition() } };
      case '[':
        return this.optionBlock(start);
      case '{':
        return this.text(start);
      case '(':
        return this.coordinate(start, null);
      case ']':
      case '}':
      case ')':
        return this.error(`Unbalanced '${char}'`);
      case '\\':
        return this.command(start);
      case '+':
        return this.relativeCoordinate(start);
      case '-':
        if (this.peekNext() === '-') return this.pathOp(start, PathOperator.LINE);
        if (this.peekNext() === '|') return this.pathOp(start, PathOperator.HORIZONTAL_VERTICAL);
        return this.word(start);
      case '|':
        if (this.peekNext() === '-') return this.pathOp(start, PathOperator.VERTICAL_HORIZONTAL);
        return this.word(start);
      default:
        return this.word(start);
    }
  }

  /**
   * Scan a delimited region and return its inner text, consuming the closer
   */
  private region(opener: RegionOpener, start: SourcePosition): string {
    const stack: string[] = [opener];
    let inMath = false;

    this.advance(); // consume opener
    const contentStart = this.position;

    while (!this.isAtEnd()) {
      const char = this.peek();

      if (char === '\\') {
        this.advance();
        if (!this.isAtEnd()) this.advance();
        continue;
      }

      if (char === '$') {
        inMath = !inMath;
        this.advance();
        continue;
      }

      const top = stack[stack.length - 1];
      const nested = inMath ? '{}' : NESTED[this.regionOf(top)];

      if (nested.includes(char)) {
        if (char === '(' || char === '[' || char === '{') {
          stack.push(char);
        } else {
          if (CLOSERS[this.regionOf(top)] !== char) {
            this.error(`Mismatched '${char}' in ${REGION_NAMES[opener]}`);
          }
          stack.pop();
          if (stack.length === 0) {
            if (inMath) {
              this.error('Unterminated math region', start);
            }
            const content = this.input.slice(contentStart, this.position);
            this.advance(); // consume closer
            return content;
          }
        }
      }

      this.advance();
    }

    if (inMath) {
      this.error('Unterminated math region', start);
    }
    return this.error(`Unterminated ${REGION_NAMES[opener]}`, start);
  }

  private regionOf(marker: string): RegionOpener {
    if (marker === '(' || marker === '[') return marker;
    return '{';
  }

  private optionBlock(start: SourcePosition): Token {
    const content = this.region('[', start);
    return {
      type: TokenType.OPTION_BLOCK,
      value: this.lexeme(start),
      content,
      options: parseOptions(content),
      loc: { start, end: this.currentPosition() },
    };
  }

  private text(start: SourcePosition): Token {
    const text = this.region('{', start);
    return {
      type: TokenType.TEXT,
      value: this.lexeme(start),
      text,
      loc: { start, end: this.currentPosition() },
    };
  }

  private coordinate(start: SourcePosition, relative: 'offset' | 'incremental' | null): Token {
    const content = this.region('(', start);
    let coordinate: CoordinateSpec = parseCoordinate(content);

    if (relative !== null) {
      coordinate =
        coordinate.kind === 'absolute' || coordinate.kind === 'polar'
          ? { kind: 'relative', incremental: relative === 'incremental', offset: coordinate }
          : { kind: 'unsupported', text: this.lexeme(start) };
    }

    return {
      type: TokenType.COORDINATE,
      value: this.lexeme(start),
      coordinate,
      loc: { start, end: this.currentPosition() },
    };
  }

  private relativeCoordinate(start: SourcePosition): Token {
    this.advance(); // consume '+'
    const relative = this.peek() === '+' ? 'incremental' : 'offset';
    if (relative === 'incremental') {
      this.advance();
    }

    this.skipWhitespace();
    if (this.peek() !== '(') {
      return this.word(start);
    }
    return this.coordinate(start, relative);
  }

  private pathOp(start: SourcePosition, operator: PathOperator): Token {
    this.advance();
    this.advance();
    return {
      type: TokenType.PATH_OP,
      value: operator,
      operator,
      loc: { start, end: this.currentPosition() },
    };
  }

  /**
   * `\draw`, `\node`, `\begin{scope}`, ...
   */
  private command(start: SourcePosition): Token {
    this.advance(); // consume backslash

    if (!this.isLetter(this.peek())) {
      // Control symbols such as \\ or \, are not commands of the dialect
      if (!this.isAtEnd()) this.advance();
      return this.keyword(start, this.lexeme(start), null);
    }

    while (this.isLetter(this.peek())) {
      this.advance();
    }
    const keyword = this.lexeme(start);

    if (keyword !== '\\begin' && keyword !== '\\end') {
      return this.keyword(start, keyword, null);
    }

    this.skipWhitespace();
    if (this.peek() !== '{') {
      return this.keyword(start, keyword, null);
    }

    const environment = this.region('{', this.currentPosition()).trim();
    return this.keyword(start, keyword, environment);
  }

  /**
   * Bare words (`node`, `at`, `cycle`) and any other run of characters
   */
  private word(start: SourcePosition): Token {
    if (this.isLetter(this.peek())) {
      while (this.isWordChar(this.peek())) {
        this.advance();
      }
    } else {
      while (!this.isAtEnd() && !WORD_BREAKS.includes(this.peek())) {
        this.advance();
      }
    }

    const value = this.lexeme(start);
    if (value === 'to') {
      return {
        type: TokenType.PATH_OP,
        value,
        operator: PathOperator.TO,
        loc: { start, end: this.currentPosition() },
      };
    }
    return this.keyword(start, value, null);
  }

  private keyword(start: SourcePosition, keyword: string, environment: string | null): Token {
    return {
      type: TokenType.KEYWORD,
      value: this.lexeme(start),
      keyword,
      environment,
      loc: { start, end: this.currentPosition() },
    };
  }

  private isLetter(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private isWordChar(char: string): boolean {
    return this.isLetter(char) || (char >= '0' && char <= '9') || char === '_' || char === '@';
  }
}
