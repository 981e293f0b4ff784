import { STATEMENT_COMMANDS } from '../lexer/token-types.js';

/**
 * One statement sliced out of a drawing body
 */
export interface StatementSource {
  /** 0-based position among the statements of the body */
  index: number;
  /** Statement text with comments blanked out, trimmed */
  text: string;
  /** Offset of the first character in the body */
  offset: number;
  line: number;
  column: number;
}

const ENVIRONMENT_PATTERN = /\\(begin|end)\s*\{[^{}]*\}/y;

const COMMAND_PATTERN = /\\[A-Za-z]+/y;

/**
 * Replace `%` comments with spaces so offsets stay aligned with the source
 */
export function maskComments(body: string): string {
  let result = '';
  let inComment = false;

  for (let i = 0; i < body.length; i++) {
    const char = body[i];

    if (inComment) {
      if (char === '\n') {
        inComment = false;
        result += char;
      } else {
        result += char === '\r' ? char : ' ';
      }
      continue;
    }

    if (char === '\\' && i + 1 < body.length) {
      result += char + body[i + 1];
      i++;
      continue;
    }

    if (char === '%') {
      inComment = true;
      result += ' ';
      continue;
    }

    result += char;
  }

  return result;
}

function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

function locate(starts: number[], offset: number): { line: number; column: number } {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (starts[mid] <= offset) low = mid;
    else high = mid - 1;
  }
  return { line: low + 1, column: offset - starts[low] };
}

/**
 * End offset of a `[..]` block starting at `from`, or null when it never closes
 */
function skipOptionBlock(text: string, from: number): number | null {
  let depth = 0;
  for (let i = from; i < text.length; i++) {
    const char = text[i];
    if (char === '\\') {
      i++;
    } else if (char === '[' || char === '{') {
      depth++;
    } else if (char === ']' || char === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return null;
}

/**
 * Match `\begin{name}[opts]` or `\end{name}` at `from`
 */
function matchEnvironment(text: string, from: number): number | null {
  ENVIRONMENT_PATTERN.lastIndex = from;
  const m = ENVIRONMENT_PATTERN.exec(text);
  if (!m) return null;

  let end = from + m[0].length;
  if (m[1] === 'begin') {
    let next = end;
    while (next < text.length && /\s/.test(text[next])) next++;
    if (text[next] === '[') {
      end = skipOptionBlock(text, next) ?? end;
    }
  }
  return end;
}

/**
 * Whether a `;` inside an unclosed region should still end the statement:
 * it is followed by the end of the body or by a statement command.
 */
function endsUnclosedStatement(text: string, from: number): boolean {
  let next = from;
  while (next < text.length && /\s/.test(text[next])) next++;
  if (next >= text.length) return true;

  COMMAND_PATTERN.lastIndex = next;
  const m = COMMAND_PATTERN.exec(text);
  return m !== null && STATEMENT_COMMANDS.has(m[0]);
}

/**
 * Slice a drawing body into statements
 *
 * Statements end at a `;` outside braces and brackets. `\begin{..}` and
 * `\end{..}` stand on their own. Comments are blanked before scanning.
 */
export function scanStatements(body: string): StatementSource[] {
  const text = maskComments(body);
  const starts = lineStarts(text);
  const statements: StatementSource[] = [];
  let start = 0;
  // Open regions; inside text only braces nest
  const regions: Array<'{' | '['> = [];

  const flush = (end: number): void => {
    const raw = text.slice(start, end);
    const content = raw.trim();
    if (content.length > 0) {
      const offset = start + (raw.length - raw.trimStart().length);
      statements.push({ index: statements.length, text: content, offset, ...locate(starts, offset) });
    }
    start = end;
  };

  let i = 0;
  while (i < text.length) {
    const char = text[i];

    if (char === '\\') {
      const environmentEnd = regions.length === 0 ? matchEnvironment(text, i) : null;
      if (environmentEnd !== null) {
        flush(i);
        flush(environmentEnd);
        i = environmentEnd;
        continue;
      }
      i += 2;
      continue;
    }

    const region = regions.at(-1);
    if (char === '{') {
      regions.push('{');
    } else if (char === '[' && region !== '{') {
      regions.push('[');
    } else if ((char === '}' && region === '{') || (char === ']' && region === '[')) {
      regions.pop();
    } else if (char === ';' && (region === undefined || endsUnclosedStatement(text, i + 1))) {
      flush(i + 1);
      regions.length = 0;
    }
    i++;
  }

  flush(text.length);
  return statements;
}

/**
 * Statement texts of a drawing body
 *
 * @example
 * ```ts
 * splitStatements('\\draw (0,0) -- (1,0);\n\\node at (0,0) {a;b};')
 * // => ['\\draw (0,0) -- (1,0);', '\\node at (0,0) {a;b};']
 * ```
 */
export function splitStatements(body: string): string[] {
  return scanStatements(body).map((statement) => statement.text);
}
