import { maskComments } from './splitter/splitter.js';

export const DRAWING_ENVIRONMENTS: readonly string[] = ['circuitikz', 'tikzpicture'];

/**
 * The body of one drawing environment in a source file
 */
export interface DrawingEnvironment {
  /** `circuitikz` or `tikzpicture` */
  name: string;
  /** Text between the opening (with its options) and the closing marker */
  body: string;
  /** Offset of the body in the source */
  offset: number;
  /** Line and column of the body start */
  line: number;
  column: number;
}

const BEGIN_PATTERN = /\\begin\s*\{(circuitikz|tikzpicture)\}/g;

function positionOf(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset);
  const lineStart = before.lastIndexOf('\n') + 1;
  return { line: before.split('\n').length, column: offset - lineStart };
}

/**
 * Skip an environment's `[..]` options, returning the offset after them
 */
function skipEnvironmentOptions(text: string, from: number): number {
  let next = from;
  while (next < text.length && (text[next] === ' ' || text[next] === '\t')) next++;
  if (text[next] !== '[') return from;

  let depth = 0;
  for (let i = next; i < text.length; i++) {
    const char = text[i];
    if (char === '[' || char === '{') depth++;
    else if (char === ']' || char === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return from;
}

/**
 * Find the drawing environments of a source file, outermost only
 *
 * @example
 * ```ts
 * extractDrawingEnvironments('\\begin{circuitikz}[scale=2]\n\\draw (0,0) -- (1,0);\n\\end{circuitikz}')
 * // => [{ name: 'circuitikz', body: '\n\\draw (0,0) -- (1,0);\n', offset: 27, line: 1, column: 27 }]
 * ```
 */
export function extractDrawingEnvironments(source: string): DrawingEnvironment[] {
  const text = maskComments(source);
  const environments: DrawingEnvironment[] = [];

  BEGIN_PATTERN.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = BEGIN_PATTERN.exec(text)) !== null) {
    const name = m[1];
    const bodyStart = skipEnvironmentOptions(text, m.index + m[0].length);
    const endPattern = new RegExp(`\\\\end\\s*\\{${name}\\}`, 'g');
    endPattern.lastIndex = bodyStart;
    const end = endPattern.exec(text);
    if (end === null) break;

    environments.push({
      name,
      body: source.slice(bodyStart, end.index),
      offset: bodyStart,
      ...positionOf(source, bodyStart),
    });
    BEGIN_PATTERN.lastIndex = end.index + end[0].length;
  }

  return environments;
}
