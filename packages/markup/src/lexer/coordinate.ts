import { optionString, parseOptions, splitTopLevel } from '../options/options.js';
import type { CoordinateSpec, Length, LengthUnit, Shift } from './token.js';

const LENGTH_PATTERN = /^([+-]?(?:\d+(?:\.\d*)?|\.\d+))\s*(cm|mm|pt|in|bp)?$/;

const NAME_PATTERN = /^[^,:()$[\]{}]+$/;

const LENGTH_UNITS: readonly LengthUnit[] = ['cm', 'mm', 'pt', 'in', 'bp'];

function toUnit(text: string | undefined): LengthUnit | null {
  return LENGTH_UNITS.find((unit) => unit === text) ?? null;
}

/**
 * Parse a TeX length such as `1.5`, `-2cm` or `4pt`
 */
export function parseLength(text: string): Length | null {
  const m = LENGTH_PATTERN.exec(text.trim());
  if (!m) return null;
  return { value: Number.parseFloat(m[1]), unit: toUnit(m[2]) };
}

/**
 * Find a top-level `-|` or `|-` outside brackets
 */
function findPerpendicular(content: string): { index: number; operator: '-|' | '|-' } | null {
  let depth = 0;
  for (let i = 0; i < content.length - 1; i++) {
    const char = content[i];
    if (char === '[' || char === '(' || char === '{') depth++;
    else if (char === ']' || char === ')' || char === '}') depth--;
    else if (depth === 0) {
      const pair = content.slice(i, i + 2);
      if (pair === '-|' || pair === '|-') {
        return { index: i, operator: pair };
      }
    }
  }
  return null;
}

function parseShift(content: string): Shift | null {
  const options = parseOptions(content);
  const xText = optionString(options, 'xshift');
  const yText = optionString(options, 'yshift');
  const x = xText === null ? null : parseLength(xText);
  const y = yText === null ? null : parseLength(yText);

  if ((xText !== null && x === null) || (yText !== null && y === null)) {
    return null;
  }
  return { x, y };
}

function parseNamed(content: string, shift: Shift | null): CoordinateSpec {
  if (!NAME_PATTERN.test(content) || parseLength(content) !== null) {
    return { kind: 'unsupported', text: content };
  }

  const dot = content.indexOf('.');
  if (dot === -1) {
    return { kind: 'named', name: content.trim(), anchor: null, shift };
  }

  return {
    kind: 'named',
    name: content.slice(0, dot).trim(),
    anchor: content.slice(dot + 1).trim(),
    shift,
  };
}

/**
 * Parse the text between the parentheses of a coordinate
 *
 * @example
 * ```ts
 * parseCoordinate('1, 2cm')       // absolute
 * parseCoordinate('30:2')         // polar
 * parseCoordinate('X1.north east') // named, anchor 'north east'
 * parseCoordinate('A -| B')       // perpendicular
 * ```
 */
export function parseCoordinate(text: string): CoordinateSpec {
  const content = text.trim();

  if (content.startsWith('$')) {
    return { kind: 'unsupported', text: content };
  }

  const perpendicular = findPerpendicular(content);
  if (perpendicular) {
    const first = parseCoordinate(content.slice(0, perpendicular.index));
    const second = parseCoordinate(content.slice(perpendicular.index + 2));
    if (first.kind === 'unsupported' || second.kind === 'unsupported') {
      return { kind: 'unsupported', text: content };
    }
    return { kind: 'perpendicular', operator: perpendicular.operator, first, second };
  }

  if (content.startsWith('[')) {
    const close = content.indexOf(']');
    const shift = close === -1 ? null : parseShift(content.slice(1, close));
    if (shift === null) {
      return { kind: 'unsupported', text: content };
    }
    return parseNamed(content.slice(close + 1).trim(), shift);
  }

  const parts = splitTopLevel(content, ',');
  if (parts.length === 2) {
    const x = parseLength(parts[0]);
    const y = parseLength(parts[1]);
    if (x && y) {
      return { kind: 'absolute', x, y };
    }
    return { kind: 'unsupported', text: content };
  }

  const polar = content.split(':');
  if (polar.length === 2) {
    const angle = parseLength(polar[0]);
    const radius = parseLength(polar[1]);
    if (angle && angle.unit === null && radius) {
      return { kind: 'polar', angle: angle.value, radius };
    }
    return { kind: 'unsupported', text: content };
  }

  return parseNamed(content, null);
}
