import { parseLength } from '../lexer/coordinate.js';
import { parseColor } from '../options/label.js';
import { hasFlag, type OptionSet, optionString } from '../options/options.js';
import type { Fill, Scale, Size, Stroke, TerminalShape } from '../types/elements.js';
import { toCentimeters } from './point.js';

export const ARROW_ALIASES: Readonly<Record<string, string>> = {
  stealth: 'stealth',
  'stealth reversed': 'stealthR',
  latex: 'latex',
  'latex reversed': 'latexR',
  to: 'to',
  'to reversed': 'toR',
  '|': 'line',
};

/** Dash patterns at line width 1pt, keyed by their TikZ spelling */
export const LINE_ALIASES: Readonly<Record<string, string>> = {
  'on 1pt off 4pt': 'dotted',
  'on 1pt off 2pt': 'denselydotted',
  'on 1pt off 8pt': 'looselydotted',
  'on 4pt off 4pt': 'dashed',
  'on 4pt off 2pt': 'denselydashed',
  'on 4pt off 8pt': 'looselydashed',
  'on 4pt off 2pt on 1pt off 2pt': 'dashdot',
  'on 4pt off 1pt on 1pt off 1pt': 'denselydashdot',
  'on 4pt off 4pt on 1pt off 4pt': 'looselydashdot',
  'on 4pt off 2pt on 1pt off 2pt on 1pt off 2pt': 'dashdotdot',
  'on 4pt off 1pt on 1pt off 1pt on 1pt off 1pt': 'denselydashdotdot',
  'on 4pt off 4pt on 1pt off 4pt on 1pt off 4pt': 'looselydashdotdot',
};

const LINE_STYLES: ReadonlySet<string> = new Set(Object.values(LINE_ALIASES));

const ARROW_PATTERN = /^([^-]*)-([^-]*)$/;

const TERMINAL_PATTERN = /^([*o]?)-([*o]?)$/;

const TERMINAL_SHAPES: Readonly<Record<string, TerminalShape>> = {
  '*': 'circ',
  o: 'ocirc',
};

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function parseNumber(options: OptionSet, key: string): number | null {
  const text = optionString(options, key);
  return text !== null && NUMBER_PATTERN.test(text.trim()) ? Number.parseFloat(text) : null;
}

/**
 * Express a dash pattern at line width 1pt
 *
 * @example
 * ```ts
 * normalizeDashPattern('on 2.8pt off 0.7pt', 0.7) // => 'on 4pt off 1pt'
 * ```
 */
export function normalizeDashPattern(pattern: string, lineWidth: number): string {
  return pattern
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/(\d+(?:\.\d*)?)pt/g, (_, value: string) => `${Math.round(Number.parseFloat(value) / lineWidth)}pt`);
}

function colorOf(value: string | null): string | null {
  return value === null ? null : parseColor(value);
}

/**
 * Stroke settings; `implied` when the command draws without a `draw` option
 */
export function strokeOf(options: OptionSet, implied: boolean): Stroke | undefined {
  if (!implied && !('draw' in options)) {
    return undefined;
  }

  const stroke: Stroke = {};

  const width = optionString(options, 'line width');
  const widthLength = width === null ? null : parseLength(width);
  if (width !== null) {
    stroke.width = width;
  }

  const opacity = optionString(options, 'draw opacity');
  if (opacity !== null) {
    stroke.opacity = opacity;
  }

  const dashPattern = optionString(options, 'dash pattern');
  if (dashPattern !== null) {
    const lineWidth = widthLength !== null && widthLength.value > 0 ? widthLength.value : 1;
    const style = LINE_ALIASES[normalizeDashPattern(dashPattern, lineWidth)];
    if (style !== undefined) {
      stroke.style = style;
    }
  } else {
    // Named styles such as `densely dashed`
    const named = Object.keys(options).find(
      (key) => options[key] === true && LINE_STYLES.has(key.replace(/\s+/g, '')),
    );
    if (named !== undefined) {
      stroke.style = named.replace(/\s+/g, '');
    }
  }

  const color = colorOf(optionString(options, 'draw'));
  if (color !== null) {
    stroke.color = color;
  }

  return stroke;
}

export function fillOf(options: OptionSet, implied: boolean): Fill | undefined {
  if (!implied && !('fill' in options)) {
    return undefined;
  }

  const fill: Fill = {};

  const opacity = optionString(options, 'fill opacity');
  if (opacity !== null) {
    fill.opacity = opacity;
  }

  const color = colorOf(optionString(options, 'fill'));
  if (color !== null) {
    fill.color = color;
  }

  return fill;
}

/**
 * Arrow tips from a flag such as `stealth-latex` or `-stealth`
 */
export function arrowsOf(options: OptionSet): { startArrow?: string; endArrow?: string } {
  for (const [key, value] of Object.entries(options)) {
    if (value !== true || TERMINAL_PATTERN.test(key)) continue;
    const m = ARROW_PATTERN.exec(key);
    if (!m) continue;

    const arrows: { startArrow?: string; endArrow?: string } = {};
    const start = ARROW_ALIASES[m[1].trim()];
    const end = ARROW_ALIASES[m[2].trim()];
    if (start !== undefined) arrows.startArrow = start;
    if (end !== undefined) arrows.endArrow = end;
    return arrows;
  }
  return {};
}

/**
 * Pole shapes from a marker flag such as `*-o` or `-*`
 */
export function terminalsOf(options: OptionSet): { startTerminal?: TerminalShape; endTerminal?: TerminalShape } {
  for (const [key, value] of Object.entries(options)) {
    if (value !== true) continue;
    const m = TERMINAL_PATTERN.exec(key);
    if (!m) continue;

    const terminals: { startTerminal?: TerminalShape; endTerminal?: TerminalShape } = {};
    const start = TERMINAL_SHAPES[m[1]];
    const end = TERMINAL_SHAPES[m[2]];
    if (start !== undefined) terminals.startTerminal = start;
    if (end !== undefined) terminals.endTerminal = end;
    return terminals;
  }
  return {};
}

export function shapeOf(options: OptionSet): string | undefined {
  const shape = optionString(options, 'shape') ?? ['rectangle', 'circle', 'ellipse'].find((flag) => hasFlag(options, flag));
  switch (shape?.trim()) {
    case 'rectangle':
      return 'rect';
    case 'circle':
    case 'ellipse':
      return 'ellipse';
    default:
      return undefined;
  }
}

/**
 * Shape size in centimetres from `minimum width` and `minimum height`
 */
export function sizeOf(options: OptionSet): Size | undefined {
  const widthText = optionString(options, 'minimum width');
  const width = widthText === null ? null : parseLength(widthText);
  if (width === null) {
    return undefined;
  }

  const heightText = optionString(options, 'minimum height');
  const height = heightText === null ? null : parseLength(heightText);

  const x = Math.max(0, toCentimeters(width));
  return { x, y: height === null ? x : Math.max(0, toCentimeters(height)) };
}

/**
 * Rotation and scale from `rotate`, `xscale` and `yscale`
 *
 * A lone `xscale` flips the part and turns it half a revolution; a lone
 * `yscale` mirrors it. Explicit rotations are kept as given.
 */
export function transformOf(options: OptionSet): { rotation?: number; scale?: Scale } {
  const xscale = parseNumber(options, 'xscale');
  const yscale = parseNumber(options, 'yscale');
  const rotate = parseNumber(options, 'rotate');

  if (xscale !== null && yscale !== null && rotate !== null) {
    return { rotation: rotate, scale: { x: xscale, y: yscale } };
  }
  if (xscale !== null && yscale === null && rotate === null) {
    return { rotation: -180, scale: { x: -xscale, y: -xscale } };
  }
  if (xscale === null && yscale !== null && rotate === null) {
    return { scale: { x: -yscale, y: yscale } };
  }
  if (rotate !== null) {
    return { rotation: rotate };
  }
  if (xscale !== null && yscale !== null) {
    return { scale: { x: xscale, y: yscale } };
  }
  return {};
}

/**
 * Scale from the `mirror` and `invert` flags of a component
 */
export function mirrorOf(options: OptionSet): Scale | undefined {
  const mirror = hasFlag(options, 'mirror');
  const invert = hasFlag(options, 'invert');
  if (!mirror && !invert) {
    return undefined;
  }
  return { x: mirror ? -1 : 1, y: invert ? -1 : 1 };
}
