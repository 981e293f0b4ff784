import { BuildError } from '../errors.js';
import type { CoordinateSpec, Length, SourcePosition } from '../lexer/token.js';
import type { Point } from '../types/elements.js';

/**
 * A point whose value may depend on names defined anywhere in the document.
 * All lengths are in centimetres.
 */
export type PointExpr =
  | { kind: 'absolute'; x: number; y: number }
  | { kind: 'named'; name: string; dx: number; dy: number }
  | { kind: 'offset'; base: PointExpr; dx: number; dy: number }
  | { kind: 'midpoint'; first: PointExpr; second: PointExpr }
  | { kind: 'perpendicular'; operator: '-|' | '|-'; first: PointExpr; second: PointExpr };

const CM_PER_UNIT = {
  cm: 1,
  mm: 0.1,
  pt: 2.54 / 72.27,
  in: 2.54,
  bp: 2.54 / 72,
} as const;

/**
 * Convert a length to centimetres; unitless lengths are already in cm
 */
export function toCentimeters(length: Length): number {
  return length.unit === null ? length.value : length.value * CM_PER_UNIT[length.unit];
}

export const ORIGIN: PointExpr = { kind: 'absolute', x: 0, y: 0 };

function offsetOf(spec: CoordinateSpec, position: SourcePosition): { dx: number; dy: number } {
  switch (spec.kind) {
    case 'absolute':
      return { dx: toCentimeters(spec.x), dy: toCentimeters(spec.y) };
    case 'polar': {
      const radius = toCentimeters(spec.radius);
      const radians = (spec.angle * Math.PI) / 180;
      return { dx: radius * Math.cos(radians), dy: radius * Math.sin(radians) };
    }
    default:
      throw new BuildError('Relative coordinate must be a numeric offset', position);
  }
}

/**
 * Turn a parsed coordinate into a point expression
 *
 * @param previous - The preceding point of the statement, for relative coordinates
 * @throws {BuildError} For unsupported coordinates and relative ones without a preceding point
 */
export function toPointExpr(
  spec: CoordinateSpec,
  previous: PointExpr | null,
  position: SourcePosition,
): PointExpr {
  switch (spec.kind) {
    case 'absolute':
    case 'polar': {
      const { dx, dy } = offsetOf(spec, position);
      return { kind: 'absolute', x: dx, y: dy };
    }
    case 'named': {
      const dx = spec.shift?.x ? toCentimeters(spec.shift.x) : 0;
      const dy = spec.shift?.y ? toCentimeters(spec.shift.y) : 0;
      return { kind: 'named', name: spec.name, dx, dy };
    }
    case 'perpendicular':
      return {
        kind: 'perpendicular',
        operator: spec.operator,
        first: toPointExpr(spec.first, previous, position),
        second: toPointExpr(spec.second, previous, position),
      };
    case 'relative': {
      if (previous === null) {
        throw new BuildError('Relative coordinate has no preceding point', position);
      }
      const { dx, dy } = offsetOf(spec.offset, position);
      return offsetPoint(previous, dx, dy);
    }
    case 'unsupported':
      throw new BuildError(`Unsupported coordinate '(${spec.text})'`, position);
  }
}

/**
 * Offset a point, folding constant parts
 */
export function offsetPoint(base: PointExpr, dx: number, dy: number): PointExpr {
  if (base.kind === 'absolute') {
    return { kind: 'absolute', x: base.x + dx, y: base.y + dy };
  }
  if (base.kind === 'offset') {
    return { kind: 'offset', base: base.base, dx: base.dx + dx, dy: base.dy + dy };
  }
  return { kind: 'offset', base, dx, dy };
}

export function midpoint(first: PointExpr, second: PointExpr): PointExpr {
  if (first.kind === 'absolute' && second.kind === 'absolute') {
    return { kind: 'absolute', x: (first.x + second.x) / 2, y: (first.y + second.y) / 2 };
  }
  return { kind: 'midpoint', first, second };
}

/**
 * Combine two resolved points for `(a -| b)` and `(a |- b)`
 */
export function perpendicularPoint(operator: '-|' | '|-', first: Point, second: Point): Point {
  return operator === '-|' ? { x: second.x, y: first.y } : { x: first.x, y: second.y };
}
