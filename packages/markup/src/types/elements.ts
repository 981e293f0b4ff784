import type { OptionSet } from '../options/options.js';

/**
 * A resolved point in document units
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Free-form text attached to an element
 */
export interface Label {
  /** Normalised text: line breaks collapsed, font size and colour lifted out */
  text: string;
  /** Verbatim source text */
  raw: string;
  fontSize?: string;
  color?: string;
  /** Label placed on the other side of a component (`l_`) */
  otherSide?: boolean;
}

export interface Stroke {
  width?: string;
  opacity?: string;
  style?: string;
  color?: string;
}

export interface Fill {
  opacity?: string;
  color?: string;
}

export interface Scale {
  x: number;
  y: number;
}

export interface Size {
  x: number;
  y: number;
}

/** Wire segment routing, as drawn by the editor */
export type Direction = '--' | '-|' | '|-';

export type TerminalShape = 'circ' | 'ocirc';

/**
 * A `node[..] at (..) {..}` clause chained onto a node statement
 */
export interface Annotation<P = Point> {
  position: P;
  options: OptionSet;
  name?: string;
  label?: Label;
}

/**
 * An inline node on a path, attached to the nearest preceding point
 */
export interface PointLabel<P = Point> {
  /** Index into the path points */
  point: number;
  /** Explicit `at` position, when given */
  position?: P;
  options: OptionSet;
  name?: string;
  label?: Label;
}

export interface ComponentStyle {
  rotation: number;
  scale?: Scale;
  startTerminal?: TerminalShape;
  endTerminal?: TerminalShape;
}

/**
 * A `to[<component>]` segment inside a multi-segment wire
 */
export interface InlineComponent<P = Point> extends ComponentStyle {
  componentType: string;
  /** Index of the segment the component sits on */
  segment: number;
  terminals: P[];
  options: OptionSet;
  name?: string;
  qualifiedName?: string;
  label?: Label;
  annotation?: Label;
}

export interface NodeElement<P = Point> {
  type: 'node';
  name?: string;
  qualifiedName?: string;
  position: P;
  options: OptionSet;
  shape?: string;
  size?: Size;
  stroke?: Stroke;
  fill?: Fill;
  rotation?: number;
  scale?: Scale;
  label?: Label;
  annotations: Annotation<P>[];
}

export interface WireElement<P = Point> {
  type: 'wire';
  points: P[];
  directions: Direction[];
  options: OptionSet;
  stroke?: Stroke;
  fill?: Fill;
  startArrow?: string;
  endArrow?: string;
  labels: PointLabel<P>[];
  components: InlineComponent<P>[];
}

export interface ComponentElement<P = Point> extends ComponentStyle {
  type: 'component';
  componentType: string;
  name?: string;
  qualifiedName?: string;
  /** Two terminals for bipoles, one anchor for node-style components */
  terminals: P[];
  options: OptionSet;
  label?: Label;
  annotation?: Label;
  annotations: Annotation<P>[];
  labels: PointLabel<P>[];
}

export interface GroupElement {
  type: 'group';
  name?: string;
  options: OptionSet;
  elements: Element[];
}

export type Element = NodeElement | WireElement | ComponentElement | GroupElement;

export type ElementType = Element['type'];

// Assembled records carry identifiers

export type NodeRecord = NodeElement & { id: string };

export type ComponentRecord = ComponentElement & { id: string };

export type InlineComponentRecord = InlineComponent & { id: string };

export type WireRecord = Omit<WireElement, 'components'> & {
  id: string;
  components: InlineComponentRecord[];
};

export type GroupRecord = Omit<GroupElement, 'elements'> & {
  id: string;
  elements: ElementRecord[];
};

export type ElementRecord = NodeRecord | WireRecord | ComponentRecord | GroupRecord;

export type CoordinateUnits = 'cm' | 'px';

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  width: number;
  height: number;
}

/**
 * The JSON document handed to the editor
 */
export interface CircuitDocument {
  version: string;
  units: CoordinateUnits;
  bounds: Bounds;
  elements: ElementRecord[];
}
