import type {
  Annotation,
  Bounds,
  CircuitDocument,
  ComponentElement,
  ComponentRecord,
  CoordinateUnits,
  Element,
  ElementRecord,
  ElementType,
  GroupElement,
  GroupRecord,
  InlineComponent,
  InlineComponentRecord,
  NodeElement,
  NodeRecord,
  Point,
  PointLabel,
  Scale,
  Size,
  WireElement,
  WireRecord,
} from '../types/elements.js';

export const DOCUMENT_VERSION = '0.1';

/** Editor pixels per centimetre */
export const PX_PER_CM = 37.795286;

/** Editor pixels per centimetre for shape sizes */
export const PX_PER_CM_SHAPE = 38.88379;

export interface AssembleOptions {
  units?: CoordinateUnits;
}

/**
 * Round to 3 decimals, turning -0 into 0
 */
export function cleanNumber(value: number): number {
  const rounded = Math.round(value * 1000) / 1000;
  return rounded === 0 ? 0 : rounded;
}

class BoundsTracker {
  private minX = Infinity;
  private minY = Infinity;
  private maxX = -Infinity;
  private maxY = -Infinity;

  add(point: Point): void {
    this.minX = Math.min(this.minX, point.x);
    this.minY = Math.min(this.minY, point.y);
    this.maxX = Math.max(this.maxX, point.x);
    this.maxY = Math.max(this.maxY, point.y);
  }

  result(): Bounds {
    if (this.minX === Infinity) {
      return { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 };
    }
    return {
      minX: this.minX,
      minY: this.minY,
      maxX: this.maxX,
      maxY: this.maxY,
      width: cleanNumber(this.maxX - this.minX),
      height: cleanNumber(this.maxY - this.minY),
    };
  }
}

/**
 * Gives resolved elements their identifiers and output units
 */
class Assembler {
  private readonly counters: Record<ElementType, number> = { node: 0, wire: 0, component: 0, group: 0 };
  readonly bounds = new BoundsTracker();

  constructor(private readonly units: CoordinateUnits) {}

  private nextId(type: ElementType): string {
    this.counters[type]++;
    return `${type}-${this.counters[type]}`;
  }

  private point(point: Point): Point {
    const converted =
      this.units === 'px'
        ? { x: cleanNumber(point.x * PX_PER_CM), y: cleanNumber(-point.y * PX_PER_CM) }
        : { x: cleanNumber(point.x), y: cleanNumber(point.y) };
    this.bounds.add(converted);
    return converted;
  }

  private size(size: Size | undefined): Size | undefined {
    if (size === undefined) return undefined;
    const factor = this.units === 'px' ? PX_PER_CM_SHAPE : 1;
    return { x: cleanNumber(size.x * factor), y: cleanNumber(size.y * factor) };
  }

  private annotations(annotations: Annotation[]): Annotation[] {
    return annotations.map((annotation) => ({ ...annotation, position: this.point(annotation.position) }));
  }

  private labels(labels: PointLabel[]): PointLabel[] {
    return labels.map(({ position, ...label }) =>
      position === undefined ? label : { ...label, position: this.point(position) },
    );
  }

  element(element: Element): ElementRecord {
    switch (element.type) {
      case 'node':
        return this.node(element);
      case 'wire':
        return this.wire(element);
      case 'component':
        return this.component(element);
      case 'group':
        return this.group(element);
    }
  }

  private node(node: NodeElement): NodeRecord {
    const id = this.nextId('node');
    return {
      id,
      ...node,
      position: this.point(node.position),
      size: this.size(node.size),
      rotation: cleanOptional(node.rotation),
      scale: cleanScale(node.scale),
      annotations: this.annotations(node.annotations),
    };
  }

  private wire(wire: WireElement): WireRecord {
    const id = this.nextId('wire');
    const points = wire.points.map((point) => this.point(point));
    const labels = this.labels(wire.labels);
    return {
      id,
      ...wire,
      points,
      labels,
      components: wire.components.map((component) => this.inlineComponent(component)),
    };
  }

  private inlineComponent(component: InlineComponent): InlineComponentRecord {
    const id = this.nextId('component');
    return {
      id,
      ...component,
      terminals: component.terminals.map((point) => this.point(point)),
      rotation: cleanNumber(component.rotation),
      scale: cleanScale(component.scale),
    };
  }

  private component(component: ComponentElement): ComponentRecord {
    const id = this.nextId('component');
    return {
      id,
      ...component,
      terminals: component.terminals.map((point) => this.point(point)),
      rotation: cleanNumber(component.rotation),
      scale: cleanScale(component.scale),
      annotations: this.annotations(component.annotations),
      labels: this.labels(component.labels),
    };
  }

  private group(group: GroupElement): GroupRecord {
    const id = this.nextId('group');
    return {
      id,
      ...group,
      elements: group.elements.map((element) => this.element(element)),
    };
  }
}

function cleanOptional(value: number | undefined): number | undefined {
  return value === undefined ? undefined : cleanNumber(value);
}

function cleanScale(scale: Scale | undefined): Scale | undefined {
  return scale === undefined ? undefined : { x: cleanNumber(scale.x), y: cleanNumber(scale.y) };
}

/**
 * Build the output document from resolved elements
 *
 * Identifiers count per element type in document order: `node-1`, `wire-1`,
 * `component-1`, `group-1`. Inline components are numbered right after
 * their wire.
 */
export function assembleDocument(elements: Element[], options: AssembleOptions = {}): CircuitDocument {
  const units = options.units ?? 'cm';
  const assembler = new Assembler(units);
  const records = elements.map((element) => assembler.element(element));

  return {
    version: DOCUMENT_VERSION,
    units,
    bounds: assembler.bounds.result(),
    elements: records,
  };
}
