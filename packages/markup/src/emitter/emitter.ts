import { cleanNumber, PX_PER_CM } from '../assembler/assembler.js';
import { type ComponentLibrary, defaultLibrary } from '../components/library.js';
import { formatOptions, type OptionSet } from '../options/options.js';
import type {
  Annotation,
  CircuitDocument,
  ComponentRecord,
  CoordinateUnits,
  ElementRecord,
  GroupRecord,
  InlineComponentRecord,
  NodeRecord,
  Point,
  PointLabel,
  WireRecord,
} from '../types/elements.js';

const INDENT = '  ';

export interface EmitOptions {
  library?: ComponentLibrary;
}

/**
 * Renders an assembled document back into drawing markup
 */
class MarkupEmitter {
  private readonly lines: string[] = [];

  constructor(
    private readonly units: CoordinateUnits,
    private readonly library: ComponentLibrary,
  ) {}

  emit(elements: ElementRecord[], depth: number = 0): string[] {
    for (const element of elements) {
      switch (element.type) {
        case 'node':
          this.line(depth, this.node(element));
          break;
        case 'wire':
          this.line(depth, this.wire(element));
          break;
        case 'component':
          this.line(depth, this.component(element));
          break;
        case 'group':
          this.group(element, depth);
          break;
      }
    }
    return this.lines;
  }

  private line(depth: number, text: string): void {
    this.lines.push(INDENT.repeat(depth) + text);
  }

  private point(point: Point): string {
    if (this.units === 'px') {
      return `(${cleanNumber(point.x / PX_PER_CM)}, ${cleanNumber(-point.y / PX_PER_CM)})`;
    }
    return `(${point.x}, ${point.y})`;
  }

  private options(options: OptionSet): string {
    const text = formatOptions(options);
    return text === '' ? '' : `[${text}]`;
  }

  /**
   * Options with the component key moved to the front, where the classifier
   * looks for it
   */
  private componentOptions(componentType: string, options: OptionSet): string {
    const key = Object.keys(options).find((candidate) => this.library.lookup(candidate)?.name === componentType);
    if (key === undefined) {
      return this.options({ [componentType]: true, ...options });
    }
    const { [key]: value, ...rest } = options;
    return this.options({ [key]: value, ...rest });
  }

  private nodeClause(
    keyword: string,
    options: OptionSet,
    name: string | undefined,
    position: Point | undefined,
    text: string,
  ): string {
    const parts = [keyword + this.options(options)];
    if (name !== undefined) parts.push(`(${name})`);
    if (position !== undefined) parts.push(`at ${this.point(position)}`);
    parts.push(`{${text}}`);
    return parts.join(' ');
  }

  private annotations(annotations: Annotation[]): string {
    return annotations
      .map(
        (annotation) =>
          ' ' +
          this.nodeClause('node', annotation.options, annotation.name, annotation.position, annotation.label?.raw ?? ''),
      )
      .join('');
  }

  private pointLabels(labels: PointLabel[], index: number): string {
    return labels
      .filter((label) => label.point === index)
      .map(
        (label) => ' ' + this.nodeClause('node', label.options, label.name, label.position, label.label?.raw ?? ''),
      )
      .join('');
  }

  private node(node: NodeRecord): string {
    const head = this.nodeClause('\\node', node.options, node.name, node.position, node.label?.raw ?? '');
    return `${head}${this.annotations(node.annotations)};`;
  }

  private component(component: ComponentRecord): string {
    if (component.terminals.length === 1) {
      const [position] = component.terminals;
      const head = this.nodeClause('\\node', component.options, component.name, position, component.label?.raw ?? '');
      return `${head}${this.annotations(component.annotations)};`;
    }

    const [first, second] = component.terminals;
    return (
      `\\draw ${this.point(first)}${this.pointLabels(component.labels, 0)}` +
      ` to${this.componentOptions(component.componentType, component.options)}` +
      ` ${this.point(second)}${this.pointLabels(component.labels, 1)};`
    );
  }

  private wire(wire: WireRecord): string {
    const command =
      wire.fill === undefined
        ? wire.stroke === undefined
          ? '\\path'
          : '\\draw'
        : wire.stroke === undefined
          ? '\\fill'
          : '\\filldraw';
    const inline = new Map<number, InlineComponentRecord>(
      wire.components.map((component) => [component.segment, component]),
    );

    let text = `${command}${this.options(wire.options)} ${this.point(wire.points[0])}${this.pointLabels(wire.labels, 0)}`;
    wire.directions.forEach((direction, index) => {
      const component = inline.get(index);
      const operator =
        component === undefined ? direction : `to${this.componentOptions(component.componentType, component.options)}`;
      text += ` ${operator} ${this.point(wire.points[index + 1])}${this.pointLabels(wire.labels, index + 1)}`;
    });
    return `${text};`;
  }

  private group(group: GroupRecord, depth: number): void {
    this.line(depth, `\\begin{scope}${this.options(group.options)}`);
    this.emit(group.elements, depth + 1);
    this.line(depth, '\\end{scope}');
  }
}

/**
 * Render a document as drawing markup, one statement per line
 *
 * Converting the result again yields the same elements up to identifiers.
 */
export function emitMarkup(document: CircuitDocument, options: EmitOptions = {}): string {
  const emitter = new MarkupEmitter(document.units, options.library ?? defaultLibrary);
  return emitter.emit(document.elements).join('\n');
}
