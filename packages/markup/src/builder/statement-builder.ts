import { type Classification, StatementKind } from '../classifier/classifier.js';
import { type ComponentEntry, type ComponentLibrary, segmentTarget } from '../components/library.js';
import { BuildError, ClassificationError } from '../errors.js';
import type { KeywordToken, SourcePosition, Token } from '../lexer/token.js';
import { PathOperator, TokenType } from '../lexer/token-types.js';
import { normalizeLabel } from '../options/label.js';
import { mergeOptions, type OptionSet, optionString } from '../options/options.js';
import type { Annotation, Direction, Label, PointLabel } from '../types/elements.js';
import type {
  ComponentDraft,
  ElementDraft,
  InlineComponentDraft,
  NameDeclaration,
  NodeDraft,
  StatementResult,
  WireDraft,
} from './draft.js';
import { midpoint, ORIGIN, type PointExpr, toPointExpr } from './point.js';
import {
  arrowsOf,
  fillOf,
  mirrorOf,
  shapeOf,
  sizeOf,
  strokeOf,
  terminalsOf,
  transformOf,
} from './style.js';

export interface BuildContext {
  library: ComponentLibrary;
  /** Qualified form of a name declared in the current group */
  qualify(name: string): string;
}

/** One `node`/`coordinate` clause: options, name, position and text in any order */
interface NodeClause {
  start: SourcePosition;
  options: OptionSet;
  name: string | null;
  position: PointExpr | null;
  text: string | null;
}

interface PathSegment {
  operator: PathOperator;
  /** Options of a `to[..]` segment */
  options: OptionSet;
  position: SourcePosition;
}

interface PathWalk {
  head: KeywordToken;
  options: OptionSet;
  points: PointExpr[];
  /** `segments[i]` joins `points[i]` and `points[i + 1]` */
  segments: PathSegment[];
  labels: PointLabel<PointExpr>[];
}

const LABEL_KEYS = [
  ['l', false],
  ['l^', false],
  ['l_', true],
] as const;

const ANNOTATION_KEYS = [
  ['a', false],
  ['a^', false],
  ['a_', true],
] as const;

function labelFrom(
  options: OptionSet,
  keys: typeof LABEL_KEYS | typeof ANNOTATION_KEYS,
): Label | undefined {
  for (const [key, otherSide] of keys) {
    const text = optionString(options, key);
    if (text !== null) {
      return normalizeLabel(text, otherSide);
    }
  }
  return undefined;
}

function textLabel(text: string | null): Label | undefined {
  return text === null || text.trim() === '' ? undefined : normalizeLabel(text);
}

/**
 * Build the draft elements of one classified statement
 *
 * @throws {BuildError} When the statement's shape cannot be honoured
 * @throws {ClassificationError} For unrecognized statements
 */
export function buildStatement(
  tokens: Token[],
  classification: Classification,
  context: BuildContext,
): StatementResult {
  return new StatementBuilder(tokens, context).build(classification);
}

class StatementBuilder {
  private current: number = 0;
  private readonly names: NameDeclaration[] = [];
  /** Node-style components placed by inline nodes */
  private readonly placed: ElementDraft[] = [];

  constructor(
    private readonly tokens: Token[],
    private readonly context: BuildContext,
  ) {}

  build(classification: Classification): StatementResult {
    switch (classification.kind) {
      case StatementKind.GROUP_OPEN:
        return this.groupOpen();
      case StatementKind.GROUP_CLOSE:
        return { kind: 'group-close' };
      case StatementKind.STANDALONE_NODE:
        return this.isNodeCommand() ? this.nodeStatement() : this.nodeOnPath();
      case StatementKind.SIMPLE_WIRE:
      case StatementKind.MULTI_SEGMENT_PATH:
        return this.wire();
      case StatementKind.COMPONENT_ON_PATH:
        return this.componentOnPath();
      case StatementKind.UNRECOGNIZED:
        throw new ClassificationError(classification.reason ?? 'Unrecognized statement', this.startPosition());
    }
  }

  // Cursor

  private peek(): Token | null {
    const token = this.tokens[this.current];
    return token === undefined || token.type === TokenType.DELIMITER ? null : token;
  }

  private isAtEnd(): boolean {
    return this.peek() === null;
  }

  private advance(): Token {
    const token = this.peek();
    if (token === null) {
      throw this.error('Unexpected end of statement');
    }
    this.current++;
    return token;
  }

  private checkKeyword(keyword: string): boolean {
    const token = this.peek();
    return token !== null && token.type === TokenType.KEYWORD && token.keyword === keyword;
  }

  private startPosition(): SourcePosition {
    return this.tokens[0]?.loc.start ?? { line: 1, column: 0, offset: 0 };
  }

  private error(message: string, position: SourcePosition = this.peek()?.loc.start ?? this.startPosition()): BuildError {
    return new BuildError(message, position);
  }

  private isNodeCommand(): boolean {
    const head = this.tokens[0];
    return head?.type === TokenType.KEYWORD && (head.keyword === '\\node' || head.keyword === '\\coordinate');
  }

  private head(): KeywordToken {
    const token = this.advance();
    if (token.type !== TokenType.KEYWORD) {
      throw this.error(`Expected a command, found '${token.value}'`, token.loc.start);
    }
    return token;
  }

  private leadingOptions(): OptionSet {
    let options: OptionSet = {};
    let token = this.peek();
    while (token !== null && token.type === TokenType.OPTION_BLOCK) {
      options = mergeOptions(options, token.options);
      this.current++;
      token = this.peek();
    }
    return options;
  }

  private declare(name: string | null, expr: PointExpr, position: SourcePosition): void {
    if (name !== null) {
      this.names.push({ name, expr, position });
    }
  }

  private qualified(name: string | null): { name?: string; qualifiedName?: string } {
    return name === null ? {} : { name, qualifiedName: this.context.qualify(name) };
  }

  // Groups

  private groupOpen(): StatementResult {
    this.head();
    const options = this.leadingOptions();
    const name =
      optionString(options, 'name') ??
      optionString(options, 'local bounding box') ??
      optionString(options, 'name prefix');
    return { kind: 'group-open', name, options };
  }

  // Nodes

  /**
   * Parse the clause after `node` or `coordinate`. Stops before the first
   * token that does not belong to it; a node clause ends with its text.
   */
  private nodeClause(start: SourcePosition, previous: PointExpr | null, acceptsText: boolean): NodeClause {
    const clause: NodeClause = { start, options: {}, name: null, position: null, text: null };

    while (!this.isAtEnd()) {
      const token = this.tokens[this.current];

      if (token.type === TokenType.OPTION_BLOCK) {
        clause.options = mergeOptions(clause.options, token.options);
        this.current++;
      } else if (token.type === TokenType.KEYWORD && token.keyword === 'at') {
        this.current++;
        const target = this.peek();
        if (target === null || target.type !== TokenType.COORDINATE) {
          throw this.error("Expected a coordinate after 'at'", token.loc.start);
        }
        this.current++;
        clause.position = toPointExpr(target.coordinate, previous, target.loc.start);
      } else if (token.type === TokenType.COORDINATE && clause.name === null) {
        if (token.coordinate.kind !== 'named' || token.coordinate.anchor !== null || token.coordinate.shift !== null) {
          throw this.error(`Invalid name '${token.value}'`, token.loc.start);
        }
        clause.name = token.coordinate.name;
        this.current++;
      } else if (token.type === TokenType.TEXT && acceptsText) {
        clause.text = token.text;
        this.current++;
        break;
      } else {
        break;
      }
    }

    clause.name ??= optionString(clause.options, 'name');
    return clause;
  }

  private annotation(clause: NodeClause, fallback: PointExpr): Annotation<PointExpr> {
    const position = clause.position ?? fallback;
    this.declare(clause.name, position, clause.start);
    return {
      position,
      options: clause.options,
      ...(clause.name === null ? {} : { name: clause.name }),
      label: textLabel(clause.text),
    };
  }

  private nodeDraft(clause: NodeClause, position: PointExpr, annotations: Annotation<PointExpr>[]): ElementDraft {
    const { options } = clause;
    const entry = this.context.library.findNodeComponent(options);
    if (entry !== null) {
      return this.nodeComponent(entry, clause, position, annotations);
    }

    const transform = transformOf(options);
    const node: NodeDraft = {
      type: 'node',
      ...this.qualified(clause.name),
      position,
      options,
      shape: shapeOf(options),
      size: sizeOf(options),
      stroke: strokeOf(options, false),
      fill: fillOf(options, false),
      rotation: transform.rotation,
      scale: transform.scale,
      label: textLabel(clause.text),
      annotations,
    };
    return node;
  }

  /**
   * A node naming a node-style part (`ground`, `npn`, `op amp`) becomes a
   * one-terminal component
   */
  private nodeComponent(
    entry: ComponentEntry,
    clause: NodeClause,
    position: PointExpr,
    annotations: Annotation<PointExpr>[],
  ): ComponentDraft {
    const { options } = clause;
    const transform = transformOf(options);
    let label = textLabel(clause.text);
    let remaining = annotations;
    if (label === undefined && annotations.length > 0 && annotations[0].label !== undefined) {
      label = annotations[0].label;
      remaining = annotations.slice(1);
    }

    return {
      type: 'component',
      componentType: entry.name,
      ...this.qualified(clause.name),
      terminals: [position],
      options,
      label,
      annotations: remaining,
      labels: [],
      rotation: transform.rotation ?? 0,
      scale: mirrorOf(options) ?? transform.scale,
    };
  }

  /**
   * `\node[..] (name) at (p) {text} node[..] at (q) {..};` or `\coordinate (name) at (p);`
   */
  private nodeStatement(): StatementResult {
    const head = this.head();
    const isCoordinate = head.keyword === '\\coordinate';
    const clause = this.nodeClause(head.loc.start, null, !isCoordinate);
    const position = clause.position ?? ORIGIN;

    if (isCoordinate) {
      if (clause.name === null) {
        throw this.error('Coordinate without a name', head.loc.start);
      }
      this.expectEnd();
      this.declare(clause.name, position, head.loc.start);
      return { kind: 'elements', elements: [], names: this.names };
    }

    if (clause.text === null) {
      throw this.error('Node without text', head.loc.start);
    }
    this.declare(clause.name, position, head.loc.start);

    const annotations: Annotation<PointExpr>[] = [];
    while (this.checkKeyword('node')) {
      const keyword = this.advance();
      const chained = this.nodeClause(keyword.loc.start, position, true);
      if (chained.text === null) {
        throw this.error('Node without text', keyword.loc.start);
      }
      annotations.push(this.annotation(chained, position));
    }
    this.expectEnd();

    return { kind: 'elements', elements: [this.nodeDraft(clause, position, annotations)], names: this.names };
  }

  /**
   * `\draw (p) node[..] {..};` places its nodes at `p`
   */
  private nodeOnPath(): StatementResult {
    const walk = this.walkPath();
    const [first, ...rest] = walk.labels;
    if (first === undefined) {
      return { kind: 'elements', elements: this.placed, names: this.names };
    }

    const position = first.position ?? walk.points[first.point];
    const clause: NodeClause = {
      start: walk.head.loc.start,
      options: mergeOptions(walk.options, first.options),
      name: first.name ?? null,
      position,
      text: first.label?.raw ?? '',
    };
    const annotations = rest.map(
      (label): Annotation<PointExpr> => ({
        position: label.position ?? walk.points[label.point],
        options: label.options,
        ...(label.name === undefined ? {} : { name: label.name }),
        label: label.label,
      }),
    );

    return {
      kind: 'elements',
      elements: [this.nodeDraft(clause, position, annotations), ...this.placed],
      names: this.names,
    };
  }

  private expectEnd(): void {
    const token = this.peek();
    if (token !== null) {
      throw this.error(`Unexpected '${token.value}'`, token.loc.start);
    }
  }

  // Paths

  private walkPath(): PathWalk {
    const head = this.head();
    const options = this.leadingOptions();
    const points: PointExpr[] = [];
    const segments: PathSegment[] = [];
    const labels: PointLabel<PointExpr>[] = [];
    let pending: PathSegment | null = null;

    while (!this.isAtEnd()) {
      const token = this.advance();
      const position = token.loc.start;

      switch (token.type) {
        case TokenType.COORDINATE: {
          if (points.length > 0 && pending === null) {
            throw this.error(`Expected a path operator before '${token.value}'`, position);
          }
          points.push(toPointExpr(token.coordinate, points.at(-1) ?? null, position));
          if (pending !== null) {
            segments.push(pending);
            pending = null;
          }
          break;
        }

        case TokenType.PATH_OP: {
          if (points.length === 0) {
            throw this.error(`Path operator '${token.operator}' has no starting point`, position);
          }
          if (pending !== null) {
            throw this.error(`Consecutive path operators '${pending.operator}' and '${token.operator}'`, position);
          }
          let segmentOptions: OptionSet = {};
          const next = this.peek();
          if (token.operator === PathOperator.TO && next !== null && next.type === TokenType.OPTION_BLOCK) {
            segmentOptions = next.options;
            this.current++;
          }
          pending = { operator: token.operator, options: segmentOptions, position };
          break;
        }

        case TokenType.KEYWORD:
          if (token.keyword === 'cycle') {
            if (pending === null) {
              throw this.error("'cycle' must follow a path operator", position);
            }
            points.push(points[0]);
            segments.push(pending);
            pending = null;
          } else if (token.keyword === 'node') {
            this.inlineNode(position, points, labels);
          } else if (token.keyword === 'coordinate') {
            this.inlineCoordinate(position, points);
          } else {
            throw this.error(`Unexpected '${token.keyword}'`, position);
          }
          break;

        case TokenType.OPTION_BLOCK:
          throw this.error(`Unexpected option block '${token.value}'`, position);

        case TokenType.TEXT:
          throw this.error(`Unexpected text '${token.value}'`, position);

        case TokenType.DELIMITER:
          break;
      }
    }

    if (pending !== null) {
      throw this.error(`Path ends with a dangling '${pending.operator}'`, pending.position);
    }

    return { head, options, points, segments, labels };
  }

  private lastPoint(points: PointExpr[], position: SourcePosition, what: string): PointExpr {
    const last = points.at(-1);
    if (last === undefined) {
      throw this.error(`${what} has no point to attach to`, position);
    }
    return last;
  }

  private inlineNode(start: SourcePosition, points: PointExpr[], labels: PointLabel<PointExpr>[]): void {
    const anchor = this.lastPoint(points, start, 'Node');
    const clause = this.nodeClause(start, anchor, true);
    if (clause.text === null) {
      throw this.error('Node without text', start);
    }

    const position = clause.position ?? anchor;
    this.declare(clause.name, position, start);

    const entry = this.context.library.findNodeComponent(clause.options);
    if (entry !== null) {
      this.placed.push(this.nodeComponent(entry, clause, position, []));
      return;
    }

    labels.push({
      point: points.length - 1,
      ...(clause.position === null ? {} : { position: clause.position }),
      options: clause.options,
      ...(clause.name === null ? {} : { name: clause.name }),
      label: textLabel(clause.text),
    });
  }

  private inlineCoordinate(start: SourcePosition, points: PointExpr[]): void {
    const anchor = this.lastPoint(points, start, 'Coordinate');
    const clause = this.nodeClause(start, anchor, false);
    if (clause.name === null) {
      throw this.error('Coordinate without a name', start);
    }
    this.declare(clause.name, clause.position ?? anchor, start);
  }

  private requirePoints(walk: PathWalk, count: number): void {
    if (walk.points.length < count) {
      throw this.error('A path needs at least two points', walk.head.loc.start);
    }
  }

  /**
   * Shared fields of path components, standalone or inline
   */
  private componentFields(entry: ComponentEntry, key: string, options: OptionSet, first: PointExpr, second: PointExpr) {
    const name = optionString(options, 'name');
    this.declare(name, midpoint(first, second), this.startPosition());
    const transform = transformOf(options);
    const shorthand = optionString(options, key);

    return {
      componentType: entry.name,
      ...this.qualified(name),
      terminals: [first, second],
      options,
      label: labelFrom(options, LABEL_KEYS) ?? (shorthand === null ? undefined : normalizeLabel(shorthand)),
      annotation: labelFrom(options, ANNOTATION_KEYS),
      rotation: transform.rotation ?? null,
      scale: mirrorOf(options) ?? transform.scale,
      ...terminalsOf(options),
    };
  }

  private wire(): StatementResult {
    const walk = this.walkPath();
    this.requirePoints(walk, 2);

    const drawn = walk.head.keyword !== '\\path' && walk.head.keyword !== '\\fill';
    const filled = walk.head.keyword === '\\fill' || walk.head.keyword === '\\filldraw';
    const components: InlineComponentDraft[] = [];
    let options = walk.options;

    walk.segments.forEach((segment, index) => {
      if (segment.operator !== PathOperator.TO) return;

      const target = segmentTarget(segment.options, this.context.library);
      if (target.kind === 'unknown') {
        throw this.error(target.reason, segment.position);
      }
      if (target.kind === 'wire') {
        options = mergeOptions(options, segment.options);
        return;
      }
      components.push({
        segment: index,
        ...this.componentFields(target.entry, target.key, segment.options, walk.points[index], walk.points[index + 1]),
      });
    });

    const directions = walk.segments.map(
      (segment): Direction => (segment.operator === PathOperator.TO ? '--' : segment.operator),
    );

    const wire: WireDraft = {
      type: 'wire',
      points: walk.points,
      directions,
      options,
      stroke: strokeOf(options, drawn),
      fill: fillOf(options, filled),
      ...arrowsOf(options),
      labels: walk.labels,
      components,
    };

    return { kind: 'elements', elements: [wire, ...this.placed], names: this.names };
  }

  private componentOnPath(): StatementResult {
    const walk = this.walkPath();
    this.requirePoints(walk, 2);

    const [segment] = walk.segments;
    const target = segmentTarget(segment.options, this.context.library);
    if (target.kind !== 'component') {
      throw this.error('Expected a component on the path', segment.position);
    }

    const options = mergeOptions(walk.options, segment.options);
    const component: ComponentDraft = {
      type: 'component',
      ...this.componentFields(target.entry, target.key, options, walk.points[0], walk.points[1]),
      annotations: [],
      labels: walk.labels,
    };

    return { kind: 'elements', elements: [component, ...this.placed], names: this.names };
  }
}
