import { classify } from '../classifier/classifier.js';
import { type ComponentLibrary, defaultLibrary } from '../components/library.js';
import { ConversionError, StructuralError, UnresolvedReferenceError } from '../errors.js';
import { Lexer } from '../lexer/lexer.js';
import type { SourcePosition } from '../lexer/token.js';
import type { OptionSet } from '../options/options.js';
import type { StatementSource } from '../splitter/splitter.js';
import { createDiagnostic, type Diagnostic } from '../types/diagnostics.js';
import type {
  Annotation,
  ComponentElement,
  Element,
  InlineComponent,
  NodeElement,
  Point,
  PointLabel,
  WireElement,
} from '../types/elements.js';
import type { ComponentDraft, ElementDraft, InlineComponentDraft, NodeDraft, StatementResult, WireDraft } from './draft.js';
import type { PointExpr } from './point.js';
import { Resolver, Scope } from './scope.js';
import { buildStatement } from './statement-builder.js';

export interface ConversionLimits {
  /** Longest statement accepted, in characters */
  maxStatementLength: number;
  /** Deepest group nesting accepted */
  maxGroupDepth: number;
}

export const DEFAULT_LIMITS: ConversionLimits = {
  maxStatementLength: 100_000,
  maxGroupDepth: 32,
};

export interface DocumentBuilderOptions {
  limits?: Partial<ConversionLimits>;
  library?: ComponentLibrary;
}

interface DraftEntry {
  kind: 'element';
  draft: ElementDraft;
  scope: Scope;
  statementIndex: number;
  position: SourcePosition;
}

interface DraftGroup {
  kind: 'group';
  name: string | null;
  options: OptionSet;
  scope: Scope;
  children: DraftNode[];
  statementIndex: number;
  position: SourcePosition;
}

type DraftNode = DraftEntry | DraftGroup;

export interface BuiltDocument {
  elements: Element[];
  diagnostics: Diagnostic[];
}

/**
 * Collects statements of one drawing into a draft tree, then resolves names
 *
 * Each statement either contributes all its elements and names or records
 * exactly one diagnostic.
 */
export class DocumentBuilder {
  private readonly lexer: Lexer;
  private readonly library: ComponentLibrary;
  private readonly limits: ConversionLimits;
  private readonly diagnostics: Diagnostic[] = [];
  private readonly root: DraftGroup;
  private readonly open: DraftGroup[] = [];
  /** Groups opened beyond the depth limit; their closes are swallowed */
  private suppressed = 0;
  private anonymousGroups = 0;

  constructor(options: DocumentBuilderOptions = {}) {
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.library = options.library ?? defaultLibrary;
    this.lexer = new Lexer({ maxStatementLength: this.limits.maxStatementLength });
    const origin = { line: 1, column: 0, offset: 0 };
    this.root = {
      kind: 'group',
      name: null,
      options: {},
      scope: new Scope(null, null),
      children: [],
      statementIndex: -1,
      position: origin,
    };
  }

  private get current(): DraftGroup {
    return this.open.at(-1) ?? this.root;
  }

  /**
   * Tokenize, classify and build one statement
   */
  addStatement(statement: StatementSource): void {
    const position: SourcePosition = {
      line: statement.line,
      column: statement.column,
      offset: statement.offset,
    };

    try {
      const tokens = this.lexer.tokenize(statement.text, position);
      const classification = classify(tokens, this.library);
      const scope = this.current.scope;
      const result = buildStatement(tokens, classification, {
        library: this.library,
        qualify: (name) => scope.qualify(name),
      });
      this.apply(result, statement.index, position);
    } catch (error) {
      if (error instanceof ConversionError) {
        this.report(error, statement.index);
        return;
      }
      throw error;
    }
  }

  private report(error: ConversionError, statementIndex: number): void {
    this.diagnostics.push(createDiagnostic(error.code, error.reason, statementIndex, error.position));
  }

  private apply(result: StatementResult, statementIndex: number, position: SourcePosition): void {
    switch (result.kind) {
      case 'group-open':
        this.openGroup(result.name, result.options, statementIndex, position);
        return;
      case 'group-close':
        this.closeGroup(position);
        return;
      case 'elements': {
        const group = this.current;
        for (const declaration of result.names) {
          const replaced = group.scope.define(declaration.name, declaration.expr, declaration.position);
          if (replaced !== null) {
            this.diagnostics.push(
              createDiagnostic(
                'duplicate-name',
                `Duplicate name '${declaration.name}' replaces the definition at line ${replaced.position.line}, column ${replaced.position.column}`,
                statementIndex,
                declaration.position,
              ),
            );
          }
        }
        for (const draft of result.elements) {
          group.children.push({ kind: 'element', draft, scope: group.scope, statementIndex, position });
        }
      }
    }
  }

  private openGroup(name: string | null, options: OptionSet, statementIndex: number, position: SourcePosition): void {
    if (this.suppressed > 0 || this.open.length >= this.limits.maxGroupDepth) {
      this.suppressed++;
      if (this.suppressed === 1) {
        throw new StructuralError(
          `Group nesting exceeds the maximum depth of ${this.limits.maxGroupDepth}`,
          position,
        );
      }
      return;
    }

    const parent = this.current;
    const scopeName = name ?? `scope${++this.anonymousGroups}`;
    const group: DraftGroup = {
      kind: 'group',
      name,
      options,
      scope: new Scope(scopeName, parent.scope),
      children: [],
      statementIndex,
      position,
    };
    parent.children.push(group);
    this.open.push(group);
  }

  private closeGroup(position: SourcePosition): void {
    if (this.suppressed > 0) {
      this.suppressed--;
      return;
    }
    if (this.open.pop() === undefined) {
      throw new StructuralError('Unmatched \\end{scope}', position);
    }
  }

  /**
   * Close dangling groups and resolve every point
   */
  finish(): BuiltDocument {
    while (this.open.length > 0) {
      const group = this.open.pop();
      if (group === undefined) break;
      const label = group.name === null ? 'Group' : `Group '${group.name}'`;
      this.report(new StructuralError(`${label} is never closed`, group.position), group.statementIndex);
    }

    const resolver = new Resolver();
    const elements = this.resolveChildren(this.root.children, resolver);
    const diagnostics = [...this.diagnostics].sort(
      (a, b) => a.statementIndex - b.statementIndex || a.offset - b.offset,
    );
    return { elements, diagnostics };
  }

  private resolveChildren(children: DraftNode[], resolver: Resolver): Element[] {
    const elements: Element[] = [];

    for (const child of children) {
      if (child.kind === 'group') {
        elements.push({
          type: 'group',
          ...(child.name === null ? {} : { name: child.name }),
          options: child.options,
          elements: this.resolveChildren(child.children, resolver),
        });
        continue;
      }

      const missing = new Set<string>();
      const element = resolveDraft(child.draft, new PointResolver(resolver, child.scope, missing));
      if (element === null || missing.size > 0) {
        this.report(new UnresolvedReferenceError([...missing], child.position), child.statementIndex);
        continue;
      }
      elements.push(element);
    }

    return elements;
  }
}

/**
 * Resolves the points of one draft, collecting unknown names
 */
class PointResolver {
  constructor(
    private readonly resolver: Resolver,
    private readonly scope: Scope,
    private readonly missing: Set<string>,
  ) {}

  get failed(): boolean {
    return this.missing.size > 0;
  }

  point(expr: PointExpr): Point {
    return this.resolver.resolve(expr, this.scope, this.missing) ?? { x: 0, y: 0 };
  }

  points(exprs: PointExpr[]): Point[] {
    return exprs.map((expr) => this.point(expr));
  }

  annotations(annotations: Annotation<PointExpr>[]): Annotation[] {
    return annotations.map((annotation) => ({ ...annotation, position: this.point(annotation.position) }));
  }

  labels(labels: PointLabel<PointExpr>[]): PointLabel[] {
    return labels.map(({ position, ...label }) =>
      position === undefined ? label : { ...label, position: this.point(position) },
    );
  }
}

function terminalAngle(terminals: Point[]): number {
  if (terminals.length < 2) return 0;
  const [first, second] = terminals;
  return (Math.atan2(second.y - first.y, second.x - first.x) * 180) / Math.PI;
}

function resolveNode(draft: NodeDraft, points: PointResolver): NodeElement {
  return { ...draft, position: points.point(draft.position), annotations: points.annotations(draft.annotations) };
}

function resolveInline(draft: InlineComponentDraft, points: PointResolver): InlineComponent {
  const terminals = points.points(draft.terminals);
  return { ...draft, terminals, rotation: draft.rotation ?? terminalAngle(terminals) };
}

function resolveWire(draft: WireDraft, points: PointResolver): WireElement {
  return {
    ...draft,
    points: points.points(draft.points),
    labels: points.labels(draft.labels),
    components: draft.components.map((component) => resolveInline(component, points)),
  };
}

function resolveComponent(draft: ComponentDraft, points: PointResolver): ComponentElement {
  const terminals = points.points(draft.terminals);
  return {
    ...draft,
    terminals,
    rotation: draft.rotation ?? terminalAngle(terminals),
    annotations: points.annotations(draft.annotations),
    labels: points.labels(draft.labels),
  };
}

function resolveElement(draft: ElementDraft, points: PointResolver): Element {
  switch (draft.type) {
    case 'node':
      return resolveNode(draft, points);
    case 'wire':
      return resolveWire(draft, points);
    case 'component':
      return resolveComponent(draft, points);
  }
}

/**
 * Resolve a draft element; null when any of its names is unknown
 */
function resolveDraft(draft: ElementDraft, points: PointResolver): Element | null {
  const element = resolveElement(draft, points);
  return points.failed ? null : element;
}
