import type { SourcePosition } from '../lexer/token.js';
import type { Point } from '../types/elements.js';
import { type PointExpr, perpendicularPoint } from './point.js';

export interface NameDefinition {
  name: string;
  expr: PointExpr;
  /** Scope the expression was written in; its names resolve from there */
  scope: Scope;
  position: SourcePosition;
}

/**
 * Name table of one group. Lookups fall through to the enclosing groups.
 */
export class Scope {
  readonly path: string[];
  private readonly definitions = new Map<string, NameDefinition>();

  constructor(
    readonly name: string | null,
    readonly parent: Scope | null,
  ) {
    this.path = parent === null || name === null ? [] : [...parent.path, name];
  }

  get depth(): number {
    return this.parent === null ? 0 : this.parent.depth + 1;
  }

  /**
   * Register a name; returns the definition it replaced, if any
   */
  define(name: string, expr: PointExpr, position: SourcePosition): NameDefinition | null {
    const previous = this.definitions.get(name) ?? null;
    this.definitions.set(name, { name, expr, scope: this, position });
    return previous;
  }

  lookup(name: string): NameDefinition | null {
    return this.definitions.get(name) ?? this.parent?.lookup(name) ?? null;
  }

  /** `outer/inner/name` for names declared in groups */
  qualify(name: string): string {
    return [...this.path, name].join('/');
  }
}

type Outcome = { point: Point } | { missing: string[] };

/**
 * Names an expression refers to directly
 */
function referencedNames(expr: PointExpr): string[] {
  switch (expr.kind) {
    case 'absolute':
      return [];
    case 'named':
      return [expr.name];
    case 'offset':
      return referencedNames(expr.base);
    case 'midpoint':
    case 'perpendicular':
      return [...referencedNames(expr.first), ...referencedNames(expr.second)];
  }
}

/**
 * Resolves point expressions against the final name tables
 *
 * Each definition is resolved once, after the definitions it depends on, using
 * an explicit stack so name chains of any length resolve. A definition that
 * refers back to itself fails with the name that closes the cycle.
 */
export class Resolver {
  private readonly outcomes = new Map<NameDefinition, Outcome>();
  private readonly active = new Set<NameDefinition>();

  /**
   * Resolve an expression written in `scope`; unknown names are added to `missing`
   */
  resolve(expr: PointExpr, scope: Scope, missing: Set<string>): Point | null {
    switch (expr.kind) {
      case 'absolute':
        return { x: expr.x, y: expr.y };
      case 'named': {
        const point = this.resolveName(expr.name, scope, missing);
        return point === null ? null : { x: point.x + expr.dx, y: point.y + expr.dy };
      }
      case 'offset': {
        const base = this.resolve(expr.base, scope, missing);
        return base === null ? null : { x: base.x + expr.dx, y: base.y + expr.dy };
      }
      case 'midpoint': {
        const first = this.resolve(expr.first, scope, missing);
        const second = this.resolve(expr.second, scope, missing);
        if (first === null || second === null) return null;
        return { x: (first.x + second.x) / 2, y: (first.y + second.y) / 2 };
      }
      case 'perpendicular': {
        const first = this.resolve(expr.first, scope, missing);
        const second = this.resolve(expr.second, scope, missing);
        if (first === null || second === null) return null;
        return perpendicularPoint(expr.operator, first, second);
      }
    }
  }

  private resolveName(name: string, scope: Scope, missing: Set<string>): Point | null {
    const definition = scope.lookup(name);
    if (definition === null || this.active.has(definition)) {
      missing.add(name);
      return null;
    }

    const outcome = this.outcomes.get(definition) ?? this.settle(definition);
    if ('missing' in outcome) {
      for (const unresolved of outcome.missing) missing.add(unresolved);
      return null;
    }
    return outcome.point;
  }

  /**
   * Resolve a definition and, first, every unresolved definition it reaches
   */
  private settle(root: NameDefinition): Outcome {
    const stack: Array<{ definition: NameDefinition; expanded: boolean }> = [{ definition: root, expanded: false }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const { definition } = frame;

      if (this.outcomes.has(definition)) {
        stack.pop();
        continue;
      }

      if (!frame.expanded) {
        frame.expanded = true;
        this.active.add(definition);
        for (const name of referencedNames(definition.expr)) {
          const dependency = definition.scope.lookup(name);
          if (dependency !== null && !this.outcomes.has(dependency) && !this.active.has(dependency)) {
            stack.push({ definition: dependency, expanded: false });
          }
        }
        continue;
      }

      // Dependencies are settled or on the active path; resolving cannot recurse
      stack.pop();
      this.active.delete(definition);
      const inner = new Set<string>();
      const point = this.resolve(definition.expr, definition.scope, inner);
      this.outcomes.set(definition, point === null ? { missing: [...inner] } : { point });
    }

    const outcome = this.outcomes.get(root);
    if (outcome === undefined) {
      throw new Error(`Definition '${root.name}' was not resolved`);
    }
    return outcome;
  }
}
