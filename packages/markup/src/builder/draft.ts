import type { SourcePosition } from '../lexer/token.js';
import type { OptionSet } from '../options/options.js';
import type { ComponentElement, InlineComponent, NodeElement, WireElement } from '../types/elements.js';
import type { PointExpr } from './point.js';

// Elements before name resolution. A null rotation is derived from the
// terminals once they resolve.

export type NodeDraft = NodeElement<PointExpr>;

export type ComponentDraft = Omit<ComponentElement<PointExpr>, 'rotation'> & { rotation: number | null };

export type InlineComponentDraft = Omit<InlineComponent<PointExpr>, 'rotation'> & { rotation: number | null };

export type WireDraft = Omit<WireElement<PointExpr>, 'components'> & { components: InlineComponentDraft[] };

export type ElementDraft = NodeDraft | WireDraft | ComponentDraft;

export interface NameDeclaration {
  name: string;
  expr: PointExpr;
  position: SourcePosition;
}

/**
 * What one statement contributes to the document
 */
export type StatementResult =
  | { kind: 'elements'; elements: ElementDraft[]; names: NameDeclaration[] }
  | { kind: 'group-open'; name: string | null; options: OptionSet }
  | { kind: 'group-close' };
