import { describe, expect, it } from 'vitest';
import { convert } from '../src/index.js';
import type { ComponentRecord, ElementRecord, NodeRecord, WireRecord } from '../src/types/elements.js';

function wireAt(elements: ElementRecord[], index: number): WireRecord {
  const element = elements[index];
  if (element?.type !== 'wire') throw new Error(`expected a wire at ${index}`);
  return element;
}

function componentAt(elements: ElementRecord[], index: number): ComponentRecord {
  const element = elements[index];
  if (element?.type !== 'component') throw new Error(`expected a component at ${index}`);
  return element;
}

function nodeAt(elements: ElementRecord[], index: number): NodeRecord {
  const element = elements[index];
  if (element?.type !== 'node') throw new Error(`expected a node at ${index}`);
  return element;
}

describe('convert', () => {
  describe('components', () => {
    it('converts a labelled resistor', () => {
      const { document, diagnostics } = convert('\\draw (0,0) to[R, l=$R_1$] (2,0);');
      expect(diagnostics).toEqual([]);
      expect(document.elements).toEqual([
        {
          id: 'component-1',
          type: 'component',
          componentType: 'R',
          terminals: [
            { x: 0, y: 0 },
            { x: 2, y: 0 },
          ],
          options: { R: true, l: '$R_1$' },
          label: { text: '$R_1$', raw: '$R_1$' },
          rotation: 0,
          annotations: [],
          labels: [],
        },
      ]);
    });

    it('derives rotation from the terminals', () => {
      const { document } = convert('\\draw (0,0) to[R] (0,2);\n\\draw (0,0) to[C, rotate=45] (2,0);');
      expect(componentAt(document.elements, 0).rotation).toBe(90);
      expect(componentAt(document.elements, 1).rotation).toBe(45);
    });

    it('reads label sides and annotations', () => {
      const { document } = convert('\\draw (0,0) to[L, l_=$L$, a^=10mH] (2,0);');
      const component = componentAt(document.elements, 0);
      expect(component.label).toEqual({ text: '$L$', raw: '$L$', otherSide: true });
      expect(component.annotation).toEqual({ text: '10mH', raw: '10mH' });
    });

    it('takes the label from the component shorthand', () => {
      const { document } = convert('\\draw (0,0) to[R=$R_2$] (2,0);');
      expect(componentAt(document.elements, 0).label).toEqual({ text: '$R_2$', raw: '$R_2$' });
    });

    it('reads terminal markers and mirroring', () => {
      const { document } = convert('\\draw (0,0) to[D, *-o, mirror] (2,0);');
      const component = componentAt(document.elements, 0);
      expect(component.startTerminal).toBe('circ');
      expect(component.endTerminal).toBe('ocirc');
      expect(component.scale).toEqual({ x: -1, y: 1 });
    });

    it('names components at their midpoint', () => {
      const { document, diagnostics } = convert('\\draw (0,0) to[R, name=R1] (2,0);\n\\draw (R1) -- (1,1);');
      expect(diagnostics).toEqual([]);
      expect(componentAt(document.elements, 0).qualifiedName).toBe('R1');
      expect(wireAt(document.elements, 1).points).toEqual([
        { x: 1, y: 0 },
        { x: 1, y: 1 },
      ]);
    });

    it('places node-style components on a point', () => {
      const { document } = convert('\\draw (0,0) node[ground] {};');
      expect(document.elements).toEqual([
        {
          id: 'component-1',
          type: 'component',
          componentType: 'ground',
          terminals: [{ x: 0, y: 0 }],
          options: { ground: true },
          rotation: 0,
          annotations: [],
          labels: [],
        },
      ]);
    });

    it('turns node commands naming a part into components', () => {
      const { document } = convert('\\node[npn, rotate=90] (Q1) at (1,1) {$Q_1$};');
      const component = componentAt(document.elements, 0);
      expect(component.componentType).toBe('npn');
      expect(component.name).toBe('Q1');
      expect(component.terminals).toEqual([{ x: 1, y: 1 }]);
      expect(component.rotation).toBe(90);
      expect(component.label).toEqual({ text: '$Q_1$', raw: '$Q_1$' });
    });
  });

  describe('wires', () => {
    it('keeps every point of a multi-segment wire', () => {
      const { document } = convert('\\draw (0,0) -- (1,0) -- (1,1);');
      expect(document.elements).toEqual([
        {
          id: 'wire-1',
          type: 'wire',
          points: [
            { x: 0, y: 0 },
            { x: 1, y: 0 },
            { x: 1, y: 1 },
          ],
          directions: ['--', '--'],
          options: {},
          stroke: {},
          labels: [],
          components: [],
        },
      ]);
    });

    it('numbers inline components after their wire', () => {
      const { document } = convert('\\draw (0,0) to[R, l=$R_1$] (2,0) -- (2,2) to[C] (0,2);');
      const wire = wireAt(document.elements, 0);
      expect(wire.id).toBe('wire-1');
      expect(wire.directions).toEqual(['--', '--', '--']);
      expect(wire.components.map(({ id, segment, componentType, rotation }) => ({ id, segment, componentType, rotation }))).toEqual([
        { id: 'component-1', segment: 0, componentType: 'R', rotation: 0 },
        { id: 'component-2', segment: 2, componentType: 'C', rotation: 180 },
      ]);
      expect(wire.components[1].terminals).toEqual([
        { x: 2, y: 2 },
        { x: 0, y: 2 },
      ]);
    });

    it('keeps routing directions', () => {
      const { document } = convert('\\draw (0,0) -| (1,1) |- (2,2);');
      expect(wireAt(document.elements, 0).directions).toEqual(['-|', '|-']);
    });

    it('merges plain to-segment options into the wire', () => {
      const { document } = convert('\\draw (0,0) to[short, -*] (1,0);');
      expect(wireAt(document.elements, 0).options).toEqual({ short: true, '-*': true });
    });

    it('reads arrows and stroke', () => {
      const { document } = convert(
        '\\draw[-stealth, line width=2pt, dash pattern=on 8pt off 8pt, draw={rgb,255:red,0;green,0;blue,255}] (0,0) -- (1,0);',
      );
      const wire = wireAt(document.elements, 0);
      expect(wire.endArrow).toBe('stealth');
      expect(wire.startArrow).toBeUndefined();
      expect(wire.stroke).toEqual({ width: '2pt', style: 'dashed', color: 'rgb(0,0,255)' });
    });

    it('closes filled paths with cycle', () => {
      const { document } = convert('\\fill[fill={rgb,255:red,255;green,0;blue,0}] (0,0) -- (1,0) -- (1,1) -- cycle;');
      const wire = wireAt(document.elements, 0);
      expect(wire.points).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 1, y: 1 },
        { x: 0, y: 0 },
      ]);
      expect(wire.stroke).toBeUndefined();
      expect(wire.fill).toEqual({ color: 'rgb(255,0,0)' });
    });

    it('attaches inline nodes to the preceding point', () => {
      const { document } = convert('\\draw (0,0) node[left] {in} -- (1,0) node[right] {out};');
      expect(wireAt(document.elements, 0).labels).toEqual([
        { point: 0, options: { left: true }, label: { text: 'in', raw: 'in' } },
        { point: 1, options: { right: true }, label: { text: 'out', raw: 'out' } },
      ]);
    });
  });

  describe('nodes', () => {
    it('converts a named node', () => {
      const { document } = convert('\\node (A) at (0,0) {in};');
      expect(document.elements).toEqual([
        {
          id: 'node-1',
          type: 'node',
          name: 'A',
          qualifiedName: 'A',
          position: { x: 0, y: 0 },
          options: {},
          label: { text: 'in', raw: 'in' },
          annotations: [],
        },
      ]);
    });

    it('reads shape and size', () => {
      const { document } = convert('\\node[draw, rectangle, minimum width=2cm, minimum height=1cm] at (0,0) {Box};');
      const node = nodeAt(document.elements, 0);
      expect(node.shape).toBe('rect');
      expect(node.size).toEqual({ x: 2, y: 1 });
    });

    it('chains annotations and their names', () => {
      const { document, diagnostics } = convert(
        '\\node (A) at (0,0) {main} node[above] (B) at (0,1) {top};\n\\draw (B) -- (1,1);',
      );
      expect(diagnostics).toEqual([]);
      expect(nodeAt(document.elements, 0).annotations).toEqual([
        { position: { x: 0, y: 1 }, options: { above: true }, name: 'B', label: { text: 'top', raw: 'top' } },
      ]);
      expect(wireAt(document.elements, 1).points[0]).toEqual({ x: 0, y: 1 });
    });
  });

  describe('coordinates', () => {
    it('registers a node name given in the options', () => {
      const { document, diagnostics } = convert('\\node[draw, name=A] at (1,1) {x};\n\\draw (A) -- (2,0);');
      expect(diagnostics).toEqual([]);
      expect(nodeAt(document.elements, 0).name).toBe('A');
      expect(wireAt(document.elements, 1).points[0]).toEqual({ x: 1, y: 1 });
    });

    it('registers chained node names given in the options', () => {
      const { document, diagnostics } = convert(
        '\\node (A) at (0,0) {a} node[name=B] at (2,1) {b};\n\\draw (B) -- (0,0);',
      );
      expect(diagnostics).toEqual([]);
      expect(wireAt(document.elements, 1).points[0]).toEqual({ x: 2, y: 1 });
    });

    it('keeps a semicolon after a bracket in node text', () => {
      const { document, diagnostics } = convert('\\node at (0,0) {$(0,1]$; x};');
      expect(diagnostics).toEqual([]);
      expect(nodeAt(document.elements, 0).label?.raw).toBe('$(0,1]$; x');
    });

    it('resolves long name chains', () => {
      const lines = ['\\coordinate (c0) at (0,0);'];
      for (let i = 1; i < 20000; i++) {
        lines.push(`\\coordinate (c${i}) at ([xshift=1mm]c${i - 1});`);
      }
      lines.push('\\draw (c19999) -- (0,1);');

      const { document, diagnostics } = convert(lines.join('\n'));
      expect(diagnostics).toEqual([]);
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 1999.9, y: 0 },
        { x: 0, y: 1 },
      ]);
    });

    it('resolves a node name used later', () => {
      const { document } = convert('\\node (A) at (0,0) {in};\n\\draw (A) -- (2,0);');
      expect(document.elements).toHaveLength(2);
      expect(wireAt(document.elements, 1).points[0]).toEqual({ x: 0, y: 0 });
    });

    it('resolves names defined further down', () => {
      const { document, diagnostics } = convert(
        '\\draw (A) -- (B);\n\\coordinate (A) at (1,0);\n\\coordinate (B) at (1,1);',
      );
      expect(diagnostics).toEqual([]);
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 1, y: 0 },
        { x: 1, y: 1 },
      ]);
    });

    it('chains relative coordinates from the previous point', () => {
      const { document } = convert('\\draw (1,1) -- +(1,0) -- ++(0,2);');
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 1, y: 1 },
        { x: 2, y: 1 },
        { x: 2, y: 3 },
      ]);
    });

    it('chains relative coordinates from a name', () => {
      const { document } = convert('\\coordinate (A) at (1,1);\n\\draw (A) -- ++(1,0) -- ++(0,2);');
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 1, y: 1 },
        { x: 2, y: 1 },
        { x: 2, y: 3 },
      ]);
    });

    it('converts units to centimetres', () => {
      const { document } = convert('\\draw (0,0) -- (10mm, 72.27pt) -- (90:2);');
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 2.54 },
        { x: 0, y: 2 },
      ]);
    });

    it('combines perpendicular coordinates', () => {
      const { document } = convert(
        '\\coordinate (A) at (1,2);\n\\coordinate (B) at (3,4);\n\\draw (A -| B) -- (A |- B);',
      );
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 3, y: 2 },
        { x: 1, y: 4 },
      ]);
    });

    it('applies shifts and ignores anchors', () => {
      const { document } = convert(
        '\\coordinate (A) at (1,1);\n\\draw ([xshift=1cm]A) -- ([yshift=-5mm]A.north) -- (A.south);',
      );
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 2, y: 1 },
        { x: 1, y: 0.5 },
        { x: 1, y: 1 },
      ]);
    });

    it('defines inline coordinates', () => {
      const { document } = convert('\\draw (0,0) -- (2,0) coordinate (M);\n\\draw (M) -- (2,2);');
      expect(wireAt(document.elements, 1).points[0]).toEqual({ x: 2, y: 0 });
    });
  });

  describe('diagnostics', () => {
    it('reports an unterminated option block once', () => {
      const { document, diagnostics } = convert('\\draw (0,0) to[R (2,0);');
      expect(document.elements).toEqual([]);
      expect(diagnostics).toEqual([
        {
          code: 'lex-error',
          severity: 'error',
          statementIndex: 0,
          offset: 14,
          line: 1,
          column: 14,
          message: 'Unterminated option block',
        },
      ]);
    });

    it('keeps converting after a broken statement', () => {
      const { document, diagnostics } = convert('\\draw (0,0) to[R (2,0);\n\\draw (0,0) -- (1,0);');
      expect(diagnostics).toHaveLength(1);
      expect(document.elements).toHaveLength(1);
      expect(wireAt(document.elements, 0).id).toBe('wire-1');
    });

    it('reports unresolved names at the statement', () => {
      const { document, diagnostics } = convert('\\draw (0,0) -- (1,0);\n\\draw (0,0) -- (X);');
      expect(document.elements).toHaveLength(1);
      expect(diagnostics).toEqual([
        {
          code: 'unresolved-reference',
          severity: 'error',
          statementIndex: 1,
          offset: 22,
          line: 2,
          column: 0,
          message: "Unresolved coordinate reference 'X'",
        },
      ]);
    });

    it('warns about duplicate names and uses the last one', () => {
      const { document, diagnostics } = convert(
        '\\coordinate (A) at (0,0);\n\\coordinate (A) at (1,0);\n\\draw (A) -- (2,0);',
      );
      expect(diagnostics).toEqual([
        {
          code: 'duplicate-name',
          severity: 'warning',
          statementIndex: 1,
          offset: 26,
          line: 2,
          column: 0,
          message: "Duplicate name 'A' replaces the definition at line 1, column 0",
        },
      ]);
      expect(wireAt(document.elements, 0).points[0]).toEqual({ x: 1, y: 0 });
    });

    it('reports names defined through each other as unresolved', () => {
      const { document, diagnostics } = convert(
        '\\coordinate (A) at (B);\n\\coordinate (B) at (A);\n\\draw (A) -- (1,1);',
      );
      expect(document.elements).toEqual([]);
      expect(diagnostics.map(({ code, statementIndex, message }) => ({ code, statementIndex, message }))).toEqual([
        { code: 'unresolved-reference', statementIndex: 2, message: "Unresolved coordinate reference 'A'" },
      ]);
    });

    it('warns about unsupported statements', () => {
      const { diagnostics } = convert('\\draw (0,0) circle (1);');
      expect(diagnostics).toEqual([
        {
          code: 'unrecognized-statement',
          severity: 'warning',
          statementIndex: 0,
          offset: 0,
          line: 1,
          column: 0,
          message: "Unsupported construct 'circle'",
        },
      ]);
    });

    it('reports path shape errors', () => {
      const messages = (text: string) => convert(text).diagnostics.map((d) => `${d.code}: ${d.message}`);
      expect(messages('\\draw -- (1,0);')).toEqual(["build-error: Path operator '--' has no starting point"]);
      expect(messages('\\draw (0,0) -- (1,0) --;')).toEqual(["build-error: Path ends with a dangling '--'"]);
      expect(messages('\\node at (0,0);')).toEqual(['build-error: Node without text']);
      expect(messages('\\coordinate at (1,1);')).toEqual(['build-error: Coordinate without a name']);
      expect(messages('\\draw +(1,0) -- (2,0);')).toEqual([
        'build-error: Relative coordinate has no preceding point',
      ]);
      expect(messages('\\draw (0,0) -- ($(A)!0.5!(B)$);')).toEqual([
        "build-error: Unsupported coordinate '($(A)!0.5!(B)$)'",
      ]);
    });

    it('drops the names of a rejected statement', () => {
      const { diagnostics } = convert(
        '\\draw (0,0) to[R, name=R1] (2,0) -- (3,0) to[flux] (4,0);\n\\draw (R1) -- (0,0);',
      );
      expect(diagnostics.map((d) => d.message)).toEqual([
        "Unknown component 'flux'",
        "Unresolved coordinate reference 'R1'",
      ]);
    });
  });

  describe('documents', () => {
    it('returns an empty document for an empty body', () => {
      expect(convert('')).toEqual({
        document: {
          version: '0.1',
          units: 'cm',
          bounds: { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 },
          elements: [],
        },
        diagnostics: [],
      });
    });

    it('numbers elements per type', () => {
      const { document } = convert(
        [
          '\\node (A) at (0,0) {a};',
          '\\draw (0,0) to[R] (1,0);',
          '\\draw (0,0) -- (1,0) to[C] (1,1);',
          '\\begin{scope}',
          '\\node at (2,2) {b};',
          '\\end{scope}',
        ].join('\n'),
      );
      const ids: string[] = [];
      const collect = (elements: ElementRecord[]): void => {
        for (const element of elements) {
          ids.push(element.id);
          if (element.type === 'wire') ids.push(...element.components.map((component) => component.id));
          if (element.type === 'group') collect(element.elements);
        }
      };
      collect(document.elements);
      expect(ids).toEqual(['node-1', 'component-1', 'wire-1', 'component-2', 'group-1', 'node-2']);
    });

    it('computes bounds over every point', () => {
      const { document } = convert('\\draw (-1,0) -- (2,0);\n\\node at (0,3) {x};');
      expect(document.bounds).toEqual({ minX: -1, minY: 0, maxX: 2, maxY: 3, width: 3, height: 3 });
    });

    it('converts to editor pixels', () => {
      const { document } = convert('\\draw (0,0) -- (1,2);\n\\node[minimum width=1cm] at (0,0) {x};', {
        units: 'px',
      });
      expect(document.units).toBe('px');
      expect(wireAt(document.elements, 0).points).toEqual([
        { x: 0, y: 0 },
        { x: 37.795, y: -75.591 },
      ]);
      expect(nodeAt(document.elements, 1).size).toEqual({ x: 38.884, y: 38.884 });
      expect(document.bounds).toEqual({
        minX: 0,
        minY: -75.591,
        maxX: 37.795,
        maxY: 0,
        width: 37.795,
        height: 75.591,
      });
    });

    it('rejects statements over the length limit', () => {
      const { diagnostics } = convert('\\draw (0,0) -- (1,0);', { limits: { maxStatementLength: 5 } });
      expect(diagnostics.map((d) => d.message)).toEqual(['Statement exceeds maximum length of 5 characters']);
    });
  });
});
