import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { defaultLibrary, loadComponentLibrary, segmentTarget } from '../src/components/library.js';

describe('ComponentLibrary', () => {
  it('loads the bundled components', () => {
    expect(defaultLibrary.entries).toHaveLength(101);
  });

  it('looks up names and aliases', () => {
    expect(defaultLibrary.lookup('resistor')?.name).toBe('R');
    expect(defaultLibrary.lookup(' C ')?.category).toBe('capacitor');
    expect(defaultLibrary.lookup('short')).toBeNull();
  });

  it('tells bipoles from node-style parts', () => {
    expect(defaultLibrary.isBipole('battery')).toBe(true);
    expect(defaultLibrary.isBipole('ground')).toBe(false);
  });

  it('finds node-style parts among flags', () => {
    expect(defaultLibrary.findNodeComponent({ anchor: 'west', npn: true })?.name).toBe('npn');
    expect(defaultLibrary.findNodeComponent({ ground: 'x' })).toBeNull();
    expect(defaultLibrary.findNodeComponent({ R: true })).toBeNull();
  });

  it('rejects malformed entries', () => {
    expect(() => loadComponentLibrary([{ name: 'X', kind: 'tripole', category: 'c' }])).toThrow(ZodError);
    expect(() => loadComponentLibrary({ name: 'X' })).toThrow(ZodError);
  });
});

describe('segmentTarget', () => {
  it('treats empty option blocks as wires', () => {
    expect(segmentTarget({}, defaultLibrary)).toEqual({ kind: 'wire' });
  });

  it('decides by the leading key', () => {
    const target = segmentTarget({ R: true, l: '$R_1$' }, defaultLibrary);
    expect(target.kind).toBe('component');
    if (target.kind !== 'component') return;
    expect(target.key).toBe('R');
    expect(target.entry.name).toBe('R');
  });

  it('keeps styled segments as wires', () => {
    expect(segmentTarget({ short: true, '-*': true }, defaultLibrary)).toEqual({ kind: 'wire' });
    expect(segmentTarget({ '*-o': true }, defaultLibrary)).toEqual({ kind: 'wire' });
    expect(segmentTarget({ color: 'red' }, defaultLibrary)).toEqual({ kind: 'wire' });
    expect(segmentTarget({ thick: true, R: true }, defaultLibrary)).toEqual({ kind: 'wire' });
  });

  it('reports unknown and node-style keys', () => {
    expect(segmentTarget({ flux: true }, defaultLibrary)).toEqual({
      kind: 'unknown',
      name: 'flux',
      reason: "Unknown component 'flux'",
    });
    expect(segmentTarget({ ground: true }, defaultLibrary)).toEqual({
      kind: 'unknown',
      name: 'ground',
      reason: "'ground' is not a two-terminal component",
    });
  });
});
