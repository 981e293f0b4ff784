import { describe, expect, it } from 'vitest';
import { parseColor, normalizeLabel } from '../src/options/label.js';
import { formatOptions, mergeOptions, parseOptions, splitTopLevel, unwrapBraces } from '../src/options/options.js';
import type { OptionSet } from '../src/options/options.js';

describe('parseOptions', () => {
  it('parses flags and assignments', () => {
    expect(parseOptions('R, l_={$R_1$}, mirror')).toEqual({ R: true, l_: '$R_1$', mirror: true });
  });

  it('keeps coordinate values whole', () => {
    expect(parseOptions('shift={(1,1)}, name=amp')).toEqual({ shift: '(1,1)', name: 'amp' });
  });

  it('keeps colour specs whole', () => {
    expect(parseOptions('draw={rgb,255:red,10;green,20;blue,30}')).toEqual({
      draw: 'rgb,255:red,10;green,20;blue,30',
    });
  });

  it('splits braced lists', () => {
    expect(parseOptions('foo={a, b}')).toEqual({ foo: ['a', 'b'] });
  });

  it('keeps math values whole', () => {
    expect(parseOptions('x=$a,b$')).toEqual({ x: '$a,b$' });
  });

  it('lets the last duplicate win', () => {
    expect(parseOptions('color=red, color=blue')).toEqual({ color: 'blue' });
  });

  it('splits on the first top-level equals sign', () => {
    expect(parseOptions('l={$a=b$}')).toEqual({ l: '$a=b$' });
    expect(parseOptions('dash pattern=on 2pt off 1pt')).toEqual({ 'dash pattern': 'on 2pt off 1pt' });
  });

  it('returns an empty set for empty content', () => {
    expect(parseOptions('  ')).toEqual({});
  });
});

describe('splitTopLevel', () => {
  it('ignores separators inside groups and math', () => {
    expect(splitTopLevel('a, {b, c}, [d, e], $f, g$', ',')).toEqual(['a', '{b, c}', '[d, e]', '$f, g$']);
  });

  it('keeps coordinates whole', () => {
    expect(splitTopLevel('(1,1), b', ',')).toEqual(['(1,1)', 'b']);
  });

  it('ignores stray closing parentheses', () => {
    expect(splitTopLevel('a), b', ',')).toEqual(['a)', 'b']);
  });
});

describe('unwrapBraces', () => {
  it('removes one wrapping pair', () => {
    expect(unwrapBraces('{ab}')).toBe('ab');
    expect(unwrapBraces('{{ab}}')).toBe('{ab}');
  });

  it('leaves adjacent groups alone', () => {
    expect(unwrapBraces('{a}{b}')).toBe('{a}{b}');
  });
});

describe('mergeOptions', () => {
  it('moves overridden keys to the end', () => {
    const merged = mergeOptions({ a: '1', b: true }, { a: '2' });
    expect(merged).toEqual({ a: '2', b: true });
    expect(Object.keys(merged)).toEqual(['b', 'a']);
  });
});

describe('formatOptions', () => {
  it('renders flags and values', () => {
    expect(formatOptions({ R: true, l: '$R_1$', name: 'x y' })).toBe('R, l=$R_1$, name=x y');
  });

  it('braces values that would not parse back', () => {
    expect(formatOptions({ l: 'a, b', x: '', foo: ['a', 'b'] })).toBe('l={a, b}, x={}, foo={a, b}');
  });

  it('round-trips through parseOptions', () => {
    const options: OptionSet = { R: true, l: 'a, b', 'line width': '1pt' };
    expect(parseOptions(formatOptions(options))).toEqual(options);
  });
});

describe('normalizeLabel', () => {
  it('extracts font size and line breaks', () => {
    expect(normalizeLabel('\\small A \\\\ $e_t$')).toEqual({
      text: 'A\n$e_t$',
      raw: '\\small A \\\\ $e_t$',
      fontSize: 'small',
    });
  });

  it('extracts text colour', () => {
    const raw = '\\textcolor{rgb,255:red,255;green,0;blue,0}{R1}';
    expect(normalizeLabel(raw)).toEqual({ text: 'R1', raw, color: 'rgb(255,0,0)' });
  });

  it('keeps line breaks inside math', () => {
    expect(normalizeLabel('$a \\\\ b$').text).toBe('$a \\\\ b$');
  });

  it('marks labels on the other side', () => {
    expect(normalizeLabel(' x ', true)).toEqual({ text: 'x', raw: ' x ', otherSide: true });
  });
});

describe('parseColor', () => {
  it('converts editor colour specs', () => {
    expect(parseColor('rgb,255:red,1;green,2;blue,3')).toBe('rgb(1,2,3)');
  });

  it('returns null for named colours', () => {
    expect(parseColor('red')).toBeNull();
  });
});
