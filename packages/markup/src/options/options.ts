/**
 * Option lists: the `[key=value, flag, ...]` part of a statement
 */

export type OptionValue = true | string | OptionValue[];

/**
 * Option key to value. Keys are case-sensitive; the last duplicate wins.
 */
export type OptionSet = Record<string, OptionValue>;

/** Keys whose values are free text, never split into lists */
const LABEL_KEY_PATTERN = /^(?:[lavif]2?[_^<>]*|label|pin|name|text)$/;

const COLOR_SPEC_PATTERN = /^(?:rgb|RGB|cmyk|cmy|gray|HTML|wave)\s*[,:]/;

/**
 * Split on a separator that sits outside braces, brackets and `$..$` math
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;
  let parens = 0;
  let inMath = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (char === '\\' && i + 1 < text.length) {
      current += char + text[i + 1];
      i++;
      continue;
    }

    if (char === '$') {
      inMath = !inMath;
    } else if (char === '{' || (!inMath && char === '[')) {
      depth++;
    } else if (char === '}' || (!inMath && char === ']')) {
      depth--;
    } else if (!inMath && char === '(') {
      parens++;
    } else if (!inMath && char === ')' && parens > 0) {
      parens--;
    } else if (char === separator && depth === 0 && parens === 0 && !inMath) {
      parts.push(current);
      current = '';
      continue;
    }

    current += char;
  }

  parts.push(current);
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Index of the first `=` outside braces, brackets and math, or -1
 */
function findAssignment(entry: string): number {
  let depth = 0;
  let inMath = false;

  for (let i = 0; i < entry.length; i++) {
    const char = entry[i];
    if (char === '\\') {
      i++;
    } else if (char === '$') {
      inMath = !inMath;
    } else if (char === '{' || char === '[') {
      depth++;
    } else if (char === '}' || char === ']') {
      depth--;
    } else if (char === '=' && depth === 0 && !inMath) {
      return i;
    }
  }

  return -1;
}

/**
 * Remove one pair of braces wrapping the whole value
 */
export function unwrapBraces(value: string): string {
  if (!value.startsWith('{') || !value.endsWith('}')) {
    return value;
  }

  let depth = 0;
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '\\') {
      i++;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      // The opening brace closes before the end: `{a}{b}` is not wrapped
      if (depth === 0 && i < value.length - 1) {
        return value;
      }
    }
  }

  return value.slice(1, -1).trim();
}

function isMathRegion(value: string): boolean {
  return value.length >= 2 && value.startsWith('$') && value.endsWith('$');
}

function parseValue(raw: string, key: string): OptionValue {
  const value = unwrapBraces(raw);

  if (LABEL_KEY_PATTERN.test(key) || COLOR_SPEC_PATTERN.test(value) || isMathRegion(value)) {
    return value;
  }

  const items = splitTopLevel(value, ',');
  if (items.length >= 2) {
    return items.map((item) => parseValue(item, ''));
  }

  return value;
}

/**
 * Parse the content of an option block (without the brackets)
 *
 * @example
 * ```ts
 * parseOptions('R, l_={$R_1$}, mirror')
 * // => { R: true, l_: '$R_1$', mirror: true }
 * ```
 */
export function parseOptions(content: string): OptionSet {
  const entries = new Map<string, OptionValue>();

  for (const entry of splitTopLevel(content, ',')) {
    const eqIndex = findAssignment(entry);
    if (eqIndex === -1) {
      entries.set(entry, true);
      continue;
    }

    const key = entry.slice(0, eqIndex).trim();
    const value = entry.slice(eqIndex + 1).trim();
    entries.set(key, parseValue(value, key));
  }

  return Object.fromEntries(entries);
}

/**
 * Merge option sets left to right; later keys win
 */
export function mergeOptions(...sets: OptionSet[]): OptionSet {
  const entries = new Map<string, OptionValue>();
  for (const set of sets) {
    for (const [key, value] of Object.entries(set)) {
      entries.delete(key);
      entries.set(key, value);
    }
  }
  return Object.fromEntries(entries);
}

/**
 * String value of an option, or null when missing or not a string
 */
export function optionString(options: OptionSet, key: string): string | null {
  const value = options[key];
  return typeof value === 'string' ? value : null;
}

export function hasFlag(options: OptionSet, key: string): boolean {
  return options[key] === true;
}

function formatValue(value: OptionValue): string {
  if (value === true) return '';
  if (Array.isArray(value)) {
    return `{${value.map(formatValue).join(', ')}}`;
  }
  const needsBraces =
    value.length === 0 || value !== value.trim() || /[,=[\]]/.test(value) || value.startsWith('{');
  return needsBraces ? `{${value}}` : value;
}

/**
 * Render an option set back to `key=value, flag` form
 */
export function formatOptions(options: OptionSet): string {
  return Object.entries(options)
    .map(([key, value]) => (value === true ? key : `${key}=${formatValue(value)}`))
    .join(', ');
}
