import type { Label } from '../types/elements.js';
import { unwrapBraces } from './options.js';

const FONT_SIZE_PATTERN =
  /^\\(tiny|scriptsize|footnotesize|small|normalsize|large|Large|LARGE|huge|Huge)(?![A-Za-z])\s*/;

const TEXT_COLOR_PATTERN = /^\\textcolor\s*\{([^}]*)\}\s*([\s\S]*)$/;

const RGB_PATTERN = /rgb,255:red,(\d+);green,(\d+);blue,(\d+)/;

/**
 * Convert an editor colour spec (`rgb,255:red,R;green,G;blue,B`) to `rgb(R,G,B)`
 */
export function parseColor(spec: string): string | null {
  const m = RGB_PATTERN.exec(spec);
  return m ? `rgb(${m[1]},${m[2]},${m[3]})` : null;
}

/**
 * Replace `\\` line breaks outside math with newlines
 */
function collapseLineBreaks(text: string): string {
  let result = '';
  let inMath = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (char === '\\' && text[i + 1] === '\\' && !inMath) {
      result = result.trimEnd() + '\n';
      i++;
      while (i + 1 < text.length && (text[i + 1] === ' ' || text[i + 1] === '\t')) {
        i++;
      }
      continue;
    }

    if (char === '\\' && i + 1 < text.length) {
      result += char + text[i + 1];
      i++;
      continue;
    }

    if (char === '$') {
      inMath = !inMath;
    }
    result += char;
  }

  return result;
}

/**
 * Normalise label text
 *
 * @example
 * ```ts
 * normalizeLabel('\\small A \\\\ $e_t$')
 * // => { text: 'A\n$e_t$', raw: '\\small A \\\\ $e_t$', fontSize: 'small' }
 * ```
 */
export function normalizeLabel(raw: string, otherSide = false): Label {
  let text = raw.trim();
  const label: Label = { text, raw };

  const colored = TEXT_COLOR_PATTERN.exec(text);
  if (colored) {
    const color = parseColor(colored[1]);
    if (color) {
      label.color = color;
    }
    text = unwrapBraces(colored[2].trim());
  }

  const sized = FONT_SIZE_PATTERN.exec(text);
  if (sized) {
    label.fontSize = sized[1];
    text = text.slice(sized[0].length);
  }

  label.text = collapseLineBreaks(text).trim();
  if (otherSide) {
    label.otherSide = true;
  }
  return label;
}
