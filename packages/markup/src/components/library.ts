import { z } from 'zod';
import type { OptionSet } from '../options/options.js';
import libraryData from './library.json' with { type: 'json' };

export const ComponentEntrySchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['bipole', 'node']),
  category: z.string().min(1),
  aliases: z.array(z.string().min(1)).optional(),
});

export const ComponentLibrarySchema = z.array(ComponentEntrySchema);

export type ComponentEntry = z.infer<typeof ComponentEntrySchema>;

export type ComponentKind = ComponentEntry['kind'];

/** Path styles that keep a `to[..]` segment a plain wire */
const WIRE_STYLES: ReadonlySet<string> = new Set([
  'short',
  'open',
  'solid',
  'dashed',
  'dotted',
  'densely dashed',
  'loosely dashed',
  'densely dotted',
  'loosely dotted',
  'ultra thin',
  'very thin',
  'thin',
  'semithick',
  'thick',
  'very thick',
  'ultra thick',
]);

/**
 * Lookup table of supported circuit components
 */
export class ComponentLibrary {
  private readonly byName = new Map<string, ComponentEntry>();

  constructor(readonly entries: readonly ComponentEntry[]) {
    for (const entry of entries) {
      this.byName.set(entry.name, entry);
      for (const alias of entry.aliases ?? []) {
        this.byName.set(alias, entry);
      }
    }
  }

  /**
   * Find a component by name or alias
   */
  lookup(name: string): ComponentEntry | null {
    return this.byName.get(name.trim()) ?? null;
  }

  isBipole(name: string): boolean {
    return this.lookup(name)?.kind === 'bipole';
  }

  /**
   * The node-style component named by a flag in the options, if any
   */
  findNodeComponent(options: OptionSet): ComponentEntry | null {
    for (const [key, value] of Object.entries(options)) {
      if (value !== true) continue;
      const entry = this.lookup(key);
      if (entry?.kind === 'node') return entry;
    }
    return null;
  }
}

/**
 * Validate raw library data
 *
 * @throws {z.ZodError} When an entry is malformed
 */
export function loadComponentLibrary(data: unknown): ComponentLibrary {
  return new ComponentLibrary(ComponentLibrarySchema.parse(data));
}

export const defaultLibrary: ComponentLibrary = loadComponentLibrary(libraryData);

/**
 * What a `to[..]` segment draws
 */
export type SegmentTarget =
  | { kind: 'wire' }
  | { kind: 'component'; entry: ComponentEntry; key: string }
  | { kind: 'unknown'; name: string; reason: string };

/**
 * Decide what a `to[..]` option block draws from its leading key
 *
 * @example
 * ```ts
 * segmentTarget({ R: true, l: '$R_1$' }, defaultLibrary) // component R
 * segmentTarget({ short: true, '-*': true }, defaultLibrary) // wire
 * segmentTarget({ flux: true }, defaultLibrary) // unknown
 * ```
 */
export function segmentTarget(options: OptionSet, library: ComponentLibrary): SegmentTarget {
  const keys = Object.keys(options);
  if (keys.length === 0) {
    return { kind: 'wire' };
  }

  const key = keys[0];

  const entry = library.lookup(key);
  if (entry?.kind === 'bipole') {
    return { kind: 'component', entry, key };
  }
  if (entry) {
    return { kind: 'unknown', name: key, reason: `'${key}' is not a two-terminal component` };
  }

  // Valued keys (color=red, line width=1pt) and arrow or terminal markers style the wire
  if (options[key] !== true || WIRE_STYLES.has(key) || key.includes('-')) {
    return { kind: 'wire' };
  }

  return { kind: 'unknown', name: key, reason: `Unknown component '${key}'` };
}
