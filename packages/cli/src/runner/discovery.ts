import { glob } from 'glob';
import { stat } from 'node:fs/promises';
import * as path from 'node:path';

export const INPUT_PATTERN = '**/*.tex';
export const IGNORED = ['**/node_modules/**', '**/dist/**'];

export interface DiscoveredFiles {
  /** Absolute paths, in argument order, directories expanded in sorted order */
  files: string[];
  /** Arguments that matched nothing on disk */
  missing: string[];
}

/**
 * Expand file and directory arguments into input files
 */
export async function discoverFiles(paths: string[], cwd: string): Promise<DiscoveredFiles> {
  const files: string[] = [];
  const missing: string[] = [];
  const seen = new Set<string>();

  const add = (file: string) => {
    if (!seen.has(file)) {
      seen.add(file);
      files.push(file);
    }
  };

  for (const p of paths) {
    const resolved = path.resolve(cwd, p);
    const stats = await stat(resolved).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    });

    if (stats === null) {
      missing.push(p);
    } else if (stats.isFile()) {
      add(resolved);
    } else if (stats.isDirectory()) {
      const found = await glob(INPUT_PATTERN, { cwd: resolved, absolute: true, nodir: true, ignore: IGNORED });
      found.sort().forEach(add);
    }
  }

  return { files, missing };
}

/**
 * Where the JSON for an input file goes
 *
 * @example
 * ```ts
 * outputPathFor('/c/input-rc.tex'); // '/c/output-rc.json'
 * outputPathFor('/c/amp.tex', '/out'); // '/out/amp.json'
 * ```
 */
export function outputPathFor(input: string, outDir?: string): string {
  const parsed = path.parse(input);
  const base = parsed.ext.toLowerCase() === '.tex' ? parsed.name : parsed.base;
  const name = base.startsWith('input-') ? `output-${base.slice('input-'.length)}` : base;
  return path.join(outDir ?? parsed.dir, `${name}.json`);
}
