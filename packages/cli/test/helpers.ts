import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

export const RESISTOR = '\\begin{circuitikz}\n\\draw (0,0) to[R, l=$R_1$] (2,0);\n\\end{circuitikz}\n';
export const BROKEN = '\\begin{circuitikz}\n\\draw (0,0) to[R (2,0);\n\\end{circuitikz}\n';
export const UNSUPPORTED = '\\begin{circuitikz}\n\\draw (0,0) circle (1);\n\\end{circuitikz}\n';

/**
 * Temporary directory populated with the given files
 */
export async function createWorkspace(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(tmpdir(), 'ctz-cli-'));
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(root, name);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf-8');
  }
  return root;
}

export async function removeWorkspace(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * Lines written through console.log, with a spy already installed
 */
export function printedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((args) => args.map(String).join(' '));
}
