import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { discoverFiles, outputPathFor } from '../src/runner/discovery.js';
import { createWorkspace, RESISTOR, removeWorkspace } from './helpers.js';

describe('discoverFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace({
      'b.tex': RESISTOR,
      'a/input-rc.tex': RESISTOR,
      'a/notes.txt': 'not a drawing',
      'node_modules/pkg/x.tex': RESISTOR,
      'dist/y.tex': RESISTOR,
    });
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('expands directories, skipping ignored folders', async () => {
    const { files, missing } = await discoverFiles(['.'], root);
    expect(files).toEqual([path.join(root, 'a/input-rc.tex'), path.join(root, 'b.tex')]);
    expect(missing).toEqual([]);
  });

  it('keeps explicit files whatever their extension', async () => {
    const { files } = await discoverFiles(['a/notes.txt'], root);
    expect(files).toEqual([path.join(root, 'a/notes.txt')]);
  });

  it('lists each file once', async () => {
    const { files } = await discoverFiles(['b.tex', '.'], root);
    expect(files).toEqual([path.join(root, 'b.tex'), path.join(root, 'a/input-rc.tex')]);
  });

  it('reports missing paths', async () => {
    const { files, missing } = await discoverFiles(['nope', 'b.tex'], root);
    expect(files).toEqual([path.join(root, 'b.tex')]);
    expect(missing).toEqual(['nope']);
  });
});

describe('outputPathFor', () => {
  it('renames input- files to output-', () => {
    expect(outputPathFor('/c/input-rc.tex')).toBe('/c/output-rc.json');
  });

  it('replaces the .tex extension', () => {
    expect(outputPathFor('/c/amp.TEX')).toBe('/c/amp.json');
  });

  it('appends .json to other extensions', () => {
    expect(outputPathFor('/c/amp.txt')).toBe('/c/amp.txt.json');
  });

  it('writes under the output directory', () => {
    expect(outputPathFor('/c/input-rc.tex', '/out')).toBe('/out/output-rc.json');
  });
});
