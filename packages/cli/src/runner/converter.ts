import type { Logger } from '@ctz/logger';
import { type CoordinateUnits, convertSource, type Diagnostic } from '@ctz/markup';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { discoverFiles, outputPathFor } from './discovery.js';

export interface ConvertRunOptions {
  units: CoordinateUnits;
  /** Write outputs here instead of beside the inputs */
  outDir?: string;
  /** false for a check run */
  write: boolean;
}

export interface FileResult {
  path: string;
  /** Written JSON file, null when nothing was written */
  output: string | null;
  /** Top-level elements of the converted document */
  elements: number;
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export interface RunSummary {
  results: FileResult[];
  missing: string[];
  errors: number;
  warnings: number;
}

export interface RunContext {
  logger: Logger;
  cwd: string;
}

/**
 * Convert one file, writing its JSON unless this is a check run
 */
export async function convertFile(
  file: string,
  options: ConvertRunOptions,
  logger: Logger,
): Promise<FileResult> {
  const source = await readFile(file, 'utf-8');
  const { document, diagnostics, environment } = convertSource(source, { units: options.units });

  let output: string | null = null;
  if (options.write && environment !== null) {
    output = outputPathFor(file, options.outDir);
    await mkdir(path.dirname(output), { recursive: true });
    await writeFile(output, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  }

  const result: FileResult = {
    path: file,
    output,
    elements: document.elements.length,
    errors: diagnostics.filter((d) => d.severity === 'error'),
    warnings: diagnostics.filter((d) => d.severity === 'warning'),
  };

  logger.info(options.write ? 'file_converted' : 'file_checked', {
    path: file,
    output,
    elements: result.elements,
    errors: result.errors.length,
    warnings: result.warnings.length,
  });
  return result;
}

/**
 * Discover and convert files one after another
 */
export async function convertFiles(
  paths: string[],
  options: ConvertRunOptions,
  context: RunContext,
): Promise<RunSummary> {
  const { files, missing } = await discoverFiles(paths, context.cwd);
  for (const p of missing) {
    context.logger.warn('path_not_found', { path: p });
  }
  context.logger.debug('files_discovered', { count: files.length });

  const outDir = options.outDir === undefined ? undefined : path.resolve(context.cwd, options.outDir);
  const results: FileResult[] = [];
  for (const file of files) {
    const logger = context.logger.child({ file });
    results.push(await convertFile(file, { ...options, outDir }, logger));
    await logger.flush();
  }

  return {
    results,
    missing,
    errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
  };
}

/**
 * Exit code for a finished run: 1 when any file has errors, or warnings
 * under strict mode
 */
export function getExitCode(summary: RunSummary, strict: boolean = false): number {
  const hasErrors = summary.errors > 0 || (strict && summary.warnings > 0);
  return hasErrors ? 1 : 0;
}
