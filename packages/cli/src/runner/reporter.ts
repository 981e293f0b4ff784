/**
 * Run result reporter
 */

import type { Diagnostic } from '@ctz/markup';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { FileResult, RunSummary } from './converter.js';

export interface ReporterOptions {
  format: 'pretty' | 'json';
  quiet?: boolean;
  noColor?: boolean;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`;
}

function location(diagnostic: Diagnostic): string {
  return `Line ${diagnostic.line}:${diagnostic.column + 1}`;
}

function reportFile(result: FileResult, c: ChalkInstance): void {
  console.log();
  console.log(`  ${result.path}`);

  if (result.errors.length === 0 && result.warnings.length === 0) {
    console.log(`    ${c.green('✓')} No issues`);
  }

  for (const error of result.errors) {
    console.log(`    ${c.red('✗')} error  ${location(error)}: ${error.message}`);
  }

  for (const warning of result.warnings) {
    console.log(`    ${c.yellow('⚠')} warn   ${location(warning)}: ${warning.message}`);
  }

  if (result.output !== null) {
    console.log(c.gray(`    → ${result.output} (${plural(result.elements, 'element')})`));
  }
}

/**
 * Report results in pretty format
 */
function reportPretty(summary: RunSummary, options: ReporterOptions): void {
  const c = options.noColor ? new Chalk({ level: 0 }) : chalk;

  for (const p of summary.missing) {
    console.error(`Path not found: ${p}`);
  }

  if (summary.results.length === 0) {
    if (!options.quiet) {
      console.log('No input files found');
    }
    return;
  }

  for (const result of summary.results) {
    const hasIssues = result.errors.length > 0 || result.warnings.length > 0;
    if (options.quiet && !hasIssues) continue;
    reportFile(result, c);
  }

  if (options.quiet && summary.errors === 0 && summary.warnings === 0) {
    return;
  }

  console.log();
  if (summary.errors === 0 && summary.warnings === 0) {
    console.log(c.green(`  ✓ All ${plural(summary.results.length, 'file')} passed`));
  } else {
    console.log(
      c.gray(
        `  Found ${plural(summary.errors, 'error')} and ${plural(summary.warnings, 'warning')} in ${plural(summary.results.length, 'file')}`,
      ),
    );
  }
  console.log();
}

function diagnosticJson(d: Diagnostic) {
  return {
    line: d.line,
    column: d.column + 1,
    severity: d.severity,
    code: d.code,
    message: d.message,
  };
}

/**
 * Report results in JSON format
 */
function reportJson(summary: RunSummary): void {
  const output = {
    files: summary.results.map((r) => ({
      path: r.path,
      output: r.output,
      elements: r.elements,
      errors: r.errors.map(diagnosticJson),
      warnings: r.warnings.map(diagnosticJson),
    })),
    missing: summary.missing,
    summary: {
      files: summary.results.length,
      errors: summary.errors,
      warnings: summary.warnings,
    },
  };

  console.log(JSON.stringify(output, null, 2));
}

/**
 * Report a finished run
 */
export function reportResults(summary: RunSummary, options: ReporterOptions): void {
  if (options.format === 'json') {
    reportJson(summary);
  } else {
    reportPretty(summary, options);
  }
}
