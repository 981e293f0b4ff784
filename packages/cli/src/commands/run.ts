import type { LogLevel } from '@ctz/logger';
import type { CoordinateUnits } from '@ctz/markup';
import { type CliConfig, loadConfig } from '../config.js';
import { createCliLogger } from '../logging.js';
import { convertFiles, getExitCode, reportResults } from '../runner/index.js';

export type CommandMode = 'convert' | 'check';

/** Parsed command-line options shared by both commands */
export interface CommandOptions {
  units?: CoordinateUnits;
  outDir?: string;
  strict?: boolean;
  format: 'pretty' | 'json';
  quiet?: boolean;
  color: boolean;
  logLevel?: LogLevel;
}

export interface CommandContext {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a command to completion and return its exit code
 *
 * Flags override configuration. Exit codes: 0 clean, 1 when a file has
 * errors (or warnings with `strict`), 2 when the run itself failed.
 */
export async function runCommand(
  mode: CommandMode,
  paths: string[],
  options: CommandOptions,
  context: CommandContext = {},
): Promise<number> {
  const cwd = context.cwd ?? process.cwd();

  let config: CliConfig;
  try {
    config = loadConfig(cwd, context.env);
  } catch (error) {
    console.error('Error:', errorMessage(error));
    return 2;
  }

  const logger = createCliLogger({ ...config, logLevel: options.logLevel ?? config.logLevel }, cwd);
  try {
    const summary = await convertFiles(
      paths,
      {
        units: options.units ?? config.units,
        outDir: mode === 'convert' ? (options.outDir ?? config.outDir) : undefined,
        write: mode === 'convert',
      },
      { logger, cwd },
    );

    reportResults(summary, { format: options.format, quiet: options.quiet, noColor: !options.color });
    return getExitCode(summary, options.strict);
  } catch (error) {
    logger.fatal('command_failed', { command: mode, error });
    console.error('Error:', errorMessage(error));
    return 2;
  } finally {
    await logger.flush();
  }
}
