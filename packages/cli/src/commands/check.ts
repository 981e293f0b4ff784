/**
 * ctz check command
 *
 * Converts like `convert` and reports diagnostics without writing anything.
 */

import { Command } from 'commander';
import { withSharedOptions } from './options.js';
import { type CommandOptions, runCommand } from './run.js';

export const checkCommand = withSharedOptions(
  new Command('check').description('Check files for errors and warnings'),
).action(async (paths: string[], options: CommandOptions) => {
  process.exitCode = await runCommand('check', paths, options);
});
