/**
 * ctz convert command
 */

import { Command } from 'commander';
import { withSharedOptions } from './options.js';
import { type CommandOptions, runCommand } from './run.js';

export const convertCommand = withSharedOptions(
  new Command('convert').description('Convert drawing markup files to editor JSON'),
)
  .option('-o, --out-dir <dir>', 'Write JSON files to this directory instead of beside the inputs')
  .action(async (paths: string[], options: CommandOptions) => {
    process.exitCode = await runCommand('convert', paths, options);
  });
