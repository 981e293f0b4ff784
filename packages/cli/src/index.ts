/**
 * ctz CLI - CircuiTikZ markup to editor JSON
 */

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { convertCommand } from './commands/convert.js';

const program = new Command();

program.name('ctz').description('Convert CircuiTikZ drawings to circuit editor JSON').version('0.1.0');

// Register commands
program.addCommand(convertCommand);
program.addCommand(checkCommand);

await program.parseAsync();
