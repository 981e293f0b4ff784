import { LOG_LEVELS } from '@ctz/logger';
import { type Command, Option } from 'commander';

/**
 * Options both commands accept
 */
export function withSharedOptions(command: Command): Command {
  return command
    .argument('[paths...]', 'Files or directories to convert', ['.'])
    .addOption(new Option('--units <units>', 'Output coordinate units').choices(['cm', 'px']))
    .option('--strict', 'Treat warnings as errors')
    .addOption(new Option('--format <type>', 'Output format').choices(['pretty', 'json']).default('pretty'))
    .option('--quiet', 'Only output on errors')
    .option('--no-color', 'Disable colored output')
    .addOption(new Option('--log-level <level>', 'Minimum log level').choices(LOG_LEVELS));
}
