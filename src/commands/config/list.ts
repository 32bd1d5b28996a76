/**
 * Config list command - List swarm configs
 */

import type { Command } from 'commander';
import { CONFIG_ROWS, expandFormat, prepareFormat, renderRows, selectFormat } from '../../formatters';
import { listConfigs } from '../../services';
import type { CommandContext } from '../../utils/context';
import { ValidationError } from '../../utils/errors';
import { collect, parseFilters } from '../../utils/filters';
import { printRaw } from '../../utils/output';

export interface ConfigListOptions {
  quiet?: boolean;
  format?: string;
  filter: string[];
}

export async function runConfigList(
  context: CommandContext,
  args: readonly string[],
  options: ConfigListOptions
): Promise<void> {
  if (args.length > 0) {
    throw new ValidationError('"swarmctl config list" accepts no arguments.', 'Usage: swarmctl config ls [OPTIONS]');
  }

  const filters = parseFilters(options.filter);
  if (!filters.success) {
    throw new ValidationError(filters.error);
  }

  const quiet = options.quiet ?? false;
  const configFormat = options.format ? undefined : context.configFile().configs_format;
  const format = expandFormat(selectFormat(options.format, configFormat, quiet), CONFIG_ROWS, quiet);
  const prepared = prepareFormat(format, CONFIG_ROWS);

  const configs = await context.progress('Listing configs', () => listConfigs(context.client(), filters.data));
  printRaw(context.out, renderRows(prepared, CONFIG_ROWS, configs));
}

export function registerConfigListCommand(parent: Command, context: CommandContext): void {
  parent
    .command('list')
    .alias('ls')
    .description('List configs')
    .allowExcessArguments(true)
    .option('-q, --quiet', 'Only display IDs')
    .option('--format <template>', 'Format output using a custom template ("table", "raw" or a Docker format template)')
    .option('-f, --filter <filter>', 'Filter output based on conditions provided (name=value)', collect, [])
    .action(async (options: ConfigListOptions, command: Command) => {
      await runConfigList(context, command.args, options);
    });
}
