/**
 * Stack services command - List the services of a deployed stack
 */

import type { Command } from 'commander';
import { expandFormat, prepareFormat, renderRows, selectFormat, SERVICE_ROWS } from '../../formatters';
import { getStackServices } from '../../services';
import type { CommandContext } from '../../utils/context';
import { ValidationError } from '../../utils/errors';
import { collect, parseFilters } from '../../utils/filters';
import { printLine, printRaw } from '../../utils/output';

export interface StackServicesOptions {
  quiet?: boolean;
  format?: string;
  filter: string[];
  trunc: boolean;
}

const USAGE = 'Usage: swarmctl stack services [OPTIONS] STACK';

export async function runStackServices(
  context: CommandContext,
  args: readonly string[],
  options: StackServicesOptions
): Promise<void> {
  if (args.length !== 1) {
    throw new ValidationError('"swarmctl stack services" requires exactly 1 argument.', USAGE);
  }
  const stackName = args[0] ?? '';
  if (stackName.trim() === '') {
    throw new ValidationError(`invalid stack name: "${stackName}"`, USAGE);
  }

  const filters = parseFilters(options.filter);
  if (!filters.success) {
    throw new ValidationError(filters.error);
  }

  const quiet = options.quiet ?? false;
  const configFormat = options.format ? undefined : context.configFile().services_format;
  const format = expandFormat(selectFormat(options.format, configFormat, quiet), SERVICE_ROWS, quiet);
  const prepared = prepareFormat(format, SERVICE_ROWS);

  const { services, status } = await context.progress(`Listing services of ${stackName}`, () =>
    getStackServices(context.client(), stackName, { filters: filters.data, withStatus: !quiet })
  );

  if (services.length === 0) {
    printLine(context.err, `Nothing found in stack: ${stackName}`);
    return;
  }

  const rows = services.map((service) => ({
    service,
    status: status?.get(service.id),
    truncate: options.trunc,
  }));
  printRaw(context.out, renderRows(prepared, SERVICE_ROWS, rows));
}

export function registerStackServicesCommand(parent: Command, context: CommandContext): void {
  parent
    .command('services')
    .description('List the services in the stack')
    .argument('[stack]', 'Stack name')
    .allowExcessArguments(true)
    .option('-q, --quiet', 'Only display IDs')
    .option('--format <template>', 'Format output using a custom template ("table", "raw" or a Docker format template)')
    .option('-f, --filter <filter>', 'Filter output based on conditions provided (name=value)', collect, [])
    .option('--no-trunc', 'Do not truncate output')
    .action(async (_stack: string | undefined, options: StackServicesOptions, command: Command) => {
      await runStackServices(context, command.args, options);
    });
}
