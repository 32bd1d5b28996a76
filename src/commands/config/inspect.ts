/**
 * Config inspect command - Show one or more configs in detail
 */

import type { Command } from 'commander';
import { renderInspectJson, renderInspectTemplate, renderPrettyConfig } from '../../formatters';
import { ConfigSchema } from '../../schemas';
import { inspectConfigs } from '../../services';
import { toConfigSummary } from '../../types';
import type { CommandContext } from '../../utils/context';
import { ValidationError } from '../../utils/errors';
import { printRaw } from '../../utils/output';
import { Template } from '../../utils/template';

export interface ConfigInspectOptions {
  format?: string;
  pretty?: boolean;
}

export async function runConfigInspect(
  context: CommandContext,
  references: readonly string[],
  options: ConfigInspectOptions
): Promise<void> {
  if (references.length === 0) {
    throw new ValidationError(
      '"swarmctl config inspect" requires at least 1 argument.',
      'Usage: swarmctl config inspect [OPTIONS] CONFIG [CONFIG...]'
    );
  }
  if (options.pretty && options.format) {
    throw new ValidationError('--format is incompatible with human friendly format');
  }

  const template = options.format
    ? Template.parse(options.format, { fields: Object.keys(ConfigSchema.shape) })
    : undefined;

  const results = await context.progress('Inspecting configs', () => inspectConfigs(context.client(), references));
  const elements = results.map((result) => ({ value: result.config, raw: result.raw }));

  if (options.pretty) {
    const now = Date.now();
    printRaw(context.out, results.map((result) => renderPrettyConfig(toConfigSummary(result.config), now)).join('\n'));
    return;
  }

  printRaw(context.out, template ? renderInspectTemplate(template, elements) : renderInspectJson(elements));
}

export function registerConfigInspectCommand(parent: Command, context: CommandContext): void {
  parent
    .command('inspect')
    .description('Display detailed information on one or more configs')
    .argument('[config...]', 'Config name or ID')
    .option('-f, --format <template>', 'Format output using a custom template')
    .option('--pretty', 'Print the information in a human friendly format')
    .action(async (references: string[], options: ConfigInspectOptions) => {
      await runConfigInspect(context, references, options);
    });
}
