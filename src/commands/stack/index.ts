/**
 * Stack commands - Inspect deployed stacks
 */

import type { Command } from 'commander';
import type { CommandContext } from '../../utils/context';
import { registerStackServicesCommand } from './services';

/**
 * Register all stack commands under 'swarmctl stack <cmd>'
 */
export function registerStackCommands(program: Command, context: CommandContext): void {
  const stack = program
    .command('stack')
    .description('Inspect Docker stacks');

  registerStackServicesCommand(stack, context);
}
