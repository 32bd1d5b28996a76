/**
 * Config commands - List and inspect swarm configs
 */

import type { Command } from 'commander';
import type { CommandContext } from '../../utils/context';
import { registerConfigInspectCommand } from './inspect';
import { registerConfigListCommand } from './list';

/**
 * Register all config commands under 'swarmctl config <cmd>'
 */
export function registerConfigCommands(program: Command, context: CommandContext): void {
  const config = program
    .command('config')
    .description('Inspect swarm configs');

  registerConfigInspectCommand(config, context);
  registerConfigListCommand(config, context);
}
