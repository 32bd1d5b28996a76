#!/usr/bin/env tsx

/**
 * swarmctl - Main entry point
 * List and inspect Docker Swarm stacks, services and configs
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SWARMCTL_VERSION } from './constants';
import { registerConfigCommands } from './commands/config';
import { registerStackCommands } from './commands/stack';
import { CliContext, type GlobalOptions } from './utils/context';
import { handleError } from './utils/errors';
import { setDebug } from './utils/output';

type RootOptions = GlobalOptions & { color: boolean };

const program = new Command();

program
  .name('swarmctl')
  .description('List and inspect Docker Swarm stacks, services and configs')
  .version(SWARMCTL_VERSION, '-v, --version', 'Show version information')
  .option('-H, --host <address>', 'Daemon socket to connect to (unix://, tcp://, http:// or https://)')
  .option('--config <path>', 'Location of the client config file')
  .option('--debug', 'Enable debug output')
  .option('--no-color', 'Disable colored output')
  .exitOverride()
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<RootOptions>();
    if (options.debug) {
      setDebug(true);
    }
    if (!options.color) {
      chalk.level = 0;
    }
  });

const context = new CliContext(() => program.opts<RootOptions>());

registerStackCommands(program, context);
registerConfigCommands(program, context);

program.parseAsync(process.argv).catch(handleError);
