/**
 * Command Context
 *
 * Everything a command handler needs (daemon client, config file, output
 * streams) is handed to it through a CommandContext value. The real one is
 * built lazily from the global options, so commands that fail validation
 * never touch the config file or the daemon.
 */

import ora from 'ora';
import { DEFAULT_SOCKET_PATH, DOCKER_HOST_ENV_VAR } from '../constants';
import type { SwarmctlConfig } from '../schemas';
import { DockerSwarmClient, type SwarmClient } from '../services';
import { loadConfig } from './config';
import { parseDockerHost } from './connection-parser';
import { ConfigError } from './errors';
import { printDebug, type OutputStream } from './output';

export interface CommandContext {
  readonly out: OutputStream;
  readonly err: OutputStream;
  client(): SwarmClient;
  configFile(): SwarmctlConfig;
  /**
   * Run a lookup, with a spinner when the diagnostic stream is a terminal
   */
  progress<T>(text: string, task: () => Promise<T>): Promise<T>;
}

/**
 * Options declared on the root program
 */
export type GlobalOptions = {
  host?: string;
  config?: string;
  debug?: boolean;
};

/**
 * Daemon address: --host, then the config file, then DOCKER_HOST, then the
 * local socket
 */
export function resolveDaemonAddress(options: GlobalOptions, config: SwarmctlConfig): string {
  return options.host || config.host || process.env[DOCKER_HOST_ENV_VAR] || `unix://${DEFAULT_SOCKET_PATH}`;
}

export class CliContext implements CommandContext {
  readonly out: OutputStream = process.stdout;
  readonly err: OutputStream = process.stderr;

  private cachedClient?: SwarmClient;
  private cachedConfig?: SwarmctlConfig;

  constructor(private readonly globalOptions: () => GlobalOptions) {}

  configFile(): SwarmctlConfig {
    this.cachedConfig ??= loadConfig(this.globalOptions().config);
    return this.cachedConfig;
  }

  client(): SwarmClient {
    if (!this.cachedClient) {
      const address = resolveDaemonAddress(this.globalOptions(), this.configFile());
      const connection = parseDockerHost(address);
      if (!connection.success) {
        throw new ConfigError(connection.error.message, 'Use unix:///path/to/docker.sock or tcp://host:port');
      }
      printDebug(`connecting to ${address}`);
      this.cachedClient = DockerSwarmClient.fromConnection(connection.data);
    }
    return this.cachedClient;
  }

  async progress<T>(text: string, task: () => Promise<T>): Promise<T> {
    if (!process.stderr.isTTY) {
      return task();
    }
    const spinner = ora({ text, stream: process.stderr }).start();
    try {
      return await task();
    } finally {
      spinner.stop();
    }
  }
}
