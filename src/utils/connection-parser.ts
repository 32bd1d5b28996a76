/**
 * Daemon Address Parser
 *
 * Turns a DOCKER_HOST style address (unix:///var/run/docker.sock,
 * tcp://10.0.0.5:2376, https://swarm.example:2376) into connection options.
 */

import { DEFAULT_SOCKET_PATH } from '../constants';
import type { DockerConnection, Result } from '../types';
import { ok, err, DEFAULT_HTTP_PORT, DEFAULT_HTTPS_PORT } from '../types';

/**
 * Error types for address parsing
 */
export class ConnectionParseError extends Error {
  constructor(message: string, public readonly code: ConnectionParseErrorCode) {
    super(message);
    this.name = 'ConnectionParseError';
  }
}

export enum ConnectionParseErrorCode {
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  UNSUPPORTED_SCHEME = 'UNSUPPORTED_SCHEME',
  INVALID_PORT = 'INVALID_PORT',
}

/**
 * Parse a daemon address.
 * Returns a Result type for explicit error handling.
 */
export function parseDockerHost(address: string): Result<DockerConnection, ConnectionParseError> {
  if (address.startsWith('unix://')) {
    const socketPath = address.slice('unix://'.length) || DEFAULT_SOCKET_PATH;
    return ok({ kind: 'socket', socketPath });
  }

  let url: URL;
  try {
    url = new URL(address);
  } catch {
    return err(new ConnectionParseError(
      `Invalid daemon address: ${address}`,
      ConnectionParseErrorCode.INVALID_ADDRESS
    ));
  }

  let protocol: 'http' | 'https';
  switch (url.protocol) {
    case 'tcp:':
      // TLS is the convention for the 2376 port
      protocol = url.port === String(DEFAULT_HTTPS_PORT) ? 'https' : 'http';
      break;
    case 'http:':
      protocol = 'http';
      break;
    case 'https:':
      protocol = 'https';
      break;
    default:
      return err(new ConnectionParseError(
        `Unsupported daemon address scheme "${url.protocol.replace(/:$/, '')}" in ${address}`,
        ConnectionParseErrorCode.UNSUPPORTED_SCHEME
      ));
  }

  if (!url.hostname) {
    return err(new ConnectionParseError(
      `Daemon address is missing a host: ${address}`,
      ConnectionParseErrorCode.INVALID_ADDRESS
    ));
  }

  let port = protocol === 'https' ? DEFAULT_HTTPS_PORT : DEFAULT_HTTP_PORT;
  if (url.port) {
    const parsedPort = parseInt(url.port, 10);
    if (isNaN(parsedPort) || parsedPort < 1 || parsedPort > 65535) {
      return err(new ConnectionParseError(
        `Invalid port: ${url.port}`,
        ConnectionParseErrorCode.INVALID_PORT
      ));
    }
    port = parsedPort;
  }

  return ok({ kind: 'tcp', protocol, host: url.hostname, port });
}
