/**
 * Docker daemon connection type definitions
 */

/**
 * Daemon reached through a local unix socket
 */
export interface SocketConnection {
  kind: 'socket';
  socketPath: string;
}

/**
 * Daemon reached over TCP (plain or TLS)
 */
export interface TcpConnection {
  kind: 'tcp';
  protocol: 'http' | 'https';
  host: string;
  port: number;
}

/**
 * Union type for all connection types
 */
export type DockerConnection = SocketConnection | TcpConnection;

/**
 * Default daemon ports
 */
export const DEFAULT_HTTP_PORT = 2375;
export const DEFAULT_HTTPS_PORT = 2376;
