/**
 * Docker Engine API implementation of SwarmClient, on top of dockerode.
 * Every response is validated against the API schemas before use.
 */

import Docker from 'dockerode';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { z } from 'zod';
import {
  ConfigListSchema,
  ConfigSchema,
  NodeListSchema,
  ServiceListSchema,
  TaskListSchema,
  formatValidationIssues,
  validateResponse,
} from '../schemas';
import type { DockerConnection } from '../types';
import { DockerError, ErrorCode } from '../utils/errors';
import type { FilterSet } from '../utils/filters';
import { printDebug } from '../utils/output';
import type { SwarmClient } from './swarm-client';

/**
 * Build dockerode options for a parsed daemon address. TLS material is
 * read from DOCKER_CERT_PATH, like the Docker CLI does.
 */
export function toDockerOptions(connection: DockerConnection): Docker.DockerOptions {
  if (connection.kind === 'socket') {
    return { socketPath: connection.socketPath };
  }

  const options: Docker.DockerOptions = {
    host: connection.host,
    port: connection.port,
    protocol: connection.protocol,
  };

  const certPath = process.env.DOCKER_CERT_PATH;
  if (connection.protocol === 'https' && certPath) {
    options.ca = readFileSync(join(certPath, 'ca.pem'));
    options.cert = readFileSync(join(certPath, 'cert.pem'));
    options.key = readFileSync(join(certPath, 'key.pem'));
  }
  return options;
}

function readProperty(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

/**
 * Convert whatever dockerode rejected with into a DockerError carrying the
 * daemon's own message
 */
export function toDockerError(error: unknown): DockerError {
  const cause = error instanceof Error ? error : undefined;
  const daemonMessage = readProperty(readProperty(error, 'json'), 'message');
  if (typeof daemonMessage === 'string') {
    return new DockerError(`Error response from daemon: ${daemonMessage}`, { cause });
  }

  const code = readProperty(error, 'code');
  if (code === 'ECONNREFUSED' || code === 'ENOENT' || code === 'EACCES') {
    return new DockerError(`Cannot connect to the Docker daemon: ${cause?.message ?? String(error)}`, {
      code: ErrorCode.DOCKER_NOT_AVAILABLE,
      suggestion: 'Is the docker daemon running? Use --host or DOCKER_HOST to point at a manager node',
      cause,
    });
  }

  return new DockerError(cause?.message ?? String(error), { cause });
}

export class DockerSwarmClient implements SwarmClient {
  constructor(private readonly docker: Docker) {}

  static fromConnection(connection: DockerConnection): DockerSwarmClient {
    return new DockerSwarmClient(new Docker(toDockerOptions(connection)));
  }

  async listServices(filters: FilterSet) {
    const options = { filters: filters.toString() };
    return this.request('GET /services', filters, ServiceListSchema, () => this.docker.listServices(options));
  }

  async listNodes(filters: FilterSet) {
    const options = { filters: filters.toString() };
    return this.request('GET /nodes', filters, NodeListSchema, () => this.docker.listNodes(options));
  }

  async listTasks(filters: FilterSet) {
    const options = { filters: filters.toString() };
    return this.request('GET /tasks', filters, TaskListSchema, () => this.docker.listTasks(options));
  }

  async listConfigs(filters: FilterSet) {
    const options = { filters: filters.toString() };
    return this.request('GET /configs', filters, ConfigListSchema, () => this.docker.listConfigs(options));
  }

  async inspectConfig(idOrName: string) {
    const config = await this.request(`GET /configs/${idOrName}`, undefined, ConfigSchema, () =>
      this.docker.getConfig(idOrName).inspect()
    );
    return { config };
  }

  private async request<S extends z.ZodTypeAny>(
    label: string,
    filters: FilterSet | undefined,
    schema: S,
    call: () => Promise<unknown>
  ): Promise<z.output<S>> {
    printDebug(filters && filters.size > 0 ? `${label} filters=${filters.toString()}` : label);

    let response: unknown;
    try {
      response = await call();
    } catch (error) {
      throw toDockerError(error);
    }

    const result = validateResponse(schema, response);
    if (!result.success) {
      throw new DockerError(`Unexpected response from daemon for ${label}: ${formatValidationIssues(result.error)}`, {
        code: ErrorCode.UNEXPECTED_RESPONSE,
      });
    }
    return result.data;
  }
}
