/**
 * Swarm object types
 *
 * API shapes are inferred from the response schemas; summaries are the
 * normalised views the formatters work with.
 */

import type { z } from 'zod';
import type {
  ConfigSchema,
  NodeSchema,
  PortConfigSchema,
  ServiceSchema,
  TaskSchema,
} from '../schemas/swarm.schema';

export type SwarmService = z.output<typeof ServiceSchema>;
export type SwarmNode = z.output<typeof NodeSchema>;
export type SwarmTask = z.output<typeof TaskSchema>;
export type SwarmConfig = z.output<typeof ConfigSchema>;
export type PortConfig = z.output<typeof PortConfigSchema>;

/**
 * Label Docker stack deploy puts on every object of a stack
 */
export const STACK_NAMESPACE_LABEL = 'com.docker.stack.namespace';

export type ServiceMode =
  | { kind: 'replicated'; replicas: number }
  | { kind: 'global' };

export interface ServiceSummary {
  id: string;
  name: string;
  mode: ServiceMode;
  image: string;
  ports: PortConfig[];
}

/**
 * Running vs desired task counts for one service
 */
export interface ReplicaStatus {
  running: number;
  desired: number;
}

export interface ConfigSummary {
  id: string;
  name: string;
  createdAt?: string;
  updatedAt?: string;
  labels: Record<string, string>;
  data?: Buffer;
}

/**
 * Result of a config inspect call: the parsed object plus the raw
 * response body, when the transport exposes it
 */
export interface ConfigInspectResult {
  config: SwarmConfig;
  raw?: Buffer;
}

export function toServiceMode(service: SwarmService): ServiceMode {
  const mode = service.Spec.Mode;
  if (mode?.Global && !mode.Replicated) {
    return { kind: 'global' };
  }
  // the daemon defaults to one replica when no mode is given
  return { kind: 'replicated', replicas: mode?.Replicated?.Replicas ?? 1 };
}

export function toServiceSummary(service: SwarmService): ServiceSummary {
  return {
    id: service.ID,
    name: service.Spec.Name,
    mode: toServiceMode(service),
    image: service.Spec.TaskTemplate?.ContainerSpec?.Image ?? '',
    ports: service.Endpoint?.Ports ?? [],
  };
}

export function toConfigSummary(config: SwarmConfig): ConfigSummary {
  return {
    id: config.ID,
    name: config.Spec.Name,
    createdAt: config.CreatedAt,
    updatedAt: config.UpdatedAt,
    labels: config.Spec.Labels ?? {},
    data: config.Spec.Data !== undefined ? Buffer.from(config.Spec.Data, 'base64') : undefined,
  };
}
