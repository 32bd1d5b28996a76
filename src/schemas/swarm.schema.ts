/**
 * Schemas for the Docker Engine API objects swarmctl reads.
 * Only the fields the commands use are declared; everything else the
 * daemon sends is kept (passthrough) so inspect output stays complete.
 */

import { z } from 'zod';

const LabelsSchema = z.record(z.string());

const VersionSchema = z.object({
  Index: z.number().int().optional(),
}).passthrough();

export const PortConfigSchema = z.object({
  Name: z.string().optional(),
  Protocol: z.enum(['tcp', 'udp', 'sctp']).optional().default('tcp'),
  TargetPort: z.number().int().optional().default(0),
  PublishedPort: z.number().int().optional().default(0),
  PublishMode: z.enum(['ingress', 'host']).optional().default('ingress'),
}).passthrough();

export const ServiceModeSchema = z.object({
  Replicated: z.object({
    Replicas: z.number().int().nonnegative().optional(),
  }).passthrough().optional(),
  Global: z.object({}).passthrough().optional(),
}).passthrough();

export const ServiceSchema = z.object({
  ID: z.string(),
  Version: VersionSchema.optional(),
  CreatedAt: z.string().optional(),
  UpdatedAt: z.string().optional(),
  Spec: z.object({
    Name: z.string().default(''),
    Labels: LabelsSchema.optional(),
    Mode: ServiceModeSchema.optional(),
    TaskTemplate: z.object({
      ContainerSpec: z.object({
        Image: z.string().optional(),
      }).passthrough().optional(),
    }).passthrough().optional(),
  }).passthrough(),
  Endpoint: z.object({
    Ports: z.array(PortConfigSchema).optional(),
  }).passthrough().optional(),
}).passthrough();

export const NodeSchema = z.object({
  ID: z.string(),
  Description: z.object({
    Hostname: z.string().optional(),
  }).passthrough().optional(),
  Status: z.object({
    State: z.enum(['unknown', 'down', 'ready', 'disconnected']).optional(),
  }).passthrough().optional(),
}).passthrough();

export const TaskSchema = z.object({
  ID: z.string(),
  ServiceID: z.string().default(''),
  NodeID: z.string().optional(),
  DesiredState: z.string().optional(),
  Status: z.object({
    State: z.string().optional(),
  }).passthrough().optional(),
}).passthrough();

export const ConfigSchema = z.object({
  ID: z.string(),
  Version: VersionSchema.optional(),
  CreatedAt: z.string().optional(),
  UpdatedAt: z.string().optional(),
  Spec: z.object({
    Name: z.string().default(''),
    Labels: LabelsSchema.optional(),
    Data: z.string().optional().describe('Base64 encoded payload'),
  }).passthrough(),
}).passthrough();

export const ServiceListSchema = z.array(ServiceSchema);
export const NodeListSchema = z.array(NodeSchema);
export const TaskListSchema = z.array(TaskSchema);
export const ConfigListSchema = z.array(ConfigSchema);
