import { Command } from 'commander';
import { vi } from 'vitest';
import { registerConfigCommands } from '../config';
import { registerStackCommands } from '../stack';
import { ConfigSchema, NodeSchema, ServiceSchema, TaskSchema, type SwarmctlConfig } from '../../schemas';
import type { SwarmClient } from '../../services';
import type { ConfigInspectResult, SwarmConfig, SwarmNode, SwarmService, SwarmTask } from '../../types';
import type { CommandContext } from '../../utils/context';
import type { FilterSet } from '../../utils/filters';
import type { OutputStream } from '../../utils/output';

export class BufferStream implements OutputStream {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  toString(): string {
    return this.chunks.join('');
  }
}

export function createFakeClient() {
  return {
    listServices: vi.fn<(filters: FilterSet) => Promise<SwarmService[]>>().mockResolvedValue([]),
    listNodes: vi.fn<(filters: FilterSet) => Promise<SwarmNode[]>>().mockResolvedValue([]),
    listTasks: vi.fn<(filters: FilterSet) => Promise<SwarmTask[]>>().mockResolvedValue([]),
    listConfigs: vi.fn<(filters: FilterSet) => Promise<SwarmConfig[]>>().mockResolvedValue([]),
    inspectConfig: vi
      .fn<(idOrName: string) => Promise<ConfigInspectResult>>()
      .mockRejectedValue(new Error('inspectConfig not stubbed')),
  } satisfies SwarmClient;
}

export type FakeSwarmClient = ReturnType<typeof createFakeClient>;

/**
 * CommandContext that captures both streams and never touches the
 * filesystem or a daemon
 */
export class FakeContext implements CommandContext {
  readonly out = new BufferStream();
  readonly err = new BufferStream();

  constructor(
    readonly fakeClient: FakeSwarmClient = createFakeClient(),
    private readonly config: SwarmctlConfig = {}
  ) {}

  client(): SwarmClient {
    return this.fakeClient;
  }

  configFile(): SwarmctlConfig {
    return this.config;
  }

  progress<T>(_text: string, task: () => Promise<T>): Promise<T> {
    return task();
  }
}

/**
 * Run the swarmctl command tree against a context, as if typed after
 * "swarmctl"
 */
export async function runCli(context: CommandContext, args: string[]): Promise<void> {
  const program = new Command().name('swarmctl').exitOverride();
  registerStackCommands(program, context);
  registerConfigCommands(program, context);
  await program.parseAsync(args, { from: 'user' });
}

export function buildService(options: {
  id: string;
  name: string;
  replicas?: number;
  global?: boolean;
  image?: string;
  ports?: Array<{ PublishedPort: number; TargetPort: number; Protocol?: 'tcp' | 'udp'; PublishMode?: 'ingress' | 'host' }>;
}): SwarmService {
  return ServiceSchema.parse({
    ID: options.id,
    Spec: {
      Name: options.name,
      Mode: options.global ? { Global: {} } : { Replicated: { Replicas: options.replicas ?? 1 } },
      TaskTemplate: { ContainerSpec: { Image: options.image ?? 'busybox:latest' } },
    },
    Endpoint: { Ports: options.ports ?? [] },
  });
}

export function buildNode(id: string, state: 'ready' | 'down' = 'ready'): SwarmNode {
  return NodeSchema.parse({ ID: id, Status: { State: state } });
}

export function buildTask(options: {
  id: string;
  serviceId: string;
  nodeId: string;
  state?: string;
  desiredState?: string;
}): SwarmTask {
  return TaskSchema.parse({
    ID: options.id,
    ServiceID: options.serviceId,
    NodeID: options.nodeId,
    DesiredState: options.desiredState ?? 'running',
    Status: { State: options.state ?? 'running' },
  });
}

export function buildConfig(options: {
  id: string;
  name: string;
  labels?: Record<string, string>;
  data?: string;
  createdAt?: string;
  updatedAt?: string;
}): SwarmConfig {
  return ConfigSchema.parse({
    ID: options.id,
    CreatedAt: options.createdAt,
    UpdatedAt: options.updatedAt,
    Spec: {
      Name: options.name,
      Labels: options.labels,
      Data: options.data === undefined ? undefined : Buffer.from(options.data).toString('base64'),
    },
  });
}
