/**
 * Stack Service
 *
 * Looks up the services of a stack and works out how many of their tasks
 * are running. Calls are made one after the other; the first failure
 * aborts the lookup.
 */

import type { SwarmClient } from './swarm-client';
import { FilterSet } from '../utils/filters';
import {
  STACK_NAMESPACE_LABEL,
  toServiceSummary,
  type ReplicaStatus,
  type ServiceSummary,
  type SwarmNode,
  type SwarmService,
  type SwarmTask,
} from '../types';

export interface StackServices {
  services: ServiceSummary[];
  /** keyed by service ID; absent when status was not requested */
  status?: Map<string, ReplicaStatus>;
}

/**
 * Case-sensitive, stable ordering by name
 */
export function sortByName<T extends { name: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Running/desired counts per service. A task counts as running only when
 * its node is not down; global services want one task per non-shutdown
 * task slot.
 */
export function computeReplicaStatus(
  services: readonly SwarmService[],
  nodes: readonly SwarmNode[],
  tasks: readonly SwarmTask[]
): Map<string, ReplicaStatus> {
  const activeNodes = new Set(nodes.filter((node) => node.Status?.State !== 'down').map((node) => node.ID));

  const running = new Map<string, number>();
  const notShutdown = new Map<string, number>();
  for (const task of tasks) {
    if (task.DesiredState !== 'shutdown') {
      notShutdown.set(task.ServiceID, (notShutdown.get(task.ServiceID) ?? 0) + 1);
    }
    if (task.NodeID && activeNodes.has(task.NodeID) && task.Status?.State === 'running') {
      running.set(task.ServiceID, (running.get(task.ServiceID) ?? 0) + 1);
    }
  }

  const status = new Map<string, ReplicaStatus>();
  for (const service of services) {
    const mode = toServiceSummary(service).mode;
    status.set(service.ID, {
      running: running.get(service.ID) ?? 0,
      desired: mode.kind === 'replicated' ? mode.replicas : notShutdown.get(service.ID) ?? 0,
    });
  }
  return status;
}

/**
 * Services of a stack, sorted by name, with their replica status when
 * `withStatus` is set. Nodes are listed before tasks, so a node failure is
 * the one reported when both would fail.
 */
export async function getStackServices(
  client: SwarmClient,
  stackName: string,
  options: { filters?: FilterSet; withStatus: boolean }
): Promise<StackServices> {
  const filters = (options.filters ?? new FilterSet()).clone();
  filters.add('label', `${STACK_NAMESPACE_LABEL}=${stackName}`);

  const services = await client.listServices(filters);
  const summaries = sortByName(services.map(toServiceSummary));

  if (services.length === 0 || !options.withStatus) {
    return { services: summaries };
  }

  const nodes = await client.listNodes(new FilterSet());

  const taskFilters = new FilterSet();
  for (const service of services) {
    taskFilters.add('service', service.ID);
  }
  const tasks = await client.listTasks(taskFilters);

  return { services: summaries, status: computeReplicaStatus(services, nodes, tasks) };
}
