/**
 * Read-only view of the swarm API the commands depend on
 */

import type { FilterSet } from '../utils/filters';
import type {
  ConfigInspectResult,
  SwarmConfig,
  SwarmNode,
  SwarmService,
  SwarmTask,
} from '../types';

export interface SwarmClient {
  listServices(filters: FilterSet): Promise<SwarmService[]>;
  listNodes(filters: FilterSet): Promise<SwarmNode[]>;
  listTasks(filters: FilterSet): Promise<SwarmTask[]>;
  listConfigs(filters: FilterSet): Promise<SwarmConfig[]>;
  /**
   * Look a config up by ID or name
   */
  inspectConfig(idOrName: string): Promise<ConfigInspectResult>;
}
