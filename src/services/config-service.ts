/**
 * Config Service
 *
 * List and inspect swarm configs through a SwarmClient.
 */

import type { SwarmClient } from './swarm-client';
import { sortByName } from './stack-service';
import type { FilterSet } from '../utils/filters';
import { toConfigSummary, type ConfigInspectResult, type ConfigSummary } from '../types';

/**
 * All configs matching the filters, sorted by name
 */
export async function listConfigs(client: SwarmClient, filters: FilterSet): Promise<ConfigSummary[]> {
  const configs = await client.listConfigs(filters);
  return sortByName(configs.map(toConfigSummary));
}

/**
 * Inspect each reference in order. The first failure rejects the whole
 * batch, so callers never hold a partial result.
 */
export async function inspectConfigs(client: SwarmClient, references: readonly string[]): Promise<ConfigInspectResult[]> {
  const results: ConfigInspectResult[] = [];
  for (const reference of references) {
    results.push(await client.inspectConfig(reference));
  }
  return results;
}
