/**
 * Schema validation for ~/.swarmctl/config.yml
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';

/**
 * Daemon address schemes the client understands
 */
const HOST_REGEX = /^(unix|tcp|http|https):\/\/.+$/;

/**
 * Main CLI configuration schema
 */
export const SwarmctlConfigSchema = z.object({
  host: z.string()
    .regex(HOST_REGEX, 'Host must look like unix:///path/to/socket or tcp://host:port')
    .optional()
    .describe('Docker daemon address'),

  services_format: z.string().optional().describe(
    'Default template for "stack services" when --format is not given'
  ),

  configs_format: z.string().optional().describe(
    'Default template for "config list" when --format is not given'
  ),
}).strict();

/**
 * Type inference from schema
 */
export type SwarmctlConfig = z.output<typeof SwarmctlConfigSchema>;
