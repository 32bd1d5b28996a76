/**
 * Configuration utilities
 * Handles reading ~/.swarmctl/config.yml
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CONFIG_DIR, CONFIG_FILE, CONFIG_ENV_VAR } from '../constants';
import { validateConfig, formatValidationIssues, type SwarmctlConfig } from '../schemas';
import { ConfigError } from './errors';
import { printDebug } from './output';

/**
 * Config file location: explicit path, then $SWARMCTL_CONFIG, then the
 * home directory default
 */
export function getConfigPath(explicitPath?: string): string {
  return explicitPath || process.env[CONFIG_ENV_VAR] || join(homedir(), CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load and validate the config file. A missing file is an empty config.
 */
export function loadConfig(explicitPath?: string): SwarmctlConfig {
  const configPath = getConfigPath(explicitPath);

  if (!existsSync(configPath)) {
    printDebug(`no config file at ${configPath}`);
    return {};
  }

  let data: unknown;
  try {
    data = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Error reading ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      'Check the file is valid YAML'
    );
  }

  // an empty file parses to null
  const result = validateConfig(data ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${configPath}: ${formatValidationIssues(result.error)}`,
      'Allowed keys are host, services_format and configs_format'
    );
  }

  printDebug(`loaded config from ${configPath}`);
  return result.data;
}
