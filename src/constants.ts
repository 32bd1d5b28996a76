/**
 * Application-wide constants
 */

import packageJson from '../package.json';

export const SWARMCTL_VERSION = packageJson.version;

/**
 * Config file (relative to the home directory)
 */
export const CONFIG_DIR = '.swarmctl';
export const CONFIG_FILE = 'config.yml';
export const CONFIG_ENV_VAR = 'SWARMCTL_CONFIG';

/**
 * Docker daemon defaults
 */
export const DEFAULT_SOCKET_PATH = '/var/run/docker.sock';
export const DOCKER_HOST_ENV_VAR = 'DOCKER_HOST';
