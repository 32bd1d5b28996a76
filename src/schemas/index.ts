/**
 * Schema validation exports
 * Centralized validation for the config file and daemon responses
 */

export * from './config.schema';
export * from './swarm.schema';
export * from './validation';
