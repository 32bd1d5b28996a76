/**
 * Services barrel export
 *
 * Service layer for Docker Swarm lookups. Commands talk to the daemon only
 * through the SwarmClient interface.
 */

// Client contract and the Engine API implementation
export * from './swarm-client';
export * from './docker-swarm-client';

// Stack lookups
export * from './stack-service';

// Config lookups
export * from './config-service';
