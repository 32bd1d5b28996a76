/**
 * Types barrel export
 */

export * from './result';
export * from './swarm';
export * from './connection';
