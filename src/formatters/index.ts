/**
 * Formatters barrel export
 */

export * from './format';
export * from './tabwriter';
export * from './service';
export * from './config';
export * from './inspect';
