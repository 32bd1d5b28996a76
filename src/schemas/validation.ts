/**
 * Validation utilities for the config file and daemon responses
 * Provides user-friendly error messages and formatting
 */

import { z } from 'zod';
import { SwarmctlConfigSchema, type SwarmctlConfig } from './config.schema';
import type { Result } from '../types';
import { ok, err } from '../types';

/**
 * Validation error with path and message
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Format Zod path to readable string
 */
function formatPath(path: PropertyKey[]): string {
  if (path.length === 0) return 'root';

  return path.map((segment, index) => {
    if (typeof segment === 'number') {
      return `[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return `[Symbol(${segment.description ?? ''})]`;
    }
    return index === 0 ? segment : `.${segment}`;
  }).join('');
}

/**
 * Transform Zod errors to ValidationIssues
 */
export function transformZodErrors(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * One line per issue, as shown under a validation error
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

/**
 * Validate config.yml content
 */
export function validateConfig(data: unknown): Result<SwarmctlConfig, ValidationIssue[]> {
  const result = SwarmctlConfigSchema.safeParse(data);

  if (result.success) {
    return ok(result.data);
  }

  return err(transformZodErrors(result.error));
}

/**
 * Validate a payload received from the daemon against one of the API schemas
 */
export function validateResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): Result<z.output<S>, ValidationIssue[]> {
  const result = schema.safeParse(data);

  if (result.success) {
    return ok(result.data);
  }

  return err(transformZodErrors(result.error));
}
