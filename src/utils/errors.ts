/**
 * Command Error Handling
 *
 * Commands never exit the process themselves: they throw a CLIError and the
 * entry point reports it through handleError.
 */

import { CommanderError } from 'commander';
import { colors, isDebugEnabled, type OutputStream } from './output';

/**
 * CLI Error codes for different failure scenarios
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,

  // Configuration errors (10-19)
  CONFIG_INVALID = 11,

  // Daemon errors (40-49)
  DOCKER_NOT_AVAILABLE = 40,
  DOCKER_REQUEST_FAILED = 44,
  UNEXPECTED_RESPONSE = 45,

  // Validation errors (60-69)
  VALIDATION_FAILED = 60,
  TEMPLATE_INVALID = 62,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.CONFIG_INVALID, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Failure reported by (or while talking to) the Docker daemon.
 * The daemon's message is kept verbatim.
 */
export class DockerError extends CLIError {
  constructor(message: string, options?: { code?: ErrorCode; suggestion?: string; cause?: Error }) {
    super(message, options?.code ?? ErrorCode.DOCKER_REQUEST_FAILED, options?.suggestion, options?.cause);
    this.name = 'DockerError';
  }
}

export class ValidationError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.VALIDATION_FAILED, suggestion);
    this.name = 'ValidationError';
  }
}

export class TemplateError extends CLIError {
  constructor(detail: string) {
    super(`template parsing error: ${detail}`, ErrorCode.TEMPLATE_INVALID);
    this.name = 'TemplateError';
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (isDebugEnabled() && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown, stream: OutputStream = process.stderr): never {
  // commander already printed its own usage error (or help / version output)
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }

  const cliError = CLIError.from(error);
  stream.write(`${formatError(cliError)}\n`);
  process.exit(cliError.code);
}
