import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { CLIError, DockerError, ErrorCode, TemplateError, ValidationError, formatError } from '../errors';

describe('errors', () => {
  it('should prefix template errors', () => {
    const error = new TemplateError('function "x" not defined');

    expect(error.message).toBe('template parsing error: function "x" not defined');
    expect(error.code).toBe(ErrorCode.TEMPLATE_INVALID);
  });

  it('should wrap unknown values', () => {
    const wrapped = CLIError.from(new Error('boom'));
    const validation = new ValidationError('bad');

    expect(wrapped.message).toBe('boom');
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
    expect(CLIError.from(validation)).toBe(validation);
    expect(CLIError.from('text').message).toBe('text');
  });

  it('should default daemon errors to the request failure code', () => {
    expect(new DockerError('Error response from daemon: no such config').code).toBe(ErrorCode.DOCKER_REQUEST_FAILED);
  });

  it('should format the message and suggestion', () => {
    const level = chalk.level;
    chalk.level = 0;
    try {
      expect(formatError(new ValidationError('bad name', 'Use letters'))).toBe('Error: bad name\n  → Use letters');
    } finally {
      chalk.level = level;
    }
  });
});
