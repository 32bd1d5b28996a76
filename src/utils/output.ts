/**
 * Output formatting utilities
 *
 * Rendered results go to the output stream untouched; colour is only
 * applied to diagnostics.
 */

import chalk from 'chalk';

/**
 * Minimal writable surface shared by process streams and test buffers
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export const colors = {
  error: chalk.red,
  dim: chalk.gray,
};

let debugEnabled = process.env.SWARMCTL_DEBUG === '1';

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Write a debug line to stderr when --debug is on
 */
export function printDebug(message: string): void {
  if (debugEnabled) {
    process.stderr.write(colors.dim(`[debug] ${message}`) + '\n');
  }
}

export function printRaw(stream: OutputStream, text: string): void {
  stream.write(text);
}

export function printLine(stream: OutputStream, line: string): void {
  stream.write(`${line}\n`);
}

/**
 * Human readable duration, in the wording the Docker CLI uses
 * ("Less than a second", "About an hour", "3 weeks")
 */
export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  if (seconds < 1) return 'Less than a second';
  if (seconds === 1) return '1 second';
  if (seconds < 60) return `${seconds} seconds`;

  const minutes = Math.floor(seconds / 60);
  if (minutes === 1) return 'About a minute';
  if (minutes < 60) return `${minutes} minutes`;

  const hours = Math.round(milliseconds / 3_600_000);
  if (hours === 1) return 'About an hour';
  if (hours < 48) return `${hours} hours`;
  if (hours < 24 * 7 * 2) return `${Math.floor(hours / 24)} days`;
  if (hours < 24 * 30 * 2) return `${Math.floor(hours / 24 / 7)} weeks`;
  if (hours < 24 * 365 * 2) return `${Math.floor(hours / 24 / 30)} months`;
  return `${Math.floor(milliseconds / 3_600_000 / 24 / 365)} years`;
}

/**
 * "2 hours ago" style age of an API timestamp; blank when unknown
 */
export function formatAge(timestamp: string | undefined, now: number = Date.now()): string {
  if (!timestamp) return '';
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return '';
  return `${formatDuration(now - time)} ago`;
}
