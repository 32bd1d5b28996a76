/**
 * Filter sets passed to the daemon's list endpoints
 */

import type { Result } from '../types';
import { ok, err } from '../types';

/**
 * key -> set of values, e.g. { label: ["env=prod"], name: ["web"] }
 */
export class FilterSet {
  private readonly args = new Map<string, Set<string>>();

  add(key: string, value: string): this {
    const values = this.args.get(key) ?? new Set<string>();
    values.add(value);
    this.args.set(key, values);
    return this;
  }

  get(key: string): string[] {
    return Array.from(this.args.get(key) ?? []);
  }

  get size(): number {
    return this.args.size;
  }

  clone(): FilterSet {
    const copy = new FilterSet();
    for (const [key, values] of this.args) {
      for (const value of values) copy.add(key, value);
    }
    return copy;
  }

  /**
   * Shape the Engine API expects in the `filters` query parameter
   */
  toRecord(): Record<string, string[]> {
    return Object.fromEntries(Array.from(this.args, ([key, values]) => [key, Array.from(values)]));
  }

  toString(): string {
    return JSON.stringify(this.toRecord());
  }
}

/**
 * Parse one `--filter key=value` flag. The value is kept as typed, so
 * `label=env=prod` filters on the label `env=prod`.
 */
export function parseFilter(flag: string): Result<[string, string], string> {
  const separator = flag.indexOf('=');
  if (separator === -1) {
    return err(`bad format of filter (expected name=value): ${flag}`);
  }
  const key = flag.slice(0, separator).trim().toLowerCase();
  const value = flag.slice(separator + 1).trim();
  return ok([key, value]);
}

/**
 * Build a FilterSet from repeated --filter flags
 */
export function parseFilters(flags: readonly string[]): Result<FilterSet, string> {
  const filters = new FilterSet();
  for (const flag of flags) {
    const parsed = parseFilter(flag);
    if (!parsed.success) {
      return parsed;
    }
    filters.add(...parsed.data);
  }
  return ok(filters);
}

/**
 * commander option collector for repeatable flags
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
