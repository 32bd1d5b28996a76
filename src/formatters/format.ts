/**
 * Format selection and row rendering shared by the list commands
 */

import { HEADER_FUNCTIONS, Template } from '../utils/template';
import { alignColumns } from './tabwriter';

export const TABLE_FORMAT_KEY = 'table';
export const RAW_FORMAT_KEY = 'raw';

/**
 * Everything a list command needs to know to render one kind of row
 */
export interface RowKind<T> {
  /** accessor name -> column header */
  headers: Readonly<Record<string, string>>;
  defaultTable: string;
  quiet: string;
  raw: string;
  rawQuiet: string;
  context(row: T, now: number): object;
}

export interface PreparedFormat {
  table: boolean;
  template: Template;
}

/**
 * Pick the format a list command runs with: --format, then the config
 * file default (ignored in quiet mode), then the default table
 */
export function selectFormat(flagFormat: string | undefined, configFormat: string | undefined, quiet: boolean): string {
  if (flagFormat) return flagFormat;
  if (configFormat && !quiet) return configFormat;
  return TABLE_FORMAT_KEY;
}

/**
 * Expand the "table" and "raw" keywords for a row kind
 */
export function expandFormat<T>(format: string, kind: RowKind<T>, quiet: boolean): string {
  if (format === TABLE_FORMAT_KEY) {
    return quiet ? kind.quiet : kind.defaultTable;
  }
  if (format === RAW_FORMAT_KEY) {
    return quiet ? kind.rawQuiet : kind.raw;
  }
  return format;
}

export function isTableFormat(format: string): boolean {
  return format.startsWith(TABLE_FORMAT_KEY);
}

/**
 * Parse a format up front so a broken template fails before any lookup
 */
export function prepareFormat<T>(format: string, kind: RowKind<T>): PreparedFormat {
  const table = isTableFormat(format);
  const body = (table ? format.slice(TABLE_FORMAT_KEY.length) : format)
    .replace(/^ +| +$/g, '')
    .replaceAll('\\t', '\t')
    .replaceAll('\\n', '\n');

  return {
    table,
    template: Template.parse(body, { fields: Object.keys(kind.headers) }),
  };
}

function headerContext(headers: Readonly<Record<string, string>>): object {
  return Object.fromEntries(Object.entries(headers).map(([name, header]) => [name, () => header]));
}

/**
 * Render all rows into one string. Nothing is returned (and so nothing
 * is written) if any row fails to render.
 */
export function renderRows<T>(prepared: PreparedFormat, kind: RowKind<T>, rows: readonly T[], now: number = Date.now()): string {
  const body = rows.map((row) => `${prepared.template.execute(kind.context(row, now))}\n`).join('');

  if (!prepared.table) {
    return body;
  }

  const header = prepared.template.execute(headerContext(kind.headers), HEADER_FUNCTIONS);
  return alignColumns(`${header}\n${body}`);
}
