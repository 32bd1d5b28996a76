/**
 * Restricted Docker-style format templates for --format
 *
 *   const template = Template.parse('{{.Name}}\t{{json .Labels}}', { fields: ['Name', 'Labels'] });
 *   template.execute(row);
 *
 * Parse and execution failures are both reported as TemplateError
 * ("template parsing error: ..."), matching what users of Docker formats know.
 */

import { TemplateError } from '../errors';
import { execute } from './exec';
import { DEFAULT_FUNCTIONS, type FunctionMap } from './functions';
import { parse, type TemplateNode } from './parser';

export { DEFAULT_FUNCTIONS, HEADER_FUNCTIONS, formatValue } from './functions';
export type { FunctionMap, TemplateFunction } from './functions';

export interface TemplateOptions {
  /** Top-level accessors allowed on the root object */
  fields?: readonly string[];
  functions?: FunctionMap;
}

export class Template {
  private constructor(
    readonly source: string,
    private readonly nodes: TemplateNode[],
    private readonly functions: FunctionMap
  ) {}

  static parse(source: string, options: TemplateOptions = {}): Template {
    const functions = options.functions ?? DEFAULT_FUNCTIONS;
    const nodes = parse(source, { functions, fields: options.fields });
    return new Template(source, nodes, functions);
  }

  /**
   * Render against data; `functions` replaces the parse-time set for this
   * run only (used for table headers)
   */
  execute(data: unknown, functions: FunctionMap = this.functions): string {
    try {
      return execute(this.nodes, data, functions);
    } catch (error) {
      if (error instanceof TemplateError) throw error;
      throw new TemplateError(error instanceof Error ? error.message : String(error));
    }
  }
}
