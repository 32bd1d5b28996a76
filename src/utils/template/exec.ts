/**
 * Template executor
 */

import type { Command, Operand, Pipeline, TemplateNode } from './parser';
import { formatValue, isTruthy, type FunctionMap } from './functions';

const NO_FINAL = Symbol('no final value');
type Final = unknown;

interface Variable {
  name: string;
  value: unknown;
}

function isPlainKey(receiver: object, name: string): boolean {
  if (Object.prototype.hasOwnProperty.call(receiver, name)) return true;
  // methods of row contexts live on the prototype
  return name in receiver && !(name in Object.prototype);
}

/**
 * Resolve one field step. Functions found on the receiver are called
 * with the arguments, which is how row accessors such as
 * {{.Label "env"}} receive theirs.
 */
function resolveField(receiver: unknown, name: string, args: unknown[]): unknown {
  if (receiver instanceof Map) {
    if (args.length > 0) throw new Error(`${name} is not a method but has arguments`);
    return receiver.get(name);
  }
  if (typeof receiver === 'object' && receiver !== null) {
    if (!isPlainKey(receiver, name)) {
      if (args.length > 0) throw new Error(`${name} is not a method but has arguments`);
      return undefined;
    }
    const value: unknown = Reflect.get(receiver, name);
    if (typeof value === 'function') {
      const result: unknown = value.apply(receiver, args);
      return result;
    }
    if (args.length > 0) throw new Error(`${name} is not a method but has arguments`);
    return value;
  }
  if (receiver === undefined || receiver === null) {
    return undefined;
  }
  throw new Error(`can't evaluate field ${name} in type ${typeof receiver}`);
}

function resolvePath(receiver: unknown, path: string[], args: unknown[]): unknown {
  if (path.length === 0) {
    if (args.length > 0) throw new Error(`can't give argument to non-function ${formatValue(receiver)}`);
    return receiver;
  }
  let value = receiver;
  path.forEach((name, position) => {
    value = resolveField(value, name, position === path.length - 1 ? args : []);
  });
  return value;
}

class Executor {
  private readonly output: string[] = [];
  private readonly variables: Variable[];

  constructor(private readonly functions: FunctionMap, root: unknown) {
    this.variables = [{ name: '$', value: root }];
  }

  run(nodes: TemplateNode[], dot: unknown): string {
    this.walkList(nodes, dot);
    return this.output.join('');
  }

  private walkList(nodes: TemplateNode[] | undefined, dot: unknown): void {
    if (!nodes) return;
    for (const node of nodes) {
      this.walk(node, dot);
    }
  }

  private walk(node: TemplateNode, dot: unknown): void {
    switch (node.type) {
      case 'text':
        this.output.push(node.text);
        return;
      case 'action': {
        const value = this.evalPipeline(node.pipe, dot);
        if (node.pipe.decl.length === 0) {
          this.output.push(formatValue(value));
        }
        return;
      }
      case 'if':
      case 'with': {
        const mark = this.variables.length;
        const value = this.evalPipeline(node.pipe, dot);
        if (isTruthy(value)) {
          this.walkList(node.list, node.type === 'with' ? value : dot);
        } else {
          this.variables.length = mark;
          this.walkList(node.elseList, dot);
        }
        this.variables.length = mark;
        return;
      }
      case 'range':
        this.walkRange(node.pipe, node.list, node.elseList, dot);
        return;
    }
  }

  private walkRange(pipe: Pipeline, list: TemplateNode[], elseList: TemplateNode[] | undefined, dot: unknown): void {
    const mark = this.variables.length;
    const value = this.evalPipeline({ decl: [], commands: pipe.commands }, dot);
    const entries = this.rangeEntries(value);

    if (entries.length === 0) {
      this.walkList(elseList, dot);
      return;
    }

    for (const [key, element] of entries) {
      if (pipe.decl.length === 1) {
        this.variables.push({ name: pipe.decl[0], value: element });
      } else if (pipe.decl.length === 2) {
        this.variables.push({ name: pipe.decl[0], value: key }, { name: pipe.decl[1], value: element });
      }
      this.walkList(list, element);
      this.variables.length = mark;
    }
  }

  private rangeEntries(value: unknown): Array<[unknown, unknown]> {
    if (value === undefined || value === null) return [];
    if (Array.isArray(value)) return value.map((element, position) => [position, element]);
    if (value instanceof Map) {
      return Array.from(value.entries()).sort(([a], [b]) => String(a).localeCompare(String(b)));
    }
    if (typeof value === 'object') {
      return Object.keys(value)
        .sort()
        .map((key) => [key, Reflect.get(value, key)]);
    }
    throw new Error(`range can't iterate over ${formatValue(value)}`);
  }

  private lookupVariable(name: string): unknown {
    for (let i = this.variables.length - 1; i >= 0; i--) {
      if (this.variables[i].name === name) return this.variables[i].value;
    }
    throw new Error(`undefined variable: ${name}`);
  }

  private evalPipeline(pipe: Pipeline, dot: unknown): unknown {
    let final: Final | typeof NO_FINAL = NO_FINAL;
    for (const command of pipe.commands) {
      final = this.evalCommand(command, dot, final);
    }
    const value = final === NO_FINAL ? undefined : final;
    for (const name of pipe.decl) {
      this.variables.push({ name, value });
    }
    return value;
  }

  private evalCommand(command: Command, dot: unknown, final: Final | typeof NO_FINAL): unknown {
    const [head, ...rest] = command.args;
    const args = rest.map((operand) => this.evalOperand(operand, dot));
    if (final !== NO_FINAL) args.push(final);

    switch (head.type) {
      case 'function': {
        const fn = this.functions[head.name];
        if (!fn) throw new Error(`function "${head.name}" not defined`);
        return fn(...args);
      }
      case 'field':
        return resolvePath(dot, head.path, args);
      case 'variable':
        return resolvePath(this.lookupVariable(head.name), head.path, args);
      case 'pipeline':
        return resolvePath(this.evalPipeline(head.pipe, dot), head.path, args);
      case 'literal':
        if (args.length > 0) throw new Error(`can't give argument to non-function ${formatValue(head.value)}`);
        return head.value;
    }
  }

  private evalOperand(operand: Operand, dot: unknown): unknown {
    switch (operand.type) {
      case 'function': {
        const fn = this.functions[operand.name];
        if (!fn) throw new Error(`function "${operand.name}" not defined`);
        return fn();
      }
      case 'field':
        return resolvePath(dot, operand.path, []);
      case 'variable':
        return resolvePath(this.lookupVariable(operand.name), operand.path, []);
      case 'pipeline':
        return resolvePath(this.evalPipeline(operand.pipe, dot), operand.path, []);
      case 'literal':
        return operand.value;
    }
  }
}

export function execute(nodes: TemplateNode[], data: unknown, functions: FunctionMap): string {
  return new Executor(functions, data).run(nodes, data);
}
