/**
 * Template parser
 *
 * Builds the node tree and rejects templates that could never run:
 * unknown functions, undefined variables, unbalanced blocks, and fields
 * the row kind does not expose.
 */

import { TemplateError } from '../errors';
import { splitSegments, tokenize, type Token } from './lexer';
import type { FunctionMap } from './functions';

export type Operand =
  | { type: 'field'; path: string[] }
  | { type: 'variable'; name: string; path: string[] }
  | { type: 'function'; name: string }
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'pipeline'; pipe: Pipeline; path: string[] };

export interface Command {
  args: Operand[];
}

export interface Pipeline {
  decl: string[];
  commands: Command[];
}

export type TemplateNode =
  | { type: 'text'; text: string }
  | { type: 'action'; pipe: Pipeline }
  | { type: 'if' | 'with' | 'range'; pipe: Pipeline; list: TemplateNode[]; elseList?: TemplateNode[] };

type BlockNode = Extract<TemplateNode, { type: 'if' | 'with' | 'range' }>;

export interface ParseOptions {
  functions: FunctionMap;
  /**
   * Accessors the root object exposes; when set, any other top-level field
   * is rejected at parse time
   */
  fields?: readonly string[];
}

interface Frame {
  node: BlockNode;
  inElse: boolean;
  /** opened by "else if" / "else with", closed together with its parent */
  chained: boolean;
  dotIsRoot: boolean;
  scopeMark: number;
}

const KEYWORDS = new Set(['if', 'else', 'end', 'range', 'with', 'define', 'template', 'block']);

class Parser {
  private readonly root: TemplateNode[] = [];
  private readonly frames: Frame[] = [];
  private readonly variables: string[] = ['$'];
  private readonly fields: ReadonlySet<string> | undefined;

  constructor(private readonly options: ParseOptions) {
    this.fields = options.fields ? new Set(options.fields) : undefined;
  }

  parse(source: string): TemplateNode[] {
    for (const segment of splitSegments(source)) {
      if (segment.kind === 'text') {
        this.append({ type: 'text', text: segment.value });
      } else {
        this.parseAction(tokenize(segment.body));
      }
    }

    const open = this.frames[this.frames.length - 1];
    if (open) {
      throw new TemplateError(`unexpected EOF: missing {{end}} for {{${open.node.type}}}`);
    }
    return this.root;
  }

  private get current(): TemplateNode[] {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) return this.root;
    if (frame.inElse) {
      frame.node.elseList ??= [];
      return frame.node.elseList;
    }
    return frame.node.list;
  }

  private get dotIsRoot(): boolean {
    const frame = this.frames[this.frames.length - 1];
    return frame ? frame.dotIsRoot : true;
  }

  private append(node: TemplateNode): void {
    this.current.push(node);
  }

  private parseAction(tokens: Token[]): void {
    const [first] = tokens;
    if (!first) {
      throw new TemplateError('missing value for command');
    }

    if (first.kind === 'identifier' && KEYWORDS.has(first.name)) {
      this.parseKeyword(first.name, tokens.slice(1));
      return;
    }

    const pipe = this.parsePipeline(tokens, this.dotIsRoot);
    this.append({ type: 'action', pipe });
  }

  private parseKeyword(keyword: string, rest: Token[]): void {
    switch (keyword) {
      case 'if':
      case 'with':
      case 'range':
        this.openBlock(keyword, rest, false);
        return;
      case 'else':
        this.parseElse(rest);
        return;
      case 'end':
        if (rest.length > 0) {
          throw new TemplateError('unexpected token in end');
        }
        this.closeBlock();
        return;
      default:
        throw new TemplateError(`{{${keyword}}} is not supported`);
    }
  }

  private openBlock(type: BlockNode['type'], tokens: Token[], chained: boolean): void {
    const parentDotIsRoot = this.dotIsRoot;
    const scopeMark = this.variables.length;
    const pipe = this.parsePipeline(tokens, parentDotIsRoot, type === 'range' ? 2 : 1);
    const node: BlockNode = { type, pipe, list: [] };
    this.append(node);
    this.frames.push({
      node,
      inElse: false,
      chained,
      dotIsRoot: type === 'if' ? parentDotIsRoot : false,
      scopeMark,
    });
  }

  private parseElse(rest: Token[]): void {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new TemplateError('unexpected {{else}}');
    }
    if (frame.inElse) {
      throw new TemplateError('expected end; found {{else}}');
    }

    frame.inElse = true;
    // dot in an else branch is the enclosing dot again
    const outer = this.frames[this.frames.length - 2];
    frame.dotIsRoot = outer ? outer.dotIsRoot : true;
    this.variables.length = frame.scopeMark;

    const [next] = rest;
    if (!next) return;
    if (next.kind === 'identifier' && (next.name === 'if' || next.name === 'with') && frame.node.type === next.name) {
      this.openBlock(next.name, rest.slice(1), true);
      return;
    }
    throw new TemplateError('unexpected token in else');
  }

  private closeBlock(): void {
    let frame = this.frames.pop();
    if (!frame) {
      throw new TemplateError('unexpected {{end}}');
    }
    this.variables.length = frame.scopeMark;
    while (frame.chained) {
      frame = this.frames.pop();
      if (!frame) break;
      this.variables.length = frame.scopeMark;
    }
  }

  private parsePipeline(tokens: Token[], dotIsRoot: boolean, maxDecl = 1): Pipeline {
    let position = 0;
    const decl: string[] = [];

    const declareAt = tokens.findIndex((token) => token.kind === 'declare');
    if (declareAt !== -1) {
      const head = tokens.slice(0, declareAt);
      for (let i = 0; i < head.length; i++) {
        const token = head[i];
        const expectVariable = i % 2 === 0;
        if (expectVariable && token.kind === 'variable' && token.path.length === 0 && token.name !== '$') {
          decl.push(token.name);
        } else if (!expectVariable && token.kind === 'comma') {
          continue;
        } else {
          throw new TemplateError('unexpected token in variable declaration');
        }
      }
      if (decl.length === 0 || decl.length > maxDecl || head.length % 2 === 0) {
        throw new TemplateError('too many declarations in command');
      }
      position = declareAt + 1;
    }

    const { pipe, next } = this.parseCommands(tokens, position, dotIsRoot, false);
    if (next !== tokens.length) {
      throw new TemplateError('unexpected ")" in command');
    }
    // declared names become visible only after the pipeline is parsed
    this.variables.push(...decl);
    return { decl, commands: pipe.commands };
  }

  private parseCommands(
    tokens: Token[],
    from: number,
    dotIsRoot: boolean,
    nested: boolean
  ): { pipe: Pipeline; next: number } {
    const commands: Command[] = [];
    let args: Operand[] = [];
    let position = from;

    const finishCommand = () => {
      if (args.length === 0) {
        throw new TemplateError('missing value for command');
      }
      commands.push({ args });
      args = [];
    };

    while (position < tokens.length) {
      const token = tokens[position];
      if (token.kind === 'rparen') {
        if (!nested) break;
        finishCommand();
        return { pipe: { decl: [], commands }, next: position + 1 };
      }
      if (token.kind === 'pipe') {
        finishCommand();
        position++;
        continue;
      }

      if (token.kind === 'lparen') {
        const inner = this.parseCommands(tokens, position + 1, dotIsRoot, true);
        position = inner.next;
        let path: string[] = [];
        const after = tokens[position];
        if (after && after.kind === 'field' && after.attached) {
          path = after.path;
          position++;
        }
        args.push({ type: 'pipeline', pipe: inner.pipe, path });
        continue;
      }

      args.push(this.parseOperand(token, dotIsRoot, args.length === 0));
      position++;
    }

    if (nested) {
      throw new TemplateError('unclosed left paren');
    }
    finishCommand();
    return { pipe: { decl: [], commands }, next: position };
  }

  private parseOperand(token: Token, dotIsRoot: boolean, isFirst: boolean): Operand {
    switch (token.kind) {
      case 'field':
        if (dotIsRoot) this.checkField(token.path);
        return { type: 'field', path: token.path };
      case 'variable':
        if (!this.variables.includes(token.name)) {
          throw new TemplateError(`undefined variable "${token.name}"`);
        }
        if (token.name === '$') this.checkField(token.path);
        return { type: 'variable', name: token.name, path: token.path };
      case 'string':
      case 'number':
        return { type: 'literal', value: token.value };
      case 'identifier':
        if (token.name === 'true' || token.name === 'false') {
          return { type: 'literal', value: token.name === 'true' };
        }
        if (token.name === 'nil') {
          if (isFirst) throw new TemplateError('nil is not a command');
          return { type: 'literal', value: null };
        }
        if (KEYWORDS.has(token.name)) {
          throw new TemplateError(`unexpected <${token.name}> in command`);
        }
        if (!Object.prototype.hasOwnProperty.call(this.options.functions, token.name)) {
          throw new TemplateError(`function "${token.name}" not defined`);
        }
        return { type: 'function', name: token.name };
      default:
        throw new TemplateError(`unexpected ${token.kind} in operand`);
    }
  }

  private checkField(path: string[]): void {
    const [name] = path;
    if (this.fields && name !== undefined && !this.fields.has(name)) {
      throw new TemplateError(`can't evaluate field ${name}`);
    }
  }
}

export function parse(source: string, options: ParseOptions): TemplateNode[] {
  return new Parser(options).parse(source);
}
