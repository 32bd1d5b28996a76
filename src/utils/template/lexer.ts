/**
 * Template lexer
 *
 * Splits a template into text and action segments, then breaks action
 * bodies into tokens. The syntax follows Docker's format templates closely enough
 * that formats written for the Docker CLI work unchanged.
 */

import { TemplateError } from '../errors';

export type Segment =
  | { kind: 'text'; value: string }
  | { kind: 'action'; body: string; offset: number };

export type Token =
  | { kind: 'field'; path: string[]; attached: boolean }
  | { kind: 'variable'; name: string; path: string[] }
  | { kind: 'identifier'; name: string }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'pipe' }
  | { kind: 'lparen' }
  | { kind: 'rparen' }
  | { kind: 'declare' }
  | { kind: 'comma' };

const LEFT_DELIM = '{{';
const RIGHT_DELIM = '}}';

function isSpace(char: string | undefined): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

function isIdentChar(char: string | undefined): boolean {
  return char !== undefined && /[A-Za-z0-9_]/.test(char);
}

/**
 * Position of the closing delimiter, skipping over quoted strings
 */
function findActionEnd(source: string, from: number): number {
  let quote: string | null = null;
  for (let i = from; i < source.length; i++) {
    const char = source[i];
    if (quote) {
      if (char === '\\' && quote === '"') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === '`') {
      quote = char;
    } else if (source.startsWith(RIGHT_DELIM, i)) {
      return i;
    }
  }
  return -1;
}

export function splitSegments(source: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;
  let trimNextText = false;

  const pushText = (text: string) => {
    const value = trimNextText ? text.trimStart() : text;
    trimNextText = false;
    if (value) segments.push({ kind: 'text', value });
  };

  while (cursor < source.length) {
    const start = source.indexOf(LEFT_DELIM, cursor);
    if (start === -1) {
      pushText(source.slice(cursor));
      break;
    }

    let text = source.slice(cursor, start);
    let bodyStart = start + LEFT_DELIM.length;
    if (source[bodyStart] === '-' && isSpace(source[bodyStart + 1])) {
      text = text.trimEnd();
      bodyStart += 1;
    }
    pushText(text);

    const end = findActionEnd(source, bodyStart);
    if (end === -1) {
      throw new TemplateError(`unclosed action starting at offset ${start}`);
    }

    let body = source.slice(bodyStart, end);
    if (body.endsWith('-') && isSpace(body[body.length - 2])) {
      body = body.slice(0, -1);
      trimNextText = true;
    }

    const trimmed = body.trim();
    if (!(trimmed.startsWith('/*') && trimmed.endsWith('*/'))) {
      segments.push({ kind: 'action', body, offset: bodyStart });
    }
    cursor = end + RIGHT_DELIM.length;
  }

  return segments;
}

function readPath(body: string, from: number): { path: string[]; next: number } {
  const path: string[] = [];
  let i = from;
  while (body[i] === '.' && isIdentChar(body[i + 1])) {
    let j = i + 1;
    while (isIdentChar(body[j])) j++;
    path.push(body.slice(i + 1, j));
    i = j;
  }
  return { path, next: i };
}

function readQuoted(body: string, from: number): { value: string; next: number } {
  let value = '';
  let i = from + 1;
  while (i < body.length && body[i] !== '"') {
    if (body[i] === '\\') {
      const escaped = body[i + 1];
      switch (escaped) {
        case 'n': value += '\n'; break;
        case 't': value += '\t'; break;
        case 'r': value += '\r'; break;
        case '"': value += '"'; break;
        case '\\': value += '\\'; break;
        default:
          throw new TemplateError(`unknown escape sequence \\${escaped ?? ''}`);
      }
      i += 2;
      continue;
    }
    value += body[i];
    i++;
  }
  if (i >= body.length) {
    throw new TemplateError('unterminated quoted string');
  }
  return { value, next: i + 1 };
}

export function tokenize(body: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < body.length) {
    const char = body[i];

    if (isSpace(char)) {
      i++;
      continue;
    }

    if (char === '|') {
      tokens.push({ kind: 'pipe' });
      i++;
    } else if (char === '(') {
      tokens.push({ kind: 'lparen' });
      i++;
    } else if (char === ')') {
      tokens.push({ kind: 'rparen' });
      i++;
    } else if (char === ',') {
      tokens.push({ kind: 'comma' });
      i++;
    } else if (char === ':' && body[i + 1] === '=') {
      tokens.push({ kind: 'declare' });
      i += 2;
    } else if (char === '.') {
      const attached = body[i - 1] === ')';
      if (!isIdentChar(body[i + 1])) {
        tokens.push({ kind: 'field', path: [], attached });
        i++;
        continue;
      }
      const { path, next } = readPath(body, i);
      tokens.push({ kind: 'field', path, attached });
      i = next;
    } else if (char === '$') {
      let j = i + 1;
      while (isIdentChar(body[j])) j++;
      const name = body.slice(i, j);
      const { path, next } = readPath(body, j);
      tokens.push({ kind: 'variable', name, path });
      i = next;
    } else if (char === '"') {
      const { value, next } = readQuoted(body, i);
      tokens.push({ kind: 'string', value });
      i = next;
    } else if (char === '`') {
      const end = body.indexOf('`', i + 1);
      if (end === -1) {
        throw new TemplateError('unterminated raw quoted string');
      }
      tokens.push({ kind: 'string', value: body.slice(i + 1, end) });
      i = end + 1;
    } else if (/[0-9]/.test(char) || (char === '-' && /[0-9]/.test(body[i + 1] ?? ''))) {
      let j = i + 1;
      while (/[0-9.]/.test(body[j] ?? '')) j++;
      const literal = body.slice(i, j);
      const value = Number(literal);
      if (Number.isNaN(value)) {
        throw new TemplateError(`bad number syntax: "${literal}"`);
      }
      tokens.push({ kind: 'number', value });
      i = j;
    } else if (isIdentChar(char)) {
      let j = i;
      while (isIdentChar(body[j])) j++;
      tokens.push({ kind: 'identifier', name: body.slice(i, j) });
      i = j;
    } else {
      throw new TemplateError(`unexpected "${char}" in command`);
    }
  }

  return tokens;
}
