/**
 * Rendering for inspect commands: indented JSON by default, or a
 * template run once per object
 */

import { TemplateError } from '../utils/errors';
import { Template } from '../utils/template';

export interface InspectElement {
  value: unknown;
  raw?: Buffer;
}

const INDENT = '    ';

function hasRaw(element: InspectElement): element is InspectElement & { raw: Buffer } {
  return element.raw !== undefined && element.raw.length > 0;
}

function parseRaw(raw: Buffer): unknown {
  try {
    return JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new TemplateError(`invalid inspect payload: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * The raw daemon payload wins over the parsed object when it is present
 */
function elementData(element: InspectElement): unknown {
  return hasRaw(element) ? parseRaw(element.raw) : element.value;
}

function nextSignificant(text: string, from: number): number {
  let i = from;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

/**
 * Re-indent JSON text without decoding it, so numbers and key order come
 * out exactly as the daemon sent them. Empty objects and arrays stay on
 * one line.
 */
export function indentJson(text: string): string {
  let output = '';
  let depth = 0;
  let inString = false;
  const newline = () => `\n${INDENT.repeat(depth)}`;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      output += char;
      if (char === '\\') {
        output += text[i + 1] ?? '';
        i++;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    switch (char) {
      case ' ':
      case '\t':
      case '\n':
      case '\r':
        break;
      case '"':
        inString = true;
        output += char;
        break;
      case '{':
      case '[': {
        const close = char === '{' ? '}' : ']';
        const next = nextSignificant(text, i + 1);
        if (text[next] === close) {
          output += char + close;
          i = next;
          break;
        }
        depth++;
        output += char + newline();
        break;
      }
      case '}':
      case ']':
        depth--;
        output += newline() + char;
        break;
      case ',':
        output += `,${newline()}`;
        break;
      case ':':
        output += ': ';
        break;
      default:
        output += char;
    }
  }
  return output;
}

function elementJson(element: InspectElement): string {
  if (hasRaw(element)) {
    parseRaw(element.raw);
    return indentJson(element.raw.toString('utf8'));
  }
  return JSON.stringify(element.value, null, INDENT.length) ?? 'null';
}

export function renderInspectJson(elements: readonly InspectElement[]): string {
  if (elements.length === 0) {
    return '[]\n';
  }
  const body = elements.map((element) => INDENT + elementJson(element).split('\n').join(`\n${INDENT}`));
  return `[\n${body.join(',\n')}\n]\n`;
}

export function renderInspectTemplate(template: Template, elements: readonly InspectElement[]): string {
  return elements.map((element) => `${template.execute(elementData(element))}\n`).join('');
}
