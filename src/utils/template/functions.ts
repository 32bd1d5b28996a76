/**
 * Functions available inside templates, plus the value printer shared
 * with the executor.
 */

export type TemplateFunction = (...args: unknown[]) => unknown;
export type FunctionMap = Readonly<Record<string, TemplateFunction>>;

/**
 * Print a value the way the Docker CLI does, which is what users of
 * Docker-style formats expect to see
 */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) return '<no value>';
  return formatNested(value);
}

/**
 * Row contexts describe themselves through toJSON, the same view
 * `{{json .}}` gets
 */
function toJsonForm(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) return value;
  const toJSON: unknown = Reflect.get(value, 'toJSON');
  if (typeof toJSON !== 'function') return value;
  const serialised: unknown = toJSON.call(value);
  return serialised;
}

function formatNested(value: unknown): string {
  if (value === undefined || value === null) return '<nil>';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `[${Array.from(value).join(' ')}]`;
  const serialised = toJsonForm(value);
  if (serialised !== value) return formatNested(serialised);
  if (Array.isArray(value)) return `[${value.map(formatNested).join(' ')}]`;
  if (value instanceof Map) {
    const keys = Array.from(value.keys()).map(String).sort();
    return `map[${keys.map((key) => `${key}:${formatNested(value.get(key))}`).join(' ')}]`;
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `map[${entries.map(([key, entry]) => `${key}:${formatNested(entry)}`).join(' ')}]`;
  }
  return String(value);
}

/**
 * Template truthiness: empty values and zero are false
 */
export function isTruthy(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  if (value instanceof Map) return value.size > 0;
  if (typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return true;
}

function asString(value: unknown, name: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new Error(`${name}: expected string, got ${formatValue(value)}`);
}

function asInteger(value: unknown, name: string): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new Error(`${name}: expected integer, got ${formatValue(value)}`);
}

function expectArity(name: string, args: unknown[], count: number): void {
  if (args.length !== count) {
    throw new Error(`wrong number of args for ${name}: want ${count} got ${args.length}`);
  }
}

function length(value: unknown): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (value instanceof Map) return value.size;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length;
  throw new Error(`len of type ${typeof value}`);
}

function index(value: unknown, ...keys: unknown[]): unknown {
  let current = value;
  for (const key of keys) {
    if (Array.isArray(current)) {
      const position = asInteger(key, 'index');
      if (position < 0 || position >= current.length) {
        throw new Error(`index out of range: ${position}`);
      }
      current = current[position];
    } else if (current instanceof Map) {
      current = current.get(key);
    } else if (typeof current === 'object' && current !== null) {
      const name = asString(key, 'index');
      current = Object.prototype.hasOwnProperty.call(current, name) ? Reflect.get(current, name) : undefined;
    } else {
      throw new Error(`can't index item of type ${typeof current}`);
    }
  }
  return current;
}

function toJson(value: unknown): string {
  if (value === undefined) return 'null';
  if (Buffer.isBuffer(value)) return JSON.stringify(value.toString('base64'));
  return JSON.stringify(value, (_key, entry: unknown) => (entry instanceof Map ? Object.fromEntries(entry) : entry));
}

function titleCase(value: string): string {
  return value.replace(/(^|[^A-Za-z0-9_'])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Subset of the printf verbs: %s %d %v %q %%
 */
function sprintf(format: string, args: unknown[]): string {
  let next = 0;
  const output = format.replace(/%[sdvq%]/g, (verb) => {
    if (verb === '%%') return '%';
    if (next >= args.length) return `%!${verb[1]}(MISSING)`;
    const arg = args[next++];
    switch (verb) {
      case '%d':
        return typeof arg === 'number' ? String(Math.trunc(arg)) : `%!d(${formatValue(arg)})`;
      case '%q':
        return JSON.stringify(typeof arg === 'string' ? arg : formatValue(arg));
      default:
        return formatValue(arg);
    }
  });
  if (next < args.length) {
    return output + `%!(EXTRA ${args.slice(next).map(formatValue).join(', ')})`;
  }
  return output;
}

function equals(a: unknown, b: unknown): boolean {
  return a === b || (a == null && b == null);
}

export const DEFAULT_FUNCTIONS: FunctionMap = {
  json: (...args) => {
    expectArity('json', args, 1);
    return toJson(args[0]);
  },
  split: (...args) => {
    expectArity('split', args, 2);
    return asString(args[0], 'split').split(asString(args[1], 'split'));
  },
  join: (...args) => {
    expectArity('join', args, 2);
    const [values, separator] = args;
    if (!Array.isArray(values)) {
      throw new Error(`join: expected list, got ${formatValue(values)}`);
    }
    return values.map((value) => asString(value, 'join')).join(asString(separator, 'join'));
  },
  title: (...args) => {
    expectArity('title', args, 1);
    return titleCase(asString(args[0], 'title'));
  },
  lower: (...args) => {
    expectArity('lower', args, 1);
    return asString(args[0], 'lower').toLowerCase();
  },
  upper: (...args) => {
    expectArity('upper', args, 1);
    return asString(args[0], 'upper').toUpperCase();
  },
  pad: (...args) => {
    expectArity('pad', args, 3);
    const value = asString(args[0], 'pad');
    return ' '.repeat(asInteger(args[1], 'pad')) + value + ' '.repeat(asInteger(args[2], 'pad'));
  },
  truncate: (...args) => {
    expectArity('truncate', args, 2);
    const value = asString(args[0], 'truncate');
    const max = asInteger(args[1], 'truncate');
    return value.length > max ? value.slice(0, max) : value;
  },
  len: (...args) => {
    expectArity('len', args, 1);
    return length(args[0]);
  },
  index: (...args) => {
    if (args.length === 0) throw new Error('wrong number of args for index: want at least 1 got 0');
    return index(args[0], ...args.slice(1));
  },
  print: (...args) => args.map(formatNested).join(''),
  println: (...args) => args.map(formatNested).join(' ') + '\n',
  printf: (...args) => {
    if (args.length === 0) throw new Error('wrong number of args for printf: want at least 1 got 0');
    return sprintf(asString(args[0], 'printf'), args.slice(1));
  },
  eq: (...args) => {
    if (args.length < 2) throw new Error('missing argument for comparison');
    return args.slice(1).some((other) => equals(args[0], other));
  },
  ne: (...args) => {
    expectArity('ne', args, 2);
    return !equals(args[0], args[1]);
  },
  not: (...args) => {
    expectArity('not', args, 1);
    return !isTruthy(args[0]);
  },
  and: (...args) => {
    for (const arg of args) {
      if (!isTruthy(arg)) return arg;
    }
    return args[args.length - 1];
  },
  or: (...args) => {
    for (const arg of args) {
      if (isTruthy(arg)) return arg;
    }
    return args[args.length - 1];
  },
};

const passThrough: TemplateFunction = (...args) => args[0];

/**
 * Table headers are rendered with the row template itself; these
 * overrides make the formatting functions hand the header text through
 */
export const HEADER_FUNCTIONS: FunctionMap = {
  ...DEFAULT_FUNCTIONS,
  json: passThrough,
  split: passThrough,
  join: passThrough,
  title: passThrough,
  lower: passThrough,
  upper: passThrough,
  pad: passThrough,
  truncate: passThrough,
};
