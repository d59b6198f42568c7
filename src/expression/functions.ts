import { EvalError } from '../runner/errors.ts';
import { type ExpressionValue, looseEquals, stringify, toExpressionValue } from './values.ts';

/**
 * Outcome flags for the status functions. For a step they describe the steps that ran
 * before it; for a job they describe its direct dependencies.
 */
export interface StatusFlags {
  success: boolean;
  failure: boolean;
  cancelled: boolean;
}

export const STATUS_FUNCTIONS = new Set(['success', 'failure', 'always', 'cancelled']);

type BuiltinFunction = (args: ExpressionValue[], status: StatusFlags) => ExpressionValue;

interface FunctionDefinition {
  minArgs: number;
  maxArgs: number;
  call: BuiltinFunction;
}

function contains(search: ExpressionValue, item: ExpressionValue): boolean {
  if (Array.isArray(search)) {
    return search.some((element) => looseEquals(element, item));
  }
  return stringify(search).toLowerCase().includes(stringify(item).toLowerCase());
}

function format(template: string, args: ExpressionValue[]): string {
  let result = '';
  let i = 0;
  while (i < template.length) {
    const char = template[i];
    if (char === '{' && template[i + 1] === '{') {
      result += '{';
      i += 2;
      continue;
    }
    if (char === '}' && template[i + 1] === '}') {
      result += '}';
      i += 2;
      continue;
    }
    if (char === '{') {
      const close = template.indexOf('}', i);
      const index = close === -1 ? Number.NaN : Number(template.slice(i + 1, close));
      if (!Number.isInteger(index) || index < 0) {
        throw new EvalError(`format: invalid placeholder at index ${i}`);
      }
      if (index >= args.length) {
        throw new EvalError(`format: placeholder {${index}} has no matching argument`);
      }
      result += stringify(args[index]);
      i = close + 1;
      continue;
    }
    if (char === '}') {
      throw new EvalError(`format: unmatched "}" at index ${i}`);
    }
    result += char;
    i++;
  }
  return result;
}

const FUNCTIONS: Record<string, FunctionDefinition> = {
  success: { minArgs: 0, maxArgs: 0, call: (_args, status) => status.success },
  failure: { minArgs: 0, maxArgs: 0, call: (_args, status) => status.failure },
  cancelled: { minArgs: 0, maxArgs: 0, call: (_args, status) => status.cancelled },
  always: { minArgs: 0, maxArgs: 0, call: () => true },
  contains: {
    minArgs: 2,
    maxArgs: 2,
    call: ([search, item]) => contains(search, item),
  },
  startswith: {
    minArgs: 2,
    maxArgs: 2,
    call: ([value, prefix]) =>
      stringify(value).toLowerCase().startsWith(stringify(prefix).toLowerCase()),
  },
  endswith: {
    minArgs: 2,
    maxArgs: 2,
    call: ([value, suffix]) =>
      stringify(value).toLowerCase().endsWith(stringify(suffix).toLowerCase()),
  },
  join: {
    minArgs: 1,
    maxArgs: 2,
    call: ([value, separator]) => {
      const sep = separator === undefined ? ',' : stringify(separator);
      if (Array.isArray(value)) return value.map(stringify).join(sep);
      return stringify(value);
    },
  },
  format: {
    minArgs: 1,
    maxArgs: Number.POSITIVE_INFINITY,
    call: ([template, ...rest]) => format(stringify(template), rest),
  },
  tojson: {
    minArgs: 1,
    maxArgs: 1,
    call: ([value]) => JSON.stringify(value, null, 2),
  },
  fromjson: {
    minArgs: 1,
    maxArgs: 1,
    call: ([value]) => {
      const text = stringify(value);
      let decoded: unknown;
      try {
        decoded = JSON.parse(text);
      } catch (error) {
        throw new EvalError(
          `fromJSON: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      const converted = toExpressionValue(decoded);
      if (converted === undefined) {
        throw new EvalError('fromJSON: value cannot be represented in an expression');
      }
      return converted;
    },
  },
};

/**
 * Call a built-in function. Names are matched case-insensitively.
 */
export function callFunction(
  name: string,
  args: ExpressionValue[],
  status: StatusFlags
): ExpressionValue {
  const definition = FUNCTIONS[name.toLowerCase()];
  if (!definition || !Object.hasOwn(FUNCTIONS, name.toLowerCase())) {
    throw new EvalError(`Unknown function: ${name}`);
  }
  if (args.length < definition.minArgs || args.length > definition.maxArgs) {
    const expected =
      definition.minArgs === definition.maxArgs
        ? `${definition.minArgs}`
        : definition.maxArgs === Number.POSITIVE_INFINITY
          ? `at least ${definition.minArgs}`
          : `${definition.minArgs}-${definition.maxArgs}`;
    throw new EvalError(`${name}() expects ${expected} argument(s), got ${args.length}`);
  }
  return definition.call(args, status);
}

export function isStatusFunction(name: string): boolean {
  return STATUS_FUNCTIONS.has(name.toLowerCase());
}
