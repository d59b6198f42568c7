/**
 * Value model for workflow expressions.
 *
 * Expressions only ever produce these shapes. Coercion between them follows a fixed set
 * of rules so that `==` and ordering comparisons never depend on JavaScript's own loose
 * equality.
 */

export type ExpressionValue =
  | string
  | number
  | boolean
  | null
  | ExpressionValue[]
  | { [key: string]: ExpressionValue };

export type ExpressionObject = { [key: string]: ExpressionValue };

export function isExpressionObject(value: ExpressionValue): value is ExpressionObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Convert untyped data (decoded JSON, YAML scalars) into an ExpressionValue.
 * Returns undefined when the data contains something an expression cannot hold.
 */
export function toExpressionValue(data: unknown): ExpressionValue | undefined {
  if (data === null || typeof data === 'string' || typeof data === 'boolean') return data;
  if (typeof data === 'number') return data;
  if (Array.isArray(data)) {
    const items: ExpressionValue[] = [];
    for (const item of data) {
      const converted = toExpressionValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof data === 'object') {
    const result: ExpressionObject = {};
    for (const [key, item] of Object.entries(data)) {
      const converted = toExpressionValue(item);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

export function isTruthy(value: ExpressionValue): boolean {
  if (value === null || value === false || value === '') return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return true;
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a string written in plain decimal notation. Padding, hex and exponents are not numbers.
 */
export function parseNumeric(value: string): number | undefined {
  return DECIMAL.test(value) ? Number(value) : undefined;
}

/**
 * String form used in templates, `join`, `format` and the environment.
 */
export function stringify(value: ExpressionValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value, null, 2);
}

export function looseEquals(left: ExpressionValue, right: ExpressionValue): boolean {
  if (typeof left === 'string' && typeof right === 'string') {
    return left.toLowerCase() === right.toLowerCase();
  }
  if (typeof left === 'number' && typeof right === 'string') {
    return parseNumeric(right) === left;
  }
  if (typeof left === 'string' && typeof right === 'number') {
    return parseNumeric(left) === right;
  }
  // Remaining cross-type pairs never compare equal; arrays and objects compare by identity
  return typeof left === typeof right && left === right;
}

/**
 * Ordering comparison. Returns undefined when the operands cannot be ordered,
 * which every ordering operator treats as false.
 */
export function compareValues(left: ExpressionValue, right: ExpressionValue): number | undefined {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  if (typeof left === 'string' && typeof right === 'string') {
    const a = left.toLowerCase();
    const b = right.toLowerCase();
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof left === 'number' && typeof right === 'string') {
    const parsed = parseNumeric(right);
    return parsed === undefined ? undefined : left - parsed;
  }
  if (typeof left === 'string' && typeof right === 'number') {
    const parsed = parseNumeric(left);
    return parsed === undefined ? undefined : parsed - right;
  }
  return undefined;
}
