/**
 * Shared utilities for CLI commands
 */

import { InvalidArgumentError } from 'commander';

const VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const BLOCKED_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export interface ParsedVars {
  vars: Record<string, string>;
  /** One message per rejected pair */
  warnings: string[];
}

/**
 * Parse `key=value` pairs into the `vars` namespace. Values stay strings; later pairs win.
 */
export function parseVarPairs(pairs: readonly string[] = []): ParsedVars {
  const vars: Record<string, string> = {};
  const warnings: string[] = [];

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      warnings.push(`Invalid variable format: "${pair}" (expected key=value)`);
      continue;
    }
    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1);

    if (!VAR_KEY_PATTERN.test(key)) {
      warnings.push(`Invalid variable name: "${key}" (use letters, digits and underscores)`);
      continue;
    }
    if (BLOCKED_KEYS.has(key)) {
      warnings.push(`Invalid variable name: "${key}" (reserved keyword)`);
      continue;
    }
    if (value.includes('\u0000')) {
      warnings.push(`Variable "${key}" contains invalid null characters`);
      continue;
    }
    vars[key] = value;
  }

  return { vars, warnings };
}

/**
 * Split a `"K1=v1; K2=v2"` list into pairs. Blank entries are ignored.
 */
export function splitVarList(list: string): string[] {
  return list
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * commander collector for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
