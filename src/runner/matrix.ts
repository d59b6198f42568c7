import type { Matrix, MatrixCombination, MatrixValue } from '../parser/schema.ts';
import { LIMITS } from '../utils/constants.ts';
import { GraphError } from './errors.ts';

function matches(combination: MatrixCombination, entry: MatrixCombination): boolean {
  return Object.entries(entry).every(
    ([key, value]) => Object.hasOwn(combination, key) && combination[key] === value
  );
}

/**
 * Expand a matrix into its combinations.
 *
 * 1. Cross product of the dimensions, first dimension outermost.
 * 2. `exclude` drops every combination that matches all keys of an entry.
 * 3. `include` extends each combination whose original dimension values agree with the
 *    entry. Original values are never overwritten; values added by an earlier include
 *    entry may be. An entry that extends nothing becomes a combination of its own.
 */
export function expandMatrix(matrix: Matrix, jobId = 'job'): MatrixCombination[] {
  const dimensionNames = new Set(matrix.dimensions.map((dimension) => dimension.name));

  let combinations: MatrixCombination[] = [];
  if (matrix.dimensions.length > 0) {
    combinations = [{}];
    for (const { name, values } of matrix.dimensions) {
      combinations = combinations.flatMap((combination) =>
        values.map((value) => ({ ...combination, [name]: value }))
      );
      if (combinations.length > LIMITS.MAX_MATRIX_COMBINATIONS) {
        throw new GraphError(
          `Matrix for job "${jobId}" exceeds ${LIMITS.MAX_MATRIX_COMBINATIONS} combinations`,
          [jobId]
        );
      }
    }
  }

  combinations = combinations.filter(
    (combination) => !matrix.exclude.some((entry) => matches(combination, entry))
  );

  const extended = combinations.map((combination) => ({ ...combination }));
  const standalone: MatrixCombination[] = [];

  for (const entry of matrix.include) {
    const original: MatrixCombination = {};
    const added: MatrixCombination = {};
    for (const [key, value] of Object.entries(entry)) {
      if (dimensionNames.has(key)) original[key] = value;
      else added[key] = value;
    }

    let applied = false;
    combinations.forEach((combination, index) => {
      if (!matches(combination, original)) return;
      Object.assign(extended[index], added);
      applied = true;
    });
    if (!applied) standalone.push({ ...entry });
  }

  const result = [...extended, ...standalone];
  if (result.length > LIMITS.MAX_MATRIX_COMBINATIONS) {
    throw new GraphError(
      `Matrix for job "${jobId}" exceeds ${LIMITS.MAX_MATRIX_COMBINATIONS} combinations`,
      [jobId]
    );
  }
  return result;
}

function formatMatrixValue(value: MatrixValue): string {
  return String(value);
}

/**
 * Instance ids: `<job> (<v1>, <v2>, ...)`, with ` #n` on repeated ids.
 */
export function instanceIds(jobId: string, combinations: MatrixCombination[]): string[] {
  const seen = new Map<string, number>();
  return combinations.map((combination) => {
    const values = Object.values(combination).map(formatMatrixValue);
    const base = `${jobId} (${values.join(', ')})`;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base} #${count}`;
  });
}
