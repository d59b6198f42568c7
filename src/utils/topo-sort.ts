import { GraphError } from '../runner/errors.ts';

/**
 * Generic Topological Sort Utility
 */

export interface HasDependencies {
  id: string;
  needs: readonly string[];
}

/**
 * Topologically sort items based on dependencies. Items with no ordering constraint
 * between them keep their input order.
 * @throws GraphError if a dependency is missing or a cycle is detected
 */
export function topologicalSort<T extends HasDependencies>(items: readonly T[]): T[] {
  const itemMap = new Map(items.map((it) => [it.id, it]));

  for (const item of items) {
    const missing = item.needs.filter((dep) => !itemMap.has(dep));
    if (missing.length > 0) {
      throw new GraphError(
        `"${item.id}" needs unknown ${missing.length === 1 ? 'job' : 'jobs'}: ${missing.join(', ')}`,
        [item.id]
      );
    }
  }

  const sorted: T[] = [];
  const visited = new Set<string>();
  const visiting: string[] = [];

  function visit(item: T) {
    if (visited.has(item.id)) return;
    const start = visiting.indexOf(item.id);
    if (start !== -1) {
      const cycle = [...visiting.slice(start), item.id];
      throw new GraphError(
        `Circular dependency detected: ${cycle.join(' -> ')}`,
        visiting.slice(start)
      );
    }

    visiting.push(item.id);
    for (const depId of item.needs) {
      const dep = itemMap.get(depId);
      if (dep) visit(dep);
    }
    visiting.pop();

    visited.add(item.id);
    sorted.push(item);
  }

  for (const item of items) {
    visit(item);
  }

  return sorted;
}
