import type { Job, MatrixCombination, Workflow } from '../parser/schema.ts';
import { topologicalSort } from '../utils/topo-sort.ts';
import { GraphError } from './errors.ts';
import { expandMatrix, instanceIds } from './matrix.ts';

/**
 * One job bound to one matrix combination.
 */
export interface JobInstance {
  id: string;
  jobId: string;
  job: Job;
  /** Empty for jobs without a matrix */
  matrix: MatrixCombination;
  isMatrix: boolean;
}

/**
 * The expanded, validated job DAG of a workflow. Immutable once built.
 */
export class ExecutionPlan {
  private readonly byId = new Map<string, JobInstance>();
  private readonly byJob = new Map<string, JobInstance[]>();
  private readonly dependencies = new Map<string, string[]>();

  constructor(
    readonly workflow: Workflow,
    /** Instances in plan order: jobs topologically sorted, matrix combinations in expansion order */
    readonly instances: readonly JobInstance[]
  ) {
    for (const instance of instances) {
      this.byId.set(instance.id, instance);
      const siblings = this.byJob.get(instance.jobId) ?? [];
      siblings.push(instance);
      this.byJob.set(instance.jobId, siblings);
    }
    for (const instance of instances) {
      const deps = instance.job.needs.flatMap((need) =>
        (this.byJob.get(need) ?? []).map((dep) => dep.id)
      );
      this.dependencies.set(instance.id, deps);
    }
  }

  get(id: string): JobInstance | undefined {
    return this.byId.get(id);
  }

  get jobIds(): string[] {
    return Array.from(this.byJob.keys());
  }

  instancesOf(jobId: string): JobInstance[] {
    return [...(this.byJob.get(jobId) ?? [])];
  }

  dependenciesOf(id: string): string[] {
    return [...(this.dependencies.get(id) ?? [])];
  }

  /**
   * Instances not yet completed whose dependencies have all completed, in plan order.
   * Completed means terminal, whatever the status.
   */
  readySet(completed: ReadonlySet<string>): string[] {
    return this.instances
      .filter(
        (instance) =>
          !completed.has(instance.id) &&
          this.dependenciesOf(instance.id).every((dep) => completed.has(dep))
      )
      .map((instance) => instance.id);
  }

  /**
   * Instance ids grouped by the wave in which they become ready when every
   * instance completes.
   */
  waves(): string[][] {
    const completed = new Set<string>();
    const waves: string[][] = [];
    while (completed.size < this.instances.length) {
      const ready = this.readySet(completed);
      if (ready.length === 0) break;
      waves.push(ready);
      for (const id of ready) completed.add(id);
    }
    return waves;
  }

  topologicalOrder(): string[] {
    return this.waves().flat();
  }
}

/**
 * Expand matrices and validate the `needs` graph.
 * @throws GraphError on unknown dependencies, cycles or an empty matrix
 */
export function buildExecutionPlan(workflow: Workflow): ExecutionPlan {
  const jobs = Object.entries(workflow.jobs).map(([id, job]) => ({ id, needs: job.needs, job }));
  const ordered = topologicalSort(jobs);

  const instances: JobInstance[] = [];
  for (const { id, job } of ordered) {
    const matrix = job.strategy?.matrix;
    if (!matrix) {
      instances.push({ id, jobId: id, job, matrix: {}, isMatrix: false });
      continue;
    }

    const combinations = expandMatrix(matrix, id);
    if (combinations.length === 0) {
      throw new GraphError(`Matrix for job "${id}" produces no combinations`, [id]);
    }
    const ids = instanceIds(id, combinations);
    combinations.forEach((combination, index) => {
      instances.push({ id: ids[index], jobId: id, job, matrix: combination, isMatrix: true });
    });
  }

  return new ExecutionPlan(workflow, instances);
}
