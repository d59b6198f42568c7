import type { ExpressionContext } from '../../expression/evaluator.ts';
import { ExpressionEvaluator } from '../../expression/evaluator.ts';
import type { StatusFlags } from '../../expression/functions.ts';
import { Status } from '../../types/status.ts';
import type { JobInstance } from '../execution-plan.ts';
import type { RunContext } from '../run-context.ts';

export interface RunEnvironment {
  runId: string;
  workflowName: string;
  workspace: string;
  /** Host environment with sensitive keys removed */
  ambient: Record<string, string>;
  secrets: Record<string, string>;
  vars: Record<string, string>;
}

export interface JobEnvironment {
  /** Workflow and job env, as the `env` namespace shows them */
  declared: Record<string, string>;
  /** Everything a step process inherits */
  process: Record<string, string>;
}

/**
 * Service for building the expression contexts and environments of job instances
 * and their steps.
 */
export class ContextBuilder {
  constructor(
    private readonly context: RunContext,
    private readonly run: RunEnvironment
  ) {}

  github(instance: JobInstance): Record<string, string> {
    return {
      run_id: this.run.runId,
      workflow: this.run.workflowName,
      job: instance.jobId,
      workspace: this.run.workspace,
    };
  }

  /**
   * Variables every step sees beneath the workflow env
   */
  builtinEnv(instance: JobInstance): Record<string, string> {
    return {
      CI: 'true',
      GITHUB_ACTIONS: 'true',
      GITHUB_RUN_ID: this.run.runId,
      GITHUB_WORKFLOW: this.run.workflowName,
      GITHUB_JOB: instance.jobId,
      GITHUB_WORKSPACE: this.run.workspace,
    };
  }

  /**
   * Status flags for job-level conditions, derived from the direct dependencies.
   * A dependency that ended failure, cancelled or skipped (after continue-on-error) clears
   * success(), so the whole chain below a failed job is skipped.
   */
  jobStatus(instance: JobInstance): StatusFlags {
    const conclusions = this.context.plan
      .dependenciesOf(instance.id)
      .map((dep) => {
        const record = this.context.getJob(dep);
        return record.conclusion ?? record.status;
      });
    const failure = conclusions.includes(Status.FAILURE);
    const cancelled = conclusions.includes(Status.CANCELLED);
    const skipped = conclusions.includes(Status.SKIPPED);
    return {
      success: !failure && !cancelled && !skipped && !this.context.aborted,
      failure,
      cancelled: this.context.aborted,
    };
  }

  /**
   * Context for job-level expressions: `if`, `concurrency`, `env` and `outputs`
   */
  jobContext(instance: JobInstance, env: Record<string, string> = {}): ExpressionContext {
    return {
      env,
      matrix: { ...instance.matrix },
      secrets: { ...this.run.secrets },
      vars: { ...this.run.vars },
      github: this.github(instance),
      needs: this.context.jobsView(instance.job.needs),
      jobs: this.context.jobsView(),
      status: this.jobStatus(instance),
    };
  }

  /**
   * Context for step-level expressions
   */
  stepContext(
    instance: JobInstance,
    env: Record<string, string>,
    status: StatusFlags
  ): ExpressionContext {
    return {
      ...this.jobContext(instance, env),
      steps: this.context.stepsView(instance.id),
      status,
    };
  }

  /**
   * Environment of a job instance. The process sees ambient < built-ins < workflow env <
   * job env; the `env` expression namespace sees only the declared layers. Each layer's
   * templates are evaluated against the declared layers beneath it.
   * @throws EvalError
   */
  jobEnv(instance: JobInstance): JobEnvironment {
    let declared: Record<string, string> = {};
    for (const layer of [this.context.plan.workflow.env, instance.job.env]) {
      const evaluated = ExpressionEvaluator.evaluateRecord(
        layer,
        this.jobContext(instance, declared)
      );
      declared = { ...declared, ...evaluated };
    }
    return {
      declared,
      process: { ...this.run.ambient, ...this.builtinEnv(instance), ...declared },
    };
  }
}
