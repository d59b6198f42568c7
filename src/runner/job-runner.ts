import { ExpressionEvaluator } from '../expression/evaluator.ts';
import type { StatusFlags } from '../expression/functions.ts';
import { Status, type StatusType } from '../types/status.ts';
import { MINUTE_MS } from '../utils/constants.ts';
import type { Logger } from '../utils/logger.ts';
import { type ErrorKind, TimeoutError, toRunnelError } from './errors.ts';
import type { JobInstance } from './execution-plan.ts';
import type { RunContext } from './run-context.ts';
import type { ContextBuilder, JobEnvironment } from './services/context-builder.ts';
import type { StepRunner } from './step-runner.ts';

export interface JobRunnerOptions {
  context: RunContext;
  contexts: ContextBuilder;
  steps: StepRunner;
  logger: Logger;
  /** Job budget when the job sets no `timeout-minutes` */
  defaultTimeoutMinutes: number;
}

/**
 * Runs the steps of one admitted (running) job instance in order and publishes
 * the instance's terminal status.
 */
export class JobRunner {
  constructor(private readonly options: JobRunnerOptions) {}

  async run(instance: JobInstance, signal: AbortSignal): Promise<void> {
    const { context, contexts, logger } = this.options;
    const { job } = instance;

    const timeoutMinutes = job['timeout-minutes'] ?? this.options.defaultTimeoutMinutes;
    const jobTimeoutMs = timeoutMinutes * MINUTE_MS;
    const deadline = Date.now() + jobTimeoutMs;

    let env: JobEnvironment;
    try {
      env = contexts.jobEnv(instance);
    } catch (error) {
      const failure = toRunnelError(error);
      this.settle(instance, Status.FAILURE, failure.message, failure.kind);
      return;
    }

    let firstError: { message: string; kind?: ErrorKind } | undefined;
    let failed = false;

    for (const [index, step] of job.steps.entries()) {
      if (signal.aborted || context.isTerminal(instance.id)) break;

      if (Date.now() >= deadline) {
        const timeout = new TimeoutError(jobTimeoutMs, 'Job');
        logger.error(`[${instance.id}] ${timeout.message}`);
        this.settle(instance, Status.FAILURE, timeout.message, timeout.kind);
        return;
      }

      const status: StatusFlags = { success: !failed, failure: failed, cancelled: false };
      const result = await this.options.steps.run({
        context,
        instance,
        index,
        step,
        env,
        status,
        signal,
        deadline,
        jobTimeoutMs,
      });

      if (result.conclusion === Status.FAILURE) {
        failed = true;
        if (!firstError) {
          firstError = { message: result.error ?? `Step ${index + 1} failed`, kind: result.errorKind };
        }
      }
    }

    // Cancelled instances were already published by whoever cancelled them
    if (signal.aborted || context.isTerminal(instance.id)) return;

    const outputsContext = contexts.stepContext(instance, env.declared, {
      success: !failed,
      failure: failed,
      cancelled: false,
    });
    let outputs: Record<string, string>;
    try {
      outputs = ExpressionEvaluator.evaluateRecord(job.outputs, outputsContext);
    } catch (error) {
      const failure = toRunnelError(error);
      logger.error(`[${instance.id}] Failed to evaluate job outputs: ${failure.message}`);
      this.settle(instance, Status.FAILURE, failure.message, failure.kind);
      return;
    }
    context.setJobOutputs(instance.id, outputs);

    if (failed) {
      this.settle(instance, Status.FAILURE, firstError?.message, firstError?.kind);
    } else {
      this.settle(instance, Status.SUCCESS);
    }
  }

  private settle(
    instance: JobInstance,
    status: StatusType,
    error?: string,
    errorKind?: ErrorKind
  ): void {
    const continueOnError = instance.job['continue-on-error'] && status === Status.FAILURE;
    this.options.context.settleJob(instance.id, status, {
      conclusion: continueOnError ? Status.SUCCESS : status,
      error,
      errorKind,
    });
  }
}
