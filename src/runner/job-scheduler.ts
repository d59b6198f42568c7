import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import { ExpressionEvaluator } from '../expression/evaluator.ts';
import { RunStatus, type RunStatusType, Status } from '../types/status.ts';
import { LIMITS, TIMEOUTS, MINUTE_MS } from '../utils/constants.ts';
import { buildAmbientEnv } from '../utils/env-filter.ts';
import { ConsoleLogger, type Logger, RedactingLogger } from '../utils/logger.ts';
import { PathResolver } from '../utils/paths.ts';
import { CancelledError, toRunnelError } from './errors.ts';
import { EventEmitter, type EventHandler } from './events.ts';
import type { ExecutionPlan, JobInstance } from './execution-plan.ts';
import { JobRunner } from './job-runner.ts';
import { type JobRecord, RunContext, type StepRecord } from './run-context.ts';
import { type ArtifactStore, LocalArtifactStore } from './services/artifact-store.ts';
import { ContextBuilder } from './services/context-builder.ts';
import type { Sandbox } from './services/sandbox.ts';
import { SecretManager, type SecretProvider, StaticSecretProvider } from './services/secret-manager.ts';
import { StepRunner } from './step-runner.ts';

export const DEFAULT_SECRET_PREFIX = 'RUNNEL_SECRET_';

export interface SchedulerOptions {
  sandbox: Sandbox;
  /** Defaults to a directory store under `<workspace>/.runnel/artifacts/<runId>` */
  artifacts?: ArtifactStore;
  secrets?: SecretProvider;
  logger?: Logger;
  onEvent?: EventHandler;
  /** Aborting cancels every instance that has not finished */
  signal?: AbortSignal;
  runId?: string;
  /** Job instances running at once across the run */
  maxParallel?: number;
  /** Cancel everything that has not finished once any instance fails */
  failFast?: boolean;
  /** Job budget for jobs without `timeout-minutes` */
  defaultTimeoutMinutes?: number;
  /** The `vars` namespace */
  vars?: Record<string, string>;
  workspace?: string;
  shell?: string;
  /** Host environment the ambient env layer is built from */
  hostEnv?: Record<string, string | undefined>;
  /** Host variables with this prefix carry secrets and are never inherited */
  secretPrefix?: string;
}

export type StepReport = StepRecord;
export type JobReport = JobRecord;

export interface RunResult {
  runId: string;
  workflow: string;
  status: RunStatusType;
  startedAt: Date;
  finishedAt: Date;
  jobs: JobReport[];
}

type Admission = 'started' | 'settled' | 'waiting';

/**
 * Walks the execution plan: admits ready instances under the parallelism and
 * concurrency-group limits, runs each one as its own task, and handles skips,
 * fail-fast and cancellation.
 *
 * Admission and terminal publication happen synchronously between awaits, so two
 * decisions never interleave.
 */
export class JobScheduler {
  readonly context: RunContext;
  private readonly logger: Logger;
  private readonly events: EventEmitter;
  private readonly maxParallel: number;

  private readonly tasks = new Map<string, Promise<void>>();
  private readonly controllers = new Map<string, AbortController>();
  /** Evaluated concurrency group per instance */
  private readonly groups = new Map<string, string>();
  /** The instance waiting for each group, when cancel-in-progress is off */
  private readonly waiters = new Map<string, string>();
  private wake: (() => void) | undefined;

  private contexts: ContextBuilder | undefined;
  private jobs: JobRunner | undefined;

  constructor(
    private readonly plan: ExecutionPlan,
    private readonly options: SchedulerOptions
  ) {
    const runId = options.runId ?? randomUUID();
    this.maxParallel = options.maxParallel ?? LIMITS.DEFAULT_MAX_PARALLEL;
    if (!Number.isInteger(this.maxParallel) || this.maxParallel <= 0) {
      throw new Error(`maxParallel must be a positive integer, got: ${this.maxParallel}`);
    }

    this.events = new EventEmitter(runId, plan.workflow.name, options.onEvent, (error) =>
      this.logger.warn(`Event handler failed: ${String(error)}`)
    );
    this.context = new RunContext(runId, plan, this.events);
    this.logger = new RedactingLogger(
      options.logger ?? new ConsoleLogger(),
      () => this.context.redactor
    );
  }

  get runId(): string {
    return this.context.runId;
  }

  async run(): Promise<RunResult> {
    const startedAt = new Date();
    const workflow = this.plan.workflow;
    const workspace = path.resolve(this.options.workspace ?? process.cwd());
    const secretPrefix = this.options.secretPrefix ?? DEFAULT_SECRET_PREFIX;

    const secretManager = new SecretManager(
      this.options.secrets ?? new StaticSecretProvider({}),
      this.logger
    );
    const secrets = await secretManager.resolveForWorkflow(workflow);
    this.context.addSecrets(Object.values(secrets));

    this.contexts = new ContextBuilder(this.context, {
      runId: this.runId,
      workflowName: workflow.name,
      workspace,
      ambient: buildAmbientEnv(this.options.hostEnv ?? process.env, { secretPrefix }),
      secrets,
      vars: { ...(this.options.vars ?? {}) },
    });
    const steps = new StepRunner({
      sandbox: this.options.sandbox,
      artifacts:
        this.options.artifacts ??
        new LocalArtifactStore(
          path.join(PathResolver.getProjectDir(workspace), 'artifacts', this.runId)
        ),
      contexts: this.contexts,
      logger: this.logger,
      events: this.events,
      workspace,
      shell: this.options.shell ?? 'sh',
    });
    this.jobs = new JobRunner({
      context: this.context,
      contexts: this.contexts,
      steps,
      logger: this.logger,
      defaultTimeoutMinutes:
        this.options.defaultTimeoutMinutes ?? TIMEOUTS.DEFAULT_JOB_TIMEOUT_MS / MINUTE_MS,
    });

    this.events.emit({
      type: 'run.start',
      instances: this.plan.instances.map((instance) => instance.id),
    });
    this.logger.log(`Running workflow "${workflow.name}" (${this.plan.instances.length} job instance(s))`);

    const signal = this.options.signal;
    const onAbort = () => this.abortRun();
    if (signal?.aborted) this.abortRun();
    else signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await this.loop();
    } finally {
      signal?.removeEventListener('abort', onAbort);
      // Cancelled tasks settle after their status was published; wait so no process outlives the run
      await Promise.allSettled(Array.from(this.tasks.values()));
    }

    const status = this.runStatus();
    this.events.emit({ type: 'run.complete', status });
    return {
      runId: this.runId,
      workflow: workflow.name,
      status,
      startedAt,
      finishedAt: new Date(),
      jobs: this.context.snapshot(),
    };
  }

  private async loop(): Promise<void> {
    while (true) {
      this.schedule();
      if (this.context.completedIds().size === this.plan.instances.length) return;

      const tasks = Array.from(this.tasks.values());
      if (tasks.length === 0) {
        // Nothing running and nothing admissible: settle the rest rather than spin
        for (const instance of this.plan.instances) {
          if (this.context.isTerminal(instance.id)) continue;
          this.context.settleJob(instance.id, Status.FAILURE, {
            error: 'The job instance could not be scheduled',
            errorKind: 'execution',
          });
        }
        return;
      }

      const woken = new Promise<void>((resolve) => {
        this.wake = resolve;
      });
      await Promise.race([...tasks, woken]);
      this.wake = undefined;
    }
  }

  /**
   * Admit or settle every ready instance. Settling one (skip, failure) can make
   * others ready, so repeat until a pass changes nothing.
   */
  private schedule(): void {
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const id of this.plan.readySet(this.context.completedIds())) {
        if (this.context.statusOf(id) !== Status.PENDING) continue;
        if (this.admit(id) === 'settled') progressed = true;
      }
    }
  }

  private admit(id: string): Admission {
    const instance = this.plan.get(id);
    if (!instance || !this.contexts) return 'waiting';
    const { job } = instance;

    if (this.context.aborted) {
      this.cancelInstance(id, 'The run was cancelled');
      return 'settled';
    }

    // 1. Condition: implicit success() skips dependents of failed, cancelled or skipped jobs
    let shouldRun: boolean;
    try {
      shouldRun = ExpressionEvaluator.evaluateCondition(
        job.if,
        this.contexts.jobContext(instance)
      );
    } catch (error) {
      this.fail(instance, error);
      return 'settled';
    }
    if (!shouldRun) {
      this.logger.log(`- ${id} skipped`);
      this.context.settleJob(id, Status.SKIPPED);
      return 'settled';
    }

    // 2. Concurrency group: a newer member supersedes the older even while it waits for capacity
    let group: string | undefined;
    if (job.concurrency) {
      group = this.groups.get(id);
      if (group === undefined) {
        try {
          group = ExpressionEvaluator.evaluateTemplate(
            job.concurrency.group,
            this.contexts.jobContext(instance)
          );
        } catch (error) {
          this.fail(instance, error);
          return 'settled';
        }
        this.groups.set(id, group);
      }

      const waiter = this.waiters.get(group);
      if (waiter !== undefined && waiter !== id) {
        this.cancelInstance(waiter, `Superseded by ${id} in concurrency group "${group}"`);
      }
      const holders = this.groupHolders(group, id);
      if (job.concurrency['cancel-in-progress']) {
        for (const holder of holders) {
          this.cancelInstance(holder, `Superseded by ${id} in concurrency group "${group}"`);
        }
      } else if (holders.length > 0) {
        this.waiters.set(group, id);
        return 'waiting';
      }
    }

    // 3. Capacity
    const strategyMax = job.strategy?.['max-parallel'];
    if (
      this.context.runningCount() >= this.maxParallel ||
      (strategyMax !== undefined && this.context.runningCount(instance.jobId) >= strategyMax)
    ) {
      if (group !== undefined) this.waiters.set(group, id);
      return 'waiting';
    }
    if (group !== undefined && this.waiters.get(group) === id) this.waiters.delete(group);

    // 4. Start
    this.start(instance);
    return 'started';
  }

  private groupHolders(group: string, except: string): string[] {
    const holders: string[] = [];
    for (const [other, otherGroup] of this.groups) {
      if (other === except || otherGroup !== group) continue;
      if (this.context.statusOf(other) === Status.RUNNING) holders.push(other);
    }
    return holders;
  }

  private start(instance: JobInstance): void {
    const { id } = instance;
    if (!this.context.transitionJob(id, Status.RUNNING)) return;
    this.logger.log(`> ${id} started`);

    const controller = new AbortController();
    this.controllers.set(id, controller);

    const task = this.execute(instance, controller.signal).finally(() => {
      this.tasks.delete(id);
      this.controllers.delete(id);
      this.afterSettled(id);
    });
    this.tasks.set(id, task);
  }

  private async execute(instance: JobInstance, signal: AbortSignal): Promise<void> {
    if (!this.jobs) return;
    try {
      await this.jobs.run(instance, signal);
    } catch (error) {
      this.fail(instance, error);
    }
  }

  private fail(instance: JobInstance, error: unknown): void {
    const failure = toRunnelError(error);
    this.logger.error(`[${instance.id}] ${failure.message}`);
    const settled = this.context.settleJob(instance.id, Status.FAILURE, {
      conclusion: instance.job['continue-on-error'] ? Status.SUCCESS : Status.FAILURE,
      error: failure.message,
      errorKind: failure.kind,
    });
    if (settled && !this.tasks.has(instance.id)) this.afterSettled(instance.id);
  }

  /**
   * Fail-fast handling once an instance reached its terminal status
   */
  private afterSettled(id: string): void {
    const record = this.context.getJob(id);
    const instance = this.plan.get(id);
    if (record.status === Status.SUCCESS) this.logger.log(`+ ${id} succeeded`);
    else if (record.status === Status.FAILURE) this.logger.log(`x ${id} failed`);
    if (!instance || record.conclusion !== Status.FAILURE) return;

    if (this.options.failFast) {
      for (const other of this.plan.instances) {
        this.cancelInstance(other.id, `Cancelled because ${id} failed`);
      }
      return;
    }

    if (instance.isMatrix && (instance.job.strategy?.['fail-fast'] ?? true)) {
      for (const sibling of this.plan.instancesOf(instance.jobId)) {
        if (sibling.id === id) continue;
        this.cancelInstance(sibling.id, `Cancelled because ${id} failed (fail-fast)`);
      }
    }
  }

  /**
   * Publish Cancelled now, then stop the instance's task. Returns false if the
   * instance had already finished.
   */
  private cancelInstance(id: string, reason: string): boolean {
    if (!this.context.cancelJob(id, reason)) return false;
    this.logger.warn(`! ${id} cancelled: ${reason}`);

    for (const [group, waiter] of this.waiters) {
      if (waiter === id) this.waiters.delete(group);
    }
    this.controllers.get(id)?.abort(new CancelledError(reason));
    return true;
  }

  private abortRun(): void {
    this.context.markAborted();
    for (const instance of this.plan.instances) {
      this.cancelInstance(instance.id, 'The run was cancelled');
    }
    this.wake?.();
  }

  private runStatus(): RunStatusType {
    const records = this.context.snapshot();
    if (this.context.aborted && records.some((record) => record.status === Status.CANCELLED)) {
      return RunStatus.CANCELLED;
    }
    if (records.some((record) => record.conclusion === Status.FAILURE)) {
      return RunStatus.FAILURE;
    }
    return RunStatus.SUCCESS;
  }
}
