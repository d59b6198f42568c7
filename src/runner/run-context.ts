import type { JobContextView, StepContextView } from '../expression/evaluator.ts';
import type { Step } from '../parser/schema.ts';
import { Status, type StatusType, isTerminal } from '../types/status.ts';
import { Redactor } from '../utils/redactor.ts';
import type { ErrorKind } from './errors.ts';
import type { EventEmitter, LogStream } from './events.ts';
import type { ExecutionPlan } from './execution-plan.ts';

export interface LogLine {
  stream: LogStream;
  line: string;
}

export interface StepRecord {
  index: number;
  id?: string;
  name: string;
  status: StatusType;
  /** Result before continue-on-error is applied */
  outcome?: StatusType;
  /** Result after continue-on-error is applied */
  conclusion?: StatusType;
  outputs: Record<string, string>;
  logs: LogLine[];
  exitCode?: number;
  error?: string;
  errorKind?: ErrorKind;
  attempts: number;
  startedAt?: Date;
  finishedAt?: Date;
}

export interface JobRecord {
  instanceId: string;
  jobId: string;
  name: string;
  matrix: Record<string, string | number | boolean>;
  status: StatusType;
  conclusion?: StatusType;
  outputs: Record<string, string>;
  error?: string;
  errorKind?: ErrorKind;
  startedAt?: Date;
  finishedAt?: Date;
  steps: StepRecord[];
}

export interface StepCompletion {
  status: StatusType;
  outcome?: StatusType;
  conclusion?: StatusType;
  exitCode?: number;
  error?: string;
  errorKind?: ErrorKind;
}

export interface JobCompletion {
  conclusion?: StatusType;
  error?: string;
  errorKind?: ErrorKind;
}

export function stepDisplayName(step: Step, index: number): string {
  if (step.name) return step.name;
  if (step.id) return step.id;
  if (step.run) return `Run ${step.run.split('\n')[0].trim()}`;
  if (step.uses) return `Run ${step.uses}`;
  return `Step ${index + 1}`;
}

function canTransition(from: StatusType, to: StatusType): boolean {
  if (isTerminal(from)) return false;
  if (from === Status.PENDING) return to !== Status.PENDING;
  // running -> terminal
  return isTerminal(to);
}

function copyJob(record: JobRecord): JobRecord {
  return {
    ...record,
    matrix: { ...record.matrix },
    outputs: { ...record.outputs },
    steps: record.steps.map((step) => ({
      ...step,
      outputs: { ...step.outputs },
      logs: step.logs.map((line) => ({ ...line })),
    })),
  };
}

/**
 * Mutable state of one workflow run: status, outputs and logs per job instance and step.
 *
 * Every status write goes through a transition check. Records only move forward
 * (pending -> running -> terminal, or pending -> terminal); writes to a terminal record
 * are ignored and reported as `false`.
 */
export class RunContext {
  private readonly jobs = new Map<string, JobRecord>();
  private redactorValue: Redactor;
  private abortedValue = false;

  constructor(
    readonly runId: string,
    readonly plan: ExecutionPlan,
    private readonly events?: EventEmitter,
    redactor: Redactor = new Redactor([])
  ) {
    this.redactorValue = redactor;
    for (const instance of plan.instances) {
      this.jobs.set(instance.id, {
        instanceId: instance.id,
        jobId: instance.jobId,
        name: instance.job.name ?? instance.jobId,
        matrix: { ...instance.matrix },
        status: Status.PENDING,
        outputs: {},
        steps: instance.job.steps.map((step, index) => ({
          index,
          id: step.id,
          name: stepDisplayName(step, index),
          status: Status.PENDING,
          outputs: {},
          logs: [],
          attempts: 0,
        })),
      });
    }
  }

  get redactor(): Redactor {
    return this.redactorValue;
  }

  /**
   * Mask additional values from now on
   */
  addSecrets(values: Iterable<string>): void {
    this.redactorValue = this.redactorValue.extend(values);
  }

  get aborted(): boolean {
    return this.abortedValue;
  }

  markAborted(): void {
    this.abortedValue = true;
  }

  private record(instanceId: string): JobRecord {
    const record = this.jobs.get(instanceId);
    if (!record) throw new Error(`Unknown job instance: ${instanceId}`);
    return record;
  }

  private stepRecord(instanceId: string, index: number): StepRecord {
    const step = this.record(instanceId).steps[index];
    if (!step) throw new Error(`Unknown step ${index} of job instance ${instanceId}`);
    return step;
  }

  // ===== Reads =====

  getJob(instanceId: string): JobRecord {
    return copyJob(this.record(instanceId));
  }

  getStep(instanceId: string, index: number): StepRecord {
    const step = this.stepRecord(instanceId, index);
    return { ...step, outputs: { ...step.outputs }, logs: step.logs.map((line) => ({ ...line })) };
  }

  statusOf(instanceId: string): StatusType {
    return this.record(instanceId).status;
  }

  isTerminal(instanceId: string): boolean {
    return isTerminal(this.record(instanceId).status);
  }

  snapshot(): JobRecord[] {
    return this.plan.instances.map((instance) => copyJob(this.record(instance.id)));
  }

  completedIds(): Set<string> {
    const completed = new Set<string>();
    for (const [id, record] of this.jobs) {
      if (isTerminal(record.status)) completed.add(id);
    }
    return completed;
  }

  runningCount(jobId?: string): number {
    let count = 0;
    for (const record of this.jobs.values()) {
      if (record.status !== Status.RUNNING) continue;
      if (jobId === undefined || record.jobId === jobId) count++;
    }
    return count;
  }

  /**
   * Expression view of the steps of an instance that have an id
   */
  stepsView(instanceId: string): Record<string, StepContextView> {
    const view: Record<string, StepContextView> = {};
    for (const step of this.record(instanceId).steps) {
      if (step.id === undefined) continue;
      view[step.id] = {
        outputs: { ...step.outputs },
        outcome: isTerminal(step.status) ? (step.outcome ?? step.status) : '',
        conclusion: isTerminal(step.status) ? (step.conclusion ?? step.status) : '',
      };
    }
    return view;
  }

  /**
   * Aggregate view of every instance of a job: failure if any instance concluded failure,
   * else cancelled if any was cancelled, else skipped if all were skipped, else success.
   * Outputs are merged in plan order.
   */
  jobView(jobId: string): JobContextView {
    const records = this.plan.instancesOf(jobId).map((instance) => this.record(instance.id));
    const finished = records.every((record) => isTerminal(record.status));
    const conclusions = records.map((record) => record.conclusion ?? record.status);

    let result: string = Status.SUCCESS;
    if (conclusions.includes(Status.FAILURE)) result = Status.FAILURE;
    else if (conclusions.includes(Status.CANCELLED)) result = Status.CANCELLED;
    else if (records.length > 0 && conclusions.every((c) => c === Status.SKIPPED)) {
      result = Status.SKIPPED;
    }

    const outputs: Record<string, string> = {};
    for (const record of records) {
      for (const [name, value] of Object.entries(record.outputs)) {
        if (value !== '' || !(name in outputs)) outputs[name] = value;
      }
    }

    return { result: finished ? result : '', outputs: finished ? outputs : {}, finished };
  }

  jobsView(jobIds: Iterable<string> = this.plan.jobIds): Record<string, JobContextView> {
    const view: Record<string, JobContextView> = {};
    for (const jobId of jobIds) {
      if (this.plan.instancesOf(jobId).length > 0) view[jobId] = this.jobView(jobId);
    }
    return view;
  }

  // ===== Job writes =====

  /**
   * Move an instance forward. Returns false (and changes nothing) if the move would
   * leave a terminal state or go backwards.
   */
  transitionJob(instanceId: string, status: StatusType, completion: JobCompletion = {}): boolean {
    const record = this.record(instanceId);
    if (!canTransition(record.status, status)) return false;

    record.status = status;
    const now = new Date();
    if (status === Status.RUNNING) {
      record.startedAt = now;
    } else {
      record.finishedAt = now;
      record.conclusion = completion.conclusion ?? status;
      if (completion.error !== undefined) record.error = this.redactor.redact(completion.error);
      if (completion.errorKind !== undefined) record.errorKind = completion.errorKind;
    }

    this.events?.emit({
      type: 'job.status',
      instanceId,
      jobId: record.jobId,
      status,
      error: record.error,
    });
    return true;
  }

  setJobOutputs(instanceId: string, outputs: Record<string, string>): boolean {
    const record = this.record(instanceId);
    if (isTerminal(record.status)) return false;
    record.outputs = this.redactor.redactValue({ ...outputs });
    return true;
  }

  /**
   * Cancel an instance: the running step ends cancelled, pending steps are skipped and the
   * instance ends cancelled. Returns false if the instance was already terminal.
   */
  cancelJob(instanceId: string, reason: string): boolean {
    const record = this.record(instanceId);
    if (isTerminal(record.status)) return false;

    for (const step of record.steps) {
      if (step.status === Status.RUNNING) {
        this.finishStep(instanceId, step.index, {
          status: Status.CANCELLED,
          error: reason,
          errorKind: 'cancelled',
        });
      } else if (step.status === Status.PENDING) {
        this.finishStep(instanceId, step.index, { status: Status.SKIPPED });
      }
    }

    return this.transitionJob(instanceId, Status.CANCELLED, {
      error: reason,
      errorKind: 'cancelled',
    });
  }

  /**
   * Settle an instance that never ran, or that stopped early: every pending step is
   * skipped and the instance moves to `status`.
   */
  settleJob(instanceId: string, status: StatusType, completion: JobCompletion = {}): boolean {
    const record = this.record(instanceId);
    if (isTerminal(record.status) || !isTerminal(status)) return false;

    for (const step of record.steps) {
      if (step.status === Status.PENDING) {
        this.finishStep(instanceId, step.index, { status: Status.SKIPPED });
      }
    }
    return this.transitionJob(instanceId, status, completion);
  }

  // ===== Step writes =====

  startStep(instanceId: string, index: number): boolean {
    const step = this.stepRecord(instanceId, index);
    if (!canTransition(step.status, Status.RUNNING)) return false;
    step.status = Status.RUNNING;
    step.startedAt = new Date();
    return true;
  }

  beginAttempt(instanceId: string, index: number): number {
    const step = this.stepRecord(instanceId, index);
    if (step.status !== Status.RUNNING) return step.attempts;
    step.attempts++;
    return step.attempts;
  }

  finishStep(instanceId: string, index: number, completion: StepCompletion): boolean {
    const step = this.stepRecord(instanceId, index);
    if (!isTerminal(completion.status) || !canTransition(step.status, completion.status)) {
      return false;
    }

    step.status = completion.status;
    step.outcome = completion.outcome ?? completion.status;
    step.conclusion = completion.conclusion ?? completion.status;
    step.finishedAt = new Date();
    if (completion.exitCode !== undefined) step.exitCode = completion.exitCode;
    if (completion.error !== undefined) step.error = this.redactor.redact(completion.error);
    if (completion.errorKind !== undefined) step.errorKind = completion.errorKind;

    const durationMs = step.startedAt
      ? step.finishedAt.getTime() - step.startedAt.getTime()
      : undefined;
    this.events?.emit({
      type: 'step.end',
      instanceId,
      stepIndex: index,
      stepName: step.name,
      status: step.status,
      outcome: step.outcome,
      exitCode: step.exitCode,
      errorKind: step.errorKind,
      error: step.error,
      durationMs,
    });
    return true;
  }

  /**
   * Store a log line. The line is redacted here; callers pass raw text.
   * Returns the stored (redacted) line, or undefined if the step is no longer running.
   */
  appendLog(instanceId: string, index: number, stream: LogStream, line: string): string | undefined {
    const step = this.stepRecord(instanceId, index);
    if (step.status !== Status.RUNNING) return undefined;
    const redacted = this.redactor.redact(line);
    step.logs.push({ stream, line: redacted });
    return redacted;
  }

  setStepOutput(instanceId: string, index: number, name: string, value: string): boolean {
    const step = this.stepRecord(instanceId, index);
    if (step.status !== Status.RUNNING) return false;
    step.outputs[name] = this.redactor.redact(value);
    return true;
  }
}
