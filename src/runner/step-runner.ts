import * as path from 'node:path';
import { ExpressionEvaluator } from '../expression/evaluator.ts';
import type { StatusFlags } from '../expression/functions.ts';
import type { Step } from '../parser/schema.ts';
import { Status, type StatusType } from '../types/status.ts';
import { LIMITS, MINUTE_MS } from '../utils/constants.ts';
import type { Logger } from '../utils/logger.ts';
import { PathResolver } from '../utils/paths.ts';
import { scheduleTimeout, type TimerHandle } from '../utils/timers.ts';
import {
  CancelledError,
  type ErrorKind,
  ExecutionError,
  type RunnelError,
  TimeoutError,
  toRunnelError,
} from './errors.ts';
import type { EventEmitter, LogStream } from './events.ts';
import type { JobInstance } from './execution-plan.ts';
import { withRetry } from './retry.ts';
import type { RunContext } from './run-context.ts';
import type { ArtifactStore } from './services/artifact-store.ts';
import type { ContextBuilder } from './services/context-builder.ts';
import type { Sandbox, SandboxChunk, SandboxRequest } from './services/sandbox.ts';
import { LineSplitter, parseWorkflowCommand } from './workflow-commands.ts';

const ARTIFACT_ACTION = /^actions\/(upload|download)-artifact(@.+)?$/;

export interface StepRunnerOptions {
  sandbox: Sandbox;
  artifacts: ArtifactStore;
  contexts: ContextBuilder;
  logger: Logger;
  events?: EventEmitter;
  workspace: string;
  shell: string;
}

export interface StepInvocation {
  context: RunContext;
  instance: JobInstance;
  index: number;
  step: Step;
  /** Job environment: `declared` for the env namespace, `process` for the sandbox */
  env: { declared: Record<string, string>; process: Record<string, string> };
  /** Outcome of the steps that ran before this one */
  status: StatusFlags;
  /** The job's cancellation signal */
  signal: AbortSignal;
  /** Epoch milliseconds at which the job budget runs out */
  deadline: number;
  /** The job budget, for error messages */
  jobTimeoutMs: number;
}

export interface StepResult {
  status: StatusType;
  outcome: StatusType;
  conclusion: StatusType;
  exitCode?: number;
  error?: string;
  errorKind?: ErrorKind;
}

interface PreparedStep {
  request: SandboxRequest;
  artifact?: 'upload' | 'download';
}

interface CaptureState {
  bytes: number;
  truncated: boolean;
}

/**
 * Runs a single step of a job instance: evaluates its condition and templates, executes
 * it through the sandbox (or the artifact store), streams and redacts its output, and
 * records the result in the run context.
 */
export class StepRunner {
  constructor(private readonly options: StepRunnerOptions) {}

  async run(invocation: StepInvocation): Promise<StepResult> {
    const { context, instance, index, step } = invocation;

    // 1. Condition
    let shouldRun: boolean;
    try {
      shouldRun = ExpressionEvaluator.evaluateCondition(
        step.if,
        this.options.contexts.stepContext(instance, invocation.env.declared, invocation.status)
      );
    } catch (error) {
      return this.finish(invocation, this.failure(step, toRunnelError(error)));
    }

    if (!shouldRun) {
      this.options.logger.debug?.(`[${instance.id}] Skipping step ${index + 1}: condition is false`);
      return this.finish(invocation, {
        status: Status.SKIPPED,
        outcome: Status.SKIPPED,
        conclusion: Status.SKIPPED,
      });
    }

    if (!context.startStep(instance.id, index)) {
      // Cancelled while the condition was being evaluated
      const record = context.getStep(instance.id, index);
      return {
        status: record.status,
        outcome: record.outcome ?? record.status,
        conclusion: record.conclusion ?? record.status,
      };
    }

    // 2. Templates, then execution with retries
    let result: StepResult;
    try {
      const prepared = this.prepare(invocation);
      const exitCode = await withRetry(
        (attempt) => this.attempt(invocation, prepared, attempt),
        step.retry,
        {
          signal: invocation.signal,
          shouldRetry: (error) => !(error instanceof CancelledError),
          onRetry: (attempt, error, delayMs) =>
            this.options.logger.warn(
              `[${instance.id}] Step ${index + 1} failed (${error.message}); retry ${attempt}/${step.retry?.count ?? 0} in ${delayMs}ms`
            ),
        }
      );
      result = {
        status: Status.SUCCESS,
        outcome: Status.SUCCESS,
        conclusion: Status.SUCCESS,
        exitCode,
      };
    } catch (error) {
      result = this.failure(step, toRunnelError(error));
    }

    return this.finish(invocation, result);
  }

  private failure(step: Step, error: RunnelError): StepResult {
    const exitCode = error instanceof ExecutionError ? error.exitCode : undefined;
    if (error instanceof CancelledError) {
      return {
        status: Status.CANCELLED,
        outcome: Status.CANCELLED,
        conclusion: Status.CANCELLED,
        error: error.message,
        errorKind: error.kind,
      };
    }
    return {
      status: Status.FAILURE,
      outcome: Status.FAILURE,
      conclusion: step['continue-on-error'] ? Status.SUCCESS : Status.FAILURE,
      exitCode,
      error: error.message,
      errorKind: error.kind,
    };
  }

  private finish(invocation: StepInvocation, result: StepResult): StepResult {
    const { context, instance, index } = invocation;
    if (result.error !== undefined) {
      this.options.logger.error(`[${instance.id}] Step ${index + 1} ${result.status}: ${result.error}`);
    }
    if (!context.finishStep(instance.id, index, result)) {
      // The instance was cancelled first; the recorded status stands
      const record = context.getStep(instance.id, index);
      return {
        status: record.status,
        outcome: record.outcome ?? record.status,
        conclusion: record.conclusion ?? record.status,
        exitCode: record.exitCode,
        error: record.error,
        errorKind: record.errorKind,
      };
    }
    const record = context.getStep(instance.id, index);
    return { ...result, error: record.error };
  }

  /**
   * Evaluate the step env (over the job env) and every template the step carries
   * @throws EvalError, or ExecutionError for an invalid working directory
   */
  private prepare(invocation: StepInvocation): PreparedStep {
    const { instance, step, env, status } = invocation;
    const outer = this.options.contexts.stepContext(instance, env.declared, status);
    const stepEnv = ExpressionEvaluator.evaluateRecord(step.env, outer);
    const declared = { ...env.declared, ...stepEnv };
    const expressionContext = this.options.contexts.stepContext(instance, declared, status);

    const workingDirectory =
      step['working-directory'] === undefined
        ? undefined
        : ExpressionEvaluator.evaluateTemplate(step['working-directory'], expressionContext);
    let cwd: string;
    try {
      cwd = PathResolver.resolveWorkingDirectory(this.options.workspace, workingDirectory);
    } catch (error) {
      throw new ExecutionError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    const request: SandboxRequest = {
      env: { ...env.process, ...stepEnv },
      cwd,
      shell: this.options.shell,
    };
    if (step.run !== undefined) {
      request.run = ExpressionEvaluator.evaluateTemplate(step.run, expressionContext);
    }
    if (step.uses !== undefined) {
      request.uses = step.uses;
      request.with = ExpressionEvaluator.evaluateRecord(step.with, expressionContext);
    }

    const artifact = step.uses === undefined ? undefined : ARTIFACT_ACTION.exec(step.uses.trim());
    return {
      request,
      artifact: artifact ? (artifact[1] === 'upload' ? 'upload' : 'download') : undefined,
    };
  }

  private timeoutFor(invocation: StepInvocation): number {
    const remaining = invocation.deadline - Date.now();
    const minutes = invocation.step['timeout-minutes'];
    if (minutes === undefined) return remaining;
    return Math.min(minutes * MINUTE_MS, remaining);
  }

  /**
   * One execution attempt. Resolves with exit code 0 or throws.
   */
  private async attempt(
    invocation: StepInvocation,
    prepared: PreparedStep,
    attempt: number
  ): Promise<number> {
    const { context, instance, index, signal } = invocation;
    if (signal.aborted) throw new CancelledError('The step was cancelled');

    context.beginAttempt(instance.id, index);
    this.options.events?.emit({
      type: 'step.start',
      instanceId: instance.id,
      stepIndex: index,
      stepName: context.getStep(instance.id, index).name,
      attempt,
    });

    const timeoutMs = this.timeoutFor(invocation);
    if (timeoutMs <= 0) throw new TimeoutError(invocation.jobTimeoutMs, 'Job');

    if (prepared.artifact) {
      return this.runArtifact(invocation, prepared, timeoutMs);
    }

    const child = await this.options.sandbox.execute(prepared.request, signal);

    let killed = false;
    let timedOut = false;
    const killOnce = () => {
      if (killed) return;
      killed = true;
      child.kill();
    };
    const timer = scheduleTimeout(() => {
      timedOut = true;
      killOnce();
    }, timeoutMs);
    const onAbort = () => killOnce();
    if (signal.aborted) killOnce();
    else signal.addEventListener('abort', onAbort, { once: true });

    const capture: CaptureState = { bytes: 0, truncated: false };
    let exitCode: number;
    try {
      [exitCode] = await Promise.all([
        child.exited,
        this.consume(invocation, child.stdout, 'stdout', capture),
        this.consume(invocation, child.stderr, 'stderr', capture),
      ]);
    } catch (error) {
      killOnce();
      throw error;
    } finally {
      timer.cancel();
      signal.removeEventListener('abort', onAbort);
    }

    if (signal.aborted) throw new CancelledError('The step was cancelled');
    if (timedOut) throw new TimeoutError(timeoutMs);
    if (exitCode !== 0) {
      throw new ExecutionError(`Process completed with exit code ${exitCode}`, { exitCode });
    }
    return exitCode;
  }

  private async consume(
    invocation: StepInvocation,
    stream: AsyncIterable<SandboxChunk>,
    name: LogStream,
    capture: CaptureState
  ): Promise<void> {
    const splitter = new LineSplitter();
    for await (const chunk of stream) {
      for (const line of splitter.push(chunk)) this.handleLine(invocation, name, line, capture);
    }
    for (const line of splitter.flush()) this.handleLine(invocation, name, line, capture);
  }

  private handleLine(
    invocation: StepInvocation,
    stream: LogStream,
    line: string,
    capture: CaptureState
  ): void {
    const { context, instance, index } = invocation;

    if (stream === 'stdout') {
      const command = parseWorkflowCommand(line);
      if (command?.kind === 'set-output') {
        context.setStepOutput(instance.id, index, command.name, command.value);
        this.options.logger.debug?.(`[${instance.id}] Step ${index + 1} set output "${command.name}"`);
        return;
      }
      if (command?.kind === 'add-mask') {
        context.addSecrets([command.value]);
        return;
      }
      if (command?.kind === 'malformed') {
        this.options.logger.debug?.(
          `[${instance.id}] Not a workflow command (${command.reason}): ${context.redactor.redact(line)}`
        );
      }
    }

    if (capture.truncated) return;
    capture.bytes += Buffer.byteLength(line) + 1;
    if (capture.bytes > LIMITS.MAX_CAPTURED_OUTPUT_BYTES) {
      capture.truncated = true;
      context.appendLog(instance.id, index, stream, '[output truncated]');
      return;
    }

    const stored = context.appendLog(instance.id, index, stream, line);
    if (stored === undefined) return;
    this.options.logger.log(`[${instance.id}] ${stored}`);
    this.options.events?.emit({
      type: 'step.log',
      instanceId: instance.id,
      stepIndex: index,
      stream,
      line: stored,
    });
  }

  private async runArtifact(
    invocation: StepInvocation,
    prepared: PreparedStep,
    timeoutMs: number
  ): Promise<number> {
    const { instance, index, signal } = invocation;
    const inputs = prepared.request.with ?? {};
    const cwd = prepared.request.cwd;

    const operation =
      prepared.artifact === 'upload'
        ? this.upload(inputs, cwd)
        : this.download(inputs, cwd);

    let timer: TimerHandle | undefined;
    let onAbort: (() => void) | undefined;
    const guard = new Promise<never>((_resolve, reject) => {
      timer = scheduleTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
      onAbort = () => reject(new CancelledError('The step was cancelled'));
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      const message = await Promise.race([operation, guard]);
      const stored = invocation.context.appendLog(instance.id, index, 'stdout', message);
      if (stored !== undefined) this.options.logger.log(`[${instance.id}] ${stored}`);
      return 0;
    } finally {
      timer?.cancel();
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }

  private async upload(inputs: Record<string, string>, cwd: string): Promise<string> {
    const name = inputs.name?.trim() || 'artifact';
    const patterns = (inputs.path ?? '')
      .split('\n')
      .map((pattern) => pattern.trim())
      .filter((pattern) => pattern.length > 0);
    if (patterns.length === 0) {
      throw new ExecutionError('upload-artifact requires a "path" input');
    }
    const upload = await this.options.artifacts.upload(name, patterns, cwd);
    return `Uploaded ${upload.files.length} file(s) to artifact "${upload.key}"`;
  }

  private async download(inputs: Record<string, string>, cwd: string): Promise<string> {
    const name = inputs.name?.trim();
    if (!name) {
      throw new ExecutionError('download-artifact requires a "name" input');
    }
    const destination = path.resolve(cwd, inputs.path?.trim() || '.');
    const restored = await this.options.artifacts.download(name, destination);
    if (restored === undefined) {
      throw new ExecutionError(`Artifact "${name}" not found`);
    }
    return `Downloaded artifact "${name}" to ${restored}`;
  }
}
