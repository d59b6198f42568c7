/**
 * Error taxonomy for workflow runs.
 *
 * ParseError and GraphError are thrown to the caller before anything executes.
 * The remaining kinds are caught at the step or job boundary and recorded in the
 * run context as a terminal status plus an error detail.
 */

export type ErrorKind = 'parse' | 'graph' | 'eval' | 'execution' | 'timeout' | 'cancelled';

export abstract class RunnelError extends Error {
  abstract readonly kind: ErrorKind;
}

export interface ParseIssue {
  /** Dotted path into the workflow document, e.g. `jobs.build.steps.0.run` */
  path: string;
  message: string;
}

export class ParseError extends RunnelError {
  readonly kind = 'parse' as const;

  constructor(
    public readonly issues: ParseIssue[],
    public readonly source?: string
  ) {
    const where = source ? ` in ${source}` : '';
    const lines = issues.map((issue) =>
      issue.path ? `  - ${issue.path}: ${issue.message}` : `  - ${issue.message}`
    );
    super(`Invalid workflow${where}:\n${lines.join('\n')}`);
    this.name = 'ParseError';
  }
}

export class GraphError extends RunnelError {
  readonly kind = 'graph' as const;

  constructor(
    message: string,
    public readonly jobIds: string[] = []
  ) {
    super(message);
    this.name = 'GraphError';
  }
}

export class EvalError extends RunnelError {
  readonly kind = 'eval' as const;

  constructor(
    message: string,
    public readonly expression?: string
  ) {
    super(expression === undefined ? message : `${message} (in "${expression}")`);
    this.name = 'EvalError';
  }
}

export class ExecutionError extends RunnelError {
  readonly kind = 'execution' as const;
  /** Exit code of the process, when one ran */
  readonly exitCode?: number;

  constructor(message: string, options: { cause?: unknown; exitCode?: number } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExecutionError';
    this.exitCode = options.exitCode;
  }
}

export class TimeoutError extends RunnelError {
  readonly kind = 'timeout' as const;

  constructor(
    public readonly timeoutMs: number,
    operation = 'Step'
  ) {
    super(`${operation} timed out after ${formatTimeout(timeoutMs)}`);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends RunnelError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'The operation was cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

function formatTimeout(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60_000).toFixed(1)}m`;
}

/**
 * Normalize anything thrown into an Error with a kind, so callers can record it.
 */
export function toRunnelError(error: unknown): RunnelError {
  if (error instanceof RunnelError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ExecutionError(message, { cause: error });
}
