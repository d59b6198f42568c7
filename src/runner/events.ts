import type { RunStatusType, StatusType } from '../types/status.ts';
import type { ErrorKind } from './errors.ts';

export type LogStream = 'stdout' | 'stderr';

export type RunEvent =
  | {
      type: 'run.start';
      timestamp: string;
      runId: string;
      workflow: string;
      instances: string[];
    }
  | {
      type: 'job.status';
      timestamp: string;
      runId: string;
      workflow: string;
      instanceId: string;
      jobId: string;
      status: StatusType;
      error?: string;
    }
  | {
      type: 'step.start';
      timestamp: string;
      runId: string;
      workflow: string;
      instanceId: string;
      stepIndex: number;
      stepName: string;
      attempt: number;
    }
  | {
      type: 'step.log';
      timestamp: string;
      runId: string;
      workflow: string;
      instanceId: string;
      stepIndex: number;
      stream: LogStream;
      line: string;
    }
  | {
      type: 'step.end';
      timestamp: string;
      runId: string;
      workflow: string;
      instanceId: string;
      stepIndex: number;
      stepName: string;
      status: StatusType;
      outcome?: StatusType;
      exitCode?: number;
      errorKind?: ErrorKind;
      error?: string;
      durationMs?: number;
    }
  | {
      type: 'run.complete';
      timestamp: string;
      runId: string;
      workflow: string;
      status: RunStatusType;
    };

export type EventHandler = (event: RunEvent) => void;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type RunEventInput = DistributiveOmit<RunEvent, 'timestamp' | 'runId' | 'workflow'>;

/**
 * Stamps events with run identity and time before handing them to the handler.
 * Handler failures are reported to the logger callback and never reach the run.
 */
export class EventEmitter {
  constructor(
    private readonly runId: string,
    private readonly workflow: string,
    private readonly handler?: EventHandler,
    private readonly onHandlerError?: (error: unknown) => void
  ) {}

  emit(event: RunEventInput): void {
    if (!this.handler) return;
    const stamped = {
      ...event,
      timestamp: new Date().toISOString(),
      runId: this.runId,
      workflow: this.workflow,
    };
    try {
      this.handler(stamped);
    } catch (error) {
      this.onHandlerError?.(error);
    }
  }
}
