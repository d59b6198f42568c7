/**
 * Centralized status constants for job instances, steps and runs
 */

export const Status = {
  PENDING: 'pending',
  RUNNING: 'running',
  SUCCESS: 'success',
  FAILURE: 'failure',
  SKIPPED: 'skipped',
  CANCELLED: 'cancelled',
} as const;

export type StatusType = (typeof Status)[keyof typeof Status];

export type TerminalStatusType = Exclude<StatusType, 'pending' | 'running'>;

export const RunStatus = {
  SUCCESS: 'success',
  FAILURE: 'failure',
  CANCELLED: 'cancelled',
} as const;

export type RunStatusType = (typeof RunStatus)[keyof typeof RunStatus];

export function isTerminal(status: StatusType): status is TerminalStatusType {
  return status !== Status.PENDING && status !== Status.RUNNING;
}
