import { Status, type StatusType } from '../types/status.ts';
import type { JobReport, RunResult } from './job-scheduler.ts';

const ICONS: Record<StatusType, string> = {
  pending: '·',
  running: '…',
  success: '✓',
  failure: '✗',
  skipped: '⊘',
  cancelled: '■',
};

function duration(report: { startedAt?: Date; finishedAt?: Date }): string {
  if (!report.startedAt || !report.finishedAt) return '';
  const ms = report.finishedAt.getTime() - report.startedAt.getTime();
  return ms < 1000 ? ` (${ms}ms)` : ` (${(ms / 1000).toFixed(1)}s)`;
}

function jobLine(job: JobReport): string {
  const label = job.name === job.jobId ? job.instanceId : `${job.instanceId} "${job.name}"`;
  const concluded =
    job.conclusion !== undefined && job.conclusion !== job.status
      ? ` [${job.status}, continued]`
      : '';
  return `${ICONS[job.status]} ${label}${concluded}${duration(job)}`;
}

/**
 * Render a run result as a plain-text report: one line per job instance with its steps,
 * followed by the failed, cancelled and skipped instances listed separately.
 */
export function formatRunSummary(result: RunResult): string {
  const lines = [`Workflow "${result.workflow}" finished: ${result.status}`, ''];

  for (const job of result.jobs) {
    lines.push(jobLine(job));
    if (job.status === Status.SKIPPED) continue;
    for (const step of job.steps) {
      if (step.status === Status.PENDING) continue;
      const exit = step.exitCode !== undefined && step.exitCode !== 0 ? ` exit ${step.exitCode}` : '';
      lines.push(`    ${ICONS[step.status]} ${step.name}${exit}${duration(step)}`);
    }
    if (job.error && job.status !== Status.SUCCESS) {
      lines.push(`    ${job.error}`);
    }
  }

  const groups: Array<[string, StatusType]> = [
    ['Failed', Status.FAILURE],
    ['Cancelled', Status.CANCELLED],
    ['Skipped', Status.SKIPPED],
  ];
  for (const [title, status] of groups) {
    const ids = result.jobs.filter((job) => job.status === status).map((job) => job.instanceId);
    if (ids.length > 0) {
      lines.push('', `${title}: ${ids.join(', ')}`);
    }
  }

  return lines.join('\n');
}
