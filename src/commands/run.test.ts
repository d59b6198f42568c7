import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryLogger } from '../runner/__test__/memory-logger.ts';
import { runWorkflowFile } from './run.ts';

const WORKFLOW = `
name: local
jobs:
  info:
    outputs:
      region: \${{ vars.REGION }}
      greeting: \${{ vars.GREETING }}
      tier: \${{ vars.TIER }}
  docs:
    if: vars.PUBLISH == 'yes'
`;

function eventType(line: string): unknown {
  const event: unknown = JSON.parse(line);
  return typeof event === 'object' && event !== null && 'type' in event ? event.type : undefined;
}

describe('runWorkflowFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'runnel-run-'));
    vi.stubEnv('XDG_CONFIG_HOME', join(dir, 'xdg'));
    vi.stubEnv('RUNNEL_CONFIG', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): void {
    const file = join(dir, name);
    mkdirSync(join(file, '..'), { recursive: true });
    writeFileSync(file, content);
  }

  it('should layer config vars under --vars and --var and print a summary', async () => {
    write('.runnel/config.yaml', 'vars:\n  REGION: config-region\n  TIER: config-tier\n');
    write('workflow.yaml', WORKFLOW);
    const output: string[] = [];
    const logger = new MemoryLogger();

    const { exitCode, result } = await runWorkflowFile(
      'workflow.yaml',
      { vars: 'GREETING=hi; TIER=list', var: ['TIER=pair', 'bad key=x'] },
      { stdout: (text) => output.push(text), logger, env: {}, cwd: dir }
    );

    expect(exitCode).toBe(0);
    expect(result?.jobs.map((job) => [job.instanceId, job.status])).toEqual([
      ['info', 'success'],
      ['docs', 'skipped'],
    ]);
    expect(result?.jobs[0].outputs).toEqual({
      region: 'config-region',
      greeting: 'hi',
      tier: 'pair',
    });
    expect(logger.messages('warn')).toEqual([
      '⚠️  Invalid variable name: "bad key" (use letters, digits and underscores)',
    ]);
    expect(output).toHaveLength(1);
    expect(output[0].startsWith('\nWorkflow "local" finished: success\n')).toBe(true);
  });

  it('should write NDJSON events instead of the summary', async () => {
    write('workflow.yaml', WORKFLOW);
    const output: string[] = [];

    const { exitCode } = await runWorkflowFile(
      'workflow.yaml',
      { events: true },
      { stdout: (text) => output.push(text), logger: new MemoryLogger(), env: {}, cwd: dir }
    );

    expect(exitCode).toBe(0);
    expect(output.every((line) => line.endsWith('\n'))).toBe(true);
    expect(output.map(eventType)).toEqual([
      'run.start',
      'job.status',
      'job.status',
      'job.status',
      'run.complete',
    ]);
  });

  it('should exit 1 when the run fails', async () => {
    write(
      'broken.yaml',
      `
jobs:
  broken:
    if: fromJSON('nope')
`
    );

    const { exitCode, result } = await runWorkflowFile(
      'broken.yaml',
      {},
      { stdout: () => {}, logger: new MemoryLogger(), env: {}, cwd: dir }
    );

    expect(exitCode).toBe(1);
    expect(result?.status).toBe('failure');
  });

  it('should reject a workflow that cannot be parsed', async () => {
    write('invalid.yaml', 'jobs:\n  build:\n    steps:\n      - name: nothing to do\n');

    await expect(
      runWorkflowFile('invalid.yaml', {}, { stdout: () => {}, logger: new MemoryLogger(), env: {}, cwd: dir })
    ).rejects.toThrow('a step must define exactly one of "run" or "uses"');
  });
});
