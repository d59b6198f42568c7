import { describe, expect, it } from 'vitest';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { Status } from '../types/status.ts';
import { EventEmitter, type RunEvent } from './events.ts';
import { buildExecutionPlan } from './execution-plan.ts';
import { RunContext, stepDisplayName } from './run-context.ts';

const WORKFLOW = `
name: ctx
jobs:
  build:
    steps:
      - id: compile
        run: make
      - run: |
          npm test
          npm run lint
  deploy:
    needs: build
    strategy:
      matrix:
        env: [staging, prod]
    steps:
      - uses: actions/deploy@v1
`;

function setup() {
  const events: RunEvent[] = [];
  const plan = buildExecutionPlan(WorkflowParser.parse(WORKFLOW));
  const context = new RunContext('run-1', plan, new EventEmitter('run-1', 'ctx', (event) => events.push(event)));
  return { context, events };
}

describe('RunContext', () => {
  it('should create a pending record per instance with named steps', () => {
    const { context } = setup();
    expect(context.snapshot().map((job) => [job.instanceId, job.status])).toEqual([
      ['build', 'pending'],
      ['deploy (staging)', 'pending'],
      ['deploy (prod)', 'pending'],
    ]);
    expect(context.getJob('build').steps.map((step) => step.name)).toEqual([
      'compile',
      'Run npm test',
    ]);
    expect(context.getJob('deploy (prod)').matrix).toEqual({ env: 'prod' });
  });

  it('should only move statuses forward', () => {
    const { context, events } = setup();
    expect(context.transitionJob('build', Status.RUNNING)).toBe(true);
    expect(context.transitionJob('build', Status.PENDING)).toBe(false);
    expect(context.transitionJob('build', Status.SUCCESS)).toBe(true);
    expect(context.transitionJob('build', Status.FAILURE)).toBe(false);
    expect(context.transitionJob('build', Status.RUNNING)).toBe(false);
    expect(context.statusOf('build')).toBe('success');

    const statuses = events.flatMap((event) => (event.type === 'job.status' ? [event.status] : []));
    expect(statuses).toEqual(['running', 'success']);
  });

  it('should settle a pending instance and skip its steps', () => {
    const { context } = setup();
    expect(context.settleJob('deploy (staging)', Status.RUNNING)).toBe(false);
    expect(context.settleJob('deploy (staging)', Status.SKIPPED)).toBe(true);
    const record = context.getJob('deploy (staging)');
    expect(record.status).toBe('skipped');
    expect(record.conclusion).toBe('skipped');
    expect(record.steps.map((step) => step.status)).toEqual(['skipped']);
    expect(context.settleJob('deploy (staging)', Status.FAILURE)).toBe(false);
  });

  it('should cancel the running step, skip pending steps and reject later writes', () => {
    const { context } = setup();
    context.transitionJob('build', Status.RUNNING);
    context.startStep('build', 0);

    expect(context.cancelJob('build', 'Superseded')).toBe(true);
    const record = context.getJob('build');
    expect(record.status).toBe('cancelled');
    expect(record.error).toBe('Superseded');
    expect(record.errorKind).toBe('cancelled');
    expect(record.steps.map((step) => step.status)).toEqual(['cancelled', 'skipped']);
    expect(record.steps[0].error).toBe('Superseded');

    expect(context.cancelJob('build', 'again')).toBe(false);
    expect(context.finishStep('build', 0, { status: Status.SUCCESS })).toBe(false);
    expect(context.appendLog('build', 0, 'stdout', 'late line')).toBeUndefined();
    expect(context.setStepOutput('build', 0, 'x', 'y')).toBe(false);
    expect(context.setJobOutputs('build', { x: 'y' })).toBe(false);
  });

  it('should redact logs, outputs and errors on write', () => {
    const { context } = setup();
    context.addSecrets(['test-secret']);
    context.transitionJob('build', Status.RUNNING);
    context.startStep('build', 0);

    expect(context.appendLog('build', 0, 'stdout', 'token is test-secret')).toBe('token is ***');
    context.setStepOutput('build', 0, 'token', 'test-secret');
    context.setJobOutputs('build', { url: 'https://test-secret.example' });
    context.finishStep('build', 0, { status: Status.FAILURE, error: 'failed with test-secret' });
    context.settleJob('build', Status.FAILURE, { error: 'job saw test-secret' });

    const record = context.getJob('build');
    expect(record.steps[0].logs).toEqual([{ stream: 'stdout', line: 'token is ***' }]);
    expect(record.steps[0].outputs).toEqual({ token: '***' });
    expect(record.steps[0].error).toBe('failed with ***');
    expect(record.outputs).toEqual({ url: 'https://***.example' });
    expect(record.error).toBe('job saw ***');
  });

  it('should count attempts only while the step runs', () => {
    const { context } = setup();
    context.transitionJob('build', Status.RUNNING);
    expect(context.beginAttempt('build', 0)).toBe(0);
    context.startStep('build', 0);
    expect(context.beginAttempt('build', 0)).toBe(1);
    expect(context.beginAttempt('build', 0)).toBe(2);
  });

  it('should expose step results by id with outcome and conclusion', () => {
    const { context, events } = setup();
    context.transitionJob('build', Status.RUNNING);
    expect(context.stepsView('build')).toEqual({
      compile: { outputs: {}, outcome: '', conclusion: '' },
    });

    context.startStep('build', 0);
    context.setStepOutput('build', 0, 'version', '1.0.0');
    context.finishStep('build', 0, {
      status: Status.FAILURE,
      conclusion: Status.SUCCESS,
      exitCode: 2,
      errorKind: 'execution',
    });
    expect(context.stepsView('build')).toEqual({
      compile: { outputs: { version: '1.0.0' }, outcome: 'failure', conclusion: 'success' },
    });

    const end = events.find((event) => event.type === 'step.end');
    expect(end).toMatchObject({
      type: 'step.end',
      runId: 'run-1',
      workflow: 'ctx',
      instanceId: 'build',
      stepIndex: 0,
      stepName: 'compile',
      status: 'failure',
      outcome: 'failure',
      exitCode: 2,
      errorKind: 'execution',
    });
  });

  it('should aggregate matrix instances into one job view', () => {
    const { context } = setup();
    expect(context.jobView('deploy')).toEqual({ result: '', outputs: {}, finished: false });

    context.transitionJob('deploy (staging)', Status.RUNNING);
    context.setJobOutputs('deploy (staging)', { url: 'staging-url' });
    context.settleJob('deploy (staging)', Status.SUCCESS);
    expect(context.jobView('deploy').finished).toBe(false);

    context.settleJob('deploy (prod)', Status.FAILURE);
    expect(context.jobView('deploy')).toEqual({
      result: 'failure',
      outputs: { url: 'staging-url' },
      finished: true,
    });
  });

  it('should use the conclusion after continue-on-error in job views', () => {
    const { context } = setup();
    context.settleJob('build', Status.FAILURE, { conclusion: Status.SUCCESS });
    expect(context.jobView('build').result).toBe('success');
    expect(context.getJob('build').status).toBe('failure');
  });

  it('should report skipped only when every instance was skipped', () => {
    const { context } = setup();
    context.settleJob('deploy (staging)', Status.SKIPPED);
    context.settleJob('deploy (prod)', Status.SKIPPED);
    expect(context.jobView('deploy').result).toBe('skipped');
    expect(context.jobsView(['deploy', 'unknown'])).toEqual({
      deploy: { result: 'skipped', outputs: {}, finished: true },
    });
  });

  it('should track running and completed instances', () => {
    const { context } = setup();
    context.transitionJob('deploy (staging)', Status.RUNNING);
    context.transitionJob('deploy (prod)', Status.RUNNING);
    context.settleJob('build', Status.SUCCESS);
    expect(context.runningCount()).toBe(2);
    expect(context.runningCount('deploy')).toBe(2);
    expect(context.runningCount('build')).toBe(0);
    expect(Array.from(context.completedIds())).toEqual(['build']);
  });

  it('should hand out copies', () => {
    const { context } = setup();
    const copy = context.getJob('build');
    copy.outputs.injected = 'x';
    copy.steps[0].outputs.injected = 'x';
    expect(context.getJob('build').outputs).toEqual({});
    expect(context.getJob('build').steps[0].outputs).toEqual({});
  });

  it('should track the abort flag', () => {
    const { context } = setup();
    expect(context.aborted).toBe(false);
    context.markAborted();
    expect(context.aborted).toBe(true);
  });
});

describe('stepDisplayName', () => {
  it('should prefer name, then id, then the command', () => {
    expect(stepDisplayName({ name: 'Build', id: 'b', run: 'make', 'continue-on-error': false }, 0)).toBe(
      'Build'
    );
    expect(stepDisplayName({ id: 'b', run: 'make', 'continue-on-error': false }, 0)).toBe('b');
    expect(stepDisplayName({ run: '  make all\nmake test', 'continue-on-error': false }, 0)).toBe(
      'Run make all'
    );
    expect(stepDisplayName({ uses: 'actions/checkout@v4', 'continue-on-error': false }, 0)).toBe(
      'Run actions/checkout@v4'
    );
  });
});
