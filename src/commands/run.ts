/**
 * runnel run command
 * Execute a workflow locally
 */

import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { JobScheduler, type RunResult } from '../runner/job-scheduler.ts';
import type { RunEvent } from '../runner/events.ts';
import { LocalArtifactStore } from '../runner/services/artifact-store.ts';
import { EnvSecretProvider } from '../runner/services/secret-manager.ts';
import { formatRunSummary } from '../runner/workflow-summary.ts';
import { RunStatus } from '../types/status.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { ConsoleLogger, type Logger, SilentLogger } from '../utils/logger.ts';
import { ProcessSandbox } from '../utils/process-sandbox.ts';
import {
  collect,
  errorMessage,
  parsePositiveInt,
  parseVarPairs,
  splitVarList,
} from './utils.ts';

export interface RunCommandOptions {
  var?: string[];
  vars?: string;
  maxParallel?: number;
  failFast?: boolean;
  events?: boolean;
  quiet?: boolean;
  workspace?: string;
}

export interface RunCommandIo {
  stdout: (text: string) => void;
  logger?: Logger;
  env?: Record<string, string | undefined>;
  cwd?: string;
  signal?: AbortSignal;
}

/**
 * Load, configure and execute a workflow. Exit code 0 only when the run succeeded.
 */
export async function runWorkflowFile(
  file: string,
  options: RunCommandOptions,
  io: RunCommandIo
): Promise<{ exitCode: number; result?: RunResult }> {
  const env = io.env ?? process.env;
  const cwd = io.cwd ?? process.cwd();
  const quiet = !!options.quiet || !!options.events;
  const logger = io.logger ?? (quiet ? new SilentLogger() : new ConsoleLogger());

  const config = ConfigLoader.load({ cwd, env, logger });

  // Precedence: config vars < --vars list < --var pairs
  const pairs = [...splitVarList(options.vars ?? ''), ...(options.var ?? [])];
  const parsed = parseVarPairs(pairs);
  for (const warning of parsed.warnings) logger.warn(`⚠️  ${warning}`);
  const vars = { ...config.vars, ...parsed.vars };

  const { plan } = WorkflowParser.loadWorkflow(resolve(cwd, file));
  const workspace = resolve(cwd, options.workspace ?? '.');
  const runId = randomUUID();

  const onEvent = options.events
    ? (event: RunEvent) => io.stdout(`${JSON.stringify(event)}\n`)
    : undefined;

  const scheduler = new JobScheduler(plan, {
    runId,
    sandbox: new ProcessSandbox({ logger }),
    artifacts: new LocalArtifactStore(resolve(workspace, config.artifacts.dir, runId)),
    secrets: new EnvSecretProvider(config.secrets.env_prefix, env),
    secretPrefix: config.secrets.env_prefix,
    logger,
    onEvent,
    signal: io.signal,
    maxParallel: options.maxParallel ?? config.concurrency.max_parallel,
    failFast: options.failFast ?? config.fail_fast,
    defaultTimeoutMinutes: config.timeouts.default_minutes,
    vars,
    workspace,
    shell: config.shell,
    hostEnv: env,
  });

  const result = await scheduler.run();
  if (!options.events) {
    io.stdout(`\n${formatRunSummary(result)}\n`);
  }
  return { exitCode: result.status === RunStatus.SUCCESS ? 0 : 1, result };
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a workflow')
    .argument('<workflow>', 'Path to the workflow file')
    .option('--var <key=value>', 'Set a variable in the vars namespace (repeatable)', collect)
    .option('--vars <list>', 'Set several variables: "K1=v1; K2=v2"')
    .option('--max-parallel <n>', 'Job instances running at once', parsePositiveInt)
    .option('--fail-fast', 'Cancel the whole run once any job instance fails')
    .option('--events', 'Emit structured JSON events (NDJSON) to stdout')
    .option('-q, --quiet', 'Only print the run summary')
    .option('-w, --workspace <dir>', 'Directory steps run in (default: current directory)')
    .action(async (workflowPath: string, options: RunCommandOptions) => {
      const controller = new AbortController();
      const onSignal = () => controller.abort();
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      let exitCode = 1;
      try {
        ({ exitCode } = await runWorkflowFile(workflowPath, options, {
          stdout: (text) => process.stdout.write(text),
          signal: controller.signal,
        }));
      } catch (error) {
        console.error('✗ Failed to execute workflow:', errorMessage(error));
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
      process.exit(exitCode);
    });
}
