/**
 * Process-based sandbox for executing `run` steps.
 *
 * Each step runs as `<shell> -c <script>` in its own process group so that a kill
 * reaches everything the script started.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { ExecutionError } from '../runner/errors.ts';
import type { Sandbox, SandboxProcess, SandboxRequest } from '../runner/services/sandbox.ts';
import type { Logger } from './logger.ts';

export interface ProcessSandboxOptions {
  /** Logger for process lifecycle details */
  logger?: Logger;
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

export class ProcessSandbox implements Sandbox {
  constructor(private readonly options: ProcessSandboxOptions = {}) {}

  execute(request: SandboxRequest, signal: AbortSignal): SandboxProcess {
    if (request.uses !== undefined) {
      throw new ExecutionError(
        `Action "${request.uses}" cannot run in the local sandbox; only run steps and the artifact actions are supported`
      );
    }
    if (request.run === undefined) {
      throw new ExecutionError('Nothing to execute: the step has no run script');
    }

    const useProcessGroup = process.platform !== 'win32';
    const child = spawn(request.shell, ['-c', request.run], {
      cwd: request.cwd,
      env: request.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: useProcessGroup,
    });

    let killed = false;
    const kill = () => {
      if (killed) return;
      killed = true;
      this.options.logger?.debug?.(`Killing process ${child.pid ?? '(not started)'}`);
      if (child.exitCode !== null || child.signalCode !== null) return;
      try {
        if (useProcessGroup && child.pid !== undefined) {
          process.kill(-child.pid, 'SIGKILL');
        } else {
          child.kill('SIGKILL');
        }
      } catch (error) {
        // The group may already be gone; fall back to the direct child
        this.options.logger?.debug?.(`Process group kill failed: ${String(error)}`);
        child.kill('SIGKILL');
      }
    };

    const onAbort = () => kill();
    if (signal.aborted) {
      kill();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    const exited = new Promise<number>((resolve, reject) => {
      child.once('error', (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(
          new ExecutionError(`Failed to start "${request.shell}": ${error.message}`, {
            cause: error,
          })
        );
      });
      child.once('close', (code, exitSignal) => {
        signal.removeEventListener('abort', onAbort);
        resolve(code ?? signalExitCode(exitSignal));
      });
    });

    return { stdout: child.stdout, stderr: child.stderr, exited, kill };
  }
}
