/**
 * Process execution collaborator. The step runner only sees this interface; the CLI
 * plugs in ProcessSandbox and tests use an in-process fake.
 */

export type SandboxChunk = string | Uint8Array;

export interface SandboxRequest {
  /** Shell script for `run` steps */
  run?: string;
  /** Action reference for `uses` steps */
  uses?: string;
  /** Inputs for `uses` steps */
  with?: Record<string, string>;
  env: Record<string, string>;
  cwd: string;
  shell: string;
}

export interface SandboxProcess {
  stdout: AsyncIterable<SandboxChunk>;
  stderr: AsyncIterable<SandboxChunk>;
  /** Resolves with the exit code once the process and its streams are done */
  exited: Promise<number>;
  /** Request termination. Calling it more than once has no further effect. */
  kill(): void;
}

export interface Sandbox {
  /**
   * Start a process for a step.
   * @throws ExecutionError if the process cannot be started
   */
  execute(request: SandboxRequest, signal: AbortSignal): SandboxProcess | Promise<SandboxProcess>;
}
