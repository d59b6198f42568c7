import type { Sandbox, SandboxChunk, SandboxProcess, SandboxRequest } from '../services/sandbox.ts';

export interface FakeScript {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number;
  /** Milliseconds before the process exits */
  delayMs?: number;
  /** Run until killed */
  hang?: boolean;
  /** Throw from execute, like a process that cannot start */
  startError?: Error;
  /** Fail the stdout stream after its lines */
  streamError?: Error;
}

export type FakeBehavior = (request: SandboxRequest) => FakeScript;

/** Exit code reported for a killed fake process */
export const KILLED_EXIT_CODE = 137;

async function* lines(items: readonly string[], error?: Error): AsyncGenerator<SandboxChunk> {
  for (const item of items) yield `${item}\n`;
  if (error) throw error;
}

/**
 * In-process stand-in for ProcessSandbox. Scripts are chosen by the step's `run` text.
 */
export class FakeSandbox implements Sandbox {
  readonly requests: SandboxRequest[] = [];
  /** Every kill() call, including repeated ones, by run text */
  readonly kills: string[] = [];
  /** Run texts in the order their processes exited */
  readonly finished: string[] = [];
  running = 0;
  maxRunning = 0;

  constructor(private readonly behavior: FakeBehavior = () => ({})) {}

  static scripted(scripts: Record<string, FakeScript>): FakeSandbox {
    return new FakeSandbox((request) =>
      request.run !== undefined && Object.hasOwn(scripts, request.run) ? scripts[request.run] : {}
    );
  }

  execute(request: SandboxRequest, _signal: AbortSignal): SandboxProcess {
    this.requests.push(request);
    const script = this.behavior(request);
    if (script.startError) throw script.startError;

    const label = request.run ?? request.uses ?? '';
    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);

    let settle: (code: number) => void = () => {};
    const exited = new Promise<number>((resolve) => {
      let done = false;
      let timer: NodeJS.Timeout | undefined;
      settle = (code) => {
        if (done) return;
        done = true;
        if (timer) clearTimeout(timer);
        this.running--;
        this.finished.push(label);
        resolve(code);
      };
      if (!script.hang) {
        timer = setTimeout(() => settle(script.exitCode ?? 0), script.delayMs ?? 0);
      }
    });

    return {
      stdout: lines(script.stdout ?? [], script.streamError),
      stderr: lines(script.stderr ?? []),
      exited,
      kill: () => {
        this.kills.push(label);
        settle(KILLED_EXIT_CODE);
      },
    };
  }

  requestFor(run: string): SandboxRequest | undefined {
    return this.requests.find((request) => request.run === run);
  }
}
