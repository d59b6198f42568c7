import type { Redactor } from './redactor.ts';

/**
 * Logger interface shared by the scheduler, step runner and CLI.
 *
 * Implementations decide formatting; the core only chooses the level.
 */
export interface Logger {
  /** Log general information/progress */
  log(message: string): void;
  /** Log error details */
  error(message: string): void;
  /** Log warnings about potentially problematic states */
  warn(message: string): void;
  /** Log informational messages */
  info(message: string): void;
  /** Log verbose debugging information. Optional to implement. */
  debug?(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  info(message: string): void {
    console.info(message);
  }

  debug(message: string): void {
    if (process.env.DEBUG || process.env.VERBOSE) {
      console.debug(message);
    }
  }
}

export class SilentLogger implements Logger {
  log(_message: string): void {}
  error(_message: string): void {}
  warn(_message: string): void {}
  info(_message: string): void {}
  debug(_message: string): void {}
}

/**
 * Passes every message through the run's redactor before it reaches the inner logger.
 * The redactor is looked up on each call because masks can be added mid-run.
 */
export class RedactingLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly getRedactor: () => Redactor
  ) {}

  log(message: string): void {
    this.inner.log(this.getRedactor().redact(message));
  }

  error(message: string): void {
    this.inner.error(this.getRedactor().redact(message));
  }

  warn(message: string): void {
    this.inner.warn(this.getRedactor().redact(message));
  }

  info(message: string): void {
    this.inner.info(this.getRedactor().redact(message));
  }

  debug(message: string): void {
    if (this.inner.debug) {
      this.inner.debug(this.getRedactor().redact(message));
    }
  }
}
