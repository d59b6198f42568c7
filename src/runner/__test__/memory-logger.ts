import type { Logger } from '../../utils/logger.ts';

export type LogLevel = 'log' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Logger that keeps every message, for assertions
 */
export class MemoryLogger implements Logger {
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  log(message: string): void {
    this.entries.push({ level: 'log', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}
