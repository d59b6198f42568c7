import { StringDecoder } from 'node:string_decoder';
import { LIMITS } from '../utils/constants.ts';
import type { SandboxChunk } from './services/sandbox.ts';

/**
 * Workflow commands are whole lines on stdout:
 *
 *   ::set-output name=<name>::<value>
 *   ::add-mask::<value>
 *
 * Anything else starting with `::` is not a command and stays in the log.
 */

export type WorkflowCommand =
  | { kind: 'set-output'; name: string; value: string }
  | { kind: 'add-mask'; value: string }
  | { kind: 'malformed'; reason: string };

const SET_OUTPUT = /^::set-output name=([A-Za-z_][A-Za-z0-9_-]*)::(.*)$/;
const ADD_MASK = /^::add-mask::(.+)$/;

export function parseWorkflowCommand(line: string): WorkflowCommand | undefined {
  if (!line.startsWith('::')) return undefined;

  const output = SET_OUTPUT.exec(line);
  if (output) return { kind: 'set-output', name: output[1], value: output[2] };

  const mask = ADD_MASK.exec(line);
  if (mask) return { kind: 'add-mask', value: mask[1] };

  if (line.startsWith('::set-output')) {
    return { kind: 'malformed', reason: 'expected "::set-output name=<name>::<value>"' };
  }
  if (line.startsWith('::add-mask')) {
    return { kind: 'malformed', reason: 'expected "::add-mask::<value>"' };
  }
  return { kind: 'malformed', reason: 'unknown command' };
}

/**
 * Turns a stream of chunks into lines. Handles multi-byte characters split across
 * chunks, strips `\r`, and breaks lines longer than the configured maximum.
 */
export class LineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private buffer = '';

  constructor(private readonly maxLineLength: number = LIMITS.MAX_LOG_LINE_LENGTH) {}

  push(chunk: SandboxChunk): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(Buffer.from(chunk));
    const parts = this.buffer.split('\n');
    this.buffer = parts.pop() ?? '';

    const lines: string[] = [];
    for (const part of parts) lines.push(...this.breakLine(part.replace(/\r$/, '')));

    while (this.buffer.length > this.maxLineLength) {
      lines.push(this.buffer.slice(0, this.maxLineLength));
      this.buffer = this.buffer.slice(this.maxLineLength);
    }
    return lines;
  }

  flush(): string[] {
    const rest = this.buffer + this.decoder.end();
    this.buffer = '';
    if (rest.length === 0) return [];
    return this.breakLine(rest.replace(/\r$/, ''));
  }

  private breakLine(line: string): string[] {
    if (line.length <= this.maxLineLength) return [line];
    const pieces: string[] = [];
    for (let i = 0; i < line.length; i += this.maxLineLength) {
      pieces.push(line.slice(i, i + this.maxLineLength));
    }
    return pieces;
  }
}
