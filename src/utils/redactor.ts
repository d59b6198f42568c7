/**
 * Redactor for masking secrets in output strings
 *
 * Every log line, error message and reported output passes through a Redactor before
 * it is stored in the run context or shown to the caller.
 */

export const DEFAULT_MASK = '***';

export interface RedactorOptions {
  /** Replacement text for each secret occurrence */
  mask?: string;
}

export class Redactor {
  private combinedPattern: RegExp | null = null;
  private readonly secrets: string[];
  private readonly mask: string;

  constructor(secretValues: Iterable<string>, options: RedactorOptions = {}) {
    this.mask = options.mask ?? DEFAULT_MASK;

    const toRedact = new Set<string>();
    for (const value of secretValues) {
      if (typeof value !== 'string') continue;
      const trimmed = value.trim();
      if (trimmed.length === 0) continue;
      toRedact.add(value);
      if (trimmed !== value) toRedact.add(trimmed);

      // Multi-line secrets are also masked line by line, since logs are stored per line
      if (value.includes('\n')) {
        for (const line of value.split(/\r?\n/)) {
          if (line.trim().length > 0) toRedact.add(line);
        }
      }
    }

    // Longest first so a secret that contains another is replaced whole
    this.secrets = Array.from(toRedact).sort((a, b) => b.length - a.length);

    if (this.secrets.length > 0) {
      const escaped = this.secrets.map((secret) => secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
      this.combinedPattern = new RegExp(escaped.join('|'), 'g');
    }
  }

  /**
   * Create a redactor that masks everything this one does plus the given values.
   */
  extend(values: Iterable<string>): Redactor {
    return new Redactor([...this.secrets, ...values], { mask: this.mask });
  }

  get size(): number {
    return this.secrets.length;
  }

  /**
   * Redact all secrets from a string
   */
  redact(text: string): string {
    if (!this.combinedPattern || text.length === 0) {
      return text;
    }
    return text.replace(this.combinedPattern, this.mask);
  }

  /**
   * Redact secrets from any value (string, object, array)
   */
  redactValue<T>(value: T): T;
  redactValue(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.redact(value);
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }

    if (value !== null && typeof value === 'object') {
      const redacted: Record<string, unknown> = {};
      for (const [key, val] of Object.entries(value)) {
        redacted[key] = this.redactValue(val);
      }
      return redacted;
    }

    return value;
  }
}
