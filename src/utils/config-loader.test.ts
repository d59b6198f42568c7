import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigLoader } from './config-loader.ts';
import type { Logger } from './logger.ts';

class WarningCollector implements Logger {
  readonly warnings: string[] = [];
  log(): void {}
  error(): void {}
  info(): void {}
  warn(message: string): void {
    this.warnings.push(message);
  }
}

describe('ConfigLoader', () => {
  let dir: string;
  let logger: WarningCollector;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'runnel-config-'));
    logger = new WarningCollector();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = join(dir, name);
    mkdirSync(join(file, '..'), { recursive: true });
    writeFileSync(file, content);
    return file;
  }

  it('should return defaults when no file exists', () => {
    const config = ConfigLoader.load({ paths: [join(dir, 'none.yaml')], env: {}, logger });
    expect(config).toEqual(ConfigLoader.defaults());
    expect(config.concurrency.max_parallel).toBe(4);
    expect(config.timeouts.default_minutes).toBe(360);
    expect(config.secrets.env_prefix).toBe('RUNNEL_SECRET_');
    expect(config.artifacts.dir).toBe('.runnel/artifacts');
    expect(config.shell).toBe('sh');
    expect(config.fail_fast).toBe(false);
    expect(logger.warnings).toEqual([]);
  });

  it('should merge files with the first path taking precedence', () => {
    const project = write('project.yaml', 'concurrency:\n  max_parallel: 8\nvars:\n  REGION: eu\n');
    const user = write('user.yaml', 'concurrency:\n  max_parallel: 2\nfail_fast: true\nvars:\n  TIER: free\n');
    const config = ConfigLoader.load({ paths: [project, user], env: {}, logger });
    expect(config.concurrency.max_parallel).toBe(8);
    expect(config.fail_fast).toBe(true);
    expect(config.vars).toEqual({ TIER: 'free', REGION: 'eu' });
  });

  it('should interpolate environment variables', () => {
    const file = write('config.yaml', 'shell: ${SHELL_BIN}\nvars:\n  HOME_DIR: $HOME_DIR\n  MISSING: "x${NOPE}y"\n');
    const config = ConfigLoader.load({
      paths: [file],
      env: { SHELL_BIN: 'bash', HOME_DIR: '/home/ci' },
      logger,
    });
    expect(config.shell).toBe('bash');
    expect(config.vars).toEqual({ HOME_DIR: '/home/ci', MISSING: 'xy' });
  });

  it('should find the project config under .runnel', () => {
    write('.runnel/config.yaml', 'timeouts:\n  default_minutes: 15\n');
    const config = ConfigLoader.load({ cwd: dir, env: {}, logger });
    expect(config.timeouts.default_minutes).toBe(15);
  });

  it('should fall back to defaults on an invalid config', () => {
    const file = write('config.yaml', 'concurrency:\n  max_parallel: -1\n');
    const config = ConfigLoader.load({ paths: [file], env: {}, logger });
    expect(config.concurrency.max_parallel).toBe(4);
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^Warning: Invalid configuration, using defaults: /);
  });

  it('should ignore files whose top level is not a mapping', () => {
    const file = write('config.yaml', '- one\n- two\n');
    const config = ConfigLoader.load({ paths: [file], env: {}, logger });
    expect(config).toEqual(ConfigLoader.defaults());
    expect(logger.warnings).toEqual([`Warning: Ignoring config ${file}: top level must be a mapping`]);
  });

  it('should deep merge nested mappings', () => {
    expect(
      ConfigLoader.deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2] })
    ).toEqual({ a: { b: 1, c: 3 }, d: [2] });
  });
});
