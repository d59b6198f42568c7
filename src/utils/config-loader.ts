import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { type Config, ConfigSchema } from '../parser/config-schema.ts';
import { ConsoleLogger, type Logger } from './logger.ts';
import { PathResolver } from './paths.ts';

export interface ConfigLoadOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Explicit file list, highest precedence first. Defaults to PathResolver.getConfigPaths(cwd). */
  paths?: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class ConfigLoader {
  static deepMerge(
    target: Record<string, unknown>,
    source: Record<string, unknown>
  ): Record<string, unknown> {
    const output = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = output[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        output[key] = ConfigLoader.deepMerge(existing, value);
      } else {
        output[key] = value;
      }
    }
    return output;
  }

  /**
   * Interpolate environment variables: ${VAR_NAME} or $VAR_NAME
   */
  static interpolate(content: string, env: Record<string, string | undefined>): string {
    return content.replace(
      /\$\{([^}]+)\}|\$([a-zA-Z_][a-zA-Z0-9_]*)/g,
      (_match, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare ?? '';
        return env[name] ?? '';
      }
    );
  }

  /**
   * Load and merge every config file that exists. Nothing is cached; each call reads the
   * files again and the caller passes the result on explicitly.
   */
  static load(options: ConfigLoadOptions = {}): Config {
    const logger = options.logger ?? new ConsoleLogger();
    const env = options.env ?? process.env;
    const configPaths = options.paths ?? PathResolver.getConfigPaths(options.cwd);
    let mergedConfig: Record<string, unknown> = {};

    // Load configurations in reverse precedence order (User -> Project -> Env)
    for (const path of [...configPaths].reverse()) {
      if (!existsSync(path)) continue;
      try {
        const content = ConfigLoader.interpolate(readFileSync(path, 'utf-8'), env);
        const loaded: unknown = yaml.load(content);
        if (loaded === undefined || loaded === null) continue;
        if (!isPlainObject(loaded)) {
          logger.warn(`Warning: Ignoring config ${path}: top level must be a mapping`);
          continue;
        }
        mergedConfig = ConfigLoader.deepMerge(mergedConfig, loaded);
      } catch (error) {
        logger.warn(`Warning: Failed to load config from ${path}: ${String(error)}`);
      }
    }

    const result = ConfigSchema.safeParse(mergedConfig);
    if (!result.success) {
      logger.warn(`Warning: Invalid configuration, using defaults: ${result.error.message}`);
      return ConfigSchema.parse({});
    }
    return result.data;
  }

  static defaults(): Config {
    return ConfigSchema.parse({});
  }
}
