import type { Workflow } from '../../parser/schema.ts';
import { ExpressionEvaluator } from '../../expression/evaluator.ts';
import type { Logger } from '../../utils/logger.ts';

export interface SecretProvider {
  /** Resolve a secret by name; undefined when it does not exist */
  resolve(name: string): Promise<string | undefined>;
}

export class StaticSecretProvider implements SecretProvider {
  constructor(private readonly secrets: Record<string, string>) {}

  async resolve(name: string): Promise<string | undefined> {
    return Object.hasOwn(this.secrets, name) ? this.secrets[name] : undefined;
  }
}

/**
 * Reads `<prefix><NAME>` from an environment object (process.env by default)
 */
export class EnvSecretProvider implements SecretProvider {
  constructor(
    private readonly prefix: string,
    private readonly env: Record<string, string | undefined> = process.env
  ) {}

  async resolve(name: string): Promise<string | undefined> {
    return this.env[`${this.prefix}${name}`];
  }
}

/**
 * Tries each provider in order
 */
export class ChainedSecretProvider implements SecretProvider {
  constructor(private readonly providers: SecretProvider[]) {}

  async resolve(name: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      const value = await provider.resolve(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }
}

export class SecretManager {
  constructor(
    private readonly provider: SecretProvider,
    private readonly logger: Logger
  ) {}

  /**
   * Every template in the workflow, including bare `if:` conditions
   */
  private static collectTemplates(workflow: Workflow): Array<{ template: string; bare: boolean }> {
    const templates: Array<{ template: string; bare: boolean }> = [];
    const add = (template: string | undefined, bare = false) => {
      if (template !== undefined) templates.push({ template, bare });
    };
    const addAll = (record: Record<string, string> | undefined) => {
      for (const value of Object.values(record ?? {})) add(value);
    };

    addAll(workflow.env);
    for (const job of Object.values(workflow.jobs)) {
      add(job.if, true);
      addAll(job.env);
      addAll(job.outputs);
      add(job.concurrency?.group);
      for (const step of job.steps) {
        add(step.if, true);
        add(step.run);
        add(step['working-directory']);
        addAll(step.env);
        addAll(step.with);
      }
    }
    return templates;
  }

  static referencedSecrets(workflow: Workflow): string[] {
    const names = new Set<string>();
    for (const { template, bare } of SecretManager.collectTemplates(workflow)) {
      for (const name of ExpressionEvaluator.findReferences(template, 'secrets', bare)) {
        names.add(name);
      }
    }
    return Array.from(names).sort();
  }

  /**
   * Resolve every secret the workflow references. Missing secrets resolve to '' with a
   * warning, matching how an unset repository secret behaves.
   */
  async resolveForWorkflow(workflow: Workflow): Promise<Record<string, string>> {
    const secrets: Record<string, string> = {};
    for (const name of SecretManager.referencedSecrets(workflow)) {
      const value = await this.provider.resolve(name);
      if (value === undefined) {
        this.logger.warn(`Secret "${name}" is not defined; using an empty value`);
        secrets[name] = '';
      } else {
        secrets[name] = value;
      }
    }
    return secrets;
  }
}
