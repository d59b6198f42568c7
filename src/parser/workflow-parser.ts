import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ExpressionEvaluator } from '../expression/evaluator.ts';
import { ParseError, type ParseIssue } from '../runner/errors.ts';
import { type ExecutionPlan, buildExecutionPlan } from '../runner/execution-plan.ts';
import { type Step, type Workflow, WorkflowSchema } from './schema.ts';

export interface LoadedWorkflow {
  workflow: Workflow;
  plan: ExecutionPlan;
  source: string;
}

export interface LintWarning {
  path: string;
  message: string;
}

function templatesOf(step: Step): string[] {
  const templates: string[] = [];
  if (step.run !== undefined) templates.push(step.run);
  if (step['working-directory'] !== undefined) templates.push(step['working-directory']);
  templates.push(...Object.values(step.env ?? {}));
  templates.push(...Object.values(step.with ?? {}));
  return templates;
}

export class WorkflowParser {
  /**
   * Validate a workflow given as YAML text or as an already-decoded document
   * @throws ParseError listing every problem found
   */
  static parse(raw: unknown, source?: string): Workflow {
    let document = raw;
    if (typeof raw === 'string') {
      try {
        document = yaml.load(raw);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ParseError([{ path: '', message: `Invalid YAML: ${message}` }], source);
      }
    }

    if (document === null || typeof document !== 'object' || Array.isArray(document)) {
      throw new ParseError([{ path: '', message: 'workflow must be a mapping' }], source);
    }

    const result = WorkflowSchema.safeParse(document);
    if (!result.success) {
      throw new ParseError(WorkflowParser.toIssues(result.error), source);
    }
    return result.data;
  }

  private static toIssues(error: z.ZodError): ParseIssue[] {
    return error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
  }

  /**
   * Load and validate a workflow from a YAML file, and build its execution plan so
   * dependency errors surface before anything runs
   * @throws ParseError or GraphError
   */
  static loadWorkflow(path: string): LoadedWorkflow {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ParseError([{ path: '', message: `Cannot read workflow file: ${message}` }], path);
    }
    const workflow = WorkflowParser.parse(content, path);
    return { workflow, plan: buildExecutionPlan(workflow), source: path };
  }

  /**
   * Problems that do not prevent a run
   */
  static lint(workflow: Workflow): LintWarning[] {
    const warnings: LintWarning[] = [];

    const names = new Map<string, string>();
    for (const [jobId, job] of Object.entries(workflow.jobs)) {
      if (job.name !== undefined) {
        const first = names.get(job.name);
        if (first !== undefined) {
          warnings.push({
            path: `jobs.${jobId}.name`,
            message: `job name "${job.name}" is also used by job "${first}"`,
          });
        } else {
          names.set(job.name, jobId);
        }
      }

      const needs = new Set<string>();
      for (const need of job.needs) {
        if (needs.has(need)) {
          warnings.push({
            path: `jobs.${jobId}.needs`,
            message: `"${need}" is listed more than once`,
          });
        }
        needs.add(need);
      }

      const declared = new Set<string>();
      job.steps.forEach((step, index) => {
        const referenced = new Set<string>();
        for (const template of templatesOf(step)) {
          for (const id of ExpressionEvaluator.findReferences(template, 'steps')) {
            referenced.add(id);
          }
        }
        if (step.if !== undefined) {
          for (const id of ExpressionEvaluator.findReferences(step.if, 'steps', true)) {
            referenced.add(id);
          }
        }
        for (const id of referenced) {
          if (!declared.has(id)) {
            warnings.push({
              path: `jobs.${jobId}.steps.${index}`,
              message: `references steps.${id}, which is not an earlier step of this job`,
            });
          }
        }
        if (step.id !== undefined) declared.add(step.id);
      });
    }

    return warnings;
  }
}
