/**
 * runnel validate command
 * Validate workflow files
 */

import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Command } from 'commander';
import { globSync } from 'glob';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { errorMessage } from './utils.ts';

const DEFAULT_WORKFLOW_DIR = '.github/workflows';

export interface ValidationReport {
  passed: number;
  failed: number;
  /** Output lines, in order */
  lines: string[];
}

/**
 * Expand the given files and directories into workflow files
 */
export function findWorkflowFiles(paths: readonly string[]): { files: string[]; missing: string[] } {
  const files: string[] = [];
  const missing: string[] = [];
  for (const path of paths) {
    if (!existsSync(path)) {
      missing.push(path);
    } else if (statSync(path).isDirectory()) {
      const found = globSync('**/*.{yaml,yml}', { cwd: path, nodir: true }).sort();
      files.push(...found.map((file) => join(path, file)));
    } else {
      files.push(path);
    }
  }
  return { files, missing };
}

/**
 * Parse, plan and lint each file. Lint warnings do not fail validation.
 */
export function validateWorkflowFiles(files: readonly string[]): ValidationReport {
  const report: ValidationReport = { passed: 0, failed: 0, lines: [] };

  for (const file of files) {
    try {
      const { workflow, plan } = WorkflowParser.loadWorkflow(file);
      const jobs = Object.keys(workflow.jobs).length;
      report.lines.push(
        `  ✓ ${file.padEnd(40)} ${workflow.name} (${jobs} job(s), ${plan.instances.length} instance(s))`
      );
      for (const warning of WorkflowParser.lint(workflow)) {
        report.lines.push(`    ⚠️  ${warning.path}: ${warning.message}`);
      }
      report.passed++;
    } catch (error) {
      report.lines.push(`  ✗ ${file.padEnd(40)} ${errorMessage(error)}`);
      report.failed++;
    }
  }

  report.lines.push('', `Summary: ${report.passed} passed, ${report.failed} failed.`);
  return report;
}

function validateAction(paths: string[]): void {
  const { files, missing } = findWorkflowFiles(paths.length > 0 ? paths : [DEFAULT_WORKFLOW_DIR]);
  for (const path of missing) {
    console.error(`✗ Path not found: ${path}`);
  }
  if (files.length === 0) {
    console.log('⊘ No workflow files found to validate.');
    if (missing.length > 0) process.exit(1);
    return;
  }

  console.log(`🔍 Validating ${files.length} workflow(s)...\n`);
  const report = validateWorkflowFiles(files);
  for (const line of report.lines) console.log(line);
  if (report.failed > 0 || missing.length > 0) {
    process.exit(1);
  }
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .alias('lint')
    .description('Validate workflow files and report lint warnings')
    .argument('[paths...]', `Workflow files or directories (default: ${DEFAULT_WORKFLOW_DIR}/)`)
    .action((paths: string[]) => {
      validateAction(paths);
    });
}
