/**
 * runnel plan command
 * Show the job instances a workflow expands into, grouped by wave
 */

import type { Command } from 'commander';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import type { ExecutionPlan } from '../runner/execution-plan.ts';
import { errorMessage } from './utils.ts';

/**
 * One block per wave: the instances that become ready together once every earlier
 * wave has finished
 */
export function formatPlan(plan: ExecutionPlan): string {
  const lines: string[] = [];
  plan.waves().forEach((wave, index) => {
    lines.push(`Wave ${index + 1}:`);
    for (const id of wave) {
      const deps = plan.dependenciesOf(id);
      lines.push(deps.length > 0 ? `  ${id} <- ${deps.join(', ')}` : `  ${id}`);
    }
  });
  return lines.join('\n');
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('List the job instances of a workflow in dependency order')
    .argument('<workflow>', 'Path to the workflow file')
    .action((workflowPath: string) => {
      try {
        const { workflow, plan } = WorkflowParser.loadWorkflow(workflowPath);
        console.log(`${workflow.name}: ${plan.instances.length} job instance(s)\n`);
        console.log(formatPlan(plan));
      } catch (error) {
        console.error('✗ Failed to build plan:', errorMessage(error));
        process.exit(1);
      }
    });
}
