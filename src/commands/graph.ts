/**
 * runnel graph command
 * Visualize the job graph of a workflow
 */

import type { Command } from 'commander';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { generateMermaidGraph, renderWorkflowAsAscii } from '../utils/mermaid.ts';
import { errorMessage } from './utils.ts';

export function registerGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Visualize the job graph as a Mermaid.js flowchart')
    .argument('<workflow>', 'Path to the workflow file')
    .option('--ascii', 'Draw the graph in the terminal instead')
    .action((workflowPath: string, options: { ascii?: boolean }) => {
      try {
        const { plan } = WorkflowParser.loadWorkflow(workflowPath);
        if (options.ascii) {
          console.log(`\n${renderWorkflowAsAscii(plan)}\n`);
        } else {
          console.log('\n```mermaid');
          console.log(generateMermaidGraph(plan));
          console.log('```\n');
        }
      } catch (error) {
        console.error('✗ Failed to generate graph:', errorMessage(error));
        process.exit(1);
      }
    });
}
