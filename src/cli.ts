#!/usr/bin/env -S node --import tsx
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import {
  registerGraphCommand,
  registerPlanCommand,
  registerRunCommand,
  registerValidateCommand,
} from './commands/index.ts';

const pkg: unknown = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
);
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('runnel')
  .description('Run GitHub-Actions-style workflows locally')
  .version(version);

registerRunCommand(program);
registerValidateCommand(program);
registerGraphCommand(program);
registerPlanCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('✗', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
