/**
 * Command module exports
 *
 * This file re-exports all command registration functions for a cleaner import.
 */

export { registerGraphCommand } from './graph.ts';
export { registerPlanCommand } from './plan.ts';
export { registerRunCommand } from './run.ts';
export { registerValidateCommand } from './validate.ts';
