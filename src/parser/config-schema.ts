import { z } from 'zod';
import { LIMITS } from '../utils/constants.ts';

export const ConfigSchema = z.object({
  concurrency: z
    .object({
      max_parallel: z.number().int().positive().default(LIMITS.DEFAULT_MAX_PARALLEL),
    })
    .default({}),
  timeouts: z
    .object({
      default_minutes: z.number().positive().default(360),
    })
    .default({}),
  fail_fast: z.boolean().default(false),
  secrets: z
    .object({
      env_prefix: z.string().min(1).default('RUNNEL_SECRET_'),
    })
    .default({}),
  artifacts: z
    .object({
      dir: z.string().default('.runnel/artifacts'),
    })
    .default({}),
  shell: z.string().default('sh'),
  vars: z.record(z.string()).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
