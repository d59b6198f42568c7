import { z } from 'zod';

// ===== Shared =====

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const JOB_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export type MatrixValue = z.infer<typeof ScalarSchema>;

// Env values may be written as numbers or booleans in YAML; they always reach a process as strings
const EnvValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const EnvSchema = z
  .record(EnvValueSchema)
  .superRefine((env, ctx) => {
    for (const key of Object.keys(env)) {
      if (!ENV_KEY_PATTERN.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `"${key}" is not a valid environment variable name`,
        });
      }
    }
  });

const ConditionSchema = z.union([z.string(), z.boolean()]).transform(String);

const TimeoutSchema = z.number().positive();

// ===== Retry Schema =====

const RetrySchema = z.object({
  count: z.number().int().min(0).default(0),
  backoff: z.enum(['linear', 'exponential']).default('linear'),
  baseDelay: z.number().int().min(0).default(1000),
});

// ===== Step Schema =====

export const StepSchema = z
  .object({
    id: z.string().regex(JOB_ID_PATTERN, 'step id must start with a letter or "_"').optional(),
    name: z.string().optional(),
    run: z.string().optional(),
    uses: z.string().optional(),
    with: z.record(EnvValueSchema).optional(),
    env: EnvSchema.optional(),
    if: ConditionSchema.optional(),
    'continue-on-error': z.boolean().default(false),
    'timeout-minutes': TimeoutSchema.optional(),
    'working-directory': z.string().optional(),
    retry: RetrySchema.optional(),
  })
  .superRefine((step, ctx) => {
    const hasRun = step.run !== undefined;
    const hasUses = step.uses !== undefined;
    if (hasRun === hasUses) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a step must define exactly one of "run" or "uses"',
      });
    }
  });

// ===== Matrix Strategy Schema =====

const MatrixEntrySchema = z.record(ScalarSchema);

const MatrixDimensionSchema = z
  .array(ScalarSchema, {
    invalid_type_error: 'matrix dimension must be a list of strings, numbers or booleans',
  })
  .min(1, 'matrix dimension must have at least one value');

/**
 * Matrices are normalized into an ordered dimension list so expansion order follows
 * declaration order regardless of how the YAML mapping was built.
 */
const MatrixSchema = z.record(z.unknown()).transform((raw, ctx) => {
  const dimensions: Array<{ name: string; values: MatrixValue[] }> = [];
  let include: Array<Record<string, MatrixValue>> = [];
  let exclude: Array<Record<string, MatrixValue>> = [];

  const report = (key: string, error: z.ZodError) => {
    for (const issue of error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key, ...issue.path],
        message: issue.message,
      });
    }
  };

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'include' || key === 'exclude') {
      const parsed = z.array(MatrixEntrySchema).safeParse(value);
      if (!parsed.success) {
        report(key, parsed.error);
      } else if (key === 'include') {
        include = parsed.data;
      } else {
        exclude = parsed.data;
      }
      continue;
    }

    const parsed = MatrixDimensionSchema.safeParse(value);
    if (!parsed.success) {
      report(key, parsed.error);
      continue;
    }
    dimensions.push({ name: key, values: parsed.data });
  }

  if (dimensions.length === 0 && include.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'matrix must define at least one dimension or include entry',
    });
  }

  return { dimensions, include, exclude };
});

const StrategySchema = z.object({
  matrix: MatrixSchema.optional(),
  'fail-fast': z.boolean().default(true),
  'max-parallel': z.number().int().positive().optional(),
});

// ===== Concurrency Schema =====

const ConcurrencySchema = z
  .union([
    z.string(),
    z.object({
      group: z.string(),
      'cancel-in-progress': z.boolean().default(true),
    }),
  ])
  .transform((value) =>
    typeof value === 'string' ? { group: value, 'cancel-in-progress': true } : value
  );

// ===== Job Schema =====

export const JobSchema = z
  .object({
    name: z.string().optional(),
    needs: z
      .union([z.string(), z.array(z.string())])
      .optional()
      .transform((needs) => (needs === undefined ? [] : typeof needs === 'string' ? [needs] : needs)),
    if: ConditionSchema.optional(),
    env: EnvSchema.optional(),
    concurrency: ConcurrencySchema.optional(),
    'continue-on-error': z.boolean().default(false),
    'timeout-minutes': TimeoutSchema.optional(),
    strategy: StrategySchema.optional(),
    outputs: z.record(z.string()).optional(),
    'runs-on': z.union([z.string(), z.array(z.string())]).optional(),
    steps: z.array(StepSchema).default([]),
  })
  .superRefine((job, ctx) => {
    const seen = new Set<string>();
    job.steps.forEach((step, index) => {
      if (step.id === undefined) return;
      if (seen.has(step.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'id'],
          message: `duplicate step id "${step.id}"`,
        });
      }
      seen.add(step.id);
    });
  });

// ===== Workflow Schema =====

export const WorkflowSchema = z.object({
  name: z.string().default('workflow'),
  on: z.unknown().optional(),
  env: EnvSchema.optional(),
  jobs: z
    .record(JobSchema)
    .superRefine((jobs, ctx) => {
      const ids = Object.keys(jobs);
      if (ids.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'a workflow must define at least one job',
        });
      }
      for (const id of ids) {
        if (!JOB_ID_PATTERN.test(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [id],
            message: `"${id}" is not a valid job id`,
          });
        }
      }
    }),
});

// ===== Types =====

export type Workflow = z.infer<typeof WorkflowSchema>;
export type Job = z.infer<typeof JobSchema>;
export type Step = z.infer<typeof StepSchema>;
export type Strategy = z.infer<typeof StrategySchema>;
export type Matrix = z.infer<typeof MatrixSchema>;
export type MatrixCombination = Record<string, MatrixValue>;
export type Concurrency = z.infer<typeof ConcurrencySchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
