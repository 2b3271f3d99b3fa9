import { z } from 'zod';

import { EXECUTOR_DEFAULTS, LOGGING_DEFAULTS } from './defaults';

export const SchedulingPolicySchema = z.enum(['wake', 'round-robin']);
export type SchedulingPolicy = z.infer<typeof SchedulingPolicySchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default(LOGGING_DEFAULTS.LEVEL),
  prettyPrint: z.boolean().default(LOGGING_DEFAULTS.PRETTY_PRINT),
  name: z.string().min(1).optional(),
});

export const RuntimeConfigSchema = z.object({
  name: z.string().min(1).default(EXECUTOR_DEFAULTS.NAME),
  policy: SchedulingPolicySchema.default(EXECUTOR_DEFAULTS.POLICY),
  /**
   * Keep `run()` waiting for new work after every task finished. Such a
   * runtime only stops on `shutdown()`.
   */
  keepAlive: z.boolean().default(EXECUTOR_DEFAULTS.KEEP_ALIVE),
  pollBudget: z.number().int().positive().default(EXECUTOR_DEFAULTS.POLL_BUDGET),
  logging: LoggingConfigSchema.default({}),
});

/** Configuration as written by callers; every field is optional. */
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;

/** Configuration after defaults were applied. */
export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
