/**
 * Default constants for ticktask runtime configuration
 */

/**
 * Executor Configuration
 */
export const EXECUTOR_DEFAULTS = {
  /** Wake-driven scheduling; round-robin is the simplified mode */
  POLICY: 'wake' as const,

  /** Stop `run()` once every spawned task has finished */
  KEEP_ALIVE: false as const,

  /** Advances in a row before the run loop yields to the host event loop */
  POLL_BUDGET: 64 as const,

  NAME: 'ticktask' as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: 'info' as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
} as const;
