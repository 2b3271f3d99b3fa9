import {
  ConfigError,
  RuntimeConfigSchema,
  type Computation,
  type Logger,
  type RuntimeConfig,
  type RuntimeConfigInput,
  type TimerHost
} from '@ticktask/core';
import { NodeTimerHost, PinoLogger } from '@ticktask/adapters';
import {
  Delay,
  Executor,
  RoundRobinExecutor,
  sleep,
  type JoinHandle,
  type Operation,
  type RunReport,
  type Scheduler
} from '@ticktask/engine';

export interface RuntimeProviders {
  logger?: Logger;
  timer?: TimerHost;
}

export interface Runtime {
  readonly config: RuntimeConfig;
  readonly executor: Scheduler;
  readonly logger: Logger;
  readonly timer: TimerHost;

  spawn<T>(computation: Computation<T>): JoinHandle<T>;
  run(): Promise<RunReport>;
  shutdown(): void;

  /** A `Delay` resolving `ms` from now on this runtime's timer host. */
  delay(ms: number): Delay;
  /** Operation form of `delay`, for `yield*` inside `operation` bodies. */
  sleep(ms: number): Operation<void>;
}

export function createRuntime(config: RuntimeConfigInput = {}, providers: RuntimeProviders = {}): Runtime {
  const resolved = resolveRuntimeConfig(config);

  const logger = providers.logger ?? new PinoLogger({
    level: resolved.logging.level,
    prettyPrint: resolved.logging.prettyPrint,
    name: resolved.logging.name ?? resolved.name
  });
  const timer = providers.timer ?? new NodeTimerHost();

  const executor: Scheduler = resolved.policy === 'wake'
    ? new Executor({ name: resolved.name, logger, keepAlive: resolved.keepAlive, pollBudget: resolved.pollBudget })
    : new RoundRobinExecutor({ name: resolved.name, logger });

  logger.debug({ policy: resolved.policy, keepAlive: resolved.keepAlive }, 'Runtime created');

  return {
    config: resolved,
    executor,
    logger,
    timer,
    spawn: (computation) => executor.spawn(computation),
    run: () => executor.run(),
    shutdown: () => executor.shutdown(),
    delay: (ms) => Delay.after(timer, ms),
    sleep: (ms) => sleep(timer, ms)
  };
}

function resolveRuntimeConfig(config: RuntimeConfigInput): RuntimeConfig {
  const parsed = RuntimeConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  validateRuntimeConfig(parsed.data);
  return parsed.data;
}

function validateRuntimeConfig(config: RuntimeConfig): void {
  // Busy polling has no wake to wait on, so it cannot idle for new work.
  if (config.policy === 'round-robin' && config.keepAlive) {
    throw new ConfigError([{
      code: 'custom',
      path: ['keepAlive'],
      message: 'keepAlive requires the wake policy'
    }]);
  }
}

export const __private = {
  resolveRuntimeConfig,
  validateRuntimeConfig
};
