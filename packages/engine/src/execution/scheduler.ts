import type { Computation, Logger } from '@ticktask/core';

import type { JoinHandle } from './joinHandle';

export interface RunReport {
  /** Tasks that resolved during this run. */
  completed: number;
  /** Tasks dropped because advancing them threw. */
  aborted: number;
  /** Advance calls made during this run. */
  advances: number;
}

/**
 * What `createRuntime` and callers need from either scheduling policy.
 */
export interface Scheduler {
  readonly name: string;
  readonly liveCount: number;
  spawn<T>(computation: Computation<T>): JoinHandle<T>;
  run(): Promise<RunReport>;
  shutdown(): void;
}

export interface SchedulerOptions {
  name?: string;
  logger?: Logger;
}
