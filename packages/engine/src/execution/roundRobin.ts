import { setImmediate as yieldToHost } from 'node:timers/promises';

import {
  EXECUTOR_DEFAULTS,
  ExecutorBusyError,
  ExecutorShutdownError,
  createContext,
  type Computation,
  type Context,
  type Logger
} from '@ticktask/core';

import { noopWaker } from '../wakers/noop';
import { TaskCell, type Runnable } from './cell';
import { createJoinHandle, type JoinHandle } from './joinHandle';
import type { RunReport, Scheduler, SchedulerOptions } from './scheduler';

export interface PassReport {
  advanced: number;
  completed: number;
  aborted: number;
  /** Tasks still pending after the pass. */
  remaining: number;
}

/**
 * Simplified busy-polling mode.
 *
 * Every pending task is advanced once per pass, in spawn order, with a waker
 * that does nothing; unfinished tasks go to the back of the list. Progress
 * depends on passes happening often enough, not on notifications, so this
 * spends CPU while tasks wait. Prefer `Executor`.
 */
export class RoundRobinExecutor implements Scheduler {
  public readonly name: string;

  private readonly logger: Logger | undefined;
  private readonly context: Context = createContext(noopWaker);
  private tasks: Runnable[] = [];
  private live = 0;
  private nextId = 1;
  private running = false;
  private closed = false;

  constructor(options: SchedulerOptions = {}) {
    this.name = options.name ?? EXECUTOR_DEFAULTS.NAME;
    this.logger = options.logger?.child({ executor: this.name, policy: 'round-robin' });
  }

  /** Spawned tasks that have neither resolved nor aborted, including those mid-pass. */
  public get liveCount(): number {
    return this.live;
  }

  public spawn<T>(computation: Computation<T>): JoinHandle<T> {
    if (this.closed) {
      throw new ExecutorShutdownError(this.name);
    }

    const id = this.nextId++;
    const { handle, settle } = createJoinHandle<T>(id);
    this.tasks.push(new TaskCell(id, computation, settle));
    this.live += 1;
    this.logger?.trace({ taskId: id }, 'Task spawned');
    return handle;
  }

  /**
   * Advances each task present when the pass starts exactly once. Tasks
   * spawned during the pass wait for the next one.
   */
  public runPass(): PassReport {
    const batch = this.tasks;
    this.tasks = [];

    const report: PassReport = { advanced: 0, completed: 0, aborted: 0, remaining: 0 };
    const stillPending: Runnable[] = [];

    for (const cell of batch) {
      const step = cell.advance(this.context);
      report.advanced += 1;

      if (step.status === 'pending') {
        stillPending.push(cell);
      } else if (step.status === 'resolved') {
        this.live -= 1;
        report.completed += 1;
        this.logger?.trace({ taskId: cell.id }, 'Task completed');
      } else {
        this.live -= 1;
        report.aborted += 1;
        this.logger?.error({ taskId: cell.id, err: step.error }, 'Task aborted');
      }
    }

    this.tasks = [...stillPending, ...this.tasks];
    report.remaining = this.tasks.length;
    return report;
  }

  /** Repeats passes, yielding to the host in between, until no task is left or `shutdown()` was called. */
  public async run(): Promise<RunReport> {
    if (this.running) {
      throw new ExecutorBusyError(this.name);
    }
    this.running = true;

    const report: RunReport = { completed: 0, aborted: 0, advances: 0 };
    try {
      while (this.tasks.length > 0 && !this.closed) {
        const pass = this.runPass();
        report.completed += pass.completed;
        report.aborted += pass.aborted;
        report.advances += pass.advanced;

        if (pass.remaining > 0) {
          await yieldToHost();
        }
      }
    } finally {
      this.running = false;
    }

    this.logger?.debug({ ...report }, 'Executor drained');
    return report;
  }

  public shutdown(): void {
    this.closed = true;
  }
}
