import { setImmediate as yieldToHost } from 'node:timers/promises';

import {
  EXECUTOR_DEFAULTS,
  ExecutorBusyError,
  ExecutorShutdownError,
  type Computation,
  type Logger
} from '@ticktask/core';

import { ReadyQueue } from '../channels/readyQueue';
import { TaskCell } from './cell';
import { createJoinHandle, type JoinHandle } from './joinHandle';
import type { RunReport, Scheduler, SchedulerOptions } from './scheduler';
import { Task } from './task';

export interface ExecutorOptions extends SchedulerOptions {
  /** Keep waiting for new tasks after every spawned task finished. */
  keepAlive?: boolean;
  /** Advances in a row before the run loop yields to the host event loop. */
  pollBudget?: number;
}

/**
 * Wake-driven executor.
 *
 * A task enters the ready queue when it is spawned and whenever its waker
 * fires, never because the executor decided to retry it. The run loop takes
 * tasks in FIFO order and advances each exactly once.
 */
export class Executor implements Scheduler {
  public readonly name: string;

  private readonly queue = new ReadyQueue<Task>();
  private readonly logger: Logger | undefined;
  private readonly keepAlive: boolean;
  private readonly pollBudget: number;

  private live = 0;
  private nextId = 1;
  private running = false;

  constructor(options: ExecutorOptions = {}) {
    this.name = options.name ?? EXECUTOR_DEFAULTS.NAME;
    this.logger = options.logger?.child({ executor: this.name, policy: 'wake' });
    this.keepAlive = options.keepAlive ?? EXECUTOR_DEFAULTS.KEEP_ALIVE;
    this.pollBudget = options.pollBudget ?? EXECUTOR_DEFAULTS.POLL_BUDGET;
  }

  /** Spawned tasks that have neither resolved nor aborted. */
  public get liveCount(): number {
    return this.live;
  }

  public get queuedCount(): number {
    return this.queue.length;
  }

  public get isRunning(): boolean {
    return this.running;
  }

  public spawn<T>(computation: Computation<T>): JoinHandle<T> {
    if (this.queue.isClosed) {
      throw new ExecutorShutdownError(this.name);
    }

    const id = this.nextId++;
    const { handle, settle } = createJoinHandle<T>(id);
    const task = new Task(new TaskCell(id, computation, settle), this.queue);

    this.live += 1;
    task.schedule();
    this.logger?.trace({ taskId: id }, 'Task spawned');
    return handle;
  }

  /**
   * Drives spawned tasks until none is left alive, or, with `keepAlive`,
   * until `shutdown()` closed the queue and it drained.
   *
   * A task that stays pending without ever being woken keeps this promise
   * pending for good.
   */
  public async run(): Promise<RunReport> {
    if (this.running) {
      throw new ExecutorBusyError(this.name);
    }
    this.running = true;

    const report: RunReport = { completed: 0, aborted: 0, advances: 0 };
    let sinceYield = 0;

    this.logger?.debug({ live: this.live }, 'Executor running');
    try {
      while (this.live > 0 || (this.keepAlive && !this.queue.isClosed)) {
        if (sinceYield >= this.pollBudget) {
          await yieldToHost();
          sinceYield = 0;
        }

        let task = this.queue.tryRecv();
        if (task === undefined) {
          task = await this.queue.recv();
          if (task === undefined) {
            break;
          }
          sinceYield = 0;
        }

        const step = task.run();
        report.advances += 1;
        sinceYield += 1;

        if (step.status === 'resolved') {
          this.live -= 1;
          report.completed += 1;
          this.logger?.trace({ taskId: task.id }, 'Task completed');
        } else if (step.status === 'aborted') {
          this.live -= 1;
          report.aborted += 1;
          this.logger?.error({ taskId: task.id, err: step.error }, 'Task aborted');
        }
      }
    } finally {
      this.running = false;
    }

    this.logger?.debug({ ...report }, 'Executor drained');
    return report;
  }

  /**
   * Closes the ready queue. Tasks already queued still run; pending tasks
   * are never advanced again, and `spawn` throws from now on.
   */
  public shutdown(): void {
    if (!this.queue.isClosed) {
      this.logger?.debug({ live: this.live, queued: this.queue.length }, 'Executor shutting down');
      this.queue.close();
    }
  }
}
