import { ComputationResolvedError, createContext, type Waker } from '@ticktask/core';

import type { ReadyQueue } from '../channels/readyQueue';
import type { CellStep, Runnable } from './cell';

/**
 * - `idle`: pending, waiting for its waker.
 * - `scheduled`: sitting in the ready queue.
 * - `running`: being advanced right now.
 * - `notified`: woken while running; goes back to the queue after the advance.
 * - `complete`: resolved or aborted; wakes are ignored.
 */
export type TaskState = 'idle' | 'scheduled' | 'running' | 'notified' | 'complete';

/**
 * A spawned computation plus the means to put itself back on the ready
 * queue. The queue and every waker derived from the task share it.
 */
export class Task {
  private state: TaskState = 'idle';

  constructor(
    private readonly cell: Runnable,
    private readonly queue: ReadyQueue<Task>
  ) {}

  public get id(): number {
    return this.cell.id;
  }

  public get status(): TaskState {
    return this.state;
  }

  /**
   * Called by wakers. Queues the task at most once no matter how many wakes
   * arrive before it runs.
   */
  public schedule(): void {
    switch (this.state) {
      case 'idle':
        this.enqueue();
        break;
      case 'running':
        this.state = 'notified';
        break;
      default:
        break;
    }
  }

  /** Advances the computation once. Only the run loop calls this. */
  public run(): CellStep {
    if (this.state === 'complete') {
      throw new ComputationResolvedError(`Task ${this.id}`);
    }

    this.state = 'running';
    const step = this.cell.advance(createContext(new TaskWaker(this)));
    this.afterAdvance(step);
    return step;
  }

  /** Wakes that arrived during the advance left the task `notified`. */
  private afterAdvance(step: CellStep): void {
    if (step.status !== 'pending') {
      this.state = 'complete';
    } else if (this.state === 'notified') {
      this.enqueue();
    } else {
      this.state = 'idle';
    }
  }

  private enqueue(): void {
    // A closed queue drops the task; it stays idle and is never advanced again.
    this.state = this.queue.send(this) ? 'scheduled' : 'idle';
  }
}

export class TaskWaker implements Waker {
  constructor(public readonly task: Task) {}

  public wake(): void {
    this.task.schedule();
  }

  public clone(): Waker {
    return new TaskWaker(this.task);
  }

  public willWake(other: Waker): boolean {
    return other instanceof TaskWaker && other.task === this.task;
  }
}
