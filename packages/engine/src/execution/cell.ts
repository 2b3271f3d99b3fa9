import {
  ComputationResolvedError,
  TaskAbortedError,
  TaskReentrancyError,
  type Computation,
  type Context,
  type Poll
} from '@ticktask/core';

import type { SettleJoinHandle } from './joinHandle';

export type CellStep =
  | { status: 'pending' }
  | { status: 'resolved' }
  | { status: 'aborted'; error: TaskAbortedError };

/** Non-generic view of a cell, so cells of any result type share one queue. */
export interface Runnable {
  readonly id: number;
  advance(cx: Context): CellStep;
}

/**
 * Owns one top-level computation for a scheduler.
 *
 * The advance guard admits one advance at a time. Once the computation
 * resolves or throws it is dropped, and the join handle is settled.
 */
export class TaskCell<T> implements Runnable {
  private computation: Computation<T> | undefined;
  private advancing = false;

  constructor(
    public readonly id: number,
    computation: Computation<T>,
    private readonly settle: SettleJoinHandle<T>
  ) {
    this.computation = computation;
  }

  public advance(cx: Context): CellStep {
    const computation = this.computation;
    if (computation === undefined) {
      throw new ComputationResolvedError(`Task ${this.id}`);
    }
    if (this.advancing) {
      throw new TaskReentrancyError(this.id);
    }

    let poll: Poll<T>;
    this.advancing = true;
    try {
      poll = computation.advance(cx);
    } catch (cause) {
      this.computation = undefined;
      const error = new TaskAbortedError(this.id, cause);
      this.settle.abort(error);
      return { status: 'aborted', error };
    } finally {
      this.advancing = false;
    }

    if (poll.status === 'pending') {
      return { status: 'pending' };
    }
    this.computation = undefined;
    this.settle.resolve(poll.value);
    return { status: 'resolved' };
  }
}
