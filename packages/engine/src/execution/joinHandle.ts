import {
  PENDING,
  ready,
  type Computation,
  type Context,
  type Poll,
  type TaskAbortedError,
  type Waker
} from '@ticktask/core';

export type TaskOutcome<T> =
  | { status: 'pending' }
  | { status: 'resolved'; value: T }
  | { status: 'aborted'; error: TaskAbortedError };

export interface SettleJoinHandle<T> {
  resolve(value: T): void;
  abort(error: TaskAbortedError): void;
}

/**
 * Read side of a spawned task's result.
 *
 * A join handle is itself a computation, so one task can wait for another.
 * Waiting on an aborted task throws the task's `TaskAbortedError` into the
 * waiting computation. Unlike other computations, a settled handle may be
 * advanced again and again, since several tasks can wait on it.
 */
export class JoinHandle<T> implements Computation<T> {
  private state: TaskOutcome<T> = { status: 'pending' };
  private joiners: Waker[] = [];

  constructor(public readonly id: number) {}

  public outcome(): TaskOutcome<T> {
    return this.state;
  }

  public isFinished(): boolean {
    return this.state.status !== 'pending';
  }

  public advance(cx: Context): Poll<T> {
    const state = this.state;
    switch (state.status) {
      case 'resolved':
        return ready(state.value);
      case 'aborted':
        throw state.error;
      case 'pending':
        if (!this.joiners.some((joiner) => joiner.willWake(cx.waker))) {
          this.joiners.push(cx.waker.clone());
        }
        return PENDING;
    }
  }

  /** @internal */
  public settle(outcome: Exclude<TaskOutcome<T>, { status: 'pending' }>): void {
    if (this.state.status !== 'pending') {
      return;
    }
    this.state = outcome;
    const joiners = this.joiners;
    this.joiners = [];
    for (const joiner of joiners) {
      joiner.wake();
    }
  }
}

export function createJoinHandle<T>(id: number): { handle: JoinHandle<T>; settle: SettleJoinHandle<T> } {
  const handle = new JoinHandle<T>(id);
  return {
    handle,
    settle: {
      resolve: (value: T) => handle.settle({ status: 'resolved', value }),
      abort: (error: TaskAbortedError) => handle.settle({ status: 'aborted', error })
    }
  };
}
