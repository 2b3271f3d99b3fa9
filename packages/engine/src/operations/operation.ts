import {
  ComputationResolvedError,
  PENDING,
  ready,
  type Computation,
  type Context,
  type Poll,
  type TimerHost
} from '@ticktask/core';

import { Delay } from '../sources/delay';

/** One suspension point inside an operation body. */
export interface Suspension {
  /** Advances whatever the body waits on. True once it is ready. */
  advance(cx: Context): boolean;
}

/**
 * Generator form of a computation. The body suspends with
 * `yield* wait(computation)` and receives the computation's value.
 */
export type Operation<T> = Generator<Suspension, T, void>;

class Await<T> implements Suspension {
  private result: Poll<T> = PENDING;

  constructor(private readonly computation: Computation<T>) {}

  public advance(cx: Context): boolean {
    const poll = this.computation.advance(cx);
    if (poll.status === 'ready') {
      this.result = poll;
      return true;
    }
    return false;
  }

  public take(): T {
    const result = this.result;
    if (result.status !== 'ready') {
      throw new Error('Operation resumed before the awaited computation was ready');
    }
    return result.value;
  }
}

export function* wait<T>(computation: Computation<T>): Operation<T> {
  const suspension = new Await(computation);
  yield suspension;
  return suspension.take();
}

export function* sleep(host: TimerHost, ms: number): Operation<void> {
  yield* wait(Delay.after(host, ms));
}

class OperationComputation<T> implements Computation<T> {
  private iterator: Operation<T> | undefined;
  private current: Suspension | undefined;
  private finished = false;

  constructor(private readonly body: () => Operation<T>) {}

  public advance(cx: Context): Poll<T> {
    if (this.finished) {
      throw new ComputationResolvedError('Operation');
    }

    const iterator = this.iterator ?? (this.iterator = this.body());
    try {
      for (;;) {
        const next = this.step(iterator, cx);
        if (next === undefined) {
          return PENDING;
        }
        if (next.done) {
          this.finished = true;
          return ready(next.value);
        }
        this.current = next.value;
      }
    } catch (error) {
      this.finished = true;
      throw error;
    }
  }

  private step(iterator: Operation<T>, cx: Context): IteratorResult<Suspension, T> | undefined {
    const current = this.current;
    if (current === undefined) {
      return iterator.next();
    }

    let settled: boolean;
    try {
      settled = current.advance(cx);
    } catch (error) {
      // Let the body's own try/catch see failures of what it waits on.
      this.current = undefined;
      return iterator.throw(error);
    }

    if (!settled) {
      return undefined;
    }
    this.current = undefined;
    return iterator.next();
  }
}

/**
 * Turns a generator body into a computation. The body does not start until
 * the first advance.
 *
 * ```ts
 * executor.spawn(operation(function* () {
 *   yield* sleep(timer, 10);
 *   return 'done';
 * }));
 * ```
 */
export function operation<T>(body: () => Operation<T>): Computation<T> {
  return new OperationComputation(body);
}
