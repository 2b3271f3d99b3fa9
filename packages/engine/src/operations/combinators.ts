import {
  ComputationResolvedError,
  PENDING,
  ready,
  type Computation,
  type Context,
  type Poll
} from '@ticktask/core';

/** Ready on the first advance. */
export function resolved<T>(value: T): Computation<T> {
  let taken = false;
  return {
    advance: () => {
      if (taken) {
        throw new ComputationResolvedError('resolved');
      }
      taken = true;
      return ready(value);
    }
  };
}

/**
 * Wraps a plain advance function. The function must honour the waker
 * contract itself.
 */
export function pollFn<T>(advance: (cx: Context) => Poll<T>): Computation<T> {
  return { advance };
}

export function map<T, U>(computation: Computation<T>, project: (value: T) => U): Computation<U> {
  return {
    advance: (cx) => {
      const poll = computation.advance(cx);
      return poll.status === 'ready' ? ready(project(poll.value)) : PENDING;
    }
  };
}

/**
 * Advances every unfinished child on each advance and resolves with all
 * values, in input order, once the last child is ready.
 */
export function joinAll<T>(computations: readonly Computation<T>[]): Computation<T[]> {
  const results: Array<Poll<T>> = computations.map(() => PENDING);
  let remaining = computations.length;
  let done = false;

  return {
    advance: (cx) => {
      if (done) {
        throw new ComputationResolvedError('joinAll');
      }

      computations.forEach((computation, index) => {
        if (results[index]?.status === 'ready') {
          return;
        }
        const poll = computation.advance(cx);
        if (poll.status === 'ready') {
          results[index] = poll;
          remaining -= 1;
        }
      });

      if (remaining > 0) {
        return PENDING;
      }
      done = true;
      return ready(results.flatMap((result) => (result.status === 'ready' ? [result.value] : [])));
    }
  };
}

export function join<A, B>(first: Computation<A>, second: Computation<B>): Computation<[A, B]> {
  let a: Poll<A> = PENDING;
  let b: Poll<B> = PENDING;
  let done = false;

  return {
    advance: (cx) => {
      if (done) {
        throw new ComputationResolvedError('join');
      }
      if (a.status === 'pending') {
        a = first.advance(cx);
      }
      if (b.status === 'pending') {
        b = second.advance(cx);
      }
      if (a.status === 'ready' && b.status === 'ready') {
        done = true;
        return ready<[A, B]>([a.value, b.value]);
      }
      return PENDING;
    }
  };
}
