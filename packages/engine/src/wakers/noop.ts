import type { Waker } from '@ticktask/core';

class NoopWaker implements Waker {
  public wake(): void {}

  public clone(): Waker {
    return this;
  }

  public willWake(other: Waker): boolean {
    return other === this;
  }
}

/**
 * A waker that does nothing. Only valid where the scheduler re-advances every
 * outstanding computation on its own cadence (see `RoundRobinExecutor`).
 */
export const noopWaker: Waker = new NoopWaker();
