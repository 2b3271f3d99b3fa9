import type { Waker } from '@ticktask/core';

class CallbackWaker implements Waker {
  constructor(private readonly callback: () => void) {}

  public wake(): void {
    this.callback();
  }

  public clone(): Waker {
    return new CallbackWaker(this.callback);
  }

  public willWake(other: Waker): boolean {
    return other instanceof CallbackWaker && other.callback === this.callback;
  }
}

/**
 * Builds a waker around a plain callback. Clones share the callback and
 * `willWake` one another.
 */
export function createWaker(callback: () => void): Waker {
  return new CallbackWaker(callback);
}
