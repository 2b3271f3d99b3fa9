import type { Waker } from '@ticktask/core';

/**
 * Holds the single waker a suspension source will invoke later.
 *
 * The stored handle may change between advances when the computation is
 * driven under a different task. `wake()` always reads the handle stored at
 * the moment it runs, never a copy taken earlier.
 */
export class WakerSlot {
  private current: Waker;

  constructor(waker: Waker) {
    this.current = waker.clone();
  }

  /** Stores `waker` unless the stored handle already wakes the same target. Returns true on replacement. */
  public replace(waker: Waker): boolean {
    if (this.current.willWake(waker)) {
      return false;
    }
    this.current = waker.clone();
    return true;
  }

  public wake(): void {
    this.current.wake();
  }
}
