import { PENDING, ready, type Computation, type Poll } from '@ticktask/core';

import { operation, wait, type Operation } from '../operations/operation';
import { Notify } from '../sources/notify';

/**
 * Carries a single reply from one task to another. The first `send` wins;
 * later ones are dropped.
 */
export class Oneshot<T> {
  private value: Poll<T> = PENDING;
  private readonly notify = new Notify();

  public get isSent(): boolean {
    return this.value.status === 'ready';
  }

  /** Returns false when a value was already sent. */
  public send(value: T): boolean {
    if (this.value.status === 'ready') {
      return false;
    }
    this.value = ready(value);
    this.notify.notifyOne();
    return true;
  }

  public received(): Computation<T> {
    return operation(() => this.receive());
  }

  private *receive(): Operation<T> {
    for (;;) {
      const value = this.value;
      if (value.status === 'ready') {
        return value.value;
      }
      yield* wait(this.notify.notified());
    }
  }
}
