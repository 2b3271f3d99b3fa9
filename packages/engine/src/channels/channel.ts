import type { Computation } from '@ticktask/core';

import { operation, wait, type Operation } from '../operations/operation';
import { Notify } from '../sources/notify';

/**
 * Unbounded many-producer, single-consumer channel between tasks.
 *
 * `send` never suspends. `recv()` resolves with the next message, or with
 * `undefined` once the channel is closed and every buffered message was
 * received.
 */
export class Channel<T> {
  private readonly items: T[] = [];
  private readonly notify = new Notify();
  private closed = false;

  public get length(): number {
    return this.items.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the channel is closed and the message was dropped. */
  public send(message: T): boolean {
    if (this.closed) {
      return false;
    }
    this.items.push(message);
    this.notify.notifyOne();
    return true;
  }

  public recv(): Computation<T | undefined> {
    return operation(() => this.receive());
  }

  public close(): void {
    if (!this.closed) {
      this.closed = true;
      this.notify.notifyWaiters();
    }
  }

  private *receive(): Operation<T | undefined> {
    for (;;) {
      if (this.items.length > 0) {
        return this.items.shift();
      }
      if (this.closed) {
        return undefined;
      }
      yield* wait(this.notify.notified());
    }
  }
}
