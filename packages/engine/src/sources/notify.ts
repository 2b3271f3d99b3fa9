import {
  ComputationResolvedError,
  PENDING,
  ready,
  type Computation,
  type Context,
  type Poll
} from '@ticktask/core';

import { WakerSlot } from '../wakers/slot';

export interface NotifyWaiter {
    slot: WakerSlot;
    notified: boolean;
}

/**
 * Wakes tasks waiting on `notified()`.
 *
 * `notifyOne()` with nobody waiting stores a single permit, which the next
 * `notified()` computation consumes on its first advance. Permits do not
 * accumulate.
 */
export class Notify {
    private permit = false;
    private waiters: NotifyWaiter[] = [];

    public get waiterCount(): number {
        return this.waiters.length;
    }

    public notifyOne(): void {
        const waiter = this.waiters.shift();
        if (waiter === undefined) {
            this.permit = true;
            return;
        }
        waiter.notified = true;
        waiter.slot.wake();
    }

    public notifyWaiters(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            waiter.notified = true;
            waiter.slot.wake();
        }
    }

    public notified(): Notified {
        return new Notified(this);
    }

    /** @internal */
    public takePermit(): boolean {
        const had = this.permit;
        this.permit = false;
        return had;
    }

    /** @internal */
    public enlist(waiter: NotifyWaiter): void {
        this.waiters.push(waiter);
    }

    /**
     * @internal
     * Removes a waiter that gave up. A notification it already received but
     * never consumed goes to the next waiter, or becomes the permit.
     */
    public release(waiter: NotifyWaiter): void {
        if (waiter.notified) {
            this.notifyOne();
            return;
        }
        this.waiters = this.waiters.filter((w) => w !== waiter);
    }
}

/**
 * Waits for one notification from a `Notify`.
 *
 * A waiter that is no longer going to be advanced must be cancelled;
 * otherwise a `notifyOne()` delivered to it is lost.
 */
export class Notified implements Computation<void> {
    private waiter: NotifyWaiter | undefined;
    private resolved = false;

    constructor(private readonly notify: Notify) {}

    public advance(cx: Context): Poll<void> {
        if (this.resolved) {
            throw new ComputationResolvedError('Notified');
        }

        if (this.waiter === undefined) {
            if (this.notify.takePermit()) {
                return this.resolve();
            }
            this.waiter = { slot: new WakerSlot(cx.waker), notified: false };
            this.notify.enlist(this.waiter);
            return PENDING;
        }

        if (this.waiter.notified) {
            return this.resolve();
        }
        this.waiter.slot.replace(cx.waker);
        return PENDING;
    }

    /** Leaves the wait queue. Advancing a cancelled waiter throws. */
    public cancel(): void {
        if (this.resolved) {
            return;
        }
        this.resolved = true;
        if (this.waiter !== undefined) {
            this.notify.release(this.waiter);
        }
    }

    private resolve(): Poll<void> {
        this.resolved = true;
        return ready(undefined);
    }
}
