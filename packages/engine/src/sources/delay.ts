import {
  ComputationResolvedError,
  PENDING,
  ready,
  type Computation,
  type Context,
  type Poll,
  type TimerHost
} from '@ticktask/core';

import { WakerSlot } from '../wakers/slot';

/**
 * Resolves once `host.now()` reaches `deadline`.
 *
 * The first advance before the deadline spawns exactly one background timer
 * that wakes whichever waker is stored when it fires. Later advances only
 * refresh the stored waker. A deadline already in the past resolves on the
 * first advance and spawns nothing.
 */
export class Delay implements Computation<void> {
    private slot: WakerSlot | undefined;
    private resolved = false;

    constructor(
        public readonly deadline: number,
        private readonly host: TimerHost
    ) {}

    public static after(host: TimerHost, ms: number): Delay {
        return new Delay(host.now() + ms, host);
    }

    /** True once a background timer was spawned for this delay. */
    public get isArmed(): boolean {
        return this.slot !== undefined;
    }

    public advance(cx: Context): Poll<void> {
        if (this.resolved) {
            throw new ComputationResolvedError('Delay');
        }

        if (this.slot === undefined) {
            if (this.host.now() >= this.deadline) {
                return this.resolve();
            }

            const slot = new WakerSlot(cx.waker);
            this.slot = slot;
            this.host.spawnTimer(this.deadline, () => slot.wake());
            return PENDING;
        }

        // The task driving this delay may have changed since the last advance.
        this.slot.replace(cx.waker);

        return this.host.now() >= this.deadline ? this.resolve() : PENDING;
    }

    private resolve(): Poll<void> {
        this.resolved = true;
        return ready(undefined);
    }
}
