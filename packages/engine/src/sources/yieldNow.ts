import { ComputationResolvedError, PENDING, ready, type Computation, type Context, type Poll } from '@ticktask/core';

class YieldNow implements Computation<void> {
    private yielded = false;
    private resolved = false;

    public advance(cx: Context): Poll<void> {
        if (this.resolved) {
            throw new ComputationResolvedError('YieldNow');
        }
        if (this.yielded) {
            this.resolved = true;
            return ready(undefined);
        }
        this.yielded = true;
        cx.waker.wake();
        return PENDING;
    }
}

/**
 * Pending once, after waking itself, so the scheduler gets to run other
 * queued tasks before this one continues.
 */
export function yieldNow(): Computation<void> {
    return new YieldNow();
}
