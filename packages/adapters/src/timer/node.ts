import type { TimerHandle, TimerHost } from '@ticktask/core';

export interface NodeTimerHostOptions {
    /** Let pending timers not keep the process alive. */
    unref?: boolean;
}

/**
 * Timer host backed by `performance.now()` and `setTimeout`.
 *
 * Node timers have millisecond resolution and may fire slightly before the
 * monotonic clock reaches the deadline; such a timer re-arms for the rest of
 * the wait instead of invoking its callback early.
 */
export class NodeTimerHost implements TimerHost {
    private spawned = 0;
    private active = 0;

    constructor(private readonly options: NodeTimerHostOptions = {}) {}

    /** Timers spawned since this host was created. */
    public get spawnedCount(): number {
        return this.spawned;
    }

    /** Timers spawned but neither fired nor cancelled. */
    public get activeCount(): number {
        return this.active;
    }

    public now(): number {
        return performance.now();
    }

    public spawnTimer(deadline: number, onElapsed: () => void): TimerHandle {
        this.spawned += 1;
        this.active += 1;

        let finished = false;
        const finish = (): void => {
            finished = true;
            this.active -= 1;
        };

        const tick = (): void => {
            const remaining = deadline - this.now();
            if (remaining > 0) {
                timeout = this.arm(tick, remaining);
                return;
            }
            finish();
            onElapsed();
        };

        let timeout = this.arm(tick, deadline - this.now());

        return {
            cancel: () => {
                if (!finished) {
                    clearTimeout(timeout);
                    finish();
                }
            }
        };
    }

    private arm(callback: () => void, remainingMs: number): ReturnType<typeof setTimeout> {
        const timeout = setTimeout(callback, Math.max(0, Math.ceil(remainingMs)));
        if (this.options.unref) {
            timeout.unref();
        }
        return timeout;
    }
}
