import type { TimerHandle, TimerHost } from '@ticktask/core';

interface FakeTimer {
    id: number;
    deadline: number;
    onElapsed: () => void;
}

/**
 * Manual clock for deterministic tests. Time only moves on `advance()`,
 * which fires due timers in deadline order.
 */
export class FakeTimerHost implements TimerHost {
    private clock: number;
    private timers: FakeTimer[] = [];
    private nextId = 1;
    private spawned = 0;

    constructor(startAt = 0) {
        this.clock = startAt;
    }

    public get spawnedCount(): number {
        return this.spawned;
    }

    public get activeCount(): number {
        return this.timers.length;
    }

    public now(): number {
        return this.clock;
    }

    public spawnTimer(deadline: number, onElapsed: () => void): TimerHandle {
        const timer: FakeTimer = { id: this.nextId++, deadline, onElapsed };
        this.spawned += 1;
        this.timers.push(timer);
        return {
            cancel: () => {
                this.timers = this.timers.filter((t) => t !== timer);
            }
        };
    }

    /**
     * Moves the clock forward by `ms`, firing every timer whose deadline falls
     * inside the window, including timers spawned while firing. Returns the
     * number of timers fired.
     */
    public advance(ms: number): number {
        const target = this.clock + ms;
        let fired = 0;

        for (let timer = this.nextDue(target); timer; timer = this.nextDue(target)) {
            this.timers = this.timers.filter((t) => t !== timer);
            this.clock = Math.max(this.clock, timer.deadline);
            fired += 1;
            timer.onElapsed();
        }

        this.clock = target;
        return fired;
    }

    private nextDue(target: number): FakeTimer | undefined {
        let next: FakeTimer | undefined;
        for (const timer of this.timers) {
            if (timer.deadline > target) {
                continue;
            }
            if (!next || timer.deadline < next.deadline || (timer.deadline === next.deadline && timer.id < next.id)) {
                next = timer;
            }
        }
        return next;
    }
}
