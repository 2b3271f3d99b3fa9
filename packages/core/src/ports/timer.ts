export interface TimerHandle {
    cancel(): void;
}

/**
 * Source of time and of background timers for suspension sources.
 *
 * Each `spawnTimer` call stands for one dedicated timing actor: it measures
 * `deadline - now()` when spawned, sleeps, and invokes `onElapsed` once. The
 * callback must never run before `now()` has reached `deadline`.
 */
export interface TimerHost {
    /** Monotonic time in milliseconds. */
    now(): number;

    spawnTimer(deadline: number, onElapsed: () => void): TimerHandle;
}
