import type { Computation, KeyValueConnectionPort, TimerHost } from '@ticktask/core';
import { operation, sleep } from '@ticktask/engine';

export interface InMemoryKeyValueConnectionOptions {
    timer: TimerHost;
    /** Simulated round trip of every request. */
    latencyMs?: number;
    store?: Map<string, string>;
}

/**
 * Key-value connection backed by a map. Every request waits one simulated
 * round trip before it reads or writes, so requests suspend the way a
 * network client's would.
 */
export class InMemoryKeyValueConnection implements KeyValueConnectionPort {
    public readonly store: Map<string, string>;
    private readonly timer: TimerHost;
    private readonly latencyMs: number;
    private requests = 0;

    constructor(options: InMemoryKeyValueConnectionOptions) {
        this.timer = options.timer;
        this.latencyMs = options.latencyMs ?? 1;
        this.store = options.store ?? new Map();
    }

    public get requestCount(): number {
        return this.requests;
    }

    public get(key: string): Computation<string | undefined> {
        const { store, timer, latencyMs } = this;
        this.requests += 1;
        return operation(function* () {
            yield* sleep(timer, latencyMs);
            return store.get(key);
        });
    }

    public set(key: string, value: string): Computation<void> {
        const { store, timer, latencyMs } = this;
        this.requests += 1;
        return operation(function* () {
            yield* sleep(timer, latencyMs);
            store.set(key, value);
        });
    }
}
