/**
 * Unbounded FIFO channel between wakers (producers) and the run loop (the
 * single consumer).
 *
 * `send` never blocks. `recv` resolves with the next item, or with
 * `undefined` once the queue is closed and drained.
 */
export class ReadyQueue<T> {
    private readonly items: T[] = [];
    private waiter: ((item: T | undefined) => void) | undefined;
    private closed = false;

    public get length(): number {
        return this.items.length;
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    /** Returns false when the queue is closed and the item was dropped. */
    public send(item: T): boolean {
        if (this.closed) {
            return false;
        }

        const waiter = this.waiter;
        if (waiter) {
            this.waiter = undefined;
            waiter(item);
        } else {
            this.items.push(item);
        }
        return true;
    }

    public tryRecv(): T | undefined {
        return this.items.shift();
    }

    public recv(): Promise<T | undefined> {
        const next = this.items.shift();
        if (next !== undefined || this.closed) {
            return Promise.resolve(next);
        }
        if (this.waiter) {
            throw new Error('ReadyQueue supports a single consumer');
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    public close(): void {
        this.closed = true;
        const waiter = this.waiter;
        if (waiter && this.items.length === 0) {
            this.waiter = undefined;
            waiter(undefined);
        }
    }
}
