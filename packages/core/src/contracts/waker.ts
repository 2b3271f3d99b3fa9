/**
 * A wake handle: the token a suspended computation hands to whatever it is
 * waiting on. Invoking it asks the owning scheduler to advance the
 * computation again.
 *
 * `wake()` may be called any number of times from any host callback. Extra
 * calls are harmless; at worst they cause one advance that finds the
 * computation still pending.
 */
export interface Waker {
    wake(): void;

    /** Returns a handle that wakes the same target. */
    clone(): Waker;

    /**
     * True when waking `other` would wake the same logical target as waking
     * this handle. Used to skip replacing a stored handle that is still valid.
     */
    willWake(other: Waker): boolean;
}
