import type { Waker } from './waker';

export type Poll<T> =
    | { readonly status: 'ready'; readonly value: T }
    | { readonly status: 'pending' };

export const PENDING: Poll<never> = Object.freeze({ status: 'pending' });

export function ready<T>(value: T): Poll<T> {
    return { status: 'ready', value };
}

export function isReady<T>(poll: Poll<T>): poll is { readonly status: 'ready'; readonly value: T } {
    return poll.status === 'ready';
}

/**
 * What a computation sees during one advance call.
 */
export interface Context {
    /** The handle to invoke once advancing again could make progress. */
    readonly waker: Waker;
}

export function createContext(waker: Waker): Context {
    return { waker };
}

/**
 * A suspendable computation: a state machine advanced one step at a time.
 *
 * Returning `PENDING` is a promise to the caller: the computation, or an
 * inner computation it delegates to, has arranged for `cx.waker.wake()` to be
 * called once another advance could make progress. A computation that breaks
 * this rule is never advanced again.
 *
 * Callers must not advance a computation again after it returned `ready`.
 * Callers must not advance the same computation from two places at once.
 */
export interface Computation<T> {
    advance(cx: Context): Poll<T>;
}
