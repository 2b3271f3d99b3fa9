import { describe, expect, it } from 'vitest';
import {
  ComputationResolvedError,
  TaskAbortedError,
  TaskReentrancyError,
  createContext,
  ready,
  type Context
} from '@ticktask/core';
import { createCountingWaker } from '@ticktask/testing';

import {
  ReadyQueue,
  Task,
  TaskCell,
  TaskWaker,
  createJoinHandle,
  createWaker,
  pollFn,
  type CellStep,
  type Runnable
} from '../src/index';

function createRunnable(advance: (cx: Context) => CellStep): Runnable {
  return { id: 7, advance };
}

describe('Task', () => {
  it('enters the ready queue once no matter how many wakes arrive', () => {
    const queue = new ReadyQueue<Task>();
    const task = new Task(createRunnable(() => ({ status: 'pending' })), queue);

    task.schedule();
    task.schedule();
    new TaskWaker(task).wake();

    expect(queue.length).toBe(1);
    expect(task.status).toBe('scheduled');
  });

  it('goes idle after a pending advance nobody woke', () => {
    const queue = new ReadyQueue<Task>();
    const task = new Task(createRunnable(() => ({ status: 'pending' })), queue);
    task.schedule();
    queue.tryRecv();

    expect(task.run()).toEqual({ status: 'pending' });
    expect(task.status).toBe('idle');
    expect(queue.length).toBe(0);
  });

  it('requeues itself once when woken during its own advance', () => {
    const queue = new ReadyQueue<Task>();
    const task = new Task(createRunnable((cx) => {
      cx.waker.wake();
      cx.waker.clone().wake();
      return { status: 'pending' };
    }), queue);
    task.schedule();
    queue.tryRecv();

    task.run();

    expect(task.status).toBe('scheduled');
    expect(queue.length).toBe(1);
  });

  it('ignores wakes once complete and refuses to run again', () => {
    const queue = new ReadyQueue<Task>();
    const task = new Task(createRunnable(() => ({ status: 'resolved' })), queue);
    task.schedule();
    queue.tryRecv();

    task.run();
    task.schedule();

    expect(task.status).toBe('complete');
    expect(queue.length).toBe(0);
    expect(() => task.run()).toThrowError(ComputationResolvedError);
  });

  it('stays idle when its queue is closed', () => {
    const queue = new ReadyQueue<Task>();
    const task = new Task(createRunnable(() => ({ status: 'pending' })), queue);
    queue.close();

    task.schedule();

    expect(task.status).toBe('idle');
    expect(queue.length).toBe(0);
  });

  it('builds wakers that recognise their own task', () => {
    const queue = new ReadyQueue<Task>();
    const task = new Task(createRunnable(() => ({ status: 'pending' })), queue);
    const other = new Task(createRunnable(() => ({ status: 'pending' })), queue);
    const waker = new TaskWaker(task);

    expect(waker.willWake(waker.clone())).toBe(true);
    expect(waker.willWake(new TaskWaker(other))).toBe(false);
    expect(waker.willWake(createWaker(() => {}))).toBe(false);
  });
});

describe('TaskCell', () => {
  it('settles the join handle with the resolved value and drops the computation', () => {
    const { handle, settle } = createJoinHandle<string>(1);
    const cell = new TaskCell(1, pollFn(() => ready('value')), settle);
    const cx = createContext(createCountingWaker().waker);

    expect(cell.advance(cx)).toEqual({ status: 'resolved' });
    expect(handle.outcome()).toEqual({ status: 'resolved', value: 'value' });
    expect(() => cell.advance(cx)).toThrowError('Task 1 was advanced after it already resolved');
  });

  it('aborts when the computation re-enters its own advance', () => {
    const { handle, settle } = createJoinHandle<number>(4);
    let cell: TaskCell<number> | undefined;
    cell = new TaskCell(4, pollFn((cx) => {
      cell?.advance(cx);
      return ready(1);
    }), settle);

    const step = cell.advance(createContext(createCountingWaker().waker));

    expect(step.status).toBe('aborted');
    const outcome = handle.outcome();
    expect(outcome.status).toBe('aborted');
    if (outcome.status === 'aborted') {
      expect(outcome.error).toBeInstanceOf(TaskAbortedError);
      expect(outcome.error.cause).toBeInstanceOf(TaskReentrancyError);
    }
  });
});

describe('JoinHandle', () => {
  it('wakes every distinct waiter once when settled', () => {
    const { handle, settle } = createJoinHandle<number>(2);
    const first = createCountingWaker();
    const second = createCountingWaker();

    expect(handle.advance(createContext(first.waker))).toEqual({ status: 'pending' });
    expect(handle.advance(createContext(first.waker.clone()))).toEqual({ status: 'pending' });
    expect(handle.advance(createContext(second.waker))).toEqual({ status: 'pending' });

    settle.resolve(5);

    expect(first.count()).toBe(1);
    expect(second.count()).toBe(1);
    expect(handle.advance(createContext(first.waker))).toEqual({ status: 'ready', value: 5 });
  });

  it('stays ready for every waiter after it resolved', () => {
    const { handle, settle } = createJoinHandle<string>(5);
    settle.resolve('shared');

    expect(handle.advance(createContext(createCountingWaker().waker))).toEqual({ status: 'ready', value: 'shared' });
    expect(handle.advance(createContext(createCountingWaker().waker))).toEqual({ status: 'ready', value: 'shared' });
  });

  it('keeps the first outcome', () => {
    const { handle, settle } = createJoinHandle<number>(3);

    settle.resolve(1);
    settle.abort(new TaskAbortedError(3, new Error('late')));

    expect(handle.outcome()).toEqual({ status: 'resolved', value: 1 });
  });
});
