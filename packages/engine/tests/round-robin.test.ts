import { describe, expect, it } from 'vitest';
import { ExecutorShutdownError, PENDING, ready, type Waker } from '@ticktask/core';
import { NodeTimerHost } from '@ticktask/adapters';
import { FailingProbe, GateProbe, createFakeRuntimeDeps } from '@ticktask/testing';

import { RoundRobinExecutor, noopWaker, operation, pollFn, sleep } from '../src/index';

describe('RoundRobinExecutor', () => {
  it('advances every pending task once per pass in spawn order', () => {
    const executor = new RoundRobinExecutor();
    const log: string[] = [];
    const [a, b, c] = ['a', 'b', 'c'].map((label) => new GateProbe(label, log));
    for (const probe of [a, b, c]) {
      if (probe) {
        executor.spawn(probe);
      }
    }

    expect(executor.runPass()).toEqual({ advanced: 3, completed: 0, aborted: 0, remaining: 3 });
    expect(executor.runPass()).toEqual({ advanced: 3, completed: 0, aborted: 0, remaining: 3 });

    b?.open();
    expect(executor.runPass()).toEqual({ advanced: 3, completed: 1, aborted: 0, remaining: 2 });
    expect(executor.runPass()).toEqual({ advanced: 2, completed: 0, aborted: 0, remaining: 2 });

    expect(log).toEqual(['a', 'b', 'c', 'a', 'b', 'c', 'a', 'b', 'c', 'a', 'c']);
  });

  it('advances with the no-op waker', () => {
    const executor = new RoundRobinExecutor();
    let seen: Waker | undefined;
    executor.spawn(pollFn((cx) => {
      seen = cx.waker;
      return ready(undefined);
    }));

    executor.runPass();

    expect(seen).toBe(noopWaker);
  });

  it('counts the task being advanced as live', () => {
    const executor = new RoundRobinExecutor();
    const seen: number[] = [];
    executor.spawn(pollFn(() => {
      seen.push(executor.liveCount);
      return ready(undefined);
    }));
    executor.spawn(pollFn(() => {
      seen.push(executor.liveCount);
      return PENDING;
    }));

    executor.runPass();

    expect(seen).toEqual([2, 1]);
    expect(executor.liveCount).toBe(1);
  });

  it('leaves tasks spawned during a pass for the next pass', () => {
    const executor = new RoundRobinExecutor();
    const order: string[] = [];
    executor.spawn(pollFn(() => {
      order.push('parent');
      executor.spawn(pollFn(() => {
        order.push('child');
        return ready(undefined);
      }));
      return ready(undefined);
    }));

    expect(executor.runPass()).toEqual({ advanced: 1, completed: 1, aborted: 0, remaining: 1 });
    expect(executor.runPass()).toEqual({ advanced: 1, completed: 1, aborted: 0, remaining: 0 });
    expect(order).toEqual(['parent', 'child']);
  });

  it('drops an aborting task and keeps going', () => {
    const { logger } = createFakeRuntimeDeps();
    const executor = new RoundRobinExecutor({ logger });
    const gate = new GateProbe('ok', []);
    gate.open();

    const failing = executor.spawn(new FailingProbe());
    const sibling = executor.spawn(gate);

    expect(executor.runPass()).toEqual({ advanced: 2, completed: 1, aborted: 1, remaining: 0 });
    expect(failing.outcome().status).toBe('aborted');
    expect(sibling.outcome()).toEqual({ status: 'resolved', value: 'ok' });
    expect(logger.entries('error')[0]?.obj?.policy).toBe('round-robin');
  });

  it('busy-polls a delay to completion', async () => {
    const timer = new NodeTimerHost();
    const executor = new RoundRobinExecutor();
    const handle = executor.spawn(operation(function* () {
      yield* sleep(timer, 5);
      return 'slept';
    }));

    const report = await executor.run();

    expect(handle.outcome()).toEqual({ status: 'resolved', value: 'slept' });
    expect(report.completed).toBe(1);
    expect(report.advances).toBeGreaterThanOrEqual(2);
    expect(executor.liveCount).toBe(0);
  });

  it('stops passing after shutdown and refuses new tasks', async () => {
    const executor = new RoundRobinExecutor();
    executor.spawn(pollFn(() => PENDING));
    executor.shutdown();

    await expect(executor.run()).resolves.toEqual({ completed: 0, aborted: 0, advances: 0 });
    expect(() => executor.spawn(pollFn(() => PENDING))).toThrowError(ExecutorShutdownError);
  });
});
