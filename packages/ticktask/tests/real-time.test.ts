import { describe, expect, it } from 'vitest';
import { FakeLogger } from '@ticktask/testing';

import { Delay, Executor, NodeTimerHost, createRuntime, operation, sleep, wait } from '../src/index';

describe('real timers', () => {
  it('resolves a short delay no earlier than its deadline', async () => {
    const runtime = createRuntime({}, { logger: new FakeLogger() });
    const start = runtime.timer.now();

    const handle = runtime.spawn(operation(function* () {
      yield* runtime.sleep(10);
      return 'done';
    }));
    await runtime.run();

    const elapsed = runtime.timer.now() - start;
    expect(handle.outcome()).toEqual({ status: 'resolved', value: 'done' });
    expect(elapsed).toBeGreaterThanOrEqual(10);
    expect(elapsed).toBeLessThan(100);
  });

  it('completes a thousand concurrent delays with one timer each', async () => {
    const timer = new NodeTimerHost();
    const executor = new Executor();

    // Each deadline is taken on the task's first advance, not at spawn time.
    for (let i = 0; i < 1000; i++) {
      executor.spawn(operation(function* () {
        yield* sleep(timer, 1);
      }));
    }
    const report = await executor.run();

    expect(report.completed).toBe(1000);
    expect(report.aborted).toBe(0);
    expect(report.advances).toBe(2000);
    expect(timer.spawnedCount).toBe(1000);
    expect(timer.activeCount).toBe(0);
    expect(executor.queuedCount).toBe(0);
  });

  it('spawns no timer for a deadline already in the past', async () => {
    const timer = new NodeTimerHost();
    const executor = new Executor();

    executor.spawn(new Delay(timer.now() - 5, timer));
    const report = await executor.run();

    expect(report).toEqual({ completed: 1, aborted: 0, advances: 1 });
    expect(timer.spawnedCount).toBe(0);
  });

  it('drives delays under the round-robin policy', async () => {
    const runtime = createRuntime({ policy: 'round-robin' }, { logger: new FakeLogger() });

    const handle = runtime.spawn(operation(function* () {
      const first = runtime.delay(2);
      yield* wait(first);
      return first.isArmed;
    }));
    const report = await runtime.run();

    expect(handle.outcome()).toEqual({ status: 'resolved', value: true });
    expect(report.completed).toBe(1);
    expect(report.advances).toBeGreaterThanOrEqual(2);
  });
});
